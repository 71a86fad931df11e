import type { PrincipalId } from "./quest";

export interface UserRecord {
	id: PrincipalId;
	xp: number;
	reputation: number;
	questCreationBalance: number;
	processedRewardIds: string[];
	createdAt: string;
	updatedAt: string;
}
