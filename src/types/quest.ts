export type QuestId = string;

export type PrincipalId = string;

export type QuestStatus = "OPEN" | "CLAIMED" | "SUBMITTED" | "COMPLETE" | "DISPUTED" | "EXPIRED";

export const QUEST_STATUSES: readonly QuestStatus[] = ["OPEN", "CLAIMED", "SUBMITTED", "COMPLETE", "DISPUTED", "EXPIRED"];

export type AttestationRole = "requester" | "performer";

export interface AttestationEntry {
	attesterId: PrincipalId;
	role: AttestationRole;
	rating: number;
	comment: string | null;
	timestamp: string;
}

export interface QuestRecord {
	id: QuestId;
	title: string;
	description: string;
	status: QuestStatus;
	creatorId: PrincipalId;
	performerId: PrincipalId | null;
	rewardXp: number;
	rewardReputation: number;
	hasRequesterAttestation: boolean;
	hasPerformerAttestation: boolean;
	attesterIds: PrincipalId[];
	attestations: AttestationEntry[];
	submissionText: string | null;
	disputeReason: string | null;
	disputedBy: PrincipalId | null;
	createdAt: string;
	claimedAt: string | null;
	submittedAt: string | null;
	completedAt: string | null;
	disputedAt: string | null;
	expiredAt: string | null;
	updatedAt: string;
}

export interface QuestDraft {
	title: string;
	description: string;
	rewardXp: number;
	rewardReputation: number;
}

export type QuestAction =
	| { type: "claim" }
	| { type: "submit"; evidence: string }
	| { type: "attest"; role: AttestationRole; rating: number; comment: string | null }
	| { type: "dispute"; reason: string }
	| { type: "expire" };

/** Principal used for transitions that only the engine itself may perform. */
export const SYSTEM_PRINCIPAL: PrincipalId = "system";
