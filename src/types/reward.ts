import type { PrincipalId, QuestId } from "./quest";
import type { UserRecord } from "./user";

export type FailedRewardStatus = "pending" | "resolved" | "abandoned";

export interface RewardGrant {
	rewardId: string;
	questId: QuestId;
	userId: PrincipalId;
	xpAmount: number;
	reputationAmount: number;
	creationPointsAmount: number;
}

export interface FailedRewardRecord {
	/** Same value as the reward id it stands for. */
	id: string;
	questId: QuestId;
	userId: PrincipalId;
	xpAmount: number;
	reputationAmount: number;
	creationPointsAmount: number;
	status: FailedRewardStatus;
	retryCount: number;
	leaseOwner: string | null;
	leaseExpiresAt: string | null;
	lastError: string | null;
	createdAt: string;
	updatedAt: string;
	resolvedAt: string | null;
	abandonedAt: string | null;
}

export type RewardOutcome =
	| { status: "applied"; user: UserRecord }
	| { status: "already_applied" }
	| { status: "failed"; reason: string; failedRewardId: string | null };

export interface ReprocessSummary {
	processed: number;
	resolved: number;
	abandoned: number;
	retried: number;
	skipped: number;
}
