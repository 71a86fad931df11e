import { timestampScore, type AtomicStore, type RecordIndex, type WriteOutcome } from "../infra/atomicStore";
import { isRawRecord, readCount, readOneOf, readString } from "../infra/decode";
import type { FailedRewardRecord, FailedRewardStatus, RewardGrant } from "../types/reward";

const FAILED_REWARD_STATUSES: readonly FailedRewardStatus[] = ["pending", "resolved", "abandoned"];

export function decodeFailedReward(raw: unknown): FailedRewardRecord | null {
	if (!isRawRecord(raw)) {
		return null;
	}
	const id = readString(raw, "id");
	const questId = readString(raw, "questId");
	const userId = readString(raw, "userId");
	const status = readOneOf(raw, "status", FAILED_REWARD_STATUSES);
	const createdAt = readString(raw, "createdAt");
	if (!id || !questId || !userId || !status || !createdAt) {
		return null;
	}
	return {
		id,
		questId,
		userId,
		xpAmount: readCount(raw, "xpAmount"),
		reputationAmount: readCount(raw, "reputationAmount"),
		creationPointsAmount: readCount(raw, "creationPointsAmount"),
		status,
		retryCount: readCount(raw, "retryCount"),
		leaseOwner: readString(raw, "leaseOwner"),
		leaseExpiresAt: readString(raw, "leaseExpiresAt"),
		lastError: readString(raw, "lastError"),
		createdAt,
		updatedAt: readString(raw, "updatedAt") ?? createdAt,
		resolvedAt: readString(raw, "resolvedAt"),
		abandonedAt: readString(raw, "abandonedAt"),
	};
}

/** Pending records in creation order. */
export const PENDING_REWARD_INDEX: RecordIndex<FailedRewardRecord> = {
	name: "pending",
	score: (record) => (record.status === "pending" ? timestampScore(record.createdAt) : null),
};

export function grantOf(record: FailedRewardRecord): RewardGrant {
	return {
		rewardId: record.id,
		questId: record.questId,
		userId: record.userId,
		xpAmount: record.xpAmount,
		reputationAmount: record.reputationAmount,
		creationPointsAmount: record.creationPointsAmount,
	};
}

export type LeasedWrite = { status: "written"; record: FailedRewardRecord } | { status: "lease_lost" };

function isLeaseFree(record: FailedRewardRecord, now: Date): boolean {
	if (!record.leaseOwner) {
		return true;
	}
	const expiresAt = record.leaseExpiresAt ? Date.parse(record.leaseExpiresAt) : Number.NaN;
	return Number.isNaN(expiresAt) || expiresAt < now.getTime();
}

/**
 * Durable queue of rewards that could not be applied inline. Workers
 * coordinate through `leaseOwner`/`leaseExpiresAt`; every status change after
 * acquisition is conditional on still holding the lease.
 */
export class FailedRewardRepository {
	constructor(private readonly store: AtomicStore<FailedRewardRecord>) {}

	async now(): Promise<Date> {
		return this.store.now();
	}

	async get(id: string): Promise<FailedRewardRecord | null> {
		return this.store.get(id);
	}

	/** Returns false when a record for the same reward id already exists. */
	async record(grant: RewardGrant, error: string): Promise<boolean> {
		const timestamp = (await this.store.now()).toISOString();
		return this.store.putIfAbsent({
			id: grant.rewardId,
			questId: grant.questId,
			userId: grant.userId,
			xpAmount: grant.xpAmount,
			reputationAmount: grant.reputationAmount,
			creationPointsAmount: grant.creationPointsAmount,
			status: "pending",
			retryCount: 0,
			leaseOwner: null,
			leaseExpiresAt: null,
			lastError: error,
			createdAt: timestamp,
			updatedAt: timestamp,
			resolvedAt: null,
			abandonedAt: null,
		});
	}

	async listPending(limit: number): Promise<FailedRewardRecord[]> {
		return this.store.listIndexed(PENDING_REWARD_INDEX.name, { limit });
	}

	async acquireLease(id: string, owner: string, ttlMs: number): Promise<FailedRewardRecord | null> {
		const now = await this.store.now();
		const outcome = await this.store.updateIfCondition(
			id,
			(current) => ({
				...current,
				leaseOwner: owner,
				leaseExpiresAt: new Date(now.getTime() + ttlMs).toISOString(),
				updatedAt: now.toISOString(),
			}),
			(current) => current.status === "pending" && isLeaseFree(current, now)
		);
		return outcome.status === "written" ? outcome.record : null;
	}

	async markResolved(id: string, owner: string): Promise<LeasedWrite> {
		return this.updateLeased(id, owner, (_current, now) => ({
			status: "resolved",
			resolvedAt: now,
		}));
	}

	async markAbandoned(id: string, owner: string, error: string | null): Promise<LeasedWrite> {
		return this.updateLeased(id, owner, (current, now) => ({
			status: "abandoned",
			abandonedAt: now,
			lastError: error ?? current.lastError,
		}));
	}

	/** Counts a failed attempt and returns the record to the pending pool. */
	async recordRetry(id: string, owner: string, error: string): Promise<LeasedWrite> {
		return this.updateLeased(id, owner, (current) => ({
			retryCount: current.retryCount + 1,
			lastError: error,
		}));
	}

	/** Counts a failed attempt that exhausted the retry budget. */
	async recordFinalFailure(id: string, owner: string, error: string): Promise<LeasedWrite> {
		return this.updateLeased(id, owner, (current, now) => ({
			status: "abandoned",
			abandonedAt: now,
			retryCount: current.retryCount + 1,
			lastError: error,
		}));
	}

	private async updateLeased(
		id: string,
		owner: string,
		change: (current: FailedRewardRecord, now: string) => Partial<FailedRewardRecord>
	): Promise<LeasedWrite> {
		const now = (await this.store.now()).toISOString();
		const outcome: WriteOutcome<FailedRewardRecord> = await this.store.updateIfCondition(
			id,
			(current) => ({
				...current,
				...change(current, now),
				leaseOwner: null,
				leaseExpiresAt: null,
				updatedAt: now,
			}),
			(current) => current.status === "pending" && current.leaseOwner === owner
		);
		return outcome.status === "written" ? { status: "written", record: outcome.record } : { status: "lease_lost" };
	}
}
