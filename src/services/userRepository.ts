import type { AtomicStore, WriteOutcome } from "../infra/atomicStore";
import { isRawRecord, readCount, readString, readStringSet } from "../infra/decode";
import type { PrincipalId } from "../types/quest";
import type { RewardGrant } from "../types/reward";
import type { UserRecord } from "../types/user";

export function decodeUser(raw: unknown): UserRecord | null {
	if (!isRawRecord(raw)) {
		return null;
	}
	const id = readString(raw, "id");
	if (!id) {
		return null;
	}
	const createdAt = readString(raw, "createdAt") ?? new Date(0).toISOString();
	return {
		id,
		xp: readCount(raw, "xp"),
		reputation: readCount(raw, "reputation"),
		questCreationBalance: readCount(raw, "questCreationBalance"),
		processedRewardIds: readStringSet(raw, "processedRewardIds"),
		createdAt,
		updatedAt: readString(raw, "updatedAt") ?? createdAt,
	};
}

export type RewardWrite = { status: "applied"; user: UserRecord } | { status: "already_applied" } | { status: "missing" };

export type BalanceWrite =
	| { status: "written"; user: UserRecord }
	| { status: "insufficient"; balance: number }
	| { status: "missing" };

export class UserRepository {
	constructor(private readonly store: AtomicStore<UserRecord>) {}

	private createUserRecord(userId: PrincipalId, initialBalance: number, now: Date): UserRecord {
		const timestamp = now.toISOString();
		return {
			id: userId,
			xp: 0,
			reputation: 0,
			questCreationBalance: initialBalance,
			processedRewardIds: [],
			createdAt: timestamp,
			updatedAt: timestamp,
		};
	}

	async get(userId: PrincipalId): Promise<UserRecord | null> {
		return this.store.get(userId);
	}

	/** Creates the user if absent; an existing record is returned untouched. */
	async getOrCreate(userId: PrincipalId, initialBalance: number): Promise<UserRecord> {
		const existing = await this.store.get(userId);
		if (existing) {
			return existing;
		}
		const created = this.createUserRecord(userId, initialBalance, await this.store.now());
		if (await this.store.putIfAbsent(created)) {
			return created;
		}
		const winner = await this.store.get(userId);
		if (!winner) {
			throw new Error(`User ${userId} vanished while being created`);
		}
		return winner;
	}

	async hasProcessedReward(userId: PrincipalId, rewardId: string): Promise<boolean> {
		const user = await this.store.get(userId);
		return Boolean(user?.processedRewardIds.includes(rewardId));
	}

	/**
	 * Credits the grant and records its id in one write. The set-add is
	 * rejected when the id is already present, so a grant lands at most once.
	 */
	async applyReward(grant: RewardGrant): Promise<RewardWrite> {
		const now = await this.store.now();
		const outcome = await this.store.addToSet(
			grant.userId,
			"processedRewardIds",
			grant.rewardId,
			() => true,
			(current) => ({
				...current,
				xp: current.xp + grant.xpAmount,
				reputation: current.reputation + grant.reputationAmount,
				questCreationBalance: current.questCreationBalance + grant.creationPointsAmount,
				updatedAt: now.toISOString(),
			})
		);
		switch (outcome.status) {
			case "written":
				return { status: "applied", user: outcome.record };
			case "conflict":
				return { status: "already_applied" };
			case "missing":
				return { status: "missing" };
		}
	}

	async deductCreationBalance(userId: PrincipalId, amount: number): Promise<BalanceWrite> {
		const now = await this.store.now();
		const outcome = await this.store.updateIfCondition(
			userId,
			(current) => ({
				...current,
				questCreationBalance: current.questCreationBalance - amount,
				updatedAt: now.toISOString(),
			}),
			(current) => current.questCreationBalance >= amount
		);
		return this.toBalanceWrite(outcome);
	}

	async refundCreationBalance(userId: PrincipalId, amount: number): Promise<BalanceWrite> {
		const now = await this.store.now();
		const outcome = await this.store.updateIfCondition(
			userId,
			(current) => ({
				...current,
				questCreationBalance: current.questCreationBalance + amount,
				updatedAt: now.toISOString(),
			}),
			() => true
		);
		return this.toBalanceWrite(outcome);
	}

	private toBalanceWrite(outcome: WriteOutcome<UserRecord>): BalanceWrite {
		switch (outcome.status) {
			case "written":
				return { status: "written", user: outcome.record };
			case "conflict":
				return { status: "insufficient", balance: outcome.current.questCreationBalance };
			case "missing":
				return { status: "missing" };
		}
	}
}
