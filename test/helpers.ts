import type {
	AtomicStore,
	Condition,
	IndexQuery,
	Mutation,
	SetField,
	StoredRecord,
	WriteOutcome,
} from "../src/infra/atomicStore";
import { MemoryAtomicStore } from "../src/infra/memoryStore";
import type { OperatorNotifier } from "../src/infra/operatorNotifier";
import { AttestationLedger } from "../src/services/attestationLedger";
import { TransientStoreError } from "../src/services/errors";
import { decodeFailedReward, FailedRewardRepository, PENDING_REWARD_INDEX } from "../src/services/failedRewardRepository";
import { FailedRewardReprocessor, type ReprocessorOptions } from "../src/services/failedRewardReprocessor";
import { ACTIVE_QUEST_INDEX, decodeQuest, QuestRepository } from "../src/services/questRepository";
import { QuestService, type QuestServiceOptions } from "../src/services/questService";
import { RewardDistributor } from "../src/services/rewardDistributor";
import { decodeUser, UserRepository } from "../src/services/userRepository";
import type { QuestRecord } from "../src/types/quest";
import type { FailedRewardRecord, RewardGrant } from "../src/types/reward";
import type { UserRecord } from "../src/types/user";

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Clock the tests move by hand. */
export class ManualClock {
	constructor(private current: Date = new Date("2024-03-01T12:00:00.000Z")) {}

	now = (): Date => new Date(this.current.getTime());

	advance(ms: number): void {
		this.current = new Date(this.current.getTime() + ms);
	}
}

type StoreOperation = "get" | "putIfAbsent" | "updateIfCondition" | "addToSet" | "deleteIfCondition" | "listIndexed";

/**
 * Wraps a store and fails scheduled calls with `TransientStoreError`, the way
 * a timed out or throttled backend would.
 */
export class FlakyStore<T extends StoredRecord> implements AtomicStore<T> {
	private readonly failures = new Map<StoreOperation, number>();
	readonly calls: StoreOperation[] = [];

	constructor(private readonly inner: AtomicStore<T>) {}

	failNext(operation: StoreOperation, times = 1): void {
		this.failures.set(operation, (this.failures.get(operation) ?? 0) + times);
	}

	now(): Promise<Date> {
		return this.inner.now();
	}

	async get(id: string): Promise<T | null> {
		this.enter("get");
		return this.inner.get(id);
	}

	async putIfAbsent(record: T): Promise<boolean> {
		this.enter("putIfAbsent");
		return this.inner.putIfAbsent(record);
	}

	async updateIfCondition(id: string, mutation: Mutation<T>, condition: Condition<T>): Promise<WriteOutcome<T>> {
		this.enter("updateIfCondition");
		return this.inner.updateIfCondition(id, mutation, condition);
	}

	async addToSet(
		id: string,
		field: SetField<T>,
		value: string,
		condition: Condition<T>,
		mutation?: Mutation<T>
	): Promise<WriteOutcome<T>> {
		this.enter("addToSet");
		return this.inner.addToSet(id, field, value, condition, mutation);
	}

	async deleteIfCondition(id: string, condition: Condition<T>): Promise<WriteOutcome<T>> {
		this.enter("deleteIfCondition");
		return this.inner.deleteIfCondition(id, condition);
	}

	async listIndexed(index: string, query: IndexQuery): Promise<T[]> {
		this.enter("listIndexed");
		return this.inner.listIndexed(index, query);
	}

	private enter(operation: StoreOperation): void {
		this.calls.push(operation);
		const remaining = this.failures.get(operation) ?? 0;
		if (remaining > 0) {
			this.failures.set(operation, remaining - 1);
			throw new TransientStoreError(operation, "simulated timeout");
		}
	}
}

export class RecordingNotifier implements OperatorNotifier {
	readonly abandoned: FailedRewardRecord[] = [];
	readonly lost: { grant: RewardGrant; reason: string }[] = [];

	async notifyAbandonedReward(record: FailedRewardRecord): Promise<void> {
		this.abandoned.push(record);
	}

	async notifyLostReward(grant: RewardGrant, reason: string): Promise<void> {
		this.lost.push({ grant, reason });
	}
}

export interface EngineOverrides {
	service?: Partial<QuestServiceOptions>;
	reprocessor?: Partial<ReprocessorOptions>;
	maxAttempts?: number;
}

export function buildEngine(overrides: EngineOverrides = {}) {
	const clock = new ManualClock();
	const questStore = new FlakyStore<QuestRecord>(new MemoryAtomicStore(decodeQuest, clock.now, [ACTIVE_QUEST_INDEX]));
	const userStore = new FlakyStore<UserRecord>(new MemoryAtomicStore(decodeUser, clock.now));
	const failedStore = new FlakyStore<FailedRewardRecord>(new MemoryAtomicStore(decodeFailedReward, clock.now, [PENDING_REWARD_INDEX]));

	const quests = new QuestRepository(questStore, { disputeWindowMs: 7 * DAY_MS, inactivityWindowMs: 30 * DAY_MS });
	const users = new UserRepository(userStore);
	const failedRewards = new FailedRewardRepository(failedStore);
	const delays: number[] = [];
	const notifier = new RecordingNotifier();
	const distributor = new RewardDistributor(
		users,
		failedRewards,
		{ maxAttempts: overrides.maxAttempts ?? 3, baseDelayMs: 100, maxDelayMs: 2_000 },
		notifier,
		async (ms) => {
			delays.push(ms);
		}
	);
	const reprocessor = new FailedRewardReprocessor(failedRewards, users, distributor, notifier, {
		workerId: "worker-a",
		maxRetries: 3,
		leaseTtlMs: 60_000,
		batchSize: 100,
		...overrides.reprocessor,
	});
	const service = new QuestService(quests, users, new AttestationLedger(quests), distributor, reprocessor, {
		questCreationCost: 1,
		initialQuestCreationBalance: 10,
		performerCreationBonus: 2,
		rewardsEnabled: true,
		sweepBatchSize: 100,
		...overrides.service,
	});

	return {
		clock,
		questStore,
		userStore,
		failedStore,
		quests,
		users,
		failedRewards,
		distributor,
		notifier,
		reprocessor,
		service,
		delays,
	};
}

export type Engine = ReturnType<typeof buildEngine>;

export const sampleDraft = {
	title: "Fix the garden fence",
	description: "Replace the two broken panels by the gate.",
	rewardXp: 100,
	rewardReputation: 10,
};

/** Registers alice (requester) and bob (performer) and creates one OPEN quest owned by alice. */
export async function openQuest(engine: Engine): Promise<QuestRecord> {
	await engine.service.registerUser("alice");
	await engine.service.registerUser("bob");
	const created = await engine.service.createQuest("alice", sampleDraft);
	if (!created.ok) {
		throw created.error;
	}
	return created.value;
}

/** Takes a fresh quest through claim and submit, leaving it SUBMITTED. */
export async function submittedQuest(engine: Engine): Promise<QuestRecord> {
	const quest = await openQuest(engine);
	const claimed = await engine.service.claimQuest(quest.id, "bob");
	if (!claimed.ok) {
		throw claimed.error;
	}
	const submitted = await engine.service.submitWork(quest.id, "bob", "Both panels replaced, photos attached.");
	if (!submitted.ok) {
		throw submitted.error;
	}
	return submitted.value;
}
