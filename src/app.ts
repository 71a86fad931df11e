import type { AppConfig } from "./config";
import { createOperatorNotifier, type OperatorNotifier } from "./infra/operatorNotifier";
import { acquireRedisClient, releaseRedisClient, type RedisClient } from "./infra/redis";
import { RedisAtomicStore } from "./infra/redisStore";
import { SweepScheduler } from "./infra/sweepScheduler";
import { AttestationLedger } from "./services/attestationLedger";
import { decodeFailedReward, FailedRewardRepository, PENDING_REWARD_INDEX } from "./services/failedRewardRepository";
import { FailedRewardReprocessor } from "./services/failedRewardReprocessor";
import { ACTIVE_QUEST_INDEX, decodeQuest, QuestRepository } from "./services/questRepository";
import { QuestService } from "./services/questService";
import { RewardDistributor } from "./services/rewardDistributor";
import { decodeUser, UserRepository } from "./services/userRepository";
import type { QuestRecord } from "./types/quest";
import type { FailedRewardRecord } from "./types/reward";
import type { UserRecord } from "./types/user";

export class QuestEngineApplication {
	private redisClient: RedisClient | null = null;
	private questService: QuestService | null = null;
	private scheduler: SweepScheduler | null = null;

	constructor(private readonly config: AppConfig) {}

	async initialise(): Promise<void> {
		const { store, rewards, reprocess, lifecycle } = this.config;
		this.redisClient = await acquireRedisClient({ url: store.redisUrl, connectTimeoutMs: store.timeoutMs });

		const storeOptions = { keyPrefix: store.keyPrefix, timeoutMs: store.timeoutMs, casAttempts: store.casAttempts };
		const quests = new QuestRepository(
			new RedisAtomicStore<QuestRecord>(this.redisClient, {
				...storeOptions,
				collection: "quest",
				decode: decodeQuest,
				indexes: [ACTIVE_QUEST_INDEX],
			}),
			lifecycle
		);
		const users = new UserRepository(
			new RedisAtomicStore<UserRecord>(this.redisClient, { ...storeOptions, collection: "user", decode: decodeUser })
		);
		const failedRewards = new FailedRewardRepository(
			new RedisAtomicStore<FailedRewardRecord>(this.redisClient, {
				...storeOptions,
				collection: "failed-reward",
				decode: decodeFailedReward,
				indexes: [PENDING_REWARD_INDEX],
			})
		);

		const notifier: OperatorNotifier = createOperatorNotifier(this.config.operator);
		const distributor = new RewardDistributor(
			users,
			failedRewards,
			{ maxAttempts: rewards.maxAttempts, baseDelayMs: rewards.backoffMs, maxDelayMs: rewards.maxBackoffMs },
			notifier
		);
		const reprocessor = new FailedRewardReprocessor(failedRewards, users, distributor, notifier, reprocess);

		const questService = new QuestService(quests, users, new AttestationLedger(quests), distributor, reprocessor, {
			questCreationCost: lifecycle.questCreationCost,
			initialQuestCreationBalance: lifecycle.initialQuestCreationBalance,
			performerCreationBonus: rewards.performerCreationBonus,
			rewardsEnabled: rewards.enabled,
			sweepBatchSize: reprocess.batchSize,
		});
		this.questService = questService;

		this.scheduler = new SweepScheduler(
			[
				{ name: "failed reward reprocessing", run: () => questService.reprocessFailedRewards() },
				{ name: "stale quest expiry", run: () => questService.expireStaleQuests() },
			],
			reprocess.intervalMs
		);
		console.info("[app] initialised", { workerId: reprocess.workerId, keyPrefix: store.keyPrefix });
	}

	start(): void {
		this.requireScheduler().start();
		console.info("[app] background sweeps scheduled", { intervalMs: this.config.reprocess.intervalMs });
	}

	get service(): QuestService {
		if (!this.questService) {
			throw new Error("Quest service not available");
		}
		return this.questService;
	}

	async dispose(): Promise<void> {
		await this.scheduler?.stop();
		this.scheduler = null;
		this.questService = null;
		if (this.redisClient) {
			await releaseRedisClient();
			this.redisClient = null;
		}
	}

	private requireScheduler(): SweepScheduler {
		if (!this.scheduler) {
			throw new Error("QuestEngineApplication has not been initialised");
		}
		return this.scheduler;
	}
}
