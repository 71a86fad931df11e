import { randomUUID } from "node:crypto";

import { config as loadEnv } from "dotenv";

import { parseLogLevel, type LogLevel } from "../infra/logging";

loadEnv();

const DAY_MS = 24 * 60 * 60 * 1000;

export interface StoreConfig {
	redisUrl: string;
	keyPrefix: string;
	timeoutMs: number;
	casAttempts: number;
}

export interface RewardConfig {
	enabled: boolean;
	maxAttempts: number;
	backoffMs: number;
	maxBackoffMs: number;
	performerCreationBonus: number;
}

export interface ReprocessConfig {
	maxRetries: number;
	leaseTtlMs: number;
	intervalMs: number;
	batchSize: number;
	workerId: string;
}

export interface LifecycleConfig {
	disputeWindowMs: number;
	inactivityWindowMs: number;
	questCreationCost: number;
	initialQuestCreationBalance: number;
}

export interface OperatorConfig {
	botToken: string;
	chatId: string;
}

export interface AppConfig {
	logLevel: LogLevel;
	store: StoreConfig;
	rewards: RewardConfig;
	reprocess: ReprocessConfig;
	lifecycle: LifecycleConfig;
	operator: OperatorConfig;
}

export class AppConfiguration implements AppConfig {
	readonly logLevel: LogLevel;
	readonly store: StoreConfig;
	readonly rewards: RewardConfig;
	readonly reprocess: ReprocessConfig;
	readonly lifecycle: LifecycleConfig;
	readonly operator: OperatorConfig;

	private constructor(env: NodeJS.ProcessEnv) {
		this.logLevel = parseLogLevel(env.LOG_LEVEL);

		this.store = {
			redisUrl: env.REDIS_URL ?? "redis://127.0.0.1:6379",
			keyPrefix: env.STORE_KEY_PREFIX?.trim() || "quests",
			timeoutMs: this.parsePositive(env.STORE_TIMEOUT_MS, 2_000),
			casAttempts: this.parsePositive(env.STORE_CAS_ATTEMPTS, 5),
		};

		this.rewards = {
			enabled: this.parseBoolean(env.REWARDS_ENABLED, true),
			maxAttempts: this.parsePositive(env.REWARD_MAX_ATTEMPTS, 3),
			backoffMs: this.parseNonNegative(env.REWARD_BACKOFF_MS, 100),
			maxBackoffMs: this.parseNonNegative(env.REWARD_MAX_BACKOFF_MS, 2_000),
			performerCreationBonus: this.parseNonNegative(env.PERFORMER_CREATION_BONUS, 2),
		};

		this.reprocess = {
			maxRetries: this.parsePositive(env.REPROCESS_MAX_RETRIES, 5),
			leaseTtlMs: this.parsePositive(env.LEASE_TTL_MS, 5 * 60 * 1000),
			intervalMs: this.parsePositive(env.REPROCESS_INTERVAL_MS, 15 * 60 * 1000),
			batchSize: this.parsePositive(env.REPROCESS_BATCH_SIZE, 100),
			workerId: env.WORKER_ID?.trim() || `worker-${randomUUID()}`,
		};

		this.lifecycle = {
			disputeWindowMs: this.parsePositive(env.DISPUTE_WINDOW_MS, 7 * DAY_MS),
			inactivityWindowMs: this.parsePositive(env.QUEST_INACTIVITY_MS, 30 * DAY_MS),
			questCreationCost: this.parseNonNegative(env.QUEST_CREATION_COST, 1),
			initialQuestCreationBalance: this.parseNonNegative(env.INITIAL_QUEST_CREATION_BALANCE, 10),
		};

		this.operator = {
			botToken: env.OPERATOR_BOT_TOKEN ?? "",
			chatId: env.OPERATOR_CHAT_ID ?? "",
		};
	}

	static load(env: NodeJS.ProcessEnv = process.env): AppConfiguration {
		return new AppConfiguration(env);
	}

	private parsePositive(value: string | undefined, fallback: number): number {
		const parsed = Number.parseInt(value ?? "", 10);
		return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : fallback;
	}

	private parseNonNegative(value: string | undefined, fallback: number): number {
		const parsed = Number.parseInt(value ?? "", 10);
		return Number.isSafeInteger(parsed) && parsed >= 0 ? parsed : fallback;
	}

	private parseBoolean(value: string | undefined, fallback: boolean): boolean {
		switch ((value ?? "").trim().toLowerCase()) {
			case "1":
			case "true":
			case "yes":
				return true;
			case "0":
			case "false":
			case "no":
				return false;
			default:
				return fallback;
		}
	}
}
