import type { OperatorNotifier } from "../infra/operatorNotifier";
import type { FailedRewardRecord, ReprocessSummary } from "../types/reward";
import { isTransientStoreError } from "./errors";
import { grantOf, type FailedRewardRepository } from "./failedRewardRepository";
import type { RewardDistributor } from "./rewardDistributor";
import type { UserRepository } from "./userRepository";

export interface ReprocessorOptions {
	workerId: string;
	maxRetries: number;
	leaseTtlMs: number;
	batchSize: number;
}

type ItemOutcome = "resolved" | "abandoned" | "retried" | "skipped";

export class FailedRewardReprocessor {
	constructor(
		private readonly failedRewards: FailedRewardRepository,
		private readonly users: UserRepository,
		private readonly distributor: RewardDistributor,
		private readonly notifier: OperatorNotifier,
		private readonly options: ReprocessorOptions
	) {}

	/**
	 * One sweep over pending failed rewards. Safe to run from several workers
	 * at once: each record is only touched by the worker holding its lease.
	 */
	async reprocessFailedRewards(): Promise<ReprocessSummary> {
		const summary: ReprocessSummary = { processed: 0, resolved: 0, abandoned: 0, retried: 0, skipped: 0 };
		const pending = await this.failedRewards.listPending(this.options.batchSize);
		console.info("[reprocessor] sweep started", { workerId: this.options.workerId, pending: pending.length });

		for (const candidate of pending) {
			summary.processed += 1;
			let outcome: ItemOutcome;
			try {
				outcome = await this.processOne(candidate);
			} catch (error) {
				if (!isTransientStoreError(error)) {
					throw error;
				}
				console.warn("[reprocessor] store unavailable while processing reward", {
					rewardId: candidate.id,
					error: error.message,
				});
				outcome = "skipped";
			}
			summary[outcome] += 1;
		}

		console.info("[reprocessor] sweep finished", { workerId: this.options.workerId, ...summary });
		return summary;
	}

	private async processOne(candidate: FailedRewardRecord): Promise<ItemOutcome> {
		const { workerId, leaseTtlMs, maxRetries } = this.options;
		const leased = await this.failedRewards.acquireLease(candidate.id, workerId, leaseTtlMs);
		if (!leased) {
			console.debug("[reprocessor] lease held elsewhere", { rewardId: candidate.id });
			return "skipped";
		}

		if (await this.users.hasProcessedReward(leased.userId, leased.id)) {
			return this.resolve(leased, "already applied");
		}

		if (leased.retryCount >= maxRetries) {
			const write = await this.failedRewards.markAbandoned(leased.id, workerId, null);
			if (write.status === "lease_lost") {
				return "skipped";
			}
			await this.reportAbandoned(write.record);
			return "abandoned";
		}

		const outcome = await this.distributor.tryApply(grantOf(leased));
		if (outcome.status !== "failed") {
			return this.resolve(leased, outcome.status);
		}

		if (leased.retryCount + 1 >= maxRetries) {
			const write = await this.failedRewards.recordFinalFailure(leased.id, workerId, outcome.reason);
			if (write.status === "lease_lost") {
				return "skipped";
			}
			await this.reportAbandoned(write.record);
			return "abandoned";
		}

		const write = await this.failedRewards.recordRetry(leased.id, workerId, outcome.reason);
		if (write.status === "lease_lost") {
			return "skipped";
		}
		console.info("[reprocessor] reward left pending", {
			rewardId: leased.id,
			retryCount: write.record.retryCount,
			error: outcome.reason,
		});
		return "retried";
	}

	private async resolve(record: FailedRewardRecord, detail: string): Promise<ItemOutcome> {
		const write = await this.failedRewards.markResolved(record.id, this.options.workerId);
		if (write.status === "lease_lost") {
			console.warn("[reprocessor] lease lost before resolving reward", { rewardId: record.id });
			return "skipped";
		}
		console.info("[reprocessor] reward resolved", { rewardId: record.id, userId: record.userId, detail });
		return "resolved";
	}

	private async reportAbandoned(record: FailedRewardRecord): Promise<void> {
		console.error("[reprocessor] reward abandoned", {
			rewardId: record.id,
			userId: record.userId,
			questId: record.questId,
			retryCount: record.retryCount,
			error: record.lastError,
		});
		await this.notifier.notifyAbandonedReward(record);
	}
}
