import type { OperatorNotifier } from "../infra/operatorNotifier";
import type { PrincipalId, QuestId } from "../types/quest";
import type { RewardGrant, RewardOutcome } from "../types/reward";
import type { FailedRewardRepository } from "./failedRewardRepository";
import { retryTransient, sleep, type RetryPolicy, type Sleep } from "./retryPolicy";
import type { RewardWrite, UserRepository } from "./userRepository";

/** Idempotency key for the reward a performer earns by completing a quest. */
export function questRewardId(questId: QuestId): string {
	return `quest:${questId}:performer`;
}

export function buildQuestGrant(
	questId: QuestId,
	performerId: PrincipalId,
	xpAmount: number,
	reputationAmount: number,
	creationPointsAmount: number
): RewardGrant {
	return {
		rewardId: questRewardId(questId),
		questId,
		userId: performerId,
		xpAmount,
		reputationAmount,
		creationPointsAmount,
	};
}

function isValidAmount(amount: number): boolean {
	return Number.isSafeInteger(amount) && amount >= 0;
}

export class RewardDistributor {
	constructor(
		private readonly users: UserRepository,
		private readonly failedRewards: FailedRewardRepository,
		private readonly retry: RetryPolicy,
		private readonly notifier: OperatorNotifier,
		private readonly wait: Sleep = sleep
	) {}

	/**
	 * Applies the grant, queueing a `FailedReward` when it cannot be applied
	 * within the local retry budget. Never throws for store failures.
	 */
	async apply(grant: RewardGrant): Promise<RewardOutcome> {
		const outcome = await this.tryApply(grant);
		if (outcome.status !== "failed") {
			return outcome;
		}

		const queued = await this.queue(grant, outcome.reason);
		return { status: "failed", reason: outcome.reason, failedRewardId: queued ? grant.rewardId : null };
	}

	/** Same as `apply` without queueing; used when retrying an already queued reward. */
	async tryApply(grant: RewardGrant): Promise<RewardOutcome> {
		if (![grant.xpAmount, grant.reputationAmount, grant.creationPointsAmount].every(isValidAmount)) {
			return { status: "failed", reason: "reward amounts must be non-negative integers", failedRewardId: null };
		}

		const result = await retryTransient(
			this.retry,
			async (attempt): Promise<RewardWrite> => {
				if (attempt > 1) {
					console.info("[rewardDistributor] retrying reward", { rewardId: grant.rewardId, attempt });
				}
				const user = await this.users.get(grant.userId);
				if (!user) {
					return { status: "missing" };
				}
				if (user.processedRewardIds.includes(grant.rewardId)) {
					return { status: "already_applied" };
				}
				return this.users.applyReward(grant);
			},
			this.wait
		);

		if (!result.ok) {
			console.warn("[rewardDistributor] reward application failed", {
				rewardId: grant.rewardId,
				userId: grant.userId,
				attempts: result.attempts,
				error: result.error.message,
			});
			return { status: "failed", reason: result.error.message, failedRewardId: null };
		}

		switch (result.value.status) {
			case "applied":
				console.info("[rewardDistributor] reward applied", {
					rewardId: grant.rewardId,
					userId: grant.userId,
					xp: grant.xpAmount,
					reputation: grant.reputationAmount,
					creationPoints: grant.creationPointsAmount,
				});
				return { status: "applied", user: result.value.user };
			case "already_applied":
				console.info("[rewardDistributor] reward already applied", { rewardId: grant.rewardId, userId: grant.userId });
				return { status: "already_applied" };
			case "missing":
				console.warn("[rewardDistributor] reward recipient does not exist", { rewardId: grant.rewardId, userId: grant.userId });
				return { status: "failed", reason: `user ${grant.userId} was not found`, failedRewardId: null };
		}
	}

	private async queue(grant: RewardGrant, reason: string): Promise<boolean> {
		const result = await retryTransient(this.retry, () => this.failedRewards.record(grant, reason), this.wait);
		if (!result.ok) {
			console.error("[rewardDistributor] could not persist failed reward", {
				rewardId: grant.rewardId,
				userId: grant.userId,
				error: result.error.message,
			});
			await this.notifier.notifyLostReward(grant, `${reason}; queueing failed: ${result.error.message}`);
			return false;
		}
		if (!result.value) {
			console.info("[rewardDistributor] failed reward already queued", { rewardId: grant.rewardId });
		} else {
			console.warn("[rewardDistributor] reward queued for reprocessing", { rewardId: grant.rewardId, reason });
		}
		return true;
	}
}
