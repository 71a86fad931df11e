import { randomUUID } from "node:crypto";

import { SYSTEM_PRINCIPAL, type PrincipalId, type QuestAction, type QuestDraft, type QuestId, type QuestRecord } from "../types/quest";
import type { ReprocessSummary, RewardOutcome } from "../types/reward";
import type { UserRecord } from "../types/user";
import type { AttestationLedger } from "./attestationLedger";
import {
	ConflictError,
	ForbiddenError,
	InsufficientBalanceError,
	InvalidTransitionError,
	isTransientStoreError,
	NotFoundError,
	type TransientStoreError,
	type TransitionError,
	type ValidationError,
} from "./errors";
import type { FailedRewardReprocessor } from "./failedRewardReprocessor";
import type { QuestRepository, QuestWrite } from "./questRepository";
import type { TransitionRejectionKind } from "./questStateMachine";
import { err, ok, type Result } from "./result";
import { buildQuestGrant, type RewardDistributor } from "./rewardDistributor";
import { TEXT_BOUNDS, validateComment, validateDraft, validateRating, validateText } from "./textInput";
import type { UserRepository } from "./userRepository";

export interface QuestServiceOptions {
	questCreationCost: number;
	initialQuestCreationBalance: number;
	performerCreationBonus: number;
	rewardsEnabled: boolean;
	/** Upper bound on quests examined per expiry sweep. */
	sweepBatchSize: number;
}

export type QuestResult<E> = Result<QuestRecord, E | TransientStoreError>;

export interface ExpirySweepSummary {
	examined: number;
	expired: number;
}

function rejectionError(kind: TransitionRejectionKind, message: string): TransitionError {
	switch (kind) {
		case "forbidden":
			return new ForbiddenError(message);
		case "invalid_transition":
			return new InvalidTransitionError(message);
		case "conflict":
			return new ConflictError(message);
	}
}

/**
 * Operations the API layer calls on behalf of an authenticated caller. Each
 * one reads fresh state, validates it, and performs a single conditional
 * write; nothing is cached between calls.
 */
export class QuestService {
	constructor(
		private readonly quests: QuestRepository,
		private readonly users: UserRepository,
		private readonly ledger: AttestationLedger,
		private readonly distributor: RewardDistributor,
		private readonly reprocessor: FailedRewardReprocessor,
		private readonly options: QuestServiceOptions
	) {}

	async registerUser(userId: PrincipalId): Promise<Result<UserRecord, TransientStoreError>> {
		return this.guard<UserRecord, never>("registerUser", async () =>
			ok(await this.users.getOrCreate(userId, this.options.initialQuestCreationBalance))
		);
	}

	async getUser(userId: PrincipalId): Promise<Result<UserRecord, NotFoundError | TransientStoreError>> {
		return this.guard<UserRecord, NotFoundError>("getUser", async () => {
			const user = await this.users.get(userId);
			return user ? ok(user) : err(new NotFoundError("user", userId));
		});
	}

	async getQuest(questId: QuestId): Promise<QuestResult<NotFoundError>> {
		return this.guard<QuestRecord, NotFoundError>("getQuest", async () => {
			const quest = await this.quests.get(questId);
			return quest ? ok(quest) : err(new NotFoundError("quest", questId));
		});
	}

	async createQuest(
		callerId: PrincipalId,
		draft: QuestDraft
	): Promise<QuestResult<ValidationError | NotFoundError | InsufficientBalanceError | ConflictError>> {
		const validated = validateDraft(draft);
		if (!validated.ok) {
			return validated;
		}

		return this.guard<QuestRecord, NotFoundError | InsufficientBalanceError | ConflictError>("createQuest", async () => {
			const cost = this.options.questCreationCost;
			const deducted = await this.users.deductCreationBalance(callerId, cost);
			if (deducted.status === "missing") {
				return err(new NotFoundError("user", callerId));
			}
			if (deducted.status === "insufficient") {
				return err(new InsufficientBalanceError(callerId, deducted.balance, cost));
			}

			const timestamp = (await this.quests.now()).toISOString();
			const quest: QuestRecord = {
				id: randomUUID(),
				...validated.value,
				status: "OPEN",
				creatorId: callerId,
				performerId: null,
				hasRequesterAttestation: false,
				hasPerformerAttestation: false,
				attesterIds: [],
				attestations: [],
				submissionText: null,
				disputeReason: null,
				disputedBy: null,
				createdAt: timestamp,
				claimedAt: null,
				submittedAt: null,
				completedAt: null,
				disputedAt: null,
				expiredAt: null,
				updatedAt: timestamp,
			};

			let created: boolean;
			try {
				created = await this.quests.create(quest);
			} catch (error) {
				await this.refundCreationCost(callerId, "quest write failed");
				throw error;
			}
			if (!created) {
				await this.refundCreationCost(callerId, "quest id collision");
				return err(new ConflictError(`Quest ${quest.id} already exists`));
			}

			console.info("[questService] quest created", { questId: quest.id, creatorId: callerId });
			return ok(quest);
		});
	}

	/** Deletes an OPEN quest and refunds its creation cost to the creator. */
	async deleteQuest(questId: QuestId, callerId: PrincipalId): Promise<QuestResult<TransitionError>> {
		return this.guard<QuestRecord, TransitionError>("deleteQuest", async () => {
			const write = await this.quests.deleteOpen(questId, callerId);
			switch (write.status) {
				case "missing":
					return err(new NotFoundError("quest", questId));
				case "rejected":
					return err(rejectionError(write.kind, write.message));
				case "written":
					await this.refundCreationCost(callerId, "quest deleted");
					console.info("[questService] quest deleted", { questId, creatorId: callerId });
					return ok(write.quest);
			}
		});
	}

	async claimQuest(questId: QuestId, callerId: PrincipalId): Promise<QuestResult<TransitionError>> {
		return this.guard("claimQuest", () =>
			this.runTransition(questId, callerId, { type: "claim" }, () => this.quests.claim(questId, callerId))
		);
	}

	async submitWork(
		questId: QuestId,
		callerId: PrincipalId,
		evidenceText: string
	): Promise<QuestResult<TransitionError | ValidationError>> {
		const evidence = validateText("evidence", evidenceText, TEXT_BOUNDS.evidence);
		if (!evidence.ok) {
			return evidence;
		}
		return this.guard("submitWork", () =>
			this.runTransition(questId, callerId, { type: "submit", evidence: evidence.value }, () =>
				this.quests.submit(questId, callerId, evidence.value)
			)
		);
	}

	/**
	 * Records the caller's attestation. When it is the second one the quest
	 * turns COMPLETE in the same write and the performer's reward is applied.
	 * A reward that cannot be applied is queued and does not fail the call.
	 */
	async attestCompletion(
		questId: QuestId,
		callerId: PrincipalId,
		rating: number,
		comment: string | null
	): Promise<QuestResult<TransitionError | ValidationError>> {
		const validRating = validateRating(rating);
		if (!validRating.ok) {
			return validRating;
		}
		const validComment = validateComment(comment);
		if (!validComment.ok) {
			return validComment;
		}

		return this.guard<QuestRecord, TransitionError>("attestCompletion", async () => {
			const quest = await this.quests.get(questId);
			if (!quest) {
				return err(new NotFoundError("quest", questId));
			}

			// Non-parties have no role; the state machine rejects them before comparing roles.
			const role = this.ledger.roleOf(quest, callerId) ?? "requester";
			const decision = await this.quests.decide(
				quest,
				{ type: "attest", role, rating: validRating.value, comment: validComment.value },
				callerId
			);
			if (!decision.allowed) {
				return err(rejectionError(decision.kind, decision.message));
			}

			const recorded = await this.ledger.recordAttestation(quest, callerId, role, validRating.value, validComment.value);
			if (!recorded.ok) {
				return recorded;
			}

			const updated = recorded.value;
			console.info("[questService] attestation recorded", { questId, callerId, role, status: updated.status });
			if (updated.status === "COMPLETE" && this.ledger.isComplete(updated)) {
				await this.distributeReward(updated);
			}
			return ok(updated);
		});
	}

	async disputeQuest(
		questId: QuestId,
		callerId: PrincipalId,
		reason: string
	): Promise<QuestResult<TransitionError | ValidationError>> {
		const validReason = validateText("reason", reason, TEXT_BOUNDS.disputeReason);
		if (!validReason.ok) {
			return validReason;
		}
		return this.guard("disputeQuest", async () => {
			const result = await this.runTransition(questId, callerId, { type: "dispute", reason: validReason.value }, () =>
				this.quests.dispute(questId, callerId, validReason.value)
			);
			if (result.ok) {
				console.warn("[questService] dispute opened", { questId, callerId, reason: validReason.value });
			}
			return result;
		});
	}

	/** Moves OPEN and CLAIMED quests past the inactivity window to EXPIRED. */
	async expireStaleQuests(): Promise<ExpirySweepSummary> {
		const summary: ExpirySweepSummary = { examined: 0, expired: 0 };
		const candidates = await this.quests.listExpiryCandidates(this.options.sweepBatchSize);
		for (const quest of candidates) {
			summary.examined += 1;
			const decision = await this.quests.decide(quest, { type: "expire" }, SYSTEM_PRINCIPAL);
			if (!decision.allowed) {
				continue;
			}
			const write = await this.quests.expire(quest.id, SYSTEM_PRINCIPAL);
			if (write.status === "written") {
				summary.expired += 1;
				console.info("[questService] quest expired", { questId: quest.id, previousStatus: quest.status });
			}
		}
		return summary;
	}

	async reprocessFailedRewards(): Promise<ReprocessSummary> {
		return this.reprocessor.reprocessFailedRewards();
	}

	private async runTransition(
		questId: QuestId,
		callerId: PrincipalId,
		action: QuestAction,
		write: () => Promise<QuestWrite>
	): Promise<Result<QuestRecord, TransitionError>> {
		const quest = await this.quests.get(questId);
		if (!quest) {
			return err(new NotFoundError("quest", questId));
		}

		const decision = await this.quests.decide(quest, action, callerId);
		if (!decision.allowed) {
			return err(rejectionError(decision.kind, decision.message));
		}

		const written = await write();
		switch (written.status) {
			case "written":
				console.info(`[questService] ${action.type} applied`, { questId, callerId, status: written.quest.status });
				return ok(written.quest);
			case "missing":
				return err(new NotFoundError("quest", questId));
			case "rejected":
				// Valid on our read, rejected at write time: someone else changed the quest first.
				return err(new ConflictError(`Quest state has changed: ${written.message}`));
		}
	}

	private async distributeReward(quest: QuestRecord): Promise<RewardOutcome | null> {
		if (!quest.performerId) {
			return null;
		}
		if (!this.options.rewardsEnabled) {
			console.info("[questService] quest completed with rewards disabled", { questId: quest.id });
			return null;
		}
		const grant = buildQuestGrant(
			quest.id,
			quest.performerId,
			quest.rewardXp,
			quest.rewardReputation,
			this.options.performerCreationBonus
		);
		return this.distributor.apply(grant);
	}

	private async refundCreationCost(userId: PrincipalId, reason: string): Promise<void> {
		try {
			const refund = await this.users.refundCreationBalance(userId, this.options.questCreationCost);
			if (refund.status !== "written") {
				console.warn("[questService] creation cost refund skipped", { userId, reason, status: refund.status });
			}
		} catch (error) {
			if (!isTransientStoreError(error)) {
				throw error;
			}
			console.error("[questService] creation cost refund failed", { userId, reason, error: error.message });
		}
	}

	private async guard<T, E>(operation: string, task: () => Promise<Result<T, E>>): Promise<Result<T, E | TransientStoreError>> {
		try {
			return await task();
		} catch (error) {
			if (isTransientStoreError(error)) {
				console.warn("[questService] store unavailable", { operation, error: error.message });
				return err(error);
			}
			throw error;
		}
	}
}
