import { timestampScore, type AtomicStore, type RecordIndex, type WriteOutcome } from "../infra/atomicStore";
import { isRawRecord, readBoolean, readCount, readOneOf, readString, readStringSet, type RawRecord } from "../infra/decode";
import {
	QUEST_STATUSES,
	type AttestationEntry,
	type AttestationRole,
	type PrincipalId,
	type QuestAction,
	type QuestId,
	type QuestRecord,
} from "../types/quest";
import {
	applyTransition,
	canTransition,
	type TransitionContext,
	type TransitionDecision,
	type TransitionRejectionKind,
} from "./questStateMachine";

export interface LifecyclePolicy {
	disputeWindowMs: number;
	inactivityWindowMs: number;
}

export type QuestWrite =
	| { status: "written"; quest: QuestRecord }
	| { status: "rejected"; kind: TransitionRejectionKind; message: string; current: QuestRecord }
	| { status: "missing" };

/** OPEN and CLAIMED quests, scored by their last activity. */
export const ACTIVE_QUEST_INDEX: RecordIndex<QuestRecord> = {
	name: "active",
	score: (quest) =>
		quest.status === "OPEN" || quest.status === "CLAIMED" ? timestampScore(quest.claimedAt ?? quest.createdAt) : null,
};

const ATTESTATION_ROLES: readonly AttestationRole[] = ["requester", "performer"];

function decodeAttestation(raw: unknown): AttestationEntry | null {
	if (!isRawRecord(raw)) {
		return null;
	}
	const attesterId = readString(raw, "attesterId");
	const role = readOneOf(raw, "role", ATTESTATION_ROLES);
	const timestamp = readString(raw, "timestamp");
	if (!attesterId || !role || !timestamp) {
		return null;
	}
	return {
		attesterId,
		role,
		rating: readCount(raw, "rating"),
		comment: readString(raw, "comment"),
		timestamp,
	};
}

function decodeAttestations(raw: RawRecord): AttestationEntry[] {
	const value = raw.attestations;
	if (!Array.isArray(value)) {
		return [];
	}
	const entries: AttestationEntry[] = [];
	for (const item of value) {
		const entry = decodeAttestation(item);
		if (entry) {
			entries.push(entry);
		}
	}
	return entries;
}

export function decodeQuest(raw: unknown): QuestRecord | null {
	if (!isRawRecord(raw)) {
		return null;
	}
	const id = readString(raw, "id");
	const creatorId = readString(raw, "creatorId");
	const status = readOneOf(raw, "status", QUEST_STATUSES);
	const createdAt = readString(raw, "createdAt");
	if (!id || !creatorId || !status || !createdAt) {
		return null;
	}
	return {
		id,
		title: readString(raw, "title") ?? "",
		description: readString(raw, "description") ?? "",
		status,
		creatorId,
		performerId: readString(raw, "performerId"),
		rewardXp: readCount(raw, "rewardXp"),
		rewardReputation: readCount(raw, "rewardReputation"),
		hasRequesterAttestation: readBoolean(raw, "hasRequesterAttestation"),
		hasPerformerAttestation: readBoolean(raw, "hasPerformerAttestation"),
		attesterIds: readStringSet(raw, "attesterIds"),
		attestations: decodeAttestations(raw),
		submissionText: readString(raw, "submissionText"),
		disputeReason: readString(raw, "disputeReason"),
		disputedBy: readString(raw, "disputedBy"),
		createdAt,
		claimedAt: readString(raw, "claimedAt"),
		submittedAt: readString(raw, "submittedAt"),
		completedAt: readString(raw, "completedAt"),
		disputedAt: readString(raw, "disputedAt"),
		expiredAt: readString(raw, "expiredAt"),
		updatedAt: readString(raw, "updatedAt") ?? createdAt,
	};
}

/**
 * Quest records and their lifecycle writes. Every transition re-runs the state
 * machine against the record as stored at write time, so a decision made on a
 * stale read can never be applied.
 */
export class QuestRepository {
	constructor(private readonly store: AtomicStore<QuestRecord>, private readonly policy: LifecyclePolicy) {}

	async now(): Promise<Date> {
		return this.store.now();
	}

	async get(questId: QuestId): Promise<QuestRecord | null> {
		return this.store.get(questId);
	}

	/** Active quests whose last activity is at least the inactivity window ago, oldest first. */
	async listExpiryCandidates(limit: number): Promise<QuestRecord[]> {
		const cutoff = (await this.store.now()).getTime() - this.policy.inactivityWindowMs;
		return this.store.listIndexed(ACTIVE_QUEST_INDEX.name, { maxScore: cutoff, limit });
	}

	/** Evaluates `action` against a quest the caller has already read. */
	async decide(quest: QuestRecord, action: QuestAction, callerId: PrincipalId): Promise<TransitionDecision> {
		return canTransition(quest, action, callerId, await this.context());
	}

	async create(quest: QuestRecord): Promise<boolean> {
		return this.store.putIfAbsent(quest);
	}

	async claim(questId: QuestId, callerId: PrincipalId): Promise<QuestWrite> {
		return this.transition(questId, { type: "claim" }, callerId);
	}

	async submit(questId: QuestId, callerId: PrincipalId, evidence: string): Promise<QuestWrite> {
		return this.transition(questId, { type: "submit", evidence }, callerId);
	}

	async dispute(questId: QuestId, callerId: PrincipalId, reason: string): Promise<QuestWrite> {
		return this.transition(questId, { type: "dispute", reason }, callerId);
	}

	async expire(questId: QuestId, callerId: PrincipalId): Promise<QuestWrite> {
		return this.transition(questId, { type: "expire" }, callerId);
	}

	/**
	 * Adds the caller to `attesterIds`, raises their flag, appends the log
	 * entry and recomputes completion in a single write. A second attester
	 * racing the first is evaluated against the first one's flag.
	 */
	async addAttestation(
		questId: QuestId,
		callerId: PrincipalId,
		role: AttestationRole,
		rating: number,
		comment: string | null
	): Promise<QuestWrite> {
		const action: QuestAction = { type: "attest", role, rating, comment };
		const context = await this.context();
		const outcome = await this.store.addToSet(
			questId,
			"attesterIds",
			callerId,
			(current) => canTransition(current, action, callerId, context).allowed,
			(current) => this.mutate(current, action, callerId, context)
		);
		return this.toQuestWrite(outcome, action, callerId, context);
	}

	/** Removes an OPEN quest on behalf of its creator. */
	async deleteOpen(questId: QuestId, creatorId: PrincipalId): Promise<QuestWrite> {
		const outcome = await this.store.deleteIfCondition(
			questId,
			(current) => current.creatorId === creatorId && current.status === "OPEN"
		);
		switch (outcome.status) {
			case "written":
				return { status: "written", quest: outcome.record };
			case "missing":
				return { status: "missing" };
			case "conflict":
				return outcome.current.creatorId === creatorId
					? {
							status: "rejected",
							kind: "invalid_transition",
							message: `Only OPEN quests can be deleted. Status: ${outcome.current.status}`,
							current: outcome.current,
						}
					: {
							status: "rejected",
							kind: "forbidden",
							message: "Only the creator can delete a quest",
							current: outcome.current,
						};
		}
	}

	private async transition(questId: QuestId, action: QuestAction, callerId: PrincipalId): Promise<QuestWrite> {
		const context = await this.context();
		const outcome = await this.store.updateIfCondition(
			questId,
			(current) => this.mutate(current, action, callerId, context),
			(current) => canTransition(current, action, callerId, context).allowed
		);
		return this.toQuestWrite(outcome, action, callerId, context);
	}

	private mutate(current: QuestRecord, action: QuestAction, callerId: PrincipalId, context: TransitionContext): QuestRecord {
		const decision = canTransition(current, action, callerId, context);
		if (!decision.allowed) {
			return current;
		}
		return applyTransition(current, decision.nextStatusPartial, context.now);
	}

	private toQuestWrite(
		outcome: WriteOutcome<QuestRecord>,
		action: QuestAction,
		callerId: PrincipalId,
		context: TransitionContext
	): QuestWrite {
		switch (outcome.status) {
			case "written":
				return { status: "written", quest: outcome.record };
			case "missing":
				return { status: "missing" };
			case "conflict": {
				const decision = canTransition(outcome.current, action, callerId, context);
				return {
					status: "rejected",
					kind: decision.allowed ? "conflict" : decision.kind,
					message: decision.allowed ? "Quest changed during the update" : decision.message,
					current: outcome.current,
				};
			}
		}
	}

	private async context(): Promise<TransitionContext> {
		return {
			now: await this.store.now(),
			disputeWindowMs: this.policy.disputeWindowMs,
			inactivityWindowMs: this.policy.inactivityWindowMs,
		};
	}
}
