import {
	SYSTEM_PRINCIPAL,
	type AttestationRole,
	type PrincipalId,
	type QuestAction,
	type QuestRecord,
} from "../types/quest";

export interface TransitionContext {
	now: Date;
	disputeWindowMs: number;
	inactivityWindowMs: number;
}

export type QuestPatch = Partial<Omit<QuestRecord, "id" | "creatorId" | "rewardXp" | "rewardReputation" | "createdAt">>;

export type TransitionRejectionKind = "forbidden" | "invalid_transition" | "conflict";

export type TransitionDecision =
	| { allowed: true; nextStatusPartial: QuestPatch }
	| { allowed: false; kind: TransitionRejectionKind; message: string };

function reject(kind: TransitionRejectionKind, message: string): TransitionDecision {
	return { allowed: false, kind, message };
}

function assertNever(value: never): never {
	throw new Error(`Unhandled quest action: ${JSON.stringify(value)}`);
}

/** The role a principal attests in, or null when they are not a party to the quest. */
export function roleOf(quest: QuestRecord, callerId: PrincipalId): AttestationRole | null {
	if (callerId === quest.creatorId) {
		return "requester";
	}
	if (quest.performerId !== null && callerId === quest.performerId) {
		return "performer";
	}
	return null;
}

export function hasDualAttestation(quest: Pick<QuestRecord, "hasRequesterAttestation" | "hasPerformerAttestation">): boolean {
	return quest.hasRequesterAttestation && quest.hasPerformerAttestation;
}

function elapsedSince(timestamp: string | null, now: Date): number | null {
	if (!timestamp) {
		return null;
	}
	const at = Date.parse(timestamp);
	return Number.isNaN(at) ? null : now.getTime() - at;
}

function decideClaim(quest: QuestRecord, callerId: PrincipalId, context: TransitionContext): TransitionDecision {
	if (quest.status !== "OPEN" && quest.status !== "CLAIMED") {
		return reject("invalid_transition", `Quest is not available for claiming. Status: ${quest.status}`);
	}
	if (callerId === quest.creatorId) {
		return reject("forbidden", "Cannot claim your own quest");
	}
	if (quest.status === "CLAIMED" || quest.performerId !== null) {
		return reject("conflict", "Quest already claimed");
	}
	return {
		allowed: true,
		nextStatusPartial: {
			status: "CLAIMED",
			performerId: callerId,
			claimedAt: context.now.toISOString(),
		},
	};
}

function decideSubmit(
	quest: QuestRecord,
	callerId: PrincipalId,
	evidence: string,
	context: TransitionContext
): TransitionDecision {
	if (quest.status !== "CLAIMED") {
		return reject("invalid_transition", `Quest must be CLAIMED to submit work. Status: ${quest.status}`);
	}
	if (quest.performerId !== callerId) {
		return reject("forbidden", "Only the assigned performer can submit work");
	}
	return {
		allowed: true,
		nextStatusPartial: {
			status: "SUBMITTED",
			submissionText: evidence,
			submittedAt: context.now.toISOString(),
		},
	};
}

function decideAttest(
	quest: QuestRecord,
	callerId: PrincipalId,
	action: Extract<QuestAction, { type: "attest" }>,
	context: TransitionContext
): TransitionDecision {
	if (quest.status !== "SUBMITTED") {
		return reject("invalid_transition", `Quest must be SUBMITTED to attest. Status: ${quest.status}`);
	}
	const role = roleOf(quest, callerId);
	if (role === null) {
		return reject("forbidden", "Only the requester or the performer can attest this quest");
	}
	if (role !== action.role) {
		return reject("forbidden", `Caller attests as ${role}, not ${action.role}`);
	}
	if (quest.attesterIds.includes(callerId)) {
		return reject("conflict", "Already attested");
	}

	const timestamp = context.now.toISOString();
	const flags = {
		hasRequesterAttestation: quest.hasRequesterAttestation || role === "requester",
		hasPerformerAttestation: quest.hasPerformerAttestation || role === "performer",
	};
	const patch: QuestPatch = {
		...flags,
		attesterIds: [...quest.attesterIds, callerId],
		attestations: [
			...quest.attestations,
			{ attesterId: callerId, role, rating: action.rating, comment: action.comment, timestamp },
		],
	};
	if (hasDualAttestation(flags)) {
		patch.status = "COMPLETE";
		patch.completedAt = timestamp;
	}
	return { allowed: true, nextStatusPartial: patch };
}

function decideDispute(
	quest: QuestRecord,
	callerId: PrincipalId,
	reason: string,
	context: TransitionContext
): TransitionDecision {
	let windowStart: string | null;
	switch (quest.status) {
		case "SUBMITTED":
			windowStart = quest.submittedAt;
			break;
		case "COMPLETE":
			windowStart = quest.completedAt;
			break;
		default:
			return reject("invalid_transition", `Quest cannot be disputed. Status: ${quest.status}`);
	}
	if (roleOf(quest, callerId) === null) {
		return reject("forbidden", "Only involved parties can dispute");
	}
	const elapsed = elapsedSince(windowStart, context.now);
	if (elapsed !== null && elapsed > context.disputeWindowMs) {
		return reject("forbidden", "The dispute window for this quest has closed");
	}
	return {
		allowed: true,
		nextStatusPartial: {
			status: "DISPUTED",
			disputeReason: reason,
			disputedBy: callerId,
			disputedAt: context.now.toISOString(),
		},
	};
}

function decideExpire(quest: QuestRecord, callerId: PrincipalId, context: TransitionContext): TransitionDecision {
	if (callerId !== SYSTEM_PRINCIPAL) {
		return reject("forbidden", "Only the system can expire quests");
	}
	if (quest.status !== "OPEN" && quest.status !== "CLAIMED") {
		return reject("invalid_transition", `Quest cannot expire. Status: ${quest.status}`);
	}
	const idle = elapsedSince(quest.claimedAt ?? quest.createdAt, context.now);
	if (idle === null || idle < context.inactivityWindowMs) {
		return reject("invalid_transition", "Quest has not been inactive long enough to expire");
	}
	return {
		allowed: true,
		nextStatusPartial: {
			status: "EXPIRED",
			expiredAt: context.now.toISOString(),
		},
	};
}

/**
 * Decides whether `callerId` may perform `action` on `quest` as it currently
 * stands, and if so which fields change. Pure: the same inputs always give the
 * same decision.
 */
export function canTransition(
	quest: QuestRecord,
	action: QuestAction,
	callerId: PrincipalId,
	context: TransitionContext
): TransitionDecision {
	switch (action.type) {
		case "claim":
			return decideClaim(quest, callerId, context);
		case "submit":
			return decideSubmit(quest, callerId, action.evidence, context);
		case "attest":
			return decideAttest(quest, callerId, action, context);
		case "dispute":
			return decideDispute(quest, callerId, action.reason, context);
		case "expire":
			return decideExpire(quest, callerId, context);
		default:
			return assertNever(action);
	}
}

export function applyTransition(quest: QuestRecord, patch: QuestPatch, now: Date): QuestRecord {
	return { ...quest, ...patch, updatedAt: now.toISOString() };
}
