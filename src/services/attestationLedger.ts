import type { AttestationRole, PrincipalId, QuestRecord } from "../types/quest";
import { ConflictError, ForbiddenError, InvalidTransitionError, NotFoundError, type TransitionError } from "./errors";
import type { QuestRepository } from "./questRepository";
import { hasDualAttestation, roleOf } from "./questStateMachine";
import { err, ok, type Result } from "./result";

export class AttestationLedger {
	constructor(private readonly quests: QuestRepository) {}

	roleOf(quest: QuestRecord, callerId: PrincipalId): AttestationRole | null {
		return roleOf(quest, callerId);
	}

	isComplete(quest: QuestRecord): boolean {
		return hasDualAttestation(quest);
	}

	/**
	 * Records `callerId`'s attestation in `role`. The role has to be the one
	 * the caller holds on the quest: a creator cannot attest as performer.
	 * `quest` is the caller's read; the write itself is evaluated against the
	 * stored record, and a divergence is reported as a conflict.
	 */
	async recordAttestation(
		quest: QuestRecord,
		callerId: PrincipalId,
		role: AttestationRole,
		rating: number,
		comment: string | null
	): Promise<Result<QuestRecord, TransitionError>> {
		const actualRole = this.roleOf(quest, callerId);
		if (actualRole === null) {
			return err(new ForbiddenError("Only the requester or the performer can attest this quest"));
		}
		if (actualRole !== role) {
			return err(new ForbiddenError(`Caller attests as ${actualRole}, not ${role}`));
		}

		const write = await this.quests.addAttestation(quest.id, callerId, role, rating, comment);
		switch (write.status) {
			case "written":
				return ok(write.quest);
			case "missing":
				return err(new NotFoundError("quest", quest.id));
			case "rejected":
				if (write.current.attesterIds.includes(callerId)) {
					return err(new ConflictError("Already attested"));
				}
				if (write.kind === "invalid_transition" && write.current.status === quest.status) {
					return err(new InvalidTransitionError(write.message));
				}
				return err(new ConflictError(`Quest state has changed: ${write.message}`));
		}
	}
}
