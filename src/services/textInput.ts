import type { QuestDraft } from "../types/quest";
import { ValidationError } from "./errors";
import { err, ok, type Result } from "./result";

export interface TextBounds {
	min: number;
	max: number;
}

export const TEXT_BOUNDS = {
	title: { min: 3, max: 200 },
	description: { min: 10, max: 5000 },
	evidence: { min: 1, max: 2000 },
	comment: { min: 0, max: 500 },
	disputeReason: { min: 10, max: 1000 },
} satisfies Record<string, TextBounds>;

export const RATING_RANGE = { min: 1, max: 5 };

export const REWARD_LIMITS = { xp: 1000, reputation: 100 };

const TAG_PATTERN = /<[^>]*>/g;
const CONTROL_PATTERN = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

/** Strips markup and control characters and trims surrounding whitespace. */
export function cleanText(value: string): string {
	return value.replace(TAG_PATTERN, "").replace(CONTROL_PATTERN, "").trim();
}

export function validateText(field: string, value: string, bounds: TextBounds): Result<string, ValidationError> {
	const cleaned = cleanText(value);
	if (cleaned.length === 0 && bounds.min > 0) {
		return err(new ValidationError(field, `${field} must not be empty`));
	}
	if (cleaned.length < bounds.min) {
		return err(new ValidationError(field, `${field} must be at least ${bounds.min} characters`));
	}
	if (cleaned.length > bounds.max) {
		return err(new ValidationError(field, `${field} must be at most ${bounds.max} characters`));
	}
	return ok(cleaned);
}

export function validateComment(comment: string | null | undefined): Result<string | null, ValidationError> {
	if (comment === null || comment === undefined) {
		return ok(null);
	}
	const result = validateText("comment", comment, TEXT_BOUNDS.comment);
	if (!result.ok) {
		return result;
	}
	return ok(result.value.length > 0 ? result.value : null);
}

export function validateRating(rating: number): Result<number, ValidationError> {
	if (!Number.isInteger(rating) || rating < RATING_RANGE.min || rating > RATING_RANGE.max) {
		return err(new ValidationError("rating", `rating must be an integer between ${RATING_RANGE.min} and ${RATING_RANGE.max}`));
	}
	return ok(rating);
}

function validateReward(field: string, amount: number, max: number): Result<number, ValidationError> {
	if (!Number.isSafeInteger(amount) || amount < 0 || amount > max) {
		return err(new ValidationError(field, `${field} must be an integer between 0 and ${max}`));
	}
	return ok(amount);
}

export function validateDraft(draft: QuestDraft): Result<QuestDraft, ValidationError> {
	const title = validateText("title", draft.title, TEXT_BOUNDS.title);
	if (!title.ok) {
		return title;
	}
	const description = validateText("description", draft.description, TEXT_BOUNDS.description);
	if (!description.ok) {
		return description;
	}
	const rewardXp = validateReward("rewardXp", draft.rewardXp, REWARD_LIMITS.xp);
	if (!rewardXp.ok) {
		return rewardXp;
	}
	const rewardReputation = validateReward("rewardReputation", draft.rewardReputation, REWARD_LIMITS.reputation);
	if (!rewardReputation.ok) {
		return rewardReputation;
	}
	return ok({
		title: title.value,
		description: description.value,
		rewardXp: rewardXp.value,
		rewardReputation: rewardReputation.value,
	});
}
