export type QuestErrorKind =
	| "not_found"
	| "forbidden"
	| "invalid_transition"
	| "conflict"
	| "validation"
	| "insufficient_balance"
	| "transient_store";

export abstract class QuestEngineError extends Error {
	abstract readonly kind: QuestErrorKind;
}

export class NotFoundError extends QuestEngineError {
	readonly kind = "not_found";

	constructor(public readonly entity: "quest" | "user", public readonly id: string) {
		super(`${entity} ${id} was not found.`);
		this.name = "NotFoundError";
	}
}

export class ForbiddenError extends QuestEngineError {
	readonly kind = "forbidden";

	constructor(message: string) {
		super(message);
		this.name = "ForbiddenError";
	}
}

export class InvalidTransitionError extends QuestEngineError {
	readonly kind = "invalid_transition";

	constructor(message: string) {
		super(message);
		this.name = "InvalidTransitionError";
	}
}

export class ConflictError extends QuestEngineError {
	readonly kind = "conflict";

	constructor(message: string) {
		super(message);
		this.name = "ConflictError";
	}
}

export class ValidationError extends QuestEngineError {
	readonly kind = "validation";

	constructor(public readonly field: string, message: string) {
		super(message);
		this.name = "ValidationError";
	}
}

export class InsufficientBalanceError extends QuestEngineError {
	readonly kind = "insufficient_balance";

	constructor(public readonly userId: string, public readonly balance: number, public readonly required: number) {
		super(`User ${userId} has ${balance} quest creation points but needs ${required}.`);
		this.name = "InsufficientBalanceError";
	}
}

/** Timeouts, throttling and connection failures at the store boundary. */
export class TransientStoreError extends QuestEngineError {
	readonly kind = "transient_store";

	constructor(public readonly operation: string, message: string, cause?: unknown) {
		super(`${operation}: ${message}`, { cause });
		this.name = "TransientStoreError";
	}
}

export type TransitionError = NotFoundError | ForbiddenError | InvalidTransitionError | ConflictError;

export type QuestOperationError = TransitionError | ValidationError | InsufficientBalanceError | TransientStoreError;

export function isTransientStoreError(error: unknown): error is TransientStoreError {
	return error instanceof TransientStoreError;
}
