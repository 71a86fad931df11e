import { isTransientStoreError, type TransientStoreError } from "./errors";

export interface RetryPolicy {
	maxAttempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
	new Promise((resolve) => {
		setTimeout(resolve, ms);
	});

export type RetryResult<R> = { ok: true; value: R; attempts: number } | { ok: false; error: TransientStoreError; attempts: number };

/** Exponential backoff: base, 2×base, 4×base … capped at `maxDelayMs`. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
	const exponent = Math.max(attempt - 1, 0);
	return Math.min(policy.baseDelayMs * 2 ** exponent, policy.maxDelayMs);
}

/**
 * Runs `task` until it succeeds or the attempt budget is spent. Only
 * `TransientStoreError` is retried; anything else propagates immediately.
 */
export async function retryTransient<R>(
	policy: RetryPolicy,
	task: (attempt: number) => Promise<R>,
	wait: Sleep = sleep
): Promise<RetryResult<R>> {
	const maxAttempts = Math.max(policy.maxAttempts, 1);
	let lastError: TransientStoreError | null = null;
	for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
		try {
			return { ok: true, value: await task(attempt), attempts: attempt };
		} catch (error) {
			if (!isTransientStoreError(error)) {
				throw error;
			}
			lastError = error;
			if (attempt < maxAttempts) {
				await wait(backoffDelay(policy, attempt));
			}
		}
	}
	if (!lastError) {
		throw new Error("retryTransient finished without an attempt");
	}
	return { ok: false, error: lastError, attempts: maxAttempts };
}
