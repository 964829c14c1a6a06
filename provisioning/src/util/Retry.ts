/**
 * Shared retry utility with exponential backoff and jitter.
 *
 * Provides a generic `withRetry()` loop and the `calculateBackoffDelay()` / `addJitter()` helpers
 * used by the setup steps and the rollback compensations.
 */

import { getLog } from "./Logger";
import { sleep as defaultSleep } from "./Timeout";

const log = getLog(import.meta);

/**
 * Progress of one retried operation. Created when the operation starts and dropped when it
 * succeeds or gives up.
 */
export interface RetryState {
	/** Attempt that just ran (1-based) */
	attempt: number;
	/** Total time slept between attempts so far */
	elapsedDelayMs: number;
	lastError?: unknown;
	/** Delay before the next attempt, when one is scheduled */
	nextDelayMs?: number;
}

/**
 * Options for configuring retry behavior.
 */
export interface RetryOptions {
	/** Maximum number of attempts, including the first (default: 3) */
	maxAttempts?: number;
	/** Base delay in milliseconds for exponential backoff (default: 1000) */
	baseDelayMs?: number;
	/** Maximum delay in milliseconds (default: 30000) */
	maxDelayMs?: number;
	/** Growth factor between consecutive delays (default: 2) */
	multiplier?: number;
	/** Jitter as a fraction of the delay, 0 to disable (default: 1, i.e. up to 100%) */
	jitterFactor?: number;
	/**
	 * Predicate to determine if an error is retryable.
	 * If not provided, all errors are considered retryable.
	 */
	isRetryable?: (error: unknown, attempt: number) => boolean;
	/** Replaces the backoff calculation, e.g. with a RetryPolicy's `nextDelay` */
	delayFor?: (attempt: number) => number;
	/** Aborts the backoff sleep and stops further attempts */
	signal?: AbortSignal | undefined;
	/** Called after a failed attempt, before sleeping */
	onRetry?: (state: Readonly<RetryState>) => void;
	/** Label for log messages (e.g., "TenantCreation", "revoke ApiKey") */
	label?: string;
	sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Calculates the backoff delay for a given attempt number using exponential backoff.
 *
 * @param attemptNumber - The attempt number (1-based)
 * @param baseDelayMs - Base delay in milliseconds
 * @param maxDelayMs - Maximum delay cap in milliseconds
 * @param multiplier - Growth factor per attempt
 * @returns The delay in milliseconds (without jitter)
 */
export function calculateBackoffDelay(
	attemptNumber: number,
	baseDelayMs: number,
	maxDelayMs: number,
	multiplier = 2,
): number {
	return Math.min(baseDelayMs * multiplier ** (attemptNumber - 1), maxDelayMs);
}

/**
 * Random jitter for a delay, uniform in `[0, jitterFactor * delayMs]`.
 *
 * @returns The jitter only; add it to the delay
 */
export function addJitter(delayMs: number, jitterFactor = 1, random: () => number = Math.random): number {
	return Math.floor(delayMs * jitterFactor * random());
}

/**
 * Retries an async operation with exponential backoff.
 *
 * @param operation - The async operation to retry; receives the attempt number
 * @param options - Retry configuration options
 * @returns The result of the operation
 * @throws The last error if all attempts are exhausted, the error is not retryable, or the signal aborted
 *
 * @example
 * ```typescript
 * await withRetry(() => client.tenants().delete(id, context), {
 *   label: "delete Tenant",
 *   maxAttempts: 3,
 *   baseDelayMs: 5000,
 * });
 * ```
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
	const {
		maxAttempts = 3,
		baseDelayMs = 1000,
		maxDelayMs = 30000,
		multiplier = 2,
		jitterFactor = 1,
		isRetryable,
		signal,
		onRetry,
		label = "operation",
		sleep = defaultSleep,
	} = options;
	const delayFor =
		options.delayFor ??
		((attempt: number) => {
			const delay = calculateBackoffDelay(attempt, baseDelayMs, maxDelayMs, multiplier);
			return delay + addJitter(delay, jitterFactor);
		});
	const state: RetryState = { attempt: 0, elapsedDelayMs: 0 };

	for (let attempt = 1; attempt <= maxAttempts; attempt++) {
		state.attempt = attempt;
		try {
			return await operation(attempt);
		} catch (error) {
			state.lastError = error;
			state.nextDelayMs = undefined;

			if (isRetryable && !isRetryable(error, attempt)) {
				throw error;
			}
			if (attempt === maxAttempts || signal?.aborted) {
				throw error;
			}

			const delayMs = delayFor(attempt);
			state.nextDelayMs = delayMs;
			const errorMessage = error instanceof Error ? error.message : String(error);

			log.warn(
				{ attempt, maxAttempts, delayMs, error: errorMessage },
				"Retrying %s after error (attempt %d/%d, retry in %dms): %s",
				label,
				attempt,
				maxAttempts,
				delayMs,
				errorMessage,
			);
			onRetry?.({ ...state });

			await sleep(delayMs, signal);
			state.elapsedDelayMs += delayMs;
		}
	}

	// TypeScript needs this even though it's unreachable
	throw new Error("Retry loop exited unexpectedly");
}
