import type { Config } from "../config/Config";
import { addJitter, calculateBackoffDelay } from "../util/Retry";
import { SetupCancelledError, StepTimeoutError } from "./SetupErrors";
import { ApiError, ConflictError, NetworkError } from "checkout-common";

export type ErrorClass = "retryable" | "conflict" | "non_retryable";

export interface RetryPolicyOptions {
	/** Attempts per step, including the first */
	maxAttempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
	multiplier: number;
	/** Jitter as a fraction of the delay */
	jitterFactor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicyOptions = {
	maxAttempts: 3,
	baseDelayMs: 1000,
	maxDelayMs: 60000,
	multiplier: 2,
	jitterFactor: 0.1,
};

/** Statuses below 500 that are worth another attempt */
const RETRYABLE_STATUSES = new Set([408, 429]);

/**
 * Decides which step failures are retried and how long to wait before the next attempt.
 */
export class RetryPolicy {
	readonly options: RetryPolicyOptions;
	private readonly random: () => number;

	constructor(options: Partial<RetryPolicyOptions> = {}, random: () => number = Math.random) {
		this.options = { ...DEFAULT_RETRY_POLICY, ...options };
		this.random = random;
	}

	static fromConfig(config: Config, random?: () => number): RetryPolicy {
		return new RetryPolicy(
			{
				maxAttempts: config.SETUP_MAX_ATTEMPTS,
				baseDelayMs: config.SETUP_RETRY_BASE_DELAY_MS,
				maxDelayMs: config.SETUP_RETRY_MAX_DELAY_MS,
				multiplier: config.SETUP_RETRY_MULTIPLIER,
				jitterFactor: config.SETUP_RETRY_JITTER_FACTOR,
			},
			random,
		);
	}

	get maxAttempts(): number {
		return this.options.maxAttempts;
	}

	classify(error: unknown): ErrorClass {
		if (error instanceof SetupCancelledError) {
			return "non_retryable";
		}
		if (error instanceof ConflictError) {
			return "conflict";
		}
		if (error instanceof NetworkError || error instanceof StepTimeoutError) {
			return "retryable";
		}
		if (error instanceof ApiError && (RETRYABLE_STATUSES.has(error.status) || error.status >= 500)) {
			return "retryable";
		}
		return "non_retryable";
	}

	/**
	 * @param attempt the attempt that just failed (1-based)
	 */
	shouldRetry(error: unknown, attempt: number): boolean {
		return attempt < this.options.maxAttempts && this.classify(error) === "retryable";
	}

	/**
	 * Delay before the attempt after `attempt`, jitter included.
	 */
	nextDelay(attempt: number): number {
		const { baseDelayMs, maxDelayMs, multiplier, jitterFactor } = this.options;
		const delay = calculateBackoffDelay(attempt, baseDelayMs, maxDelayMs, multiplier);
		return delay + addJitter(delay, jitterFactor, this.random);
	}
}
