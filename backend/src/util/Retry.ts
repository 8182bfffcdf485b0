/**
 * Exponential backoff helpers and a generic `withRetry()` for local infrastructure
 * calls such as the initial database connection. Provider calls go through
 * the RetryExecutor, which adds error classification on top of the same backoff.
 */

import { getLog } from "./Logger";

const log = getLog(import.meta);

export interface RetryOptions {
	/** Maximum number of attempts, including the first one (default: 3) */
	maxRetries?: number;
	/** Base delay in milliseconds for exponential backoff (default: 1000) */
	baseDelayMs?: number;
	/** Maximum delay in milliseconds (default: 30000) */
	maxDelayMs?: number;
	/** Whether to add jitter to the delay (default: true) */
	jitter?: boolean;
	/**
	 * Returns true if the operation should be retried for this error.
	 * If not provided, all errors are considered retryable.
	 */
	isRetryable?: (error: unknown) => boolean;
	/** Label for log messages, e.g. "DB connect" */
	label?: string;
	sleep?: (ms: number) => Promise<void>;
}

/**
 * `baseDelayMs * 2^(attemptNumber - 1)`, capped at `maxDelayMs`.
 *
 * @param attemptNumber 1-based number of the attempt that just failed
 */
export function calculateBackoffDelay(attemptNumber: number, baseDelayMs: number, maxDelayMs: number): number {
	return Math.min(baseDelayMs * 2 ** (attemptNumber - 1), maxDelayMs);
}

/**
 * Random jitter between 0 and 100% of the delay.
 */
export function addJitter(delayMs: number): number {
	return Math.floor(delayMs * Math.random());
}

export function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Retries an async operation with exponential backoff.
 *
 * @throws the last error if all attempts are exhausted or the error is not retryable
 *
 * @example
 * ```typescript
 * await withRetry(() => sequelize.authenticate(), {
 *   label: "DB connect",
 *   maxRetries: 5,
 *   baseDelayMs: 2000,
 *   isRetryable: isRetryableConnectionError,
 * });
 * ```
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
	const {
		maxRetries = 3,
		baseDelayMs = 1000,
		maxDelayMs = 30000,
		jitter = true,
		isRetryable,
		label = "operation",
		sleep: wait = sleep,
	} = options;

	for (let attempt = 1; ; attempt++) {
		try {
			return await operation();
		} catch (error) {
			if ((isRetryable && !isRetryable(error)) || attempt >= maxRetries) {
				throw error;
			}

			const baseDelay = calculateBackoffDelay(attempt, baseDelayMs, maxDelayMs);
			const delayMs = jitter ? baseDelay + addJitter(baseDelay) : baseDelay;
			const errorMessage = error instanceof Error ? error.message : String(error);

			log.warn(
				{ attempt, maxRetries, delayMs, error: errorMessage },
				"Retrying %s after error (attempt %d/%d, retry in %dms): %s",
				label,
				attempt,
				maxRetries,
				delayMs,
				errorMessage,
			);

			await wait(delayMs);
		}
	}
}
