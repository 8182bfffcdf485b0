import type { Config } from "../config/Config";
import { getLog } from "../util/Logger";
import { calculateBackoffDelay, sleep } from "../util/Retry";
import { type CircuitBreaker, createCircuitBreaker } from "./CircuitBreaker";
import type { ProviderResponse } from "./ProviderClient";
import {
	type ProviderError,
	ProviderCallFailedError,
	ProviderCircuitOpenError,
	ProviderPermanentError,
} from "./ProviderErrors";

const log = getLog(import.meta);

export interface RetryExecutorOptions {
	maxAttempts: number;
	baseDelayMs: number;
	/** Base delay when the provider reports a rate limit. */
	rateLimitBaseDelayMs: number;
	maxDelayMs: number;
	permanentErrorCodes: ReadonlyArray<number>;
	permanentErrorTypes: ReadonlyArray<string>;
	/** Matched against the error code and the HTTP status. */
	rateLimitErrorCodes: ReadonlyArray<number>;
	/** Consecutive exhausted calls that open the provider circuit. Unset or 0 leaves it out. */
	circuitFailureThreshold?: number;
	circuitResetTimeoutMs?: number;
	sleep?: (ms: number) => Promise<void>;
	now?: () => number;
}

export interface ExecuteOptions {
	/** Appended to the operation name in errors and logs, e.g. `registerPhone[12345]`. */
	resourceId?: string | number;
	/** Extra permanent classification for this call only. */
	isPermanent?: (error: ProviderError) => boolean;
}

export interface RetryExecutor {
	/**
	 * Runs a provider call with bounded retries and returns its data.
	 *
	 * @throws ProviderPermanentError on the first permanent error
	 * @throws ProviderCallFailedError when every attempt failed transiently
	 * @throws ProviderCircuitOpenError without calling when the provider circuit is open
	 */
	execute<T>(operation: string, call: () => Promise<ProviderResponse<T>>, options?: ExecuteOptions): Promise<T>;
}

export type RetryExecutorConfig = Pick<
	Config,
	| "PROVIDER_RETRY_MAX_ATTEMPTS"
	| "PROVIDER_RETRY_BASE_DELAY_MS"
	| "PROVIDER_RATE_LIMIT_BASE_DELAY_MS"
	| "PROVIDER_RETRY_MAX_DELAY_MS"
	| "PROVIDER_PERMANENT_ERROR_CODES"
	| "PROVIDER_PERMANENT_ERROR_TYPES"
	| "PROVIDER_RATE_LIMIT_ERROR_CODES"
	| "PROVIDER_CIRCUIT_FAILURE_THRESHOLD"
	| "PROVIDER_CIRCUIT_RESET_MS"
>;

export function getRetryExecutorOptions(config: RetryExecutorConfig): RetryExecutorOptions {
	return {
		maxAttempts: config.PROVIDER_RETRY_MAX_ATTEMPTS,
		baseDelayMs: config.PROVIDER_RETRY_BASE_DELAY_MS,
		rateLimitBaseDelayMs: config.PROVIDER_RATE_LIMIT_BASE_DELAY_MS,
		maxDelayMs: config.PROVIDER_RETRY_MAX_DELAY_MS,
		permanentErrorCodes: config.PROVIDER_PERMANENT_ERROR_CODES,
		permanentErrorTypes: config.PROVIDER_PERMANENT_ERROR_TYPES,
		rateLimitErrorCodes: config.PROVIDER_RATE_LIMIT_ERROR_CODES,
		circuitFailureThreshold: config.PROVIDER_CIRCUIT_FAILURE_THRESHOLD,
		circuitResetTimeoutMs: config.PROVIDER_CIRCUIT_RESET_MS,
	};
}

export function createRetryExecutor(options: RetryExecutorOptions): RetryExecutor {
	const wait = options.sleep ?? sleep;
	const circuit: CircuitBreaker | undefined = options.circuitFailureThreshold
		? createCircuitBreaker("provider", {
				failureThreshold: options.circuitFailureThreshold,
				resetTimeout: options.circuitResetTimeoutMs ?? 30000,
				now: options.now,
			})
		: undefined;

	return { execute };

	function isPermanent(error: ProviderError, callPredicate: ExecuteOptions["isPermanent"]): boolean {
		return (
			options.permanentErrorCodes.includes(error.code) ||
			(error.type !== undefined && options.permanentErrorTypes.includes(error.type)) ||
			(callPredicate?.(error) ?? false)
		);
	}

	function isRateLimited(error: ProviderError, httpStatus: number): boolean {
		return options.rateLimitErrorCodes.includes(error.code) || options.rateLimitErrorCodes.includes(httpStatus);
	}

	async function execute<T>(
		operation: string,
		call: () => Promise<ProviderResponse<T>>,
		executeOptions: ExecuteOptions = {},
	): Promise<T> {
		const context =
			executeOptions.resourceId === undefined ? operation : `${operation}[${executeOptions.resourceId}]`;
		if (!circuit) {
			return executeWithRetries(context, call, executeOptions);
		}
		if (!circuit.tryAcquire()) {
			log.error("%s rejected: provider circuit is open", context);
			throw new ProviderCircuitOpenError(context);
		}
		try {
			const data = await executeWithRetries(context, call, executeOptions);
			circuit.recordSuccess();
			return data;
		} catch (error) {
			if (error instanceof ProviderPermanentError) {
				circuit.recordSuccess();
			} else {
				circuit.recordFailure();
			}
			throw error;
		}
	}

	async function executeWithRetries<T>(
		context: string,
		call: () => Promise<ProviderResponse<T>>,
		executeOptions: ExecuteOptions,
	): Promise<T> {
		let lastError = "unknown error";
		let lastProviderError: ProviderError | undefined;

		for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
			let rateLimited = false;
			try {
				const response = await call();
				if (response.ok) {
					if (attempt > 1) {
						log.info("%s succeeded on attempt %d", context, attempt);
					}
					return response.data;
				}
				if (isPermanent(response.error, executeOptions.isPermanent)) {
					log.error(
						{ code: response.error.code, type: response.error.type, httpStatus: response.httpStatus },
						"%s failed permanently: %s",
						context,
						response.error.message,
					);
					throw new ProviderPermanentError(context, response.error.message, response.error);
				}
				lastError = response.error.message;
				lastProviderError = response.error;
				rateLimited = isRateLimited(response.error, response.httpStatus);
			} catch (error) {
				if (error instanceof ProviderPermanentError) {
					throw error;
				}
				lastError = error instanceof Error ? error.message : String(error);
				lastProviderError = undefined;
			}

			if (attempt < options.maxAttempts) {
				const delay = calculateBackoffDelay(
					attempt,
					rateLimited ? options.rateLimitBaseDelayMs : options.baseDelayMs,
					options.maxDelayMs,
				);
				log.warn(
					"%s attempt %d/%d failed: %s. Retrying in %dms",
					context,
					attempt,
					options.maxAttempts,
					lastError,
					delay,
				);
				await wait(delay);
			}
		}

		log.error("%s failed after %d attempts: %s", context, options.maxAttempts, lastError);
		throw new ProviderCallFailedError(context, options.maxAttempts, lastError, lastProviderError);
	}
}
