/**
 * Structured error returned by the provider API.
 */
export interface ProviderError {
	code: number;
	type?: string;
	subcode?: number;
	message: string;
}

/**
 * The provider rejected the call, or returned something, that retrying cannot fix
 * (invalid credential, missing permission, invalid parameter).
 */
export class ProviderPermanentError extends Error {
	constructor(
		readonly context: string,
		readonly reason: string,
		readonly providerError?: ProviderError,
	) {
		super(`${context} failed permanently: ${reason}`);
		this.name = "ProviderPermanentError";
	}
}

/**
 * Every attempt of a provider call failed with a transient error.
 */
export class ProviderCallFailedError extends Error {
	constructor(
		readonly context: string,
		readonly attempts: number,
		readonly lastError: string,
		readonly providerError?: ProviderError,
	) {
		super(`${context} failed after ${attempts} attempts: ${lastError}`);
		this.name = "ProviderCallFailedError";
	}
}

/**
 * The provider failed consistently and calls are rejected without reaching it. Retry later.
 */
export class ProviderCircuitOpenError extends ProviderCallFailedError {
	constructor(context: string) {
		super(context, 0, "provider circuit breaker is open");
		this.message = `${context} rejected: provider circuit breaker is open. Retry later.`;
		this.name = "ProviderCircuitOpenError";
	}
}
