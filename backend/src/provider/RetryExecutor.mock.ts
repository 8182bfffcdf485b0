import { createRetryExecutor, type RetryExecutor, type RetryExecutorOptions } from "./RetryExecutor";
import { vi } from "vitest";

/**
 * A real executor with the default error classification that never waits between attempts.
 */
export function mockRetryExecutor(partial?: Partial<RetryExecutorOptions>): RetryExecutor {
	return createRetryExecutor({
		maxAttempts: 4,
		baseDelayMs: 1000,
		rateLimitBaseDelayMs: 5000,
		maxDelayMs: 30000,
		permanentErrorCodes: [190, 200, 10, 100, 102],
		permanentErrorTypes: ["OAuthException"],
		rateLimitErrorCodes: [4, 429],
		sleep: vi.fn().mockResolvedValue(undefined),
		...partial,
	});
}
