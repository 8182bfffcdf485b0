import type { ProviderResponse } from "./ProviderClient";
import { ProviderCallFailedError, ProviderCircuitOpenError, ProviderPermanentError } from "./ProviderErrors";
import { createRetryExecutor, getRetryExecutorOptions, type RetryExecutor } from "./RetryExecutor";
import { beforeEach, describe, expect, it, type Mock, vi } from "vitest";

function failure(code: number, message: string, httpStatus = 400, type?: string): ProviderResponse<string> {
	return { ok: false, httpStatus, error: { code, type, message } };
}

describe("RetryExecutor", () => {
	let sleep: Mock<(ms: number) => Promise<void>>;
	let executor: RetryExecutor;

	beforeEach(() => {
		sleep = vi.fn().mockResolvedValue(undefined);
		executor = createRetryExecutor({
			maxAttempts: 4,
			baseDelayMs: 1000,
			rateLimitBaseDelayMs: 5000,
			maxDelayMs: 30000,
			permanentErrorCodes: [190, 200, 10, 100, 102],
			permanentErrorTypes: ["OAuthException"],
			rateLimitErrorCodes: [4, 429],
			sleep,
		});
	});

	it("should return the data of a successful first call", async () => {
		const call = vi.fn().mockResolvedValue({ ok: true, data: "token" });

		expect(await executor.execute("exchangeCode", call)).toBe("token");
		expect(call).toHaveBeenCalledTimes(1);
		expect(sleep).not.toHaveBeenCalled();
	});

	it("should retry transient failures with exponential backoff", async () => {
		const call = vi
			.fn()
			.mockResolvedValueOnce(failure(2, "Service temporarily unavailable", 500))
			.mockRejectedValueOnce(new Error("socket hang up"))
			.mockResolvedValueOnce({ ok: true, data: "token" });

		expect(await executor.execute("extendToken", call)).toBe("token");
		expect(call).toHaveBeenCalledTimes(3);
		expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
	});

	it("should back off longer on a rate limit code or status", async () => {
		const call = vi
			.fn()
			.mockResolvedValueOnce(failure(4, "Application request limit reached", 400))
			.mockResolvedValueOnce(failure(0, "HTTP 429", 429))
			.mockResolvedValueOnce({ ok: true, data: "ok" });

		await executor.execute("listPhoneNumbers", call);

		expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5000, 10000]);
	});

	it("should cap the delay", async () => {
		const call = vi.fn().mockResolvedValue(failure(4, "limit", 400));
		const capped = createRetryExecutor({
			maxAttempts: 4,
			baseDelayMs: 1000,
			rateLimitBaseDelayMs: 20000,
			maxDelayMs: 30000,
			permanentErrorCodes: [],
			permanentErrorTypes: [],
			rateLimitErrorCodes: [4],
			sleep,
		});

		await expect(capped.execute("listPhoneNumbers", call)).rejects.toBeInstanceOf(ProviderCallFailedError);
		expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([20000, 30000, 30000]);
	});

	it.each([
		["a permanent code", failure(100, "Invalid parameter")],
		["a permanent type", failure(999, "Session expired", 400, "OAuthException")],
		["a permanent code in a 200 body", failure(190, "Invalid OAuth access token", 200)],
	])("should not retry %s", async (_label, response) => {
		const call = vi.fn().mockResolvedValue(response);

		await expect(executor.execute("exchangeCode", call)).rejects.toBeInstanceOf(ProviderPermanentError);
		expect(call).toHaveBeenCalledTimes(1);
	});

	it("should honour a per-call permanent predicate", async () => {
		const call = vi.fn().mockResolvedValue(failure(131000, "Phone is blocked"));

		await expect(
			executor.execute("registerPhone", call, {
				resourceId: "phone-1",
				isPermanent: error => error.code === 131000,
			}),
		).rejects.toThrow("registerPhone[phone-1] failed permanently: Phone is blocked");
		expect(call).toHaveBeenCalledTimes(1);
	});

	it("should carry the provider error on a permanent failure", async () => {
		const call = vi.fn().mockResolvedValue(failure(200, "Permissions error", 403));

		const error = await executor.execute("subscribeApp", call).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(ProviderPermanentError);
		expect(error).toMatchObject({ context: "subscribeApp", providerError: { code: 200 } });
	});

	it("should give up after the last attempt with the last error", async () => {
		const call = vi
			.fn()
			.mockResolvedValueOnce(failure(2, "first", 500))
			.mockResolvedValueOnce(failure(2, "second", 500))
			.mockResolvedValueOnce(failure(2, "third", 500))
			.mockRejectedValueOnce(new Error("connect ETIMEDOUT"));

		const error = await executor.execute("registerPhone", call, { resourceId: 12345 }).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(ProviderCallFailedError);
		expect(error).toMatchObject({
			message: "registerPhone[12345] failed after 4 attempts: connect ETIMEDOUT",
			context: "registerPhone[12345]",
			attempts: 4,
			providerError: undefined,
		});
		expect(call).toHaveBeenCalledTimes(4);
		expect(sleep).toHaveBeenCalledTimes(3);
	});

	describe("circuit breaker", () => {
		let clock: { now: number };
		let guarded: RetryExecutor;

		beforeEach(() => {
			clock = { now: 0 };
			guarded = createRetryExecutor({
				maxAttempts: 2,
				baseDelayMs: 1000,
				rateLimitBaseDelayMs: 5000,
				maxDelayMs: 30000,
				permanentErrorCodes: [100],
				permanentErrorTypes: [],
				rateLimitErrorCodes: [4],
				circuitFailureThreshold: 2,
				circuitResetTimeoutMs: 60000,
				sleep,
				now: () => clock.now,
			});
		});

		it("should reject calls without reaching the provider once consecutive calls are exhausted", async () => {
			const down = vi.fn().mockResolvedValue(failure(2, "Service unavailable", 503));
			await expect(guarded.execute("listPhoneNumbers", down)).rejects.toBeInstanceOf(ProviderCallFailedError);
			await expect(guarded.execute("listPhoneNumbers", down)).rejects.toBeInstanceOf(ProviderCallFailedError);
			const next = vi.fn().mockResolvedValue({ ok: true, data: "ok" });

			const error = await guarded.execute("registerPhone", next, { resourceId: "phone-1" }).catch((e: unknown) => e);

			expect(error).toBeInstanceOf(ProviderCircuitOpenError);
			expect(error).toBeInstanceOf(ProviderCallFailedError);
			expect(error).toMatchObject({
				message: "registerPhone[phone-1] rejected: provider circuit breaker is open. Retry later.",
			});
			expect(next).not.toHaveBeenCalled();
			expect(down).toHaveBeenCalledTimes(4);
		});

		it("should not open on permanent errors", async () => {
			const rejected = vi.fn().mockResolvedValue(failure(100, "Invalid parameter"));
			await expect(guarded.execute("registerPhone", rejected)).rejects.toBeInstanceOf(ProviderPermanentError);
			await expect(guarded.execute("registerPhone", rejected)).rejects.toBeInstanceOf(ProviderPermanentError);
			const next = vi.fn().mockResolvedValue({ ok: true, data: "ok" });

			expect(await guarded.execute("registerPhone", next)).toBe("ok");
		});

		it("should let a trial call through after the reset timeout and close on success", async () => {
			const down = vi.fn().mockResolvedValue(failure(2, "Service unavailable", 503));
			await guarded.execute("listPhoneNumbers", down).catch(() => undefined);
			await guarded.execute("listPhoneNumbers", down).catch(() => undefined);
			const recovered = vi.fn().mockResolvedValue({ ok: true, data: "ok" });

			clock.now = 60000;
			expect(await guarded.execute("listPhoneNumbers", recovered)).toBe("ok");
			expect(await guarded.execute("listPhoneNumbers", recovered)).toBe("ok");
			expect(recovered).toHaveBeenCalledTimes(2);
		});
	});

	it("should leave the circuit out without a failure threshold", async () => {
		const down = vi.fn().mockResolvedValue(failure(2, "Service unavailable", 503));
		for (let i = 0; i < 3; i++) {
			await expect(executor.execute("listPhoneNumbers", down)).rejects.not.toBeInstanceOf(ProviderCircuitOpenError);
		}
		expect(down).toHaveBeenCalledTimes(12);
	});

	it("should read its options from the configuration", () => {
		const config = {
			PROVIDER_RETRY_MAX_ATTEMPTS: 4,
			PROVIDER_RETRY_BASE_DELAY_MS: 1000,
			PROVIDER_RATE_LIMIT_BASE_DELAY_MS: 5000,
			PROVIDER_RETRY_MAX_DELAY_MS: 30000,
			PROVIDER_PERMANENT_ERROR_CODES: [190],
			PROVIDER_PERMANENT_ERROR_TYPES: ["OAuthException"],
			PROVIDER_RATE_LIMIT_ERROR_CODES: [4],
			PROVIDER_CIRCUIT_FAILURE_THRESHOLD: 5,
			PROVIDER_CIRCUIT_RESET_MS: 30000,
		};

		expect(getRetryExecutorOptions(config)).toMatchObject({
			maxAttempts: 4,
			permanentErrorCodes: [190],
			rateLimitErrorCodes: [4],
			circuitFailureThreshold: 5,
			circuitResetTimeoutMs: 30000,
		});
	});
});
