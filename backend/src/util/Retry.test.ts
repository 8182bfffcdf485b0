import { addJitter, calculateBackoffDelay, withRetry } from "./Retry";
import { describe, expect, it, vi } from "vitest";

describe("Retry", () => {
	describe("calculateBackoffDelay", () => {
		it("should double the delay per attempt", () => {
			expect([1, 2, 3, 4].map(attempt => calculateBackoffDelay(attempt, 1000, 30000))).toEqual([
				1000, 2000, 4000, 8000,
			]);
		});

		it("should cap the delay", () => {
			expect(calculateBackoffDelay(5, 5000, 30000)).toBe(30000);
		});
	});

	describe("addJitter", () => {
		it("should stay between zero and the delay", () => {
			vi.spyOn(Math, "random").mockReturnValue(0.5);

			expect(addJitter(1000)).toBe(500);
		});
	});

	describe("withRetry", () => {
		it("should return the first successful result", async () => {
			const sleep = vi.fn(async () => undefined);
			const operation = vi.fn().mockRejectedValueOnce(new Error("ECONNREFUSED")).mockResolvedValueOnce("ok");

			await expect(withRetry(operation, { jitter: false, sleep })).resolves.toBe("ok");
			expect(operation).toHaveBeenCalledTimes(2);
			expect(sleep).toHaveBeenCalledWith(1000);
		});

		it("should rethrow the last error when attempts are exhausted", async () => {
			const sleep = vi.fn(async () => undefined);
			const operation = vi.fn().mockRejectedValue(new Error("still down"));

			await expect(withRetry(operation, { maxRetries: 3, jitter: false, sleep })).rejects.toThrow("still down");
			expect(operation).toHaveBeenCalledTimes(3);
			expect(sleep.mock.calls).toEqual([[1000], [2000]]);
		});

		it("should not retry errors the predicate rejects", async () => {
			const sleep = vi.fn(async () => undefined);
			const operation = vi.fn().mockRejectedValue(new Error("password authentication failed"));

			await expect(withRetry(operation, { isRetryable: () => false, sleep })).rejects.toThrow(
				"password authentication failed",
			);
			expect(operation).toHaveBeenCalledTimes(1);
			expect(sleep).not.toHaveBeenCalled();
		});
	});
});
