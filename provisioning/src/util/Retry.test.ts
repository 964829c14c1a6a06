import { addJitter, calculateBackoffDelay, type RetryState, withRetry } from "./Retry";
import { describe, expect, it, vi } from "vitest";

describe("Retry", () => {
	describe("calculateBackoffDelay", () => {
		it("returns base delay for first attempt", () => {
			expect(calculateBackoffDelay(1, 1000, 30000)).toBe(1000);
		});

		it("doubles delay for each subsequent attempt", () => {
			expect(calculateBackoffDelay(2, 1000, 30000)).toBe(2000);
			expect(calculateBackoffDelay(3, 1000, 30000)).toBe(4000);
		});

		it("applies a custom multiplier", () => {
			expect(calculateBackoffDelay(3, 1000, 60000, 3)).toBe(9000);
		});

		it("caps delay at maxDelayMs", () => {
			expect(calculateBackoffDelay(10, 1000, 60000)).toBe(60000);
		});
	});

	describe("addJitter", () => {
		it("scales with the jitter factor", () => {
			expect(addJitter(1000, 0.1, () => 0.5)).toBe(50);
			expect(addJitter(1000, 0.1, () => 0)).toBe(0);
		});

		it("stays within the jitter factor of the delay", () => {
			for (let i = 0; i < 100; i++) {
				const jitter = addJitter(2000, 0.1);
				expect(jitter).toBeGreaterThanOrEqual(0);
				expect(jitter).toBeLessThanOrEqual(200);
			}
		});
	});

	describe("withRetry", () => {
		it("returns result on first success", async () => {
			const operation = vi.fn().mockResolvedValue("success");

			const result = await withRetry(operation);

			expect(result).toBe("success");
			expect(operation).toHaveBeenCalledWith(1);
			expect(operation).toHaveBeenCalledTimes(1);
		});

		it("retries until success and sleeps between attempts", async () => {
			const operation = vi
				.fn()
				.mockRejectedValueOnce(new Error("fail 1"))
				.mockRejectedValueOnce(new Error("fail 2"))
				.mockResolvedValue("ok");
			const sleep = vi.fn().mockResolvedValue(undefined);

			const result = await withRetry(operation, { jitterFactor: 0, sleep });

			expect(result).toBe("ok");
			expect(operation).toHaveBeenCalledTimes(3);
			expect(sleep.mock.calls.map(call => call[0])).toEqual([1000, 2000]);
		});

		it("throws the last error when attempts are exhausted", async () => {
			const operation = vi.fn().mockRejectedValue(new Error("always"));
			const sleep = vi.fn().mockResolvedValue(undefined);

			await expect(withRetry(operation, { maxAttempts: 2, sleep })).rejects.toThrow("always");
			expect(operation).toHaveBeenCalledTimes(2);
			expect(sleep).toHaveBeenCalledTimes(1);
		});

		it("does not retry non-retryable errors", async () => {
			const operation = vi.fn().mockRejectedValue(new Error("fatal"));
			const isRetryable = vi.fn().mockReturnValue(false);

			await expect(withRetry(operation, { isRetryable })).rejects.toThrow("fatal");
			expect(operation).toHaveBeenCalledTimes(1);
			expect(isRetryable).toHaveBeenCalledWith(new Error("fatal"), 1);
		});

		it("uses delayFor when given", async () => {
			const operation = vi.fn().mockRejectedValueOnce(new Error("x")).mockResolvedValue("ok");
			const sleep = vi.fn().mockResolvedValue(undefined);

			await withRetry(operation, { delayFor: attempt => attempt * 7, sleep });

			expect(sleep).toHaveBeenCalledWith(7, undefined);
		});

		it("reports retry state before each sleep", async () => {
			const error = new Error("flaky");
			const operation = vi.fn().mockRejectedValueOnce(error).mockRejectedValueOnce(error).mockResolvedValue("ok");
			const states: Array<RetryState> = [];

			await withRetry(operation, {
				jitterFactor: 0,
				sleep: vi.fn().mockResolvedValue(undefined),
				onRetry: state => states.push(state),
			});

			expect(states).toEqual([
				{ attempt: 1, elapsedDelayMs: 0, lastError: error, nextDelayMs: 1000 },
				{ attempt: 2, elapsedDelayMs: 1000, lastError: error, nextDelayMs: 2000 },
			]);
		});

		it("stops when the sleep is aborted", async () => {
			const controller = new AbortController();
			const operation = vi.fn().mockRejectedValue(new Error("down"));

			const result = withRetry(operation, {
				baseDelayMs: 60000,
				signal: controller.signal,
				onRetry: () => controller.abort(new Error("cancelled")),
			});

			await expect(result).rejects.toThrow("cancelled");
			expect(operation).toHaveBeenCalledTimes(1);
		});

		it("does not start another attempt once aborted", async () => {
			const controller = new AbortController();
			const operation = vi.fn().mockImplementation(async () => {
				controller.abort();
				throw new Error("down");
			});

			await expect(withRetry(operation, { signal: controller.signal })).rejects.toThrow("down");
			expect(operation).toHaveBeenCalledTimes(1);
		});
	});
});
