import { afterEach, describe, expect, it, vi } from "vitest";
import { ExecutionError } from "@tradeloop/core";
import { backoffDelay, withRetry, withTimeout } from "./retry";

const options = (sleep: (ms: number) => Promise<void>) => ({
	label: "place_order",
	maxAttempts: 3,
	baseDelayMs: 100,
	maxDelayMs: 1000,
	sleep,
});

describe("backoffDelay", () => {
	it("doubles from the base and caps at the maximum", () => {
		expect([1, 2, 3, 4, 5].map((attempt) => backoffDelay(attempt, 100, 1000))).toEqual([
			100, 200, 400, 800, 1000,
		]);
	});
});

describe("withRetry", () => {
	it("retries transient failures with backoff", async () => {
		const sleep = vi.fn(async (_ms: number) => {});
		const operation = vi.fn(async (attempt: number) => {
			if (attempt < 3) {
				throw new ExecutionError("socket hang up", "transient");
			}
			return "filled";
		});
		await expect(withRetry(operation, options(sleep))).resolves.toBe("filled");
		expect(operation).toHaveBeenCalledTimes(3);
		expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
	});

	it("does not retry terminal failures", async () => {
		const sleep = vi.fn(async (_ms: number) => {});
		const operation = vi.fn(async () => {
			throw new ExecutionError("insufficient funds", "terminal");
		});
		await expect(withRetry(operation, options(sleep))).rejects.toThrow("insufficient funds");
		expect(operation).toHaveBeenCalledTimes(1);
		expect(sleep).not.toHaveBeenCalled();
	});

	it("rethrows the last error once attempts run out", async () => {
		const sleep = vi.fn(async (_ms: number) => {});
		const operation = vi.fn(async (attempt: number) => {
			throw new ExecutionError(`attempt ${attempt} failed`, "transient");
		});
		await expect(withRetry(operation, options(sleep))).rejects.toThrow("attempt 3 failed");
		expect(operation).toHaveBeenCalledTimes(3);
	});
});

describe("withTimeout", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("passes through a value that arrives in time", async () => {
		await expect(withTimeout(Promise.resolve(3), 50, "fetch_balance")).resolves.toBe(3);
	});

	it("rejects with a transient timeout", async () => {
		vi.useFakeTimers();
		const pending = withTimeout(new Promise<number>(() => {}), 50, "fetch_balance");
		const assertion = expect(pending).rejects.toMatchObject({
			name: "TimeoutError",
			kind: "transient",
			message: "fetch_balance timed out after 50ms",
		});
		await vi.advanceTimersByTimeAsync(50);
		await assertion;
	});
});
