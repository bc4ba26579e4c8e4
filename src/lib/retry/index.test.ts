import { describe, expect, it, vi } from "vitest";
import { NetworkError, OrderRejectedError, RateLimitError } from "../../shared/errors.js";
import type { TradingError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";
import { RetryPolicy, computeDelay, resolveRetryConfig, withRetry } from "./index.js";

const noJitter = resolveRetryConfig({ baseDelayMs: 1_000, maxDelayMs: 8_000, jitterFactor: 0 });

function scripted<T>(results: Result<T, TradingError>[]) {
	let i = 0;
	const operation = vi.fn(async (): Promise<Result<T, TradingError>> => {
		const next = results[i] ?? err(new NetworkError("script exhausted"));
		i += 1;
		return next;
	});
	return operation;
}

describe("computeDelay", () => {
	it("doubles per attempt and caps at maxDelayMs", () => {
		expect([0, 1, 2, 3, 4].map((a) => computeDelay(a, noJitter))).toEqual([
			1_000, 2_000, 4_000, 8_000, 8_000,
		]);
	});

	it("uses retryAfterMs as a floor for rate limits", () => {
		expect(computeDelay(0, noJitter, new RateLimitError("429", 5_000))).toBe(5_000);
		expect(computeDelay(3, noJitter, new RateLimitError("429", 5_000))).toBe(8_000);
	});

	it("spreads the delay by the jitter factor", () => {
		const config = { ...noJitter, jitterFactor: 0.5 };
		expect(computeDelay(0, config, undefined, () => 0)).toBe(500);
		expect(computeDelay(0, config, undefined, () => 1)).toBe(1_500);
	});
});

describe("RetryPolicy", () => {
	it("counts attempts until maxAttempts", () => {
		const policy = new RetryPolicy({ ...noJitter, maxAttempts: 2 });
		expect(policy.shouldRetry()).toBe(true);
		expect(policy.nextDelay()).toBe(1_000);
		expect(policy.nextDelay()).toBe(2_000);
		expect(policy.shouldRetry()).toBe(false);
		expect(policy.attempts).toBe(2);
	});

	it("reset restarts the backoff schedule", () => {
		const policy = new RetryPolicy(noJitter);
		policy.nextDelay();
		policy.nextDelay();
		policy.reset();
		expect(policy.attempts).toBe(0);
		expect(policy.nextDelay()).toBe(1_000);
	});
});

describe("withRetry", () => {
	const sleep = vi.fn(async (_ms: number) => {});

	it("returns the first success without sleeping", async () => {
		const op = scripted([ok(42)]);
		const r = await withRetry(op, noJitter, { sleep });
		expect(r).toEqual(ok(42));
		expect(op).toHaveBeenCalledTimes(1);
	});

	it("retries retryable errors with backoff", async () => {
		sleep.mockClear();
		const onRetry = vi.fn();
		const op = scripted([err(new NetworkError("reset")), err(new NetworkError("reset")), ok("done")]);

		const r = await withRetry(op, { ...noJitter, maxAttempts: 3 }, { sleep, onRetry });

		expect(r).toEqual(ok("done"));
		expect(op).toHaveBeenCalledTimes(3);
		expect(sleep.mock.calls.map((c) => c[0])).toEqual([1_000, 2_000]);
		expect(onRetry).toHaveBeenCalledTimes(2);
	});

	it("stops immediately on non-retryable errors", async () => {
		const rejected = new OrderRejectedError("post only would cross");
		const op = scripted<number>([err(rejected), ok(1)]);
		const r = await withRetry(op, noJitter, { sleep });
		expect(r).toEqual(err(rejected));
		expect(op).toHaveBeenCalledTimes(1);
	});

	it("returns the last error once attempts are exhausted", async () => {
		const op = scripted<number>([
			err(new RateLimitError("429", 0)),
			err(new RateLimitError("429", 0)),
			err(new NetworkError("still down")),
		]);
		const r = await withRetry(op, { ...noJitter, maxAttempts: 3 }, { sleep });
		expect(r.ok).toBe(false);
		if (!r.ok) expect(r.error.message).toBe("still down");
		expect(op).toHaveBeenCalledTimes(3);
	});
});
