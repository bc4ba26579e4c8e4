import { describe, expect, it } from "vitest";
import { ConfigError } from "../../shared/errors.js";
import { FakeClock } from "../../shared/time.js";
import { TokenBucketRateLimiter } from "./rate-limiter.js";

describe("TokenBucketRateLimiter", () => {
	function createLimiter(capacity = 5, refillRate = 1) {
		const clock = new FakeClock(1_000);
		const slept: number[] = [];
		const limiter = new TokenBucketRateLimiter({
			capacity,
			refillRate,
			clock,
			sleep: async (ms) => {
				slept.push(ms);
				clock.advance(ms);
			},
		});
		return { limiter, clock, slept };
	}

	it("starts full and spends one token per acquire", () => {
		const { limiter } = createLimiter(3);
		expect(limiter.availableTokens()).toBe(3);
		expect(limiter.tryAcquire()).toBe(true);
		expect(limiter.tryAcquire()).toBe(true);
		expect(limiter.tryAcquire()).toBe(true);
		expect(limiter.tryAcquire()).toBe(false);
	});

	it("refills over time up to capacity", () => {
		const { limiter, clock } = createLimiter(5, 2);
		for (let i = 0; i < 5; i++) limiter.tryAcquire();

		clock.advance(1_500);
		expect(limiter.availableTokens()).toBe(3);

		clock.advance(60_000);
		expect(limiter.availableTokens()).toBe(5);
	});

	it("reports the wait for a partially refilled token", () => {
		const { limiter, clock } = createLimiter(5, 2);
		for (let i = 0; i < 5; i++) limiter.tryAcquire();
		expect(limiter.timeUntilNextTokenMs()).toBe(500);

		clock.advance(250);
		expect(limiter.timeUntilNextTokenMs()).toBe(250);
	});

	it("acquire returns at once while tokens remain", async () => {
		const { limiter, slept } = createLimiter(2);
		await limiter.acquire();
		expect(slept).toEqual([]);
		expect(limiter.availableTokens()).toBe(1);
	});

	it("acquire sleeps until the next token when the bucket is empty", async () => {
		const { limiter, slept } = createLimiter(2, 1);
		await limiter.acquire();
		await limiter.acquire();
		await limiter.acquire();

		expect(slept).toEqual([1_000]);
		expect(limiter.waits).toBe(1);
		expect(limiter.availableTokens()).toBe(0);
	});

	it("rejects a capacity below one", () => {
		const clock = new FakeClock(0);
		expect(() => new TokenBucketRateLimiter({ capacity: 0, refillRate: 1, clock })).toThrow(
			ConfigError,
		);
	});

	it("rejects a refill rate that would never refill", () => {
		const clock = new FakeClock(0);
		expect(() => new TokenBucketRateLimiter({ capacity: 1, refillRate: 0, clock })).toThrow(
			"refillRate must be > 0",
		);
	});
});
