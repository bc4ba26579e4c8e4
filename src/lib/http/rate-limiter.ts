import { ConfigError } from "../../shared/errors.js";
import type { Clock } from "../../shared/time.js";
import { sleep as realSleep } from "../../shared/time.js";

export interface RateLimiterConfig {
	/** Burst size. */
	readonly capacity: number;
	/** Tokens added per second. */
	readonly refillRate: number;
	readonly clock: Clock;
	readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * Token bucket pacing outbound REST calls.
 *
 * Tokens accumulate at `refillRate` per second up to `capacity`. `tryAcquire`
 * never waits; `acquire` sleeps exactly as long as the bucket needs to refill
 * one token, then takes it.
 */
export class TokenBucketRateLimiter {
	private readonly capacity: number;
	private readonly refillRate: number;
	private readonly clock: Clock;
	private readonly sleep: (ms: number) => Promise<void>;
	private tokens: number;
	private lastRefillMs: number;
	private waited = 0;

	constructor(config: RateLimiterConfig) {
		if (config.capacity < 1) {
			throw new ConfigError("capacity must be >= 1", { capacity: config.capacity });
		}
		if (!(config.refillRate > 0)) {
			throw new ConfigError("refillRate must be > 0", { refillRate: config.refillRate });
		}
		this.capacity = config.capacity;
		this.refillRate = config.refillRate;
		this.clock = config.clock;
		this.sleep = config.sleep ?? realSleep;
		this.tokens = config.capacity;
		this.lastRefillMs = this.clock.now();
	}

	tryAcquire(): boolean {
		this.refill();
		if (this.tokens < 1) return false;
		this.tokens -= 1;
		return true;
	}

	/** Take one token, sleeping until the bucket has one. */
	async acquire(): Promise<void> {
		for (;;) {
			if (this.tryAcquire()) return;
			const waitMs = this.timeUntilNextTokenMs();
			this.waited += 1;
			await this.sleep(waitMs);
		}
	}

	/** Whole tokens available now. */
	availableTokens(): number {
		this.refill();
		return Math.floor(this.tokens);
	}

	timeUntilNextTokenMs(): number {
		this.refill();
		if (this.tokens >= 1) return 0;
		return Math.ceil(((1 - this.tokens) / this.refillRate) * 1000);
	}

	/** How many times `acquire` had to sleep. */
	get waits(): number {
		return this.waited;
	}

	private refill(): void {
		const now = this.clock.now();
		const elapsedMs = now - this.lastRefillMs;
		if (elapsedMs <= 0) return;
		this.tokens = Math.min(this.capacity, this.tokens + (elapsedMs / 1000) * this.refillRate);
		this.lastRefillMs = now;
	}
}
