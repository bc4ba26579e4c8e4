/**
 * Retry policy — exponential backoff with jitter, shared by the REST gateway
 * (per request) and the market data feed (per reconnect).
 *
 * Non-retryable errors short-circuit. A RateLimitError's `retryAfterMs`
 * is used as a floor for the next delay.
 */

import { RateLimitError } from "../../shared/errors.js";
import type { TradingError } from "../../shared/errors.js";
import type { Result } from "../../shared/result.js";
import { sleep as realSleep } from "../../shared/time.js";

export interface RetryConfig {
	/** Total attempts including the first one. */
	readonly maxAttempts: number;
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	/** 0 disables jitter; 0.2 spreads delays by ±20%. */
	readonly jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
	maxAttempts: 3,
	baseDelayMs: 1_000,
	maxDelayMs: 30_000,
	jitterFactor: 0.1,
};

export function resolveRetryConfig(overrides: Partial<RetryConfig> = {}): RetryConfig {
	return { ...DEFAULT_RETRY_CONFIG, ...overrides };
}

/** @internal Exported for testing only. */
export function computeDelay(
	attempt: number,
	config: RetryConfig,
	error?: TradingError,
	random: () => number = Math.random,
): number {
	let delay = Math.min(config.baseDelayMs * 2 ** attempt, config.maxDelayMs);
	if (error instanceof RateLimitError) {
		delay = Math.max(delay, error.retryAfterMs);
	}
	if (config.jitterFactor === 0) return delay;
	const jitter = 1 + (random() - 0.5) * 2 * config.jitterFactor;
	return Math.max(0, Math.round(delay * jitter));
}

/**
 * Stateful attempt counter for loops that retry on their own schedule,
 * such as reconnecting a socket after it closes.
 */
export class RetryPolicy {
	readonly config: RetryConfig;
	private readonly random: () => number;
	private attemptCount = 0;

	constructor(config: Partial<RetryConfig> = {}, random: () => number = Math.random) {
		this.config = resolveRetryConfig(config);
		this.random = random;
	}

	get attempts(): number {
		return this.attemptCount;
	}

	/** Delay before the next attempt; advances the attempt counter. */
	nextDelay(error?: TradingError): number {
		const delay = computeDelay(this.attemptCount, this.config, error, this.random);
		this.attemptCount += 1;
		return delay;
	}

	shouldRetry(): boolean {
		return this.attemptCount < this.config.maxAttempts;
	}

	reset(): void {
		this.attemptCount = 0;
	}
}

export interface RetryHooks {
	readonly sleep?: (ms: number) => Promise<void>;
	readonly onRetry?: (attempt: number, delayMs: number, error: TradingError) => void;
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, or
 * `maxAttempts` is used up. The last result is returned either way.
 *
 * @example
 * ```ts
 * const balances = await withRetry(() => gateway.getBalances(), { maxAttempts: 4 });
 * ```
 */
export async function withRetry<T>(
	operation: () => Promise<Result<T, TradingError>>,
	config: Partial<RetryConfig> = {},
	hooks: RetryHooks = {},
): Promise<Result<T, TradingError>> {
	const resolved = resolveRetryConfig(config);
	const sleep = hooks.sleep ?? realSleep;

	let last = await operation();
	for (let attempt = 1; attempt < resolved.maxAttempts; attempt++) {
		if (last.ok || !last.error.isRetryable) return last;
		const delay = computeDelay(attempt - 1, resolved, last.error);
		hooks.onRetry?.(attempt, delay, last.error);
		await sleep(delay);
		last = await operation();
	}
	return last;
}
