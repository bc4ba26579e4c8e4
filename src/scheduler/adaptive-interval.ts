import { ConfigError } from "../shared/errors.js";

/**
 * Check interval that backs off while checks fail.
 *
 * Each failure doubles the interval up to `maxMs`; a success resets it to
 * `baseMs`.
 */
export class AdaptiveInterval {
	readonly baseMs: number;
	readonly maxMs: number;
	private current: number;
	private failures = 0;

	constructor(baseMs: number, maxMs: number) {
		if (baseMs <= 0) throw new ConfigError(`AdaptiveInterval: baseMs must be > 0, got ${baseMs}`);
		if (maxMs < baseMs) {
			throw new ConfigError(`AdaptiveInterval: maxMs (${maxMs}) must be >= baseMs (${baseMs})`);
		}
		this.baseMs = baseMs;
		this.maxMs = maxMs;
		this.current = baseMs;
	}

	get currentMs(): number {
		return this.current;
	}

	/** Consecutive failures since the last success. */
	get consecutiveFailures(): number {
		return this.failures;
	}

	/** @returns the next interval */
	succeed(): number {
		this.failures = 0;
		this.current = this.baseMs;
		return this.current;
	}

	/** @returns the next interval */
	fail(): number {
		this.failures += 1;
		this.current = Math.min(this.current * 2, this.maxMs);
		return this.current;
	}
}
