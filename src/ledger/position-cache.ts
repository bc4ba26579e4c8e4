import type { Logger } from "../lib/logger/index.js";
import { Decimal } from "../shared/decimal.js";
import type { LedgerError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { LedgerFill, Position } from "./position-ledger.js";
import { averagePrice } from "./position-math.js";

/** What the ordering engine reads: holding and average entry. */
export interface CachedPosition {
	readonly size: Decimal;
	readonly avgPrice: Decimal;
}

/** The part of the ledger the cache drives. */
export interface PositionStore {
	getPosition(symbol: string): Result<Position | null, LedgerError>;
	applyFill(fill: LedgerFill): Result<Position, LedgerError>;
}

export type PositionJob =
	| { readonly kind: "apply_fill"; readonly fill: LedgerFill }
	| { readonly kind: "refresh" };

export interface PositionCacheOptions {
	readonly store: PositionStore;
	readonly symbol: string;
	readonly logger: Logger;
	readonly clock?: Clock;
	/** Cache age below which reads skip the ledger. */
	readonly refreshIntervalMs: number;
	/** Longest a read waits for a queued refresh. */
	readonly waitTimeoutMs: number;
}

const FLAT: CachedPosition = { size: Decimal.zero(), avgPrice: Decimal.zero() };

/**
 * Sole owner of the ledger. Writers and readers enqueue jobs; `drain()` runs
 * them one at a time in arrival order. The main loop calls `drain()` on every
 * tick, so the ledger is never touched from two places at once.
 */
export class PositionCache {
	private readonly store: PositionStore;
	private readonly symbol: string;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly refreshIntervalMs: number;
	private readonly waitTimeoutMs: number;
	private readonly queue: PositionJob[] = [];
	private readonly waiters = new Set<() => void>();
	private cached: CachedPosition | null = null;
	private cachedAt = Number.NEGATIVE_INFINITY;
	private refreshQueued = false;

	constructor(options: PositionCacheOptions) {
		this.store = options.store;
		this.symbol = options.symbol;
		this.logger = options.logger;
		this.clock = options.clock ?? SystemClock;
		this.refreshIntervalMs = options.refreshIntervalMs;
		this.waitTimeoutMs = options.waitTimeoutMs;
	}

	enqueueFill(fill: LedgerFill): void {
		this.queue.push({ kind: "apply_fill", fill });
	}

	/** Queue a reload from the ledger unless one is already pending. */
	requestRefresh(): void {
		if (this.refreshQueued) return;
		this.refreshQueued = true;
		this.queue.push({ kind: "refresh" });
	}

	pendingJobs(): number {
		return this.queue.length;
	}

	/** Process every queued job and return how many ran. */
	drain(): number {
		let processed = 0;
		let job = this.queue.shift();
		while (job !== undefined) {
			this.process(job);
			processed++;
			job = this.queue.shift();
		}
		return processed;
	}

	/**
	 * The cached position when it is fresh. Otherwise queue a refresh and wait
	 * for it, bounded by the wait timeout, then answer with whatever is known.
	 */
	async getCachedPosition(): Promise<CachedPosition> {
		if (this.cached !== null && this.clock.now() - this.cachedAt < this.refreshIntervalMs) {
			return this.cached;
		}
		this.requestRefresh();
		await this.waitForUpdate();
		return this.cached ?? FLAT;
	}

	/** Last known value without touching the queue. */
	peek(): CachedPosition | null {
		return this.cached;
	}

	private process(job: PositionJob): void {
		if (job.kind === "refresh") {
			this.refreshQueued = false;
			const result = this.store.getPosition(this.symbol);
			if (result.ok) {
				this.advance(result.value);
			} else {
				this.logger.error({ err: result.error.message }, "Position refresh failed");
			}
		} else {
			const result = this.store.applyFill(job.fill);
			if (result.ok) {
				this.advance(result.value);
			} else {
				this.logger.error(
					{
						err: result.error.message,
						side: job.fill.side,
						price: job.fill.price.toString(),
						quantity: job.fill.quantity.toString(),
					},
					"Fill not recorded",
				);
			}
		}
		this.notify();
	}

	private advance(position: Position | null): void {
		this.cached =
			position === null ? FLAT : { size: position.size, avgPrice: averagePrice(position) };
		this.cachedAt = this.clock.now();
	}

	private notify(): void {
		const waiters = [...this.waiters];
		this.waiters.clear();
		for (const wake of waiters) wake();
	}

	private waitForUpdate(): Promise<void> {
		return new Promise<void>((resolve) => {
			const wake = (): void => {
				clearTimeout(timer);
				this.waiters.delete(wake);
				resolve();
			};
			const timer = setTimeout(wake, this.waitTimeoutMs);
			this.waiters.add(wake);
		});
	}
}
