import type { ExchangeGateway } from "../exchange/types.js";
import type { MarketDataFeed } from "../feed/market-data-feed.js";
import { ConnectionState, type OrderFill, channels } from "../feed/types.js";
import type { IndicatorEngine } from "../indicators/indicator-engine.js";
import type { PositionCache } from "../ledger/position-cache.js";
import type { Logger } from "../lib/logger/index.js";
import type { BookTicker } from "../market/types.js";
import type { BotConfig } from "../shared/config.js";
import { SystemError, type TradingError } from "../shared/errors.js";
import { type Clock, SystemClock, sleep as realSleep } from "../shared/time.js";
import { valueAccount } from "../strategy/account-value.js";
import type { OrderingEngine } from "../strategy/ordering-engine.js";
import { AdaptiveInterval } from "./adaptive-interval.js";

export type SchedulerSettings = Pick<
	BotConfig,
	| "symbol"
	| "longInterval"
	| "shortInterval"
	| "klineRefreshMs"
	| "mainLoopMs"
	| "warmupTimeoutMs"
	| "healthCheckBaseMs"
	| "healthCheckMaxMs"
>;

export interface SchedulerOptions {
	readonly settings: SchedulerSettings;
	readonly feed: MarketDataFeed;
	readonly gateway: ExchangeGateway;
	readonly indicators: IndicatorEngine;
	readonly engine: OrderingEngine;
	readonly positions: PositionCache;
	readonly ledger: { close(): void };
	/** Subscribe to account fills and value the account on health checks. */
	readonly account: boolean;
	readonly logger: Logger;
	readonly clock?: Clock;
	readonly sleep?: (ms: number) => Promise<void>;
}

/** Pause between kline retries while the bands fill at startup. */
const WARMUP_POLL_MS = 2_000;

const SESSION_UP: ReadonlySet<ConnectionState> = new Set([
	ConnectionState.Subscribed,
	ConnectionState.Live,
]);

/**
 * Wires the feed, indicators, ordering engine and position cache together
 * and runs their timers.
 *
 * - kline refresh every `klineRefreshMs`, rebuilding both bands
 * - main loop every `mainLoopMs`: drains position jobs and runs the health
 *   check when due, backing off while it fails
 * - book tickers go to the ordering engine, fills to the position cache
 * - every new feed session is seeded with a REST depth snapshot
 */
export class Scheduler {
	private readonly settings: SchedulerSettings;
	private readonly feed: MarketDataFeed;
	private readonly gateway: ExchangeGateway;
	private readonly indicators: IndicatorEngine;
	private readonly engine: OrderingEngine;
	private readonly positions: PositionCache;
	private readonly ledger: { close(): void };
	private readonly account: boolean;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly sleep: (ms: number) => Promise<void>;
	private readonly health: AdaptiveInterval;
	private readonly pending = new Set<Promise<void>>();

	private running = false;
	private stopped = false;
	private klineTimer: ReturnType<typeof setInterval> | null = null;
	private mainTimer: ReturnType<typeof setInterval> | null = null;
	private nextHealthAt = 0;
	private checking = false;
	private refreshing = false;
	private warmedUp = false;

	constructor(options: SchedulerOptions) {
		this.settings = options.settings;
		this.feed = options.feed;
		this.gateway = options.gateway;
		this.indicators = options.indicators;
		this.engine = options.engine;
		this.positions = options.positions;
		this.ledger = options.ledger;
		this.account = options.account;
		this.logger = options.logger.child({ component: "scheduler" });
		this.clock = options.clock ?? SystemClock;
		this.sleep = options.sleep ?? realSleep;
		this.health = new AdaptiveInterval(
			options.settings.healthCheckBaseMs,
			options.settings.healthCheckMaxMs,
		);
	}

	get isRunning(): boolean {
		return this.running;
	}

	get healthCheckIntervalMs(): number {
		return this.health.currentMs;
	}

	/**
	 * Connect, subscribe, load the bands and start the timers. Resolves once
	 * the bands are ready.
	 * @throws SystemError when the feed cannot connect or the bands do not
	 * fill within `warmupTimeoutMs`
	 */
	async start(): Promise<void> {
		if (this.running || this.stopped) return;
		this.running = true;
		this.feed.on("bookTicker", this.onBookTicker);
		this.feed.on("orderFill", this.onOrderFill);
		this.feed.on("error", this.onFeedError);
		this.feed.on("state", this.onFeedState);

		try {
			await this.feed.start();
			this.subscribeAll();
			this.mainTimer = setInterval(() => this.tick(), this.settings.mainLoopMs);
			this.nextHealthAt = this.clock.now() + this.health.currentMs;
			await this.refreshIndicators();
			this.klineTimer = setInterval(() => {
				this.track(this.refreshIndicators().then(() => undefined));
			}, this.settings.klineRefreshMs);
			await this.waitForWarmup();
		} catch (error) {
			this.halt();
			throw error;
		}
		this.logger.info({ symbol: this.settings.symbol }, "Scheduler started");
	}

	/**
	 * Stop scheduling, let in-flight cycles wind down, cancel open orders, then
	 * close the feed, drain the remaining position jobs and close the ledger.
	 * Fills keep flowing into the position queue until the feed is closed.
	 */
	async stop(): Promise<void> {
		if (this.stopped) return;
		this.stopped = true;
		this.running = false;
		this.engine.stop();
		this.clearTimers();
		this.feed.off("bookTicker", this.onBookTicker);

		// wakes a cycle blocked on a position read
		this.positions.drain();
		await Promise.all(this.pending);
		const cancelled = await this.gateway.cancelAllOrders(this.settings.symbol);
		if (cancelled.ok) {
			this.logger.info({ cancelled: cancelled.value }, "Open orders cancelled");
		} else {
			this.logger.error(
				{ code: cancelled.error.code, err: cancelled.error.message },
				"Cancel all on shutdown failed",
			);
		}
		this.closeFeed();
		const drained = this.positions.drain();
		this.ledger.close();
		this.logger.info({ drained }, "Scheduler stopped");
	}

	/** Fetch klines for both bands and rebuild them. */
	async refreshIndicators(): Promise<boolean> {
		if (this.refreshing) return this.indicators.isReady();
		this.refreshing = true;
		try {
			const { symbol, longInterval, shortInterval } = this.settings;
			const periods = this.indicators.periods;
			const [long, short] = await Promise.all([
				this.gateway.getKlines(symbol, longInterval, periods.long * 2),
				this.gateway.getKlines(symbol, shortInterval, periods.short * 2),
			]);
			if (!long.ok) return this.refreshFailed(long.error);
			if (!short.ok) return this.refreshFailed(short.error);
			this.indicators.refresh({ long: long.value.closes, short: short.value.closes });
			const ready = this.indicators.isReady();
			if (ready && !this.warmedUp) {
				this.warmedUp = true;
				this.logger.info(this.indicators.sampleCounts(), "Indicators ready");
			}
			return ready;
		} finally {
			this.refreshing = false;
		}
	}

	private refreshFailed(error: TradingError): false {
		this.logger.warn({ code: error.code, err: error.message }, "Kline refresh failed");
		return false;
	}

	/** One main loop iteration. */
	tick(): void {
		if (!this.running) return;
		this.positions.drain();
		if (!this.checking && this.clock.now() >= this.nextHealthAt) {
			this.track(this.checkHealth());
		}
	}

	private subscribeAll(): void {
		const symbol = this.settings.symbol;
		const wanted = [channels.bookTicker(symbol), channels.depth(symbol)];
		if (this.account) wanted.push(channels.orderUpdate(symbol));
		for (const channel of wanted) {
			const result = this.feed.subscribe(channel);
			if (!result.ok) throw result.error;
		}
	}

	private async waitForWarmup(): Promise<void> {
		const deadline = this.clock.now() + this.settings.warmupTimeoutMs;
		while (!this.indicators.isReady()) {
			if (!this.running) throw new SystemError("Scheduler stopped during warmup");
			if (this.clock.now() >= deadline) {
				throw new SystemError(
					`Indicators not ready after ${this.settings.warmupTimeoutMs}ms`,
					this.indicators.sampleCounts(),
				);
			}
			this.logger.info(this.indicators.sampleCounts(), "Waiting for indicators");
			await this.sleep(WARMUP_POLL_MS);
			await this.refreshIndicators();
		}
	}

	private async checkHealth(): Promise<void> {
		this.checking = true;
		try {
			const healthy = await this.isHealthy();
			const next = healthy ? this.health.succeed() : this.health.fail();
			if (!healthy) {
				this.logger.warn(
					{ failures: this.health.consecutiveFailures, nextCheckMs: next },
					"Health check failed",
				);
			}
			this.nextHealthAt = this.clock.now() + next;
		} finally {
			this.checking = false;
		}
	}

	private async isHealthy(): Promise<boolean> {
		const state = this.feed.getState();
		if (!SESSION_UP.has(state)) {
			this.logger.warn({ state }, "Market data session down");
			return false;
		}
		const ticker = await this.gateway.getTicker(this.settings.symbol);
		if (!ticker.ok) {
			this.logger.warn({ code: ticker.error.code, err: ticker.error.message }, "Ticker unavailable");
			return false;
		}
		if (!this.account) return true;

		const price = this.engine.lastPrice ?? ticker.value.lastPrice;
		const value = await valueAccount(this.gateway, this.settings.symbol, price, this.logger);
		if (!value.ok) {
			this.logger.warn({ code: value.error.code, err: value.error.message }, "Balances unavailable");
			return false;
		}
		this.logger.info(
			{
				price: price.toString(),
				base: value.value.base.toString(),
				quote: value.value.quote.toString(),
				total: value.value.total.toString(),
			},
			"Account value",
		);
		return true;
	}

	private readonly onBookTicker = (ticker: BookTicker): void => {
		if (!this.running) return;
		this.track(this.engine.onBookTicker(ticker).then(() => undefined));
	};

	private readonly onOrderFill = (fill: OrderFill): void => {
		this.engine.onOrderFill(fill);
	};

	private readonly onFeedError = (error: TradingError): void => {
		this.logger.warn({ code: error.code, err: error.message }, "Market data error");
	};

	/** Each new session starts with an empty book; load a REST snapshot into it. */
	private readonly onFeedState = (next: ConnectionState): void => {
		if (!this.running || next !== ConnectionState.Subscribed) return;
		this.track(this.seedOrderBook());
	};

	private async seedOrderBook(): Promise<void> {
		const depth = await this.gateway.getDepth(this.settings.symbol);
		if (!depth.ok) {
			this.logger.warn({ code: depth.error.code, err: depth.error.message }, "Depth snapshot unavailable");
			return;
		}
		const seeded = this.feed.seedOrderBook(depth.value, depth.value.lastUpdateId);
		this.logger.debug({ seeded, lastUpdateId: depth.value.lastUpdateId }, "Order book seeded");
	}

	/** Keep a background task until it settles; failures are logged. */
	private track(task: Promise<void>): void {
		const tracked = task.catch((error: unknown) => {
			this.logger.error(
				{ err: error instanceof Error ? error.message : String(error) },
				"Background task failed",
			);
		});
		this.pending.add(tracked);
		void tracked.finally(() => this.pending.delete(tracked));
	}

	private halt(): void {
		this.running = false;
		this.clearTimers();
		this.feed.off("bookTicker", this.onBookTicker);
		this.closeFeed();
	}

	private clearTimers(): void {
		if (this.klineTimer !== null) {
			clearInterval(this.klineTimer);
			this.klineTimer = null;
		}
		if (this.mainTimer !== null) {
			clearInterval(this.mainTimer);
			this.mainTimer = null;
		}
	}

	private closeFeed(): void {
		this.feed.off("orderFill", this.onOrderFill);
		this.feed.off("error", this.onFeedError);
		this.feed.off("state", this.onFeedState);
		this.feed.stop();
	}
}
