import type { ExchangeGateway } from "../exchange/types.js";
import { OrderType, TimeInForce } from "../exchange/types.js";
import type { OrderFill } from "../feed/types.js";
import type { IndicatorSnapshot } from "../indicators/indicator-engine.js";
import type { CachedPosition } from "../ledger/position-cache.js";
import type { LedgerFill } from "../ledger/position-ledger.js";
import type { Logger } from "../lib/logger/index.js";
import type { BookTicker } from "../market/types.js";
import type { Decimal } from "../shared/decimal.js";
import { OrderSide } from "../shared/market-side.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { calcDynamicSpread } from "./dynamic-spread.js";
import type { SpreadQuote } from "./dynamic-spread.js";
import { buildLadder } from "./grid-ladder.js";
import type { LadderOrder } from "./grid-ladder.js";
import { calcPositionScale } from "./position-scale.js";
import { evaluateRisk } from "./risk-control.js";
import type { StrategySettings } from "./settings.js";

/** Read side of the indicator engine. */
export interface BandSource {
	isReady(): boolean;
	snapshot(): IndicatorSnapshot;
}

/** What the engine needs from the position cache. */
export interface PositionPort {
	getCachedPosition(): Promise<CachedPosition>;
	enqueueFill(fill: LedgerFill): void;
}

export interface OrderingEngineOptions {
	readonly settings: StrategySettings;
	readonly gateway: ExchangeGateway;
	readonly indicators: BandSource;
	readonly positions: PositionPort;
	readonly logger: Logger;
	readonly clock?: Clock;
}

export type CycleOutcome = "deferred" | "risk_exit" | "cancel_failed" | "placed" | "aborted";

export interface CycleReport {
	readonly outcome: CycleOutcome;
	readonly price: Decimal;
	readonly startedAtMs: number;
	/** Null without a position cost. */
	readonly roi: Decimal | null;
	readonly riskReason: "stop_loss" | "take_profit" | null;
	/** Whether the closing market order was accepted. */
	readonly closed: boolean;
	readonly scale: Decimal | null;
	readonly spread: SpreadQuote | null;
	readonly cancelled: number;
	readonly placedBuys: number;
	readonly placedSells: number;
	readonly failedOrders: number;
}

/**
 * Turns top-of-book updates into order ladders.
 *
 * At most one cycle runs at a time and a new one starts no sooner than
 * `orderIntervalMs` after the previous one. A cycle deferred because the
 * bands are still filling does not count against the interval.
 *
 * After `stop()` no cycle starts, and a cycle already running checks the
 * flag between exchange calls and ends with outcome `aborted`.
 */
export class OrderingEngine {
	private readonly settings: StrategySettings;
	private readonly gateway: ExchangeGateway;
	private readonly indicators: BandSource;
	private readonly positions: PositionPort;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private lastCycleAt: number | null = null;
	private latestPrice: Decimal | null = null;
	private busy = false;
	private stopped = false;

	constructor(options: OrderingEngineOptions) {
		this.settings = options.settings;
		this.gateway = options.gateway;
		this.indicators = options.indicators;
		this.positions = options.positions;
		this.logger = options.logger.child({ component: "ordering" });
		this.clock = options.clock ?? SystemClock;
	}

	/** Mid price of the last book ticker seen. */
	get lastPrice(): Decimal | null {
		return this.latestPrice;
	}

	get lastCycleAtMs(): number | null {
		return this.lastCycleAt;
	}

	get inFlight(): boolean {
		return this.busy;
	}

	get isStopped(): boolean {
		return this.stopped;
	}

	stop(): void {
		this.stopped = true;
	}

	/**
	 * Run a cycle at the ticker's mid price when the interval has elapsed.
	 * Resolves to null when throttled or while a cycle is in flight.
	 */
	async onBookTicker(ticker: BookTicker): Promise<CycleReport | null> {
		if (ticker.symbol !== this.settings.symbol || !ticker.mid.isPositive()) return null;
		this.latestPrice = ticker.mid;
		if (this.busy || this.stopped) return null;
		if (
			this.lastCycleAt !== null &&
			this.clock.now() - this.lastCycleAt < this.settings.orderIntervalMs
		) {
			return null;
		}
		return this.runCycle(ticker.mid);
	}

	/** Record an account fill through the position cache's job queue. */
	onOrderFill(fill: OrderFill): void {
		if (fill.symbol !== this.settings.symbol) {
			this.logger.debug({ symbol: fill.symbol }, "Ignoring fill for another symbol");
			return;
		}
		this.positions.enqueueFill({
			symbol: fill.symbol,
			side: fill.side,
			price: fill.price,
			quantity: fill.quantity,
			executedAt: fill.receivedAtMs,
		});
		this.logger.info(
			{
				orderId: fill.orderId,
				side: fill.side,
				price: fill.price.toString(),
				quantity: fill.quantity.toString(),
			},
			"Fill queued",
		);
	}

	/** One full decision cycle, ignoring the interval. */
	async runCycle(price: Decimal): Promise<CycleReport> {
		if (this.busy) throw new Error("OrderingEngine: a cycle is already running");
		this.busy = true;
		try {
			const report = await this.cycle(price);
			this.log(report);
			return report;
		} finally {
			this.busy = false;
		}
	}

	private async cycle(price: Decimal): Promise<CycleReport> {
		const startedAtMs = this.clock.now();
		const report = emptyReport(price, startedAtMs);
		if (!this.indicators.isReady()) return report;
		this.lastCycleAt = startedAtMs;

		const position = await this.positions.getCachedPosition();
		if (this.stopped) return { ...report, outcome: "aborted" };
		const risk = evaluateRisk(price, position.avgPrice, this.settings.risk);
		if (risk.action === "close") {
			const closed = await this.closePosition(position.size);
			return { ...report, outcome: "risk_exit", roi: risk.roi, riskReason: risk.reason, closed };
		}

		const bands = this.indicators.snapshot();
		const scale = calcPositionScale(price, bands.long, bands.short, this.settings.scale);
		const spread = calcDynamicSpread(price, bands.short, this.settings.spread);
		const evaluated = { ...report, roi: risk.roi, scale, spread };

		const cancelled = await this.gateway.cancelAllOrders(this.settings.symbol);
		if (!cancelled.ok) {
			this.logger.error(
				{ code: cancelled.error.code, error: cancelled.error.message },
				"Cancel all failed, skipping ladder",
			);
			return { ...evaluated, outcome: "cancel_failed" };
		}

		const ladder = buildLadder(price, position.avgPrice, bands.short, this.settings.ladder);
		let placedBuys = 0;
		let placedSells = 0;
		let failedOrders = 0;
		for (const order of [...ladder.buys, ...ladder.sells]) {
			if (this.stopped) {
				return {
					...evaluated,
					outcome: "aborted",
					cancelled: cancelled.value,
					placedBuys,
					placedSells,
					failedOrders,
				};
			}
			if (await this.placeLimit(order)) {
				if (order.side === OrderSide.Bid) placedBuys++;
				else placedSells++;
			} else {
				failedOrders++;
			}
		}

		return {
			...evaluated,
			outcome: "placed",
			cancelled: cancelled.value,
			placedBuys,
			placedSells,
			failedOrders,
		};
	}

	private async placeLimit(order: LadderOrder): Promise<boolean> {
		const result = await this.gateway.placeOrder({
			symbol: this.settings.symbol,
			side: order.side,
			orderType: OrderType.Limit,
			price: order.price,
			quantity: order.quantity,
			timeInForce: TimeInForce.GTC,
			postOnly: true,
		});
		if (result.ok) {
			this.logger.debug(
				{ id: result.value.id, side: order.side, price: order.price.toString() },
				"Level placed",
			);
			return true;
		}
		this.logger.warn(
			{
				side: order.side,
				price: order.price.toString(),
				code: result.error.code,
				error: result.error.message,
			},
			"Level rejected",
		);
		return false;
	}

	/** Market sell of the whole holding. */
	private async closePosition(size: Decimal): Promise<boolean> {
		if (!size.isPositive()) {
			this.logger.warn("Risk exit with nothing to sell");
			return false;
		}
		const result = await this.gateway.placeOrder({
			symbol: this.settings.symbol,
			side: OrderSide.Ask,
			orderType: OrderType.Market,
			quantity: size,
			timeInForce: TimeInForce.IOC,
		});
		if (!result.ok) {
			this.logger.error(
				{ size: size.toString(), code: result.error.code, error: result.error.message },
				"Closing order failed",
			);
			return false;
		}
		this.logger.warn({ id: result.value.id, size: size.toString() }, "Position closed at market");
		return true;
	}

	private log(report: CycleReport): void {
		const fields: Record<string, unknown> = {
			outcome: report.outcome,
			price: report.price.toString(),
		};
		if (report.roi !== null) fields["roi"] = report.roi.toNumber();
		if (report.riskReason !== null) fields["reason"] = report.riskReason;
		if (report.scale !== null) fields["scale"] = report.scale.toNumber();
		if (report.spread !== null) {
			fields["askSpread"] = report.spread.ask.toNumber();
			fields["bidSpread"] = report.spread.bid.toNumber();
		}
		if (report.outcome === "placed" || report.outcome === "aborted") {
			fields["cancelled"] = report.cancelled;
			fields["buys"] = report.placedBuys;
			fields["sells"] = report.placedSells;
			fields["failed"] = report.failedOrders;
		}
		if (report.outcome === "deferred") {
			this.logger.debug(fields, "Bands not ready, cycle deferred");
		} else if (report.outcome === "aborted") {
			this.logger.info(fields, "Cycle stopped for shutdown");
		} else {
			this.logger.info(fields, "Cycle complete");
		}
	}
}

function emptyReport(price: Decimal, startedAtMs: number): CycleReport {
	return {
		outcome: "deferred",
		price,
		startedAtMs,
		roi: null,
		riskReason: null,
		closed: false,
		scale: null,
		spread: null,
		cancelled: 0,
		placedBuys: 0,
		placedSells: 0,
		failedOrders: 0,
	};
}
