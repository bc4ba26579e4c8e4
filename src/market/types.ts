import type { Decimal } from "../shared/decimal.js";

export interface OrderbookLevel {
	readonly price: Decimal;
	readonly size: Decimal;
}

/** Bids best-first (descending), asks best-first (ascending). */
export interface OrderbookSnapshot {
	readonly bids: readonly OrderbookLevel[];
	readonly asks: readonly OrderbookLevel[];
	readonly timestampMs: number;
}

/**
 * Changed levels since the previous update. A level with size zero is
 * removed; any other size replaces the level.
 */
export interface OrderbookDelta {
	readonly bids: readonly OrderbookLevel[];
	readonly asks: readonly OrderbookLevel[];
	/** Exchange update ids covered by this delta, when the venue sends them. */
	readonly firstUpdateId?: number;
	readonly lastUpdateId?: number;
}

/** Top of book as pushed on the bookTicker stream. */
export interface BookTicker {
	readonly symbol: string;
	readonly bid: Decimal;
	readonly ask: Decimal;
	readonly bidSize: Decimal;
	readonly askSize: Decimal;
	/** `(bid + ask) / 2` */
	readonly mid: Decimal;
	readonly receivedAtMs: number;
}
