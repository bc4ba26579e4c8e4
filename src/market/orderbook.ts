import { Decimal } from "../shared/decimal.js";
import type { OrderbookDelta, OrderbookLevel, OrderbookSnapshot } from "./types.js";

export const EMPTY_BOOK: OrderbookSnapshot = { bids: [], asks: [], timestampMs: 0 };

/**
 * Apply a depth delta and return the new snapshot. Zero-size levels are
 * removed, others inserted or replaced.
 * @example
 * const updated = applyDelta(currentBook, delta, Date.now());
 */
export function applyDelta(
	book: OrderbookSnapshot,
	delta: OrderbookDelta,
	timestampMs: number = book.timestampMs,
): OrderbookSnapshot {
	return {
		bids: mergeLevels(book.bids, delta.bids, "desc"),
		asks: mergeLevels(book.asks, delta.asks, "asc"),
		timestampMs,
	};
}

function mergeLevels(
	existing: readonly OrderbookLevel[],
	updates: readonly OrderbookLevel[],
	direction: "asc" | "desc",
): OrderbookLevel[] {
	const map = new Map<string, OrderbookLevel>();
	for (const lvl of existing) {
		map.set(lvl.price.toString(), lvl);
	}
	for (const lvl of updates) {
		if (lvl.size.isZero()) {
			map.delete(lvl.price.toString());
		} else {
			map.set(lvl.price.toString(), lvl);
		}
	}
	const sorted = [...map.values()];
	sorted.sort((a, b) => (direction === "desc" ? b.price.cmp(a.price) : a.price.cmp(b.price)));
	return sorted;
}

export function bestBid(book: OrderbookSnapshot): Decimal | null {
	return book.bids[0]?.price ?? null;
}

export function bestAsk(book: OrderbookSnapshot): Decimal | null {
	return book.asks[0]?.price ?? null;
}

/** Best ask minus best bid; negative for a crossed book, null if a side is empty. */
export function spread(book: OrderbookSnapshot): Decimal | null {
	const bid = bestBid(book);
	const ask = bestAsk(book);
	if (bid === null || ask === null) return null;
	return ask.sub(bid);
}

export function midPrice(book: OrderbookSnapshot): Decimal | null {
	const bid = bestBid(book);
	const ask = bestAsk(book);
	if (bid === null || ask === null) return null;
	return bid.add(ask).div(Decimal.from(2));
}

/**
 * Mutable holder for the depth stream. Deltas whose last update id is not
 * newer than the one already applied are ignored.
 */
export class LocalOrderBook {
	private book: OrderbookSnapshot = EMPTY_BOOK;
	private lastUpdateId: number | null = null;

	/** @returns false when the delta was stale and skipped */
	apply(delta: OrderbookDelta, timestampMs: number): boolean {
		if (
			delta.lastUpdateId !== undefined &&
			this.lastUpdateId !== null &&
			delta.lastUpdateId <= this.lastUpdateId
		) {
			return false;
		}
		this.book = applyDelta(this.book, delta, timestampMs);
		if (delta.lastUpdateId !== undefined) this.lastUpdateId = delta.lastUpdateId;
		return true;
	}

	snapshot(): OrderbookSnapshot {
		return this.book;
	}

	/**
	 * Replace every level with a REST snapshot. A snapshot older than the last
	 * delta applied is skipped; one without an update id is taken as current.
	 * @returns false when the snapshot was skipped
	 */
	seed(snapshot: OrderbookSnapshot, lastUpdateId: number | null): boolean {
		if (lastUpdateId !== null && this.lastUpdateId !== null && lastUpdateId <= this.lastUpdateId) {
			return false;
		}
		this.book = snapshot;
		if (lastUpdateId !== null) this.lastUpdateId = lastUpdateId;
		return true;
	}

	/** Forget every level, e.g. after a reconnect before the stream is replayed. */
	reset(): void {
		this.book = EMPTY_BOOK;
		this.lastUpdateId = null;
	}

	bestBid(): Decimal | null {
		return bestBid(this.book);
	}

	bestAsk(): Decimal | null {
		return bestAsk(this.book);
	}

	midPrice(): Decimal | null {
		return midPrice(this.book);
	}
}
