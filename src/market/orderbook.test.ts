import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import {
	LocalOrderBook,
	applyDelta,
	bestAsk,
	bestBid,
	midPrice,
	spread,
} from "./orderbook.js";
import type { OrderbookLevel, OrderbookSnapshot } from "./types.js";

function level(price: string, size: string): OrderbookLevel {
	return { price: Decimal.from(price), size: Decimal.from(size) };
}

function emptyBook(timestampMs = 0): OrderbookSnapshot {
	return { bids: [], asks: [], timestampMs };
}

describe("orderbook", () => {
	describe("applyDelta", () => {
		it("adds new bid levels to an empty book", () => {
			const book = emptyBook();
			const delta = { bids: [level("142.50", "100"), level("142.45", "200")], asks: [] };

			const result = applyDelta(book, delta);

			expect(result.bids).toHaveLength(2);
			expect(result.bids[0]?.price.toString()).toBe("142.5");
			expect(result.bids[0]?.size.toString()).toBe("100");
		});

		it("adds new ask levels to an empty book", () => {
			const book = emptyBook();
			const delta = { bids: [], asks: [level("142.55", "150"), level("142.60", "300")] };

			const result = applyDelta(book, delta);

			expect(result.asks).toHaveLength(2);
			expect(result.asks[0]?.price.toString()).toBe("142.55");
			expect(result.asks[0]?.size.toString()).toBe("150");
		});

		it("removes a level when delta size is zero", () => {
			const book: OrderbookSnapshot = {
				bids: [level("142.50", "100")],
				asks: [],
				timestampMs: 0,
			};
			const delta = { bids: [level("142.50", "0")], asks: [] };

			const result = applyDelta(book, delta);

			expect(result.bids).toHaveLength(0);
		});

		it("updates existing level size at same price", () => {
			const book: OrderbookSnapshot = {
				bids: [level("142.50", "100")],
				asks: [],
				timestampMs: 0,
			};
			const delta = { bids: [level("142.50", "250")], asks: [] };

			const result = applyDelta(book, delta);

			expect(result.bids).toHaveLength(1);
			expect(result.bids[0]?.size.toString()).toBe("250");
		});

		it("maintains bids sorted descending by price", () => {
			const book = emptyBook();
			const delta = {
				bids: [level("142.30", "10"), level("142.50", "20"), level("142.40", "30")],
				asks: [],
			};

			const result = applyDelta(book, delta);

			expect(result.bids.map((l) => l.price.toString())).toEqual(["142.5", "142.4", "142.3"]);
		});

		it("maintains asks sorted ascending by price", () => {
			const book = emptyBook();
			const delta = {
				bids: [],
				asks: [level("142.70", "10"), level("142.55", "20"), level("142.60", "30")],
			};

			const result = applyDelta(book, delta);

			expect(result.asks.map((l) => l.price.toString())).toEqual(["142.55", "142.6", "142.7"]);
		});
	});

	describe("bestBid", () => {
		it("returns highest bid price", () => {
			const book: OrderbookSnapshot = {
				bids: [level("142.50", "100"), level("142.45", "200")],
				asks: [],
				timestampMs: 0,
			};

			const result = bestBid(book);

			expect(result).not.toBeNull();
			expect(result?.toString()).toBe("142.5");
		});

		it("returns null for empty book", () => {
			expect(bestBid(emptyBook())).toBeNull();
		});
	});

	describe("bestAsk", () => {
		it("returns lowest ask price", () => {
			const book: OrderbookSnapshot = {
				bids: [],
				asks: [level("142.55", "100"), level("142.60", "200")],
				timestampMs: 0,
			};

			const result = bestAsk(book);

			expect(result).not.toBeNull();
			expect(result?.toString()).toBe("142.55");
		});
	});

	describe("spread", () => {
		it("returns bestAsk minus bestBid", () => {
			const book: OrderbookSnapshot = {
				bids: [level("142.48", "100")],
				asks: [level("142.52", "100")],
				timestampMs: 0,
			};

			const result = spread(book);

			expect(result).not.toBeNull();
			expect(result?.toString()).toBe("0.04");
		});

		it("returns null when either side is empty", () => {
			expect(spread(emptyBook())).toBeNull();
			expect(spread({ bids: [level("142.50", "100")], asks: [], timestampMs: 0 })).toBeNull();
			expect(spread({ bids: [], asks: [level("142.55", "100")], timestampMs: 0 })).toBeNull();
		});
	});

	describe("midPrice", () => {
		it("returns average of bestBid and bestAsk", () => {
			const book: OrderbookSnapshot = {
				bids: [level("142.48", "100")],
				asks: [level("142.52", "100")],
				timestampMs: 0,
			};

			const result = midPrice(book);

			expect(result).not.toBeNull();
			expect(result?.toString()).toBe("142.5");
		});
	});

	describe("crossed book", () => {
		it("spread returns negative when bestBid > bestAsk", () => {
			const book: OrderbookSnapshot = {
				bids: [level("142.55", "100")],
				asks: [level("142.50", "100")],
				timestampMs: 0,
			};

			const result = spread(book);
			expect(result).not.toBeNull();
			expect(result?.isNegative()).toBe(true);
			expect(result?.toString()).toBe("-0.05");
		});
	});
});

describe("applyDelta timestamps", () => {
	it("stamps the new snapshot when a time is given", () => {
		const result = applyDelta(emptyBook(5), { bids: [level("10", "1")], asks: [] }, 9);
		expect(result.timestampMs).toBe(9);
	});

	it("keeps the previous stamp otherwise", () => {
		const result = applyDelta(emptyBook(5), { bids: [], asks: [] });
		expect(result.timestampMs).toBe(5);
	});
});

describe("LocalOrderBook", () => {
	it("accumulates deltas and exposes the top of book", () => {
		const book = new LocalOrderBook();
		book.apply({ bids: [level("99.5", "3"), level("99.4", "1")], asks: [level("100.5", "2")] }, 1);
		book.apply({ bids: [level("99.5", "0")], asks: [level("100.25", "4")] }, 2);

		expect(book.bestBid()?.toString()).toBe("99.4");
		expect(book.bestAsk()?.toString()).toBe("100.25");
		expect(book.midPrice()?.toString()).toBe("99.825");
		expect(book.snapshot().timestampMs).toBe(2);
	});

	it("skips deltas that are not newer than the last applied update", () => {
		const book = new LocalOrderBook();
		expect(book.apply({ bids: [level("10", "1")], asks: [], firstUpdateId: 1, lastUpdateId: 5 }, 1)).toBe(
			true,
		);
		expect(book.apply({ bids: [level("10", "0")], asks: [], firstUpdateId: 4, lastUpdateId: 5 }, 2)).toBe(
			false,
		);
		expect(book.bestBid()?.toString()).toBe("10");
	});

	it("reset empties the book and forgets update ids", () => {
		const book = new LocalOrderBook();
		book.apply({ bids: [level("10", "1")], asks: [], lastUpdateId: 9 }, 1);
		book.reset();

		expect(book.bestBid()).toBeNull();
		expect(book.apply({ bids: [], asks: [level("11", "1")], lastUpdateId: 2 }, 2)).toBe(true);
		expect(book.midPrice()).toBeNull();
	});

	it("seeds from a snapshot and layers newer deltas on top", () => {
		const book = new LocalOrderBook();
		const seeded = book.seed(
			{ bids: [level("99.9", "4"), level("99.8", "6")], asks: [level("100.1", "3")], timestampMs: 5 },
			40,
		);
		expect(seeded).toBe(true);

		expect(book.apply({ bids: [level("99.9", "0")], asks: [], lastUpdateId: 40 }, 6)).toBe(false);
		expect(book.apply({ bids: [level("99.9", "0")], asks: [], lastUpdateId: 41 }, 7)).toBe(true);
		expect(book.bestBid()?.toString()).toBe("99.8");
		expect(book.bestAsk()?.toString()).toBe("100.1");
	});

	it("keeps the stream's book over an older snapshot", () => {
		const book = new LocalOrderBook();
		book.apply({ bids: [level("10", "1")], asks: [], lastUpdateId: 50 }, 1);

		expect(book.seed({ bids: [level("9", "1")], asks: [], timestampMs: 2 }, 49)).toBe(false);
		expect(book.bestBid()?.toString()).toBe("10");
	});
});
