import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { silentLogger } from "../lib/logger/index.js";
import { Decimal } from "../shared/decimal.js";
import { LedgerError } from "../shared/errors.js";
import { OrderSide } from "../shared/market-side.js";
import { err, ok } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import { IN_MEMORY } from "./database.js";
import { PositionCache, type PositionStore } from "./position-cache.js";
import { type LedgerFill, PositionLedger } from "./position-ledger.js";

const SYMBOL = "SOL_USDC";

function fill(side: OrderSide, price: string, quantity: string): LedgerFill {
	return { symbol: SYMBOL, side, price: Decimal.from(price), quantity: Decimal.from(quantity) };
}

describe("PositionCache", () => {
	let clock: FakeClock;
	let ledger: PositionLedger;
	let cache: PositionCache;

	beforeEach(() => {
		clock = new FakeClock(10_000);
		const opened = PositionLedger.open({
			path: IN_MEMORY,
			retentionDays: 15,
			logger: silentLogger(),
			clock,
		});
		if (!opened.ok) throw opened.error;
		ledger = opened.value;
		cache = new PositionCache({
			store: ledger,
			symbol: SYMBOL,
			logger: silentLogger(),
			clock,
			refreshIntervalMs: 1_000,
			waitTimeoutMs: 1_000,
		});
	});

	afterEach(() => {
		vi.useRealTimers();
		ledger.close();
	});

	it("applies queued fills in arrival order", () => {
		cache.enqueueFill(fill(OrderSide.Bid, "100", "2"));
		cache.enqueueFill(fill(OrderSide.Ask, "110", "1"));
		cache.enqueueFill(fill(OrderSide.Bid, "90", "1"));

		expect(cache.drain()).toBe(3);

		// 200 -> 100 after selling half -> 190 after buying 1 @ 90
		const cached = cache.peek();
		expect(cached?.size.toString()).toBe("2");
		expect(cached?.avgPrice.toString()).toBe("95");
		expect(cache.pendingJobs()).toBe(0);
	});

	it("drain returns immediately when the queue is empty", () => {
		expect(cache.drain()).toBe(0);
	});

	it("serves a fresh cache without touching the queue", async () => {
		cache.enqueueFill(fill(OrderSide.Bid, "100", "1"));
		cache.drain();
		clock.advance(999);

		const position = await cache.getCachedPosition();

		expect(position.size.toString()).toBe("1");
		expect(cache.pendingJobs()).toBe(0);
	});

	it("queues one refresh for concurrent stale reads", async () => {
		ledger.applyFill(fill(OrderSide.Bid, "50", "4"));

		const first = cache.getCachedPosition();
		const second = cache.getCachedPosition();
		expect(cache.pendingJobs()).toBe(1);

		cache.drain();
		const [a, b] = await Promise.all([first, second]);
		expect(a.size.toString()).toBe("4");
		expect(b.avgPrice.toString()).toBe("50");
	});

	it("refreshes once the cache is older than the interval", async () => {
		cache.enqueueFill(fill(OrderSide.Bid, "100", "1"));
		cache.drain();
		ledger.applyFill(fill(OrderSide.Bid, "100", "1"));
		clock.advance(1_000);

		const pending = cache.getCachedPosition();
		expect(cache.pendingJobs()).toBe(1);
		cache.drain();

		expect((await pending).size.toString()).toBe("2");
	});

	it("answers flat after the wait times out with nothing cached", async () => {
		vi.useFakeTimers();
		const pending = cache.getCachedPosition();

		await vi.advanceTimersByTimeAsync(1_000);
		const position = await pending;

		expect(position.size.isZero()).toBe(true);
		expect(position.avgPrice.isZero()).toBe(true);
	});

	it("answers with the stale value after the wait times out", async () => {
		vi.useFakeTimers();
		cache.enqueueFill(fill(OrderSide.Bid, "20", "3"));
		cache.drain();
		clock.advance(5_000);

		const pending = cache.getCachedPosition();
		await vi.advanceTimersByTimeAsync(1_000);

		expect((await pending).size.toString()).toBe("3");
	});
});

describe("PositionCache with a failing store", () => {
	it("keeps the previous value when a write fails", () => {
		let failWrites = false;
		const store: PositionStore = {
			getPosition: () => ok(null),
			applyFill: (f) =>
				failWrites
					? err(new LedgerError("disk full"))
					: ok({ symbol: f.symbol, size: f.quantity, cost: f.quantity.mul(f.price), updatedAt: 0 }),
		};
		const cache = new PositionCache({
			store,
			symbol: SYMBOL,
			logger: silentLogger(),
			clock: new FakeClock(),
			refreshIntervalMs: 1_000,
			waitTimeoutMs: 1_000,
		});

		cache.enqueueFill(fill(OrderSide.Bid, "10", "1"));
		cache.drain();
		failWrites = true;
		cache.enqueueFill(fill(OrderSide.Bid, "10", "5"));
		cache.drain();

		expect(cache.peek()?.size.toString()).toBe("1");
		expect(cache.pendingJobs()).toBe(0);
	});
});
