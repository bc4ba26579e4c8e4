import { describe, expect, it } from "vitest";
import { createBot } from "./bot.js";
import type { HttpFetch } from "./exchange/rest-gateway.js";
import { silentLogger } from "./lib/logger/index.js";
import { loadConfig } from "./shared/config.js";
import { StubWsClient } from "./testing/stub-ws-client.js";

const KLINES = [
	{ start: "2024-01-01 00:10:00", close: "101" },
	{ start: "2024-01-01 00:00:00", close: "99" },
	{ start: "2024-01-01 00:05:00", close: "100" },
];

function routedFetch(): { fetch: HttpFetch; requests: string[] } {
	const requests: string[] = [];
	const fetch: HttpFetch = async (url, init) => {
		const path = new URL(url).pathname;
		requests.push(`${init.method} ${path}`);
		let body: unknown = null;
		if (path === "/api/v1/klines") body = KLINES;
		if (path === "/api/v1/depth") body = { bids: [["99.9", "4"]], asks: [["100.1", "3"]], lastUpdateId: "12" };
		if (path === "/api/v1/orders" && init.method === "DELETE") body = [];
		return { status: 200, headers: { get: () => null }, text: async () => JSON.stringify(body) };
	};
	return { fetch, requests };
}

const config = loadConfig({ dbPath: ":memory:", longPeriod: 3, shortPeriod: 3 }, {});

describe("createBot", () => {
	it("starts on fetched klines and cancels orders on shutdown", async () => {
		const { fetch, requests } = routedFetch();
		const client = new StubWsClient();
		const bot = createBot(config, { apiKey: "test-key", secret: "test-secret" }, {
			logger: silentLogger(),
			client,
			fetch,
		});
		if (!bot.ok) throw bot.error;
		const { scheduler, feed, indicators } = bot.value;

		await scheduler.start();
		expect(indicators.isReady()).toBe(true);
		expect(indicators.snapshot().short.middle.toString()).toBe("100");
		expect(feed.subscriptions()).toEqual([
			"bookTicker.SOL_USDC",
			"depth.SOL_USDC",
			"account.orderUpdate.SOL_USDC",
		]);

		await scheduler.stop();
		expect([...requests].sort()).toEqual([
			"DELETE /api/v1/orders",
			"GET /api/v1/depth",
			"GET /api/v1/klines",
			"GET /api/v1/klines",
		]);
		expect(requests[requests.length - 1]).toBe("DELETE /api/v1/orders");
		expect(feed.getState()).toBe("disconnected");
	});

	it("streams public channels only without API keys", async () => {
		const { fetch, requests } = routedFetch();
		const bot = createBot(config, null, { logger: silentLogger(), client: new StubWsClient(), fetch });
		if (!bot.ok) throw bot.error;

		await bot.value.scheduler.start();
		expect(bot.value.feed.subscriptions()).toEqual(["bookTicker.SOL_USDC", "depth.SOL_USDC"]);

		await bot.value.scheduler.stop();
		// the unsigned shutdown cancel never reaches the network
		expect([...requests].sort()).toEqual(["GET /api/v1/depth", "GET /api/v1/klines", "GET /api/v1/klines"]);
	});

	it("reports a ledger that cannot be opened", () => {
		const bot = createBot({ ...config, dbPath: "/dev/null/positions.db" }, null, {
			logger: silentLogger(),
			client: new StubWsClient(),
		});
		expect(bot.ok).toBe(false);
		if (!bot.ok) expect(bot.error.code).toBe("LEDGER_ERROR");
	});
});
