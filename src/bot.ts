import { type Credentials, createCredentials } from "./auth/credentials.js";
import type { ApiKeySet } from "./auth/types.js";
import { type HttpFetch, RestExchangeGateway } from "./exchange/rest-gateway.js";
import { MarketDataFeed } from "./feed/market-data-feed.js";
import { IndicatorEngine } from "./indicators/indicator-engine.js";
import { PositionCache } from "./ledger/position-cache.js";
import { PositionLedger } from "./ledger/position-ledger.js";
import type { Logger } from "./lib/logger/index.js";
import { WsClient } from "./lib/websocket/client.js";
import type { WsClientLike } from "./lib/websocket/types.js";
import { Scheduler } from "./scheduler/scheduler.js";
import type { BotConfig } from "./shared/config.js";
import type { LedgerError } from "./shared/errors.js";
import { type Result, ok } from "./shared/result.js";
import { type Clock, Duration, SystemClock } from "./shared/time.js";
import { OrderingEngine } from "./strategy/ordering-engine.js";
import { strategySettings } from "./strategy/settings.js";

export interface BotDeps {
	readonly logger: Logger;
	/** Stream transport; a `ws` client on `config.wsUrl` by default. */
	readonly client?: WsClientLike;
	readonly fetch?: HttpFetch;
	readonly clock?: Clock;
}

export interface Bot {
	readonly scheduler: Scheduler;
	readonly gateway: RestExchangeGateway;
	readonly feed: MarketDataFeed;
	readonly indicators: IndicatorEngine;
	readonly positions: PositionCache;
	readonly engine: OrderingEngine;
	readonly ledger: PositionLedger;
}

/**
 * Build every component from one configuration. Nothing connects until
 * `scheduler.start()`.
 *
 * Without API keys the bot still streams public data and computes cycles,
 * but every signed request fails with an AuthError.
 */
export function createBot(
	config: BotConfig,
	keys: ApiKeySet | null,
	deps: BotDeps,
): Result<Bot, LedgerError> {
	const { logger } = deps;
	const clock = deps.clock ?? SystemClock;
	const credentials: Credentials | null = keys === null ? null : createCredentials(keys);

	const opened = PositionLedger.open({
		path: config.dbPath,
		retentionDays: config.tradeRetentionDays,
		logger: logger.child({ component: "ledger" }),
		clock,
	});
	if (!opened.ok) return opened;
	const ledger = opened.value;

	const gateway = new RestExchangeGateway({
		baseUrl: config.restUrl,
		logger,
		credentials,
		signatureWindowMs: config.signatureWindowMs,
		requestTimeoutMs: config.requestTimeoutMs,
		clock,
		fetch: deps.fetch,
	});

	const client =
		deps.client ??
		new WsClient({
			url: config.wsUrl,
			pingIntervalMs: Duration.seconds(15),
			pongTimeoutMs: Duration.seconds(10),
		});
	const feed = new MarketDataFeed({
		client,
		logger: logger.child({ component: "feed" }),
		credentials,
		signatureWindowMs: config.signatureWindowMs,
		heartbeatTimeoutMs: config.heartbeatTimeoutMs,
		heartbeatCheckMs: config.heartbeatCheckMs,
		connectAttempts: config.connectAttempts,
		clock,
	});

	const indicators = new IndicatorEngine(config, clock);
	const positions = new PositionCache({
		store: ledger,
		symbol: config.symbol,
		logger: logger.child({ component: "positions" }),
		clock,
		refreshIntervalMs: config.positionRefreshMs,
		waitTimeoutMs: config.positionWaitMs,
	});
	const engine = new OrderingEngine({
		settings: strategySettings(config),
		gateway,
		indicators,
		positions,
		logger,
		clock,
	});
	const scheduler = new Scheduler({
		settings: config,
		feed,
		gateway,
		indicators,
		engine,
		positions,
		ledger,
		account: credentials !== null,
		logger,
		clock,
	});

	return ok({ scheduler, gateway, feed, indicators, positions, engine, ledger });
}
