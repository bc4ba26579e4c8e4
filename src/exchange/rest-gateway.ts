import type { Credentials } from "../auth/credentials.js";
import { signRequest } from "../auth/signature.js";
import type { SignParams } from "../auth/signature.js";
import { parseKlines } from "../indicators/kline.js";
import type { ParsedKlines } from "../indicators/kline.js";
import { TokenBucketRateLimiter } from "../lib/http/rate-limiter.js";
import type { Logger } from "../lib/logger/index.js";
import type { RetryConfig } from "../lib/retry/index.js";
import { withRetry } from "../lib/retry/index.js";
import { validate, validateJson, z } from "../lib/validation/index.js";
import { KLINE_INTERVAL_SECONDS } from "../shared/config.js";
import type { KlineInterval } from "../shared/config.js";
import {
	AuthError,
	OrderRejectedError,
	RateLimitError,
	classifyError,
	errorFromStatus,
} from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import type { ExchangeOrderId } from "../shared/identifiers.js";
import { err } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import {
	balancesSchema,
	borrowLendSchema,
	cancelAllSchema,
	depthSchema,
	fillListSchema,
	orderListSchema,
	orderSchema,
	tickerSchema,
} from "./schemas.js";
import { OrderType, TimeInForce } from "./types.js";
import type {
	Balances,
	BorrowLendPosition,
	DepthSnapshot,
	ExchangeGateway,
	FillRecord,
	OrderAck,
	OrderRequest,
	Ticker,
} from "./types.js";

/** The part of a fetch Response the gateway reads. */
export interface HttpResponse {
	readonly status: number;
	readonly headers: { get(name: string): string | null };
	text(): Promise<string>;
}

export interface HttpRequestInit {
	readonly method: HttpMethod;
	readonly headers: Record<string, string>;
	readonly body?: string;
	readonly signal?: AbortSignal;
}

/** Global `fetch` satisfies this. */
export type HttpFetch = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

type HttpMethod = "GET" | "POST" | "DELETE";

export interface RestGatewayOptions {
	/** e.g. `https://api.backpack.exchange` */
	readonly baseUrl: string;
	readonly logger: Logger;
	/** Without credentials only public endpoints work. */
	readonly credentials?: Credentials | null;
	readonly signatureWindowMs?: number;
	readonly requestTimeoutMs?: number;
	readonly retry?: Partial<RetryConfig>;
	readonly limiter?: TokenBucketRateLimiter;
	readonly clock?: Clock;
	readonly fetch?: HttpFetch;
	readonly sleep?: (ms: number) => Promise<void>;
}

/** First attempt plus three retries, doubling from one second. */
export const DEFAULT_REST_RETRY: Partial<RetryConfig> = {
	maxAttempts: 4,
	baseDelayMs: 1_000,
	maxDelayMs: 8_000,
	jitterFactor: 0,
};

interface Endpoint<T> {
	readonly method: HttpMethod;
	readonly path: string;
	/** Signed when set. */
	readonly instruction?: string;
	readonly params?: SignParams;
	readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
	readonly label: string;
}

/**
 * Backpack REST API over fetch.
 *
 * Calls are paced by a token bucket and retried with backoff while the error
 * is retryable (network failures, timeouts, 429 and 5xx). Rejections come
 * back on the first attempt. Nothing here throws.
 */
export class RestExchangeGateway implements ExchangeGateway {
	private readonly baseUrl: string;
	private readonly log: Logger;
	private readonly credentials: Credentials | null;
	private readonly windowMs: number;
	private readonly timeoutMs: number;
	private readonly retry: Partial<RetryConfig>;
	private readonly limiter: TokenBucketRateLimiter;
	private readonly clock: Clock;
	private readonly fetch: HttpFetch;
	private readonly sleep: ((ms: number) => Promise<void>) | undefined;

	constructor(options: RestGatewayOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "");
		this.log = options.logger.child({ component: "gateway" });
		this.credentials = options.credentials ?? null;
		this.windowMs = options.signatureWindowMs ?? 5_000;
		this.timeoutMs = options.requestTimeoutMs ?? 10_000;
		this.retry = options.retry ?? DEFAULT_REST_RETRY;
		this.clock = options.clock ?? SystemClock;
		this.sleep = options.sleep;
		this.limiter =
			options.limiter ??
			new TokenBucketRateLimiter({
				capacity: 10,
				refillRate: 5,
				clock: this.clock,
				...(options.sleep ? { sleep: options.sleep } : {}),
			});
		this.fetch = options.fetch ?? fetch;
	}

	getTicker(symbol: string): Promise<Result<Ticker, TradingError>> {
		return this.call({
			method: "GET",
			path: "/api/v1/ticker",
			params: { symbol },
			schema: tickerSchema,
			label: "ticker",
		});
	}

	getDepth(symbol: string, limit?: number): Promise<Result<DepthSnapshot, TradingError>> {
		return this.call({
			method: "GET",
			path: "/api/v1/depth",
			params: limit === undefined ? { symbol } : { symbol, limit },
			schema: depthSchema(this.clock.now()),
			label: "depth",
		});
	}

	/**
	 * The last `limit` closed klines. `startTime` is aligned to the current
	 * minute and reaches back `limit + 1` intervals.
	 */
	async getKlines(
		symbol: string,
		interval: KlineInterval,
		limit: number,
	): Promise<Result<ParsedKlines, TradingError>> {
		const nowSeconds = Math.floor(this.clock.now() / 1_000);
		const startTime = nowSeconds - (nowSeconds % 60) - KLINE_INTERVAL_SECONDS[interval] * (limit + 1);
		const rows = await this.call({
			method: "GET",
			path: "/api/v1/klines",
			params: { symbol, interval, limit: String(limit), startTime: String(startTime) },
			schema: z.unknown(),
			label: "klines",
		});
		if (!rows.ok) return rows;
		return parseKlines(rows.value);
	}

	placeOrder(order: OrderRequest): Promise<Result<OrderAck, TradingError>> {
		const params: Record<string, string | number | boolean> = {
			symbol: order.symbol,
			side: order.side,
			orderType: order.orderType,
			quantity: order.quantity.toString(),
		};
		if (order.orderType === OrderType.Limit) {
			if (order.price === undefined) {
				return Promise.resolve(err(new OrderRejectedError("Limit order requires a price")));
			}
			params["price"] = order.price.toString();
			params["timeInForce"] = order.timeInForce ?? TimeInForce.GTC;
		} else if (order.timeInForce !== undefined) {
			params["timeInForce"] = order.timeInForce;
		}
		if (order.postOnly !== undefined) params["postOnly"] = order.postOnly;
		if (order.reduceOnly !== undefined) params["reduceOnly"] = order.reduceOnly;
		if (order.clientId !== undefined) params["clientId"] = order.clientId;

		return this.call({
			method: "POST",
			path: "/api/v1/order",
			instruction: "orderExecute",
			params,
			schema: orderSchema,
			label: "order",
		});
	}

	cancelOrder(symbol: string, orderId: ExchangeOrderId): Promise<Result<OrderAck, TradingError>> {
		return this.call({
			method: "DELETE",
			path: "/api/v1/order",
			instruction: "orderCancel",
			params: { orderId, symbol },
			schema: orderSchema,
			label: "cancelled order",
		});
	}

	cancelAllOrders(symbol: string): Promise<Result<number, TradingError>> {
		return this.call({
			method: "DELETE",
			path: "/api/v1/orders",
			instruction: "orderCancelAll",
			params: { symbol },
			schema: cancelAllSchema,
			label: "cancelled orders",
		});
	}

	getOpenOrders(symbol: string): Promise<Result<readonly OrderAck[], TradingError>> {
		return this.call({
			method: "GET",
			path: "/api/v1/orders",
			instruction: "orderQueryAll",
			params: { symbol },
			schema: orderListSchema,
			label: "open orders",
		});
	}

	getBalances(): Promise<Result<Balances, TradingError>> {
		return this.call({
			method: "GET",
			path: "/api/v1/capital",
			instruction: "balanceQuery",
			schema: balancesSchema,
			label: "balances",
		});
	}

	getFillHistory(symbol: string, limit = 100): Promise<Result<readonly FillRecord[], TradingError>> {
		return this.call({
			method: "GET",
			path: "/wapi/v1/history/fills",
			instruction: "fillHistoryQueryAll",
			params: { limit, symbol },
			schema: fillListSchema,
			label: "fills",
		});
	}

	getBorrowLendPositions(): Promise<Result<readonly BorrowLendPosition[], TradingError>> {
		return this.call({
			method: "GET",
			path: "/api/v1/borrowLend/positions",
			instruction: "borrowLendPositionQuery",
			schema: borrowLendSchema,
			label: "borrow/lend positions",
		});
	}

	private call<T>(endpoint: Endpoint<T>): Promise<Result<T, TradingError>> {
		return withRetry(() => this.send(endpoint), this.retry, {
			...(this.sleep ? { sleep: this.sleep } : {}),
			onRetry: (attempt, delayMs, error) => {
				this.log.warn(
					{ path: endpoint.path, attempt, delayMs, code: error.code, error: error.message },
					"Retrying request",
				);
			},
		});
	}

	private async send<T>(endpoint: Endpoint<T>): Promise<Result<T, TradingError>> {
		const { method, path, instruction, params } = endpoint;
		const headers: Record<string, string> = { "Content-Type": "application/json; charset=utf-8" };

		if (instruction !== undefined) {
			if (this.credentials === null) {
				return err(new AuthError(`${instruction} requires API credentials`, { path }));
			}
			try {
				Object.assign(
					headers,
					signRequest(this.credentials, instruction, params ?? {}, this.clock.now(), this.windowMs),
				);
			} catch (e) {
				return err(classifyError(e));
			}
		}

		let url = `${this.baseUrl}${path}`;
		let body: string | undefined;
		if (params !== undefined) {
			if (method === "GET") {
				url += `?${toQuery(params)}`;
			} else {
				body = JSON.stringify(params);
			}
		}

		await this.limiter.acquire();
		let status: number;
		let text: string;
		let retryAfter: string | null;
		try {
			const response = await this.fetch(url, {
				method,
				headers,
				...(body === undefined ? {} : { body }),
				signal: AbortSignal.timeout(this.timeoutMs),
			});
			status = response.status;
			retryAfter = response.headers.get("Retry-After");
			text = await response.text();
		} catch (e) {
			return err(classifyError(e));
		}

		this.log.debug({ method, path, status }, "Response");
		if (status < 200 || status >= 300) {
			return err(statusError(status, `${method} ${path} returned ${status}`, text, retryAfter));
		}
		if (text.trim().length === 0) return validate(endpoint.schema, null, endpoint.label);
		return validateJson(endpoint.schema, text, endpoint.label);
	}
}

function toQuery(params: SignParams): string {
	const search = new URLSearchParams();
	for (const [key, value] of Object.entries(params)) search.append(key, String(value));
	return search.toString();
}

function statusError(
	status: number,
	message: string,
	body: string,
	retryAfter: string | null,
): TradingError {
	const context = { body: body.slice(0, 200) };
	if (status === 429 && retryAfter !== null) {
		const seconds = Number(retryAfter);
		if (Number.isFinite(seconds) && seconds >= 0) {
			return new RateLimitError(message, seconds * 1_000, { ...context, status });
		}
	}
	return errorFromStatus(status, message, context);
}
