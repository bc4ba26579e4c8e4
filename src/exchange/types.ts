import type { ParsedKlines } from "../indicators/kline.js";
import type { OrderbookSnapshot } from "../market/types.js";
import type { KlineInterval } from "../shared/config.js";
import type { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import type { ClientOrderId, ExchangeOrderId } from "../shared/identifiers.js";
import type { OrderSide } from "../shared/market-side.js";
import type { Result } from "../shared/result.js";

export const OrderType = {
	Limit: "Limit",
	Market: "Market",
} as const;

export type OrderType = (typeof OrderType)[keyof typeof OrderType];

export const TimeInForce = {
	GTC: "GTC",
	IOC: "IOC",
	FOK: "FOK",
} as const;

export type TimeInForce = (typeof TimeInForce)[keyof typeof TimeInForce];

export interface OrderRequest {
	readonly symbol: string;
	readonly side: OrderSide;
	readonly orderType: OrderType;
	readonly quantity: Decimal;
	/** Required for limit orders, ignored for market orders. */
	readonly price?: Decimal;
	readonly timeInForce?: TimeInForce;
	readonly postOnly?: boolean;
	readonly reduceOnly?: boolean;
	readonly clientId?: ClientOrderId;
}

/** An order as the exchange reports it back. */
export interface OrderAck {
	readonly id: ExchangeOrderId;
	readonly clientId: number | null;
	readonly symbol: string;
	readonly side: OrderSide;
	readonly orderType: string;
	readonly status: string;
	readonly price: Decimal | null;
	readonly quantity: Decimal | null;
	readonly executedQuantity: Decimal;
}

export interface Ticker {
	readonly symbol: string;
	readonly lastPrice: Decimal;
	readonly high: Decimal | null;
	readonly low: Decimal | null;
	readonly volume: Decimal | null;
}

export interface AssetBalance {
	readonly available: Decimal;
	readonly locked: Decimal;
	readonly staked: Decimal;
}

/** Keyed by asset symbol, e.g. `SOL` or `USDC`. */
export type Balances = Readonly<Record<string, AssetBalance>>;

export interface FillRecord {
	readonly tradeId: string | null;
	readonly orderId: string;
	readonly symbol: string;
	readonly side: OrderSide;
	readonly price: Decimal;
	readonly quantity: Decimal;
	readonly fee: Decimal | null;
	readonly feeSymbol: string | null;
	readonly isMaker: boolean | null;
	/** Epoch ms, null when the exchange timestamp could not be read. */
	readonly timestampMs: number | null;
}

export interface BorrowLendPosition {
	readonly symbol: string;
	/** Positive when lent, negative when borrowed. */
	readonly netQuantity: Decimal;
	readonly netExposureQuantity: Decimal | null;
}

export interface DepthSnapshot extends OrderbookSnapshot {
	readonly lastUpdateId: number | null;
}

/**
 * Everything the bot needs from the exchange. Every call resolves to a
 * Result; implementations never reject.
 */
export interface ExchangeGateway {
	getTicker(symbol: string): Promise<Result<Ticker, TradingError>>;
	getDepth(symbol: string, limit?: number): Promise<Result<DepthSnapshot, TradingError>>;
	getKlines(
		symbol: string,
		interval: KlineInterval,
		limit: number,
	): Promise<Result<ParsedKlines, TradingError>>;
	placeOrder(order: OrderRequest): Promise<Result<OrderAck, TradingError>>;
	cancelOrder(symbol: string, orderId: ExchangeOrderId): Promise<Result<OrderAck, TradingError>>;
	/** Resolves to the number of orders cancelled. */
	cancelAllOrders(symbol: string): Promise<Result<number, TradingError>>;
	getOpenOrders(symbol: string): Promise<Result<readonly OrderAck[], TradingError>>;
	getBalances(): Promise<Result<Balances, TradingError>>;
	getFillHistory(symbol: string, limit?: number): Promise<Result<readonly FillRecord[], TradingError>>;
	getBorrowLendPositions(): Promise<Result<readonly BorrowLendPosition[], TradingError>>;
}
