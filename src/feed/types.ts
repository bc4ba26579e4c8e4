import type { BookTicker, OrderbookDelta, OrderbookSnapshot } from "../market/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import type { OrderSide } from "../shared/market-side.js";

/**
 * Session lifecycle. Any transport error or close returns to `disconnected`.
 */
export const ConnectionState = {
	Disconnected: "disconnected",
	Connecting: "connecting",
	Authenticating: "authenticating",
	Subscribed: "subscribed",
	Live: "live",
} as const;

export type ConnectionState = (typeof ConnectionState)[keyof typeof ConnectionState];

/** An execution on one of the account's orders. */
export interface OrderFill {
	readonly symbol: string;
	readonly orderId: string;
	readonly side: OrderSide;
	readonly price: Decimal;
	readonly quantity: Decimal;
	readonly receivedAtMs: number;
}

export type FeedEvents = {
	bookTicker: (ticker: BookTicker) => void;
	depth: (delta: OrderbookDelta, book: OrderbookSnapshot) => void;
	orderFill: (fill: OrderFill) => void;
	state: (next: ConnectionState, previous: ConnectionState) => void;
	error: (error: TradingError) => void;
};

export const channels = {
	bookTicker: (symbol: string) => `bookTicker.${symbol}`,
	depth: (symbol: string) => `depth.${symbol}`,
	orderUpdate: (symbol: string) => `account.orderUpdate.${symbol}`,
} as const;

/** Account channels need a signed subscription. */
export function isPrivateChannel(channel: string): boolean {
	return channel.startsWith("account.");
}
