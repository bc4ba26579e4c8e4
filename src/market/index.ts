export type { BookTicker, OrderbookDelta, OrderbookLevel, OrderbookSnapshot } from "./types.js";
export {
	EMPTY_BOOK,
	LocalOrderBook,
	applyDelta,
	bestAsk,
	bestBid,
	midPrice,
	spread,
} from "./orderbook.js";
