export { type FeedStats, MarketDataFeed, type MarketDataFeedOptions } from "./market-data-feed.js";
export { type StreamFrame, isDataFrame, parseFrame } from "./messages.js";
export {
	ConnectionState,
	type FeedEvents,
	type OrderFill,
	channels,
	isPrivateChannel,
} from "./types.js";
