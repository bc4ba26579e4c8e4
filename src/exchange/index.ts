export { DEFAULT_REST_RETRY, RestExchangeGateway } from "./rest-gateway.js";
export type { HttpFetch, HttpRequestInit, HttpResponse, RestGatewayOptions } from "./rest-gateway.js";
export { OrderType, TimeInForce } from "./types.js";
export type {
	AssetBalance,
	Balances,
	BorrowLendPosition,
	DepthSnapshot,
	ExchangeGateway,
	FillRecord,
	OrderAck,
	OrderRequest,
	Ticker,
} from "./types.js";
