export type {
	WsClientLike,
	WsCloseHandler,
	WsConfig,
	WsErrorHandler,
	WsHeartbeatHandler,
	WsMessageHandler,
	WsState,
} from "./types.js";
export { WsClient } from "./client.js";
