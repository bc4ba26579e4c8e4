import type { TradingError } from "../../shared/errors.js";
import type { Result } from "../../shared/result.js";

export interface WsConfig {
	/** ws:// or wss:// endpoint */
	readonly url: string;
	/** Interval between client ping frames. */
	readonly pingIntervalMs: number;
	/** How long to wait for the pong before terminating the socket. */
	readonly pongTimeoutMs: number;
	/** Opening handshake timeout. */
	readonly connectTimeoutMs?: number;
}

/**
 * Socket lifecycle as seen by the transport.
 * Session level states (authenticating, subscribed, live) live in the feed.
 */
export type WsState = "connecting" | "open" | "closed";

export type WsMessageHandler = (data: string) => void;
export type WsCloseHandler = (code: number, reason: string) => void;
export type WsErrorHandler = (error: Error) => void;
/** Fired on every ping or pong frame received from the peer. */
export type WsHeartbeatHandler = () => void;

/**
 * The subset of the transport the market data feed needs.
 * Tests substitute an in-memory stub.
 */
export interface WsClientLike {
	connect(): Promise<void>;
	send(data: string): Result<void, TradingError>;
	/** Local close. Close handlers are not invoked for it. */
	close(): void;
	getState(): WsState;
	onMessage(handler: WsMessageHandler): void;
	onClose(handler: WsCloseHandler): void;
	onError(handler: WsErrorHandler): void;
	onHeartbeat(handler: WsHeartbeatHandler): void;
}
