import WebSocket from "ws";
import { NetworkError } from "../../shared/errors.js";
import type { TradingError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";
import type {
	WsClientLike,
	WsCloseHandler,
	WsConfig,
	WsErrorHandler,
	WsHeartbeatHandler,
	WsMessageHandler,
	WsState,
} from "./types.js";

/**
 * `ws` transport with ping/pong keepalive.
 *
 * One instance is reused across reconnects: `close()` followed by
 * `connect()` opens a fresh socket, and events from a socket that has been
 * replaced are ignored. Send failures come back as Result values.
 */
export class WsClient implements WsClientLike {
	private readonly config: WsConfig;
	private ws: WebSocket | null = null;
	private state: WsState = "closed";
	private abortConnect: ((error: Error) => void) | null = null;
	private readonly messageHandlers: WsMessageHandler[] = [];
	private readonly closeHandlers: WsCloseHandler[] = [];
	private readonly errorHandlers: WsErrorHandler[] = [];
	private readonly heartbeatHandlers: WsHeartbeatHandler[] = [];
	private pingTimer: ReturnType<typeof setInterval> | null = null;
	private pongTimer: ReturnType<typeof setTimeout> | null = null;

	constructor(config: WsConfig) {
		this.config = config;
	}

	/** Open a new socket. Rejects with NetworkError if one is already connecting or open. */
	connect(): Promise<void> {
		if (this.state !== "closed") {
			return Promise.reject(new NetworkError("WebSocket is already connecting or open"));
		}
		return new Promise<void>((resolve, reject) => {
			this.state = "connecting";
			this.abortConnect = reject;
			const socket = new WebSocket(this.config.url, {
				handshakeTimeout: this.config.connectTimeoutMs ?? 10_000,
			});
			this.ws = socket;
			const current = (): boolean => this.ws === socket;

			socket.on("open", () => {
				if (!current()) return;
				this.state = "open";
				this.abortConnect = null;
				this.startPing(socket);
				resolve();
			});

			socket.on("message", (data) => {
				if (!current()) return;
				const text = data.toString();
				for (const handler of this.messageHandlers) handler(text);
			});

			socket.on("ping", () => {
				if (current()) this.notifyHeartbeat();
			});

			socket.on("pong", () => {
				if (!current()) return;
				this.clearPongTimeout();
				this.notifyHeartbeat();
			});

			socket.on("close", (code, reason) => {
				if (!current()) return;
				const wasConnecting = this.state === "connecting";
				this.release();
				if (wasConnecting) {
					reject(new NetworkError("WebSocket closed during handshake", { code }));
					return;
				}
				for (const handler of this.closeHandlers) handler(code, reason.toString());
			});

			socket.on("error", (error) => {
				if (!current()) return;
				for (const handler of this.errorHandlers) handler(error);
				if (this.state === "connecting") {
					this.release();
					socket.terminate();
					reject(new NetworkError("WebSocket connection failed", { cause: error }));
				}
			});
		});
	}

	send(data: string): Result<void, TradingError> {
		if (this.state !== "open" || this.ws === null) {
			return err(new NetworkError("WebSocket is not connected"));
		}
		try {
			this.ws.send(data);
			return ok(undefined);
		} catch (error) {
			return err(new NetworkError("WebSocket send failed", { cause: error }));
		}
	}

	/** Close the current socket. A pending `connect()` rejects. */
	close(): void {
		const socket = this.ws;
		if (socket === null) return;
		const abort = this.abortConnect;
		this.release();
		socket.close(1000, "client close");
		abort?.(new NetworkError("WebSocket closed before the connection was established"));
	}

	getState(): WsState {
		return this.state;
	}

	onMessage(handler: WsMessageHandler): void {
		this.messageHandlers.push(handler);
	}

	onClose(handler: WsCloseHandler): void {
		this.closeHandlers.push(handler);
	}

	onError(handler: WsErrorHandler): void {
		this.errorHandlers.push(handler);
	}

	onHeartbeat(handler: WsHeartbeatHandler): void {
		this.heartbeatHandlers.push(handler);
	}

	private notifyHeartbeat(): void {
		for (const handler of this.heartbeatHandlers) handler();
	}

	private release(): void {
		this.state = "closed";
		this.ws = null;
		this.abortConnect = null;
		this.clearTimers();
	}

	private startPing(socket: WebSocket): void {
		this.pingTimer = setInterval(() => {
			if (this.ws !== socket || this.state !== "open") return;
			socket.ping();
			if (this.pongTimer !== null) return;
			this.pongTimer = setTimeout(() => {
				this.pongTimer = null;
				if (this.ws === socket) socket.terminate();
			}, this.config.pongTimeoutMs);
		}, this.config.pingIntervalMs);
	}

	private clearTimers(): void {
		if (this.pingTimer !== null) {
			clearInterval(this.pingTimer);
			this.pingTimer = null;
		}
		this.clearPongTimeout();
	}

	private clearPongTimeout(): void {
		if (this.pongTimer !== null) {
			clearTimeout(this.pongTimer);
			this.pongTimer = null;
		}
	}
}
