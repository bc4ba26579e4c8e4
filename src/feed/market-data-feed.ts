import type { Credentials } from "../auth/credentials.js";
import { signStreamSubscription } from "../auth/signature.js";
import type { StreamSignature } from "../auth/types.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { type RetryConfig, RetryPolicy } from "../lib/retry/index.js";
import type { WsClientLike } from "../lib/websocket/types.js";
import { LocalOrderBook } from "../market/orderbook.js";
import type { OrderbookSnapshot } from "../market/types.js";
import {
	AuthError,
	ExchangeError,
	SystemError,
	type TradingError,
	classifyError,
} from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock, sleep as realSleep } from "../shared/time.js";
import { type StreamFrame, isDataFrame, parseFrame } from "./messages.js";
import { ConnectionState, type FeedEvents, isPrivateChannel } from "./types.js";

export interface MarketDataFeedOptions {
	readonly client: WsClientLike;
	readonly logger: Logger;
	/** Required for `account.*` channels. */
	readonly credentials?: Credentials | null;
	readonly signatureWindowMs: number;
	/** Silence longer than this in `subscribed`/`live` forces a reconnect. */
	readonly heartbeatTimeoutMs: number;
	readonly heartbeatCheckMs: number;
	/** Attempts for the initial connection before `start()` gives up. */
	readonly connectAttempts: number;
	readonly reconnect?: Partial<RetryConfig>;
	readonly clock?: Clock;
	readonly random?: () => number;
	readonly sleep?: (ms: number) => Promise<void>;
}

export interface FeedStats {
	readonly droppedFrames: number;
	readonly reconnects: number;
}

const SESSION_STATES: ReadonlySet<ConnectionState> = new Set([
	ConnectionState.Subscribed,
	ConnectionState.Live,
]);

/**
 * Streaming market data session.
 *
 * Owns the socket lifecycle (connect, sign, replay subscriptions, go live),
 * watches for silence, and reconnects with backoff whenever the session drops
 * while the feed is running. Parsed frames are published as typed events.
 *
 * ```
 * disconnected -> connecting -> authenticating -> subscribed -> live
 *       ^______________________________________________________|
 * ```
 */
export class MarketDataFeed extends TypedEmitter<FeedEvents> {
	private readonly client: WsClientLike;
	private readonly logger: Logger;
	private readonly credentials: Credentials | null;
	private readonly signatureWindowMs: number;
	private readonly heartbeatTimeoutMs: number;
	private readonly heartbeatCheckMs: number;
	private readonly connectAttempts: number;
	private readonly clock: Clock;
	private readonly sleep: (ms: number) => Promise<void>;
	private readonly policy: RetryPolicy;
	private readonly channels = new Set<string>();
	private readonly book = new LocalOrderBook();

	private state: ConnectionState = ConnectionState.Disconnected;
	private running = false;
	private session = 0;
	private lastHeartbeatAt = 0;
	private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
	private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
	private droppedFrames = 0;
	private reconnects = 0;

	constructor(options: MarketDataFeedOptions) {
		super();
		this.client = options.client;
		this.logger = options.logger;
		this.credentials = options.credentials ?? null;
		this.signatureWindowMs = options.signatureWindowMs;
		this.heartbeatTimeoutMs = options.heartbeatTimeoutMs;
		this.heartbeatCheckMs = options.heartbeatCheckMs;
		this.connectAttempts = options.connectAttempts;
		this.clock = options.clock ?? SystemClock;
		this.sleep = options.sleep ?? realSleep;
		this.policy = new RetryPolicy(
			{ maxAttempts: options.connectAttempts, ...options.reconnect },
			options.random,
		);

		this.client.onMessage((data) => this.handleFrame(data));
		this.client.onHeartbeat(() => this.touch());
		this.client.onClose((code, reason) => this.handleClose(code, reason));
		this.client.onError((error) => this.handleTransportError(error));
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	/**
	 * Open the first session. Retries up to `connectAttempts` times.
	 * @throws SystemError when every attempt fails
	 */
	async start(): Promise<void> {
		if (this.running) return;
		this.running = true;
		this.policy.reset();

		let lastError: TradingError | null = null;
		for (let attempt = 1; attempt <= this.connectAttempts; attempt++) {
			const opened = await this.openSession();
			if (opened.ok) {
				this.startHeartbeatSupervisor();
				return;
			}
			lastError = opened.error;
			if (!this.running) break;
			this.logger.warn({ attempt, err: opened.error.message }, "Market data connect failed");
			if (attempt < this.connectAttempts) {
				await this.sleep(this.policy.nextDelay(opened.error));
			}
		}

		const stoppedEarly = !this.running;
		this.running = false;
		throw new SystemError(
			stoppedEarly
				? "Market data feed stopped during start"
				: `Market data connection failed after ${this.connectAttempts} attempts`,
			{ cause: lastError },
		);
	}

	/** Disable reconnects, stop the supervisor and close the socket. */
	stop(): void {
		this.running = false;
		this.session += 1;
		if (this.reconnectTimer !== null) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = null;
		}
		if (this.heartbeatTimer !== null) {
			clearInterval(this.heartbeatTimer);
			this.heartbeatTimer = null;
		}
		this.client.close();
		this.book.reset();
		this.setState(ConnectionState.Disconnected);
	}

	// ── Subscriptions ──────────────────────────────────────────────

	/**
	 * Add a channel to the subscription set. Sent immediately when a session
	 * is up, otherwise on the next (re)connect. Subscribing twice is a no-op.
	 */
	subscribe(channel: string): Result<void, TradingError> {
		if (isPrivateChannel(channel) && this.credentials === null) {
			return err(new AuthError(`Credentials required to subscribe to ${channel}`));
		}
		if (this.channels.has(channel)) return ok(undefined);
		this.channels.add(channel);
		if (!SESSION_STATES.has(this.state)) return ok(undefined);

		const signature = isPrivateChannel(channel) ? this.sign() : ok(null);
		if (!signature.ok) return signature;
		return this.sendSubscribe(channel, signature.value);
	}

	unsubscribe(channel: string): Result<void, TradingError> {
		if (!this.channels.delete(channel)) return ok(undefined);
		if (!SESSION_STATES.has(this.state)) return ok(undefined);
		return this.client.send(JSON.stringify({ method: "UNSUBSCRIBE", params: [channel] }));
	}

	// ── Queries ────────────────────────────────────────────────────

	getState(): ConnectionState {
		return this.state;
	}

	isLive(): boolean {
		return this.state === ConnectionState.Live;
	}

	subscriptions(): readonly string[] {
		return [...this.channels];
	}

	/**
	 * Local depth book for this session: the last seeded snapshot plus every
	 * delta since. Emptied on each (re)connect until seeded again.
	 */
	orderBook(): OrderbookSnapshot {
		return this.book.snapshot();
	}

	/** Load a REST depth snapshot into the local book; ignored while disconnected. */
	seedOrderBook(snapshot: OrderbookSnapshot, lastUpdateId: number | null): boolean {
		if (this.state === ConnectionState.Disconnected) return false;
		return this.book.seed(snapshot, lastUpdateId);
	}

	lastHeartbeatMs(): number {
		return this.lastHeartbeatAt;
	}

	stats(): FeedStats {
		return { droppedFrames: this.droppedFrames, reconnects: this.reconnects };
	}

	// ── Heartbeat ──────────────────────────────────────────────────

	/**
	 * Force a reconnect when the session has been silent for longer than the
	 * heartbeat timeout. Dropping the session moves the state to
	 * `disconnected`, so one silence episode triggers one reconnect.
	 * @returns true when a reconnect was started
	 */
	checkHeartbeat(): boolean {
		if (!this.running || !SESSION_STATES.has(this.state)) return false;
		const silenceMs = this.clock.now() - this.lastHeartbeatAt;
		if (silenceMs <= this.heartbeatTimeoutMs) return false;

		this.logger.warn({ silenceMs, state: this.state }, "Market data stale, reconnecting");
		this.client.close();
		this.dropSession();
		return true;
	}

	private startHeartbeatSupervisor(): void {
		if (this.heartbeatTimer !== null) return;
		this.heartbeatTimer = setInterval(() => this.checkHeartbeat(), this.heartbeatCheckMs);
	}

	private touch(): void {
		this.lastHeartbeatAt = this.clock.now();
	}

	// ── Session ────────────────────────────────────────────────────

	private async openSession(): Promise<Result<void, TradingError>> {
		this.session += 1;
		const session = this.session;
		this.setState(ConnectionState.Connecting);
		try {
			await this.client.connect();
		} catch (error) {
			if (session === this.session) this.setState(ConnectionState.Disconnected);
			return err(classifyError(error));
		}
		if (session !== this.session || !this.running) {
			this.client.close();
			return err(new SystemError("Market data feed stopped while connecting"));
		}

		this.setState(ConnectionState.Authenticating);
		const signature = this.sign();
		if (!signature.ok) return this.abortSession(signature.error);

		for (const channel of this.channels) {
			const sent = this.sendSubscribe(channel, signature.value);
			if (!sent.ok) return this.abortSession(sent.error);
		}

		this.touch();
		this.book.reset();
		this.setState(ConnectionState.Subscribed);
		this.logger.info({ channels: this.channels.size }, "Market data subscribed");
		return ok(undefined);
	}

	private abortSession(error: TradingError): Result<never, TradingError> {
		this.client.close();
		this.setState(ConnectionState.Disconnected);
		return err(error);
	}

	private dropSession(): void {
		if (this.state === ConnectionState.Disconnected) return;
		this.book.reset();
		this.setState(ConnectionState.Disconnected);
		if (this.running) this.scheduleReconnect();
	}

	/** Reconnects continue for as long as the feed runs; the delay is capped by the policy. */
	private scheduleReconnect(): void {
		if (this.reconnectTimer !== null || !this.running) return;
		const delayMs = this.policy.nextDelay();
		this.logger.info({ delayMs, attempt: this.policy.attempts }, "Market data reconnect scheduled");
		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = null;
			void this.reconnect();
		}, delayMs);
	}

	private async reconnect(): Promise<void> {
		if (!this.running) return;
		const opened = await this.openSession();
		if (opened.ok) {
			this.reconnects += 1;
			this.logger.info({ reconnects: this.reconnects }, "Market data reconnected");
			return;
		}
		this.logger.warn({ err: opened.error.message }, "Market data reconnect failed");
		this.publish("error", opened.error);
		if (this.running) this.scheduleReconnect();
	}

	private sign(): Result<StreamSignature | null, TradingError> {
		if (this.credentials === null) return ok(null);
		try {
			return ok(signStreamSubscription(this.credentials, this.clock.now(), this.signatureWindowMs));
		} catch (error) {
			return err(classifyError(error));
		}
	}

	private sendSubscribe(
		channel: string,
		signature: StreamSignature | null,
	): Result<void, TradingError> {
		const request =
			isPrivateChannel(channel) && signature !== null
				? { method: "SUBSCRIBE", params: [channel], signature }
				: { method: "SUBSCRIBE", params: [channel] };
		return this.client.send(JSON.stringify(request));
	}

	// ── Inbound ────────────────────────────────────────────────────

	private handleFrame(text: string): void {
		if (this.state === ConnectionState.Disconnected) return;
		this.touch();

		const parsed = parseFrame(text, this.clock.now());
		if (!parsed.ok) {
			this.droppedFrames += 1;
			this.logger.warn(
				{ err: parsed.error.message, issues: parsed.error.context["issues"], frame: text.slice(0, 200) },
				"Dropped malformed frame",
			);
			return;
		}

		const frame = parsed.value;
		if (!isDataFrame(frame)) {
			if (frame.error !== null) {
				this.logger.warn({ err: frame.error }, "Stream request rejected");
				this.publish("error", new ExchangeError(`Stream request rejected: ${frame.error}`));
			}
			return;
		}

		if (this.state === ConnectionState.Subscribed) {
			this.setState(ConnectionState.Live);
			this.policy.reset();
		}
		this.dispatch(frame);
	}

	private dispatch(frame: Exclude<StreamFrame, { readonly kind: "control" }>): void {
		switch (frame.kind) {
			case "bookTicker":
				this.publish("bookTicker", frame.ticker);
				break;
			case "depth":
				if (this.book.apply(frame.delta, this.clock.now())) {
					this.publish("depth", frame.delta, this.book.snapshot());
				}
				break;
			case "orderFill":
				this.publish("orderFill", frame.fill);
				break;
			case "orderUpdate":
				this.logger.debug({ event: frame.event, stream: frame.stream }, "Order update");
				break;
			case "unhandled":
				this.logger.debug({ stream: frame.stream }, "Unhandled stream");
				break;
		}
	}

	private handleClose(code: number, reason: string): void {
		this.logger.warn({ code, reason, state: this.state }, "Market data socket closed");
		this.dropSession();
	}

	private handleTransportError(error: Error): void {
		const classified = classifyError(error);
		this.logger.warn({ err: classified.message, code: classified.code }, "Market data socket error");
		this.publish("error", classified);
	}

	private setState(next: ConnectionState): void {
		const previous = this.state;
		if (previous === next) return;
		this.state = next;
		this.logger.debug({ from: previous, to: next }, "Connection state");
		this.publish("state", next, previous);
	}

	/** A throwing listener is logged and does not reach the socket callback. */
	private publish<K extends keyof FeedEvents & string>(
		event: K,
		...args: Parameters<FeedEvents[K]>
	): void {
		try {
			this.emit(event, ...args);
		} catch (error) {
			this.logger.error(
				{ event, err: error instanceof Error ? error.message : String(error) },
				"Feed listener failed",
			);
		}
	}
}
