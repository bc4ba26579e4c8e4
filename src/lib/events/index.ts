import EventEmitter from "eventemitter3";

/**
 * Event name to handler signature, e.g.
 * `{ bookTicker: (t: BookTicker) => void; state: (s: ConnectionState) => void }`.
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for handler parameter lists
export type EventMap = Record<string, (...args: any[]) => void>;

/**
 * eventemitter3 with handler signatures checked at compile time.
 *
 * The feed publishes through one of these and the scheduler is its single
 * dispatcher, so handlers never re-enter the feed's socket callbacks.
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler);
		return this;
	}

	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler);
		return this;
	}

	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	/** Drop handlers for one event, or for all events when none is given. */
	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event === undefined) {
			this.ee.removeAllListeners();
		} else {
			this.ee.removeAllListeners(event);
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}
}
