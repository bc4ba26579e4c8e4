/**
 * TradingError hierarchy.
 *
 * The category on each error decides what the caller does with it:
 * retryable errors go back through the RetryPolicy, non-retryable ones are
 * surfaced for the current cycle, fatal ones abort startup.
 */

export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Context bag accepted by every subclass; `cause` is lifted onto `Error.cause`. */
export type ErrorContext = Record<string, unknown> & { readonly cause?: unknown };

export class TradingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: ErrorContext = {},
	) {
		const { cause, ...rest } = context;
		super(message);
		this.name = "TradingError";
		this.category = category;
		this.code = code;
		this.context = rest;
		if (cause !== undefined) this.cause = cause;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Transport ────────────────────────────────────────────────────────

export class NetworkError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "NETWORK_ERROR", ErrorCategory.Retryable, context);
		this.name = "NetworkError";
	}
}

export class TimeoutError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "TIMEOUT_ERROR", ErrorCategory.Retryable, context);
		this.name = "TimeoutError";
	}
}

/** HTTP 429. `retryAfterMs` is a floor for the next backoff delay. */
export class RateLimitError extends TradingError {
	readonly retryAfterMs: number;

	constructor(message: string, retryAfterMs: number, context: ErrorContext = {}) {
		super(message, "RATE_LIMIT_ERROR", ErrorCategory.Retryable, context);
		this.name = "RateLimitError";
		this.retryAfterMs = retryAfterMs;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), retryAfterMs: this.retryAfterMs };
	}
}

// ── Exchange ─────────────────────────────────────────────────────────

export class AuthError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "AUTH_ERROR", ErrorCategory.NonRetryable, context);
		this.name = "AuthError";
	}
}

/** The exchange refused an order or request; local state must not change. */
export class OrderRejectedError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "ORDER_REJECTED", ErrorCategory.NonRetryable, context);
		this.name = "OrderRejectedError";
	}
}

/** 5xx and other non-2xx statuses the exchange may recover from. */
export class ExchangeError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "EXCHANGE_ERROR", ErrorCategory.Retryable, context);
		this.name = "ExchangeError";
	}
}

// ── Local ────────────────────────────────────────────────────────────

/** A position or trade write/read against the embedded store failed. */
export class LedgerError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "LEDGER_ERROR", ErrorCategory.NonRetryable, context);
		this.name = "LedgerError";
	}
}

export class ConfigError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, context);
		this.name = "ConfigError";
	}
}

export class SystemError extends TradingError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, context);
		this.name = "SystemError";
	}
}

// ── Classification ───────────────────────────────────────────────────

const NETWORK_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "EPIPE", "EAI_AGAIN"]);

function errnoCode(error: Error): string | undefined {
	if ("code" in error && typeof error.code === "string") return error.code;
	const cause = error.cause;
	if (cause instanceof Error && "code" in cause && typeof cause.code === "string") {
		return cause.code;
	}
	return undefined;
}

/**
 * Map an unknown thrown value onto the hierarchy.
 *
 * `fetch` wraps socket failures as `TypeError("fetch failed")` with the errno
 * on `cause`, so both the error and its cause are inspected.
 */
export function classifyError(error: unknown): TradingError {
	if (error instanceof TradingError) return error;
	if (!(error instanceof Error)) {
		return new SystemError(String(error), { cause: error });
	}

	const code = errnoCode(error);
	if (code === "ETIMEDOUT" || error.name === "TimeoutError" || error.name === "AbortError") {
		return new TimeoutError(error.message, { cause: error });
	}
	if (code !== undefined && NETWORK_CODES.has(code)) {
		return new NetworkError(error.message, { cause: error, errno: code });
	}

	const msg = error.message.toLowerCase();
	if (msg.includes("timeout") || msg.includes("timed out")) {
		return new TimeoutError(error.message, { cause: error });
	}
	if (msg.includes("fetch failed") || msg.includes("socket hang up")) {
		return new NetworkError(error.message, { cause: error });
	}
	return new SystemError(error.message, { cause: error });
}

/** Map a non-2xx HTTP status onto the hierarchy. */
export function errorFromStatus(
	status: number,
	message: string,
	context: ErrorContext = {},
): TradingError {
	if (status === 429) return new RateLimitError(message, 1_000, { ...context, status });
	if (status === 401 || status === 403) return new AuthError(message, { ...context, status });
	if (status >= 500) return new ExchangeError(message, { ...context, status });
	return new OrderRejectedError(message, { ...context, status });
}
