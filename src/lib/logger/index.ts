/**
 * Structured logging backed by pino.
 *
 * Components take a `Logger` and call `child({ component })` once, so every
 * line carries where it came from. Sealed credentials (`__opaque: true`) are
 * replaced with "[REDACTED]" before pino sees them.
 */

import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export interface LoggerConfig {
	readonly level: LogLevel;
	readonly name?: string;
	readonly redactPaths?: readonly string[];
	/** Alternate sink, e.g. an array collector in tests. */
	readonly destination?: { write(msg: string): void };
}

export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Redaction ───────────────────────────────────────────────────────

function isOpaque(value: unknown): boolean {
	return (
		typeof value === "object" && value !== null && "__opaque" in value && value.__opaque === true
	);
}

function redactOpaque(fields: Record<string, unknown>): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(fields)) {
		out[key] = isOpaque(value) ? "[REDACTED]" : value;
	}
	return out;
}

// ── Factory ─────────────────────────────────────────────────────────

type Method = "info" | "warn" | "error" | "debug";

function wrapPino(base: pino.Logger): Logger {
	const write =
		(method: Method) =>
		(fieldsOrMsg: Record<string, unknown> | string, msg?: string): void => {
			if (typeof fieldsOrMsg === "string") {
				base[method](fieldsOrMsg);
			} else {
				base[method](redactOpaque(fieldsOrMsg), msg ?? "");
			}
		};

	return {
		info: write("info"),
		warn: write("warn"),
		error: write("error"),
		debug: write("debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(base.child(redactOpaque(bindings)));
		},
	};
}

/**
 * @example
 * ```ts
 * const log = createLogger({ level: "info" }).child({ component: "feed" });
 * log.info({ channel: "bookTicker.SOL_USDC" }, "Subscribed");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const options: pino.LoggerOptions = { level: config.level };
	if (config.name !== undefined) options.name = config.name;
	if (config.redactPaths && config.redactPaths.length > 0) {
		options.redact = { paths: [...config.redactPaths], censor: "[REDACTED]" };
	}

	const sink = config.destination;
	if (sink === undefined) return wrapPino(pino(options));

	const stream: pino.DestinationStream = {
		write(chunk: string): void {
			sink.write(chunk);
		},
	};
	return wrapPino(pino(options, stream));
}

/** Logger that discards everything; the default for components built without one. */
export function silentLogger(): Logger {
	return wrapPino(pino({ level: "silent" }));
}

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}
