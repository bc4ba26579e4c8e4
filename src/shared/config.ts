/**
 * Bot configuration.
 *
 * `botConfigSchema` carries every default; `loadConfig` layers environment
 * variables and explicit overrides on top and validates the result. Invalid
 * configuration is a fatal ConfigError.
 */

import { z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import { Duration } from "./time.js";

export const KLINE_INTERVALS = [
	"1m",
	"3m",
	"5m",
	"15m",
	"30m",
	"1h",
	"2h",
	"4h",
	"6h",
	"8h",
	"12h",
	"1d",
	"3d",
	"1w",
	"1month",
] as const;

export type KlineInterval = (typeof KLINE_INTERVALS)[number];

/** Length of each kline interval in seconds. */
export const KLINE_INTERVAL_SECONDS: Readonly<Record<KlineInterval, number>> = {
	"1m": 60,
	"3m": 180,
	"5m": 300,
	"15m": 900,
	"30m": 1_800,
	"1h": 3_600,
	"2h": 7_200,
	"4h": 14_400,
	"6h": 21_600,
	"8h": 28_800,
	"12h": 43_200,
	"1d": 86_400,
	"3d": 259_200,
	"1w": 604_800,
	"1month": 2_592_000,
};

const klineInterval = z.enum(KLINE_INTERVALS);
const fraction = z.number().min(0).max(1);
const positiveMs = z.number().int().positive();

const botConfigShape = z
	.object({
		// ── Instrument ──────────────────────────────────────────────
		symbol: z.string().min(1).default("SOL_USDC"),
		pricePrecision: z.number().int().min(0).max(12).default(2),
		quantityPrecision: z.number().int().min(0).max(12).default(2),

		// ── Capital ─────────────────────────────────────────────────
		/** Quote currency committed to the grid. */
		totalInvestment: z.number().positive().default(200),
		/** Base asset quantity per ladder order. */
		baseOrderSize: z.number().positive().default(0.1),

		// ── Bands ───────────────────────────────────────────────────
		longInterval: klineInterval.default("1h"),
		longPeriod: z.number().int().min(2).default(21),
		longStdDev: z.number().positive().default(2),
		shortInterval: klineInterval.default("5m"),
		shortPeriod: z.number().int().min(2).default(21),
		shortStdDev: z.number().positive().default(2),

		// ── Position scale ──────────────────────────────────────────
		minPositionScale: z.number().positive().default(1),
		maxPositionScale: z.number().positive().default(10),
		minProfitSpread: fraction.default(0.0005),
		tradeInBand: z.boolean().default(true),
		buyBelowSma: z.boolean().default(false),

		// ── Spread ──────────────────────────────────────────────────
		baseSpread: fraction.default(0.00018),
		dynamicSpread: z.boolean().default(true),
		spreadMin: fraction.default(0.00022),
		spreadMax: fraction.default(0.001),
		lowVolatility: fraction.default(0.0025),
		highVolatility: fraction.default(0.05),
		trendSkew: z.boolean().default(true),
		uptrendSkew: z.number().positive().max(2).default(0.8),
		downtrendSkew: z.number().positive().max(2).default(1.2),

		// ── Risk ────────────────────────────────────────────────────
		stopLossActivation: fraction.default(0.02),
		stopLossRatio: fraction.default(0.03),
		takeProfitRatio: fraction.default(0.008),

		// ── Grid ────────────────────────────────────────────────────
		gridLevelsPerSide: z.number().int().min(1).max(50).default(6),
		gridStep: z.number().positive().max(0.5).default(0.0002),
		gridSideBudgetRatio: fraction.default(0.5),

		// ── Cadence ─────────────────────────────────────────────────
		orderIntervalMs: positiveMs.default(Duration.seconds(120)),
		klineRefreshMs: positiveMs.default(Duration.seconds(60)),
		heartbeatTimeoutMs: positiveMs.default(Duration.seconds(30)),
		heartbeatCheckMs: positiveMs.default(Duration.seconds(5)),
		healthCheckBaseMs: positiveMs.default(Duration.seconds(30)),
		healthCheckMaxMs: positiveMs.default(Duration.seconds(300)),
		mainLoopMs: positiveMs.default(100),
		warmupTimeoutMs: positiveMs.default(Duration.seconds(30)),
		positionRefreshMs: positiveMs.default(Duration.seconds(1)),
		positionWaitMs: positiveMs.default(Duration.seconds(1)),
		connectAttempts: z.number().int().min(1).default(3),

		// ── Storage ─────────────────────────────────────────────────
		dbPath: z.string().min(1).default("data/positions.db"),
		tradeRetentionDays: z.number().positive().default(15),

		// ── Exchange ────────────────────────────────────────────────
		restUrl: z.string().url().default("https://api.backpack.exchange"),
		wsUrl: z.string().url().default("wss://ws.backpack.exchange"),
		signatureWindowMs: positiveMs.default(5_000),
		requestTimeoutMs: positiveMs.default(Duration.seconds(10)),

		logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
	})
	.strict();

export const botConfigSchema = botConfigShape
	.refine((c) => c.spreadMin <= c.spreadMax, {
		message: "spreadMin must not exceed spreadMax",
		path: ["spreadMin"],
	})
	.refine((c) => c.minPositionScale <= c.maxPositionScale, {
		message: "minPositionScale must not exceed maxPositionScale",
		path: ["minPositionScale"],
	})
	.refine((c) => c.lowVolatility < c.highVolatility, {
		message: "lowVolatility must be below highVolatility",
		path: ["lowVolatility"],
	})
	.refine((c) => c.healthCheckBaseMs <= c.healthCheckMaxMs, {
		message: "healthCheckBaseMs must not exceed healthCheckMaxMs",
		path: ["healthCheckBaseMs"],
	});

export type BotConfig = z.output<typeof botConfigSchema>;
export type BotConfigInput = z.input<typeof botConfigSchema>;

export const DEFAULT_BOT_CONFIG: BotConfig = botConfigSchema.parse({});

// ── Environment ─────────────────────────────────────────────────────

export const ENV_PREFIX = "BANDGRID_";

/** `tradeInBand` -> `BANDGRID_TRADE_IN_BAND` */
export function envKeyFor(key: string): string {
	return ENV_PREFIX + key.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toUpperCase();
}

function parseNumberEnv(envKey: string, raw: string): number {
	const parsed = Number(raw.trim());
	if (raw.trim().length === 0 || !Number.isFinite(parsed)) {
		throw new ConfigError(`Invalid ${envKey}: "${raw}" must be a number`);
	}
	return parsed;
}

function parseBooleanEnv(envKey: string, raw: string): boolean {
	const normalized = raw.trim().toLowerCase();
	if (normalized === "true" || normalized === "1") return true;
	if (normalized === "false" || normalized === "0") return false;
	throw new ConfigError(`Invalid ${envKey}: "${raw}" must be true or false`);
}

/**
 * Read `BANDGRID_*` variables for every known option. The kind of each value
 * (number, boolean, string) follows the option's default.
 *
 * @throws ConfigError for unparseable numbers or booleans
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<BotConfig> {
	const raw: Record<string, string | number | boolean> = {};
	for (const [key, fallback] of Object.entries(DEFAULT_BOT_CONFIG)) {
		const envKey = envKeyFor(key);
		const value = env[envKey];
		if (value === undefined || value === "") continue;
		if (typeof fallback === "number") {
			raw[key] = parseNumberEnv(envKey, value);
		} else if (typeof fallback === "boolean") {
			raw[key] = parseBooleanEnv(envKey, value);
		} else {
			raw[key] = value;
		}
	}
	const parsed = botConfigShape.partial().safeParse(raw);
	if (!parsed.success) throw configError(parsed.error.issues);
	return parsed.data;
}

function configError(issues: readonly z.ZodIssue[]): ConfigError {
	const detail = issues
		.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
		.join("; ");
	return new ConfigError(`Invalid configuration: ${detail}`, { issues: issues.length });
}

/**
 * Defaults, then environment, then `overrides`.
 * @throws ConfigError listing every invalid field
 */
export function loadConfig(
	overrides: Partial<BotConfigInput> = {},
	env: NodeJS.ProcessEnv = process.env,
): BotConfig {
	const parsed = botConfigSchema.safeParse({ ...configFromEnv(env), ...overrides });
	if (parsed.success) return parsed.data;
	throw configError(parsed.error.issues);
}

// ── Credentials ─────────────────────────────────────────────────────

export const API_KEY_ENV = "BACKPACK_API_KEY";
export const SECRET_KEY_ENV = "BACKPACK_SECRET_KEY";

/** Raw key material from the environment, or null when either half is missing. */
export function apiKeysFromEnv(
	env: NodeJS.ProcessEnv = process.env,
): { readonly apiKey: string; readonly secret: string } | null {
	const apiKey = env[API_KEY_ENV];
	const secret = env[SECRET_KEY_ENV];
	if (!apiKey || !secret) return null;
	return { apiKey, secret };
}
