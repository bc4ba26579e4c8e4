// ── Shared Kernel ────────────────────────────────────────────────────
export * from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LoggerConfig, type LogLevel, createLogger, silentLogger } from "./lib/logger/index.js";
export { ValidationError, validate, validateJson } from "./lib/validation/index.js";
export { type RetryConfig, RetryPolicy, withRetry } from "./lib/retry/index.js";
export { TokenBucketRateLimiter } from "./lib/http/index.js";
export { TypedEmitter } from "./lib/events/index.js";
export { WsClient, type WsClientLike, type WsConfig } from "./lib/websocket/index.js";

// ── Auth ─────────────────────────────────────────────────────────────
export { type ApiKeySet, Credentials, createCredentials, signRequest } from "./auth/index.js";

// ── Domain ───────────────────────────────────────────────────────────
export * from "./indicators/index.js";
export * from "./ledger/index.js";
export * from "./market/index.js";
export * from "./feed/index.js";
export * from "./exchange/index.js";
export * from "./strategy/index.js";
export * from "./scheduler/index.js";

// ── Bootstrap ────────────────────────────────────────────────────────
export { type Bot, type BotDeps, createBot } from "./bot.js";
