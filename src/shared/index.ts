export {
	type ClientOrderId,
	type ExchangeOrderId,
	clientOrderId,
	exchangeOrderId,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	mapErr,
	unwrap,
	tryCatch,
} from "./result.js";

export {
	ErrorCategory,
	type ErrorContext,
	TradingError,
	NetworkError,
	TimeoutError,
	RateLimitError,
	AuthError,
	OrderRejectedError,
	ExchangeError,
	LedgerError,
	ConfigError,
	SystemError,
	classifyError,
	errorFromStatus,
} from "./errors.js";

export { Decimal, type RoundingMode, parseDecimal } from "./decimal.js";
export { OrderSide, oppositeSide, parseSide } from "./market-side.js";
export { type Clock, SystemClock, FakeClock, Duration, sleep } from "./time.js";
export {
	type BotConfig,
	type BotConfigInput,
	type KlineInterval,
	API_KEY_ENV,
	DEFAULT_BOT_CONFIG,
	ENV_PREFIX,
	KLINE_INTERVALS,
	KLINE_INTERVAL_SECONDS,
	SECRET_KEY_ENV,
	apiKeysFromEnv,
	botConfigSchema,
	configFromEnv,
	envKeyFor,
	loadConfig,
} from "./config.js";
