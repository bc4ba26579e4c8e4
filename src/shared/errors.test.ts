import { describe, expect, it } from "vitest";
import {
	AuthError,
	ConfigError,
	ErrorCategory,
	ExchangeError,
	LedgerError,
	NetworkError,
	OrderRejectedError,
	RateLimitError,
	SystemError,
	TimeoutError,
	TradingError,
	classifyError,
	errorFromStatus,
} from "./errors.js";

describe("TradingError hierarchy", () => {
	const cases: Array<[string, TradingError, ErrorCategory]> = [
		["NetworkError", new NetworkError("conn refused"), ErrorCategory.Retryable],
		["TimeoutError", new TimeoutError("timed out"), ErrorCategory.Retryable],
		["RateLimitError", new RateLimitError("429", 1000), ErrorCategory.Retryable],
		["ExchangeError", new ExchangeError("502"), ErrorCategory.Retryable],
		["AuthError", new AuthError("invalid key"), ErrorCategory.NonRetryable],
		["OrderRejectedError", new OrderRejectedError("rejected"), ErrorCategory.NonRetryable],
		["LedgerError", new LedgerError("disk full"), ErrorCategory.NonRetryable],
		["ConfigError", new ConfigError("bad config"), ErrorCategory.Fatal],
		["SystemError", new SystemError("panic"), ErrorCategory.Fatal],
	];

	it.each(cases)("%s has the expected category", (_name, error, expected) => {
		expect(error.category).toBe(expected);
		expect(error).toBeInstanceOf(TradingError);
		expect(error).toBeInstanceOf(Error);
	});

	it("lifts cause out of the context bag", () => {
		const root = new Error("root");
		const e = new NetworkError("wrapped", { cause: root, host: "api" });
		expect(e.cause).toBe(root);
		expect(e.context).toEqual({ host: "api" });
	});

	it("serializes retryAfterMs for rate limits", () => {
		const json = new RateLimitError("slow down", 2000).toJSON();
		expect(json["retryAfterMs"]).toBe(2000);
		expect(json["retryable"]).toBe(true);
		expect(json["code"]).toBe("RATE_LIMIT_ERROR");
	});
});

describe("classifyError", () => {
	it("returns TradingError instances unchanged", () => {
		const e = new AuthError("nope");
		expect(classifyError(e)).toBe(e);
	});

	it("maps fetch failures with an errno cause to NetworkError", () => {
		const cause = Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
		const e = new TypeError("fetch failed", { cause });
		const classified = classifyError(e);
		expect(classified).toBeInstanceOf(NetworkError);
		expect(classified.context["errno"]).toBe("ECONNREFUSED");
	});

	it("maps abort timeouts to TimeoutError", () => {
		const e = new Error("The operation was aborted due to timeout");
		e.name = "TimeoutError";
		expect(classifyError(e)).toBeInstanceOf(TimeoutError);
	});

	it("maps unknown errors to SystemError", () => {
		expect(classifyError(new Error("boom"))).toBeInstanceOf(SystemError);
		expect(classifyError("string thrown")).toBeInstanceOf(SystemError);
	});
});

describe("errorFromStatus", () => {
	it("maps 429 to RateLimitError", () => {
		const e = errorFromStatus(429, "Too Many Requests");
		expect(e).toBeInstanceOf(RateLimitError);
		expect(e.context["status"]).toBe(429);
	});

	it("maps 401 and 403 to AuthError", () => {
		expect(errorFromStatus(401, "x")).toBeInstanceOf(AuthError);
		expect(errorFromStatus(403, "x")).toBeInstanceOf(AuthError);
	});

	it("maps 5xx to a retryable ExchangeError", () => {
		const e = errorFromStatus(503, "unavailable");
		expect(e).toBeInstanceOf(ExchangeError);
		expect(e.isRetryable).toBe(true);
	});

	it("maps other 4xx to OrderRejectedError", () => {
		const e = errorFromStatus(400, "Invalid price");
		expect(e).toBeInstanceOf(OrderRejectedError);
		expect(e.isRetryable).toBe(false);
	});
});
