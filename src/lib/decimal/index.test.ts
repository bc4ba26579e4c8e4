import { describe, expect, it } from "vitest";
import { LibDecimal } from "./index.js";

describe("LibDecimal", () => {
	describe("factories", () => {
		it("parses strings and numbers", () => {
			expect(LibDecimal.from("1.50").toString()).toBe("1.5");
			expect(LibDecimal.from(" 100 ").toString()).toBe("100");
			expect(LibDecimal.from(0.001).toString()).toBe("0.001");
		});

		it("rejects blank strings and non-finite numbers", () => {
			expect(() => LibDecimal.from("  ")).toThrow("empty string");
			expect(() => LibDecimal.from(Number.NaN)).toThrow("invalid");
			expect(() => LibDecimal.from(Number.POSITIVE_INFINITY)).toThrow("invalid");
		});
	});

	describe("arithmetic", () => {
		it("adds without float error", () => {
			expect(LibDecimal.from("0.1").add(LibDecimal.from("0.2")).toString()).toBe("0.3");
		});

		it("multiplies ladder notionals exactly", () => {
			const notional = LibDecimal.from("99.98").mul(LibDecimal.from("0.3"));
			expect(notional.toString()).toBe("29.994");
		});

		it("throws on division by zero", () => {
			expect(() => LibDecimal.one().div(LibDecimal.zero())).toThrow("division by zero");
		});

		it("takes exact square roots", () => {
			expect(LibDecimal.from("2.25").sqrt().toString()).toBe("1.5");
			expect(LibDecimal.zero().sqrt().isZero()).toBe(true);
			expect(() => LibDecimal.from(-1).sqrt()).toThrow("negative");
		});
	});

	describe("round", () => {
		it("rounds half up by default", () => {
			expect(LibDecimal.from("99.975").round(2).toString()).toBe("99.98");
			expect(LibDecimal.from("100.024").round(2).toString()).toBe("100.02");
		});

		it("supports truncation", () => {
			expect(LibDecimal.from("0.129").round(2, "down").toString()).toBe("0.12");
		});
	});

	describe("comparison helpers", () => {
		const a = LibDecimal.from("1");
		const b = LibDecimal.from("2");

		it("orders values", () => {
			expect(a.lt(b)).toBe(true);
			expect(b.gte(a)).toBe(true);
			expect(a.cmp(b)).toBe(-1);
			expect(LibDecimal.min(a, b)).toBe(a);
			expect(LibDecimal.max(a, b)).toBe(b);
		});

		it("clamps into a range", () => {
			expect(LibDecimal.from("5").clamp(a, b).toString()).toBe("2");
			expect(LibDecimal.from("0.5").clamp(a, b).toString()).toBe("1");
			expect(LibDecimal.from("1.5").clamp(a, b).toString()).toBe("1.5");
		});

		it("reports sign", () => {
			expect(LibDecimal.from("-0.1").isNegative()).toBe(true);
			expect(LibDecimal.from("0.1").isPositive()).toBe(true);
			expect(LibDecimal.zero().isZero()).toBe(true);
		});
	});

	it("serializes to its plain string", () => {
		expect(JSON.stringify({ price: LibDecimal.from("142.50") })).toBe('{"price":"142.5"}');
	});
});
