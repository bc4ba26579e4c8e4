import { describe, expect, it } from "vitest";
import {
	ValidationError,
	decimalSchema,
	formatIssues,
	validate,
	validateJson,
	z,
} from "./index.js";

const levelSchema = z.object({
	price: z.string(),
	quantity: z.coerce.number().nonnegative(),
});

describe("validate", () => {
	it("returns the parsed value on success", () => {
		const r = validate(levelSchema, { price: "101.5", quantity: "2" });
		expect(r.ok).toBe(true);
		if (r.ok) expect(r.value).toEqual({ price: "101.5", quantity: 2 });
	});

	it("collects issues with their paths", () => {
		const r = validate(levelSchema, { price: 5, quantity: -1 }, "depth level");
		expect(r.ok).toBe(false);
		if (r.ok) return;
		expect(r.error).toBeInstanceOf(ValidationError);
		expect(r.error.message).toBe("Invalid depth level");
		expect(r.error.issues.map((i) => i.path)).toEqual([["price"], ["quantity"]]);
		expect(r.error.isRetryable).toBe(false);
	});
});

describe("validateJson", () => {
	it("parses then validates", () => {
		const r = validateJson(levelSchema, '{"price":"1","quantity":0}');
		expect(r.ok).toBe(true);
	});

	it("reports malformed JSON as a validation failure", () => {
		const r = validateJson(levelSchema, "{not json");
		expect(r.ok).toBe(false);
		if (!r.ok) expect(r.error.issues).toHaveLength(1);
	});
});

describe("formatIssues", () => {
	it("joins paths and messages", () => {
		expect(
			formatIssues([
				{ path: ["a", 0], message: "Required" },
				{ path: [], message: "Bad root" },
			]),
		).toBe("a.0: Required; Bad root");
	});
});

describe("decimalSchema", () => {
	it("parses strings and numbers", () => {
		const fromString = validate(decimalSchema, "142.350");
		const fromNumber = validate(decimalSchema, 0.25);
		expect(fromString.ok && fromString.value.toString()).toBe("142.35");
		expect(fromNumber.ok && fromNumber.value.toString()).toBe("0.25");
	});

	it("rejects text that is not a number", () => {
		const r = validate(decimalSchema, "abc", "price");
		expect(r.ok).toBe(false);
		if (r.ok) return;
		expect(r.error.issues[0]?.message).toBe("not a decimal: abc");
	});
});
