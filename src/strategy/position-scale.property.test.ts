import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import type { BandSnapshot } from "../indicators/bollinger.js";
import { Decimal } from "../shared/decimal.js";
import { calcPositionScale } from "./position-scale.js";

const cents = (n: number) => Decimal.from(n).div(Decimal.from(100));

const bandArb = fc
	.tuple(fc.integer({ min: 1_000, max: 1_000_000 }), fc.integer({ min: 1, max: 100_000 }))
	.map(([middle, half]): BandSnapshot => ({
		lower: cents(middle - half),
		middle: cents(middle),
		upper: cents(middle + half),
		ready: true,
	}));

const bounds = { minScale: Decimal.from(1), maxScale: Decimal.from(10) };

describe("calcPositionScale (property-based)", () => {
	it("stays within [minScale, maxScale]", () => {
		fc.assert(
			fc.property(bandArb, bandArb, fc.integer({ min: 1, max: 2_000_000 }), (long, short, p) => {
				const scale = calcPositionScale(cents(p), long, short, bounds);
				expect(scale.gte(bounds.minScale)).toBe(true);
				expect(scale.lte(bounds.maxScale)).toBe(true);
			}),
			{ numRuns: 300 },
		);
	});

	it("never increases as the price rises", () => {
		fc.assert(
			fc.property(
				bandArb,
				bandArb,
				fc.integer({ min: 1, max: 2_000_000 }),
				fc.integer({ min: 0, max: 50_000 }),
				(long, short, p, rise) => {
					const lower = calcPositionScale(cents(p), long, short, bounds);
					const higher = calcPositionScale(cents(p + rise), long, short, bounds);
					expect(higher.lte(lower)).toBe(true);
				},
			),
			{ numRuns: 300 },
		);
	});

	it("hits the bounds exactly when both bands agree", () => {
		fc.assert(
			fc.property(bandArb, (b) => {
				expect(calcPositionScale(b.lower, b, b, bounds).eq(bounds.maxScale)).toBe(true);
				expect(calcPositionScale(b.upper, b, b, bounds).eq(bounds.minScale)).toBe(true);
			}),
			{ numRuns: 200 },
		);
	});
});
