import { describe, expect, it } from "vitest";
import type { BandSnapshot } from "../indicators/bollinger.js";
import { Decimal } from "../shared/decimal.js";
import { bandVolatility, baseSpreadFor, calcDynamicSpread } from "./dynamic-spread.js";
import type { SpreadConfig } from "./dynamic-spread.js";

const d = (v: string | number) => Decimal.from(v);

function band(lower: string, middle: string, upper: string): BandSnapshot {
	return { lower: d(lower), middle: d(middle), upper: d(upper), ready: true };
}

const config: SpreadConfig = {
	dynamic: true,
	baseSpread: d("0.00018"),
	spreadMin: d("0.001"),
	spreadMax: d("0.002"),
	lowVolatility: d("0.0025"),
	highVolatility: d("0.05"),
	trendSkew: false,
	uptrendSkew: d("1.2"),
	downtrendSkew: d("0.8"),
};

describe("bandVolatility", () => {
	it("is the band width over price", () => {
		expect(bandVolatility(d(100), band("98", "100", "102")).toString()).toBe("0.04");
	});
});

describe("baseSpreadFor", () => {
	it("interpolates between the thresholds", () => {
		expect(baseSpreadFor(d("0.04"), config).toFixed(7)).toBe("0.0017895");
		expect(baseSpreadFor(d("0.02625"), config).toString()).toBe("0.0015");
	});

	it("is flat outside the thresholds", () => {
		expect(baseSpreadFor(d("0.0025"), config).toString()).toBe("0.001");
		expect(baseSpreadFor(d("0.001"), config).toString()).toBe("0.001");
		expect(baseSpreadFor(d("0.05"), config).toString()).toBe("0.002");
		expect(baseSpreadFor(d("0.3"), config).toString()).toBe("0.002");
	});
});

describe("calcDynamicSpread", () => {
	it("quotes the interpolated spread on both sides without skew", () => {
		const quote = calcDynamicSpread(d(100), band("98", "100", "102"), config);
		expect(quote.ask.toFixed(7)).toBe("0.0017895");
		expect(quote.bid.eq(quote.ask)).toBe(true);
		expect(quote.volatility?.toString()).toBe("0.04");
	});

	it("uses the fixed base spread when dynamic spread is off", () => {
		const quote = calcDynamicSpread(d(100), band("50", "100", "150"), { ...config, dynamic: false });
		expect(quote.ask.toString()).toBe("0.00018");
		expect(quote.bid.toString()).toBe("0.00018");
		expect(quote.volatility).toBeNull();
	});

	it("applies the uptrend skew above the middle", () => {
		const quote = calcDynamicSpread(d(100), band("98.6875", "99", "101.3125"), {
			...config,
			trendSkew: true,
		});
		expect(quote.base.toString()).toBe("0.0015");
		expect(quote.ask.toString()).toBe("0.0018");
		expect(quote.bid.toString()).toBe("0.0012");
	});

	it("applies the downtrend skew at or below the middle", () => {
		const quote = calcDynamicSpread(d(100), band("98.6875", "101", "101.3125"), {
			...config,
			trendSkew: true,
		});
		expect(quote.ask.toString()).toBe("0.0012");
		expect(quote.bid.toString()).toBe("0.0018");
	});

	it("clamps skewed sides to the spread bounds", () => {
		const quote = calcDynamicSpread(d(100), band("90", "95", "110"), { ...config, trendSkew: true });
		expect(quote.base.toString()).toBe("0.002");
		expect(quote.ask.toString()).toBe("0.002");
		expect(quote.bid.toString()).toBe("0.0016");
	});
});
