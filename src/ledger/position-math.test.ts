import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { OrderSide } from "../shared/market-side.js";
import { EMPTY_POSITION, applyFillToPosition, averagePrice } from "./position-math.js";

const d = (v: string) => Decimal.from(v);

describe("applyFillToPosition", () => {
	it("adds size and notional on a buy", () => {
		const next = applyFillToPosition(EMPTY_POSITION, {
			side: OrderSide.Bid,
			price: d("150.25"),
			quantity: d("2"),
		});
		expect(next.size.toString()).toBe("2");
		expect(next.cost.toString()).toBe("300.5");
	});

	it("reduces cost proportionally on a sell", () => {
		const next = applyFillToPosition(
			{ size: d("4"), cost: d("400") },
			{ side: OrderSide.Ask, price: d("500"), quantity: d("1") },
		);
		expect(next.size.toString()).toBe("3");
		expect(next.cost.toString()).toBe("300");
	});

	it("zeroes cost for a sell against a flat position", () => {
		const next = applyFillToPosition(
			{ size: d("0"), cost: d("12") },
			{ side: OrderSide.Ask, price: d("10"), quantity: d("1") },
		);
		expect(next.size.toString()).toBe("0");
		expect(next.cost.toString()).toBe("0");
	});
});

describe("averagePrice", () => {
	it("is cost over size", () => {
		expect(averagePrice({ size: d("4"), cost: d("402") }).toString()).toBe("100.5");
	});

	it("is zero when flat", () => {
		expect(averagePrice(EMPTY_POSITION).isZero()).toBe(true);
	});
});
