import type { BandSnapshot } from "../indicators/bollinger.js";
import { isInBand } from "../indicators/bollinger.js";
import { Decimal } from "../shared/decimal.js";
import { OrderSide } from "../shared/market-side.js";

export interface LadderConfig {
	/** Levels per side. */
	readonly levels: number;
	/** Fractional distance between levels, e.g. 0.0002. */
	readonly step: Decimal;
	readonly totalInvestment: Decimal;
	/** Share of `totalInvestment` each side may commit. */
	readonly sideBudgetRatio: Decimal;
	/** Base asset quantity per level. */
	readonly baseOrderSize: Decimal;
	readonly pricePrecision: number;
	readonly quantityPrecision: number;
	/** Sells must clear the average entry by this fraction. */
	readonly minProfitSpread: Decimal;
	readonly tradeInBand: boolean;
	readonly buyBelowSma: boolean;
}

export interface LadderOrder {
	readonly side: OrderSide;
	readonly price: Decimal;
	readonly quantity: Decimal;
}

export interface Ladder {
	/** Nearest level first. */
	readonly buys: readonly LadderOrder[];
	readonly sells: readonly LadderOrder[];
	readonly canBuy: boolean;
	readonly canSell: boolean;
	/** Quote notional the buy side may commit. */
	readonly buyBudget: Decimal;
	/** Base quantity the sell side may commit. */
	readonly sellBudget: Decimal;
	/** Sells at or below this are skipped; null without a position cost. */
	readonly minSellPrice: Decimal | null;
}

/**
 * Level prices on one side, nearest first, rounded to the price precision.
 * Non-positive prices are dropped.
 */
export function levelPrices(
	price: Decimal,
	side: OrderSide,
	config: Pick<LadderConfig, "levels" | "step" | "pricePrecision">,
): Decimal[] {
	const prices: Decimal[] = [];
	for (let i = 1; i <= config.levels; i++) {
		const offset = config.step.mul(Decimal.from(i));
		const factor = side === OrderSide.Bid ? Decimal.one().sub(offset) : Decimal.one().add(offset);
		const level = price.mul(factor).round(config.pricePrecision);
		if (level.isPositive()) prices.push(level);
	}
	return prices;
}

/**
 * Plan the grid around `price`.
 *
 * Each side walks outward and stops at the first level that would push it
 * past its budget; the buy budget is quote notional, the sell budget the
 * same amount converted to base quantity at `price`. Sell levels that would
 * not clear `cost·(1 + minProfitSpread)` are skipped, not treated as a stop.
 */
export function buildLadder(
	price: Decimal,
	cost: Decimal,
	short: BandSnapshot,
	config: LadderConfig,
): Ladder {
	const inBand = isInBand(price, short);
	const canSell = !config.tradeInBand || inBand;
	const canBuy = canSell && (!config.buyBelowSma || price.lt(short.middle));

	const buyBudget = config.totalInvestment.mul(config.sideBudgetRatio);
	const sellBudget = buyBudget.div(price);
	const quantity = config.baseOrderSize.round(config.quantityPrecision);
	const minSellPrice = cost.isPositive()
		? cost.mul(Decimal.one().add(config.minProfitSpread)).round(config.pricePrecision)
		: null;

	const buys: LadderOrder[] = [];
	const sells: LadderOrder[] = [];
	if (!quantity.isPositive()) {
		return { buys, sells, canBuy, canSell, buyBudget, sellBudget, minSellPrice };
	}

	if (canBuy) {
		let used = Decimal.zero();
		for (const level of levelPrices(price, OrderSide.Bid, config)) {
			const notional = level.mul(quantity);
			if (used.add(notional).gt(buyBudget)) break;
			buys.push({ side: OrderSide.Bid, price: level, quantity });
			used = used.add(notional);
		}
	}

	if (canSell) {
		let used = Decimal.zero();
		for (const level of levelPrices(price, OrderSide.Ask, config)) {
			if (minSellPrice !== null && level.lte(minSellPrice)) continue;
			if (used.add(quantity).gt(sellBudget)) break;
			sells.push({ side: OrderSide.Ask, price: level, quantity });
			used = used.add(quantity);
		}
	}

	return { buys, sells, canBuy, canSell, buyBudget, sellBudget, minSellPrice };
}
