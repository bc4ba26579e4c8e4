import type { BandSnapshot } from "../indicators/bollinger.js";
import { Decimal } from "../shared/decimal.js";

export interface SpreadConfig {
	/** When false both sides quote `baseSpread`. */
	readonly dynamic: boolean;
	readonly baseSpread: Decimal;
	readonly spreadMin: Decimal;
	readonly spreadMax: Decimal;
	/** Volatility at or below which the spread is `spreadMin`. */
	readonly lowVolatility: Decimal;
	/** Volatility at or above which the spread is `spreadMax`. */
	readonly highVolatility: Decimal;
	readonly trendSkew: boolean;
	/** Ask multiplier above the SMA; bids get `2 − uptrendSkew`. */
	readonly uptrendSkew: Decimal;
	/** Ask multiplier at or below the SMA; bids get `2 − downtrendSkew`. */
	readonly downtrendSkew: Decimal;
}

export interface SpreadQuote {
	readonly ask: Decimal;
	readonly bid: Decimal;
	/** Before skew. */
	readonly base: Decimal;
	/** Null when the dynamic spread is off. */
	readonly volatility: Decimal | null;
}

const TWO = Decimal.from(2);

/** Short band width relative to price. */
export function bandVolatility(price: Decimal, short: BandSnapshot): Decimal {
	return short.upper.sub(short.lower).abs().div(price);
}

/** Linear between the two volatility thresholds, flat outside them. */
export function baseSpreadFor(volatility: Decimal, config: SpreadConfig): Decimal {
	if (volatility.lte(config.lowVolatility)) return config.spreadMin;
	if (volatility.gte(config.highVolatility)) return config.spreadMax;
	const t = volatility
		.sub(config.lowVolatility)
		.div(config.highVolatility.sub(config.lowVolatility));
	return config.spreadMin.add(config.spreadMax.sub(config.spreadMin).mul(t));
}

export function calcDynamicSpread(
	price: Decimal,
	short: BandSnapshot,
	config: SpreadConfig,
): SpreadQuote {
	if (!config.dynamic) {
		return { ask: config.baseSpread, bid: config.baseSpread, base: config.baseSpread, volatility: null };
	}

	const volatility = bandVolatility(price, short);
	const base = baseSpreadFor(volatility, config);
	let ask = base;
	let bid = base;
	if (config.trendSkew) {
		const skew = price.gt(short.middle) ? config.uptrendSkew : config.downtrendSkew;
		ask = base.mul(skew);
		bid = base.mul(TWO.sub(skew));
	}
	return {
		ask: ask.clamp(config.spreadMin, config.spreadMax),
		bid: bid.clamp(config.spreadMin, config.spreadMax),
		base,
		volatility,
	};
}
