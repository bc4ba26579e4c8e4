import type { BotConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import type { LadderConfig } from "./grid-ladder.js";
import type { RiskLimits } from "./risk-control.js";
import type { ScaleBounds } from "./position-scale.js";
import type { SpreadConfig } from "./dynamic-spread.js";

/** Strategy parameters as Decimals, derived once from the bot configuration. */
export interface StrategySettings {
	readonly symbol: string;
	readonly orderIntervalMs: number;
	readonly risk: RiskLimits;
	readonly scale: ScaleBounds;
	readonly spread: SpreadConfig;
	readonly ladder: LadderConfig;
}

export function strategySettings(config: BotConfig): StrategySettings {
	const d = (value: number): Decimal => Decimal.from(value);
	return {
		symbol: config.symbol,
		orderIntervalMs: config.orderIntervalMs,
		risk: {
			stopLossActivation: d(config.stopLossActivation),
			stopLossRatio: d(config.stopLossRatio),
			takeProfitRatio: d(config.takeProfitRatio),
		},
		scale: {
			minScale: d(config.minPositionScale),
			maxScale: d(config.maxPositionScale),
		},
		spread: {
			dynamic: config.dynamicSpread,
			baseSpread: d(config.baseSpread),
			spreadMin: d(config.spreadMin),
			spreadMax: d(config.spreadMax),
			lowVolatility: d(config.lowVolatility),
			highVolatility: d(config.highVolatility),
			trendSkew: config.trendSkew,
			uptrendSkew: d(config.uptrendSkew),
			downtrendSkew: d(config.downtrendSkew),
		},
		ladder: {
			levels: config.gridLevelsPerSide,
			step: d(config.gridStep),
			totalInvestment: d(config.totalInvestment),
			sideBudgetRatio: d(config.gridSideBudgetRatio),
			baseOrderSize: d(config.baseOrderSize),
			pricePrecision: config.pricePrecision,
			quantityPrecision: config.quantityPrecision,
			minProfitSpread: d(config.minProfitSpread),
			tradeInBand: config.tradeInBand,
			buyBelowSma: config.buyBelowSma,
		},
	};
}
