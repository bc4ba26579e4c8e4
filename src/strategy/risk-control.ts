import type { Decimal } from "../shared/decimal.js";

export interface RiskLimits {
	/** |roi| at which the stop-loss check starts looking. */
	readonly stopLossActivation: Decimal;
	readonly stopLossRatio: Decimal;
	readonly takeProfitRatio: Decimal;
}

export type RiskDecision =
	| { readonly action: "hold"; readonly roi: Decimal | null }
	| { readonly action: "close"; readonly reason: "stop_loss" | "take_profit"; readonly roi: Decimal };

/**
 * Stop-loss and take-profit against the average entry price.
 *
 * roi = (price − cost) / cost, only defined while cost > 0. A loss closes
 * once |roi| reaches both the activation threshold and the stop-loss ratio;
 * a gain closes at the take-profit ratio.
 *
 * @example
 * evaluateRisk(Decimal.from(97), Decimal.from(100), limits)
 * // { action: "close", reason: "stop_loss", roi: -0.03 } with 2% activation, 3% stop
 */
export function evaluateRisk(price: Decimal, cost: Decimal, limits: RiskLimits): RiskDecision {
	if (!cost.isPositive()) return { action: "hold", roi: null };

	const roi = price.sub(cost).div(cost);
	const magnitude = roi.abs();
	if (
		magnitude.gte(limits.stopLossActivation) &&
		roi.isNegative() &&
		magnitude.gte(limits.stopLossRatio)
	) {
		return { action: "close", reason: "stop_loss", roi };
	}
	if (roi.gte(limits.takeProfitRatio)) {
		return { action: "close", reason: "take_profit", roi };
	}
	return { action: "hold", roi };
}
