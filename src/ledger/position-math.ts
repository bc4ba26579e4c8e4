import { Decimal } from "../shared/decimal.js";
import { OrderSide } from "../shared/market-side.js";

/** Net holding and the quote currency paid for it. */
export interface PositionState {
	readonly size: Decimal;
	readonly cost: Decimal;
}

export interface FillDelta {
	readonly side: OrderSide;
	readonly price: Decimal;
	readonly quantity: Decimal;
}

export const EMPTY_POSITION: PositionState = { size: Decimal.zero(), cost: Decimal.zero() };

/**
 * Apply one fill to a position.
 *
 * A buy adds `quantity` to size and `quantity × price` to cost. A sell removes
 * `(quantity / size) × cost`, the proportional share of the cost basis; a sell
 * against a flat position leaves cost at zero. Both values are clamped at zero
 * so an oversell cannot produce a short.
 */
export function applyFillToPosition(position: PositionState, fill: FillDelta): PositionState {
	if (fill.side === OrderSide.Bid) {
		return clampPosition({
			size: position.size.add(fill.quantity),
			cost: position.cost.add(fill.quantity.mul(fill.price)),
		});
	}

	const cost = position.size.isPositive()
		? position.cost.sub(fill.quantity.div(position.size).mul(position.cost))
		: Decimal.zero();
	return clampPosition({ size: position.size.sub(fill.quantity), cost });
}

export function clampPosition(position: PositionState): PositionState {
	const zero = Decimal.zero();
	return {
		size: Decimal.max(position.size, zero),
		cost: Decimal.max(position.cost, zero),
	};
}

/** `cost / size`, or zero for a flat position. */
export function averagePrice(position: PositionState): Decimal {
	return position.size.isPositive() ? position.cost.div(position.size) : Decimal.zero();
}
