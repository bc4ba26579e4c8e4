import type { BandSnapshot } from "../indicators/bollinger.js";
import { Decimal } from "../shared/decimal.js";

export interface ScaleBounds {
	readonly minScale: Decimal;
	readonly maxScale: Decimal;
}

const HALF = Decimal.from("0.5");
const TWO = Decimal.from(2);

/**
 * Where `price` sits inside the band, 0 at the lower line and 1 at the upper,
 * clamped. A band of zero width only tells which side of the middle the price
 * is on: 0 below, 1 above, 0.5 on it.
 */
export function bandPosition(price: Decimal, band: BandSnapshot): Decimal {
	const width = band.upper.sub(band.lower);
	if (!width.isPositive()) {
		const side = price.cmp(band.middle);
		if (side < 0) return Decimal.zero();
		if (side > 0) return Decimal.one();
		return HALF;
	}
	return price.sub(band.lower).div(width).clamp(Decimal.zero(), Decimal.one());
}

/**
 * Target holding multiplier. Cheap against both bands pushes toward
 * `maxScale`, expensive toward `minScale`.
 */
export function calcPositionScale(
	price: Decimal,
	long: BandSnapshot,
	short: BandSnapshot,
	bounds: ScaleBounds,
): Decimal {
	const longWeight = Decimal.one().sub(bandPosition(price, long));
	const shortWeight = Decimal.one().sub(bandPosition(price, short));
	const weight = longWeight.add(shortWeight).div(TWO);
	return bounds.minScale.add(bounds.maxScale.sub(bounds.minScale).mul(weight));
}
