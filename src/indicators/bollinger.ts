import { Decimal } from "../shared/decimal.js";

/** Upper/middle/lower triple of one band, copied out at a single instant. */
export interface BandSnapshot {
	readonly upper: Decimal;
	readonly middle: Decimal;
	readonly lower: Decimal;
	/** True once the window holds a full period of closes. */
	readonly ready: boolean;
}

/**
 * Rolling Bollinger band over the last `period` closes.
 *
 * middle = mean, std = population standard deviation,
 * upper/lower = middle ± multiplier·std. Until the window is full every line
 * reads the latest close (zero when empty) and `ready` is false.
 */
export class BollingerBand {
	readonly period: number;
	readonly multiplier: Decimal;
	private window: Decimal[] = [];

	constructor(period: number, multiplier: Decimal) {
		if (!Number.isInteger(period) || period < 1) {
			throw new Error(`BollingerBand: period must be a positive integer, got ${period}`);
		}
		this.period = period;
		this.multiplier = multiplier;
	}

	/** Append one close, evicting the oldest once the window is full. */
	update(price: Decimal): void {
		this.window.push(price);
		if (this.window.length > this.period) {
			this.window.shift();
		}
	}

	/** Replace the window with the last `period` of `closes`. */
	reset(closes: readonly Decimal[]): void {
		this.window = closes.slice(-this.period);
	}

	get size(): number {
		return this.window.length;
	}

	isReady(): boolean {
		return this.window.length >= this.period;
	}

	snapshot(): BandSnapshot {
		const latest = this.window[this.window.length - 1] ?? Decimal.zero();
		if (!this.isReady()) {
			return { upper: latest, middle: latest, lower: latest, ready: false };
		}

		const n = Decimal.from(this.window.length);
		const sum = this.window.reduce((acc, p) => acc.add(p), Decimal.zero());
		const middle = sum.div(n);
		const squared = this.window.reduce((acc, p) => {
			const diff = p.sub(middle);
			return acc.add(diff.mul(diff));
		}, Decimal.zero());
		const band = squared.div(n).sqrt().mul(this.multiplier);

		return { upper: middle.add(band), middle, lower: middle.sub(band), ready: true };
	}
}

/** Inclusive band membership. */
export function isInBand(price: Decimal, band: BandSnapshot): boolean {
	return price.gte(band.lower) && price.lte(band.upper);
}
