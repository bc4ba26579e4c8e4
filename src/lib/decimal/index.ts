/**
 * LibDecimal — immutable wrapper around decimal.js-light.
 *
 * Prices, quantities, cost basis and band statistics go through this type so
 * that ladder budgets and ledger arithmetic never accumulate float error.
 * Domain code imports it through `shared/decimal`, not from here.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40, rounding: DecimalLight.ROUND_HALF_UP });

/** Rounding applied by {@link LibDecimal.round}. */
export type RoundingMode = "half_up" | "down" | "up";

const ROUNDING: Record<RoundingMode, number> = {
	half_up: DecimalLight.ROUND_HALF_UP,
	down: DecimalLight.ROUND_DOWN,
	up: DecimalLight.ROUND_UP,
};

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * @throws Error for non-finite numbers and blank strings
	 * @example LibDecimal.from("142.35")
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		return new LibDecimal(new DecimalLight(trimmed));
	}

	static zero(): LibDecimal {
		return new LibDecimal(new DecimalLight(0));
	}

	static one(): LibDecimal {
		return new LibDecimal(new DecimalLight(1));
	}

	static min(a: LibDecimal, b: LibDecimal): LibDecimal {
		return a.lte(b) ? a : b;
	}

	static max(a: LibDecimal, b: LibDecimal): LibDecimal {
		return a.gte(b) ? a : b;
	}

	// ── Arithmetic ─────────────────────────────────────────────────

	add(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.plus(other.raw));
	}

	sub(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.minus(other.raw));
	}

	mul(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.times(other.raw));
	}

	/** @throws Error on division by zero */
	div(other: LibDecimal): LibDecimal {
		if (other.raw.isZero()) {
			throw new Error("LibDecimal.div: division by zero");
		}
		return new LibDecimal(this.raw.dividedBy(other.raw));
	}

	neg(): LibDecimal {
		return new LibDecimal(this.raw.negated());
	}

	abs(): LibDecimal {
		return new LibDecimal(this.raw.absoluteValue());
	}

	/** @throws Error for negative values */
	sqrt(): LibDecimal {
		if (this.raw.isNegative()) {
			throw new Error("LibDecimal.sqrt: sqrt of negative");
		}
		return new LibDecimal(this.raw.squareRoot());
	}

	/**
	 * Round to a fixed number of decimal places.
	 * @example LibDecimal.from("99.975").round(2) // "99.98"
	 */
	round(places: number, mode: RoundingMode = "half_up"): LibDecimal {
		return new LibDecimal(this.raw.toDecimalPlaces(places, ROUNDING[mode]));
	}

	/** Bound to [lo, hi]. */
	clamp(lo: LibDecimal, hi: LibDecimal): LibDecimal {
		if (this.lt(lo)) return lo;
		if (this.gt(hi)) return hi;
		return this;
	}

	// ── Comparison ─────────────────────────────────────────────────

	cmp(other: LibDecimal): number {
		return this.raw.comparedTo(other.raw);
	}

	eq(other: LibDecimal): boolean {
		return this.raw.equals(other.raw);
	}

	gt(other: LibDecimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	gte(other: LibDecimal): boolean {
		return this.raw.greaterThanOrEqualTo(other.raw);
	}

	lt(other: LibDecimal): boolean {
		return this.raw.lessThan(other.raw);
	}

	lte(other: LibDecimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Plain notation without trailing zeros.
	 * @example LibDecimal.from("1.500").toString() // "1.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (!fixed.includes(".")) return fixed;
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	/** Lossy; for logging and ratios only. */
	toNumber(): number {
		return this.raw.toNumber();
	}

	toJSON(): string {
		return this.toString();
	}
}
