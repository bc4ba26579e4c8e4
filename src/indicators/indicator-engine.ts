import { Decimal } from "../shared/decimal.js";
import { SystemClock } from "../shared/time.js";
import type { Clock } from "../shared/time.js";
import { BollingerBand } from "./bollinger.js";
import type { BandSnapshot } from "./bollinger.js";

export interface IndicatorConfig {
	readonly longPeriod: number;
	readonly longStdDev: number;
	readonly shortPeriod: number;
	readonly shortStdDev: number;
}

/** Both bands as of one call; never a mix of two refreshes. */
export interface IndicatorSnapshot {
	readonly long: BandSnapshot;
	readonly short: BandSnapshot;
	readonly takenAtMs: number;
}

export interface IndicatorRefresh {
	readonly long?: readonly Decimal[];
	readonly short?: readonly Decimal[];
}

/**
 * IndicatorEngine — long and short horizon Bollinger bands.
 *
 * `refresh` rebuilds the windows from kline closes and is the source of
 * truth; `pushPrice` moves both windows with live prices in between.
 */
export class IndicatorEngine {
	private readonly longBand: BollingerBand;
	private readonly shortBand: BollingerBand;
	private readonly clock: Clock;
	private lastRefreshMs: number | null = null;

	constructor(config: IndicatorConfig, clock: Clock = SystemClock) {
		this.longBand = new BollingerBand(config.longPeriod, Decimal.from(config.longStdDev));
		this.shortBand = new BollingerBand(config.shortPeriod, Decimal.from(config.shortStdDev));
		this.clock = clock;
	}

	/** Replace whichever windows are given. */
	refresh(closes: IndicatorRefresh): void {
		if (closes.long !== undefined) this.longBand.reset(closes.long);
		if (closes.short !== undefined) this.shortBand.reset(closes.short);
		this.lastRefreshMs = this.clock.now();
	}

	pushPrice(price: Decimal): void {
		this.longBand.update(price);
		this.shortBand.update(price);
	}

	snapshot(): IndicatorSnapshot {
		return {
			long: this.longBand.snapshot(),
			short: this.shortBand.snapshot(),
			takenAtMs: this.clock.now(),
		};
	}

	isReady(): boolean {
		return this.longBand.isReady() && this.shortBand.isReady();
	}

	/** Window fill levels, for readiness logging. */
	sampleCounts(): { long: string; short: string } {
		return {
			long: `${this.longBand.size}/${this.longBand.period}`,
			short: `${this.shortBand.size}/${this.shortBand.period}`,
		};
	}

	get periods(): { readonly long: number; readonly short: number } {
		return { long: this.longBand.period, short: this.shortBand.period };
	}

	/** Epoch ms of the last kline refresh, or null before the first one. */
	get lastRefreshAt(): number | null {
		return this.lastRefreshMs;
	}
}
