/**
 * Time source for everything that compares timestamps: cache freshness,
 * heartbeat age, order throttling and trade retention. Tests substitute a
 * {@link FakeClock}.
 */

export interface Clock {
	now(): number;
}

export const SystemClock: Clock = {
	now: () => Date.now(),
};

export class FakeClock implements Clock {
	private current: number;

	constructor(startMs = 0) {
		this.current = startMs;
	}

	now(): number {
		return this.current;
	}

	advance(ms: number): void {
		if (ms < 0) throw new Error(`Clock cannot move backwards (${ms}ms)`);
		this.current += ms;
	}
}

export const Duration = {
	seconds: (n: number) => n * 1_000,
	days: (n: number) => n * 86_400_000,
} as const;

export function sleep(ms: number): Promise<void> {
	if (ms <= 0) return Promise.resolve();
	return new Promise((resolve) => {
		setTimeout(resolve, ms);
	});
}
