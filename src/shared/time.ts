/**
 * Time utilities — injectable clock.
 *
 * Every timeout in the engine is a comparison against a stored timestamp
 * (feed heartbeat, evaluation period, daily-loss window), so all of them
 * read the same Clock.
 */

/** Injectable time source in milliseconds since epoch. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/**
 * Controllable clock for deterministic testing -- advance time manually with `advance()`.
 * Time never runs backwards: a heartbeat or window measured against it would go negative.
 */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		if (ms < 0) {
			throw new RangeError(`FakeClock.advance requires non-negative ms, got ${ms}`);
		}
		this.time += ms;
	}

	set(ms: number): void {
		if (ms < this.time) {
			throw new RangeError(`FakeClock.set cannot move back from ${this.time} to ${ms}`);
		}
		this.time = ms;
	}
}

// ── Duration helpers ─────────────────────────────────────────────────

/** Helpers to convert human-readable durations to milliseconds. */
export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
	days: (n: number) => n * 86_400_000,
} as const;
