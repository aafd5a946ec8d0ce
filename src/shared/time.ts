/**
 * Time utilities — injectable clock for deterministic testing.
 *
 * Record timestamps come from Clock.now() rather than Date.now(), so tests
 * can pin and advance time without touching globals.
 */

/** Injectable time source in milliseconds. */
export interface Clock {
	now(): number;
}

export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

/** Whole seconds since the epoch, the resolution records are stamped with. */
export function unixSeconds(clock: Clock): number {
	return Math.floor(clock.now() / 1_000);
}

// ── Duration helpers ─────────────────────────────────────────────────

export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
	days: (n: number) => n * 86_400_000,
} as const;
