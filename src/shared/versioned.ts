/**
 * VersionedConfig — replace-only configuration with a version counter.
 *
 * Readers take a snapshot at the start of an operation (or when an
 * evaluation or position starts) and keep using it, so a replacement
 * never changes anything already in flight.
 */

import type { Clock } from "./time.js";

export interface Versioned<T> {
	readonly version: number;
	readonly value: T;
	readonly updatedAtMs: number;
}

export class VersionedConfig<T> {
	private snapshot: Versioned<T>;
	private readonly clock: Clock;

	constructor(initial: T, clock: Clock) {
		this.clock = clock;
		this.snapshot = { version: 1, value: initial, updatedAtMs: clock.now() };
	}

	current(): Versioned<T> {
		return this.snapshot;
	}

	/** Replace the value; returns the new snapshot. Callers validate and authorize first. */
	replace(value: T): Versioned<T> {
		this.snapshot = {
			version: this.snapshot.version + 1,
			value,
			updatedAtMs: this.clock.now(),
		};
		return this.snapshot;
	}
}
