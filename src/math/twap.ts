/**
 * Time-weighted average price over a trailing window.
 *
 * Only ticks stamped inside `[now - periodMs, now)` count. Each one is
 * weighted by how long it stood: until the next tick, or until `now` for
 * the last. A tick from before the window carries no weight.
 */

import { ValidationError } from "../shared/errors.js";
import { checkedAdd, checkedMul } from "../shared/fixed-point.js";
import { type Result, err, ok } from "../shared/result.js";

/** Minimal tick shape the average needs. */
export interface TimedPrice {
	readonly price: bigint;
	readonly timestamp: number;
}

/**
 * @param ticks ordered oldest first
 * @example twap([{ price: 100n, timestamp: 0 }, { price: 200n, timestamp: 30 }], 60, 60) // ok(150n)
 */
export function twap(
	ticks: readonly TimedPrice[],
	periodMs: number,
	now: number,
): Result<bigint, ValidationError> {
	if (!Number.isInteger(periodMs) || periodMs <= 0) {
		return err(new ValidationError("TWAP period must be a positive whole number of ms", { periodMs }));
	}
	const windowStart = now - periodMs;
	const inWindow = ticks.filter((t) => t.timestamp >= windowStart && t.timestamp < now);
	if (inWindow.length === 0) {
		return err(new ValidationError("No ticks inside the TWAP window", { periodMs, now }));
	}

	let weightedSum = 0n;
	let totalWeight = 0n;
	for (let i = 0; i < inWindow.length; i++) {
		const tick = inWindow[i];
		if (tick === undefined) continue;
		const end = inWindow[i + 1]?.timestamp ?? now;
		const weight = BigInt(end - tick.timestamp);
		weightedSum = checkedAdd(weightedSum, checkedMul(tick.price, weight));
		totalWeight += weight;
	}

	// The last tick is stamped before `now`, so totalWeight > 0.
	return ok(weightedSum / totalWeight);
}
