/**
 * Financial math on scaled integers.
 *
 * Prices are 8-decimal, amounts are currency-decimal, ratios are bps.
 * Every product goes through checkedMul; every quotient truncates toward zero.
 */

import { InvariantViolationError, ValidationError } from "../shared/errors.js";
import {
	BPS_DENOMINATOR,
	PRICE_ONE,
	absOf,
	checkedSub,
	mulDiv,
} from "../shared/fixed-point.js";
import { type Result, err, ok } from "../shared/result.js";

/** Profit split result: participant share first, pool share second. */
export type ProfitSplit = readonly [participantShare: bigint, poolShare: bigint];

/**
 * Signed P&L of a position whose `size` is its notional amount.
 * `(isLong ? exit - entry : entry - exit) * size / entry`
 * @example pnl(50_000e8, 52_500e8, 5_000e6, true) // 250e6
 */
export function pnl(entry: bigint, exit: bigint, size: bigint, isLong: boolean): bigint {
	if (entry <= 0n) {
		throw new InvariantViolationError("pnl: entry price must be positive", { entry });
	}
	const move = isLong ? checkedSub(exit, entry) : checkedSub(entry, exit);
	return mulDiv(move, size, entry);
}

/** `|next - prev| * 10000 / prev`; fails when `prev` is zero. */
export function percentChange(prev: bigint, next: bigint): Result<bigint, ValidationError> {
	if (prev === 0n) {
		return err(new ValidationError("percentChange: previous value is zero"));
	}
	return ok(mulDiv(absOf(checkedSub(next, prev)), BPS_DENOMINATOR, absOf(prev)));
}

/** Drawdown below the high-water mark in bps; 0 when at or above it. */
export function drawdownBps(balance: bigint, hwm: bigint): number {
	if (balance >= hwm || hwm <= 0n) return 0;
	const floored = balance < 0n ? 0n : balance;
	return Number(mulDiv(hwm - floored, BPS_DENOMINATOR, hwm));
}

/** Margin for `size` units at `price`: `size * price / 1e8 / leverage`. */
export function requiredMargin(size: bigint, leverage: number, price: bigint): bigint {
	assertLeverage(leverage);
	return mulDiv(size, price, PRICE_ONE) / BigInt(leverage);
}

/** Margin for a notional amount: the notional priced at 1.0, divided by leverage. */
export function marginForNotional(notional: bigint, leverage: number): bigint {
	return requiredMargin(notional, leverage, PRICE_ONE);
}

/** Price at which the margin is fully consumed: `entry ∓ entry / leverage`. */
export function liquidationPrice(entry: bigint, leverage: number, isLong: boolean): bigint {
	assertLeverage(leverage);
	const distance = entry / BigInt(leverage);
	return isLong ? entry - distance : entry + distance;
}

/** `value * bps / 10000`. */
export function applyBps(value: bigint, bps: number): bigint {
	assertBps(bps);
	return mulDiv(value, BigInt(bps), BPS_DENOMINATOR);
}

/** Split `total` so the parts always sum back to `total`. */
export function splitProfit(total: bigint, shareBps: number): ProfitSplit {
	const share = applyBps(total, shareBps);
	return [share, total - share];
}

/** `numerator * 10000 / denominator`, for ratios that may exceed 100%. */
export function ratioBps(numerator: bigint, denominator: bigint): bigint {
	if (denominator === 0n) {
		throw new InvariantViolationError("ratioBps: denominator is zero");
	}
	return mulDiv(numerator, BPS_DENOMINATOR, denominator);
}

// ── Guards ────────────────────────────────────────────────────────
// Callers validate leverage and bps at the config boundary; reaching these is a bug.

function assertLeverage(leverage: number): void {
	if (!Number.isInteger(leverage) || leverage <= 0) {
		throw new InvariantViolationError(`leverage must be a positive integer, got ${leverage}`);
	}
}

function assertBps(bps: number): void {
	if (!Number.isInteger(bps) || bps < 0 || bps > 10_000) {
		throw new InvariantViolationError(`bps must be an integer in [0, 10000], got ${bps}`);
	}
}
