/**
 * Fixed-point amounts — scaled bigint integers.
 *
 * Prices carry 8 decimals, currency amounts carry the asset's decimals
 * (6 by default). Every product is checked against the signed 256-bit
 * range before it is used; division truncates toward zero.
 *
 * All financial values (prices, sizes, balances, P&L) MUST be scaled bigints.
 * Never use raw `number` for money.
 */

import { ArithmeticOverflowError, InvariantViolationError, ValidationError } from "./errors.js";

export const PRICE_DECIMALS = 8;
export const PRICE_ONE = 10n ** BigInt(PRICE_DECIMALS);
export const CURRENCY_DECIMALS = 6;
export const BPS_DENOMINATOR = 10_000n;

const INT256_MAX = (1n << 255n) - 1n;
const INT256_MIN = -(1n << 255n);

// ── Checked arithmetic ─────────────────────────────────────────────

function bounded(value: bigint, op: string, a: bigint, b: bigint): bigint {
	if (value > INT256_MAX || value < INT256_MIN) {
		throw new ArithmeticOverflowError(`${op} overflows int256`, { a, b });
	}
	return value;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
	return bounded(a + b, "add", a, b);
}

export function checkedSub(a: bigint, b: bigint): bigint {
	return bounded(a - b, "sub", a, b);
}

export function checkedMul(a: bigint, b: bigint): bigint {
	return bounded(a * b, "mul", a, b);
}

/** `a * b / d`, with the product checked before dividing. */
export function mulDiv(a: bigint, b: bigint, d: bigint): bigint {
	if (d === 0n) {
		throw new InvariantViolationError("mulDiv: division by zero", { a, b });
	}
	return checkedMul(a, b) / d;
}

export function minOf(a: bigint, b: bigint): bigint {
	return a <= b ? a : b;
}

export function maxOf(a: bigint, b: bigint): bigint {
	return a >= b ? a : b;
}

export function absOf(a: bigint): bigint {
	return a < 0n ? -a : a;
}

// ── Parsing / formatting ───────────────────────────────────────────

/**
 * Parse a decimal string into a scaled integer, truncating digits past `decimals`.
 * @throws ValidationError on empty or malformed input
 * @example parseUnits("50000", 8) // 5_000_000_000_000n
 */
export function parseUnits(text: string, decimals: number): bigint {
	const trimmed = text.trim();
	if (!/^-?(\d+\.?\d*|\.\d+)$/.test(trimmed)) {
		throw new ValidationError(`Cannot parse "${text}" as a decimal amount`);
	}
	const scale = 10n ** BigInt(decimals);
	const negative = trimmed.startsWith("-");
	const abs = negative ? trimmed.slice(1) : trimmed;
	const dotIdx = abs.indexOf(".");

	let raw: bigint;
	if (dotIdx === -1) {
		raw = BigInt(abs) * scale;
	} else {
		const intPart = abs.slice(0, dotIdx) || "0";
		const fracPart = abs.slice(dotIdx + 1);
		const paddedFrac = fracPart.padEnd(decimals, "0").slice(0, decimals);
		raw = BigInt(intPart) * scale + (decimals > 0 ? BigInt(paddedFrac) : 0n);
	}
	return negative ? -raw : raw;
}

/** Render a scaled integer as a decimal string without trailing zeros. */
export function formatUnits(value: bigint, decimals: number): string {
	const scale = 10n ** BigInt(decimals);
	const negative = value < 0n;
	const absRaw = negative ? -value : value;
	const intPart = absRaw / scale;
	const fracStr =
		decimals > 0
			? (absRaw % scale).toString().padStart(decimals, "0").replace(/0+$/, "")
			: "";
	const prefix = negative ? "-" : "";
	return fracStr.length > 0 ? `${prefix}${intPart}.${fracStr}` : `${prefix}${intPart}`;
}

/** Currency amount at the default 6 decimals. */
export function toAmount(text: string): bigint {
	return parseUnits(text, CURRENCY_DECIMALS);
}

/** Price at 8 decimals. */
export function toPrice(text: string): bigint {
	return parseUnits(text, PRICE_DECIMALS);
}
