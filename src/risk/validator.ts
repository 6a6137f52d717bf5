/**
 * Risk predicates — pure checks that gate every state mutation.
 *
 * Inputs are already validated; none of these mutate anything.
 */

import { drawdownBps, ratioBps } from "../math/financial.js";
import { type RiskVerdict, fail, pass } from "./verdict.js";

// ── Limit predicates ────────────────────────────────────────────────

/** Drawdown below the high-water mark must not exceed `maxBps`. */
export function drawdownOk(balance: bigint, hwm: bigint, maxBps: number): RiskVerdict {
	const dd = drawdownBps(balance, hwm);
	if (dd > maxBps) {
		return fail("drawdown", `drawdown ${dd} bps exceeds ${maxBps} bps`, dd, maxBps);
	}
	return pass("drawdown", dd);
}

export function exposureOk(exposure: bigint, maxExposure: bigint): RiskVerdict {
	if (exposure > maxExposure) {
		return fail("exposure", "exposure above limit", exposure, maxExposure);
	}
	return pass("exposure", exposure);
}

/** Rejects a zero size, a size above `maxSize`, or a size above `availableBalance`. */
export function positionSizeOk(size: bigint, availableBalance: bigint, maxSize: bigint): RiskVerdict {
	if (size <= 0n) {
		return fail("position_size", "size must be positive", size, 1n);
	}
	if (size > maxSize) {
		return fail("position_size", "size above maximum position size", size, maxSize);
	}
	if (size > availableBalance) {
		return fail("position_size", "size above available balance", size, availableBalance);
	}
	return pass("position_size", size);
}

/** Collateral over exposure, in bps, must reach `minRatioBps`. Vacuous at zero exposure. */
export function collateralRatioOk(collateral: bigint, exposure: bigint, minRatioBps: number): RiskVerdict {
	if (exposure === 0n) return pass("collateral_ratio", 0n);
	const ratio = ratioBps(collateral, exposure);
	if (ratio < BigInt(minRatioBps)) {
		return fail("collateral_ratio", "collateralization below minimum", ratio, minRatioBps);
	}
	return pass("collateral_ratio", ratio);
}

/** Profit target and drawdown cap must both lie strictly inside (0, 10000). */
export function evaluationRulesOk(profitTargetBps: number, maxDrawdownBps: number): RiskVerdict {
	if (profitTargetBps <= 0 || profitTargetBps >= 10_000) {
		return fail("evaluation_rules", "profit target must be in (0, 10000) bps", profitTargetBps, 10_000);
	}
	if (maxDrawdownBps <= 0 || maxDrawdownBps >= 10_000) {
		return fail("evaluation_rules", "drawdown cap must be in (0, 10000) bps", maxDrawdownBps, 10_000);
	}
	return pass("evaluation_rules", profitTargetBps);
}

// ── Triggers ────────────────────────────────────────────────────────

/** Long: `price <= stop`. Short: `price >= stop`. */
export function stopTriggered(price: bigint, stopPrice: bigint, isLong: boolean): boolean {
	return isLong ? price <= stopPrice : price >= stopPrice;
}

/** Long: `price >= tp`. Short: `price <= tp`. */
export function takeProfitTriggered(price: bigint, tpPrice: bigint, isLong: boolean): boolean {
	return isLong ? price >= tpPrice : price <= tpPrice;
}

/** True once more than `heartbeatMs` has passed since `lastUpdateMs`. */
export function isStale(lastUpdateMs: number, heartbeatMs: number, now: number): boolean {
	return now - lastUpdateMs > heartbeatMs;
}

/** At-limit counts as exceeded. */
export function dailyLossExceeded(currentLoss: bigint, maxLoss: bigint): boolean {
	return currentLoss >= maxLoss;
}

/** True when there was no previous action or `cooldownMs` has passed since it. */
export function cooldownElapsed(lastActionMs: number | null, cooldownMs: number, now: number): boolean {
	if (lastActionMs === null) return true;
	return now - lastActionMs >= cooldownMs;
}
