import { checkedMul } from "../../shared/fixed-point.js";
import type { EntryContext, EntryGuard, GuardVerdict } from "../types.js";
import { allow, block, blockBreach } from "../types.js";
import { positionSizeOk } from "../validator.js";

/**
 * Checks the requested notional against the position cap and against what
 * the free balance can carry at the account's leverage.
 */
export class PositionSizeGuard implements EntryGuard {
	readonly name = "PositionSize";

	private constructor() {}

	static create(): PositionSizeGuard {
		return new PositionSizeGuard();
	}

	check(ctx: EntryContext): GuardVerdict {
		const { size } = ctx.request;
		if (size <= 0n) return block(this.name, "size must be positive");

		const buyingPower = checkedMul(ctx.freeBalance(), BigInt(ctx.leverage()));
		const verdict = positionSizeOk(size, buyingPower, ctx.maxPositionSize());
		if (verdict.type === "fail") {
			return blockBreach(this.name, verdict.reason, verdict.measured, verdict.limit);
		}
		return allow();
	}
}
