import type { EntryContext, EntryGuard, GuardVerdict } from "../types.js";
import { allow, blockBreach } from "../types.js";
import { dailyLossExceeded } from "../validator.js";

/**
 * Blocks opens while the rolling daily loss is at or above its cap.
 * Accounts without a cap always pass.
 */
export class DailyLossGuard implements EntryGuard {
	readonly name = "DailyLoss";

	private constructor() {}

	static create(): DailyLossGuard {
		return new DailyLossGuard();
	}

	check(ctx: EntryContext): GuardVerdict {
		const cap = ctx.maxDailyLoss();
		if (cap === null) return allow();
		const loss = ctx.dailyLoss();
		if (dailyLossExceeded(loss, cap)) {
			return blockBreach(this.name, "daily loss limit reached", loss, cap);
		}
		return allow();
	}
}
