import { marginForNotional } from "../../math/financial.js";
import type { EntryContext, EntryGuard, GuardVerdict } from "../types.js";
import { allow, blockBreach } from "../types.js";

/** Blocks opens whose margin would exceed the balance not already locked. */
export class MarginAvailableGuard implements EntryGuard {
	readonly name = "MarginAvailable";

	private constructor() {}

	static create(): MarginAvailableGuard {
		return new MarginAvailableGuard();
	}

	check(ctx: EntryContext): GuardVerdict {
		const margin = marginForNotional(ctx.request.size, ctx.leverage());
		const free = ctx.freeBalance();
		if (margin === 0n || margin > free) {
			return blockBreach(this.name, "insufficient free balance for margin", margin, free);
		}
		return allow();
	}
}
