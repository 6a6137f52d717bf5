import type { EntryContext, EntryGuard, GuardVerdict } from "../types.js";
import { allow, block } from "../types.js";

/**
 * Requires a stop-loss where the account demands one, and checks that the
 * stop sits on the loss side of entry and the take-profit on the profit side.
 */
export class StopLossPlacementGuard implements EntryGuard {
	readonly name = "StopLossPlacement";

	private constructor() {}

	static create(): StopLossPlacementGuard {
		return new StopLossPlacementGuard();
	}

	check(ctx: EntryContext): GuardVerdict {
		const { isLong, stopLoss, takeProfit } = ctx.request;
		const entry = ctx.entryPrice;

		if (stopLoss === undefined) {
			return ctx.stopLossRequired() ? block(this.name, "stop-loss is mandatory") : allow();
		}
		if (stopLoss <= 0n || (isLong ? stopLoss >= entry : stopLoss <= entry)) {
			return block(this.name, "stop-loss must sit on the loss side of entry");
		}
		if (takeProfit !== undefined && (isLong ? takeProfit <= entry : takeProfit >= entry)) {
			return block(this.name, "take-profit must sit on the profit side of entry");
		}
		return allow();
	}
}
