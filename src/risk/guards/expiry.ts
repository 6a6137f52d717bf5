import type { EntryContext, EntryGuard, GuardVerdict } from "../types.js";
import { allow, blockBreach } from "../types.js";

/**
 * Blocks opens once the account's trading window has elapsed.
 * Accounts without a deadline always pass.
 */
export class ExpiryGuard implements EntryGuard {
	readonly name = "Expiry";

	private constructor() {}

	static create(): ExpiryGuard {
		return new ExpiryGuard();
	}

	check(ctx: EntryContext): GuardVerdict {
		const deadline = ctx.deadlineMs();
		if (deadline === null) return allow();
		const now = ctx.nowMs();
		if (now > deadline) {
			return blockBreach(this.name, "evaluation period elapsed", now, deadline);
		}
		return allow();
	}
}
