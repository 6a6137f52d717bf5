import type { EntryContext, EntryGuard, GuardVerdict } from "../types.js";
import { allow, block } from "../types.js";

/** Blocks opens on an account that is not Active (failed, passed or paused). */
export class AccountActiveGuard implements EntryGuard {
	readonly name = "AccountActive";

	private constructor() {}

	static create(): AccountActiveGuard {
		return new AccountActiveGuard();
	}

	check(ctx: EntryContext): GuardVerdict {
		return ctx.isActive() ? allow() : block(this.name, "account is not active");
	}
}
