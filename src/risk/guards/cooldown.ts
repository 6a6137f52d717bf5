import type { EntryContext, EntryGuard, GuardVerdict } from "../types.js";
import { allow, block } from "../types.js";
import { cooldownElapsed } from "../validator.js";

/**
 * Guard that enforces a minimum delay between consecutive opens on one account.
 *
 * @example
 * ```ts
 * const pipeline = GuardPipeline.funded().with(CooldownGuard.fromSecs(30));
 * ```
 */
export class CooldownGuard implements EntryGuard {
	readonly name = "Cooldown";
	private readonly cooldownMs: number;

	private constructor(cooldownMs: number) {
		this.cooldownMs = cooldownMs;
	}

	static create(cooldownMs: number): CooldownGuard {
		return new CooldownGuard(cooldownMs);
	}

	static fromSecs(secs: number): CooldownGuard {
		return new CooldownGuard(secs * 1_000);
	}

	check(ctx: EntryContext): GuardVerdict {
		const last = ctx.lastOpenedAtMs();
		if (cooldownElapsed(last, this.cooldownMs, ctx.nowMs())) return allow();
		return block(this.name, "cooldown active");
	}
}
