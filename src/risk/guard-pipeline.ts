import { LimitBreachError, type RiskEngineError, ValidationError } from "../shared/errors.js";
import { AccountActiveGuard } from "./guards/account-active.js";
import { DailyLossGuard } from "./guards/daily-loss.js";
import { ExpiryGuard } from "./guards/expiry.js";
import { MarginAvailableGuard } from "./guards/margin-available.js";
import { PositionSizeGuard } from "./guards/position-size.js";
import { StopLossPlacementGuard } from "./guards/stop-loss-placement.js";
import type { EntryContext, EntryGuard, GuardVerdict } from "./types.js";
import { allow } from "./types.js";

/**
 * Ordered sequence of entry guards evaluated before a position opens.
 *
 * Guards run in order; the first guard to block stops evaluation.
 * Use {@link GuardPipeline.qualification} or {@link GuardPipeline.funded}
 * for the engine defaults, or extend one with {@link GuardPipeline.with}.
 *
 * @example
 * ```ts
 * const pipeline = GuardPipeline.funded().with(CooldownGuard.fromSecs(30));
 * const verdict = pipeline.evaluate(ctx);
 * ```
 */
export class GuardPipeline {
	private readonly guards: readonly EntryGuard[];

	private constructor(guards: readonly EntryGuard[]) {
		this.guards = guards;
	}

	/** Creates an empty pipeline with no guards. */
	static create(): GuardPipeline {
		return new GuardPipeline([]);
	}

	/** Returns a new pipeline with `guard` appended. */
	with(guard: EntryGuard): GuardPipeline {
		return new GuardPipeline([...this.guards, guard]);
	}

	evaluate(ctx: EntryContext): GuardVerdict {
		for (const guard of this.guards) {
			const verdict = guard.check(ctx);
			if (verdict.type === "block") return verdict;
		}
		return allow();
	}

	isEmpty(): boolean {
		return this.guards.length === 0;
	}

	/** @returns Array of guard names in evaluation order */
	guardNames(): readonly string[] {
		return this.guards.map((g) => g.name);
	}

	// ── Presets ────────────────────────────────────────────────────

	/** Virtual positions: active, inside the window, sized and margined; stop optional. */
	static qualification(): GuardPipeline {
		return GuardPipeline.create()
			.with(AccountActiveGuard.create())
			.with(ExpiryGuard.create())
			.with(PositionSizeGuard.create())
			.with(MarginAvailableGuard.create())
			.with(StopLossPlacementGuard.create());
	}

	/** Live positions: active, under the daily-loss cap, sized and margined, with a stop. */
	static funded(): GuardPipeline {
		return GuardPipeline.create()
			.with(AccountActiveGuard.create())
			.with(DailyLossGuard.create())
			.with(PositionSizeGuard.create())
			.with(MarginAvailableGuard.create())
			.with(StopLossPlacementGuard.create());
	}
}

/** Turn a blocking verdict into the error the engines return. */
export function verdictError(verdict: GuardVerdict & { readonly type: "block" }): RiskEngineError {
	const context = {
		guard: verdict.guard,
		currentValue: verdict.currentValue,
		threshold: verdict.threshold,
	};
	if (verdict.kind === "breach") {
		return new LimitBreachError(verdict.reason, verdict.guard, context);
	}
	return new ValidationError(verdict.reason, context, "GUARD_BLOCKED");
}
