/**
 * Entry-guard type definitions.
 *
 * EntryContext is the slim view of an account that guards read when a
 * position is about to open. Both engines build one per request.
 */

import type { FeedSymbol } from "../shared/identifiers.js";

// ── Guard verdict (discriminated union) ─────────────────────────────

/** How a blocked open is surfaced: a plain rejection or a limit breach. */
export type BlockKind = "rejected" | "breach";

/** Result of a guard check -- either allows the open or blocks it with a reason. */
export type GuardVerdict =
	| { readonly type: "allow" }
	| {
			readonly type: "block";
			readonly guard: string;
			readonly reason: string;
			readonly kind: BlockKind;
			readonly currentValue?: bigint | number | undefined;
			readonly threshold?: bigint | number | undefined;
	  };

/** Create an "allow" verdict -- the open passes this guard. */
export function allow(): GuardVerdict {
	return { type: "allow" };
}

/** Create a "block" verdict for a malformed or out-of-state request. */
export function block(guard: string, reason: string): GuardVerdict {
	return { type: "block", guard, reason, kind: "rejected" };
}

/** Create a "block" verdict for a request that would cross a risk limit. */
export function blockBreach(
	guard: string,
	reason: string,
	currentValue: bigint | number,
	threshold: bigint | number,
): GuardVerdict {
	return { type: "block", guard, reason, kind: "breach", currentValue, threshold };
}

/** Type guard: narrows a GuardVerdict to its "allow" variant. */
export function isAllowed(verdict: GuardVerdict): verdict is { readonly type: "allow" } {
	return verdict.type === "allow";
}

/** Type guard: narrows a GuardVerdict to its "block" variant. */
export function isBlocked(
	verdict: GuardVerdict,
): verdict is GuardVerdict & { readonly type: "block" } {
	return verdict.type === "block";
}

// ── Open request ────────────────────────────────────────────────────

/** What a participant asks for when opening a position. Entry price comes from the feed. */
export interface OpenRequest {
	readonly symbol: FeedSymbol;
	/** Notional amount in currency units */
	readonly size: bigint;
	readonly isLong: boolean;
	readonly stopLoss?: bigint | undefined;
	readonly takeProfit?: bigint | undefined;
}

// ── Guard context (slim interface) ──────────────────────────────────

/** Account data entry guards read; engines provide it per request. */
export interface EntryContext {
	readonly request: OpenRequest;
	readonly entryPrice: bigint;
	nowMs(): number;
	isActive(): boolean;
	/** Last instant the account may trade, or null when unbounded */
	deadlineMs(): number | null;
	/** Balance minus margin already locked */
	freeBalance(): bigint;
	leverage(): number;
	maxPositionSize(): bigint;
	dailyLoss(): bigint;
	/** null when the account has no daily-loss cap */
	maxDailyLoss(): bigint | null;
	stopLossRequired(): boolean;
	lastOpenedAtMs(): number | null;
}

// ── Entry guard interface ───────────────────────────────────────────

/** Pre-open risk check -- returns allow or block verdict based on current context. */
export interface EntryGuard {
	readonly name: string;
	check(ctx: EntryContext): GuardVerdict;
}
