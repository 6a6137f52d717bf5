/**
 * Domain identifiers — branded strings so an AccountId can never be
 * passed where a FeedSymbol is expected.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Funded account or collateral-pool participant. */
export type AccountId = Brand<string, "AccountId">;
/** Actor holding capabilities: participant, admin or feeder. */
export type PrincipalId = Brand<string, "PrincipalId">;
/** Price feed symbol such as "BTC/USD". */
export type FeedSymbol = Brand<string, "FeedSymbol">;
/** Evaluation run identifier, unique per qualification engine. */
export type EvaluationId = Brand<string, "EvaluationId">;

/** Position ids are sequential per ledger, starting at 1. */
export type PositionId = number;

// ── Factory functions with validation ────────────────────────────────

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated AccountId. Throws if empty. */
export function accountId(value: string): AccountId {
	return createBrandedId(value, "AccountId");
}

/** Create a validated PrincipalId. Throws if empty. */
export function principalId(value: string): PrincipalId {
	return createBrandedId(value, "PrincipalId");
}

/** Create a validated EvaluationId. Throws if empty. */
export function evaluationId(value: string): EvaluationId {
	return createBrandedId(value, "EvaluationId");
}

/** Create a FeedSymbol; symbols are upper-cased "BASE/QUOTE" pairs. */
export function feedSymbol(value: string): FeedSymbol {
	const id = createBrandedId(value.toUpperCase(), "FeedSymbol");
	if (!/^[A-Z0-9]+\/[A-Z0-9]+$/.test(id)) {
		throw new Error(`FeedSymbol must look like BASE/QUOTE, got: ${value}`);
	}
	return id;
}
