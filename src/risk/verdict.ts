/**
 * Limit-check verdicts.
 *
 * Limit predicates report the value they measured so that callers can put
 * it in a LimitBreachError or a log line without recomputing it.
 */

/** A measured quantity: bigint for amounts, number for bps. */
export type Measure = bigint | number;

/** Outcome of a limit predicate. */
export type RiskVerdict =
	| { readonly type: "pass"; readonly check: string; readonly measured: Measure }
	| {
			readonly type: "fail";
			readonly check: string;
			readonly reason: string;
			readonly measured: Measure;
			readonly limit: Measure;
	  };

/** Create a "pass" verdict carrying the measured value. */
export function pass(check: string, measured: Measure): RiskVerdict {
	return { type: "pass", check, measured };
}

/** Create a "fail" verdict with the measured value and the limit it crossed. */
export function fail(check: string, reason: string, measured: Measure, limit: Measure): RiskVerdict {
	return { type: "fail", check, reason, measured, limit };
}

/** Type guard: narrows a RiskVerdict to its "pass" variant. */
export function passed(
	verdict: RiskVerdict,
): verdict is RiskVerdict & { readonly type: "pass" } {
	return verdict.type === "pass";
}

/** Type guard: narrows a RiskVerdict to its "fail" variant. */
export function failed(
	verdict: RiskVerdict,
): verdict is RiskVerdict & { readonly type: "fail" } {
	return verdict.type === "fail";
}
