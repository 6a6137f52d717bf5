/**
 * Evaluation transitions, checked after every committed close in a fixed
 * order: expiry, then drawdown, then the pass condition.
 */

import { applyBps } from "../math/financial.js";
import { drawdownOk } from "../risk/validator.js";
import type { QualificationRules } from "../shared/config.js";
import { checkedAdd } from "../shared/fixed-point.js";
import { EvaluationStatus, FailureReason } from "./types.js";

export type Transition =
	| { readonly status: typeof EvaluationStatus.Active }
	| { readonly status: typeof EvaluationStatus.Passed }
	| { readonly status: typeof EvaluationStatus.Failed; readonly reason: FailureReason };

export interface TransitionInput {
	readonly rules: QualificationRules;
	readonly startedAt: number;
	readonly now: number;
	readonly balance: bigint;
	readonly highWaterMark: bigint;
	readonly tradeCount: number;
}

/** Balance an evaluation must reach to pass. */
export function profitTarget(rules: QualificationRules): bigint {
	return checkedAdd(rules.virtualBalance, applyBps(rules.virtualBalance, rules.profitTargetBps));
}

export function isExpired(rules: QualificationRules, startedAt: number, now: number): boolean {
	return now - startedAt > rules.evaluationPeriodMs;
}

export function nextTransition(input: TransitionInput): Transition {
	const { rules } = input;
	if (isExpired(rules, input.startedAt, input.now)) {
		return { status: EvaluationStatus.Failed, reason: FailureReason.Expired };
	}
	if (drawdownOk(input.balance, input.highWaterMark, rules.maxDrawdownBps).type === "fail") {
		return { status: EvaluationStatus.Failed, reason: FailureReason.Drawdown };
	}
	if (input.balance >= profitTarget(rules) && input.tradeCount >= rules.minTrades) {
		return { status: EvaluationStatus.Passed };
	}
	return { status: EvaluationStatus.Active };
}
