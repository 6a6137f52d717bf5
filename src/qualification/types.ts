import type { ClosedPosition } from "../position/types.js";
import type { QualificationRules } from "../shared/config.js";
import type { EvaluationId, PrincipalId } from "../shared/identifiers.js";

/** Active moves to exactly one of the terminal states. */
export const EvaluationStatus = {
	Active: "active",
	Passed: "passed",
	Failed: "failed",
} as const;

export type EvaluationStatus = (typeof EvaluationStatus)[keyof typeof EvaluationStatus];

export const FailureReason = {
	Expired: "expired",
	Drawdown: "drawdown",
	Halted: "halted",
} as const;

export type FailureReason = (typeof FailureReason)[keyof typeof FailureReason];

/** Read-only view of one evaluation. */
export interface Evaluation {
	readonly id: EvaluationId;
	readonly owner: PrincipalId;
	readonly status: EvaluationStatus;
	/** Rules in force when the evaluation started */
	readonly rules: QualificationRules;
	readonly rulesVersion: number;
	readonly balance: bigint;
	readonly highWaterMark: bigint;
	readonly drawdownBps: number;
	/** Deepest drawdown seen so far */
	readonly maxDrawdownBps: number;
	readonly tradeCount: number;
	readonly wins: number;
	readonly losses: number;
	readonly winRateBps: number;
	readonly lockedMargin: bigint;
	readonly openPositions: number;
	readonly startedAt: number;
	readonly deadline: number;
	readonly endedAt: number | null;
	readonly failureReason: FailureReason | null;
	/** Free text an admin gave when halting */
	readonly haltNote: string | null;
}

/** A committed close and the evaluation it left behind. */
export interface VirtualCloseOutcome {
	readonly position: ClosedPosition;
	readonly evaluation: Evaluation;
}
