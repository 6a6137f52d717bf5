import type { ClosedPosition } from "../position/types.js";
import type { FundedParams } from "../shared/config.js";
import type { AccountId, PrincipalId } from "../shared/identifiers.js";

/** Paused is reachable through a daily-loss breach or an admin pause. */
export const AccountStatus = {
	Active: "active",
	Paused: "paused",
} as const;

export type AccountStatus = (typeof AccountStatus)[keyof typeof AccountStatus];

export const PauseReason = {
	DailyLoss: "daily_loss",
	Admin: "admin",
} as const;

export type PauseReason = (typeof PauseReason)[keyof typeof PauseReason];

/** Read-only view of a funded account. */
export interface FundedAccount {
	readonly accountId: AccountId;
	readonly owner: PrincipalId;
	readonly status: AccountStatus;
	readonly params: FundedParams;
	readonly balance: bigint;
	readonly highWaterMark: bigint;
	/** Initial capital; payable profit is measured from here and a payout settles back to it */
	readonly payoutBasis: bigint;
	readonly drawdownBps: number;
	/** Realized loss in the current daily window */
	readonly dailyLoss: bigint;
	readonly dailyWindowStart: number;
	readonly tradeCount: number;
	readonly lockedMargin: bigint;
	readonly openPositions: number;
	readonly totalPaidOut: bigint;
	readonly pauseReason: PauseReason | null;
	readonly pauseNote: string | null;
	readonly createdAt: number;
}

/** A committed live close. `breached` is set when this close paused the account. */
export interface LiveCloseOutcome {
	readonly position: ClosedPosition;
	readonly account: FundedAccount;
	readonly breached: boolean;
}

export interface PayoutReceipt {
	readonly profit: bigint;
	readonly participantShare: bigint;
	readonly poolShare: bigint;
	readonly account: FundedAccount;
}
