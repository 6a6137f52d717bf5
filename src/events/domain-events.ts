/**
 * Domain Events — append-only record of committed state changes.
 *
 * Published after the mutation that produced them has committed. Consumers
 * must tolerate at-least-once delivery; `eventId` is unique and increasing
 * per dispatcher so duplicates can be dropped.
 */

import type { CloseReason, Track } from "../position/types.js";
import type { AccountId, EvaluationId, FeedSymbol, PositionId, PrincipalId } from "../shared/identifiers.js";

export type DomainEvent =
	| FeedRegistered
	| FeedRemoved
	| FeedUpdated
	| FeedHalted
	| FeedResumed
	| PriceRejected
	| PositionOpened
	| PositionClosed
	| EvaluationStarted
	| EvaluationPassed
	| EvaluationFailed
	| RulesUpdated
	| FundedAccountCreated
	| DailyLossBreached
	| AccountPaused
	| AccountResumed
	| PayoutExecuted
	| CollateralDeposited
	| CollateralWithdrawn
	| CollateralReserved
	| CollateralReleased
	| ExposureUpdated
	| PoolRatiosUpdated;

// ── Feeds ────────────────────────────────────────────────────────────

export interface FeedRegistered {
	readonly type: "feed_registered";
	readonly eventId: number;
	readonly timestamp: number;
	readonly symbol: FeedSymbol;
}

export interface FeedRemoved {
	readonly type: "feed_removed";
	readonly eventId: number;
	readonly timestamp: number;
	readonly symbol: FeedSymbol;
}

export interface FeedUpdated {
	readonly type: "feed_updated";
	readonly eventId: number;
	readonly timestamp: number;
	readonly symbol: FeedSymbol;
	readonly price: bigint;
	readonly sequenceId: number;
}

export interface FeedHalted {
	readonly type: "feed_halted";
	readonly eventId: number;
	readonly timestamp: number;
	readonly symbol: FeedSymbol;
	readonly reason: string;
}

export interface FeedResumed {
	readonly type: "feed_resumed";
	readonly eventId: number;
	readonly timestamp: number;
	readonly symbol: FeedSymbol;
}

export interface PriceRejected {
	readonly type: "price_rejected";
	readonly eventId: number;
	readonly timestamp: number;
	readonly symbol: FeedSymbol;
	readonly price: bigint;
	readonly reason: string;
}

// ── Positions ────────────────────────────────────────────────────────

export interface PositionOpened {
	readonly type: "position_opened";
	readonly eventId: number;
	readonly timestamp: number;
	readonly track: Track;
	/** Evaluation id on the virtual track, account id on the live track */
	readonly account: string;
	readonly positionId: PositionId;
	readonly symbol: FeedSymbol;
	readonly size: bigint;
	readonly isLong: boolean;
	readonly entryPrice: bigint;
	readonly margin: bigint;
}

export interface PositionClosed {
	readonly type: "position_closed";
	readonly eventId: number;
	readonly timestamp: number;
	readonly track: Track;
	readonly account: string;
	readonly positionId: PositionId;
	readonly symbol: FeedSymbol;
	readonly exitPrice: bigint;
	readonly realizedPnl: bigint;
	readonly reason: CloseReason;
}

// ── Qualification ────────────────────────────────────────────────────

export interface EvaluationStarted {
	readonly type: "evaluation_started";
	readonly eventId: number;
	readonly timestamp: number;
	readonly evaluationId: EvaluationId;
	readonly owner: PrincipalId;
	readonly virtualBalance: bigint;
	readonly rulesVersion: number;
}

export interface EvaluationPassed {
	readonly type: "evaluation_passed";
	readonly eventId: number;
	readonly timestamp: number;
	readonly evaluationId: EvaluationId;
	readonly owner: PrincipalId;
	readonly finalBalance: bigint;
	readonly tradeCount: number;
	readonly winRateBps: number;
}

export interface EvaluationFailed {
	readonly type: "evaluation_failed";
	readonly eventId: number;
	readonly timestamp: number;
	readonly evaluationId: EvaluationId;
	readonly owner: PrincipalId;
	readonly reason: string;
	readonly balance: bigint;
}

export interface RulesUpdated {
	readonly type: "rules_updated";
	readonly eventId: number;
	readonly timestamp: number;
	readonly version: number;
}

// ── Funded accounts ──────────────────────────────────────────────────

export interface FundedAccountCreated {
	readonly type: "funded_account_created";
	readonly eventId: number;
	readonly timestamp: number;
	readonly accountId: AccountId;
	readonly owner: PrincipalId;
	readonly capital: bigint;
}

export interface DailyLossBreached {
	readonly type: "daily_loss_breached";
	readonly eventId: number;
	readonly timestamp: number;
	readonly accountId: AccountId;
	readonly dailyLoss: bigint;
	readonly limit: bigint;
}

export interface AccountPaused {
	readonly type: "account_paused";
	readonly eventId: number;
	readonly timestamp: number;
	readonly accountId: AccountId;
	readonly reason: string;
}

export interface AccountResumed {
	readonly type: "account_resumed";
	readonly eventId: number;
	readonly timestamp: number;
	readonly accountId: AccountId;
}

export interface PayoutExecuted {
	readonly type: "payout_executed";
	readonly eventId: number;
	readonly timestamp: number;
	readonly accountId: AccountId;
	readonly profit: bigint;
	readonly participantShare: bigint;
	readonly poolShare: bigint;
}

// ── Collateral pool ──────────────────────────────────────────────────

export interface CollateralDeposited {
	readonly type: "collateral_deposited";
	readonly eventId: number;
	readonly timestamp: number;
	readonly amount: bigint;
	readonly totalCollateral: bigint;
}

export interface CollateralWithdrawn {
	readonly type: "collateral_withdrawn";
	readonly eventId: number;
	readonly timestamp: number;
	readonly amount: bigint;
	readonly totalCollateral: bigint;
}

export interface CollateralReserved {
	readonly type: "collateral_reserved";
	readonly eventId: number;
	readonly timestamp: number;
	readonly accountId: AccountId;
	readonly amount: bigint;
	readonly totalLocked: bigint;
}

export interface CollateralReleased {
	readonly type: "collateral_released";
	readonly eventId: number;
	readonly timestamp: number;
	readonly accountId: AccountId;
	readonly amount: bigint;
	readonly totalLocked: bigint;
}

export interface ExposureUpdated {
	readonly type: "exposure_updated";
	readonly eventId: number;
	readonly timestamp: number;
	readonly accountId: AccountId;
	readonly exposure: bigint;
	readonly totalExposure: bigint;
}

export interface PoolRatiosUpdated {
	readonly type: "pool_ratios_updated";
	readonly eventId: number;
	readonly timestamp: number;
	readonly maxExposureRatioBps: number;
	readonly minCollateralRatioBps: number;
}

// ── Helpers ──────────────────────────────────────────────────────────

export type DomainEventType = DomainEvent["type"];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An event before the dispatcher has assigned its id. */
export type DomainEventDraft = DistributiveOmit<DomainEvent, "eventId">;

/** Narrow a DomainEvent union to the member with the given `type`. */
export type DomainEventOf<T extends DomainEventType> = Extract<DomainEvent, { readonly type: T }>;
