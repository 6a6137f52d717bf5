/**
 * Position domain types.
 */

import type { FeedSymbol, PositionId } from "../shared/identifiers.js";

/** Which account track a ledger belongs to. */
export const Track = {
	Virtual: "virtual",
	Live: "live",
} as const;

export type Track = (typeof Track)[keyof typeof Track];

/** What, if anything, should close a position at the current price. */
export const CloseTrigger = {
	None: "none",
	StopLoss: "stop_loss",
	TakeProfit: "take_profit",
	Liquidation: "liquidation",
} as const;

export type CloseTrigger = (typeof CloseTrigger)[keyof typeof CloseTrigger];

/** Why a position was closed: a trigger, or the owner's request. */
export type CloseReason = Exclude<CloseTrigger, "none"> | "manual";

/** Parameters for opening a position. `size` is a notional currency amount. */
export interface OpenParams {
	readonly symbol: FeedSymbol;
	readonly entryPrice: bigint;
	readonly size: bigint;
	readonly isLong: boolean;
	readonly leverage: number;
	readonly stopLoss?: bigint | undefined;
	readonly takeProfit?: bigint | undefined;
	readonly openedAt: number;
}

interface PositionBase {
	readonly id: PositionId;
	readonly symbol: FeedSymbol;
	readonly entryPrice: bigint;
	readonly size: bigint;
	readonly isLong: boolean;
	readonly leverage: number;
	readonly marginLocked: bigint;
	readonly stopLoss: bigint | null;
	readonly takeProfit: bigint | null;
	readonly liquidationPrice: bigint;
	readonly openedAt: number;
}

export interface OpenPosition extends PositionBase {
	readonly status: "open";
}

export interface ClosedPosition extends PositionBase {
	readonly status: "closed";
	readonly closePrice: bigint;
	readonly realizedPnl: bigint;
	readonly closedAt: number;
	readonly closeReason: CloseReason;
}

export type Position = OpenPosition | ClosedPosition;
