import type { FeedSymbol } from "../shared/identifiers.js";

/** An accepted price update. `sequenceId` increases by one per accepted tick. */
export interface PriceTick {
	readonly price: bigint;
	readonly timestamp: number;
	readonly sequenceId: number;
}

/** Point-in-time health of one feed. */
export interface FeedHealth {
	readonly symbol: FeedSymbol;
	readonly registered: boolean;
	readonly halted: boolean;
	readonly stale: boolean;
	/** Registered, not halted, not stale, with a nonzero latest price */
	readonly healthy: boolean;
	readonly lastPrice: bigint | null;
	readonly ageMs: number | null;
}

/** Events emitted to local subscribers, outside the domain event stream. */
export type FeedEvents = {
	tick: (symbol: FeedSymbol, tick: PriceTick) => void;
};
