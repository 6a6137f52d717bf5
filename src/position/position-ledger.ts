/**
 * PositionLedger — lifecycle of the leveraged positions one account owns.
 *
 * Positions are immutable records. Opening creates one; closing replaces it
 * with its closed form exactly once. Nothing else ever changes a position.
 */

import { liquidationPrice, marginForNotional, pnl } from "../math/financial.js";
import { stopTriggered, takeProfitTriggered } from "../risk/validator.js";
import { NotFoundError, ValidationError } from "../shared/errors.js";
import { BPS_DENOMINATOR, checkedAdd, mulDiv } from "../shared/fixed-point.js";
import type { PositionId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import {
	type CloseReason,
	CloseTrigger,
	type ClosedPosition,
	type OpenParams,
	type OpenPosition,
	type Position,
	Track,
} from "./types.js";

const DEFAULT_MAX_CLOSED = 1000;

export interface PositionLedgerOptions {
	readonly track: Track;
	/** Closed positions retained for queries (default 1000) */
	readonly maxClosed?: number | undefined;
}

export class PositionLedger {
	readonly track: Track;
	private readonly openById = new Map<PositionId, OpenPosition>();
	private readonly closed: ClosedPosition[] = [];
	private readonly maxClosed: number;
	private nextId = 1;

	private constructor(options: PositionLedgerOptions) {
		this.track = options.track;
		this.maxClosed = options.maxClosed ?? DEFAULT_MAX_CLOSED;
	}

	static create(options: PositionLedgerOptions): PositionLedger {
		return new PositionLedger(options);
	}

	// ── Lifecycle ──────────────────────────────────────────────

	/**
	 * Opens a position, locking `size / leverage` as margin.
	 * Live positions must carry a stop-loss on the loss side of entry.
	 */
	open(params: OpenParams): Result<OpenPosition, ValidationError> {
		const invalid = this.validateOpen(params);
		if (invalid !== null) return err(invalid);

		const marginLocked = marginForNotional(params.size, params.leverage);
		if (marginLocked === 0n) {
			return err(new ValidationError("Size too small to carry margin", { size: params.size }));
		}

		const position: OpenPosition = {
			id: this.nextId++,
			symbol: params.symbol,
			entryPrice: params.entryPrice,
			size: params.size,
			isLong: params.isLong,
			leverage: params.leverage,
			marginLocked,
			stopLoss: params.stopLoss ?? null,
			takeProfit: params.takeProfit ?? null,
			liquidationPrice: liquidationPrice(params.entryPrice, params.leverage, params.isLong),
			openedAt: params.openedAt,
			status: "open",
		};
		this.openById.set(position.id, position);
		return ok(position);
	}

	/**
	 * Closes an open position at `exitPrice`, returning its closed record.
	 * A second close of the same id fails with code POSITION_NOT_OPEN.
	 */
	close(
		id: PositionId,
		exitPrice: bigint,
		reason: CloseReason,
		closedAt: number,
	): Result<ClosedPosition, ValidationError | NotFoundError> {
		const found = this.getOpen(id);
		if (!found.ok) return found;
		const position = found.value;
		if (exitPrice <= 0n) {
			return err(new ValidationError("Exit price must be positive", { positionId: id, exitPrice }));
		}

		const closed: ClosedPosition = {
			...position,
			status: "closed",
			closePrice: exitPrice,
			realizedPnl: this.markToMarket(position, exitPrice),
			closedAt,
			closeReason: reason,
		};
		this.openById.delete(id);
		this.closed.push(closed);
		if (this.closed.length > this.maxClosed) {
			this.closed.splice(0, this.closed.length - this.maxClosed);
		}
		return ok(closed);
	}

	// ── Valuation ──────────────────────────────────────────────

	/** Signed unrealized P&L at `price`. */
	markToMarket(position: Position, price: bigint): bigint {
		return pnl(position.entryPrice, price, position.size, position.isLong);
	}

	/**
	 * Which trigger, if any, fires at `price`.
	 *
	 * When both the stop and the liquidation level are crossed, the one nearer
	 * entry was crossed first; a tie goes to the stop. Take-profit comes after.
	 */
	shouldClose(position: OpenPosition, price: bigint): CloseTrigger {
		const stopHit = position.stopLoss !== null && stopTriggered(price, position.stopLoss, position.isLong);
		const liquidated = stopTriggered(price, position.liquidationPrice, position.isLong);

		if (stopHit && liquidated && position.stopLoss !== null) {
			const stopNearer = position.isLong
				? position.stopLoss >= position.liquidationPrice
				: position.stopLoss <= position.liquidationPrice;
			return stopNearer ? CloseTrigger.StopLoss : CloseTrigger.Liquidation;
		}
		if (stopHit) return CloseTrigger.StopLoss;
		if (liquidated) return CloseTrigger.Liquidation;
		if (position.takeProfit !== null && takeProfitTriggered(price, position.takeProfit, position.isLong)) {
			return CloseTrigger.TakeProfit;
		}
		return CloseTrigger.None;
	}

	/** Remaining equity over margin in bps, clamped to [0, 10000]. */
	healthScoreBps(position: OpenPosition, price: bigint): number {
		const equity = checkedAdd(position.marginLocked, this.markToMarket(position, price));
		if (equity <= 0n) return 0;
		const score = mulDiv(equity, BPS_DENOMINATOR, position.marginLocked);
		return score >= BPS_DENOMINATOR ? 10_000 : Number(score);
	}

	// ── Queries ──────────────────────────────────────────────────

	get(id: PositionId): Result<Position, NotFoundError> {
		const position = this.openById.get(id) ?? this.closed.find((p) => p.id === id);
		if (position === undefined) {
			return err(new NotFoundError("Unknown position", { positionId: id }));
		}
		return ok(position);
	}

	getOpen(id: PositionId): Result<OpenPosition, ValidationError | NotFoundError> {
		const position = this.openById.get(id);
		if (position !== undefined) return ok(position);
		if (id > 0 && id < this.nextId) {
			return err(new ValidationError("Position is not open", { positionId: id }, "POSITION_NOT_OPEN"));
		}
		return err(new NotFoundError("Unknown position", { positionId: id }));
	}

	openPositions(): readonly OpenPosition[] {
		return [...this.openById.values()];
	}

	/** @returns Retained closed positions, oldest first */
	closedPositions(): readonly ClosedPosition[] {
		return [...this.closed];
	}

	openCount(): number {
		return this.openById.size;
	}

	/** Sum of margin locked by open positions. */
	lockedMargin(): bigint {
		let total = 0n;
		for (const position of this.openById.values()) {
			total = checkedAdd(total, position.marginLocked);
		}
		return total;
	}

	// ── Internal ──────────────────────────────────────────────────

	private validateOpen(params: OpenParams): ValidationError | null {
		const { entryPrice, size, isLong, leverage, stopLoss, takeProfit } = params;
		if (size <= 0n) return new ValidationError("Size must be positive", { size });
		if (entryPrice <= 0n) return new ValidationError("Entry price must be positive", { entryPrice });
		if (!Number.isInteger(leverage) || leverage < 1) {
			return new ValidationError("Leverage must be a positive integer", { leverage });
		}
		if (stopLoss === undefined && this.track === Track.Live) {
			return new ValidationError("Stop-loss is mandatory for live positions", {}, "STOP_LOSS_REQUIRED");
		}
		if (stopLoss !== undefined && (stopLoss <= 0n || (isLong ? stopLoss >= entryPrice : stopLoss <= entryPrice))) {
			return new ValidationError(
				"Stop-loss must sit on the loss side of entry",
				{ stopLoss, entryPrice },
				"INVALID_STOP_LOSS",
			);
		}
		if (takeProfit !== undefined && (isLong ? takeProfit <= entryPrice : takeProfit >= entryPrice)) {
			return new ValidationError(
				"Take-profit must sit on the profit side of entry",
				{ takeProfit, entryPrice },
				"INVALID_TAKE_PROFIT",
			);
		}
		return null;
	}
}
