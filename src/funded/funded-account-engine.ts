/**
 * FundedAccountEngine — one real-capital account trading against the
 * shared collateral pool.
 *
 * Live positions carry a mandatory stop. Margin is reserved from the pool
 * on open and released on close. Realized losses feed a rolling daily
 * counter; crossing the cap pauses the account on the close that crossed
 * it, and only an admin can resume it once the window has rolled over.
 */

import { type Capability, type CapabilityAuthority, Role } from "../auth/capabilities.js";
import type { CollateralPool } from "../collateral/collateral-pool.js";
import type { DomainEventDraft } from "../events/domain-events.js";
import { EventDispatcher } from "../events/event-dispatcher.js";
import type { FeedRegistry } from "../feeds/feed-registry.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { validate } from "../lib/validation/index.js";
import { drawdownBps, marginForNotional, splitProfit } from "../math/financial.js";
import type { CapitalLedger } from "../ports/capital-ledger.js";
import { PositionLedger } from "../position/position-ledger.js";
import { type CloseReason, CloseTrigger, type ClosedPosition, type OpenPosition, Track } from "../position/types.js";
import { GuardPipeline, verdictError } from "../risk/guard-pipeline.js";
import type { EntryContext, OpenRequest } from "../risk/types.js";
import { dailyLossExceeded } from "../risk/validator.js";
import { DEFAULT_ENGINE_CONFIG, type FundedParams, fundedParamsSchema } from "../shared/config.js";
import {
	AuthorizationError,
	ConfigError,
	InvariantViolationError,
	LimitBreachError,
	type RiskEngineError,
	ValidationError,
} from "../shared/errors.js";
import { ExclusiveSection } from "../shared/exclusive.js";
import { checkedAdd, checkedSub, maxOf } from "../shared/fixed-point.js";
import type { AccountId, PositionId, PrincipalId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import {
	AccountStatus,
	type FundedAccount,
	type LiveCloseOutcome,
	PauseReason,
	type PayoutReceipt,
} from "./types.js";

export interface FundedAccountEngineOptions {
	readonly accountId: AccountId;
	readonly owner: PrincipalId;
	readonly authority: CapabilityAuthority;
	readonly registry: FeedRegistry;
	readonly pool: CollateralPool;
	readonly capital: CapitalLedger;
	readonly params?: FundedParams | undefined;
	/** Entry guards; defaults to {@link GuardPipeline.funded} */
	readonly guards?: GuardPipeline | undefined;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
	readonly events?: EventDispatcher | undefined;
}

interface DailyWindow {
	readonly startedAt: number;
	readonly loss: bigint;
}

export class FundedAccountEngine {
	readonly accountId: AccountId;
	readonly owner: PrincipalId;
	private readonly authority: CapabilityAuthority;
	private readonly registry: FeedRegistry;
	private readonly pool: CollateralPool;
	private readonly capital: CapitalLedger;
	private readonly params: FundedParams;
	private readonly guards: GuardPipeline;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly events: EventDispatcher;
	private readonly ledger = PositionLedger.create({ track: Track.Live });
	private readonly section: ExclusiveSection;
	private readonly createdAt: number;
	/** Initial capital; payable profit is measured from here and a payout settles back to it */
	private readonly payoutBasis: bigint;

	private status: AccountStatus = AccountStatus.Active;
	private balance: bigint;
	private highWaterMark: bigint;
	private tradeCount = 0;
	private totalPaidOut = 0n;
	private window: DailyWindow;
	private pauseReason: PauseReason | null = null;
	private pauseNote: string | null = null;
	private lastOpenedAt: number | null = null;

	private constructor(options: FundedAccountEngineOptions, params: FundedParams) {
		this.accountId = options.accountId;
		this.owner = options.owner;
		this.authority = options.authority;
		this.registry = options.registry;
		this.pool = options.pool;
		this.capital = options.capital;
		this.params = params;
		this.guards = options.guards ?? GuardPipeline.funded();
		this.clock = options.clock ?? SystemClock;
		this.logger = (options.logger ?? silentLogger()).child({ component: "funded", accountId: options.accountId });
		this.events = options.events ?? new EventDispatcher({ logger: this.logger });
		this.section = new ExclusiveSection(`funded account ${options.accountId}`);
		this.createdAt = this.clock.now();
		this.balance = params.initialCapital;
		this.highWaterMark = params.initialCapital;
		this.payoutBasis = params.initialCapital;
		this.window = { startedAt: this.createdAt, loss: 0n };
	}

	/**
	 * Create the account and ask the capital ledger for its allocation.
	 * The account must already be authorized on the pool.
	 */
	static create(options: FundedAccountEngineOptions): Result<FundedAccountEngine, RiskEngineError> {
		const checked = validate(fundedParamsSchema, options.params ?? DEFAULT_ENGINE_CONFIG.funded);
		if (!checked.ok) {
			return err(new ConfigError(checked.error.message, { cause: checked.error }));
		}
		if (!options.pool.isAuthorized(options.accountId)) {
			return err(new AuthorizationError("Account is not authorized on the pool", { accountId: options.accountId }));
		}
		const allocated = options.capital.allocate(options.accountId, checked.value.initialCapital);
		if (!allocated.ok) return allocated;

		const engine = new FundedAccountEngine(options, checked.value);
		engine.logger.info({ owner: engine.owner, capital: checked.value.initialCapital }, "funded account created");
		engine.events.publish({
			type: "funded_account_created",
			timestamp: engine.createdAt,
			accountId: engine.accountId,
			owner: engine.owner,
			capital: checked.value.initialCapital,
		});
		return ok(engine);
	}

	// ── Trading ─────────────────────────────────────────────────────

	openLive(participant: Capability, request: OpenRequest): Result<OpenPosition, RiskEngineError> {
		const owner = this.verifyOwner(participant);
		if (!owner.ok) return owner;

		const drafts: DomainEventDraft[] = [];
		const result = this.section.run((): Result<OpenPosition, RiskEngineError> => {
			const now = this.clock.now();
			const window = this.windowAt(now);
			const price = this.registry.priceOf(request.symbol, now);
			if (!price.ok) return price;

			const verdict = this.guards.evaluate(this.entryContext(request, price.value, now, window));
			if (verdict.type === "block") return err(verdictError(verdict));

			const margin = marginForNotional(request.size, this.params.leverage);
			const reserved = this.pool.reserve(this.accountId, margin);
			if (!reserved.ok) return reserved;

			const opened = this.ledger.open({
				symbol: request.symbol,
				entryPrice: price.value,
				size: request.size,
				isLong: request.isLong,
				leverage: this.params.leverage,
				stopLoss: request.stopLoss,
				takeProfit: request.takeProfit,
				openedAt: now,
			});
			if (!opened.ok) {
				this.releaseOrThrow(margin);
				return opened;
			}

			const position = opened.value;
			this.window = window;
			this.lastOpenedAt = now;
			drafts.push({
				type: "position_opened",
				timestamp: now,
				track: Track.Live,
				account: this.accountId,
				positionId: position.id,
				symbol: position.symbol,
				size: position.size,
				isLong: position.isLong,
				entryPrice: position.entryPrice,
				margin: position.marginLocked,
			});
			return ok(position);
		});

		this.finish(result, drafts);
		return result;
	}

	/** Close at the current feed price. Allowed while paused. */
	closeLive(participant: Capability, positionId: PositionId): Result<LiveCloseOutcome, RiskEngineError> {
		const owner = this.verifyOwner(participant);
		if (!owner.ok) return owner;
		return this.atMarket(positionId, (position, price, now, window, drafts) =>
			this.settle(position, price, "manual", now, window, drafts),
		);
	}

	/**
	 * Close a position whose stop, liquidation level or take-profit has been
	 * crossed. Anyone may call this. Resolves to null when nothing has triggered.
	 */
	checkStopLoss(positionId: PositionId): Result<LiveCloseOutcome | null, RiskEngineError> {
		return this.atMarket(positionId, (position, price, now, window, drafts) => {
			const trigger = this.ledger.shouldClose(position, price);
			if (trigger === CloseTrigger.None) return ok(null);
			return this.settle(position, price, trigger, now, window, drafts);
		});
	}

	// ── Settlement ──────────────────────────────────────────────────

	/**
	 * Pay out profit above the payout basis. The participant keeps
	 * `profitSplitBps` of it; the rest goes to the capital ledger. Refused
	 * while any position is open.
	 */
	requestPayout(participant: Capability): Result<PayoutReceipt, RiskEngineError> {
		const owner = this.verifyOwner(participant);
		if (!owner.ok) return owner;

		const drafts: DomainEventDraft[] = [];
		const result = this.section.run((): Result<PayoutReceipt, RiskEngineError> => {
			const now = this.clock.now();
			if (this.ledger.openCount() > 0) {
				return err(
					new ValidationError(
						"Close every position before requesting a payout",
						{ accountId: this.accountId, openPositions: this.ledger.openCount() },
						"POSITIONS_OPEN",
					),
				);
			}
			if (this.balance <= this.payoutBasis) {
				return err(
					new ValidationError(
						"No profit above the payout basis",
						{ accountId: this.accountId, balance: this.balance, payoutBasis: this.payoutBasis },
						"NO_PROFIT",
					),
				);
			}

			const profit = checkedSub(this.balance, this.payoutBasis);
			const [participantShare, poolShare] = splitProfit(profit, this.params.profitSplitBps);
			const received = this.capital.receiveShare(this.accountId, poolShare);
			if (!received.ok) return received;

			this.balance = this.payoutBasis;
			this.highWaterMark = this.balance;
			this.totalPaidOut = checkedAdd(this.totalPaidOut, participantShare);
			drafts.push({
				type: "payout_executed",
				timestamp: now,
				accountId: this.accountId,
				profit,
				participantShare,
				poolShare,
			});
			this.logger.info({ profit, participantShare, poolShare }, "payout executed");
			return ok({ profit, participantShare, poolShare, account: this.view(now) });
		});

		this.finish(result, drafts);
		return result;
	}

	// ── Administration ──────────────────────────────────────────────

	pause(admin: Capability, note: string): Result<FundedAccount, RiskEngineError> {
		const principal = this.authority.verify(admin, Role.Admin);
		if (!principal.ok) return principal;

		const drafts: DomainEventDraft[] = [];
		const result = this.section.run((): Result<FundedAccount, RiskEngineError> => {
			const now = this.clock.now();
			if (this.status !== AccountStatus.Active) return err(this.wrongStatus(AccountStatus.Active));
			this.pauseNote = note;
			this.enterPause(PauseReason.Admin, now, drafts);
			return ok(this.view(now));
		});

		this.finish(result, drafts);
		return result;
	}

	/** Reactivate a paused account. Refused while the daily loss is still at or over the cap. */
	resume(admin: Capability): Result<FundedAccount, RiskEngineError> {
		const principal = this.authority.verify(admin, Role.Admin);
		if (!principal.ok) return principal;

		const drafts: DomainEventDraft[] = [];
		const result = this.section.run((): Result<FundedAccount, RiskEngineError> => {
			const now = this.clock.now();
			if (this.status !== AccountStatus.Paused) return err(this.wrongStatus(AccountStatus.Paused));
			const window = this.windowAt(now);
			if (dailyLossExceeded(window.loss, this.params.maxDailyLoss)) {
				return err(
					new LimitBreachError("Daily loss is still at or over the cap", "daily_loss", {
						accountId: this.accountId,
						dailyLoss: window.loss,
						maxDailyLoss: this.params.maxDailyLoss,
					}),
				);
			}

			this.window = window;
			this.status = AccountStatus.Active;
			this.pauseReason = null;
			this.pauseNote = null;
			this.logger.info({ by: principal.value }, "account resumed");
			drafts.push({ type: "account_resumed", timestamp: now, accountId: this.accountId });
			return ok(this.view(now));
		});

		this.finish(result, drafts);
		return result;
	}

	// ── Queries ─────────────────────────────────────────────────────

	/** Account state as of `now`, with the daily window rolled over if due. */
	snapshot(now: number = this.clock.now()): FundedAccount {
		return this.view(now);
	}

	openPositions(): readonly OpenPosition[] {
		return this.ledger.openPositions();
	}

	closedPositions(): readonly ClosedPosition[] {
		return this.ledger.closedPositions();
	}

	unrealizedPnl(positionId: PositionId): Result<bigint, RiskEngineError> {
		const position = this.ledger.getOpen(positionId);
		if (!position.ok) return position;
		const price = this.registry.priceOf(position.value.symbol);
		if (!price.ok) return price;
		return ok(this.ledger.markToMarket(position.value, price.value));
	}

	// ── Internal ────────────────────────────────────────────────────

	private verifyOwner(participant: Capability): Result<PrincipalId, AuthorizationError> {
		const principal = this.authority.verify(participant, Role.Participant);
		if (!principal.ok) return principal;
		if (principal.value !== this.owner) {
			return err(
				new AuthorizationError("Caller does not own this account", {
					accountId: this.accountId,
					caller: principal.value,
				}),
			);
		}
		return principal;
	}

	/** Run `fn` on an open position, priced from its feed. */
	private atMarket<T>(
		positionId: PositionId,
		fn: (
			position: OpenPosition,
			price: bigint,
			now: number,
			window: DailyWindow,
			drafts: DomainEventDraft[],
		) => Result<T, RiskEngineError>,
	): Result<T, RiskEngineError> {
		const drafts: DomainEventDraft[] = [];
		const result = this.section.run((): Result<T, RiskEngineError> => {
			const found = this.ledger.getOpen(positionId);
			if (!found.ok) return found;
			const now = this.clock.now();
			const price = this.registry.priceOf(found.value.symbol, now);
			if (!price.ok) return price;
			return fn(found.value, price.value, now, this.windowAt(now), drafts);
		});

		this.finish(result, drafts);
		return result;
	}

	private settle(
		position: OpenPosition,
		exitPrice: bigint,
		reason: CloseReason,
		now: number,
		window: DailyWindow,
		drafts: DomainEventDraft[],
	): Result<LiveCloseOutcome, RiskEngineError> {
		const realized = this.ledger.markToMarket(position, exitPrice);
		const raw = checkedAdd(this.balance, realized);
		const balance = raw < 0n ? 0n : raw;
		const decrease = balance < this.balance ? this.balance - balance : 0n;
		const loss = checkedAdd(window.loss, decrease);

		const released = this.pool.release(this.accountId, position.marginLocked);
		if (!released.ok) return released;

		const closed = this.ledger.close(position.id, exitPrice, reason, now);
		if (!closed.ok) {
			throw new InvariantViolationError("Validated position failed to close", {
				positionId: position.id,
				cause: closed.error,
			});
		}

		this.balance = balance;
		this.highWaterMark = maxOf(this.highWaterMark, balance);
		this.tradeCount += 1;
		this.window = { startedAt: window.startedAt, loss };
		drafts.push({
			type: "position_closed",
			timestamp: now,
			track: Track.Live,
			account: this.accountId,
			positionId: position.id,
			symbol: position.symbol,
			exitPrice,
			realizedPnl: closed.value.realizedPnl,
			reason,
		});

		const breached = this.status === AccountStatus.Active && dailyLossExceeded(loss, this.params.maxDailyLoss);
		if (breached) {
			drafts.push({
				type: "daily_loss_breached",
				timestamp: now,
				accountId: this.accountId,
				dailyLoss: loss,
				limit: this.params.maxDailyLoss,
			});
			this.enterPause(PauseReason.DailyLoss, now, drafts);
		}
		return ok({ position: closed.value, account: this.view(now), breached });
	}

	private enterPause(reason: PauseReason, now: number, drafts: DomainEventDraft[]): void {
		this.status = AccountStatus.Paused;
		this.pauseReason = reason;
		this.logger.warn({ reason, dailyLoss: this.window.loss }, "account paused");
		drafts.push({
			type: "account_paused",
			timestamp: now,
			accountId: this.accountId,
			reason: this.pauseNote === null ? reason : `${reason}: ${this.pauseNote}`,
		});
	}

	/** The daily window in force at `now`; a new one starts once the old one has run its length. */
	private windowAt(now: number): DailyWindow {
		if (now - this.window.startedAt >= this.params.dailyWindowMs) {
			return { startedAt: now, loss: 0n };
		}
		return this.window;
	}

	private releaseOrThrow(margin: bigint): void {
		const released = this.pool.release(this.accountId, margin);
		if (!released.ok) {
			throw new InvariantViolationError("Could not release margin reserved in the same call", {
				accountId: this.accountId,
				margin,
				cause: released.error,
			});
		}
	}

	private entryContext(request: OpenRequest, entryPrice: bigint, now: number, window: DailyWindow): EntryContext {
		const free = checkedSub(this.balance, this.ledger.lockedMargin());
		return {
			request,
			entryPrice,
			nowMs: () => now,
			isActive: () => this.status === AccountStatus.Active,
			deadlineMs: () => null,
			freeBalance: () => (free > 0n ? free : 0n),
			leverage: () => this.params.leverage,
			maxPositionSize: () => this.params.maxPositionSize,
			dailyLoss: () => window.loss,
			maxDailyLoss: () => this.params.maxDailyLoss,
			stopLossRequired: () => true,
			lastOpenedAtMs: () => this.lastOpenedAt,
		};
	}

	private view(now: number): FundedAccount {
		const window = this.windowAt(now);
		return {
			accountId: this.accountId,
			owner: this.owner,
			status: this.status,
			params: this.params,
			balance: this.balance,
			highWaterMark: this.highWaterMark,
			payoutBasis: this.payoutBasis,
			drawdownBps: drawdownBps(this.balance, this.highWaterMark),
			dailyLoss: window.loss,
			dailyWindowStart: window.startedAt,
			tradeCount: this.tradeCount,
			lockedMargin: this.ledger.lockedMargin(),
			openPositions: this.ledger.openCount(),
			totalPaidOut: this.totalPaidOut,
			pauseReason: this.pauseReason,
			pauseNote: this.pauseNote,
			createdAt: this.createdAt,
		};
	}

	private wrongStatus(expected: AccountStatus): ValidationError {
		return new ValidationError(
			`Account is ${this.status}, expected ${expected}`,
			{ accountId: this.accountId, status: this.status },
			"ACCOUNT_STATUS",
		);
	}

	private finish<T>(result: Result<T, RiskEngineError>, drafts: DomainEventDraft[]): void {
		if (!result.ok) {
			this.logger.debug({ code: result.error.code }, result.error.message);
		}
		this.events.publishAll(drafts);
	}
}
