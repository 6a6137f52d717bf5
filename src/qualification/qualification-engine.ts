/**
 * QualificationEngine — the virtual-capital challenge.
 *
 * Each participant runs at most one live evaluation at a time. Positions
 * are virtual: margin is bookkeeping against the evaluation balance, and
 * nothing touches the collateral pool. Every close commits P&L and then
 * runs the transition checks; passing calls the credential issuer once.
 */

import { type Capability, type CapabilityAuthority, Role } from "../auth/capabilities.js";
import type { DomainEventDraft } from "../events/domain-events.js";
import { EventDispatcher } from "../events/event-dispatcher.js";
import type { FeedRegistry } from "../feeds/feed-registry.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { validate } from "../lib/validation/index.js";
import { drawdownBps } from "../math/financial.js";
import type { CredentialIssuer } from "../ports/credential-issuer.js";
import { PositionLedger } from "../position/position-ledger.js";
import { type CloseReason, CloseTrigger, type OpenPosition, Track } from "../position/types.js";
import { GuardPipeline, verdictError } from "../risk/guard-pipeline.js";
import type { EntryContext, OpenRequest } from "../risk/types.js";
import { evaluationRulesOk } from "../risk/validator.js";
import { DEFAULT_ENGINE_CONFIG, type QualificationRules, qualificationRulesSchema } from "../shared/config.js";
import {
	AlreadyExistsError,
	ConfigError,
	InvariantViolationError,
	LimitBreachError,
	NotFoundError,
	type RiskEngineError,
	ValidationError,
} from "../shared/errors.js";
import { ExclusiveSection } from "../shared/exclusive.js";
import { BPS_DENOMINATOR, checkedAdd, checkedMul, checkedSub, maxOf } from "../shared/fixed-point.js";
import { type EvaluationId, type PositionId, type PrincipalId, evaluationId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { VersionedConfig } from "../shared/versioned.js";
import { isExpired, nextTransition } from "./transitions.js";
import { type Evaluation, EvaluationStatus, FailureReason, type VirtualCloseOutcome } from "./types.js";

export interface QualificationEngineOptions {
	readonly authority: CapabilityAuthority;
	readonly registry: FeedRegistry;
	readonly issuer: CredentialIssuer;
	readonly rules?: QualificationRules | undefined;
	/** Entry guards; defaults to {@link GuardPipeline.qualification} */
	readonly guards?: GuardPipeline | undefined;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
	readonly events?: EventDispatcher | undefined;
}

interface EvaluationRecord {
	readonly id: EvaluationId;
	readonly owner: PrincipalId;
	readonly rules: QualificationRules;
	readonly rulesVersion: number;
	readonly startedAt: number;
	readonly ledger: PositionLedger;
	readonly section: ExclusiveSection;
	status: EvaluationStatus;
	balance: bigint;
	highWaterMark: bigint;
	drawdownBps: number;
	maxDrawdownBps: number;
	tradeCount: number;
	wins: number;
	losses: number;
	endedAt: number | null;
	failureReason: FailureReason | null;
	haltNote: string | null;
}

export class QualificationEngine {
	private readonly authority: CapabilityAuthority;
	private readonly registry: FeedRegistry;
	private readonly issuer: CredentialIssuer;
	private readonly guards: GuardPipeline;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly events: EventDispatcher;
	private readonly rules: VersionedConfig<QualificationRules>;
	private readonly byOwner = new Map<PrincipalId, EvaluationRecord>();
	private nextSeq = 1;

	private constructor(options: QualificationEngineOptions, rules: QualificationRules) {
		this.authority = options.authority;
		this.registry = options.registry;
		this.issuer = options.issuer;
		this.guards = options.guards ?? GuardPipeline.qualification();
		this.clock = options.clock ?? SystemClock;
		this.logger = (options.logger ?? silentLogger()).child({ component: "qualification" });
		this.events = options.events ?? new EventDispatcher({ logger: this.logger });
		this.rules = new VersionedConfig(rules, this.clock);
	}

	static create(options: QualificationEngineOptions): Result<QualificationEngine, ConfigError> {
		const rules = checkRules(options.rules ?? DEFAULT_ENGINE_CONFIG.qualification);
		if (!rules.ok) return err(new ConfigError(rules.error.message, { cause: rules.error }));
		return ok(new QualificationEngine(options, rules.value));
	}

	// ── Rules ───────────────────────────────────────────────────────

	/** Replace the rules. Evaluations already running keep the version they started with. */
	setRules(admin: Capability, rules: QualificationRules): Result<number, RiskEngineError> {
		const principal = this.authority.verify(admin, Role.Admin);
		if (!principal.ok) return principal;
		const checked = checkRules(rules);
		if (!checked.ok) return checked;

		const next = this.rules.replace(checked.value);
		this.logger.info({ version: next.version, by: principal.value }, "qualification rules updated");
		this.events.publish({ type: "rules_updated", timestamp: next.updatedAtMs, version: next.version });
		return ok(next.version);
	}

	currentRules(): { readonly version: number; readonly rules: QualificationRules } {
		const { version, value } = this.rules.current();
		return { version, rules: value };
	}

	// ── Lifecycle ───────────────────────────────────────────────────

	/** Start an evaluation. Refused while the owner has one running or has already passed. */
	start(participant: Capability): Result<Evaluation, RiskEngineError> {
		const principal = this.authority.verify(participant, Role.Participant);
		if (!principal.ok) return principal;
		const owner = principal.value;

		const existing = this.byOwner.get(owner);
		if (existing !== undefined && existing.status !== EvaluationStatus.Failed) {
			return err(
				new AlreadyExistsError(`Owner already has a ${existing.status} evaluation`, {
					owner,
					evaluationId: existing.id,
				}),
			);
		}

		const now = this.clock.now();
		const { version, value: rules } = this.rules.current();
		const record: EvaluationRecord = {
			id: evaluationId(`eval-${this.nextSeq++}`),
			owner,
			rules,
			rulesVersion: version,
			startedAt: now,
			ledger: PositionLedger.create({ track: Track.Virtual }),
			section: new ExclusiveSection(`evaluation of ${owner}`),
			status: EvaluationStatus.Active,
			balance: rules.virtualBalance,
			highWaterMark: rules.virtualBalance,
			drawdownBps: 0,
			maxDrawdownBps: 0,
			tradeCount: 0,
			wins: 0,
			losses: 0,
			endedAt: null,
			failureReason: null,
			haltNote: null,
		};
		this.byOwner.set(owner, record);

		this.logger.info({ owner, evaluationId: record.id, rulesVersion: version }, "evaluation started");
		this.events.publish({
			type: "evaluation_started",
			timestamp: now,
			evaluationId: record.id,
			owner,
			virtualBalance: rules.virtualBalance,
			rulesVersion: version,
		});
		return ok(this.view(record));
	}

	openVirtual(participant: Capability, request: OpenRequest): Result<OpenPosition, RiskEngineError> {
		const found = this.recordFor(participant);
		if (!found.ok) return found;
		const record = found.value;

		const drafts: DomainEventDraft[] = [];
		const result = record.section.run((): Result<OpenPosition, RiskEngineError> => {
			const now = this.clock.now();
			if (record.status === EvaluationStatus.Active && isExpired(record.rules, record.startedAt, now)) {
				this.fail(record, FailureReason.Expired, now, drafts);
				const deadline = record.startedAt + record.rules.evaluationPeriodMs;
				return err(
					new LimitBreachError("evaluation period elapsed", "Expiry", {
						guard: "Expiry",
						currentValue: now,
						threshold: deadline,
					}),
				);
			}
			const price = this.registry.priceOf(request.symbol, now);
			if (!price.ok) return price;

			const verdict = this.guards.evaluate(this.entryContext(record, request, price.value, now));
			if (verdict.type === "block") return err(verdictError(verdict));

			const opened = record.ledger.open({
				symbol: request.symbol,
				entryPrice: price.value,
				size: request.size,
				isLong: request.isLong,
				leverage: record.rules.leverage,
				stopLoss: request.stopLoss,
				takeProfit: request.takeProfit,
				openedAt: now,
			});
			if (!opened.ok) return opened;

			const position = opened.value;
			drafts.push({
				type: "position_opened",
				timestamp: now,
				track: Track.Virtual,
				account: record.id,
				positionId: position.id,
				symbol: position.symbol,
				size: position.size,
				isLong: position.isLong,
				entryPrice: position.entryPrice,
				margin: position.marginLocked,
			});
			return ok(position);
		});

		this.finish(record, result, drafts);
		return result;
	}

	/** Close at the current feed price. Only an active evaluation can close. */
	closeVirtual(participant: Capability, positionId: PositionId): Result<VirtualCloseOutcome, RiskEngineError> {
		const found = this.recordFor(participant);
		if (!found.ok) return found;
		const record = found.value;
		return this.atMarket(record, positionId, (position, price, now, drafts) =>
			this.settle(record, position, price, "manual", now, drafts),
		);
	}

	/**
	 * Close a virtual position whose stop, liquidation level or take-profit
	 * has been crossed. Anyone may call this. Resolves to null when nothing
	 * has triggered.
	 */
	checkTriggers(owner: PrincipalId, positionId: PositionId): Result<VirtualCloseOutcome | null, RiskEngineError> {
		const record = this.byOwner.get(owner);
		if (record === undefined) return err(this.unknownOwner(owner));
		return this.atMarket(record, positionId, (position, price, now, drafts) => {
			const trigger = record.ledger.shouldClose(position, price);
			if (trigger === CloseTrigger.None) return ok(null);
			return this.settle(record, position, price, trigger, now, drafts);
		});
	}

	/** Commit expiry if the window has passed. Anyone may call this. */
	evaluate(owner: PrincipalId): Result<Evaluation, NotFoundError> {
		const record = this.byOwner.get(owner);
		if (record === undefined) return err(this.unknownOwner(owner));

		const drafts: DomainEventDraft[] = [];
		record.section.run(() => {
			const now = this.clock.now();
			if (record.status !== EvaluationStatus.Active || !isExpired(record.rules, record.startedAt, now)) return;
			this.fail(record, FailureReason.Expired, now, drafts);
		});
		this.events.publishAll(drafts);
		return ok(this.view(record));
	}

	/** Force an active evaluation to Failed. */
	halt(admin: Capability, owner: PrincipalId, note: string): Result<Evaluation, RiskEngineError> {
		const principal = this.authority.verify(admin, Role.Admin);
		if (!principal.ok) return principal;
		const record = this.byOwner.get(owner);
		if (record === undefined) return err(this.unknownOwner(owner));

		const drafts: DomainEventDraft[] = [];
		const result = record.section.run((): Result<Evaluation, RiskEngineError> => {
			if (record.status !== EvaluationStatus.Active) return err(notActive(record));
			record.haltNote = note;
			this.fail(record, FailureReason.Halted, this.clock.now(), drafts);
			return ok(this.view(record));
		});
		this.events.publishAll(drafts);
		return result;
	}

	// ── Queries ─────────────────────────────────────────────────────

	getEvaluation(owner: PrincipalId): Result<Evaluation, NotFoundError> {
		const record = this.byOwner.get(owner);
		if (record === undefined) return err(this.unknownOwner(owner));
		return ok(this.view(record));
	}

	unrealizedPnl(owner: PrincipalId, positionId: PositionId): Result<bigint, RiskEngineError> {
		const record = this.byOwner.get(owner);
		if (record === undefined) return err(this.unknownOwner(owner));
		const position = record.ledger.getOpen(positionId);
		if (!position.ok) return position;
		const price = this.registry.priceOf(position.value.symbol);
		if (!price.ok) return price;
		return ok(record.ledger.markToMarket(position.value, price.value));
	}

	openPositions(owner: PrincipalId): readonly OpenPosition[] {
		return this.byOwner.get(owner)?.ledger.openPositions() ?? [];
	}

	// ── Internal ────────────────────────────────────────────────────

	private recordFor(participant: Capability): Result<EvaluationRecord, RiskEngineError> {
		const principal = this.authority.verify(participant, Role.Participant);
		if (!principal.ok) return principal;
		const record = this.byOwner.get(principal.value);
		if (record === undefined) return err(this.unknownOwner(principal.value));
		return ok(record);
	}

	/** Run `fn` on an open position of an active evaluation, priced from its feed. */
	private atMarket<T>(
		record: EvaluationRecord,
		positionId: PositionId,
		fn: (position: OpenPosition, price: bigint, now: number, drafts: DomainEventDraft[]) => Result<T, RiskEngineError>,
	): Result<T, RiskEngineError> {
		const drafts: DomainEventDraft[] = [];
		const result = record.section.run((): Result<T, RiskEngineError> => {
			if (record.status !== EvaluationStatus.Active) return err(notActive(record));
			const found = record.ledger.getOpen(positionId);
			if (!found.ok) return found;

			const now = this.clock.now();
			const price = this.registry.priceOf(found.value.symbol, now);
			if (!price.ok) return price;
			return fn(found.value, price.value, now, drafts);
		});

		this.finish(record, result, drafts);
		return result;
	}

	/** Apply a close to the evaluation. Nothing is written until the issuer, if needed, has accepted. */
	private settle(
		record: EvaluationRecord,
		position: OpenPosition,
		exitPrice: bigint,
		reason: CloseReason,
		now: number,
		drafts: DomainEventDraft[],
	): Result<VirtualCloseOutcome, RiskEngineError> {
		const realized = record.ledger.markToMarket(position, exitPrice);
		const balance = checkedAdd(record.balance, realized);
		const highWaterMark = maxOf(record.highWaterMark, balance);
		const drawdown = drawdownBps(balance, highWaterMark);
		const tradeCount = record.tradeCount + 1;
		const wins = record.wins + (realized > 0n ? 1 : 0);
		const losses = record.losses + (realized < 0n ? 1 : 0);
		const transition = nextTransition({
			rules: record.rules,
			startedAt: record.startedAt,
			now,
			balance,
			highWaterMark,
			tradeCount,
		});

		if (transition.status === EvaluationStatus.Passed) {
			const issued = this.issuer.issueCredential({
				owner: record.owner,
				evaluationId: record.id,
				finalBalance: balance,
				profitAchieved: checkedSub(balance, record.rules.virtualBalance),
				maxDrawdownBps: Math.max(record.maxDrawdownBps, drawdown),
				tradeCount,
				winRateBps: winRate(wins, tradeCount),
			});
			if (!issued.ok) return issued;
		}

		const closed = record.ledger.close(position.id, exitPrice, reason, now);
		if (!closed.ok) {
			throw new InvariantViolationError("Validated position failed to close", {
				positionId: position.id,
				cause: closed.error,
			});
		}

		record.balance = balance;
		record.highWaterMark = highWaterMark;
		record.drawdownBps = drawdown;
		record.maxDrawdownBps = Math.max(record.maxDrawdownBps, drawdown);
		record.tradeCount = tradeCount;
		record.wins = wins;
		record.losses = losses;

		drafts.push({
			type: "position_closed",
			timestamp: now,
			track: Track.Virtual,
			account: record.id,
			positionId: position.id,
			symbol: position.symbol,
			exitPrice,
			realizedPnl: closed.value.realizedPnl,
			reason,
		});

		if (transition.status === EvaluationStatus.Passed) {
			record.status = EvaluationStatus.Passed;
			record.endedAt = now;
			this.logger.info({ owner: record.owner, evaluationId: record.id, balance }, "evaluation passed");
			drafts.push({
				type: "evaluation_passed",
				timestamp: now,
				evaluationId: record.id,
				owner: record.owner,
				finalBalance: balance,
				tradeCount,
				winRateBps: winRate(wins, tradeCount),
			});
		} else if (transition.status === EvaluationStatus.Failed) {
			this.fail(record, transition.reason, now, drafts);
		}

		return ok({ position: closed.value, evaluation: this.view(record) });
	}

	private fail(record: EvaluationRecord, reason: FailureReason, now: number, drafts: DomainEventDraft[]): void {
		record.status = EvaluationStatus.Failed;
		record.failureReason = reason;
		record.endedAt = now;
		this.logger.info({ owner: record.owner, evaluationId: record.id, reason }, "evaluation failed");
		drafts.push({
			type: "evaluation_failed",
			timestamp: now,
			evaluationId: record.id,
			owner: record.owner,
			reason: record.haltNote === null ? reason : `${reason}: ${record.haltNote}`,
			balance: record.balance,
		});
	}

	private finish<T>(record: EvaluationRecord, result: Result<T, RiskEngineError>, drafts: DomainEventDraft[]): void {
		if (!result.ok) {
			this.logger.debug({ owner: record.owner, code: result.error.code }, result.error.message);
		}
		this.events.publishAll(drafts);
	}

	private entryContext(record: EvaluationRecord, request: OpenRequest, entryPrice: bigint, now: number): EntryContext {
		const { rules } = record;
		const free = checkedSub(record.balance, record.ledger.lockedMargin());
		return {
			request,
			entryPrice,
			nowMs: () => now,
			isActive: () => record.status === EvaluationStatus.Active,
			deadlineMs: () => record.startedAt + rules.evaluationPeriodMs,
			freeBalance: () => (free > 0n ? free : 0n),
			leverage: () => rules.leverage,
			maxPositionSize: () => rules.maxPositionSize ?? checkedMul(rules.virtualBalance, BigInt(rules.leverage)),
			dailyLoss: () => 0n,
			maxDailyLoss: () => null,
			stopLossRequired: () => false,
			lastOpenedAtMs: () => record.ledger.openPositions().at(-1)?.openedAt ?? null,
		};
	}

	private view(record: EvaluationRecord): Evaluation {
		return {
			id: record.id,
			owner: record.owner,
			status: record.status,
			rules: record.rules,
			rulesVersion: record.rulesVersion,
			balance: record.balance,
			highWaterMark: record.highWaterMark,
			drawdownBps: record.drawdownBps,
			maxDrawdownBps: record.maxDrawdownBps,
			tradeCount: record.tradeCount,
			wins: record.wins,
			losses: record.losses,
			winRateBps: winRate(record.wins, record.tradeCount),
			lockedMargin: record.ledger.lockedMargin(),
			openPositions: record.ledger.openCount(),
			startedAt: record.startedAt,
			deadline: record.startedAt + record.rules.evaluationPeriodMs,
			endedAt: record.endedAt,
			failureReason: record.failureReason,
			haltNote: record.haltNote,
		};
	}

	private unknownOwner(owner: PrincipalId): NotFoundError {
		return new NotFoundError("No evaluation for owner", { owner });
	}
}

function checkRules(input: QualificationRules): Result<QualificationRules, ValidationError> {
	const parsed = validate(qualificationRulesSchema, input);
	if (!parsed.ok) return parsed;
	const verdict = evaluationRulesOk(parsed.value.profitTargetBps, parsed.value.maxDrawdownBps);
	if (verdict.type === "fail") {
		return err(new ValidationError(verdict.reason, { measured: verdict.measured, limit: verdict.limit }));
	}
	return ok(parsed.value);
}

function notActive(record: EvaluationRecord): ValidationError {
	return new ValidationError(
		`Evaluation is ${record.status}`,
		{ evaluationId: record.id, status: record.status },
		"EVALUATION_NOT_ACTIVE",
	);
}

/** Wins over trades in bps; 0 before the first trade. */
function winRate(wins: number, tradeCount: number): number {
	if (tradeCount === 0) return 0;
	return Number((BigInt(wins) * BPS_DENOMINATOR) / BigInt(tradeCount));
}
