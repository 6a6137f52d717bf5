/**
 * PriceFeed — per-symbol price ingestion with manipulation resistance.
 *
 * A submission is accepted only when, in this order: the caller holds a
 * Feeder capability for an authorized source, the price is positive, the
 * feed is not halted, the minimum update interval has passed, and the move
 * from the last tick is within the deviation bound. A rejected submission
 * leaves the feed untouched.
 */

import { type Capability, type CapabilityAuthority, Role } from "../auth/capabilities.js";
import type { DomainEventDraft } from "../events/domain-events.js";
import { EventDispatcher } from "../events/event-dispatcher.js";
import { TypedEmitter, type Unsubscribe } from "../lib/events/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { validate } from "../lib/validation/index.js";
import { percentChange } from "../math/financial.js";
import { twap } from "../math/twap.js";
import { isStale } from "../risk/validator.js";
import { DEFAULT_ENGINE_CONFIG, type FeedParams, feedParamsSchema } from "../shared/config.js";
import {
	AuthorizationError,
	ConfigError,
	type RiskEngineError,
	StalenessError,
	ValidationError,
} from "../shared/errors.js";
import { ExclusiveSection } from "../shared/exclusive.js";
import type { FeedSymbol, PrincipalId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { VersionedConfig } from "../shared/versioned.js";
import type { FeedEvents, FeedHealth, PriceTick } from "./types.js";

export interface PriceFeedOptions {
	readonly symbol: FeedSymbol;
	readonly authority: CapabilityAuthority;
	readonly params?: FeedParams | undefined;
	/** Principals allowed to submit from the start */
	readonly sources?: readonly PrincipalId[] | undefined;
	/** Seeds the history with one tick stamped at construction time */
	readonly initialPrice?: bigint | undefined;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
	readonly events?: EventDispatcher | undefined;
}

export class PriceFeed {
	readonly symbol: FeedSymbol;
	private readonly authority: CapabilityAuthority;
	private readonly params: VersionedConfig<FeedParams>;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly events: EventDispatcher;
	private readonly emitter = new TypedEmitter<FeedEvents>();
	private readonly section: ExclusiveSection;
	private readonly sources = new Set<PrincipalId>();
	private readonly ticks: PriceTick[] = [];
	private haltReason: string | null = null;

	private constructor(options: PriceFeedOptions, params: FeedParams) {
		this.symbol = options.symbol;
		this.authority = options.authority;
		this.clock = options.clock ?? SystemClock;
		this.params = new VersionedConfig(params, this.clock);
		this.logger = (options.logger ?? silentLogger()).child({ component: "price-feed", symbol: this.symbol });
		this.events = options.events ?? new EventDispatcher({ logger: this.logger });
		this.section = new ExclusiveSection(`feed ${this.symbol}`);
		for (const source of options.sources ?? []) {
			this.sources.add(source);
		}
		if (options.initialPrice !== undefined) {
			this.ticks.push({ price: options.initialPrice, timestamp: this.clock.now(), sequenceId: 1 });
		}
	}

	/**
	 * Creates a feed, validating its parameters and optional seed price.
	 *
	 * @example
	 * ```ts
	 * const feed = unwrap(PriceFeed.create({ symbol: feedSymbol("BTC/USD"), authority, sources: [oracle] }));
	 * ```
	 */
	static create(options: PriceFeedOptions): Result<PriceFeed, ConfigError> {
		const checked = validate(feedParamsSchema, options.params ?? DEFAULT_ENGINE_CONFIG.feeds);
		if (!checked.ok) {
			return err(new ConfigError(checked.error.message, { symbol: options.symbol, cause: checked.error }));
		}
		if (options.initialPrice !== undefined && options.initialPrice <= 0n) {
			return err(new ConfigError("Initial price must be positive", { symbol: options.symbol }));
		}
		return ok(new PriceFeed(options, checked.value));
	}

	// ── Ingestion ───────────────────────────────────────────────────

	/** Submit a price from an authorized source. The tick is stamped with the feed clock. */
	submit(feeder: Capability, price: bigint): Result<PriceTick, RiskEngineError> {
		const now = this.clock.now();
		const principal = this.authority.verify(feeder, Role.Feeder);
		if (!principal.ok) return principal;
		if (!this.sources.has(principal.value)) {
			this.logger.debug({ source: principal.value }, "submission from unauthorized source");
			return err(this.unauthorizedSource(principal.value));
		}

		const drafts: DomainEventDraft[] = [];
		const result = this.section.run((): Result<PriceTick, RiskEngineError> => {
			const rejection = this.checkSubmission(price, now);
			if (rejection !== null) {
				drafts.push({
					type: "price_rejected",
					timestamp: now,
					symbol: this.symbol,
					price,
					reason: rejection.message,
				});
				return err(rejection);
			}
			const tick = this.append(price, now);
			drafts.push({
				type: "feed_updated",
				timestamp: now,
				symbol: this.symbol,
				price,
				sequenceId: tick.sequenceId,
			});
			return ok(tick);
		});

		this.events.publishAll(drafts);
		if (result.ok) {
			this.emitter.emit("tick", this.symbol, result.value);
		} else {
			this.logger.debug({ price, code: result.error.code }, result.error.message);
		}
		return result;
	}

	private checkSubmission(price: bigint, now: number): ValidationError | null {
		const params = this.params.current().value;
		if (price <= 0n) {
			return new ValidationError("Price must be positive", { symbol: this.symbol, price }, "INVALID_PRICE");
		}
		if (this.haltReason !== null) {
			return new ValidationError("Feed is halted", { symbol: this.symbol, reason: this.haltReason }, "FEED_HALTED");
		}
		const last = this.ticks.at(-1);
		if (last === undefined) return null;

		if (now - last.timestamp < params.minUpdateIntervalMs) {
			return new ValidationError(
				"Update arrived before the minimum interval",
				{ symbol: this.symbol, elapsedMs: now - last.timestamp, minUpdateIntervalMs: params.minUpdateIntervalMs },
				"UPDATE_TOO_FREQUENT",
			);
		}
		const change = percentChange(last.price, price);
		if (!change.ok) return change.error;
		if (change.value > BigInt(params.maxDeviationBps)) {
			return new ValidationError(
				"Price moved beyond the deviation bound",
				{ symbol: this.symbol, deviationBps: change.value, maxDeviationBps: params.maxDeviationBps },
				"PRICE_DEVIATION",
			);
		}
		return null;
	}

	private append(price: bigint, now: number): PriceTick {
		const last = this.ticks.at(-1);
		const tick: PriceTick = { price, timestamp: now, sequenceId: (last?.sequenceId ?? 0) + 1 };
		this.ticks.push(tick);
		const excess = this.ticks.length - this.params.current().value.historyCapacity;
		if (excess > 0) {
			this.ticks.splice(0, excess);
		}
		return tick;
	}

	// ── Reads ───────────────────────────────────────────────────────

	/** Latest tick; fails when there is none, the feed is halted, or it is stale. */
	latest(now: number = this.clock.now()): Result<PriceTick, RiskEngineError> {
		const last = this.ticks.at(-1);
		if (last === undefined) {
			return err(new StalenessError("Feed has no price yet", { symbol: this.symbol }));
		}
		if (this.haltReason !== null) {
			return err(
				new ValidationError("Feed is halted", { symbol: this.symbol, reason: this.haltReason }, "FEED_HALTED"),
			);
		}
		const { heartbeatMs } = this.params.current().value;
		if (isStale(last.timestamp, heartbeatMs, now)) {
			return err(
				new StalenessError("Price is older than the heartbeat", {
					symbol: this.symbol,
					ageMs: now - last.timestamp,
					heartbeatMs,
				}),
			);
		}
		return ok(last);
	}

	/** Time-weighted average over the retained history. */
	twapOver(periodMs: number, now: number = this.clock.now()): Result<bigint, ValidationError> {
		return twap(this.ticks, periodMs, now);
	}

	health(now: number = this.clock.now()): FeedHealth {
		const last = this.ticks.at(-1);
		const halted = this.haltReason !== null;
		const stale = last === undefined || isStale(last.timestamp, this.params.current().value.heartbeatMs, now);
		const lastPrice = last?.price ?? null;
		return {
			symbol: this.symbol,
			registered: true,
			halted,
			stale,
			healthy: !halted && !stale && lastPrice !== null && lastPrice > 0n,
			lastPrice,
			ageMs: last === undefined ? null : now - last.timestamp,
		};
	}

	/** Snapshot of the retained ticks, oldest first. */
	history(): readonly PriceTick[] {
		return [...this.ticks];
	}

	currentParams(): Readonly<{ version: number; value: FeedParams }> {
		return this.params.current();
	}

	isHalted(): boolean {
		return this.haltReason !== null;
	}

	isAuthorizedSource(principal: PrincipalId): boolean {
		return this.sources.has(principal);
	}

	/** Subscribe to accepted ticks. Handlers run after the tick has committed. */
	onTick(handler: FeedEvents["tick"]): Unsubscribe {
		return this.emitter.on("tick", handler);
	}

	// ── Administration ──────────────────────────────────────────────

	authorizeSource(admin: Capability, source: PrincipalId): Result<void, AuthorizationError> {
		return this.asAdmin(admin, () => {
			this.sources.add(source);
			this.logger.info({ source }, "source authorized");
		});
	}

	revokeSource(admin: Capability, source: PrincipalId): Result<void, AuthorizationError> {
		return this.asAdmin(admin, () => {
			this.sources.delete(source);
			this.logger.info({ source }, "source revoked");
		});
	}

	setMaxDeviation(admin: Capability, maxDeviationBps: number): Result<number, RiskEngineError> {
		return this.updateParams(admin, { maxDeviationBps });
	}

	setHeartbeat(admin: Capability, heartbeatMs: number): Result<number, RiskEngineError> {
		return this.updateParams(admin, { heartbeatMs });
	}

	setMinUpdateInterval(admin: Capability, minUpdateIntervalMs: number): Result<number, RiskEngineError> {
		return this.updateParams(admin, { minUpdateIntervalMs });
	}

	/** Stop accepting submissions and serving prices until resumed. */
	halt(admin: Capability, reason: string): Result<void, AuthorizationError> {
		const result = this.asAdmin(admin, () => {
			this.haltReason = reason;
		});
		if (result.ok) {
			this.logger.warn({ reason }, "feed halted");
			this.events.publish({ type: "feed_halted", timestamp: this.clock.now(), symbol: this.symbol, reason });
		}
		return result;
	}

	resume(admin: Capability): Result<void, AuthorizationError> {
		const result = this.asAdmin(admin, () => {
			this.haltReason = null;
		});
		if (result.ok) {
			this.logger.info("feed resumed");
			this.events.publish({ type: "feed_resumed", timestamp: this.clock.now(), symbol: this.symbol });
		}
		return result;
	}

	// ── Internal ──────────────────────────────────────────────────

	private asAdmin(admin: Capability, fn: () => void): Result<void, AuthorizationError> {
		const principal = this.authority.verify(admin, Role.Admin);
		if (!principal.ok) return principal;
		this.section.run(fn);
		return ok(undefined);
	}

	/** Validate the merged parameters and install them as a new version. */
	private updateParams(admin: Capability, patch: Partial<FeedParams>): Result<number, RiskEngineError> {
		const principal = this.authority.verify(admin, Role.Admin);
		if (!principal.ok) return principal;
		const merged = validate(feedParamsSchema, { ...this.params.current().value, ...patch });
		if (!merged.ok) return merged;
		const next = this.section.run(() => this.params.replace(merged.value));
		this.logger.info({ ...patch, version: next.version }, "feed parameters updated");
		return ok(next.version);
	}

	private unauthorizedSource(source: PrincipalId): AuthorizationError {
		return new AuthorizationError("Source is not authorized for this feed", { symbol: this.symbol, source });
	}
}
