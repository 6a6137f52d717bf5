/**
 * FeedRegistry — symbol → PriceFeed directory.
 *
 * Registration is one-time per symbol; replacing or removing a feed takes
 * an admin capability. Ticks from every registered feed are forwarded to
 * registry subscribers, which is how keepers learn about price moves.
 */

import { type Capability, type CapabilityAuthority, Role } from "../auth/capabilities.js";
import { EventDispatcher } from "../events/event-dispatcher.js";
import { TypedEmitter, type Unsubscribe } from "../lib/events/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import {
	AlreadyExistsError,
	NotFoundError,
	type RiskEngineError,
	ValidationError,
} from "../shared/errors.js";
import type { FeedSymbol } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { PriceFeed } from "./price-feed.js";
import type { FeedEvents, FeedHealth, PriceTick } from "./types.js";

export interface FeedRegistryOptions {
	readonly authority: CapabilityAuthority;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
	readonly events?: EventDispatcher | undefined;
}

/** Aggregate health across every registered feed. */
export interface HealthReport {
	readonly healthy: boolean;
	readonly feeds: readonly FeedHealth[];
}

interface Entry {
	readonly feed: PriceFeed;
	readonly detach: Unsubscribe;
}

export class FeedRegistry {
	private readonly authority: CapabilityAuthority;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly events: EventDispatcher;
	private readonly emitter = new TypedEmitter<FeedEvents>();
	private readonly entries = new Map<FeedSymbol, Entry>();

	private constructor(options: FeedRegistryOptions) {
		this.authority = options.authority;
		this.clock = options.clock ?? SystemClock;
		this.logger = (options.logger ?? silentLogger()).child({ component: "feed-registry" });
		this.events = options.events ?? new EventDispatcher({ logger: this.logger });
	}

	static create(options: FeedRegistryOptions): FeedRegistry {
		return new FeedRegistry(options);
	}

	// ── Administration ──────────────────────────────────────────────

	/** Register a feed under its symbol. A symbol can be registered once. */
	register(admin: Capability, feed: PriceFeed): Result<void, RiskEngineError> {
		const principal = this.authority.verify(admin, Role.Admin);
		if (!principal.ok) return principal;
		if (this.entries.has(feed.symbol)) {
			return err(new AlreadyExistsError("Feed already registered", { symbol: feed.symbol }));
		}
		this.attach(feed);
		this.logger.info({ symbol: feed.symbol }, "feed registered");
		this.events.publish({ type: "feed_registered", timestamp: this.clock.now(), symbol: feed.symbol });
		return ok(undefined);
	}

	/** Swap the feed behind an existing symbol. */
	replace(admin: Capability, feed: PriceFeed): Result<void, RiskEngineError> {
		const principal = this.authority.verify(admin, Role.Admin);
		if (!principal.ok) return principal;
		const existing = this.entries.get(feed.symbol);
		if (existing === undefined) {
			return err(new NotFoundError("Feed not registered", { symbol: feed.symbol }));
		}
		if (existing.feed === feed) {
			return err(new ValidationError("Feed is already the registered instance", { symbol: feed.symbol }));
		}
		existing.detach();
		this.attach(feed);
		this.logger.info({ symbol: feed.symbol }, "feed replaced");
		this.events.publish({ type: "feed_registered", timestamp: this.clock.now(), symbol: feed.symbol });
		return ok(undefined);
	}

	remove(admin: Capability, symbol: FeedSymbol): Result<void, RiskEngineError> {
		const principal = this.authority.verify(admin, Role.Admin);
		if (!principal.ok) return principal;
		const existing = this.entries.get(symbol);
		if (existing === undefined) {
			return err(new NotFoundError("Feed not registered", { symbol }));
		}
		existing.detach();
		this.entries.delete(symbol);
		this.logger.info({ symbol }, "feed removed");
		this.events.publish({ type: "feed_removed", timestamp: this.clock.now(), symbol });
		return ok(undefined);
	}

	// ── Lookup ──────────────────────────────────────────────────────

	get(symbol: FeedSymbol): Result<PriceFeed, NotFoundError> {
		const entry = this.entries.get(symbol);
		if (entry === undefined) {
			return err(new NotFoundError("Feed not registered", { symbol }));
		}
		return ok(entry.feed);
	}

	has(symbol: FeedSymbol): boolean {
		return this.entries.has(symbol);
	}

	symbols(): FeedSymbol[] {
		return [...this.entries.keys()];
	}

	/** Latest fresh tick for `symbol`. Fails when unregistered, halted or stale. */
	tickOf(symbol: FeedSymbol, now: number = this.clock.now()): Result<PriceTick, RiskEngineError> {
		const feed = this.get(symbol);
		if (!feed.ok) return feed;
		return feed.value.latest(now);
	}

	/** Latest fresh price for `symbol`. */
	priceOf(symbol: FeedSymbol, now: number = this.clock.now()): Result<bigint, RiskEngineError> {
		const tick = this.tickOf(symbol, now);
		return tick.ok ? ok(tick.value.price) : tick;
	}

	healthOf(symbol: FeedSymbol, now: number = this.clock.now()): FeedHealth {
		const entry = this.entries.get(symbol);
		if (entry === undefined) {
			return {
				symbol,
				registered: false,
				halted: false,
				stale: true,
				healthy: false,
				lastPrice: null,
				ageMs: null,
			};
		}
		return entry.feed.health(now);
	}

	healthReport(now: number = this.clock.now()): HealthReport {
		const feeds = this.symbols().map((symbol) => this.healthOf(symbol, now));
		return { healthy: feeds.every((f) => f.healthy), feeds };
	}

	/** Subscribe to accepted ticks from every registered feed. */
	onTick(handler: FeedEvents["tick"]): Unsubscribe {
		return this.emitter.on("tick", handler);
	}

	// ── Internal ──────────────────────────────────────────────────

	private attach(feed: PriceFeed): void {
		const detach = feed.onTick((symbol, tick) => {
			this.emitter.emit("tick", symbol, tick);
		});
		this.entries.set(feed.symbol, { feed, detach });
	}
}
