import { describe, expect, it } from "vitest";
import { CapabilityAuthority, Role } from "../auth/capabilities.js";
import { EventDispatcher } from "../events/event-dispatcher.js";
import { MemoryEventLog } from "../events/memory-event-log.js";
import { AlreadyExistsError, AuthorizationError, NotFoundError, StalenessError } from "../shared/errors.js";
import { toPrice } from "../shared/fixed-point.js";
import { type FeedSymbol, feedSymbol, principalId } from "../shared/identifiers.js";
import { unwrap, unwrapErr } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import { FeedRegistry } from "./feed-registry.js";
import { PriceFeed } from "./price-feed.js";
import type { PriceTick } from "./types.js";

const BTC = feedSymbol("BTC/USD");
const ETH = feedSymbol("eth/usd");
const ORACLE = principalId("oracle-1");

function setup() {
	const clock = new FakeClock(1_000_000);
	const authority = new CapabilityAuthority();
	const admin = authority.mint(principalId("ops"), [Role.Admin]);
	const feeder = authority.mint(ORACLE, [Role.Feeder]);
	const events = new EventDispatcher();
	const log = new MemoryEventLog(events);
	const registry = FeedRegistry.create({ authority, clock, events });
	const makeFeed = (symbol: FeedSymbol, price: string) =>
		unwrap(PriceFeed.create({ symbol, authority, sources: [ORACLE], initialPrice: toPrice(price), clock }));
	return { clock, authority, admin, feeder, registry, log, makeFeed };
}

describe("FeedRegistry", () => {
	it("registers a feed once per symbol", () => {
		const { admin, registry, makeFeed, log } = setup();
		unwrap(registry.register(admin, makeFeed(BTC, "50000")));
		const error = unwrapErr(registry.register(admin, makeFeed(BTC, "50000")));
		expect(error).toBeInstanceOf(AlreadyExistsError);
		expect(registry.symbols()).toEqual([BTC]);
		expect(log.types()).toEqual(["feed_registered"]);
	});

	it("requires the admin role to register", () => {
		const { feeder, registry, makeFeed } = setup();
		expect(unwrapErr(registry.register(feeder, makeFeed(BTC, "50000")))).toBeInstanceOf(AuthorizationError);
		expect(registry.has(BTC)).toBe(false);
	});

	it("resolves prices by symbol", () => {
		const { admin, registry, makeFeed } = setup();
		unwrap(registry.register(admin, makeFeed(BTC, "50000")));
		unwrap(registry.register(admin, makeFeed(ETH, "3000")));
		expect(unwrap(registry.priceOf(BTC))).toBe(toPrice("50000"));
		expect(unwrap(registry.priceOf(feedSymbol("ETH/USD")))).toBe(toPrice("3000"));
	});

	it("surfaces NotFoundError for an unregistered symbol", () => {
		const { registry } = setup();
		expect(unwrapErr(registry.priceOf(BTC))).toBeInstanceOf(NotFoundError);
		expect(unwrapErr(registry.get(BTC))).toBeInstanceOf(NotFoundError);
	});

	it("surfaces StalenessError once the feed is stale", () => {
		const { admin, clock, registry, makeFeed } = setup();
		unwrap(registry.register(admin, makeFeed(BTC, "50000")));
		clock.advance(60_001);
		expect(unwrapErr(registry.priceOf(BTC))).toBeInstanceOf(StalenessError);
	});

	it("reports health per symbol and in aggregate", () => {
		const { admin, clock, registry, makeFeed } = setup();
		unwrap(registry.register(admin, makeFeed(BTC, "50000")));
		expect(registry.healthOf(BTC)).toEqual({
			symbol: BTC,
			registered: true,
			halted: false,
			stale: false,
			healthy: true,
			lastPrice: toPrice("50000"),
			ageMs: 0,
		});
		expect(registry.healthOf(ETH).registered).toBe(false);

		clock.advance(30_000);
		unwrap(registry.register(admin, makeFeed(ETH, "3000")));
		clock.advance(30_001);
		const report = registry.healthReport();
		expect(report.healthy).toBe(false);
		expect(report.feeds.map((f) => [f.symbol, f.healthy])).toEqual([
			[BTC, false],
			[ETH, true],
		]);
	});

	it("replaces a feed and forwards ticks only from the new one", () => {
		const { admin, clock, feeder, registry, makeFeed } = setup();
		const original = makeFeed(BTC, "50000");
		const replacement = makeFeed(BTC, "50000");
		unwrap(registry.register(admin, original));
		unwrap(registry.replace(admin, replacement));

		const seen: PriceTick[] = [];
		registry.onTick((_symbol, tick) => seen.push(tick));
		clock.advance(1_000);
		unwrap(original.submit(feeder, toPrice("50100")));
		unwrap(replacement.submit(feeder, toPrice("50200")));

		expect(seen.map((t) => t.price)).toEqual([toPrice("50200")]);
		expect(unwrap(registry.get(BTC))).toBe(replacement);
	});

	it("refuses to replace a symbol that is not registered", () => {
		const { admin, registry, makeFeed } = setup();
		expect(unwrapErr(registry.replace(admin, makeFeed(BTC, "50000")))).toBeInstanceOf(NotFoundError);
	});

	it("removes a feed and stops forwarding its ticks", () => {
		const { admin, clock, feeder, registry, makeFeed, log } = setup();
		const feed = makeFeed(BTC, "50000");
		unwrap(registry.register(admin, feed));
		const seen: PriceTick[] = [];
		registry.onTick((_symbol, tick) => seen.push(tick));

		unwrap(registry.remove(admin, BTC));
		clock.advance(1_000);
		unwrap(feed.submit(feeder, toPrice("50100")));

		expect(seen).toEqual([]);
		expect(registry.has(BTC)).toBe(false);
		expect(log.types()).toEqual(["feed_registered", "feed_removed"]);
		expect(unwrapErr(registry.remove(admin, BTC))).toBeInstanceOf(NotFoundError);
	});
});
