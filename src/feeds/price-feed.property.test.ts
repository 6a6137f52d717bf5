import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { CapabilityAuthority, Role } from "../auth/capabilities.js";
import { toPrice } from "../shared/fixed-point.js";
import { feedSymbol, principalId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import { PriceFeed } from "./price-feed.js";

const SEED = toPrice("50000");
// Smallest move that measures 501 bps after truncation
const BEYOND_BOUND = (SEED * 501n) / 10_000n;

describe("PriceFeed (property-based)", () => {
	it("repeating an out-of-deviation submission never changes the feed", () => {
		fc.assert(
			fc.property(fc.bigInt({ min: BEYOND_BOUND, max: SEED * 10n }), fc.boolean(), (offset, up) => {
				const clock = new FakeClock(0);
				const authority = new CapabilityAuthority();
				const feeder = authority.mint(principalId("oracle-1"), [Role.Feeder]);
				const feed = unwrap(
					PriceFeed.create({
						symbol: feedSymbol("BTC/USD"),
						authority,
						sources: [principalId("oracle-1")],
						initialPrice: SEED,
						clock,
					}),
				);
				const price = up ? SEED + offset : SEED - offset;
				clock.advance(1_000);
				const before = feed.health();
				const history = feed.history();

				for (let i = 0; i < 2; i++) {
					expect(feed.submit(feeder, price).ok).toBe(false);
					expect(feed.history()).toEqual(history);
					expect(feed.health()).toEqual(before);
				}
			}),
			{ numRuns: 200 },
		);
	});
});
