import { describe, expect, it } from "vitest";
import { FakeClock } from "./time.js";
import { VersionedConfig } from "./versioned.js";

describe("VersionedConfig", () => {
	it("starts at version 1", () => {
		const config = new VersionedConfig({ minTrades: 5 }, new FakeClock(1_000));
		expect(config.current()).toEqual({ version: 1, value: { minTrades: 5 }, updatedAtMs: 1_000 });
	});

	it("bumps the version on every replace", () => {
		const clock = new FakeClock(1_000);
		const config = new VersionedConfig({ minTrades: 5 }, clock);
		clock.advance(500);

		expect(config.replace({ minTrades: 8 })).toEqual({ version: 2, value: { minTrades: 8 }, updatedAtMs: 1_500 });
		expect(config.replace({ minTrades: 5 }).version).toBe(3);
	});

	it("leaves earlier snapshots untouched", () => {
		const config = new VersionedConfig({ minTrades: 5 }, new FakeClock());
		const before = config.current();
		config.replace({ minTrades: 9 });

		expect(before.value.minTrades).toBe(5);
		expect(config.current().value.minTrades).toBe(9);
	});
});
