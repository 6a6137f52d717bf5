import { bench, describe } from "vitest";
import { twap } from "../src/math/twap.js";
import { PositionLedger } from "../src/position/position-ledger.js";
import { Track } from "../src/position/types.js";
import { GuardPipeline } from "../src/risk/guard-pipeline.js";
import type { EntryContext } from "../src/risk/types.js";
import { toAmount, toPrice } from "../src/shared/fixed-point.js";
import { feedSymbol } from "../src/shared/identifiers.js";
import { unwrap } from "../src/shared/result.js";

const BTC = feedSymbol("BTC/USD");

describe("position triggers", () => {
	const ledger = PositionLedger.create({ track: Track.Live });
	const position = unwrap(
		ledger.open({
			symbol: BTC,
			entryPrice: toPrice("50000"),
			size: toAmount("10000"),
			isLong: true,
			leverage: 10,
			stopLoss: toPrice("49000"),
			openedAt: 0,
		}),
	);
	const prices = Array.from({ length: 1000 }, (_, i) => toPrice("48000") + BigInt(i) * toPrice("3"));

	bench("shouldClose 1000x", () => {
		for (const price of prices) {
			ledger.shouldClose(position, price);
		}
	});

	bench("markToMarket 1000x", () => {
		for (const price of prices) {
			ledger.markToMarket(position, price);
		}
	});
});

describe("guard pipeline", () => {
	const pipeline = GuardPipeline.funded();
	const ctx: EntryContext = {
		request: { symbol: BTC, size: toAmount("10000"), isLong: true, stopLoss: toPrice("49000") },
		entryPrice: toPrice("50000"),
		nowMs: () => 0,
		isActive: () => true,
		deadlineMs: () => null,
		freeBalance: () => toAmount("100000"),
		leverage: () => 10,
		maxPositionSize: () => toAmount("10000"),
		dailyLoss: () => 0n,
		maxDailyLoss: () => toAmount("2000"),
		stopLossRequired: () => true,
		lastOpenedAtMs: () => null,
	};

	bench("funded preset 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			pipeline.evaluate(ctx);
		}
	});
});

describe("twap", () => {
	const ticks = Array.from({ length: 100 }, (_, i) => ({
		price: toPrice("50000") + BigInt(i) * toPrice("1"),
		timestamp: i * 1_000,
	}));

	bench("100 ticks over 60s", () => {
		twap(ticks, 60_000, 100_000);
	});
});
