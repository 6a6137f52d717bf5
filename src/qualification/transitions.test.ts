import { describe, expect, it } from "vitest";
import { DEFAULT_ENGINE_CONFIG } from "../shared/config.js";
import { toAmount } from "../shared/fixed-point.js";
import { Duration } from "../shared/time.js";
import { type TransitionInput, nextTransition, profitTarget } from "./transitions.js";

const rules = DEFAULT_ENGINE_CONFIG.qualification;

function input(overrides: Partial<TransitionInput> = {}): TransitionInput {
	return {
		rules,
		startedAt: 0,
		now: Duration.days(1),
		balance: toAmount("10000"),
		highWaterMark: toAmount("10000"),
		tradeCount: 0,
		...overrides,
	};
}

describe("profitTarget", () => {
	it("adds the target bps to the virtual balance", () => {
		expect(profitTarget(rules)).toBe(toAmount("11000"));
	});
});

describe("nextTransition", () => {
	it("stays active by default", () => {
		expect(nextTransition(input())).toEqual({ status: "active" });
	});

	it("passes at the target with enough trades", () => {
		expect(nextTransition(input({ balance: toAmount("11000"), highWaterMark: toAmount("11000"), tradeCount: 5 }))).toEqual(
			{ status: "passed" },
		);
	});

	it("needs the minimum trade count to pass", () => {
		expect(nextTransition(input({ balance: toAmount("12000"), tradeCount: 4 })).status).toBe("active");
	});

	it("fails on drawdown past the cap", () => {
		expect(nextTransition(input({ balance: toAmount("9499") }))).toEqual({ status: "failed", reason: "drawdown" });
	});

	it("ranks expiry above everything else", () => {
		const late = input({ now: Duration.days(30) + 1, balance: toAmount("11000"), tradeCount: 5 });
		expect(nextTransition(late)).toEqual({ status: "failed", reason: "expired" });
	});

	it("ranks drawdown above the pass condition", () => {
		// A balance past the target can still sit in drawdown from a higher peak
		const result = nextTransition(
			input({ balance: toAmount("11000"), highWaterMark: toAmount("12000"), tradeCount: 5 }),
		);
		expect(result).toEqual({ status: "failed", reason: "drawdown" });
	});
});
