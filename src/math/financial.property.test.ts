import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { drawdownBps, pnl, splitProfit } from "./financial.js";

const positive = fc.bigInt({ min: 1n, max: 10n ** 24n });

describe("financial math (property-based)", () => {
	it("long and short P&L are exact negatives", () => {
		fc.assert(
			fc.property(positive, positive, positive, (entry, exit, size) => {
				expect(pnl(entry, exit, size, true)).toBe(-pnl(entry, exit, size, false));
			}),
			{ numRuns: 500 },
		);
	});

	it("drawdown stays in [0, 10000] for balances up to the high-water mark", () => {
		fc.assert(
			fc.property(positive, fc.bigInt({ min: 0n, max: 10n ** 24n }), (hwm, raw) => {
				const balance = raw % (hwm + 1n);
				const dd = drawdownBps(balance, hwm);
				expect(dd).toBeGreaterThanOrEqual(0);
				expect(dd).toBeLessThanOrEqual(10_000);
			}),
			{ numRuns: 500 },
		);
	});

	it("drawdown is zero at or above the high-water mark", () => {
		fc.assert(
			fc.property(positive, fc.bigInt({ min: 0n, max: 10n ** 12n }), (hwm, above) => {
				expect(drawdownBps(hwm + above, hwm)).toBe(0);
			}),
			{ numRuns: 500 },
		);
	});

	it("profit split parts sum back to the total", () => {
		fc.assert(
			fc.property(
				fc.bigInt({ min: -(10n ** 24n), max: 10n ** 24n }),
				fc.integer({ min: 0, max: 10_000 }),
				(total, bps) => {
					const [participant, pool] = splitProfit(total, bps);
					expect(participant + pool).toBe(total);
				},
			),
			{ numRuns: 500 },
		);
	});
});
