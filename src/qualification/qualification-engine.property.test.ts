import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { ALICE, BTC, createMarket } from "../__tests__/market.js";
import { MemoryCredentialIssuer } from "../ports/credential-issuer.js";
import { formatUnits, toAmount } from "../shared/fixed-point.js";
import { unwrap } from "../shared/result.js";
import { QualificationEngine } from "./qualification-engine.js";
import { EvaluationStatus } from "./types.js";

const ENTRY = 50_000n;

/** Exit price `moveBps` away from 50000, as a decimal string. */
function exitAt(moveBps: number): string {
	return formatUnits(ENTRY * BigInt(10_000 + moveBps), 4);
}

describe("QualificationEngine (property-based)", () => {
	it("never lowers the high-water mark across a run of closes", () => {
		fc.assert(
			fc.property(
				fc.array(fc.record({ moveBps: fc.integer({ min: -400, max: 400 }), isLong: fc.boolean() }), {
					maxLength: 15,
				}),
				(trades) => {
					const market = createMarket();
					const engine = unwrap(
						QualificationEngine.create({
							authority: market.authority,
							registry: market.registry,
							issuer: new MemoryCredentialIssuer(),
							clock: market.clock,
						}),
					);
					unwrap(engine.start(market.alice));
					let hwm = unwrap(engine.getEvaluation(ALICE)).highWaterMark;

					for (const { moveBps, isLong } of trades) {
						const opened = engine.openVirtual(market.alice, { symbol: BTC, size: toAmount("2000"), isLong });
						if (!opened.ok) break;
						market.movePrice(exitAt(moveBps));
						const evaluation = unwrap(engine.closeVirtual(market.alice, opened.value.id)).evaluation;
						market.movePrice("50000");

						expect(evaluation.highWaterMark >= hwm).toBe(true);
						expect(evaluation.highWaterMark >= evaluation.balance).toBe(true);
						hwm = evaluation.highWaterMark;
						if (evaluation.status !== EvaluationStatus.Active) break;
					}
				},
			),
		);
	});
});
