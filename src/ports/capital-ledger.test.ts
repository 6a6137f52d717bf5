import { describe, expect, it } from "vitest";
import { AlreadyExistsError, LimitBreachError, ValidationError } from "../shared/errors.js";
import { toAmount } from "../shared/fixed-point.js";
import { accountId } from "../shared/identifiers.js";
import { unwrap, unwrapErr } from "../shared/result.js";
import { MemoryCapitalLedger } from "./capital-ledger.js";

const A = accountId("acct-a");
const B = accountId("acct-b");

describe("MemoryCapitalLedger", () => {
	it("tracks allocations per account", () => {
		const ledger = new MemoryCapitalLedger();
		unwrap(ledger.allocate(A, toAmount("100000")));
		unwrap(ledger.allocate(B, toAmount("50000")));

		expect(ledger.allocationOf(A)).toBe(toAmount("100000"));
		expect(ledger.allocationOf(accountId("acct-c"))).toBe(0n);
		expect(ledger.totalAllocated()).toBe(toAmount("150000"));
	});

	it("refuses duplicate and non-positive allocations", () => {
		const ledger = new MemoryCapitalLedger();
		unwrap(ledger.allocate(A, toAmount("1")));
		expect(unwrapErr(ledger.allocate(A, toAmount("1")))).toBeInstanceOf(AlreadyExistsError);
		expect(unwrapErr(ledger.allocate(B, 0n))).toBeInstanceOf(ValidationError);
	});

	it("enforces capacity", () => {
		const ledger = new MemoryCapitalLedger({ capacity: toAmount("120000") });
		unwrap(ledger.allocate(A, toAmount("100000")));
		const error = unwrapErr(ledger.allocate(B, toAmount("50000")));

		expect(error).toBeInstanceOf(LimitBreachError);
		expect(error).toMatchObject({ limit: "capital", context: { remaining: toAmount("20000") } });
		expect(ledger.allocationOf(B)).toBe(0n);
	});

	it("records received shares", () => {
		const ledger = new MemoryCapitalLedger();
		unwrap(ledger.receiveShare(A, toAmount("100")));
		unwrap(ledger.receiveShare(B, toAmount("40")));
		unwrap(ledger.receiveShare(A, toAmount("25")));

		expect(ledger.totalReceived()).toBe(toAmount("165"));
		expect(ledger.receiptsOf(A).map((r) => r.amount)).toEqual([toAmount("100"), toAmount("25")]);
		expect(unwrapErr(ledger.receiveShare(A, -1n))).toBeInstanceOf(ValidationError);
	});
});
