import { describe, expect, it } from "vitest";
import { AlreadyExistsError, NotFoundError } from "../shared/errors.js";
import { toAmount } from "../shared/fixed-point.js";
import { evaluationId, principalId } from "../shared/identifiers.js";
import { unwrap, unwrapErr } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import { type CredentialRequest, MemoryCredentialIssuer } from "./credential-issuer.js";

const ALICE = principalId("alice");

function request(overrides: Partial<CredentialRequest> = {}): CredentialRequest {
	return {
		owner: ALICE,
		evaluationId: evaluationId("eval-1"),
		finalBalance: toAmount("11000"),
		profitAchieved: toAmount("1000"),
		maxDrawdownBps: 120,
		tradeCount: 5,
		winRateBps: 10_000,
		...overrides,
	};
}

describe("MemoryCredentialIssuer", () => {
	it("stamps issued credentials with the clock", () => {
		const issuer = new MemoryCredentialIssuer({ clock: new FakeClock(5_000) });
		unwrap(issuer.issueCredential(request()));

		expect(issuer.credentialOf(ALICE)).toMatchObject({ issuedAt: 5_000, revoked: false, tradeCount: 5 });
		expect(issuer.hasValidCredential(ALICE)).toBe(true);
		expect(issuer.size).toBe(1);
	});

	it("refuses a second credential for the same owner", () => {
		const issuer = new MemoryCredentialIssuer();
		unwrap(issuer.issueCredential(request()));
		const error = unwrapErr(issuer.issueCredential(request({ evaluationId: evaluationId("eval-2") })));
		expect(error).toBeInstanceOf(AlreadyExistsError);
		expect(issuer.credentialOf(ALICE)?.evaluationId).toBe("eval-1");
	});

	it("revoked credentials are no longer valid but still block reissue", () => {
		const issuer = new MemoryCredentialIssuer();
		unwrap(issuer.issueCredential(request()));
		expect(unwrap(issuer.revoke(ALICE)).revoked).toBe(true);

		expect(issuer.hasValidCredential(ALICE)).toBe(false);
		expect(unwrapErr(issuer.issueCredential(request()))).toBeInstanceOf(AlreadyExistsError);
	});

	it("cannot revoke what was never issued", () => {
		expect(unwrapErr(new MemoryCredentialIssuer().revoke(ALICE))).toBeInstanceOf(NotFoundError);
	});
});
