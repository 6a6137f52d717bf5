/**
 * Credential issuance — the qualification engine's only outward call.
 *
 * Called exactly once per passed evaluation. Implementations must refuse a
 * second issuance to the same owner; the engine treats a refusal as an
 * aborted close.
 */

import { AlreadyExistsError, NotFoundError, type RiskEngineError } from "../shared/errors.js";
import type { EvaluationId, PrincipalId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";

/** Track record handed to the issuer when an evaluation passes. */
export interface CredentialRequest {
	readonly owner: PrincipalId;
	readonly evaluationId: EvaluationId;
	readonly finalBalance: bigint;
	readonly profitAchieved: bigint;
	/** Deepest drawdown seen during the evaluation */
	readonly maxDrawdownBps: number;
	readonly tradeCount: number;
	readonly winRateBps: number;
}

export interface Credential extends CredentialRequest {
	readonly issuedAt: number;
	readonly revoked: boolean;
}

export interface CredentialIssuer {
	issueCredential(request: CredentialRequest): Result<void, RiskEngineError>;
}

/** What account provisioning needs to know about credentials. */
export interface CredentialRegistry {
	hasValidCredential(owner: PrincipalId): boolean;
}

// ── In-memory implementation ─────────────────────────────────────────

export interface MemoryCredentialIssuerConfig {
	readonly clock?: Clock | undefined;
}

export class MemoryCredentialIssuer implements CredentialIssuer, CredentialRegistry {
	private readonly store = new Map<PrincipalId, Credential>();
	private readonly clock: Clock;

	constructor(config?: MemoryCredentialIssuerConfig) {
		this.clock = config?.clock ?? SystemClock;
	}

	issueCredential(request: CredentialRequest): Result<void, AlreadyExistsError> {
		if (this.store.has(request.owner)) {
			return err(new AlreadyExistsError("Owner already holds a credential", { owner: request.owner }));
		}
		this.store.set(request.owner, { ...request, issuedAt: this.clock.now(), revoked: false });
		return ok(undefined);
	}

	/** Revoked credentials still count as issued. */
	revoke(owner: PrincipalId): Result<Credential, NotFoundError> {
		const credential = this.store.get(owner);
		if (credential === undefined) {
			return err(new NotFoundError("No credential for owner", { owner }));
		}
		const revoked = { ...credential, revoked: true };
		this.store.set(owner, revoked);
		return ok(revoked);
	}

	hasValidCredential(owner: PrincipalId): boolean {
		const credential = this.store.get(owner);
		return credential !== undefined && !credential.revoked;
	}

	credentialOf(owner: PrincipalId): Credential | undefined {
		return this.store.get(owner);
	}

	issued(): Credential[] {
		return [...this.store.values()];
	}

	get size(): number {
		return this.store.size;
	}
}
