import { type Capability, Role } from "../auth/capabilities.js";
import { FundedAccountEngine, type FundedAccountEngineOptions } from "../funded/funded-account-engine.js";
import { AuthorizationError, InvariantViolationError, type RiskEngineError } from "../shared/errors.js";
import { type Result, err } from "../shared/result.js";
import type { CredentialRegistry } from "./credential-issuer.js";

export interface ProvisionRequest extends FundedAccountEngineOptions {
	readonly admin: Capability;
	readonly credentials: CredentialRegistry;
}

/**
 * Create a funded account for an owner holding a valid credential, wired to
 * the given pool and registry. Authorizes the account on the pool first and
 * withdraws that authorization again if the engine cannot be created.
 */
export function provisionFundedAccount(request: ProvisionRequest): Result<FundedAccountEngine, RiskEngineError> {
	const { admin, credentials, ...options } = request;
	const principal = options.authority.verify(admin, Role.Admin);
	if (!principal.ok) return principal;
	if (!credentials.hasValidCredential(options.owner)) {
		return err(new AuthorizationError("Owner holds no valid credential", { owner: options.owner }));
	}

	const wasAuthorized = options.pool.isAuthorized(options.accountId);
	const authorized = options.pool.authorizeAccount(admin, options.accountId);
	if (!authorized.ok) return authorized;

	const engine = FundedAccountEngine.create(options);
	if (!engine.ok && !wasAuthorized) {
		const revoked = options.pool.revokeAccount(admin, options.accountId);
		if (!revoked.ok) {
			throw new InvariantViolationError("Could not withdraw a fresh pool authorization", {
				accountId: options.accountId,
				cause: revoked.error,
			});
		}
	}
	return engine;
}
