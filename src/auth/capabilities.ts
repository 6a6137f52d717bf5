/**
 * Capability tokens — explicit, unforgeable proof of a role, passed into
 * every gated call and checked by the component that receives it.
 *
 * Tokens never leak the principal they were minted for through toString,
 * JSON.stringify, Node.js inspect or the logger.
 */

import { inspect } from "node:util";
import { AuthorizationError } from "../shared/errors.js";
import type { PrincipalId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";

/** Roles a capability can carry. */
export const Role = {
	/** Administers rules, feeds, sources and the collateral pool */
	Admin: "admin",
	/** Submits prices to feeds that list it as an authorized source */
	Feeder: "feeder",
	/** Owns evaluations and funded accounts */
	Participant: "participant",
} as const;

export type Role = (typeof Role)[keyof typeof Role];

interface Grant {
	readonly principal: PrincipalId;
	readonly roles: ReadonlySet<Role>;
	readonly authority: CapabilityAuthority;
}

// ── Private store ────────────────────────────────────────────────────

const grants = new WeakMap<Capability, Grant>();

/** Opaque token. Only the authority that minted it can read what it grants. */
export class Capability {
	readonly __opaque = true as const;

	toString(): string {
		return "[REDACTED]";
	}

	toJSON(): string {
		return "[REDACTED]";
	}

	[inspect.custom](): string {
		return "[REDACTED]";
	}
}

/**
 * Mints and verifies capabilities. Every component is constructed with the
 * authority it trusts; tokens from any other authority are rejected.
 *
 * @example
 * ```ts
 * const authority = new CapabilityAuthority();
 * const admin = authority.mint(principalId("ops"), [Role.Admin]);
 * registry.register(admin, feed);
 * ```
 */
export class CapabilityAuthority {
	private readonly revoked = new WeakSet<Capability>();

	mint(principal: PrincipalId, roles: readonly Role[]): Capability {
		const token = new Capability();
		grants.set(token, { principal, roles: new Set(roles), authority: this });
		return token;
	}

	revoke(token: Capability): void {
		this.revoked.add(token);
	}

	/** Resolve the principal behind a token if it carries `role`. */
	verify(token: Capability, role: Role): Result<PrincipalId, AuthorizationError> {
		const grant = grants.get(token);
		if (!grant || grant.authority !== this) {
			return err(new AuthorizationError("Capability was not issued by this authority", { role }));
		}
		if (this.revoked.has(token)) {
			return err(new AuthorizationError("Capability has been revoked", { role }));
		}
		if (!grant.roles.has(role)) {
			return err(
				new AuthorizationError(`Capability does not carry the ${role} role`, {
					principal: grant.principal,
					role,
				}),
			);
		}
		return ok(grant.principal);
	}
}
