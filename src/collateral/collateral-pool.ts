/**
 * CollateralPool — shared collateral accounting for every funded account.
 *
 * Tracks collateral, locked margin and exposure explicitly. Two invariants
 * hold after every committed mutation:
 *
 *   totalExposure <= totalCollateral * maxExposureRatioBps / 10000
 *   totalCollateral * 10000 / totalExposure >= minCollateralRatioBps   (exposure > 0)
 *
 * Every mutation applies its change, re-checks both, and rolls back on
 * failure, all inside the pool's exclusive section.
 */

import { type Capability, type CapabilityAuthority, Role } from "../auth/capabilities.js";
import type { DomainEventDraft } from "../events/domain-events.js";
import { EventDispatcher } from "../events/event-dispatcher.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { validate } from "../lib/validation/index.js";
import { applyBps } from "../math/financial.js";
import { collateralRatioOk, exposureOk } from "../risk/validator.js";
import { DEFAULT_ENGINE_CONFIG, type PoolParams, poolParamsSchema } from "../shared/config.js";
import {
	AuthorizationError,
	ConfigError,
	LimitBreachError,
	type RiskEngineError,
	ValidationError,
} from "../shared/errors.js";
import { ExclusiveSection } from "../shared/exclusive.js";
import { checkedAdd, checkedSub, minOf } from "../shared/fixed-point.js";
import type { AccountId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";

export interface CollateralPoolOptions {
	readonly authority: CapabilityAuthority;
	readonly params?: PoolParams | undefined;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
	readonly events?: EventDispatcher | undefined;
}

/** Point-in-time view of the pool. */
export interface PoolSnapshot {
	readonly totalCollateral: bigint;
	readonly totalLocked: bigint;
	readonly totalExposure: bigint;
	/** Collateral not locked as margin */
	readonly available: bigint;
	readonly maxExposureRatioBps: number;
	readonly minCollateralRatioBps: number;
	readonly authorizedAccounts: number;
}

interface PoolState {
	totalCollateral: bigint;
	totalLocked: bigint;
	totalExposure: bigint;
	params: PoolParams;
	locked: Map<AccountId, bigint>;
	exposure: Map<AccountId, bigint>;
}

export class CollateralPool {
	private readonly authority: CapabilityAuthority;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly events: EventDispatcher;
	private readonly section = new ExclusiveSection("collateral pool");
	private readonly accounts = new Set<AccountId>();
	private state: PoolState;

	private constructor(options: CollateralPoolOptions, params: PoolParams) {
		this.authority = options.authority;
		this.clock = options.clock ?? SystemClock;
		this.logger = (options.logger ?? silentLogger()).child({ component: "collateral-pool" });
		this.events = options.events ?? new EventDispatcher({ logger: this.logger });
		this.state = {
			totalCollateral: 0n,
			totalLocked: 0n,
			totalExposure: 0n,
			params,
			locked: new Map(),
			exposure: new Map(),
		};
	}

	static create(options: CollateralPoolOptions): Result<CollateralPool, ConfigError> {
		const checked = validate(poolParamsSchema, options.params ?? DEFAULT_ENGINE_CONFIG.pool);
		if (!checked.ok) {
			return err(new ConfigError(checked.error.message, { cause: checked.error }));
		}
		return ok(new CollateralPool(options, checked.value));
	}

	// ── Administration ──────────────────────────────────────────────

	deposit(admin: Capability, amount: bigint): Result<PoolSnapshot, RiskEngineError> {
		const principal = this.authority.verify(admin, Role.Admin);
		if (!principal.ok) return principal;
		if (amount <= 0n) return err(new ValidationError("Deposit must be positive", { amount }));

		return this.mutate((draft) => {
			draft.totalCollateral = checkedAdd(draft.totalCollateral, amount);
			return ok({ type: "collateral_deposited", amount, totalCollateral: draft.totalCollateral });
		});
	}

	/** Withdraw unlocked collateral, provided both ratios still hold afterwards. */
	withdraw(admin: Capability, amount: bigint): Result<PoolSnapshot, RiskEngineError> {
		const principal = this.authority.verify(admin, Role.Admin);
		if (!principal.ok) return principal;
		if (amount <= 0n) return err(new ValidationError("Withdrawal must be positive", { amount }));

		return this.mutate((draft) => {
			const available = draft.totalCollateral - draft.totalLocked;
			if (amount > available) {
				return err(
					new LimitBreachError("Withdrawal exceeds unlocked collateral", "available_collateral", {
						amount,
						available,
					}),
				);
			}
			draft.totalCollateral = checkedSub(draft.totalCollateral, amount);
			return ok({ type: "collateral_withdrawn", amount, totalCollateral: draft.totalCollateral });
		});
	}

	authorizeAccount(admin: Capability, accountId: AccountId): Result<void, AuthorizationError> {
		const principal = this.authority.verify(admin, Role.Admin);
		if (!principal.ok) return principal;
		this.accounts.add(accountId);
		this.logger.info({ accountId }, "account authorized");
		return ok(undefined);
	}

	/** Stop an account from reserving. Refused while it still holds locked margin. */
	revokeAccount(admin: Capability, accountId: AccountId): Result<void, RiskEngineError> {
		const principal = this.authority.verify(admin, Role.Admin);
		if (!principal.ok) return principal;
		const locked = this.lockedOf(accountId);
		if (locked > 0n) {
			return err(new ValidationError("Account still holds locked margin", { accountId, locked }, "ACCOUNT_HAS_LOCKED"));
		}
		this.accounts.delete(accountId);
		this.logger.info({ accountId }, "account revoked");
		return ok(undefined);
	}

	setRatios(
		admin: Capability,
		maxExposureRatioBps: number,
		minCollateralRatioBps: number,
	): Result<PoolSnapshot, RiskEngineError> {
		const principal = this.authority.verify(admin, Role.Admin);
		if (!principal.ok) return principal;
		const checked = validate(poolParamsSchema, { maxExposureRatioBps, minCollateralRatioBps });
		if (!checked.ok) return checked;

		return this.mutate((draft) => {
			draft.params = checked.value;
			return ok({ type: "pool_ratios_updated", maxExposureRatioBps, minCollateralRatioBps });
		});
	}

	// ── Margin ──────────────────────────────────────────────────────

	/** Lock `amount` for an account; it counts towards exposure until released. */
	reserve(accountId: AccountId, amount: bigint): Result<PoolSnapshot, RiskEngineError> {
		if (!this.accounts.has(accountId)) {
			return err(new AuthorizationError("Account is not authorized on this pool", { accountId }));
		}
		if (amount <= 0n) return err(new ValidationError("Reservation must be positive", { amount }));

		return this.mutate((draft) => {
			const available = draft.totalCollateral - draft.totalLocked;
			if (amount > available) {
				return err(
					new LimitBreachError("Reservation exceeds available collateral", "available_collateral", {
						accountId,
						amount,
						available,
					}),
				);
			}
			draft.locked.set(accountId, checkedAdd(draft.locked.get(accountId) ?? 0n, amount));
			draft.exposure.set(accountId, checkedAdd(draft.exposure.get(accountId) ?? 0n, amount));
			draft.totalLocked = checkedAdd(draft.totalLocked, amount);
			draft.totalExposure = checkedAdd(draft.totalExposure, amount);
			return ok({ type: "collateral_reserved", accountId, amount, totalLocked: draft.totalLocked });
		});
	}

	/** Inverse of reserve. Releasing more than the account holds is rejected. */
	release(accountId: AccountId, amount: bigint): Result<PoolSnapshot, RiskEngineError> {
		if (amount <= 0n) return err(new ValidationError("Release must be positive", { amount }));

		return this.mutate((draft) => {
			const held = draft.locked.get(accountId) ?? 0n;
			if (amount > held) {
				return err(new ValidationError("Release exceeds locked amount", { accountId, amount, held }, "OVER_RELEASE"));
			}
			const exposure = draft.exposure.get(accountId) ?? 0n;
			const exposureDrop = minOf(amount, exposure);
			draft.locked.set(accountId, held - amount);
			draft.exposure.set(accountId, exposure - exposureDrop);
			draft.totalLocked = checkedSub(draft.totalLocked, amount);
			draft.totalExposure = checkedSub(draft.totalExposure, exposureDrop);
			return ok({ type: "collateral_released", accountId, amount, totalLocked: draft.totalLocked });
		});
	}

	/** Set an account's exposure outright; the total moves by the difference. */
	updateExposure(accountId: AccountId, newExposure: bigint): Result<PoolSnapshot, RiskEngineError> {
		if (!this.accounts.has(accountId)) {
			return err(new AuthorizationError("Account is not authorized on this pool", { accountId }));
		}
		if (newExposure < 0n) {
			return err(new ValidationError("Exposure cannot be negative", { accountId, newExposure }));
		}

		return this.mutate((draft) => {
			const delta = newExposure - (draft.exposure.get(accountId) ?? 0n);
			draft.exposure.set(accountId, newExposure);
			draft.totalExposure = checkedAdd(draft.totalExposure, delta);
			return ok({ type: "exposure_updated", accountId, exposure: newExposure, totalExposure: draft.totalExposure });
		});
	}

	// ── Queries ──────────────────────────────────────────────────

	snapshot(): PoolSnapshot {
		const s = this.state;
		return {
			totalCollateral: s.totalCollateral,
			totalLocked: s.totalLocked,
			totalExposure: s.totalExposure,
			available: s.totalCollateral - s.totalLocked,
			maxExposureRatioBps: s.params.maxExposureRatioBps,
			minCollateralRatioBps: s.params.minCollateralRatioBps,
			authorizedAccounts: this.accounts.size,
		};
	}

	available(): bigint {
		return this.state.totalCollateral - this.state.totalLocked;
	}

	lockedOf(accountId: AccountId): bigint {
		return this.state.locked.get(accountId) ?? 0n;
	}

	exposureOf(accountId: AccountId): bigint {
		return this.state.exposure.get(accountId) ?? 0n;
	}

	isAuthorized(accountId: AccountId): boolean {
		return this.accounts.has(accountId);
	}

	// ── Internal ──────────────────────────────────────────────────

	/**
	 * Apply `change` to a copy of the state, check both ratio invariants on
	 * the copy, and install it only if they hold.
	 */
	private mutate(
		change: (draft: PoolState) => Result<EventBody, RiskEngineError>,
	): Result<PoolSnapshot, RiskEngineError> {
		const drafts: DomainEventDraft[] = [];
		const result = this.section.run((): Result<PoolSnapshot, RiskEngineError> => {
			const draft: PoolState = {
				...this.state,
				locked: new Map(this.state.locked),
				exposure: new Map(this.state.exposure),
			};
			const applied = change(draft);
			if (!applied.ok) return applied;

			const breach = this.checkInvariants(draft);
			if (breach !== null) return err(breach);

			this.state = draft;
			drafts.push({ ...applied.value, timestamp: this.clock.now() });
			return ok(this.snapshot());
		});

		if (result.ok) {
			const [event] = drafts;
			this.logger.info({ ...result.value, event: event?.type }, "pool updated");
			this.events.publishAll(drafts);
		} else {
			this.logger.debug({ code: result.error.code }, result.error.message);
		}
		return result;
	}

	private checkInvariants(draft: PoolState): LimitBreachError | null {
		const maxExposure = applyBps(draft.totalCollateral, draft.params.maxExposureRatioBps);
		const exposure = exposureOk(draft.totalExposure, maxExposure);
		if (exposure.type === "fail") {
			return new LimitBreachError("Pool exposure would exceed its cap", "exposure", {
				measured: exposure.measured,
				limit: exposure.limit,
			});
		}
		const ratio = collateralRatioOk(draft.totalCollateral, draft.totalExposure, draft.params.minCollateralRatioBps);
		if (ratio.type === "fail") {
			return new LimitBreachError("Pool collateralization would fall below its minimum", "collateral_ratio", {
				measured: ratio.measured,
				limit: ratio.limit,
			});
		}
		return null;
	}
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** A pool event before it is stamped. */
type EventBody = DistributiveOmit<
	Extract<
		DomainEventDraft,
		{
			type:
				| "collateral_deposited"
				| "collateral_withdrawn"
				| "collateral_reserved"
				| "collateral_released"
				| "exposure_updated"
				| "pool_ratios_updated";
		}
	>,
	"timestamp"
>;
