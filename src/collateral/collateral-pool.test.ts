import { beforeEach, describe, expect, it } from "vitest";
import { CapabilityAuthority, Role } from "../auth/capabilities.js";
import { EventDispatcher } from "../events/event-dispatcher.js";
import { MemoryEventLog } from "../events/memory-event-log.js";
import {
	AuthorizationError,
	ConfigError,
	LimitBreachError,
	ValidationError,
} from "../shared/errors.js";
import { toAmount } from "../shared/fixed-point.js";
import { accountId, principalId } from "../shared/identifiers.js";
import { unwrap, unwrapErr } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import { CollateralPool } from "./collateral-pool.js";

const ACCT = accountId("acct-1");

function setup() {
	const clock = new FakeClock(1_000_000);
	const authority = new CapabilityAuthority();
	const admin = authority.mint(principalId("ops"), [Role.Admin]);
	const trader = authority.mint(principalId("alice"), [Role.Participant]);
	const events = new EventDispatcher();
	const log = new MemoryEventLog(events);
	const pool = unwrap(CollateralPool.create({ authority, clock, events }));
	unwrap(pool.authorizeAccount(admin, ACCT));
	return { clock, authority, admin, trader, pool, log };
}

describe("CollateralPool", () => {
	let ctx: ReturnType<typeof setup>;

	beforeEach(() => {
		ctx = setup();
	});

	describe("create", () => {
		it("rejects a collateral ratio below 100%", () => {
			const error = unwrapErr(
				CollateralPool.create({
					authority: new CapabilityAuthority(),
					params: { maxExposureRatioBps: 8_000, minCollateralRatioBps: 9_000 },
				}),
			);
			expect(error).toBeInstanceOf(ConfigError);
		});

		it("starts empty", () => {
			expect(ctx.pool.snapshot()).toEqual({
				totalCollateral: 0n,
				totalLocked: 0n,
				totalExposure: 0n,
				available: 0n,
				maxExposureRatioBps: 8_000,
				minCollateralRatioBps: 12_000,
				authorizedAccounts: 1,
			});
		});
	});

	describe("deposit / withdraw", () => {
		it("adds collateral", () => {
			const snap = unwrap(ctx.pool.deposit(ctx.admin, toAmount("100000")));
			expect(snap.totalCollateral).toBe(toAmount("100000"));
			expect(snap.available).toBe(toAmount("100000"));
		});

		it("requires the admin role", () => {
			expect(unwrapErr(ctx.pool.deposit(ctx.trader, 1n))).toBeInstanceOf(AuthorizationError);
		});

		it("rejects a zero deposit", () => {
			expect(unwrapErr(ctx.pool.deposit(ctx.admin, 0n))).toBeInstanceOf(ValidationError);
		});

		it("refuses to withdraw locked collateral", () => {
			unwrap(ctx.pool.deposit(ctx.admin, toAmount("100")));
			unwrap(ctx.pool.reserve(ACCT, toAmount("50")));
			const error = unwrapErr(ctx.pool.withdraw(ctx.admin, toAmount("60")));
			expect(error).toBeInstanceOf(LimitBreachError);
			expect(error).toMatchObject({ limit: "available_collateral" });
		});

		it("rolls back a withdrawal that would breach the exposure cap", () => {
			unwrap(ctx.pool.deposit(ctx.admin, toAmount("100000")));
			unwrap(ctx.pool.reserve(ACCT, toAmount("50000")));
			// 60k collateral caps exposure at 48k
			const error = unwrapErr(ctx.pool.withdraw(ctx.admin, toAmount("40000")));
			expect(error).toMatchObject({ limit: "exposure" });
			expect(ctx.pool.snapshot().totalCollateral).toBe(toAmount("100000"));
		});

		it("allows a withdrawal that keeps both ratios", () => {
			unwrap(ctx.pool.deposit(ctx.admin, toAmount("100000")));
			unwrap(ctx.pool.reserve(ACCT, toAmount("40000")));
			const snap = unwrap(ctx.pool.withdraw(ctx.admin, toAmount("50000")));
			expect(snap.totalCollateral).toBe(toAmount("50000"));
			expect(snap.available).toBe(toAmount("10000"));
		});
	});

	describe("reserve", () => {
		beforeEach(() => {
			unwrap(ctx.pool.deposit(ctx.admin, toAmount("100000")));
		});

		it("locks margin and counts it as exposure", () => {
			const snap = unwrap(ctx.pool.reserve(ACCT, toAmount("10000")));
			expect(snap.totalLocked).toBe(toAmount("10000"));
			expect(snap.totalExposure).toBe(toAmount("10000"));
			expect(snap.available).toBe(toAmount("90000"));
			expect(ctx.pool.lockedOf(ACCT)).toBe(toAmount("10000"));
			expect(ctx.pool.exposureOf(ACCT)).toBe(toAmount("10000"));
		});

		it("rejects an account that was never authorized", () => {
			const error = unwrapErr(ctx.pool.reserve(accountId("acct-2"), toAmount("1")));
			expect(error).toBeInstanceOf(AuthorizationError);
		});

		it("rejects more than the available collateral", () => {
			const error = unwrapErr(ctx.pool.reserve(ACCT, toAmount("150000")));
			expect(error).toMatchObject({ limit: "available_collateral" });
		});

		it("accepts exposure exactly at the cap", () => {
			const snap = unwrap(ctx.pool.reserve(ACCT, toAmount("80000")));
			expect(snap.totalExposure).toBe(toAmount("80000"));
		});

		it("rolls back a reservation past the exposure cap", () => {
			unwrap(ctx.pool.reserve(ACCT, toAmount("80000")));
			const error = unwrapErr(ctx.pool.reserve(ACCT, 1n));
			expect(error).toBeInstanceOf(LimitBreachError);
			expect(error).toMatchObject({ limit: "exposure" });
			expect(ctx.pool.lockedOf(ACCT)).toBe(toAmount("80000"));
			expect(ctx.pool.snapshot().totalExposure).toBe(toAmount("80000"));
		});

		it("checks the collateral ratio when it binds before the exposure cap", () => {
			unwrap(ctx.pool.setRatios(ctx.admin, 10_000, 20_000));
			unwrap(ctx.pool.reserve(ACCT, toAmount("50000")));
			const error = unwrapErr(ctx.pool.reserve(ACCT, 1n));
			expect(error).toMatchObject({ limit: "collateral_ratio" });
		});
	});

	describe("release", () => {
		beforeEach(() => {
			unwrap(ctx.pool.deposit(ctx.admin, toAmount("100000")));
			unwrap(ctx.pool.reserve(ACCT, toAmount("10000")));
		});

		it("is the inverse of reserve", () => {
			const snap = unwrap(ctx.pool.release(ACCT, toAmount("10000")));
			expect(snap.totalLocked).toBe(0n);
			expect(snap.totalExposure).toBe(0n);
			expect(snap.available).toBe(toAmount("100000"));
		});

		it("rejects releasing more than is locked", () => {
			const error = unwrapErr(ctx.pool.release(ACCT, toAmount("10001")));
			expect(error).toBeInstanceOf(ValidationError);
			expect(error.code).toBe("OVER_RELEASE");
			expect(ctx.pool.lockedOf(ACCT)).toBe(toAmount("10000"));
		});

		it("never takes exposure below zero", () => {
			unwrap(ctx.pool.updateExposure(ACCT, toAmount("4000")));
			const snap = unwrap(ctx.pool.release(ACCT, toAmount("10000")));
			expect(snap.totalExposure).toBe(0n);
			expect(ctx.pool.exposureOf(ACCT)).toBe(0n);
		});
	});

	describe("updateExposure", () => {
		beforeEach(() => {
			unwrap(ctx.pool.deposit(ctx.admin, toAmount("100000")));
			unwrap(ctx.pool.reserve(ACCT, toAmount("10000")));
		});

		it("moves the total by the difference", () => {
			const snap = unwrap(ctx.pool.updateExposure(ACCT, toAmount("25000")));
			expect(snap.totalExposure).toBe(toAmount("25000"));
			expect(snap.totalLocked).toBe(toAmount("10000"));
		});

		it("rolls back an update past the cap", () => {
			const error = unwrapErr(ctx.pool.updateExposure(ACCT, toAmount("80001")));
			expect(error).toMatchObject({ limit: "exposure" });
			expect(ctx.pool.exposureOf(ACCT)).toBe(toAmount("10000"));
		});

		it("rejects negative exposure", () => {
			expect(unwrapErr(ctx.pool.updateExposure(ACCT, -1n))).toBeInstanceOf(ValidationError);
		});
	});

	describe("setRatios", () => {
		it("rejects a collateral ratio below 100%", () => {
			expect(unwrapErr(ctx.pool.setRatios(ctx.admin, 8_000, 9_999))).toBeInstanceOf(ValidationError);
		});

		it("rolls back ratios the current book already violates", () => {
			unwrap(ctx.pool.deposit(ctx.admin, toAmount("100000")));
			unwrap(ctx.pool.reserve(ACCT, toAmount("70000")));
			const error = unwrapErr(ctx.pool.setRatios(ctx.admin, 6_000, 12_000));
			expect(error).toMatchObject({ limit: "exposure" });
			expect(ctx.pool.snapshot().maxExposureRatioBps).toBe(8_000);
		});
	});

	describe("accounts", () => {
		it("refuses to revoke an account holding margin", () => {
			unwrap(ctx.pool.deposit(ctx.admin, toAmount("100")));
			unwrap(ctx.pool.reserve(ACCT, toAmount("10")));
			expect(unwrapErr(ctx.pool.revokeAccount(ctx.admin, ACCT)).code).toBe("ACCOUNT_HAS_LOCKED");
			expect(ctx.pool.isAuthorized(ACCT)).toBe(true);
		});

		it("revokes an idle account", () => {
			unwrap(ctx.pool.revokeAccount(ctx.admin, ACCT));
			expect(ctx.pool.isAuthorized(ACCT)).toBe(false);
		});
	});

	describe("events", () => {
		it("publishes committed mutations only", () => {
			unwrap(ctx.pool.deposit(ctx.admin, toAmount("100")));
			unwrap(ctx.pool.reserve(ACCT, toAmount("50")));
			expect(ctx.pool.reserve(ACCT, toAmount("500")).ok).toBe(false);
			unwrap(ctx.pool.release(ACCT, toAmount("50")));
			expect(ctx.log.types()).toEqual(["collateral_deposited", "collateral_reserved", "collateral_released"]);
			expect(ctx.log.ofType("collateral_reserved")[0]).toMatchObject({
				accountId: ACCT,
				amount: toAmount("50"),
				totalLocked: toAmount("50"),
				timestamp: 1_000_000,
			});
		});
	});
});
