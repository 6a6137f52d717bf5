import { beforeEach, describe, expect, it } from "vitest";
import { ALICE, BTC, createMarket } from "../__tests__/market.js";
import { CollateralPool } from "../collateral/collateral-pool.js";
import { type CapitalLedger, MemoryCapitalLedger } from "../ports/capital-ledger.js";
import { DEFAULT_ENGINE_CONFIG, type FundedParams } from "../shared/config.js";
import {
	AuthorizationError,
	ConfigError,
	LimitBreachError,
	StalenessError,
	ValidationError,
} from "../shared/errors.js";
import { toAmount, toPrice } from "../shared/fixed-point.js";
import { accountId } from "../shared/identifiers.js";
import { err, ok, unwrap, unwrapErr } from "../shared/result.js";
import { Duration } from "../shared/time.js";
import { FundedAccountEngine } from "./funded-account-engine.js";
import { AccountStatus, PauseReason } from "./types.js";

const ACCT = accountId("acct-1");

interface SetupOptions {
	params?: Partial<FundedParams>;
	poolCollateral?: string;
	capital?: CapitalLedger;
}

function setup(options: SetupOptions = {}) {
	const market = createMarket();
	const { authority, admin, clock, events, registry } = market;
	const pool = unwrap(CollateralPool.create({ authority, clock, events }));
	unwrap(pool.deposit(admin, toAmount(options.poolCollateral ?? "100000")));
	unwrap(pool.authorizeAccount(admin, ACCT));
	const ledger = new MemoryCapitalLedger();
	const capital = options.capital ?? ledger;
	const engine = unwrap(
		FundedAccountEngine.create({
			accountId: ACCT,
			owner: ALICE,
			authority,
			registry,
			pool,
			capital,
			params: { ...DEFAULT_ENGINE_CONFIG.funded, ...options.params },
			clock,
			events,
		}),
	);
	return { ...market, pool, ledger, engine };
}

type Ctx = ReturnType<typeof setup>;

function openLong(ctx: Ctx, size = "10000", stop = "49000") {
	return ctx.engine.openLive(ctx.alice, { symbol: BTC, size: toAmount(size), isLong: true, stopLoss: toPrice(stop) });
}

describe("FundedAccountEngine", () => {
	let ctx: Ctx;

	beforeEach(() => {
		ctx = setup();
	});

	describe("create", () => {
		it("allocates the initial capital", () => {
			expect(ctx.ledger.allocationOf(ACCT)).toBe(toAmount("100000"));
			expect(ctx.log.ofType("funded_account_created")[0]).toMatchObject({
				accountId: ACCT,
				owner: ALICE,
				capital: toAmount("100000"),
			});
			expect(ctx.engine.snapshot()).toMatchObject({
				status: AccountStatus.Active,
				balance: toAmount("100000"),
				highWaterMark: toAmount("100000"),
				payoutBasis: toAmount("100000"),
				dailyLoss: 0n,
			});
		});

		it("requires the account to be authorized on the pool", () => {
			const capital = new MemoryCapitalLedger();
			const error = unwrapErr(
				FundedAccountEngine.create({
					accountId: accountId("acct-9"),
					owner: ALICE,
					authority: ctx.authority,
					registry: ctx.registry,
					pool: ctx.pool,
					capital,
				}),
			);
			expect(error).toBeInstanceOf(AuthorizationError);
			expect(capital.totalAllocated()).toBe(0n);
		});

		it("rejects a profit split above 100%", () => {
			const error = unwrapErr(
				FundedAccountEngine.create({
					accountId: ACCT,
					owner: ALICE,
					authority: ctx.authority,
					registry: ctx.registry,
					pool: ctx.pool,
					capital: new MemoryCapitalLedger(),
					params: { ...DEFAULT_ENGINE_CONFIG.funded, profitSplitBps: 10_001 },
				}),
			);
			expect(error).toBeInstanceOf(ConfigError);
		});
	});

	describe("openLive", () => {
		it("reserves margin from the pool", () => {
			const position = unwrap(openLong(ctx));
			expect(position).toMatchObject({ entryPrice: toPrice("50000"), marginLocked: toAmount("1000") });
			expect(ctx.pool.lockedOf(ACCT)).toBe(toAmount("1000"));
			expect(ctx.engine.snapshot().lockedMargin).toBe(toAmount("1000"));
		});

		it("requires a stop-loss", () => {
			const error = unwrapErr(ctx.engine.openLive(ctx.alice, { symbol: BTC, size: toAmount("10000"), isLong: true }));
			expect(error).toBeInstanceOf(ValidationError);
			expect(error.code).toBe("GUARD_BLOCKED");
			expect(ctx.pool.lockedOf(ACCT)).toBe(0n);
		});

		it("only lets the owner trade", () => {
			const error = unwrapErr(
				ctx.engine.openLive(ctx.bob, { symbol: BTC, size: toAmount("10000"), isLong: true, stopLoss: toPrice("49000") }),
			);
			expect(error).toBeInstanceOf(AuthorizationError);
		});

		it("enforces the position size limit", () => {
			const error = unwrapErr(openLong(ctx, "10001"));
			expect(error).toBeInstanceOf(LimitBreachError);
			expect(ctx.pool.lockedOf(ACCT)).toBe(0n);
		});

		it("refuses to price off a stale feed", () => {
			ctx.clock.advance(Duration.seconds(61));
			expect(unwrapErr(openLong(ctx))).toBeInstanceOf(StalenessError);
			expect(ctx.pool.lockedOf(ACCT)).toBe(0n);
		});

		it("opens nothing when the pool refuses the reservation", () => {
			const small = setup({ poolCollateral: "1000" });
			small.log.clear();
			const error = unwrapErr(openLong(small));
			expect(error).toMatchObject({ limit: "exposure" });
			expect(small.engine.openPositions()).toHaveLength(0);
			expect(small.log.types()).toEqual([]);
		});
	});

	describe("closeLive", () => {
		it("releases margin and applies the profit", () => {
			const position = unwrap(openLong(ctx));
			ctx.movePrice("51000");
			const outcome = unwrap(ctx.engine.closeLive(ctx.alice, position.id));

			expect(outcome.position.realizedPnl).toBe(toAmount("200"));
			expect(outcome.breached).toBe(false);
			expect(outcome.account).toMatchObject({
				balance: toAmount("100200"),
				highWaterMark: toAmount("100200"),
				tradeCount: 1,
				lockedMargin: 0n,
				dailyLoss: 0n,
			});
			expect(ctx.pool.lockedOf(ACCT)).toBe(0n);
		});

		it("floors the balance at zero and counts only what was lost", () => {
			const thin = setup({ params: { initialCapital: toAmount("1000") } });
			const position = unwrap(openLong(thin, "10000", "40000"));
			thin.movePrice("47500");
			thin.movePrice("45125");
			thin.movePrice("44000");
			const outcome = unwrap(thin.engine.closeLive(thin.alice, position.id));

			expect(outcome.position.realizedPnl).toBe(toAmount("-1200"));
			expect(outcome.account.balance).toBe(0n);
			expect(outcome.account.dailyLoss).toBe(toAmount("1000"));
		});

		it("rejects a second close", () => {
			const position = unwrap(openLong(ctx));
			unwrap(ctx.engine.closeLive(ctx.alice, position.id));
			expect(unwrapErr(ctx.engine.closeLive(ctx.alice, position.id)).code).toBe("POSITION_NOT_OPEN");
		});
	});

	describe("daily loss", () => {
		let f: Ctx;

		/** Two 1000 losses against a 2000 cap. */
		function loseTwice() {
			const first = unwrap(
				f.engine.openLive(f.alice, { symbol: BTC, size: toAmount("20000"), isLong: true, stopLoss: toPrice("45000") }),
			);
			f.movePrice("47500");
			const a = unwrap(f.engine.closeLive(f.alice, first.id));
			const second = unwrap(
				f.engine.openLive(f.alice, { symbol: BTC, size: toAmount("20000"), isLong: false, stopLoss: toPrice("52000") }),
			);
			f.movePrice("49875");
			const b = unwrap(f.engine.closeLive(f.alice, second.id));
			return [a, b] as const;
		}

		beforeEach(() => {
			f = setup({ params: { maxPositionSize: toAmount("20000") } });
		});

		it("pauses on the close that reaches the cap", () => {
			const [first, second] = loseTwice();

			expect(first.breached).toBe(false);
			expect(first.account.dailyLoss).toBe(toAmount("1000"));
			expect(second.breached).toBe(true);
			expect(second.account).toMatchObject({
				status: AccountStatus.Paused,
				pauseReason: PauseReason.DailyLoss,
				dailyLoss: toAmount("2000"),
				balance: toAmount("98000"),
			});
			expect(f.log.ofType("daily_loss_breached")[0]).toMatchObject({
				dailyLoss: toAmount("2000"),
				limit: toAmount("2000"),
			});
			expect(f.log.ofType("account_paused")[0]?.reason).toBe("daily_loss");
		});

		it("blocks new positions until an admin resumes", () => {
			loseTwice();
			expect(unwrapErr(openLong(f, "10000", "45000")).code).toBe("GUARD_BLOCKED");

			expect(unwrapErr(f.engine.resume(f.admin))).toBeInstanceOf(LimitBreachError);

			f.clock.advance(Duration.hours(24));
			f.movePrice("49875");
			expect(f.engine.snapshot()).toMatchObject({ status: AccountStatus.Paused, dailyLoss: 0n });

			const resumed = unwrap(f.engine.resume(f.admin));
			expect(resumed.status).toBe(AccountStatus.Active);
			expect(unwrap(openLong(f, "10000", "45000")).entryPrice).toBe(toPrice("49875"));
		});

		it("still allows closing while paused", () => {
			const hedge = unwrap(openLong(f, "10000", "45000"));
			loseTwice();
			expect(unwrap(f.engine.closeLive(f.alice, hedge.id)).account.status).toBe(AccountStatus.Paused);
		});
	});

	describe("checkStopLoss", () => {
		it("does nothing while no trigger has fired", () => {
			const position = unwrap(openLong(ctx));
			expect(unwrap(ctx.engine.checkStopLoss(position.id))).toBeNull();
		});

		it("closes a position whose stop was crossed", () => {
			const position = unwrap(openLong(ctx));
			ctx.movePrice("48900");
			const outcome = unwrap(ctx.engine.checkStopLoss(position.id));
			expect(outcome?.position.closeReason).toBe("stop_loss");
			expect(outcome?.position.realizedPnl).toBe(toAmount("-220"));
			expect(ctx.pool.lockedOf(ACCT)).toBe(0n);
		});

		it("liquidates when the liquidation level sits above the stop", () => {
			const position = unwrap(openLong(ctx, "10000", "44000"));
			ctx.movePrice("47500");
			ctx.movePrice("45125");
			ctx.movePrice("44900");
			const outcome = unwrap(ctx.engine.checkStopLoss(position.id));
			expect(outcome?.position.closeReason).toBe("liquidation");
			expect(outcome?.position.realizedPnl).toBe(toAmount("-1020"));
		});

		it("refuses to close on a stale price", () => {
			const position = unwrap(openLong(ctx));
			ctx.clock.advance(Duration.seconds(61));
			expect(unwrapErr(ctx.engine.checkStopLoss(position.id))).toBeInstanceOf(StalenessError);
			expect(ctx.engine.openPositions()).toHaveLength(1);
		});
	});

	describe("requestPayout", () => {
		it("splits profit above the payout basis", () => {
			const position = unwrap(openLong(ctx));
			ctx.movePrice("52500");
			unwrap(ctx.engine.closeLive(ctx.alice, position.id));

			const receipt = unwrap(ctx.engine.requestPayout(ctx.alice));

			expect(receipt).toMatchObject({
				profit: toAmount("500"),
				participantShare: toAmount("400"),
				poolShare: toAmount("100"),
			});
			expect(receipt.account).toMatchObject({
				balance: toAmount("100000"),
				highWaterMark: toAmount("100000"),
				payoutBasis: toAmount("100000"),
				totalPaidOut: toAmount("400"),
			});
			expect(ctx.ledger.receiptsOf(ACCT)).toEqual([{ accountId: ACCT, amount: toAmount("100") }]);
			expect(ctx.log.ofType("payout_executed")).toHaveLength(1);
		});

		it("is refused while positions are open", () => {
			unwrap(openLong(ctx));
			expect(unwrapErr(ctx.engine.requestPayout(ctx.alice)).code).toBe("POSITIONS_OPEN");
		});

		it("is refused without profit", () => {
			expect(unwrapErr(ctx.engine.requestPayout(ctx.alice)).code).toBe("NO_PROFIT");
		});

		it("changes nothing when the capital ledger refuses the share", () => {
			const refusing: CapitalLedger = {
				allocate: () => ok(undefined),
				receiveShare: () => err(new ValidationError("ledger closed")),
			};
			const c = setup({ capital: refusing });
			const position = unwrap(openLong(c));
			c.movePrice("52500");
			unwrap(c.engine.closeLive(c.alice, position.id));

			expect(unwrapErr(c.engine.requestPayout(c.alice)).message).toBe("ledger closed");
			expect(c.engine.snapshot()).toMatchObject({ balance: toAmount("100500"), totalPaidOut: 0n });
		});
	});

	describe("pause / resume", () => {
		it("lets an admin pause and resume", () => {
			const paused = unwrap(ctx.engine.pause(ctx.admin, "review"));
			expect(paused).toMatchObject({ status: AccountStatus.Paused, pauseReason: PauseReason.Admin, pauseNote: "review" });
			expect(ctx.log.ofType("account_paused")[0]?.reason).toBe("admin: review");

			const resumed = unwrap(ctx.engine.resume(ctx.admin));
			expect(resumed).toMatchObject({ status: AccountStatus.Active, pauseReason: null, pauseNote: null });
		});

		it("requires the admin role", () => {
			expect(unwrapErr(ctx.engine.pause(ctx.alice, "self"))).toBeInstanceOf(AuthorizationError);
		});

		it("rejects transitions from the wrong state", () => {
			expect(unwrapErr(ctx.engine.resume(ctx.admin)).code).toBe("ACCOUNT_STATUS");
			unwrap(ctx.engine.pause(ctx.admin, "review"));
			expect(unwrapErr(ctx.engine.pause(ctx.admin, "again")).code).toBe("ACCOUNT_STATUS");
		});
	});
});
