/**
 * Desk walkthrough — one participant from evaluation to first payout.
 *
 * In-memory collaborators, a fake clock and a single BTC/USD feed.
 * Run: npx tsx examples/desk-walkthrough.ts
 */

import {
	CapabilityAuthority,
	CollateralPool,
	DEFAULT_ENGINE_CONFIG,
	EventDispatcher,
	FakeClock,
	FeedRegistry,
	MemoryCapitalLedger,
	MemoryCredentialIssuer,
	PriceFeed,
	QualificationEngine,
	Role,
	TriggerKeeper,
	accountId,
	createLogger,
	feedSymbol,
	formatUnits,
	principalId,
	provisionFundedAccount,
	toAmount,
	toPrice,
	unwrap,
} from "../src/index.js";

const logger = createLogger({ level: "info" });
const clock = new FakeClock(Date.UTC(2025, 0, 6, 9));
const events = new EventDispatcher({ logger });
events.on("*", (event) => logger.debug({ type: event.type, eventId: event.eventId }, "event"));

// ── Capabilities ─────────────────────────────────────────────────────

const authority = new CapabilityAuthority();
const admin = authority.mint(principalId("desk-ops"), [Role.Admin]);
const oracle = principalId("oracle-1");
const feeder = authority.mint(oracle, [Role.Feeder]);
const trader = principalId("trader-7");
const participant = authority.mint(trader, [Role.Participant]);

// ── Market ───────────────────────────────────────────────────────────

const BTC = feedSymbol("BTC/USD");
const registry = FeedRegistry.create({ authority, clock, logger, events });
const feed = unwrap(
	PriceFeed.create({ symbol: BTC, authority, sources: [oracle], initialPrice: toPrice("50000"), clock, logger, events }),
);
unwrap(registry.register(admin, feed));

function tick(price: string): void {
	clock.advance(1_000);
	unwrap(feed.submit(feeder, toPrice(price)));
}

const usd = (amount: bigint): string => formatUnits(amount, 6);

// ── Qualification ────────────────────────────────────────────────────

const issuer = new MemoryCredentialIssuer({ clock });
const qualification = unwrap(
	QualificationEngine.create({
		authority,
		registry,
		issuer,
		rules: { ...DEFAULT_ENGINE_CONFIG.qualification, minTrades: 2 },
		clock,
		logger,
		events,
	}),
);

unwrap(qualification.start(participant));
for (let i = 0; i < 2; i++) {
	const position = unwrap(qualification.openVirtual(participant, { symbol: BTC, size: toAmount("10000"), isLong: true }));
	tick("52500");
	const outcome = unwrap(qualification.closeVirtual(participant, position.id));
	logger.info(
		{ balance: usd(outcome.evaluation.balance), status: outcome.evaluation.status },
		"virtual trade closed",
	);
	tick("50000");
}

// ── Funded account ───────────────────────────────────────────────────

const pool = unwrap(CollateralPool.create({ authority, clock, logger, events }));
unwrap(pool.deposit(admin, toAmount("250000")));
const capital = new MemoryCapitalLedger({ capacity: toAmount("1000000") });

const account = unwrap(
	provisionFundedAccount({
		admin,
		credentials: issuer,
		accountId: accountId("acct-trader-7"),
		owner: trader,
		authority,
		registry,
		pool,
		capital,
		clock,
		logger,
		events,
	}),
);

const keeper = new TriggerKeeper({ registry, logger });
unwrap(keeper.watchAccount(account));
keeper.start();

unwrap(account.openLive(participant, { symbol: BTC, size: toAmount("10000"), isLong: true, stopLoss: toPrice("49000") }));
tick("48900");

const winner = unwrap(
	account.openLive(participant, { symbol: BTC, size: toAmount("10000"), isLong: true, stopLoss: toPrice("47000") }),
);
tick("51345");
unwrap(account.closeLive(participant, winner.id));

const receipt = unwrap(account.requestPayout(participant));
logger.info(
	{
		profit: usd(receipt.profit),
		participantShare: usd(receipt.participantShare),
		poolShare: usd(receipt.poolShare),
		available: usd(pool.available()),
	},
	"payout executed",
);

keeper.stop();
