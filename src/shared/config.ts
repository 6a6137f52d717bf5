/**
 * Engine configuration — risk parameters for every component.
 *
 * Defaults mirror the production deployment: 10k virtual balance with a
 * 10% target and 5% drawdown cap, 100k funded capital with a 2k daily loss
 * cap and 80/20 profit split, 80% pool exposure against 120% collateral.
 */

import { bpsSchema, durationMsSchema, positiveAmountSchema, validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import { CURRENCY_DECIMALS, parseUnits } from "./fixed-point.js";
import { type Result, err, ok } from "./result.js";
import { Duration } from "./time.js";

// ── Sections ─────────────────────────────────────────────────────────

export interface FeedParams {
	/** Largest accepted move between consecutive ticks, in bps */
	readonly maxDeviationBps: number;
	/** A feed older than this is stale */
	readonly heartbeatMs: number;
	/** Minimum spacing between accepted ticks */
	readonly minUpdateIntervalMs: number;
	/** Ticks retained for TWAP queries */
	readonly historyCapacity: number;
}

export interface QualificationRules {
	readonly virtualBalance: bigint;
	readonly profitTargetBps: number;
	readonly maxDrawdownBps: number;
	readonly minTrades: number;
	readonly evaluationPeriodMs: number;
	readonly leverage: number;
	/** Notional cap per position; defaults to virtualBalance × leverage */
	readonly maxPositionSize?: bigint | undefined;
}

export interface FundedParams {
	readonly initialCapital: bigint;
	readonly maxPositionSize: bigint;
	readonly maxDailyLoss: bigint;
	/** Participant share of profit on payout */
	readonly profitSplitBps: number;
	readonly leverage: number;
	readonly dailyWindowMs: number;
}

export interface PoolParams {
	readonly maxExposureRatioBps: number;
	readonly minCollateralRatioBps: number;
}

export interface EngineConfig {
	readonly feeds: FeedParams;
	readonly qualification: QualificationRules;
	readonly funded: FundedParams;
	readonly pool: PoolParams;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	feeds: {
		maxDeviationBps: 500,
		heartbeatMs: Duration.seconds(60),
		minUpdateIntervalMs: Duration.seconds(1),
		historyCapacity: 100,
	},
	qualification: {
		virtualBalance: 10_000_000_000n,
		profitTargetBps: 1_000,
		maxDrawdownBps: 500,
		minTrades: 5,
		evaluationPeriodMs: Duration.days(30),
		leverage: 10,
	},
	funded: {
		initialCapital: 100_000_000_000n,
		maxPositionSize: 10_000_000_000n,
		maxDailyLoss: 2_000_000_000n,
		profitSplitBps: 8_000,
		leverage: 10,
		dailyWindowMs: Duration.hours(24),
	},
	pool: {
		maxExposureRatioBps: 8_000,
		minCollateralRatioBps: 12_000,
	},
};

// ── Schemas ──────────────────────────────────────────────────────────

const leverageSchema = z.number().int().min(1).max(1_000);
const openBpsSchema = z.number().int().gt(0).lt(10_000);

export const feedParamsSchema = z.object({
	maxDeviationBps: bpsSchema.refine((v) => v > 0, "must be positive"),
	heartbeatMs: durationMsSchema,
	minUpdateIntervalMs: z.number().int().min(0),
	historyCapacity: z.number().int().min(2).max(10_000),
});

export const qualificationRulesSchema = z.object({
	virtualBalance: positiveAmountSchema,
	profitTargetBps: openBpsSchema,
	maxDrawdownBps: openBpsSchema,
	minTrades: z.number().int().min(0),
	evaluationPeriodMs: durationMsSchema,
	leverage: leverageSchema,
	maxPositionSize: positiveAmountSchema.optional(),
});

export const fundedParamsSchema = z.object({
	initialCapital: positiveAmountSchema,
	maxPositionSize: positiveAmountSchema,
	maxDailyLoss: positiveAmountSchema,
	profitSplitBps: bpsSchema,
	leverage: leverageSchema,
	dailyWindowMs: durationMsSchema,
});

export const poolParamsSchema = z.object({
	maxExposureRatioBps: bpsSchema.refine((v) => v > 0, "must be positive"),
	minCollateralRatioBps: z.number().int().min(10_000).max(1_000_000),
});

const engineConfigSchema = z.object({
	feeds: feedParamsSchema,
	qualification: qualificationRulesSchema,
	funded: fundedParamsSchema,
	pool: poolParamsSchema,
});

/** Validate a complete configuration object. */
export function parseEngineConfig(input: unknown): Result<EngineConfig, ConfigError> {
	const result = validate(engineConfigSchema, input);
	if (!result.ok) {
		return err(new ConfigError(result.error.message, { cause: result.error }));
	}
	return ok(result.value);
}

// ── Environment ──────────────────────────────────────────────────────

type Section = keyof EngineConfig;

interface EnvBinding {
	readonly env: string;
	readonly section: Section;
	readonly key: string;
	readonly kind: "int" | "amount";
}

const ENV_BINDINGS: readonly EnvBinding[] = [
	{ env: "PROPDESK_FEED_MAX_DEVIATION_BPS", section: "feeds", key: "maxDeviationBps", kind: "int" },
	{ env: "PROPDESK_FEED_HEARTBEAT_MS", section: "feeds", key: "heartbeatMs", kind: "int" },
	{ env: "PROPDESK_FEED_MIN_UPDATE_INTERVAL_MS", section: "feeds", key: "minUpdateIntervalMs", kind: "int" },
	{ env: "PROPDESK_FEED_HISTORY_CAPACITY", section: "feeds", key: "historyCapacity", kind: "int" },
	{ env: "PROPDESK_EVAL_VIRTUAL_BALANCE", section: "qualification", key: "virtualBalance", kind: "amount" },
	{ env: "PROPDESK_EVAL_PROFIT_TARGET_BPS", section: "qualification", key: "profitTargetBps", kind: "int" },
	{ env: "PROPDESK_EVAL_MAX_DRAWDOWN_BPS", section: "qualification", key: "maxDrawdownBps", kind: "int" },
	{ env: "PROPDESK_EVAL_MIN_TRADES", section: "qualification", key: "minTrades", kind: "int" },
	{ env: "PROPDESK_EVAL_PERIOD_MS", section: "qualification", key: "evaluationPeriodMs", kind: "int" },
	{ env: "PROPDESK_EVAL_LEVERAGE", section: "qualification", key: "leverage", kind: "int" },
	{ env: "PROPDESK_FUNDED_INITIAL_CAPITAL", section: "funded", key: "initialCapital", kind: "amount" },
	{ env: "PROPDESK_FUNDED_MAX_POSITION_SIZE", section: "funded", key: "maxPositionSize", kind: "amount" },
	{ env: "PROPDESK_FUNDED_MAX_DAILY_LOSS", section: "funded", key: "maxDailyLoss", kind: "amount" },
	{ env: "PROPDESK_FUNDED_PROFIT_SPLIT_BPS", section: "funded", key: "profitSplitBps", kind: "int" },
	{ env: "PROPDESK_FUNDED_LEVERAGE", section: "funded", key: "leverage", kind: "int" },
	{ env: "PROPDESK_FUNDED_DAILY_WINDOW_MS", section: "funded", key: "dailyWindowMs", kind: "int" },
	{ env: "PROPDESK_POOL_MAX_EXPOSURE_RATIO_BPS", section: "pool", key: "maxExposureRatioBps", kind: "int" },
	{ env: "PROPDESK_POOL_MIN_COLLATERAL_RATIO_BPS", section: "pool", key: "minCollateralRatioBps", kind: "int" },
];

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parseEnvValue(binding: EnvBinding, raw: string): number | bigint {
	if (binding.kind === "int") {
		const parsed = strictParseInt(raw);
		if (Number.isNaN(parsed)) {
			throw new ConfigError(`Invalid ${binding.env}: "${raw}" must be an integer`);
		}
		return parsed;
	}
	try {
		return parseUnits(raw, CURRENCY_DECIMALS);
	} catch (cause) {
		throw new ConfigError(`Invalid ${binding.env}: "${raw}" must be a decimal amount`, { cause });
	}
}

/**
 * Builds an EngineConfig from defaults overridden by PROPDESK_* environment variables.
 * Amounts are decimal strings in currency units ("2000.50"); everything else is an integer.
 * @throws ConfigError if a variable is malformed or the merged config is invalid
 */
export function configFromEnv(
	env: Readonly<Record<string, string | undefined>> = process.env,
	base: EngineConfig = DEFAULT_ENGINE_CONFIG,
): EngineConfig {
	const merged: Record<Section, Record<string, unknown>> = {
		feeds: { ...base.feeds },
		qualification: { ...base.qualification },
		funded: { ...base.funded },
		pool: { ...base.pool },
	};

	for (const binding of ENV_BINDINGS) {
		const raw = env[binding.env];
		if (raw === undefined || raw.trim() === "") continue;
		merged[binding.section][binding.key] = parseEnvValue(binding, raw);
	}

	const result = parseEngineConfig(merged);
	if (!result.ok) throw result.error;
	return result.value;
}
