export {
	type AccountId,
	type EvaluationId,
	type FeedSymbol,
	type PositionId,
	type PrincipalId,
	accountId,
	evaluationId,
	feedSymbol,
	principalId,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	flatMap,
	unwrap,
	unwrapErr,
	isOk,
	isErr,
} from "./result.js";

export {
	ErrorCategory,
	RiskEngineError,
	ValidationError,
	AuthorizationError,
	StalenessError,
	NotFoundError,
	AlreadyExistsError,
	ConfigError,
	LimitBreachError,
	ArithmeticOverflowError,
	InvariantViolationError,
	ReentrancyError,
	isValidationError,
	isAuthorizationError,
	isStalenessError,
	isLimitBreach,
	isNotFoundError,
	isAlreadyExistsError,
	isFatal,
} from "./errors.js";

export {
	PRICE_DECIMALS,
	PRICE_ONE,
	CURRENCY_DECIMALS,
	BPS_DENOMINATOR,
	checkedAdd,
	checkedSub,
	checkedMul,
	mulDiv,
	minOf,
	maxOf,
	absOf,
	parseUnits,
	formatUnits,
	toAmount,
	toPrice,
} from "./fixed-point.js";

export { type Clock, SystemClock, FakeClock, Duration } from "./time.js";
export { ExclusiveSection } from "./exclusive.js";
export { type Versioned, VersionedConfig } from "./versioned.js";
export {
	type EngineConfig,
	type FeedParams,
	type QualificationRules,
	type FundedParams,
	type PoolParams,
	DEFAULT_ENGINE_CONFIG,
	feedParamsSchema,
	qualificationRulesSchema,
	fundedParamsSchema,
	poolParamsSchema,
	parseEngineConfig,
	configFromEnv,
} from "./config.js";
