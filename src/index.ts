// ── Shared Kernel ────────────────────────────────────────────────────
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
	type Result,
	ok,
	err,
	map,
	flatMap,
	unwrap,
	unwrapErr,
	isOk,
	isErr,
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
	PRICE_DECIMALS,
	PRICE_ONE,
	CURRENCY_DECIMALS,
	BPS_DENOMINATOR,
	checkedAdd,
	checkedSub,
	checkedMul,
	mulDiv,
	parseUnits,
	formatUnits,
	toAmount,
	toPrice,
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	ExclusiveSection,
	type Versioned,
	VersionedConfig,
	type EngineConfig,
	type FeedParams,
	type QualificationRules,
	type FundedParams,
	type PoolParams,
	DEFAULT_ENGINE_CONFIG,
	parseEngineConfig,
	configFromEnv,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LoggerConfig, type LogLevel, createLogger, silentLogger } from "./lib/logger/index.js";
export { type ValidationIssue, issuesOf, validate } from "./lib/validation/index.js";
export { TypedEmitter, type Unsubscribe } from "./lib/events/index.js";

// ── Auth ─────────────────────────────────────────────────────────────
export { Capability, CapabilityAuthority, Role } from "./auth/index.js";

// ── Events ───────────────────────────────────────────────────────────
export {
	type DomainEvent,
	type DomainEventDraft,
	type DomainEventOf,
	type DomainEventType,
	EventDispatcher,
	type EventDispatcherOptions,
	type HandlerErrorCallback,
	MemoryEventLog,
} from "./events/index.js";

// ── Math ─────────────────────────────────────────────────────────────
export {
	type ProfitSplit,
	applyBps,
	drawdownBps,
	liquidationPrice,
	marginForNotional,
	percentChange,
	pnl,
	ratioBps,
	requiredMargin,
	splitProfit,
	type TimedPrice,
	twap,
} from "./math/index.js";

// ── Risk & Guards ────────────────────────────────────────────────────
export {
	collateralRatioOk,
	cooldownElapsed,
	dailyLossExceeded,
	drawdownOk,
	evaluationRulesOk,
	exposureOk,
	isStale,
	positionSizeOk,
	stopTriggered,
	takeProfitTriggered,
	type RiskVerdict,
	type EntryContext,
	type EntryGuard,
	type GuardVerdict,
	type OpenRequest,
	GuardPipeline,
	AccountActiveGuard,
	CooldownGuard,
	DailyLossGuard,
	ExpiryGuard,
	MarginAvailableGuard,
	PositionSizeGuard,
	StopLossPlacementGuard,
} from "./risk/index.js";

// ── Feeds ────────────────────────────────────────────────────────────
export {
	FeedRegistry,
	type FeedRegistryOptions,
	type HealthReport,
	PriceFeed,
	type PriceFeedOptions,
	type FeedHealth,
	type PriceTick,
} from "./feeds/index.js";

// ── Positions ────────────────────────────────────────────────────────
export {
	PositionLedger,
	type CloseReason,
	CloseTrigger,
	type ClosedPosition,
	type OpenParams,
	type OpenPosition,
	type Position,
	Track,
} from "./position/index.js";

// ── Qualification ────────────────────────────────────────────────────
export {
	QualificationEngine,
	type QualificationEngineOptions,
	type Evaluation,
	EvaluationStatus,
	FailureReason,
	type VirtualCloseOutcome,
} from "./qualification/index.js";

// ── Funded accounts ──────────────────────────────────────────────────
export {
	FundedAccountEngine,
	type FundedAccountEngineOptions,
	AccountStatus,
	type FundedAccount,
	type LiveCloseOutcome,
	PauseReason,
	type PayoutReceipt,
} from "./funded/index.js";

// ── Collateral ───────────────────────────────────────────────────────
export { CollateralPool, type CollateralPoolOptions, type PoolSnapshot } from "./collateral/index.js";

// ── Ports ────────────────────────────────────────────────────────────
export {
	type CapitalLedger,
	MemoryCapitalLedger,
	type Credential,
	type CredentialIssuer,
	type CredentialRegistry,
	type CredentialRequest,
	MemoryCredentialIssuer,
	type ProvisionRequest,
	provisionFundedAccount,
} from "./ports/index.js";

// ── Keeper ───────────────────────────────────────────────────────────
export { TriggerKeeper, type TriggerKeeperOptions, type SweepReport } from "./keeper/index.js";
