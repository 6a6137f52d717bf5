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
} from "./validator.js";
export { type Measure, type RiskVerdict, fail, failed, pass, passed } from "./verdict.js";
export {
	type BlockKind,
	type EntryContext,
	type EntryGuard,
	type GuardVerdict,
	type OpenRequest,
	allow,
	block,
	blockBreach,
	isAllowed,
	isBlocked,
} from "./types.js";
export { GuardPipeline, verdictError } from "./guard-pipeline.js";
export { AccountActiveGuard } from "./guards/account-active.js";
export { CooldownGuard } from "./guards/cooldown.js";
export { DailyLossGuard } from "./guards/daily-loss.js";
export { ExpiryGuard } from "./guards/expiry.js";
export { MarginAvailableGuard } from "./guards/margin-available.js";
export { PositionSizeGuard } from "./guards/position-size.js";
export { StopLossPlacementGuard } from "./guards/stop-loss-placement.js";
