export { FundedAccountEngine, type FundedAccountEngineOptions } from "./funded-account-engine.js";
export {
	AccountStatus,
	type FundedAccount,
	type LiveCloseOutcome,
	PauseReason,
	type PayoutReceipt,
} from "./types.js";
