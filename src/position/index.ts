export { PositionLedger, type PositionLedgerOptions } from "./position-ledger.js";
export {
	type CloseReason,
	CloseTrigger,
	type ClosedPosition,
	type OpenParams,
	type OpenPosition,
	type Position,
	Track,
} from "./types.js";
