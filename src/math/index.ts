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
} from "./financial.js";
export { type TimedPrice, twap } from "./twap.js";
