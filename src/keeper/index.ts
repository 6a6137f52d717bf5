export {
	type KeeperClose,
	type KeeperFailure,
	type SweepReport,
	TriggerKeeper,
	type TriggerKeeperOptions,
} from "./trigger-keeper.js";
