export {
	MinipoolStatus,
	type MinipoolTransition,
	type MinipoolTransitionType,
	type TransitionEntry,
	type WithdrawalKind,
	type LedgerEntry,
	type DepositPortion,
	type MinipoolSnapshot,
	type MinipoolReader,
	type MinipoolProvisioner,
	type MinipoolHandle,
} from "./types.js";
export {
	MinipoolStateMachine,
	acceptsDeposits,
	permitsWithdrawal,
	permitsStalledRefund,
	isTerminal,
} from "./state-machine.js";
export { Minipool, type MinipoolParams } from "./minipool.js";
export {
	MinipoolRegistry,
	type MinipoolRegistryOptions,
	type CreateMinipoolParams,
} from "./minipool-registry.js";
export { NodeCapacityPool, type NodeCapacityPoolOptions } from "./node-capacity-pool.js";
