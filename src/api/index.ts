export { DepositApi } from "./deposit-api.js";
export type { DepositApiOptions } from "./deposit-api.js";
export type {
	DepositOutcome,
	DepositParams,
	ExitedWithdrawalParams,
	QueuedRefundParams,
	StakingWithdrawalParams,
	StalledRefundParams,
} from "./types.js";
