export { type GuardVerdict, type Guard, allow, block } from "./types.js";
export { GuardChain } from "./guard-chain.js";
export {
	callerIsFacade,
	userNotNull,
	groupExists,
	depositorAuthorized,
	depositHeldAtMinipool,
} from "./common-guards.js";
export { type DepositContext, depositGuards } from "./deposit-guards.js";
export { type WithdrawalContext, withdrawalGuards, remainingAt } from "./withdrawal-guards.js";
export {
	type QueuedRefundContext,
	type StalledRefundContext,
	queuedRefundGuards,
	stalledRefundGuards,
} from "./refund-guards.js";
