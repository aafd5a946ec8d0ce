export { RefundAccounting } from "./refund-accounting.js";
export type { RefundAccountingOptions } from "./refund-accounting.js";
export { WithdrawalAccounting } from "./withdrawal-accounting.js";
export type { WithdrawalAccountingOptions } from "./withdrawal-accounting.js";
export type {
	QueuedRefundRequest,
	RefundReceipt,
	StalledRefundRequest,
	WithdrawalReceipt,
	WithdrawalRequest,
} from "./types.js";
