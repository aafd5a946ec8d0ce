/**
 * Withdrawal and refund requests as the façade hands them to accounting.
 */

import type { WithdrawalKind } from "../minipool/types.js";
import type { Wei } from "../shared/amount.js";
import type { Address, DepositId } from "../shared/identifiers.js";

export interface WithdrawalRequest {
	/** Group-authorized contract the derivative balance is credited to */
	readonly withdrawer: Address;
	readonly userId: Address;
	readonly groupId: Address;
	readonly depositId: DepositId;
	readonly minipool: Address;
	/** Gross amount, before fees */
	readonly amount: Wei;
	readonly kind: WithdrawalKind;
}

export interface WithdrawalReceipt {
	readonly depositId: DepositId;
	readonly minipool: Address;
	readonly withdrawer: Address;
	/** Gross amount withdrawn */
	readonly amount: Wei;
	readonly net: Wei;
	readonly groupFee: Wei;
	readonly protocolFee: Wei;
	/** What the deposit still holds at the minipool */
	readonly remaining: Wei;
}

export interface QueuedRefundRequest {
	/** Group-authorized contract the ether is returned to */
	readonly depositor: Address;
	readonly userId: Address;
	readonly groupId: Address;
	readonly durationId: string;
	readonly depositId: DepositId;
}

export interface StalledRefundRequest extends QueuedRefundRequest {
	readonly minipool: Address;
}

export interface RefundReceipt {
	readonly depositId: DepositId;
	readonly depositor: Address;
	/** Null for a queued refund */
	readonly minipool: Address | null;
	readonly amount: Wei;
}
