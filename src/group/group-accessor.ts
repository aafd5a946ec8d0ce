/**
 * GroupAccessor — a depositor and withdrawer a group owner deploys for its
 * users. Each call reaches the deposit API with the accessor as sender and
 * the calling user as `userId`; ether refunded to and derivative tokens
 * credited to the accessor are passed straight on to that user.
 */

import type { DepositApi } from "../api/deposit-api.js";
import type { DepositOutcome } from "../api/types.js";
import type { BalanceLedger } from "../ledger/balance-ledger.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { Wei } from "../shared/amount.js";
import type { PoolError } from "../shared/errors.js";
import type { Address, DepositId } from "../shared/identifiers.js";
import { type Result, ok } from "../shared/result.js";
import type { RefundReceipt, WithdrawalReceipt } from "../withdrawal/types.js";

export interface GroupAccessorOptions {
	readonly address: Address;
	readonly groupId: Address;
	readonly api: DepositApi;
	readonly derivative: BalanceLedger;
	readonly payouts: BalanceLedger;
	readonly logger?: Logger;
}

export class GroupAccessor {
	readonly address: Address;
	readonly groupId: Address;
	private readonly api: DepositApi;
	private readonly derivative: BalanceLedger;
	private readonly payouts: BalanceLedger;
	private readonly logger: Logger;

	constructor(options: GroupAccessorOptions) {
		this.address = options.address;
		this.groupId = options.groupId;
		this.api = options.api;
		this.derivative = options.derivative;
		this.payouts = options.payouts;
		this.logger = options.logger ?? silentLogger();
	}

	deposit(user: Address, durationId: string, value: Wei): Result<DepositOutcome, PoolError> {
		const params = { groupId: this.groupId, userId: user, durationId };
		return this.api.deposit(this.address, params, value);
	}

	refundQueued(
		user: Address,
		durationId: string,
		depositId: DepositId,
	): Result<RefundReceipt, PoolError> {
		const refunded = this.api.refundQueued(this.address, {
			groupId: this.groupId,
			userId: user,
			durationId,
			depositId,
		});
		if (!refunded.ok) return refunded;
		return this.forward(this.payouts, user, refunded.value.amount, refunded.value);
	}

	refundStalled(
		user: Address,
		durationId: string,
		depositId: DepositId,
		minipool: Address,
	): Result<RefundReceipt, PoolError> {
		const refunded = this.api.refundStalled(this.address, {
			groupId: this.groupId,
			userId: user,
			durationId,
			depositId,
			minipool,
		});
		if (!refunded.ok) return refunded;
		return this.forward(this.payouts, user, refunded.value.amount, refunded.value);
	}

	withdrawStaking(
		user: Address,
		depositId: DepositId,
		minipool: Address,
		amount: Wei,
	): Result<WithdrawalReceipt, PoolError> {
		const withdrawn = this.api.withdrawStaking(this.address, {
			groupId: this.groupId,
			userId: user,
			depositId,
			minipool,
			amount,
		});
		if (!withdrawn.ok) return withdrawn;
		return this.forward(this.derivative, user, withdrawn.value.net, withdrawn.value);
	}

	withdrawExited(
		user: Address,
		depositId: DepositId,
		minipool: Address,
	): Result<WithdrawalReceipt, PoolError> {
		const withdrawn = this.api.withdrawExited(this.address, {
			groupId: this.groupId,
			userId: user,
			depositId,
			minipool,
		});
		if (!withdrawn.ok) return withdrawn;
		return this.forward(this.derivative, user, withdrawn.value.net, withdrawn.value);
	}

	private forward<T>(
		ledger: BalanceLedger,
		user: Address,
		amount: Wei,
		receipt: T,
	): Result<T, PoolError> {
		if (amount === 0n) return ok(receipt);
		const moved = ledger.transfer(this.address, user, amount);
		if (!moved.ok) return moved;
		this.logger.debug({ accessor: this.address, user, amount, symbol: ledger.symbol }, "Forwarded");
		return ok(receipt);
	}
}
