/**
 * RefundAccounting — returns ether to a group depositor, either from the
 * queue (nothing matched yet) or from a minipool that timed out before
 * launch. Refunds carry no fee.
 */

import type { DepositQueue } from "../deposit/deposit-queue.js";
import type { EventLog } from "../events/event-log.js";
import type { GroupReader } from "../group/types.js";
import {
	type QueuedRefundContext,
	type StalledRefundContext,
	queuedRefundGuards,
	stalledRefundGuards,
} from "../guards/refund-guards.js";
import type { BalanceLedger } from "../ledger/balance-ledger.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { MinipoolRegistry } from "../minipool/minipool-registry.js";
import type { SettingsReader } from "../settings/types.js";
import { FailureCode, type PoolError, ValidationError } from "../shared/errors.js";
import type { Address } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { QueuedRefundRequest, RefundReceipt, StalledRefundRequest } from "./types.js";

export interface RefundAccountingOptions {
	readonly facade: Address;
	readonly settings: SettingsReader;
	readonly groups: GroupReader;
	readonly minipools: MinipoolRegistry;
	readonly queue: DepositQueue;
	/** Ether payout ledger credited with refunded value */
	readonly payouts: BalanceLedger;
	readonly events: EventLog;
	readonly logger?: Logger;
}

export class RefundAccounting {
	private readonly facade: Address;
	private readonly settings: SettingsReader;
	private readonly groups: GroupReader;
	private readonly minipools: MinipoolRegistry;
	private readonly queue: DepositQueue;
	private readonly payouts: BalanceLedger;
	private readonly events: EventLog;
	private readonly logger: Logger;

	constructor(options: RefundAccountingOptions) {
		this.facade = options.facade;
		this.settings = options.settings;
		this.groups = options.groups;
		this.minipools = options.minipools;
		this.queue = options.queue;
		this.payouts = options.payouts;
		this.events = options.events;
		this.logger = options.logger ?? silentLogger();
	}

	/** Refunds everything of the deposit that is still queued. */
	refundQueued(sender: Address, request: QueuedRefundRequest): Result<RefundReceipt, PoolError> {
		const ctx: QueuedRefundContext = {
			...request,
			sender,
			facade: this.facade,
			settings: this.settings,
			groups: this.groups,
			deposits: this.queue,
		};
		const checked = queuedRefundGuards.evaluate(ctx);
		if (!checked.ok) {
			this.logger.debug(
				{ depositId: request.depositId, code: checked.error.code },
				"Queued refund rejected",
			);
			return checked;
		}

		const refunded = this.queue.refundQueued(request.depositId);
		if (!refunded.ok) return refunded;
		return this.payOut(request, null, refunded.value.amount);
	}

	/** Refunds the deposit's whole amount held at a timed-out minipool. */
	refundStalled(sender: Address, request: StalledRefundRequest): Result<RefundReceipt, PoolError> {
		const ctx: StalledRefundContext = {
			...request,
			sender,
			facade: this.facade,
			settings: this.settings,
			groups: this.groups,
			deposits: this.queue,
			minipools: this.minipools,
		};
		const checked = stalledRefundGuards.evaluate(ctx);
		if (!checked.ok) {
			this.logger.debug(
				{ depositId: request.depositId, minipool: request.minipool, code: checked.error.code },
				"Stalled refund rejected",
			);
			return checked;
		}

		const minipool = this.minipools.get(request.minipool);
		if (minipool === null) {
			return err(
				new ValidationError(FailureCode.InvalidMinipool, "Unknown minipool", {
					minipool: request.minipool,
				}),
			);
		}
		const amount = this.queue.amountAt(request.depositId, request.minipool);
		const released = minipool.release(request.userId, request.groupId, amount);
		if (!released.ok) return released;
		const record = this.queue.releaseFromMinipool(
			request.depositId,
			request.minipool,
			amount,
			"refunded",
		);
		if (!record.ok) return record;

		return this.payOut(request, request.minipool, amount);
	}

	private payOut(
		request: QueuedRefundRequest,
		minipool: Address | null,
		amount: bigint,
	): Result<RefundReceipt, PoolError> {
		const credited = this.payouts.credit(request.depositor, amount);
		if (!credited.ok) return credited;

		this.events.append({
			type: "deposit_refund",
			to: request.depositor,
			userId: request.userId,
			groupId: request.groupId,
			depositId: request.depositId,
			minipool,
			value: amount,
		});
		this.logger.info({ depositId: request.depositId, minipool, amount }, "Deposit refunded");

		return ok({ depositId: request.depositId, depositor: request.depositor, minipool, amount });
	}
}
