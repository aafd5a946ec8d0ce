/**
 * WithdrawalAccounting — settles a withdrawal from a Staking or exited
 * minipool into the derivative ledger.
 *
 * Every guard runs before the first mutation, so a rejected withdrawal
 * leaves the minipool ledger, the deposit record and the balances as they
 * were. Fees are subtracted from the gross amount, never added to it.
 */

import { splitFees } from "../accounting/fee-split.js";
import type { DepositQueue } from "../deposit/deposit-queue.js";
import type { EventLog } from "../events/event-log.js";
import type { GroupReader } from "../group/types.js";
import { type WithdrawalContext, withdrawalGuards } from "../guards/withdrawal-guards.js";
import type { BalanceLedger } from "../ledger/balance-ledger.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { MinipoolRegistry } from "../minipool/minipool-registry.js";
import type { SettingsReader } from "../settings/types.js";
import { FailureCode, type PoolError, ValidationError } from "../shared/errors.js";
import type { Address } from "../shared/identifiers.js";
import { type Result, all, err, ok } from "../shared/result.js";
import type { WithdrawalReceipt, WithdrawalRequest } from "./types.js";

export interface WithdrawalAccountingOptions {
	/** Address of the deposit API; the only accepted sender */
	readonly facade: Address;
	readonly settings: SettingsReader;
	readonly groups: GroupReader;
	readonly minipools: MinipoolRegistry;
	readonly queue: DepositQueue;
	/** Derivative-token ledger credited with the net amount and the fees */
	readonly derivative: BalanceLedger;
	readonly events: EventLog;
	readonly logger?: Logger;
}

export class WithdrawalAccounting {
	private readonly facade: Address;
	private readonly settings: SettingsReader;
	private readonly groups: GroupReader;
	private readonly minipools: MinipoolRegistry;
	private readonly queue: DepositQueue;
	private readonly derivative: BalanceLedger;
	private readonly events: EventLog;
	private readonly logger: Logger;

	constructor(options: WithdrawalAccountingOptions) {
		this.facade = options.facade;
		this.settings = options.settings;
		this.groups = options.groups;
		this.minipools = options.minipools;
		this.queue = options.queue;
		this.derivative = options.derivative;
		this.events = options.events;
		this.logger = options.logger ?? silentLogger();
	}

	withdraw(sender: Address, request: WithdrawalRequest): Result<WithdrawalReceipt, PoolError> {
		const ctx: WithdrawalContext = {
			...request,
			sender,
			facade: this.facade,
			settings: this.settings,
			groups: this.groups,
			minipools: this.minipools,
			deposits: this.queue,
		};
		const checked = withdrawalGuards.evaluate(ctx);
		if (!checked.ok) {
			this.logger.debug(
				{ depositId: request.depositId, minipool: request.minipool, code: checked.error.code },
				"Withdrawal rejected",
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
		const feeAddress = this.groups.feeAddress(request.groupId);
		if (feeAddress === null) {
			return err(
				new ValidationError(FailureCode.InvalidGroup, "Group has no fee address", {
					groupId: request.groupId,
				}),
			);
		}

		const fees = splitFees(
			request.amount,
			this.groups.feePerc(request.groupId),
			this.groups.protocolFeePerc(request.groupId),
		);

		// ── Mutations ───────────────────────────────────────────────

		const released = minipool.release(request.userId, request.groupId, request.amount);
		if (!released.ok) return released;
		const record = this.queue.releaseFromMinipool(
			request.depositId,
			request.minipool,
			request.amount,
			"withdrawn",
		);
		if (!record.ok) return record;

		const credited = all([
			this.derivative.credit(request.withdrawer, fees.net),
			this.derivative.credit(feeAddress, fees.groupFee),
			this.derivative.credit(this.settings.protocolFeeAddress(), fees.protocolFee),
		]);
		if (!credited.ok) return credited;

		this.events.append({
			type: "deposit_withdraw",
			to: request.withdrawer,
			userId: request.userId,
			groupId: request.groupId,
			depositId: request.depositId,
			minipool: request.minipool,
			value: request.amount,
			net: fees.net,
			groupFee: fees.groupFee,
			protocolFee: fees.protocolFee,
		});

		const remaining = record.value?.stakingPools.get(request.minipool) ?? 0n;
		this.logger.info(
			{
				depositId: request.depositId,
				minipool: request.minipool,
				kind: request.kind,
				amount: request.amount,
				net: fees.net,
				remaining,
			},
			"Withdrawal settled",
		);

		return ok({
			depositId: request.depositId,
			minipool: request.minipool,
			withdrawer: request.withdrawer,
			amount: request.amount,
			net: fees.net,
			groupFee: fees.groupFee,
			protocolFee: fees.protocolFee,
			remaining,
		});
	}
}
