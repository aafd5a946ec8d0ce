/**
 * DepositApi — the single validated entry point of the pool.
 *
 * Deposits are checked here in full before anything is queued. Refunds and
 * withdrawals get their user and group checked here, then go to accounting
 * with this API's own address as sender; accounting rejects any other
 * sender, which makes this class the authorization boundary.
 */

import type { DepositQueue } from "../deposit/deposit-queue.js";
import type { MatchingEngine } from "../deposit/matching-engine.js";
import type { DepositRecord } from "../deposit/types.js";
import type { EventLog } from "../events/event-log.js";
import type { GroupReader } from "../group/types.js";
import { groupExists, userNotNull } from "../guards/common-guards.js";
import { type DepositContext, depositGuards } from "../guards/deposit-guards.js";
import { GuardChain } from "../guards/guard-chain.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { SettingsReader } from "../settings/types.js";
import type { Wei } from "../shared/amount.js";
import type { PoolError } from "../shared/errors.js";
import type { Address, DepositId } from "../shared/identifiers.js";
import { type Result, ok } from "../shared/result.js";
import type { RefundAccounting } from "../withdrawal/refund-accounting.js";
import type { RefundReceipt, WithdrawalReceipt } from "../withdrawal/types.js";
import type { WithdrawalAccounting } from "../withdrawal/withdrawal-accounting.js";
import type {
	DepositOutcome,
	DepositParams,
	ExitedWithdrawalParams,
	QueuedRefundParams,
	StakingWithdrawalParams,
	StalledRefundParams,
} from "./types.js";

interface UserGroupContext {
	readonly groups: GroupReader;
	readonly userId: Address;
	readonly groupId: Address;
}

const userGroupGuards = GuardChain.create<UserGroupContext>()
	.with(userNotNull<UserGroupContext>())
	.with(groupExists<UserGroupContext>());

export interface DepositApiOptions {
	/** Identity this API presents to accounting */
	readonly address: Address;
	readonly settings: SettingsReader;
	readonly groups: GroupReader;
	readonly queue: DepositQueue;
	readonly matching: MatchingEngine;
	readonly withdrawals: WithdrawalAccounting;
	readonly refunds: RefundAccounting;
	readonly events: EventLog;
	readonly logger?: Logger;
}

export class DepositApi {
	readonly address: Address;
	private readonly settings: SettingsReader;
	private readonly groups: GroupReader;
	private readonly queue: DepositQueue;
	private readonly matching: MatchingEngine;
	private readonly withdrawals: WithdrawalAccounting;
	private readonly refunds: RefundAccounting;
	private readonly events: EventLog;
	private readonly logger: Logger;

	constructor(options: DepositApiOptions) {
		this.address = options.address;
		this.settings = options.settings;
		this.groups = options.groups;
		this.queue = options.queue;
		this.matching = options.matching;
		this.withdrawals = options.withdrawals;
		this.refunds = options.refunds;
		this.events = options.events;
		this.logger = options.logger ?? silentLogger();
	}

	// ── Deposits ───────────────────────────────────────────────────

	/**
	 * Queues `value` for the user and runs one matching pass for its duration.
	 *
	 * @param sender - Caller; must be an authorized depositor of the group
	 * @returns The queued record as it stood before matching, plus the chunks moved
	 *
	 * @example
	 * ```ts
	 * const result = api.deposit(accessor, { groupId, userId, durationId: "3m" }, ether("4"));
	 * if (result.ok) console.log(result.value.deposit.id);
	 * ```
	 */
	deposit(sender: Address, params: DepositParams, value: Wei): Result<DepositOutcome, PoolError> {
		const ctx: DepositContext = {
			settings: this.settings,
			groups: this.groups,
			sender,
			userId: params.userId,
			groupId: params.groupId,
			durationId: params.durationId,
			value,
		};
		const checked = depositGuards.evaluate(ctx);
		if (!checked.ok) {
			this.logger.debug(
				{ sender, groupId: params.groupId, code: checked.error.code },
				"Deposit rejected",
			);
			return checked;
		}

		const queued = this.queue.enqueue(params.userId, params.groupId, params.durationId, value);
		if (!queued.ok) return queued;
		const deposit = queued.value;

		this.events.append({
			type: "deposit",
			from: sender,
			userId: deposit.userId,
			groupId: deposit.groupId,
			durationId: deposit.durationId,
			depositId: deposit.id,
			value,
		});
		const assignments = this.matching.assignChunks(deposit.durationId);

		return ok({ deposit, assignments });
	}

	// ── Refunds ────────────────────────────────────────────────────

	/** Returns what is still queued of a deposit to the calling depositor. */
	refundQueued(sender: Address, params: QueuedRefundParams): Result<RefundReceipt, PoolError> {
		const checked = this.checkUserGroup(params.userId, params.groupId);
		if (!checked.ok) return checked;
		return this.refunds.refundQueued(this.address, { ...params, depositor: sender });
	}

	/** Returns a deposit's value held at a timed-out minipool to the calling depositor. */
	refundStalled(sender: Address, params: StalledRefundParams): Result<RefundReceipt, PoolError> {
		const checked = this.checkUserGroup(params.userId, params.groupId);
		if (!checked.ok) return checked;
		return this.refunds.refundStalled(this.address, { ...params, depositor: sender });
	}

	// ── Withdrawals ────────────────────────────────────────────────

	/** Partial or full withdrawal from a Staking minipool; the caller is credited. */
	withdrawStaking(
		sender: Address,
		params: StakingWithdrawalParams,
	): Result<WithdrawalReceipt, PoolError> {
		const checked = this.checkUserGroup(params.userId, params.groupId);
		if (!checked.ok) return checked;
		return this.withdrawals.withdraw(this.address, {
			...params,
			withdrawer: sender,
			kind: "staking",
		});
	}

	/** Withdraws everything the deposit holds at an exited minipool. */
	withdrawExited(
		sender: Address,
		params: ExitedWithdrawalParams,
	): Result<WithdrawalReceipt, PoolError> {
		const checked = this.checkUserGroup(params.userId, params.groupId);
		if (!checked.ok) return checked;
		return this.withdrawals.withdraw(this.address, {
			...params,
			amount: this.queue.amountAt(params.depositId, params.minipool),
			withdrawer: sender,
			kind: "exited",
		});
	}

	// ── Queries ────────────────────────────────────────────────────

	getUserQueuedDepositCount(groupId: Address, userId: Address, durationId: string): number {
		return this.queue.count(userId, groupId, durationId);
	}

	getUserQueuedDepositAt(
		groupId: Address,
		userId: Address,
		durationId: string,
		index: number,
	): DepositRecord | null {
		return this.queue.dequeueAt(userId, groupId, durationId, index);
	}

	getDeposit(id: DepositId): DepositRecord | null {
		return this.queue.get(id);
	}

	private checkUserGroup(userId: Address, groupId: Address): Result<void, PoolError> {
		return userGroupGuards.evaluate({ groups: this.groups, userId, groupId });
	}
}
