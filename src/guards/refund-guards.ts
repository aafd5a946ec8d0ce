/**
 * Preconditions of the two refund paths.
 *
 * Queued:  caller, refunds enabled, deposit has queued value, depositor authorized.
 * Stalled: caller, stalled refunds enabled, deposit held at the minipool,
 *          minipool timed out, depositor authorized.
 */

import type { DepositReader } from "../deposit/types.js";
import type { GroupReader } from "../group/types.js";
import { permitsStalledRefund } from "../minipool/state-machine.js";
import type { MinipoolReader } from "../minipool/types.js";
import type { SettingsReader } from "../settings/types.js";
import {
	DisabledFeatureError,
	FailureCode,
	StateError,
	ValidationError,
} from "../shared/errors.js";
import type { Address } from "../shared/identifiers.js";
import type { QueuedRefundRequest, StalledRefundRequest } from "../withdrawal/types.js";
import { callerIsFacade, depositHeldAtMinipool, depositorAuthorized } from "./common-guards.js";
import { GuardChain } from "./guard-chain.js";
import { type Guard, allow, block } from "./types.js";

interface RefundCollaborators {
	readonly sender: Address;
	readonly facade: Address;
	readonly settings: SettingsReader;
	readonly groups: GroupReader;
	readonly deposits: DepositReader;
}

export type QueuedRefundContext = QueuedRefundRequest & RefundCollaborators;

export interface StalledRefundContext extends StalledRefundRequest, RefundCollaborators {
	readonly minipools: MinipoolReader;
}

const refundsEnabled: Guard<QueuedRefundContext> = {
	name: "RefundsEnabled",
	check: (ctx) =>
		ctx.settings.isRefundAllowed()
			? allow()
			: block(
					"RefundsEnabled",
					new DisabledFeatureError(FailureCode.RefundsDisabled, "Refunds are disabled"),
				),
};

const stalledRefundsEnabled: Guard<StalledRefundContext> = {
	name: "StalledRefundsEnabled",
	check: (ctx) =>
		ctx.settings.isStalledRefundAllowed()
			? allow()
			: block(
					"StalledRefundsEnabled",
					new DisabledFeatureError(FailureCode.RefundsDisabled, "Stalled refunds are disabled"),
				),
};

const depositHasQueuedValue: Guard<QueuedRefundContext> = {
	name: "DepositHasQueuedValue",
	check: (ctx) => {
		const record = ctx.deposits.get(ctx.depositId);
		const queued =
			record !== null &&
			record.userId === ctx.userId &&
			record.groupId === ctx.groupId &&
			record.durationId === ctx.durationId &&
			record.queuedAmount > 0n;
		return queued
			? allow()
			: block(
					"DepositHasQueuedValue",
					new ValidationError(
						FailureCode.InvalidDepositId,
						"Deposit ID does not resolve to queued value",
						{ depositId: ctx.depositId },
					),
				);
	},
};

/** The stalled refund names a duration too; it must match the deposit's. */
const durationMatches: Guard<StalledRefundContext> = {
	name: "DurationMatches",
	check: (ctx) =>
		ctx.deposits.get(ctx.depositId)?.durationId === ctx.durationId
			? allow()
			: block(
					"DurationMatches",
					new ValidationError(
						FailureCode.InvalidDepositId,
						"Deposit ID does not resolve for this duration",
						{ depositId: ctx.depositId, durationId: ctx.durationId },
					),
				),
};

const minipoolTimedOut: Guard<StalledRefundContext> = {
	name: "MinipoolTimedOut",
	check: (ctx) => {
		const status = ctx.minipools.status(ctx.minipool);
		if (status !== null && permitsStalledRefund(status)) return allow();
		return block(
			"MinipoolTimedOut",
			new StateError(
				FailureCode.InvalidMinipoolStatus,
				`Minipool status ${status ?? "unknown"} does not permit a stalled refund`,
				{ minipool: ctx.minipool, status },
			),
		);
	},
};

export const queuedRefundGuards: GuardChain<QueuedRefundContext> =
	GuardChain.create<QueuedRefundContext>()
		.with(callerIsFacade<QueuedRefundContext>())
		.with(refundsEnabled)
		.with(depositHasQueuedValue)
		.with(depositorAuthorized<QueuedRefundContext>((ctx) => ctx.depositor));

export const stalledRefundGuards: GuardChain<StalledRefundContext> =
	GuardChain.create<StalledRefundContext>()
		.with(callerIsFacade<StalledRefundContext>())
		.with(stalledRefundsEnabled)
		.with(depositHeldAtMinipool<StalledRefundContext>())
		.with(durationMatches)
		.with(minipoolTimedOut)
		.with(depositorAuthorized<StalledRefundContext>((ctx) => ctx.depositor));
