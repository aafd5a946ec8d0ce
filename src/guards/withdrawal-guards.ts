/**
 * Preconditions of a withdrawal, in reporting order:
 * 0. caller is the façade            → UNAUTHORIZED_CALLER
 * 1. withdrawals enabled             → WITHDRAWALS_DISABLED
 * 2. deposit held at the minipool    → INVALID_DEPOSIT_ID
 * 3. amount within the remaining     → INVALID_AMOUNT / INSUFFICIENT_FUNDS
 * 4. status permits the kind         → INVALID_MINIPOOL_STATUS
 * 5. withdrawer authorized           → UNAUTHORIZED_WITHDRAWER
 * 6. fees settle                     → INVALID_FEE / INVALID_GROUP
 */

import { checkFeeRates } from "../accounting/fee-split.js";
import type { DepositReader } from "../deposit/types.js";
import type { GroupReader } from "../group/types.js";
import { permitsWithdrawal } from "../minipool/state-machine.js";
import type { MinipoolReader } from "../minipool/types.js";
import type { SettingsReader } from "../settings/types.js";
import { minWei } from "../shared/amount.js";
import {
	DisabledFeatureError,
	FailureCode,
	InsufficientFundsError,
	StateError,
	ValidationError,
} from "../shared/errors.js";
import type { Address } from "../shared/identifiers.js";
import type { WithdrawalRequest } from "../withdrawal/types.js";
import { callerIsFacade, depositHeldAtMinipool } from "./common-guards.js";
import { GuardChain } from "./guard-chain.js";
import { type Guard, allow, block } from "./types.js";

export interface WithdrawalContext extends WithdrawalRequest {
	readonly sender: Address;
	readonly facade: Address;
	readonly settings: SettingsReader;
	readonly groups: GroupReader;
	readonly minipools: MinipoolReader;
	readonly deposits: DepositReader;
}

/** What the deposit can still withdraw at the minipool. */
export function remainingAt(ctx: WithdrawalContext): bigint {
	return minWei(
		ctx.deposits.amountAt(ctx.depositId, ctx.minipool),
		ctx.minipools.userLedgerEntry(ctx.minipool, ctx.userId, ctx.groupId),
	);
}

const withdrawalsEnabled: Guard<WithdrawalContext> = {
	name: "WithdrawalsEnabled",
	check: (ctx) =>
		ctx.settings.isWithdrawalAllowed()
			? allow()
			: block(
					"WithdrawalsEnabled",
					new DisabledFeatureError(FailureCode.WithdrawalsDisabled, "Withdrawals are disabled"),
				),
};

const amountWithinRemaining: Guard<WithdrawalContext> = {
	name: "AmountWithinRemaining",
	check: (ctx) => {
		if (ctx.amount <= 0n) {
			return block(
				"AmountWithinRemaining",
				new ValidationError(FailureCode.InvalidAmount, "Withdrawal amount must be positive", {
					amount: ctx.amount,
				}),
			);
		}
		const remaining = remainingAt(ctx);
		if (ctx.amount > remaining) {
			return block(
				"AmountWithinRemaining",
				new InsufficientFundsError(
					"Amount exceeds the remaining ledger entry",
					ctx.amount,
					remaining,
					{ depositId: ctx.depositId, minipool: ctx.minipool },
				),
			);
		}
		if (ctx.kind === "exited" && ctx.amount !== remaining) {
			return block(
				"AmountWithinRemaining",
				new ValidationError(
					FailureCode.InvalidAmount,
					"Exited minipools are withdrawn in full",
					{ amount: ctx.amount, remaining },
				),
			);
		}
		return allow();
	},
};

const statusPermitsKind: Guard<WithdrawalContext> = {
	name: "StatusPermitsKind",
	check: (ctx) => {
		const status = ctx.minipools.status(ctx.minipool);
		if (status !== null && permitsWithdrawal(status, ctx.kind)) return allow();
		return block(
			"StatusPermitsKind",
			new StateError(
				FailureCode.InvalidMinipoolStatus,
				`Minipool status ${status ?? "unknown"} does not permit a ${ctx.kind} withdrawal`,
				{ minipool: ctx.minipool, status, kind: ctx.kind },
			),
		);
	},
};

const withdrawerAuthorized: Guard<WithdrawalContext> = {
	name: "WithdrawerAuthorized",
	check: (ctx) =>
		ctx.groups.isAuthorizedWithdrawer(ctx.groupId, ctx.withdrawer)
			? allow()
			: block(
					"WithdrawerAuthorized",
					new ValidationError(
						FailureCode.UnauthorizedWithdrawer,
						"Caller is not an authorized withdrawer for the group",
						{ groupId: ctx.groupId, withdrawer: ctx.withdrawer },
					),
				),
};

/** The group and protocol rates leave a non-negative net, and the group fee has a recipient. */
const feesSettle: Guard<WithdrawalContext> = {
	name: "FeesSettle",
	check: (ctx) => {
		const rates = checkFeeRates(
			ctx.groups.feePerc(ctx.groupId),
			ctx.groups.protocolFeePerc(ctx.groupId),
		);
		if (!rates.ok) return block("FeesSettle", rates.error);
		if (ctx.groups.feeAddress(ctx.groupId) === null) {
			return block(
				"FeesSettle",
				new ValidationError(FailureCode.InvalidGroup, "Group has no fee address", {
					groupId: ctx.groupId,
				}),
			);
		}
		return allow();
	},
};

export const withdrawalGuards: GuardChain<WithdrawalContext> =
	GuardChain.create<WithdrawalContext>()
		.with(callerIsFacade<WithdrawalContext>())
		.with(withdrawalsEnabled)
		.with(depositHeldAtMinipool<WithdrawalContext>())
		.with(amountWithinRemaining)
		.with(statusPermitsKind)
		.with(withdrawerAuthorized)
		.with(feesSettle);
