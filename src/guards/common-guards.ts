/**
 * Guards shared by the deposit, refund and withdrawal chains. Each is
 * generic over the slice of context it reads.
 */

import type { GroupReader } from "../group/types.js";
import type { DepositReader } from "../deposit/types.js";
import { FailureCode, ValidationError } from "../shared/errors.js";
import { type Address, type DepositId, isZeroAddress } from "../shared/identifiers.js";
import { type Guard, allow, block } from "./types.js";

interface HasUser {
	readonly userId: Address;
}

interface HasGroup {
	readonly groups: GroupReader;
	readonly groupId: Address;
}

interface HasCaller {
	readonly sender: Address;
	readonly facade: Address;
}

interface HasDepositAtMinipool {
	readonly deposits: DepositReader;
	readonly depositId: DepositId;
	readonly userId: Address;
	readonly groupId: Address;
	readonly minipool: Address;
}

/** Only the façade may call into accounting directly. */
export function callerIsFacade<C extends HasCaller>(): Guard<C> {
	return {
		name: "CallerIsFacade",
		check: (ctx) =>
			ctx.sender === ctx.facade
				? allow()
				: block(
						"CallerIsFacade",
						new ValidationError(
							FailureCode.UnauthorizedCaller,
							"Caller is not the deposit API",
							{ sender: ctx.sender },
						),
					),
	};
}

export function userNotNull<C extends HasUser>(): Guard<C> {
	return {
		name: "UserNotNull",
		check: (ctx) =>
			isZeroAddress(ctx.userId)
				? block("UserNotNull", new ValidationError(FailureCode.InvalidUser, "User ID is null"))
				: allow(),
	};
}

export function groupExists<C extends HasGroup>(): Guard<C> {
	return {
		name: "GroupExists",
		check: (ctx) =>
			ctx.groups.groupExists(ctx.groupId)
				? allow()
				: block(
						"GroupExists",
						new ValidationError(FailureCode.InvalidGroup, "Group does not exist", {
							groupId: ctx.groupId,
						}),
					),
	};
}

/** `who` picks the address that must be an authorized depositor of the group. */
export function depositorAuthorized<C extends HasGroup>(who: (ctx: C) => Address): Guard<C> {
	return {
		name: "DepositorAuthorized",
		check: (ctx) =>
			ctx.groups.isAuthorizedDepositor(ctx.groupId, who(ctx))
				? allow()
				: block(
						"DepositorAuthorized",
						new ValidationError(
							FailureCode.UnauthorizedDepositor,
							"Caller is not an authorized depositor for the group",
							{ groupId: ctx.groupId, depositor: who(ctx) },
						),
					),
	};
}

/**
 * The deposit exists, belongs to (user, group), and has value at the
 * minipool. Unknown, drained, foreign and misplaced deposits all fail here.
 */
export function depositHeldAtMinipool<C extends HasDepositAtMinipool>(): Guard<C> {
	return {
		name: "DepositHeldAtMinipool",
		check: (ctx) => {
			const record = ctx.deposits.get(ctx.depositId);
			const held =
				record !== null &&
				record.userId === ctx.userId &&
				record.groupId === ctx.groupId &&
				ctx.deposits.amountAt(ctx.depositId, ctx.minipool) > 0n;
			return held
				? allow()
				: block(
						"DepositHeldAtMinipool",
						new ValidationError(
							FailureCode.InvalidDepositId,
							"Deposit ID does not resolve to value held at this minipool",
							{ depositId: ctx.depositId, minipool: ctx.minipool },
						),
					);
		},
	};
}
