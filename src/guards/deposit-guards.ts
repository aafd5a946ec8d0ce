/**
 * Preconditions of a deposit, in reporting order: duration recognized,
 * deposits enabled, value within bounds, user non-null, group exists,
 * sender an authorized depositor.
 */

import type { GroupReader } from "../group/types.js";
import type { SettingsReader } from "../settings/types.js";
import type { Wei } from "../shared/amount.js";
import { DisabledFeatureError, FailureCode, ValidationError } from "../shared/errors.js";
import type { Address } from "../shared/identifiers.js";
import { depositorAuthorized, groupExists, userNotNull } from "./common-guards.js";
import { GuardChain } from "./guard-chain.js";
import { type Guard, allow, block } from "./types.js";

export interface DepositContext {
	readonly settings: SettingsReader;
	readonly groups: GroupReader;
	readonly sender: Address;
	readonly userId: Address;
	readonly groupId: Address;
	readonly durationId: string;
	readonly value: Wei;
}

const durationRecognized: Guard<DepositContext> = {
	name: "DurationRecognized",
	check: (ctx) =>
		ctx.settings.isDurationValid(ctx.durationId)
			? allow()
			: block(
					"DurationRecognized",
					new ValidationError(FailureCode.InvalidDuration, `Unknown duration "${ctx.durationId}"`, {
						durationId: ctx.durationId,
					}),
				),
};

const depositsEnabled: Guard<DepositContext> = {
	name: "DepositsEnabled",
	check: (ctx) =>
		ctx.settings.isDepositAllowed()
			? allow()
			: block(
					"DepositsEnabled",
					new DisabledFeatureError(FailureCode.DepositsDisabled, "Deposits are disabled"),
				),
};

const valueWithinBounds: Guard<DepositContext> = {
	name: "ValueWithinBounds",
	check: (ctx) => {
		if (!ctx.settings.isDurationValid(ctx.durationId)) return allow();
		const min = ctx.settings.minDeposit(ctx.durationId);
		const max = ctx.settings.maxDeposit(ctx.durationId);
		if (ctx.value >= min && ctx.value <= max) return allow();
		return block(
			"ValueWithinBounds",
			new ValidationError(FailureCode.InvalidDeposit, "Deposit amount is out of bounds", {
				value: ctx.value,
				min,
				max,
			}),
		);
	},
};

export const depositGuards: GuardChain<DepositContext> = GuardChain.create<DepositContext>()
	.with(durationRecognized)
	.with(depositsEnabled)
	.with(valueWithinBounds)
	.with(userNotNull<DepositContext>())
	.with(groupExists<DepositContext>())
	.with(depositorAuthorized<DepositContext>((ctx) => ctx.sender));
