/**
 * Group types — integrators whose users deposit and withdraw through
 * authorized depositor and withdrawer contracts.
 */

import type { Percentage } from "../shared/amount.js";
import type { Address } from "../shared/identifiers.js";

export interface Group {
	readonly id: Address;
	readonly name: string;
	readonly owner: Address;
	/** Fee the group takes from each withdrawal */
	readonly feePerc: Percentage;
	/** Receives the group fee */
	readonly feeAddress: Address;
	readonly depositors: readonly Address[];
	readonly withdrawers: readonly Address[];
}

export interface CreateGroupParams {
	readonly owner: string;
	readonly name: string;
	readonly feePerc: bigint | number | string;
	/** Defaults to the owner */
	readonly feeAddress?: string;
}

/** Read side of the group layer, as consumed by guards and accounting. */
export interface GroupReader {
	groupExists(groupId: Address): boolean;
	isAuthorizedDepositor(groupId: Address, caller: Address): boolean;
	isAuthorizedWithdrawer(groupId: Address, caller: Address): boolean;
	/** Zero for an unknown group. */
	feePerc(groupId: Address): Percentage;
	protocolFeePerc(groupId: Address): Percentage;
	/** The group's fee address, or null for an unknown group. */
	feeAddress(groupId: Address): Address | null;
}
