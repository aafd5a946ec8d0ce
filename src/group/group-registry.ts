/**
 * GroupRegistry — in-memory group/access layer.
 *
 * Only a group's owner may change its depositor and withdrawer sets or its
 * fee. Once a group has a withdrawer it always keeps at least one.
 */

import { checkFeeRates } from "../accounting/fee-split.js";
import { deriveAddress } from "../lib/ethereum/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { addressSchema, validate, weiSchema, z } from "../lib/validation/index.js";
import type { SettingsReader } from "../settings/types.js";
import type { Percentage } from "../shared/amount.js";
import { FailureCode, type PoolError, StateError, ValidationError } from "../shared/errors.js";
import { type Address, address, isZeroAddress } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { CreateGroupParams, Group, GroupReader } from "./types.js";

interface GroupState {
	readonly id: Address;
	readonly name: string;
	readonly owner: Address;
	feePerc: Percentage;
	feeAddress: Address;
	readonly depositors: Set<Address>;
	readonly withdrawers: Set<Address>;
}

const createGroupSchema = z.object({
	owner: addressSchema,
	name: z.string().trim().min(1).max(64),
	feePerc: weiSchema,
	feeAddress: addressSchema.optional(),
});

export interface GroupRegistryOptions {
	readonly settings: SettingsReader;
	readonly logger?: Logger;
}

export class GroupRegistry implements GroupReader {
	private readonly groups: Map<Address, GroupState>;
	private readonly settings: SettingsReader;
	private readonly logger: Logger;
	private nonce: bigint;

	constructor(options: GroupRegistryOptions) {
		this.groups = new Map();
		this.settings = options.settings;
		this.logger = options.logger ?? silentLogger();
		this.nonce = 0n;
	}

	create(params: CreateGroupParams): Result<Group, ValidationError> {
		const parsed = validate(createGroupSchema, params, "group");
		if (!parsed.ok) return parsed;
		const { name, feePerc } = parsed.value;
		const owner = address(parsed.value.owner);

		const fee = this.checkFee(feePerc);
		if (!fee.ok) return fee;

		const id = deriveAddress(owner, "group", this.nonce);
		this.nonce += 1n;
		const state: GroupState = {
			id,
			name,
			owner,
			feePerc,
			feeAddress:
				parsed.value.feeAddress !== undefined ? address(parsed.value.feeAddress) : owner,
			depositors: new Set(),
			withdrawers: new Set(),
		};
		this.groups.set(id, state);
		this.logger.info({ groupId: id, owner, name, feePerc }, "Group created");
		return ok(toGroup(state));
	}

	get(groupId: Address): Group | null {
		const state = this.groups.get(groupId);
		return state ? toGroup(state) : null;
	}

	// ── Owner operations ───────────────────────────────────────────

	addDepositor(sender: Address, groupId: Address, depositor: Address): Result<void, ValidationError> {
		const group = this.ownedBy(sender, groupId);
		if (!group.ok) return group;
		const checked = checkMember(depositor);
		if (!checked.ok) return checked;
		group.value.depositors.add(depositor);
		this.logger.info({ groupId, depositor }, "Depositor added");
		return ok(undefined);
	}

	removeDepositor(
		sender: Address,
		groupId: Address,
		depositor: Address,
	): Result<void, ValidationError> {
		const group = this.ownedBy(sender, groupId);
		if (!group.ok) return group;
		if (!group.value.depositors.delete(depositor)) {
			return err(
				new ValidationError(FailureCode.InvalidAddress, "Address is not a depositor", {
					groupId,
					depositor,
				}),
			);
		}
		this.logger.info({ groupId, depositor }, "Depositor removed");
		return ok(undefined);
	}

	addWithdrawer(sender: Address, groupId: Address, withdrawer: Address): Result<void, ValidationError> {
		const group = this.ownedBy(sender, groupId);
		if (!group.ok) return group;
		const checked = checkMember(withdrawer);
		if (!checked.ok) return checked;
		group.value.withdrawers.add(withdrawer);
		this.logger.info({ groupId, withdrawer }, "Withdrawer added");
		return ok(undefined);
	}

	/** Fails with LAST_WITHDRAWER rather than leave the set empty. */
	removeWithdrawer(sender: Address, groupId: Address, withdrawer: Address): Result<void, PoolError> {
		const group = this.ownedBy(sender, groupId);
		if (!group.ok) return group;
		const { withdrawers } = group.value;
		if (!withdrawers.has(withdrawer)) {
			return err(
				new ValidationError(FailureCode.InvalidAddress, "Address is not a withdrawer", {
					groupId,
					withdrawer,
				}),
			);
		}
		if (withdrawers.size === 1) {
			return err(
				new StateError(FailureCode.LastWithdrawer, "Cannot remove the last withdrawer", {
					groupId,
					withdrawer,
				}),
			);
		}
		withdrawers.delete(withdrawer);
		this.logger.info({ groupId, withdrawer }, "Withdrawer removed");
		return ok(undefined);
	}

	/** Registers an accessor contract as both depositor and withdrawer. */
	addAccessor(sender: Address, groupId: Address, accessor: Address): Result<void, ValidationError> {
		const group = this.ownedBy(sender, groupId);
		if (!group.ok) return group;
		const checked = checkMember(accessor);
		if (!checked.ok) return checked;
		group.value.depositors.add(accessor);
		group.value.withdrawers.add(accessor);
		this.logger.info({ groupId, accessor }, "Accessor added");
		return ok(undefined);
	}

	setFeePerc(sender: Address, groupId: Address, feePerc: Percentage): Result<void, ValidationError> {
		const group = this.ownedBy(sender, groupId);
		if (!group.ok) return group;
		const fee = this.checkFee(feePerc);
		if (!fee.ok) return fee;
		group.value.feePerc = feePerc;
		this.logger.info({ groupId, feePerc }, "Group fee changed");
		return ok(undefined);
	}

	setFeeAddress(
		sender: Address,
		groupId: Address,
		feeAddress: Address,
	): Result<void, ValidationError> {
		const group = this.ownedBy(sender, groupId);
		if (!group.ok) return group;
		const checked = checkMember(feeAddress);
		if (!checked.ok) return checked;
		group.value.feeAddress = feeAddress;
		return ok(undefined);
	}

	// ── GroupReader ────────────────────────────────────────────────

	groupExists(groupId: Address): boolean {
		return this.groups.has(groupId);
	}

	isAuthorizedDepositor(groupId: Address, caller: Address): boolean {
		return this.groups.get(groupId)?.depositors.has(caller) ?? false;
	}

	isAuthorizedWithdrawer(groupId: Address, caller: Address): boolean {
		return this.groups.get(groupId)?.withdrawers.has(caller) ?? false;
	}

	feePerc(groupId: Address): Percentage {
		return this.groups.get(groupId)?.feePerc ?? 0n;
	}

	protocolFeePerc(_groupId: Address): Percentage {
		return this.settings.protocolFeePerc();
	}

	feeAddress(groupId: Address): Address | null {
		return this.groups.get(groupId)?.feeAddress ?? null;
	}

	// ── Internal ───────────────────────────────────────────────────

	private ownedBy(sender: Address, groupId: Address): Result<GroupState, ValidationError> {
		const group = this.groups.get(groupId);
		if (!group) {
			return err(new ValidationError(FailureCode.InvalidGroup, "Unknown group", { groupId }));
		}
		if (group.owner !== sender) {
			return err(
				new ValidationError(FailureCode.UnauthorizedGroupOwner, "Sender is not the group owner", {
					groupId,
					sender,
				}),
			);
		}
		return ok(group);
	}

	private checkFee(feePerc: Percentage): Result<void, ValidationError> {
		const max = this.settings.maxGroupFeePerc();
		if (feePerc > max) {
			return err(
				new ValidationError(FailureCode.InvalidFee, "Group fee exceeds the maximum", {
					feePerc,
					max,
				}),
			);
		}
		return checkFeeRates(feePerc, this.settings.protocolFeePerc());
	}
}

function checkMember(member: Address): Result<void, ValidationError> {
	if (isZeroAddress(member)) {
		return err(new ValidationError(FailureCode.InvalidAddress, "Address must not be zero"));
	}
	return ok(undefined);
}

function toGroup(state: GroupState): Group {
	return {
		id: state.id,
		name: state.name,
		owner: state.owner,
		feePerc: state.feePerc,
		feeAddress: state.feeAddress,
		depositors: [...state.depositors],
		withdrawers: [...state.withdrawers],
	};
}
