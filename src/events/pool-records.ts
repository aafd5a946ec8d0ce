/**
 * Pool records — the append-only log of committed state changes.
 *
 * Every mutating operation appends one or more records after its effects
 * are applied. `sequence` is gap-free and strictly increasing; `timestamp`
 * is in whole seconds.
 */

import type { MinipoolStatus } from "../minipool/types.js";
import type { Wei } from "../shared/amount.js";
import type { Address, DepositId, DurationId } from "../shared/identifiers.js";

export type PoolRecord =
	| DepositRecorded
	| DepositRefunded
	| DepositWithdrawn
	| DepositAssigned
	| MinipoolStatusChanged;

export type PoolRecordType = PoolRecord["type"];

interface RecordBase {
	readonly sequence: number;
	readonly timestamp: number;
}

/** A deposit accepted into the queue. `from` is the depositor contract that sent it. */
export interface DepositRecorded extends RecordBase {
	readonly type: "deposit";
	readonly from: Address;
	readonly userId: Address;
	readonly groupId: Address;
	readonly durationId: DurationId;
	readonly depositId: DepositId;
	readonly value: Wei;
}

/** Value returned to a depositor; `minipool` is null for a queued refund. */
export interface DepositRefunded extends RecordBase {
	readonly type: "deposit_refund";
	readonly to: Address;
	readonly userId: Address;
	readonly groupId: Address;
	readonly depositId: DepositId;
	readonly minipool: Address | null;
	readonly value: Wei;
}

/** A withdrawal from a minipool; `value` is gross, credited as net plus fees. */
export interface DepositWithdrawn extends RecordBase {
	readonly type: "deposit_withdraw";
	readonly to: Address;
	readonly userId: Address;
	readonly groupId: Address;
	readonly depositId: DepositId;
	readonly minipool: Address;
	readonly value: Wei;
	readonly net: Wei;
	readonly groupFee: Wei;
	readonly protocolFee: Wei;
}

/** Part of a deposit moved from the queue into a minipool. */
export interface DepositAssigned extends RecordBase {
	readonly type: "deposit_assign";
	readonly userId: Address;
	readonly groupId: Address;
	readonly depositId: DepositId;
	readonly minipool: Address;
	readonly value: Wei;
}

export interface MinipoolStatusChanged extends RecordBase {
	readonly type: "minipool_status_changed";
	readonly minipool: Address;
	readonly from: MinipoolStatus;
	readonly to: MinipoolStatus;
}

type DraftOf<R> = R extends PoolRecord ? Omit<R, "sequence" | "timestamp"> : never;

/** A record before the log stamps its sequence and timestamp. */
export type RecordDraft = DraftOf<PoolRecord>;

/** Narrowed record type for a given discriminant. */
export type RecordOf<T extends PoolRecordType> = Extract<PoolRecord, { readonly type: T }>;
