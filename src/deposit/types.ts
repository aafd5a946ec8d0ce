/**
 * Deposit types — the tracked record of one user deposit.
 *
 * A deposit is created whole in the queue, moved to minipools in parts by
 * the matching engine, and leaves the system by withdrawal or refund.
 * Invariant: queued + staking + refunded + withdrawn = total, and staking
 * equals the sum of stakingPools.
 */

import type { DepositPortion } from "../minipool/types.js";
import type { Wei } from "../shared/amount.js";
import type { Address, DepositId, DurationId } from "../shared/identifiers.js";

export interface DepositRecord {
	readonly id: DepositId;
	readonly userId: Address;
	readonly groupId: Address;
	readonly durationId: DurationId;
	/** Global deposit nonce the id was derived from */
	readonly sequence: bigint;
	/** Seconds since the epoch */
	readonly createdAt: number;
	readonly totalAmount: Wei;
	readonly queuedAmount: Wei;
	readonly stakingAmount: Wei;
	readonly refundedAmount: Wei;
	readonly withdrawnAmount: Wei;
	/** Minipool → amount assigned and not yet withdrawn or refunded */
	readonly stakingPools: ReadonlyMap<Address, Wei>;
}

/** One chunk moved from the queue into a minipool by a matching run. */
export interface ChunkAssignment {
	readonly minipool: Address;
	readonly durationId: DurationId;
	readonly amount: Wei;
	readonly portions: readonly DepositPortion[];
}

/** Why value left a minipool for a deposit. */
export type ReleaseReason = "withdrawn" | "refunded";

/** Read side of the deposit queue, as consumed by guards. */
export interface DepositReader {
	get(id: DepositId): DepositRecord | null;
	/** Amount of deposit `id` held at `minipool`; zero when unknown. */
	amountAt(id: DepositId, minipool: Address): Wei;
}
