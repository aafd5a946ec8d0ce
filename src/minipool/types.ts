/**
 * Minipool types — lifecycle status, transitions and the read interface
 * the accounting core consumes.
 *
 * Status only ever changes through an explicit external transition; the
 * accounting core reads it and gates withdrawals and refunds on it.
 */

import type { Wei } from "../shared/amount.js";
import type { Address, DepositId, DurationId } from "../shared/identifiers.js";

// ── Status ───────────────────────────────────────────────────────────

export const MinipoolStatus = {
	/** Accepting user deposits; no withdrawals */
	PreLaunch: "prelaunch",
	/** Validator running; partial withdrawals permitted */
	Staking: "staking",
	/** Validator exited; remaining entries withdrawable in full, once */
	Exited: "exited",
	/** Final balance confirmed; same withdrawal rules as Exited */
	Withdrawn: "withdrawn",
	/** Stalled before launch; deposits refundable */
	TimedOut: "timed_out",
	/** Terminal; reachable from any other status once the ledger is empty */
	Closed: "closed",
} as const;

export type MinipoolStatus = (typeof MinipoolStatus)[keyof typeof MinipoolStatus];

// ── Transitions ──────────────────────────────────────────────────────

export type MinipoolTransition =
	| { readonly type: "launch" }
	| { readonly type: "exit" }
	| { readonly type: "withdraw" }
	| { readonly type: "time_out" }
	| { readonly type: "close" };

export type MinipoolTransitionType = MinipoolTransition["type"];

export interface TransitionEntry {
	readonly from: MinipoolStatus;
	readonly to: MinipoolStatus;
	readonly transition: MinipoolTransitionType;
	readonly timestamp: number;
}

/** Staking withdrawals may be partial; exited withdrawals take the whole entry. */
export type WithdrawalKind = "staking" | "exited";

// ── Ledger ───────────────────────────────────────────────────────────

/** One (user, group) claim held in a minipool. */
export interface LedgerEntry {
	readonly userId: Address;
	readonly groupId: Address;
	readonly amount: Wei;
}

/** A part of one deposit credited to a minipool. */
export interface DepositPortion {
	readonly depositId: DepositId;
	readonly userId: Address;
	readonly groupId: Address;
	readonly amount: Wei;
}

export interface MinipoolSnapshot {
	readonly address: Address;
	readonly nodeOperator: Address;
	readonly durationId: DurationId;
	readonly createdAt: number;
	readonly status: MinipoolStatus;
	readonly capacity: Wei;
	readonly totalDeposited: Wei;
	readonly ledgerTotal: Wei;
	readonly entries: readonly LedgerEntry[];
}

// ── Collaborator interfaces ──────────────────────────────────────────

/** Read side of the minipool set, as consumed by guards and accounting. */
export interface MinipoolReader {
	/** Null when no minipool exists at `minipool`. */
	status(minipool: Address): MinipoolStatus | null;
	userLedgerEntry(minipool: Address, userId: Address, groupId: Address): Wei;
	capacityRemaining(minipool: Address): Wei;
}

/** Source of fresh minipools when no PreLaunch minipool has room. */
export interface MinipoolProvisioner {
	/** Creates a minipool for `durationId`, or returns null when no node capacity is available. */
	provision(durationId: DurationId): MinipoolHandle | null;
}

/** Minimal view of a created minipool returned by a provisioner. */
export interface MinipoolHandle {
	readonly address: Address;
	readonly durationId: DurationId;
}
