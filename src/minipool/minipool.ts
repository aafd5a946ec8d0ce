/**
 * Minipool — one staking unit: lifecycle status plus the per-(user, group)
 * ledger of value it holds in custody.
 *
 * Invariant: Σ ledger ≤ totalDeposited ≤ capacity. totalDeposited only
 * grows; releases reduce the ledger and leave it untouched.
 */

import { type Wei, sumWei } from "../shared/amount.js";
import {
	FailureCode,
	InsufficientFundsError,
	type PoolError,
	StateError,
	ValidationError,
} from "../shared/errors.js";
import type { Address, DurationId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock, unixSeconds } from "../shared/time.js";
import { MinipoolStateMachine, acceptsDeposits } from "./state-machine.js";
import type {
	DepositPortion,
	LedgerEntry,
	MinipoolSnapshot,
	MinipoolStatus,
	MinipoolTransition,
	TransitionEntry,
} from "./types.js";

export interface MinipoolParams {
	readonly address: Address;
	readonly nodeOperator: Address;
	readonly durationId: DurationId;
	readonly capacity: Wei;
	readonly clock?: Clock;
}

function entryKey(userId: Address, groupId: Address): string {
	return `${userId}:${groupId}`;
}

export class Minipool {
	readonly address: Address;
	readonly nodeOperator: Address;
	readonly durationId: DurationId;
	readonly capacity: Wei;
	readonly createdAt: number;
	private readonly machine: MinipoolStateMachine;
	private readonly ledger: Map<string, LedgerEntry>;
	private deposited: Wei;

	constructor(params: MinipoolParams) {
		const clock = params.clock ?? SystemClock;
		this.address = params.address;
		this.nodeOperator = params.nodeOperator;
		this.durationId = params.durationId;
		this.capacity = params.capacity;
		this.createdAt = unixSeconds(clock);
		this.machine = new MinipoolStateMachine(clock);
		this.ledger = new Map();
		this.deposited = 0n;
	}

	// ── Queries ────────────────────────────────────────────────────

	status(): MinipoolStatus {
		return this.machine.status();
	}

	totalDeposited(): Wei {
		return this.deposited;
	}

	capacityRemaining(): Wei {
		return acceptsDeposits(this.status()) ? this.capacity - this.deposited : 0n;
	}

	ledgerEntry(userId: Address, groupId: Address): Wei {
		return this.ledger.get(entryKey(userId, groupId))?.amount ?? 0n;
	}

	ledgerTotal(): Wei {
		return sumWei([...this.ledger.values()].map((e) => e.amount));
	}

	entries(): readonly LedgerEntry[] {
		return [...this.ledger.values()];
	}

	history(): readonly TransitionEntry[] {
		return this.machine.history();
	}

	snapshot(): MinipoolSnapshot {
		return {
			address: this.address,
			nodeOperator: this.nodeOperator,
			durationId: this.durationId,
			createdAt: this.createdAt,
			status: this.status(),
			capacity: this.capacity,
			totalDeposited: this.deposited,
			ledgerTotal: this.ledgerTotal(),
			entries: this.entries(),
		};
	}

	// ── Ledger ─────────────────────────────────────────────────────

	/**
	 * Credits every portion to its (user, group) entry. Checks status and
	 * capacity for the whole batch first; on failure nothing is credited.
	 */
	acceptPortions(portions: readonly DepositPortion[]): Result<Wei, PoolError> {
		const status = this.status();
		if (!acceptsDeposits(status)) {
			return err(
				new StateError(
					FailureCode.InvalidMinipoolStatus,
					`Minipool in ${status} does not accept deposits`,
					{ minipool: this.address, status },
				),
			);
		}
		const total = sumWei(portions.map((p) => p.amount));
		if (total <= 0n || portions.some((p) => p.amount <= 0n)) {
			return err(
				new ValidationError(FailureCode.InvalidAmount, "Deposit portions must be positive", {
					minipool: this.address,
				}),
			);
		}
		const remaining = this.capacity - this.deposited;
		if (total > remaining) {
			return err(
				new ValidationError(FailureCode.CapacityExceeded, "Minipool capacity exceeded", {
					minipool: this.address,
					requested: total,
					remaining,
				}),
			);
		}

		for (const p of portions) {
			const key = entryKey(p.userId, p.groupId);
			const current = this.ledger.get(key)?.amount ?? 0n;
			this.ledger.set(key, { userId: p.userId, groupId: p.groupId, amount: current + p.amount });
		}
		this.deposited += total;
		return ok(total);
	}

	/** Reduces a (user, group) entry; the entry is removed at zero. */
	release(userId: Address, groupId: Address, amount: Wei): Result<Wei, PoolError> {
		if (amount <= 0n) {
			return err(
				new ValidationError(FailureCode.InvalidAmount, "Release amount must be positive", {
					minipool: this.address,
					amount,
				}),
			);
		}
		const key = entryKey(userId, groupId);
		const available = this.ledger.get(key)?.amount ?? 0n;
		if (amount > available) {
			return err(
				new InsufficientFundsError("Amount exceeds the minipool ledger entry", amount, available, {
					minipool: this.address,
					userId,
					groupId,
				}),
			);
		}
		const left = available - amount;
		if (left === 0n) {
			this.ledger.delete(key);
		} else {
			this.ledger.set(key, { userId, groupId, amount: left });
		}
		return ok(left);
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	transition(t: MinipoolTransition): Result<MinipoolStatus, StateError> {
		if (t.type === "close" && this.ledger.size > 0) {
			return err(
				new StateError(FailureCode.MinipoolNotEmpty, "Cannot close a minipool that holds deposits", {
					minipool: this.address,
					ledgerTotal: this.ledgerTotal(),
				}),
			);
		}
		return this.machine.transition(t);
	}
}
