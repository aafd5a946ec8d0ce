/**
 * DepositQueue — tracked deposits and the per-duration matching queue.
 *
 * Two indexes over the same records:
 * - per (user, group, duration): every tracked deposit in insertion order,
 *   queried by count/dequeueAt;
 * - per duration: deposits with queued value, oldest first, consumed by
 *   the matching engine.
 * A record is destroyed once nothing of it is queued or staked.
 */

import { deriveDepositId } from "../lib/ethereum/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { DepositPortion } from "../minipool/types.js";
import type { SettingsReader } from "../settings/types.js";
import { type Wei, minWei, sumWei } from "../shared/amount.js";
import {
	DisabledFeatureError,
	FailureCode,
	InsufficientFundsError,
	type PoolError,
	ValidationError,
} from "../shared/errors.js";
import type { Address, DepositId, DurationId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock, unixSeconds } from "../shared/time.js";
import type { DepositReader, DepositRecord, ReleaseReason } from "./types.js";

interface DepositEntry {
	readonly id: DepositId;
	readonly userId: Address;
	readonly groupId: Address;
	readonly durationId: DurationId;
	readonly sequence: bigint;
	readonly createdAt: number;
	readonly totalAmount: Wei;
	queuedAmount: Wei;
	refundedAmount: Wei;
	withdrawnAmount: Wei;
	readonly stakingPools: Map<Address, Wei>;
}

function tripleKey(userId: Address, groupId: Address, durationId: string): string {
	return `${userId}:${groupId}:${durationId}`;
}

function stakingOf(entry: DepositEntry): Wei {
	return sumWei(entry.stakingPools.values());
}

function toRecord(entry: DepositEntry): DepositRecord {
	return {
		id: entry.id,
		userId: entry.userId,
		groupId: entry.groupId,
		durationId: entry.durationId,
		sequence: entry.sequence,
		createdAt: entry.createdAt,
		totalAmount: entry.totalAmount,
		queuedAmount: entry.queuedAmount,
		stakingAmount: stakingOf(entry),
		refundedAmount: entry.refundedAmount,
		withdrawnAmount: entry.withdrawnAmount,
		stakingPools: new Map(entry.stakingPools),
	};
}

export interface DepositQueueOptions {
	readonly settings: SettingsReader;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export class DepositQueue implements DepositReader {
	private readonly deposits: Map<DepositId, DepositEntry>;
	private readonly byUser: Map<string, DepositId[]>;
	private readonly fifo: Map<DurationId, DepositId[]>;
	private readonly settings: SettingsReader;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private nonce: bigint;

	constructor(options: DepositQueueOptions) {
		this.deposits = new Map();
		this.byUser = new Map();
		this.fifo = new Map();
		this.settings = options.settings;
		this.clock = options.clock ?? SystemClock;
		this.logger = options.logger ?? silentLogger();
		this.nonce = 0n;
	}

	// ── Enqueue ────────────────────────────────────────────────────

	/**
	 * Appends a new deposit to both indexes.
	 * Fails with INVALID_DURATION, DEPOSITS_DISABLED or INVALID_DEPOSIT.
	 */
	enqueue(
		userId: Address,
		groupId: Address,
		durationId: string,
		amount: Wei,
	): Result<DepositRecord, PoolError> {
		if (!this.settings.isDurationValid(durationId)) {
			return err(
				new ValidationError(FailureCode.InvalidDuration, `Unknown duration "${durationId}"`, {
					durationId,
				}),
			);
		}
		if (!this.settings.isDepositAllowed()) {
			return err(new DisabledFeatureError(FailureCode.DepositsDisabled, "Deposits are disabled"));
		}
		const min = this.settings.minDeposit(durationId);
		const max = this.settings.maxDeposit(durationId);
		if (amount < min || amount > max) {
			return err(
				new ValidationError(FailureCode.InvalidDeposit, "Deposit amount is out of bounds", {
					amount,
					min,
					max,
					durationId,
				}),
			);
		}

		const sequence = this.nonce;
		this.nonce += 1n;
		const entry: DepositEntry = {
			id: deriveDepositId(userId, groupId, durationId, sequence),
			userId,
			groupId,
			durationId,
			sequence,
			createdAt: unixSeconds(this.clock),
			totalAmount: amount,
			queuedAmount: amount,
			refundedAmount: 0n,
			withdrawnAmount: 0n,
			stakingPools: new Map(),
		};

		this.deposits.set(entry.id, entry);
		this.listFor(this.byUser, tripleKey(userId, groupId, durationId)).push(entry.id);
		this.listFor(this.fifo, durationId).push(entry.id);
		this.logger.info(
			{ depositId: entry.id, userId, groupId, durationId, amount },
			"Deposit queued",
		);
		return ok(toRecord(entry));
	}

	// ── Queries ────────────────────────────────────────────────────

	get(id: DepositId): DepositRecord | null {
		const entry = this.deposits.get(id);
		return entry ? toRecord(entry) : null;
	}

	/** Number of tracked deposits for (user, group, duration). */
	count(userId: Address, groupId: Address, durationId: string): number {
		return this.byUser.get(tripleKey(userId, groupId, durationId))?.length ?? 0;
	}

	/** Read-only positional lookup; nothing is removed. */
	dequeueAt(
		userId: Address,
		groupId: Address,
		durationId: string,
		index: number,
	): DepositRecord | null {
		const id = this.byUser.get(tripleKey(userId, groupId, durationId))?.[index];
		return id === undefined ? null : this.get(id);
	}

	amountAt(id: DepositId, minipool: Address): Wei {
		return this.deposits.get(id)?.stakingPools.get(minipool) ?? 0n;
	}

	/** Value waiting for a minipool in one duration. */
	queuedTotal(durationId: DurationId): Wei {
		const ids = this.fifo.get(durationId) ?? [];
		return sumWei(ids.map((id) => this.deposits.get(id)?.queuedAmount ?? 0n));
	}

	/** Value waiting across all durations. */
	queuedTotalAll(): Wei {
		return sumWei([...this.deposits.values()].map((e) => e.queuedAmount));
	}

	records(): readonly DepositRecord[] {
		return [...this.deposits.values()].map(toRecord);
	}

	// ── Matching support ───────────────────────────────────────────

	/**
	 * The portions that taking `amount` from the head of a duration's queue
	 * would move, oldest deposit first. Read-only.
	 */
	peek(durationId: DurationId, amount: Wei): readonly DepositPortion[] {
		const portions: DepositPortion[] = [];
		let left = amount;
		for (const id of this.fifo.get(durationId) ?? []) {
			if (left === 0n) break;
			const entry = this.deposits.get(id);
			if (!entry || entry.queuedAmount === 0n) continue;
			const take = minWei(entry.queuedAmount, left);
			portions.push({ depositId: id, userId: entry.userId, groupId: entry.groupId, amount: take });
			left -= take;
		}
		return portions;
	}

	/**
	 * Moves portions from queued to staking at `minipool`. Callers pass
	 * portions from peek() after the minipool has accepted them.
	 */
	assignToMinipool(minipool: Address, portions: readonly DepositPortion[]): void {
		for (const p of portions) {
			const entry = this.deposits.get(p.depositId);
			if (!entry) continue;
			entry.queuedAmount -= p.amount;
			entry.stakingPools.set(minipool, (entry.stakingPools.get(minipool) ?? 0n) + p.amount);
			if (entry.queuedAmount === 0n) this.dropFromFifo(entry);
		}
	}

	// ── Ledger support ─────────────────────────────────────────────

	/**
	 * Reduces a deposit's amount at `minipool` after a withdrawal or stalled
	 * refund. Returns the record, or null once the deposit is destroyed.
	 */
	releaseFromMinipool(
		id: DepositId,
		minipool: Address,
		amount: Wei,
		reason: ReleaseReason,
	): Result<DepositRecord | null, PoolError> {
		const entry = this.deposits.get(id);
		if (!entry) {
			return err(new ValidationError(FailureCode.InvalidDepositId, "Unknown deposit", { id }));
		}
		const held = entry.stakingPools.get(minipool) ?? 0n;
		if (amount <= 0n || amount > held) {
			return err(
				new InsufficientFundsError("Amount exceeds the deposit held at the minipool", amount, held, {
					depositId: id,
					minipool,
				}),
			);
		}

		if (amount === held) {
			entry.stakingPools.delete(minipool);
		} else {
			entry.stakingPools.set(minipool, held - amount);
		}
		if (reason === "withdrawn") {
			entry.withdrawnAmount += amount;
		} else {
			entry.refundedAmount += amount;
		}
		return ok(this.destroyIfDrained(entry));
	}

	/** Refunds everything still queued for a deposit. */
	refundQueued(id: DepositId): Result<{ amount: Wei; record: DepositRecord | null }, PoolError> {
		const entry = this.deposits.get(id);
		if (!entry || entry.queuedAmount === 0n) {
			return err(
				new ValidationError(FailureCode.InvalidDepositId, "Deposit has no queued value", { id }),
			);
		}
		const amount = entry.queuedAmount;
		entry.queuedAmount = 0n;
		entry.refundedAmount += amount;
		this.dropFromFifo(entry);
		return ok({ amount, record: this.destroyIfDrained(entry) });
	}

	// ── Internal ───────────────────────────────────────────────────

	private destroyIfDrained(entry: DepositEntry): DepositRecord | null {
		if (entry.queuedAmount > 0n || entry.stakingPools.size > 0) {
			return toRecord(entry);
		}
		this.deposits.delete(entry.id);
		const key = tripleKey(entry.userId, entry.groupId, entry.durationId);
		const remaining = (this.byUser.get(key) ?? []).filter((id) => id !== entry.id);
		if (remaining.length === 0) {
			this.byUser.delete(key);
		} else {
			this.byUser.set(key, remaining);
		}
		this.logger.debug({ depositId: entry.id }, "Deposit drained and removed");
		return null;
	}

	private dropFromFifo(entry: DepositEntry): void {
		const list = this.fifo.get(entry.durationId);
		if (!list) return;
		const idx = list.indexOf(entry.id);
		if (idx !== -1) list.splice(idx, 1);
	}

	private listFor<K>(map: Map<K, DepositId[]>, key: K): DepositId[] {
		const existing = map.get(key);
		if (existing) return existing;
		const created: DepositId[] = [];
		map.set(key, created);
		return created;
	}
}
