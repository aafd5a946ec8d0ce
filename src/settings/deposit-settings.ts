/**
 * DepositSettings — in-memory settings registry seeded from PoolConfig.
 *
 * Setters validate their input and return a Result; readers are plain
 * getters so guards can call them on every operation.
 */

import { CALC_BASE, type Percentage, type Wei, isPercentage } from "../shared/amount.js";
import { type DepositLimits, type PoolConfig, limitsFor } from "../shared/config.js";
import { FailureCode, ValidationError } from "../shared/errors.js";
import { type Address, type DurationId, durationId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { SettingsReader } from "./types.js";

export class DepositSettings implements SettingsReader {
	private depositsEnabled: boolean;
	private withdrawalsEnabled: boolean;
	private refundsEnabled: boolean;
	private stalledRefundsEnabled: boolean;
	private chunk: Wei;
	private minChunk: Wei;
	private readonly assignMax: number;
	private readonly capacity: Wei;
	private readonly maxGroupFee: Percentage;
	private protocolFee: Percentage;
	private readonly feeAddress: Address;
	private readonly known: readonly DurationId[];
	private readonly limits: Map<DurationId, DepositLimits>;

	constructor(config: PoolConfig) {
		this.depositsEnabled = config.depositsEnabled;
		this.withdrawalsEnabled = config.withdrawalsEnabled;
		this.refundsEnabled = config.refundsEnabled;
		this.stalledRefundsEnabled = config.stalledRefundsEnabled;
		this.chunk = config.chunkSize;
		this.minChunk = config.minChunkSize;
		this.assignMax = config.chunkAssignMax;
		this.capacity = config.minipoolUserCapacity;
		this.maxGroupFee = config.maxGroupFeePerc;
		this.protocolFee = config.protocolFeePerc;
		this.feeAddress = config.protocolFeeAddress;
		this.known = config.durations.map((d) => durationId(d));
		this.limits = new Map(this.known.map((d) => [d, limitsFor(config, d)]));
	}

	// ── Reads ──────────────────────────────────────────────────────

	isDepositAllowed(): boolean {
		return this.depositsEnabled;
	}

	isWithdrawalAllowed(): boolean {
		return this.withdrawalsEnabled;
	}

	isRefundAllowed(): boolean {
		return this.refundsEnabled;
	}

	isStalledRefundAllowed(): boolean {
		return this.stalledRefundsEnabled;
	}

	isDurationValid(duration: string): duration is DurationId {
		return this.known.some((d) => d === duration);
	}

	durations(): readonly DurationId[] {
		return this.known;
	}

	minDeposit(duration: DurationId): Wei {
		return this.limits.get(duration)?.minDeposit ?? 0n;
	}

	maxDeposit(duration: DurationId): Wei {
		return this.limits.get(duration)?.maxDeposit ?? 0n;
	}

	chunkSize(): Wei {
		return this.chunk;
	}

	minChunkSize(): Wei {
		return this.minChunk;
	}

	chunkAssignMax(): number {
		return this.assignMax;
	}

	minipoolUserCapacity(): Wei {
		return this.capacity;
	}

	maxGroupFeePerc(): Percentage {
		return this.maxGroupFee;
	}

	protocolFeePerc(): Percentage {
		return this.protocolFee;
	}

	protocolFeeAddress(): Address {
		return this.feeAddress;
	}

	// ── Operator writes ────────────────────────────────────────────

	setDepositAllowed(allowed: boolean): void {
		this.depositsEnabled = allowed;
	}

	setWithdrawalAllowed(allowed: boolean): void {
		this.withdrawalsEnabled = allowed;
	}

	setRefundAllowed(allowed: boolean): void {
		this.refundsEnabled = allowed;
	}

	setStalledRefundAllowed(allowed: boolean): void {
		this.stalledRefundsEnabled = allowed;
	}

	setDepositLimits(
		duration: string,
		minDeposit: Wei,
		maxDeposit: Wei,
	): Result<void, ValidationError> {
		if (!this.isDurationValid(duration)) {
			return err(
				new ValidationError(FailureCode.InvalidDuration, `Unknown duration "${duration}"`, {
					duration,
				}),
			);
		}
		if (minDeposit <= 0n || minDeposit > maxDeposit) {
			return err(
				new ValidationError(FailureCode.InvalidAmount, "Deposit limits must satisfy 0 < min <= max", {
					duration,
					minDeposit,
					maxDeposit,
				}),
			);
		}
		this.limits.set(duration, { minDeposit, maxDeposit });
		return ok(undefined);
	}

	/** Chunk sizes: 0 < minChunk <= chunk <= minipool capacity. */
	setChunkSize(chunkSize: Wei, minChunkSize: Wei = chunkSize): Result<void, ValidationError> {
		if (minChunkSize <= 0n || minChunkSize > chunkSize || chunkSize > this.capacity) {
			return err(
				new ValidationError(
					FailureCode.InvalidAmount,
					"Chunk sizes must satisfy 0 < minChunk <= chunk <= minipool capacity",
					{ chunkSize, minChunkSize, capacity: this.capacity },
				),
			);
		}
		this.chunk = chunkSize;
		this.minChunk = minChunkSize;
		return ok(undefined);
	}

	/** Rejects a rate that could push the net below zero at the maximum group fee. */
	setProtocolFeePerc(perc: Percentage): Result<void, ValidationError> {
		if (!isPercentage(perc)) {
			return err(
				new ValidationError(FailureCode.InvalidFee, "Protocol fee must lie in [0, 100%]", { perc }),
			);
		}
		if (this.maxGroupFee + perc > CALC_BASE) {
			return err(
				new ValidationError(
					FailureCode.InvalidFee,
					"Protocol fee plus the maximum group fee exceeds 100%",
					{ perc, maxGroupFeePerc: this.maxGroupFee },
				),
			);
		}
		this.protocolFee = perc;
		return ok(undefined);
	}
}
