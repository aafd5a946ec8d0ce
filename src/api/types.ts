import type { ChunkAssignment, DepositRecord } from "../deposit/types.js";
import type { Wei } from "../shared/amount.js";
import type { Address, DepositId } from "../shared/identifiers.js";

export interface DepositParams {
	readonly groupId: Address;
	readonly userId: Address;
	readonly durationId: string;
}

export interface DepositOutcome {
	readonly deposit: DepositRecord;
	/** Chunks the matching run moved right after the deposit was queued */
	readonly assignments: readonly ChunkAssignment[];
}

export interface QueuedRefundParams {
	readonly groupId: Address;
	readonly userId: Address;
	readonly durationId: string;
	readonly depositId: DepositId;
}

export interface StalledRefundParams extends QueuedRefundParams {
	readonly minipool: Address;
}

export interface StakingWithdrawalParams {
	readonly groupId: Address;
	readonly userId: Address;
	readonly depositId: DepositId;
	readonly minipool: Address;
	readonly amount: Wei;
}

export type ExitedWithdrawalParams = Omit<StakingWithdrawalParams, "amount">;
