/**
 * Settings collaborator — the read side the core consumes.
 *
 * The core never writes settings; toggles and bounds are changed by
 * operators through the registry implementation.
 */

import type { Percentage, Wei } from "../shared/amount.js";
import type { Address, DurationId } from "../shared/identifiers.js";

export interface SettingsReader {
	isDepositAllowed(): boolean;
	isWithdrawalAllowed(): boolean;
	/** Refunds of still-queued deposits */
	isRefundAllowed(): boolean;
	/** Refunds out of timed-out minipools */
	isStalledRefundAllowed(): boolean;
	isDurationValid(duration: string): duration is DurationId;
	durations(): readonly DurationId[];
	minDeposit(duration: DurationId): Wei;
	maxDeposit(duration: DurationId): Wei;
	chunkSize(): Wei;
	minChunkSize(): Wei;
	chunkAssignMax(): number;
	minipoolUserCapacity(): Wei;
	maxGroupFeePerc(): Percentage;
	protocolFeePerc(): Percentage;
	protocolFeeAddress(): Address;
}
