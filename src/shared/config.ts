/**
 * Pool configuration types and defaults.
 *
 * PoolConfig is the seed for the settings registry. Loading from the
 * environment or an untrusted object lives in settings/config-loader.ts.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { CALC_BASE, type Percentage, type Wei } from "./amount.js";
import { type Address, address } from "./identifiers.js";

const ETHER = CALC_BASE;

/** Deposit bounds for one duration class. */
export interface DepositLimits {
	readonly minDeposit: Wei;
	readonly maxDeposit: Wei;
}

export interface PoolConfig {
	/** Recognized staking-term classes */
	readonly durations: readonly string[];
	/** Default deposit bounds, applied to every duration without an override */
	readonly depositLimits: DepositLimits;
	/** Per-duration deposit bound overrides */
	readonly durationLimits: Readonly<Record<string, DepositLimits>>;
	/** Size of each chunk moved from the queue into a minipool */
	readonly chunkSize: Wei;
	/** Transfers smaller than this are never made; the value stays queued */
	readonly minChunkSize: Wei;
	/** Maximum chunks assigned per matching run */
	readonly chunkAssignMax: number;
	/** User value a single minipool accepts */
	readonly minipoolUserCapacity: Wei;
	/** Upper bound on a group's fee */
	readonly maxGroupFeePerc: Percentage;
	/** Protocol fee taken on every withdrawal */
	readonly protocolFeePerc: Percentage;
	/** Receives the protocol fee */
	readonly protocolFeeAddress: Address;
	readonly depositsEnabled: boolean;
	readonly withdrawalsEnabled: boolean;
	readonly refundsEnabled: boolean;
	readonly stalledRefundsEnabled: boolean;
	readonly logLevel: LogLevel;
}

export const DEFAULT_POOL_CONFIG: PoolConfig = {
	durations: ["3m", "6m", "12m"],
	depositLimits: { minDeposit: ETHER / 2n, maxDeposit: 1_000n * ETHER },
	durationLimits: {},
	chunkSize: 4n * ETHER,
	minChunkSize: 4n * ETHER,
	chunkAssignMax: 2,
	minipoolUserCapacity: 16n * ETHER,
	maxGroupFeePerc: ETHER / 2n,
	protocolFeePerc: ETHER / 20n,
	protocolFeeAddress: address("0x00000000000000000000000000000000000000fe"),
	depositsEnabled: true,
	withdrawalsEnabled: true,
	refundsEnabled: true,
	stalledRefundsEnabled: true,
	logLevel: "info",
};

/** Merge overrides onto the defaults; nested limit maps are merged by key. */
export function withDefaults(overrides: Partial<PoolConfig> = {}): PoolConfig {
	return {
		...DEFAULT_POOL_CONFIG,
		...overrides,
		durationLimits: {
			...DEFAULT_POOL_CONFIG.durationLimits,
			...(overrides.durationLimits ?? {}),
		},
	};
}

/** Effective deposit bounds for a duration. */
export function limitsFor(config: PoolConfig, duration: string): DepositLimits {
	return config.durationLimits[duration] ?? config.depositLimits;
}
