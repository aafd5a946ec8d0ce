/**
 * Configuration loading — environment variables and untrusted objects.
 *
 * `configFromEnv()` is boundary code and throws ConfigError on a malformed
 * variable. `parsePoolConfig()` validates with zod and returns a Result.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { ether } from "../lib/ethereum/index.js";
import { addressSchema, validate, weiSchema, z } from "../lib/validation/index.js";
import { CALC_BASE, isPercentage } from "../shared/amount.js";
import { DEFAULT_POOL_CONFIG, type DepositLimits, type PoolConfig } from "../shared/config.js";
import { ConfigError, FailureCode, ValidationError, type ValidationIssue } from "../shared/errors.js";
import { address, isAddress } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

// ── Environment ─────────────────────────────────────────────────────

/** Mutable builder shape for assembling Partial<PoolConfig> field by field. */
interface MutablePoolConfig {
	durations?: readonly string[];
	depositLimits?: DepositLimits;
	chunkSize?: bigint;
	minChunkSize?: bigint;
	chunkAssignMax?: number;
	minipoolUserCapacity?: bigint;
	maxGroupFeePerc?: bigint;
	protocolFeePerc?: bigint;
	protocolFeeAddress?: PoolConfig["protocolFeeAddress"];
	depositsEnabled?: boolean;
	withdrawalsEnabled?: boolean;
	refundsEnabled?: boolean;
	stalledRefundsEnabled?: boolean;
	logLevel?: LogLevel;
}

/**
 * Reads pool settings from POOL_* environment variables.
 * Amounts and fee rates are decimal ether strings ("0.5", "0.05").
 * Supported: POOL_DURATIONS, POOL_MIN_DEPOSIT, POOL_MAX_DEPOSIT, POOL_CHUNK_SIZE,
 * POOL_MIN_CHUNK_SIZE, POOL_CHUNK_ASSIGN_MAX, POOL_MINIPOOL_CAPACITY,
 * POOL_MAX_GROUP_FEE, POOL_PROTOCOL_FEE, POOL_PROTOCOL_FEE_ADDRESS,
 * POOL_DEPOSITS_ENABLED, POOL_WITHDRAWALS_ENABLED, POOL_REFUNDS_ENABLED,
 * POOL_STALLED_REFUNDS_ENABLED, POOL_LOG_LEVEL.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<PoolConfig> {
	const result: MutablePoolConfig = {};

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const durations = env["POOL_DURATIONS"];
	if (durations) {
		const list = durations
			.split(",")
			.map((d) => d.trim())
			.filter((d) => d.length > 0);
		if (list.length === 0) {
			throw new ConfigError(`Invalid POOL_DURATIONS: "${durations}" names no duration`);
		}
		result.durations = list;
	}

	const minDeposit = parseEtherEnv(env, "POOL_MIN_DEPOSIT");
	const maxDeposit = parseEtherEnv(env, "POOL_MAX_DEPOSIT");
	if (minDeposit !== undefined || maxDeposit !== undefined) {
		result.depositLimits = {
			minDeposit: minDeposit ?? DEFAULT_POOL_CONFIG.depositLimits.minDeposit,
			maxDeposit: maxDeposit ?? DEFAULT_POOL_CONFIG.depositLimits.maxDeposit,
		};
	}

	const chunkSize = parseEtherEnv(env, "POOL_CHUNK_SIZE");
	if (chunkSize !== undefined) result.chunkSize = chunkSize;
	const minChunkSize = parseEtherEnv(env, "POOL_MIN_CHUNK_SIZE");
	if (minChunkSize !== undefined) result.minChunkSize = minChunkSize;
	const minipoolUserCapacity = parseEtherEnv(env, "POOL_MINIPOOL_CAPACITY");
	if (minipoolUserCapacity !== undefined) result.minipoolUserCapacity = minipoolUserCapacity;
	const maxGroupFeePerc = parseEtherEnv(env, "POOL_MAX_GROUP_FEE");
	if (maxGroupFeePerc !== undefined) result.maxGroupFeePerc = maxGroupFeePerc;
	const protocolFeePerc = parseEtherEnv(env, "POOL_PROTOCOL_FEE");
	if (protocolFeePerc !== undefined) result.protocolFeePerc = protocolFeePerc;
	const chunkAssignMax = parsePositiveIntEnv(env, "POOL_CHUNK_ASSIGN_MAX");
	if (chunkAssignMax !== undefined) result.chunkAssignMax = chunkAssignMax;
	const depositsEnabled = parseBoolEnv(env, "POOL_DEPOSITS_ENABLED");
	if (depositsEnabled !== undefined) result.depositsEnabled = depositsEnabled;
	const withdrawalsEnabled = parseBoolEnv(env, "POOL_WITHDRAWALS_ENABLED");
	if (withdrawalsEnabled !== undefined) result.withdrawalsEnabled = withdrawalsEnabled;
	const refundsEnabled = parseBoolEnv(env, "POOL_REFUNDS_ENABLED");
	if (refundsEnabled !== undefined) result.refundsEnabled = refundsEnabled;
	const stalledRefundsEnabled = parseBoolEnv(env, "POOL_STALLED_REFUNDS_ENABLED");
	if (stalledRefundsEnabled !== undefined) result.stalledRefundsEnabled = stalledRefundsEnabled;

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const feeAddress = env["POOL_PROTOCOL_FEE_ADDRESS"];
	if (feeAddress) {
		if (!isAddress(feeAddress)) {
			throw new ConfigError(`Invalid POOL_PROTOCOL_FEE_ADDRESS: "${feeAddress}" is not an address`);
		}
		result.protocolFeeAddress = address(feeAddress);
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const level = env["POOL_LOG_LEVEL"];
	if (level) {
		const known = LOG_LEVELS.find((l) => l === level);
		if (known === undefined) {
			throw new ConfigError(`Invalid POOL_LOG_LEVEL: "${level}"`);
		}
		result.logLevel = known;
	}

	return result;
}

function parseEtherEnv(env: NodeJS.ProcessEnv, key: string): bigint | undefined {
	const raw = env[key];
	if (!raw) return undefined;
	try {
		return ether(raw);
	} catch (cause) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a decimal ether amount`, { cause });
	}
}

function parsePositiveIntEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
	const raw = env[key];
	if (!raw) return undefined;
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim() || parsed <= 0) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be a positive integer`);
	}
	return parsed;
}

function parseBoolEnv(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
	const raw = env[key];
	if (raw === undefined || raw === "") return undefined;
	if (raw === "true") return true;
	if (raw === "false") return false;
	throw new ConfigError(`Invalid ${key}: "${raw}" must be "true" or "false"`);
}

// ── Object validation ───────────────────────────────────────────────

const limitsSchema = z.object({ minDeposit: weiSchema, maxDeposit: weiSchema });

const poolConfigSchema = z
	.object({
		durations: z.array(z.string().trim().min(1)).min(1),
		depositLimits: limitsSchema,
		durationLimits: z.record(limitsSchema),
		chunkSize: weiSchema,
		minChunkSize: weiSchema,
		chunkAssignMax: z.number().int().positive(),
		minipoolUserCapacity: weiSchema,
		maxGroupFeePerc: weiSchema,
		protocolFeePerc: weiSchema,
		protocolFeeAddress: addressSchema,
		depositsEnabled: z.boolean(),
		withdrawalsEnabled: z.boolean(),
		refundsEnabled: z.boolean(),
		stalledRefundsEnabled: z.boolean(),
		logLevel: z.enum(LOG_LEVELS),
	})
	.partial()
	.strict();

/**
 * Validate an untrusted configuration object and merge it onto the defaults.
 * Cross-field rules: min <= max deposit, 0 < minChunk <= chunk <= capacity,
 * fee rates within [0, 100%], every overridden duration recognized.
 */
export function parsePoolConfig(raw: unknown): Result<PoolConfig, ValidationError> {
	const parsed = validate(poolConfigSchema, raw, "pool config");
	if (!parsed.ok) return parsed;
	const p = parsed.value;
	const d = DEFAULT_POOL_CONFIG;

	const config: PoolConfig = {
		durations: p.durations ?? d.durations,
		depositLimits: p.depositLimits ?? d.depositLimits,
		durationLimits: p.durationLimits ?? d.durationLimits,
		chunkSize: p.chunkSize ?? d.chunkSize,
		minChunkSize: p.minChunkSize ?? d.minChunkSize,
		chunkAssignMax: p.chunkAssignMax ?? d.chunkAssignMax,
		minipoolUserCapacity: p.minipoolUserCapacity ?? d.minipoolUserCapacity,
		maxGroupFeePerc: p.maxGroupFeePerc ?? d.maxGroupFeePerc,
		protocolFeePerc: p.protocolFeePerc ?? d.protocolFeePerc,
		protocolFeeAddress:
			p.protocolFeeAddress !== undefined ? address(p.protocolFeeAddress) : d.protocolFeeAddress,
		depositsEnabled: p.depositsEnabled ?? d.depositsEnabled,
		withdrawalsEnabled: p.withdrawalsEnabled ?? d.withdrawalsEnabled,
		refundsEnabled: p.refundsEnabled ?? d.refundsEnabled,
		stalledRefundsEnabled: p.stalledRefundsEnabled ?? d.stalledRefundsEnabled,
		logLevel: p.logLevel ?? d.logLevel,
	};

	return checkConsistency(config);
}

/** Cross-field rules shared by every configuration source. */
export function checkConsistency(config: PoolConfig): Result<PoolConfig, ValidationError> {
	const issues: ValidationIssue[] = [];

	const checkLimits = (path: (string | number)[], limits: DepositLimits): void => {
		if (limits.minDeposit <= 0n || limits.minDeposit > limits.maxDeposit) {
			issues.push({ path, message: "deposit limits must satisfy 0 < min <= max" });
		}
	};

	checkLimits(["depositLimits"], config.depositLimits);
	for (const [duration, limits] of Object.entries(config.durationLimits)) {
		if (!config.durations.includes(duration)) {
			issues.push({ path: ["durationLimits", duration], message: "duration is not recognized" });
		}
		checkLimits(["durationLimits", duration], limits);
	}
	if (config.minChunkSize <= 0n || config.minChunkSize > config.chunkSize) {
		issues.push({ path: ["minChunkSize"], message: "must satisfy 0 < minChunkSize <= chunkSize" });
	}
	if (config.chunkSize > config.minipoolUserCapacity) {
		issues.push({ path: ["chunkSize"], message: "must not exceed minipoolUserCapacity" });
	}
	if (!isPercentage(config.maxGroupFeePerc)) {
		issues.push({ path: ["maxGroupFeePerc"], message: "must lie in [0, 100%]" });
	}
	if (!isPercentage(config.protocolFeePerc)) {
		issues.push({ path: ["protocolFeePerc"], message: "must lie in [0, 100%]" });
	}
	if (config.maxGroupFeePerc + config.protocolFeePerc > CALC_BASE) {
		issues.push({
			path: ["maxGroupFeePerc"],
			message: "group fee cap plus protocol fee must not exceed 100%",
		});
	}

	if (issues.length > 0) {
		return err(
			new ValidationError(FailureCode.SchemaInvalid, "Inconsistent pool config", {}, issues),
		);
	}
	return ok(config);
}

/**
 * Defaults, then environment, then explicit overrides; validated.
 * @throws ConfigError when the result is inconsistent
 */
export function loadPoolConfig(overrides: Partial<PoolConfig> = {}): PoolConfig {
	const fromEnv = configFromEnv();
	const merged: PoolConfig = {
		...DEFAULT_POOL_CONFIG,
		...fromEnv,
		...overrides,
		durationLimits: { ...DEFAULT_POOL_CONFIG.durationLimits, ...(overrides.durationLimits ?? {}) },
	};
	const checked = checkConsistency(merged);
	if (!checked.ok) {
		throw new ConfigError(checked.error.message, { issues: checked.error.issues });
	}
	return checked.value;
}
