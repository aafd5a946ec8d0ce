/**
 * PoolError hierarchy — every rejected pool operation carries a kind
 * (the broad taxonomy) and a code (the exact precondition that failed).
 *
 * Errors are values: domain code returns them inside a Result and nothing
 * is thrown across the façade. The core never retries; callers correct the
 * parameters and submit again.
 */

/** Broad failure taxonomy. */
export const ErrorKind = {
	Validation: "validation",
	DisabledFeature: "disabled_feature",
	State: "state",
	InsufficientFunds: "insufficient_funds",
	Config: "config",
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/** Specific failure codes, one per distinguishable rejection. */
export const FailureCode = {
	InvalidDuration: "INVALID_DURATION",
	InvalidDeposit: "INVALID_DEPOSIT",
	InvalidUser: "INVALID_USER",
	InvalidGroup: "INVALID_GROUP",
	InvalidDepositId: "INVALID_DEPOSIT_ID",
	InvalidAmount: "INVALID_AMOUNT",
	InvalidMinipool: "INVALID_MINIPOOL",
	InvalidFee: "INVALID_FEE",
	InvalidAddress: "INVALID_ADDRESS",
	SchemaInvalid: "SCHEMA_INVALID",
	UnauthorizedCaller: "UNAUTHORIZED_CALLER",
	UnauthorizedDepositor: "UNAUTHORIZED_DEPOSITOR",
	UnauthorizedWithdrawer: "UNAUTHORIZED_WITHDRAWER",
	UnauthorizedGroupOwner: "UNAUTHORIZED_GROUP_OWNER",
	DepositsDisabled: "DEPOSITS_DISABLED",
	WithdrawalsDisabled: "WITHDRAWALS_DISABLED",
	RefundsDisabled: "REFUNDS_DISABLED",
	InvalidMinipoolStatus: "INVALID_MINIPOOL_STATUS",
	InvalidTransition: "INVALID_TRANSITION",
	MinipoolNotEmpty: "MINIPOOL_NOT_EMPTY",
	LastWithdrawer: "LAST_WITHDRAWER",
	InsufficientFunds: "INSUFFICIENT_FUNDS",
	CapacityExceeded: "CAPACITY_EXCEEDED",
	ConfigInvalid: "CONFIG_INVALID",
} as const;

export type FailureCode = (typeof FailureCode)[keyof typeof FailureCode];

/** Base error for all pool operations. */
export class PoolError extends Error {
	readonly kind: ErrorKind;
	readonly code: FailureCode;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: FailureCode,
		kind: ErrorKind,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "PoolError";
		this.kind = kind;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			kind: this.kind,
			...(this.hint !== undefined && { hint: this.hint }),
			context: stringifyBigints(this.context),
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** A single schema failure with the path to the offending field. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Bad amount, duration, identifier, or an unauthorized caller. */
export class ValidationError extends PoolError {
	readonly issues: readonly ValidationIssue[];

	constructor(
		code: FailureCode,
		message: string,
		context: Record<string, unknown> = {},
		issues: readonly ValidationIssue[] = [],
	) {
		super(message, code, ErrorKind.Validation, context);
		this.name = "ValidationError";
		this.issues = issues;
	}

	override toJSON(): Record<string, unknown> {
		return this.issues.length === 0 ? super.toJSON() : { ...super.toJSON(), issues: this.issues };
	}
}

/** Deposits, withdrawals or refunds are switched off in settings. */
export class DisabledFeatureError extends PoolError {
	constructor(code: FailureCode, message: string, context: Record<string, unknown> = {}) {
		super(message, code, ErrorKind.DisabledFeature, context, "Retry once the feature is enabled");
		this.name = "DisabledFeatureError";
	}
}

/** The target is in the wrong lifecycle state for the requested operation. */
export class StateError extends PoolError {
	constructor(code: FailureCode, message: string, context: Record<string, unknown> = {}) {
		super(message, code, ErrorKind.State, context);
		this.name = "StateError";
	}
}

/** The requested amount exceeds what remains in the ledger entry. */
export class InsufficientFundsError extends PoolError {
	readonly requested: bigint;
	readonly available: bigint;

	constructor(
		message: string,
		requested: bigint,
		available: bigint,
		context: Record<string, unknown> = {},
	) {
		super(message, FailureCode.InsufficientFunds, ErrorKind.InsufficientFunds, {
			...context,
			requested,
			available,
		});
		this.name = "InsufficientFundsError";
		this.requested = requested;
		this.available = available;
	}
}

/** Invalid or missing configuration. Raised at boundaries only. */
export class ConfigError extends PoolError {
	constructor(message: string, context: Record<string, unknown> = {}) {
		super(message, FailureCode.ConfigInvalid, ErrorKind.Config, context);
		this.name = "ConfigError";
	}
}

function stringifyBigints(context: Record<string, unknown>): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(context)) {
		out[key] = typeof value === "bigint" ? value.toString() : value;
	}
	return out;
}

// ── Type guards ──────────────────────────────────────────────────────

export function isPoolError(e: unknown): e is PoolError {
	return e instanceof PoolError;
}

export function isValidationError(e: unknown): e is ValidationError {
	return e instanceof ValidationError;
}

export function isDisabledFeatureError(e: unknown): e is DisabledFeatureError {
	return e instanceof DisabledFeatureError;
}

export function isStateError(e: unknown): e is StateError {
	return e instanceof StateError;
}

export function isInsufficientFunds(e: unknown): e is InsufficientFundsError {
	return e instanceof InsufficientFundsError;
}
