/**
 * Domain identifiers — branded types for compile-time safety.
 *
 * Users, groups, minipools and node operators are all addressed by an
 * Ethereum address; deposits by a 32-byte hash. Brands stop a DepositId
 * from being passed where an Address is expected.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Lowercase 20-byte hex address (user, group, minipool, node operator, contract). */
export type Address = Brand<`0x${string}`, "Address">;
/** 32-byte hex identifier of a deposit. */
export type DepositId = Brand<`0x${string}`, "DepositId">;
/** Staking-term class such as "3m" or "12m". */
export type DurationId = Brand<string, "DurationId">;

const ADDRESS_RE = /^0x[0-9a-f]{40}$/;
const DEPOSIT_ID_RE = /^0x[0-9a-f]{64}$/;

/** The null address; never a valid user or group. */
export const ZERO_ADDRESS = address(`0x${"0".repeat(40)}`);
/** The null deposit ID; never resolves to a deposit. */
export const ZERO_DEPOSIT_ID = depositId(`0x${"0".repeat(64)}`);

// ── Factory functions with validation ────────────────────────────────

/** Create a validated Address. Throws if the value is not 20-byte hex. */
export function address(value: string): Address {
	const normalized = value.trim().toLowerCase();
	if (!ADDRESS_RE.test(normalized)) {
		throw new Error(`Address must be 0x-prefixed 20-byte hex, got: ${value}`);
	}
	return normalized as Address;
}

/** Create a validated DepositId. Throws if the value is not 32-byte hex. */
export function depositId(value: string): DepositId {
	const normalized = value.trim().toLowerCase();
	if (!DEPOSIT_ID_RE.test(normalized)) {
		throw new Error(`DepositId must be 0x-prefixed 32-byte hex, got: ${value}`);
	}
	return normalized as DepositId;
}

/** Create a DurationId. Throws if empty; recognition is a settings concern. */
export function durationId(value: string): DurationId {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error("DurationId cannot be empty");
	}
	return trimmed as DurationId;
}

/** Non-throwing address check for untrusted input. */
export function isAddress(value: string): boolean {
	return ADDRESS_RE.test(value.trim().toLowerCase());
}

export function isZeroAddress(value: Address): boolean {
	return value === ZERO_ADDRESS;
}
