/**
 * Guard framework types.
 *
 * A guard inspects a context and either allows the operation or blocks it
 * with the PoolError the caller will receive. Guards never mutate state.
 */

import type { PoolError } from "../shared/errors.js";

export type GuardVerdict =
	| { readonly type: "allow" }
	| { readonly type: "block"; readonly guard: string; readonly error: PoolError };

export function allow(): GuardVerdict {
	return { type: "allow" };
}

export function block(guard: string, error: PoolError): GuardVerdict {
	return { type: "block", guard, error };
}

/** Precondition check over a context of type C. */
export interface Guard<C> {
	readonly name: string;
	check(ctx: C): GuardVerdict;
}
