import type { PoolError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Guard } from "./types.js";

/**
 * Ordered, immutable sequence of guards. The first guard to block decides
 * the failure, so the order of a chain is the order in which preconditions
 * are reported.
 *
 * @example
 * ```ts
 * const chain = GuardChain.create<WithdrawalContext>()
 *   .with(callerIsFacade)
 *   .with(withdrawalsEnabled);
 * const verdict = chain.evaluate(ctx);
 * ```
 */
export class GuardChain<C> {
	private readonly guards: readonly Guard<C>[];

	private constructor(guards: readonly Guard<C>[]) {
		this.guards = guards;
	}

	static create<C>(): GuardChain<C> {
		return new GuardChain<C>([]);
	}

	/** Returns a new chain with `guard` appended. */
	with(guard: Guard<C>): GuardChain<C> {
		return new GuardChain([...this.guards, guard]);
	}

	evaluate(ctx: C): Result<void, PoolError> {
		for (const guard of this.guards) {
			const verdict = guard.check(ctx);
			if (verdict.type === "block") return err(verdict.error);
		}
		return ok(undefined);
	}

	guardNames(): readonly string[] {
		return this.guards.map((g) => g.name);
	}
}
