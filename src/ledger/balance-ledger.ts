/**
 * BalanceLedger — fungible address → wei balances with a tracked supply.
 *
 * Two instances exist per pool: the derivative-token ledger credited on
 * withdrawal and the ether payout ledger credited on refund.
 */

import type { Wei } from "../shared/amount.js";
import { FailureCode, InsufficientFundsError, ValidationError } from "../shared/errors.js";
import type { Address } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";

export class BalanceLedger {
	readonly symbol: string;
	private readonly balances: Map<Address, Wei>;
	private supply: Wei;

	private constructor(symbol: string) {
		this.symbol = symbol;
		this.balances = new Map();
		this.supply = 0n;
	}

	static create(symbol: string): BalanceLedger {
		return new BalanceLedger(symbol);
	}

	balanceOf(holder: Address): Wei {
		return this.balances.get(holder) ?? 0n;
	}

	totalSupply(): Wei {
		return this.supply;
	}

	/** Increases `to` and the supply. Zero credits are no-ops. */
	credit(to: Address, amount: Wei): Result<Wei, ValidationError> {
		if (amount < 0n) {
			return err(
				new ValidationError(FailureCode.InvalidAmount, "Credit amount must not be negative", {
					symbol: this.symbol,
					amount,
				}),
			);
		}
		if (amount === 0n) return ok(this.balanceOf(to));
		const next = this.balanceOf(to) + amount;
		this.balances.set(to, next);
		this.supply += amount;
		return ok(next);
	}

	/** Moves `amount` between holders; supply is unchanged. */
	transfer(
		from: Address,
		to: Address,
		amount: Wei,
	): Result<void, ValidationError | InsufficientFundsError> {
		if (amount <= 0n) {
			return err(
				new ValidationError(FailureCode.InvalidAmount, "Transfer amount must be positive", {
					symbol: this.symbol,
					amount,
				}),
			);
		}
		const available = this.balanceOf(from);
		if (amount > available) {
			return err(
				new InsufficientFundsError(`Insufficient ${this.symbol} balance`, amount, available, {
					holder: from,
				}),
			);
		}
		this.setBalance(from, available - amount);
		this.setBalance(to, this.balanceOf(to) + amount);
		return ok(undefined);
	}

	private setBalance(holder: Address, value: Wei): void {
		if (value === 0n) {
			this.balances.delete(holder);
		} else {
			this.balances.set(holder, value);
		}
	}
}
