import { describe, expect, it } from "vitest";
import { FailureCode, isInsufficientFunds } from "../shared/errors.js";
import { address } from "../shared/identifiers.js";
import { BalanceLedger } from "./balance-ledger.js";

const ALICE = address("0x0000000000000000000000000000000000000a01");
const BOB = address("0x0000000000000000000000000000000000000a02");

describe("BalanceLedger", () => {
	it("starts empty", () => {
		const ledger = BalanceLedger.create("RPD");
		expect(ledger.symbol).toBe("RPD");
		expect(ledger.totalSupply()).toBe(0n);
		expect(ledger.balanceOf(ALICE)).toBe(0n);
	});

	describe("credit", () => {
		it("increases the balance and the supply", () => {
			const ledger = BalanceLedger.create("RPD");
			expect(ledger.credit(ALICE, 5n)).toEqual({ ok: true, value: 5n });
			expect(ledger.credit(ALICE, 3n)).toEqual({ ok: true, value: 8n });
			expect(ledger.totalSupply()).toBe(8n);
			expect(ledger.balanceOf(ALICE)).toBe(8n);
		});

		it("ignores zero credits", () => {
			const ledger = BalanceLedger.create("ETH");
			expect(ledger.credit(ALICE, 0n)).toEqual({ ok: true, value: 0n });
			expect(ledger.totalSupply()).toBe(0n);
		});

		it("rejects negative credits", () => {
			const ledger = BalanceLedger.create("ETH");
			const result = ledger.credit(ALICE, -1n);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe(FailureCode.InvalidAmount);
		});
	});

	describe("transfer", () => {
		it("moves value without changing the supply", () => {
			const ledger = BalanceLedger.create("RPD");
			ledger.credit(ALICE, 10n);
			expect(ledger.transfer(ALICE, BOB, 4n).ok).toBe(true);
			expect(ledger.balanceOf(ALICE)).toBe(6n);
			expect(ledger.balanceOf(BOB)).toBe(4n);
			expect(ledger.totalSupply()).toBe(10n);
		});

		it("can move the whole balance", () => {
			const ledger = BalanceLedger.create("RPD");
			ledger.credit(ALICE, 10n);
			expect(ledger.transfer(ALICE, BOB, 10n).ok).toBe(true);
			expect(ledger.balanceOf(ALICE)).toBe(0n);
			expect(ledger.balanceOf(BOB)).toBe(10n);
		});

		it("rejects transfers above the balance", () => {
			const ledger = BalanceLedger.create("RPD");
			ledger.credit(ALICE, 3n);
			const result = ledger.transfer(ALICE, BOB, 4n);
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(isInsufficientFunds(result.error)).toBe(true);
				expect(result.error.context).toEqual({ holder: ALICE, requested: 4n, available: 3n });
			}
			expect(ledger.balanceOf(ALICE)).toBe(3n);
		});

		it("rejects zero transfers", () => {
			const ledger = BalanceLedger.create("RPD");
			expect(ledger.transfer(ALICE, BOB, 0n).ok).toBe(false);
		});
	});
});
