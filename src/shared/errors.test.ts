import { describe, expect, it } from "vitest";
import {
	ConfigError,
	DisabledFeatureError,
	ErrorKind,
	FailureCode,
	InsufficientFundsError,
	PoolError,
	StateError,
	ValidationError,
	isDisabledFeatureError,
	isInsufficientFunds,
	isPoolError,
	isStateError,
	isValidationError,
} from "./errors.js";

describe("PoolError hierarchy", () => {
	describe("error kinds", () => {
		const cases: Array<[string, PoolError, ErrorKind]> = [
			[
				"ValidationError",
				new ValidationError(FailureCode.InvalidAmount, "zero"),
				ErrorKind.Validation,
			],
			[
				"DisabledFeatureError",
				new DisabledFeatureError(FailureCode.WithdrawalsDisabled, "off"),
				ErrorKind.DisabledFeature,
			],
			[
				"StateError",
				new StateError(FailureCode.InvalidMinipoolStatus, "prelaunch"),
				ErrorKind.State,
			],
			[
				"InsufficientFundsError",
				new InsufficientFundsError("too much", 5n, 3n),
				ErrorKind.InsufficientFunds,
			],
			["ConfigError", new ConfigError("bad"), ErrorKind.Config],
		];

		it.each(cases)("%s has kind %s", (_name, error, expected) => {
			expect(error.kind).toBe(expected);
			expect(error).toBeInstanceOf(PoolError);
			expect(error).toBeInstanceOf(Error);
		});
	});

	describe("properties", () => {
		it("preserves message, code and context", () => {
			const e = new ValidationError(FailureCode.InvalidDepositId, "unknown deposit", {
				depositId: "0x01",
			});
			expect(e.message).toBe("unknown deposit");
			expect(e.code).toBe("INVALID_DEPOSIT_ID");
			expect(e.context).toEqual({ depositId: "0x01" });
			expect(e.name).toBe("ValidationError");
		});

		it("InsufficientFundsError records requested and available amounts", () => {
			const e = new InsufficientFundsError("too much", 10n, 4n, { minipool: "0xaa" });
			expect(e.code).toBe(FailureCode.InsufficientFunds);
			expect(e.requested).toBe(10n);
			expect(e.available).toBe(4n);
			expect(e.context).toEqual({ minipool: "0xaa", requested: 10n, available: 4n });
		});

		it("DisabledFeatureError carries a retry hint", () => {
			const e = new DisabledFeatureError(FailureCode.DepositsDisabled, "deposits off");
			expect(e.hint).toBe("Retry once the feature is enabled");
		});
	});

	describe("toJSON", () => {
		it("serializes bigint context values as strings", () => {
			const e = new InsufficientFundsError("too much", 10n, 4n);
			expect(e.toJSON()).toEqual({
				name: "InsufficientFundsError",
				message: "too much",
				code: "INSUFFICIENT_FUNDS",
				kind: "insufficient_funds",
				context: { requested: "10", available: "4" },
			});
		});

		it("includes schema issues for validation errors", () => {
			const e = new ValidationError(FailureCode.SchemaInvalid, "bad", {}, [
				{ path: ["chunkSize"], message: "Required" },
			]);
			expect(e.toJSON()["issues"]).toEqual([{ path: ["chunkSize"], message: "Required" }]);
		});

		it("is JSON.stringify safe", () => {
			const e = new StateError(FailureCode.LastWithdrawer, "last one", { count: 1 });
			expect(JSON.parse(JSON.stringify(e))).toEqual({
				name: "StateError",
				message: "last one",
				code: "LAST_WITHDRAWER",
				kind: "state",
				context: { count: 1 },
			});
		});
	});

	describe("type guards", () => {
		it("distinguish each kind", () => {
			const v = new ValidationError(FailureCode.InvalidUser, "x");
			const d = new DisabledFeatureError(FailureCode.RefundsDisabled, "x");
			const s = new StateError(FailureCode.InvalidTransition, "x");
			const f = new InsufficientFundsError("x", 1n, 0n);

			expect(isValidationError(v)).toBe(true);
			expect(isValidationError(d)).toBe(false);
			expect(isDisabledFeatureError(d)).toBe(true);
			expect(isStateError(s)).toBe(true);
			expect(isStateError(f)).toBe(false);
			expect(isInsufficientFunds(f)).toBe(true);
			expect(isPoolError(new Error("plain"))).toBe(false);
		});
	});
});
