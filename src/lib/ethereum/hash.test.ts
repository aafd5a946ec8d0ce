import { describe, expect, it } from "vitest";
import { address } from "../../shared/identifiers.js";
import { deriveAddress, deriveDepositId } from "./hash.js";

const USER = address("0x0000000000000000000000000000000000000a01");
const OTHER = address("0x0000000000000000000000000000000000000a02");
const GROUP = address("0x0000000000000000000000000000000000000b01");

describe("deriveDepositId", () => {
	it("returns a lowercase 32-byte id", () => {
		const id = deriveDepositId(USER, GROUP, "3m", 0n);
		expect(id).toMatch(/^0x[0-9a-f]{64}$/);
	});

	it("is deterministic", () => {
		expect(deriveDepositId(USER, GROUP, "3m", 1n)).toBe(deriveDepositId(USER, GROUP, "3m", 1n));
	});

	it("differs by user, duration and sequence", () => {
		const base = deriveDepositId(USER, GROUP, "3m", 1n);
		expect(deriveDepositId(OTHER, GROUP, "3m", 1n)).not.toBe(base);
		expect(deriveDepositId(USER, GROUP, "6m", 1n)).not.toBe(base);
		expect(deriveDepositId(USER, GROUP, "3m", 2n)).not.toBe(base);
	});
});

describe("deriveAddress", () => {
	it("returns a lowercase 20-byte address", () => {
		expect(deriveAddress(USER, "minipool", 0n)).toMatch(/^0x[0-9a-f]{40}$/);
	});

	it("differs per nonce and label", () => {
		const a = deriveAddress(USER, "minipool", 0n);
		expect(deriveAddress(USER, "minipool", 1n)).not.toBe(a);
		expect(deriveAddress(USER, "group", 0n)).not.toBe(a);
	});
});
