import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { CALC_BASE } from "../shared/amount.js";
import { splitFees } from "./fee-split.js";

const amountArb = fc.bigInt({ min: 0n, max: 10n ** 24n });
const rateArb = fc.bigInt({ min: 0n, max: CALC_BASE });

describe("splitFees (property-based)", () => {
	it("net plus fees always equals the gross amount", () => {
		fc.assert(
			fc.property(amountArb, rateArb, rateArb, (amount, groupPerc, protocolPerc) => {
				const split = splitFees(amount, groupPerc, protocolPerc);
				expect(split.net + split.groupFee + split.protocolFee).toBe(amount);
			}),
			{ numRuns: 500 },
		);
	});

	it("net is never negative when the rates sum to at most 100%", () => {
		fc.assert(
			fc.property(amountArb, rateArb, rateArb, (amount, a, b) => {
				fc.pre(a + b <= CALC_BASE);
				expect(splitFees(amount, a, b).net >= 0n).toBe(true);
			}),
			{ numRuns: 500 },
		);
	});

	it("each fee never exceeds the exact rational fee", () => {
		fc.assert(
			fc.property(amountArb, rateArb, (amount, perc) => {
				const { groupFee } = splitFees(amount, perc, 0n);
				expect(groupFee * CALC_BASE <= amount * perc).toBe(true);
				expect((groupFee + 1n) * CALC_BASE > amount * perc).toBe(true);
			}),
			{ numRuns: 500 },
		);
	});
});
