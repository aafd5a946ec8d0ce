/**
 * Fee split — how a gross withdrawal divides between the withdrawer, the
 * group and the protocol.
 *
 * Fees are taken out of the principal, never added on top, and each fee is
 * truncated independently so the three parts always sum to the gross amount.
 */

import { CALC_BASE, type Percentage, type Wei, isPercentage, percentOf } from "../shared/amount.js";
import { FailureCode, ValidationError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

export interface FeeSplit {
	readonly gross: Wei;
	readonly groupFee: Wei;
	readonly protocolFee: Wei;
	readonly net: Wei;
}

/**
 * Splits `amount` into net, group fee and protocol fee.
 * @example
 * splitFees(4n * 10n ** 18n, 5n * 10n ** 16n, 5n * 10n ** 16n)
 * // { gross: 4e18, groupFee: 2e17, protocolFee: 2e17, net: 3.6e18 }
 */
export function splitFees(
	amount: Wei,
	groupFeePerc: Percentage,
	protocolFeePerc: Percentage,
): FeeSplit {
	const groupFee = percentOf(amount, groupFeePerc);
	const protocolFee = percentOf(amount, protocolFeePerc);
	return { gross: amount, groupFee, protocolFee, net: amount - groupFee - protocolFee };
}

/** Both rates within [0, 100%] and together no more than 100%. */
export function checkFeeRates(
	groupFeePerc: Percentage,
	protocolFeePerc: Percentage,
): Result<void, ValidationError> {
	if (!isPercentage(groupFeePerc) || !isPercentage(protocolFeePerc)) {
		return err(
			new ValidationError(FailureCode.InvalidFee, "Fee rates must lie in [0, 100%]", {
				groupFeePerc,
				protocolFeePerc,
			}),
		);
	}
	if (groupFeePerc + protocolFeePerc > CALC_BASE) {
		return err(
			new ValidationError(FailureCode.InvalidFee, "Combined fee rates exceed 100%", {
				groupFeePerc,
				protocolFeePerc,
			}),
		);
	}
	return ok(undefined);
}
