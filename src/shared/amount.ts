/**
 * Amounts — integer wei arithmetic.
 *
 * Every balance, deposit and fee is a bigint in the smallest unit.
 * Percentages are fixed-point with 18 decimals: CALC_BASE is 100%.
 * Division always truncates toward zero, matching on-chain integer math.
 */

/** Amount in the smallest unit (wei). */
export type Wei = bigint;

/** Fixed-point percentage, scaled so that CALC_BASE is 100%. */
export type Percentage = bigint;

const PRECISION = 18n;

/** 1.0 at 18 decimals. */
export const CALC_BASE: bigint = 10n ** PRECISION;

/** `amount * numerator / denominator`, truncated. */
export function mulDiv(amount: Wei, numerator: bigint, denominator: bigint): Wei {
	if (denominator === 0n) {
		throw new Error("mulDiv: division by zero");
	}
	return (amount * numerator) / denominator;
}

/** Portion of `amount` at fixed-point rate `perc`, truncated. */
export function percentOf(amount: Wei, perc: Percentage): Wei {
	return mulDiv(amount, perc, CALC_BASE);
}

/** True when `perc` lies in [0, 100%]. */
export function isPercentage(perc: Percentage): boolean {
	return perc >= 0n && perc <= CALC_BASE;
}

export function minWei(...values: readonly Wei[]): Wei {
	if (values.length === 0) {
		throw new Error("minWei: no values");
	}
	let min = values[0] ?? 0n;
	for (const v of values) {
		if (v < min) min = v;
	}
	return min;
}

export function sumWei(values: Iterable<Wei>): Wei {
	let total = 0n;
	for (const v of values) total += v;
	return total;
}
