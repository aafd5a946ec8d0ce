/**
 * Unit conversion between decimal ether strings and wei, via viem.
 */

import { formatEther, parseEther } from "viem";
import type { Wei } from "../../shared/amount.js";

const DECIMAL_RE = /^\d+(\.\d{1,18})?$/;

/** Parse a decimal ether string ("0.5", "32") into wei. Throws on malformed input. */
export function ether(value: string): Wei {
	const trimmed = value.trim();
	if (!DECIMAL_RE.test(trimmed)) {
		throw new Error(`Invalid ether amount: "${value}"`);
	}
	return parseEther(trimmed);
}

/** Render wei as a decimal ether string for logs and examples. */
export function formatWei(value: Wei): string {
	return formatEther(value);
}
