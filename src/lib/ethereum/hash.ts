/**
 * Identifier derivation — keccak256 over packed ABI encoding, via viem.
 *
 * Deposit IDs and generated contract addresses are content hashes, so the
 * same inputs always give the same identifier.
 */

import { encodePacked, keccak256, slice } from "viem";
import { type Address, type DepositId, address, depositId } from "../../shared/identifiers.js";

/**
 * keccak256(user ‖ group ‖ duration ‖ sequence) as a DepositId.
 * @param sequence - Global deposit nonce; makes repeated identical deposits distinct
 */
export function deriveDepositId(
	user: Address,
	group: Address,
	duration: string,
	sequence: bigint,
): DepositId {
	return depositId(
		keccak256(
			encodePacked(["address", "address", "string", "uint256"], [user, group, duration, sequence]),
		),
	);
}

/**
 * Address for a newly created entity (group, minipool), taken from the low
 * 20 bytes of keccak256(creator ‖ label ‖ nonce).
 */
export function deriveAddress(creator: Address, label: string, nonce: bigint): Address {
	const hash = keccak256(
		encodePacked(["address", "string", "uint256"], [creator, label, nonce]),
	);
	return address(slice(hash, 12));
}
