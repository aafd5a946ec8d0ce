/**
 * NodeCapacityPool — node operators' standing offers to run minipools.
 *
 * Operators register a number of minipool slots per duration; the matching
 * engine draws on them, first registered first used, when every PreLaunch
 * minipool of a duration is full.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { SettingsReader } from "../settings/types.js";
import { FailureCode, ValidationError } from "../shared/errors.js";
import type { Address, DurationId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Minipool } from "./minipool.js";
import type { MinipoolRegistry } from "./minipool-registry.js";
import type { MinipoolProvisioner } from "./types.js";

interface CapacityOffer {
	readonly nodeOperator: Address;
	slots: number;
}

export interface NodeCapacityPoolOptions {
	readonly registry: MinipoolRegistry;
	readonly settings: SettingsReader;
	readonly logger?: Logger;
}

export class NodeCapacityPool implements MinipoolProvisioner {
	private readonly offers: Map<DurationId, CapacityOffer[]>;
	private readonly registry: MinipoolRegistry;
	private readonly settings: SettingsReader;
	private readonly logger: Logger;

	constructor(options: NodeCapacityPoolOptions) {
		this.offers = new Map();
		this.registry = options.registry;
		this.settings = options.settings;
		this.logger = options.logger ?? silentLogger();
	}

	/** Adds `slots` minipools' worth of capacity for a node operator. */
	register(nodeOperator: Address, durationId: string, slots: number): Result<void, ValidationError> {
		if (!this.settings.isDurationValid(durationId)) {
			return err(
				new ValidationError(FailureCode.InvalidDuration, `Unknown duration "${durationId}"`, {
					durationId,
				}),
			);
		}
		if (!Number.isInteger(slots) || slots <= 0) {
			return err(
				new ValidationError(FailureCode.InvalidAmount, "Slot count must be a positive integer", {
					slots,
				}),
			);
		}

		const queue = this.offers.get(durationId) ?? [];
		const existing = queue.find((o) => o.nodeOperator === nodeOperator);
		if (existing) {
			existing.slots += slots;
		} else {
			queue.push({ nodeOperator, slots });
		}
		this.offers.set(durationId, queue);
		this.logger.info({ nodeOperator, durationId, slots }, "Node capacity registered");
		return ok(undefined);
	}

	/** Remaining minipool slots for a duration. */
	available(durationId: DurationId): number {
		return (this.offers.get(durationId) ?? []).reduce((acc, o) => acc + o.slots, 0);
	}

	/**
	 * Creates `count` PreLaunch minipools for one operator immediately,
	 * without registering standing capacity.
	 */
	createMinipools(
		nodeOperator: Address,
		durationId: string,
		count: number,
	): Result<readonly Minipool[], ValidationError> {
		if (!this.settings.isDurationValid(durationId)) {
			return err(
				new ValidationError(FailureCode.InvalidDuration, `Unknown duration "${durationId}"`, {
					durationId,
				}),
			);
		}
		if (!Number.isInteger(count) || count <= 0) {
			return err(
				new ValidationError(FailureCode.InvalidAmount, "Minipool count must be a positive integer", {
					count,
				}),
			);
		}
		const created: Minipool[] = [];
		for (let i = 0; i < count; i++) {
			const result = this.registry.createMinipool({
				nodeOperator,
				durationId,
				capacity: this.settings.minipoolUserCapacity(),
			});
			if (!result.ok) return result;
			created.push(result.value);
		}
		return ok(created);
	}

	provision(durationId: DurationId): Minipool | null {
		const queue = this.offers.get(durationId) ?? [];
		const offer = queue[0];
		if (offer === undefined) return null;

		const result = this.registry.createMinipool({
			nodeOperator: offer.nodeOperator,
			durationId,
			capacity: this.settings.minipoolUserCapacity(),
		});
		if (!result.ok) {
			this.logger.warn({ durationId, code: result.error.code }, "Minipool provisioning failed");
			return null;
		}

		offer.slots -= 1;
		if (offer.slots === 0) queue.shift();
		this.logger.debug(
			{ durationId, nodeOperator: offer.nodeOperator, minipool: result.value.address },
			"Minipool provisioned from node capacity",
		);
		return result.value;
	}
}
