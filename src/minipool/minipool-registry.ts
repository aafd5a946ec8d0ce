/**
 * MinipoolRegistry — owns every minipool, in creation order.
 *
 * Creation order is the matching order: among PreLaunch minipools of a
 * duration, the earliest created is filled first.
 */

import type { EventLog } from "../events/event-log.js";
import { deriveAddress } from "../lib/ethereum/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { type Wei, sumWei } from "../shared/amount.js";
import { FailureCode, type StateError, ValidationError } from "../shared/errors.js";
import type { Address, DurationId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { Minipool } from "./minipool.js";
import { acceptsDeposits } from "./state-machine.js";
import type {
	MinipoolReader,
	MinipoolStatus,
	MinipoolTransition,
} from "./types.js";

export interface MinipoolRegistryOptions {
	readonly events: EventLog;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export interface CreateMinipoolParams {
	readonly nodeOperator: Address;
	readonly durationId: DurationId;
	readonly capacity: Wei;
}

export class MinipoolRegistry implements MinipoolReader {
	private readonly minipools: Map<Address, Minipool>;
	private readonly events: EventLog;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private nonce: bigint;

	private constructor(events: EventLog, clock: Clock, logger: Logger) {
		this.minipools = new Map();
		this.events = events;
		this.clock = clock;
		this.logger = logger;
		this.nonce = 0n;
	}

	static create(options: MinipoolRegistryOptions): MinipoolRegistry {
		return new MinipoolRegistry(
			options.events,
			options.clock ?? SystemClock,
			options.logger ?? silentLogger(),
		);
	}

	/** Creates a PreLaunch minipool at a derived address. */
	createMinipool(params: CreateMinipoolParams): Result<Minipool, ValidationError> {
		if (params.capacity <= 0n) {
			return err(
				new ValidationError(FailureCode.InvalidAmount, "Minipool capacity must be positive", {
					capacity: params.capacity,
				}),
			);
		}
		const minipool = new Minipool({
			address: deriveAddress(params.nodeOperator, "minipool", this.nonce),
			nodeOperator: params.nodeOperator,
			durationId: params.durationId,
			capacity: params.capacity,
			clock: this.clock,
		});
		this.nonce += 1n;
		this.minipools.set(minipool.address, minipool);
		this.logger.info(
			{
				minipool: minipool.address,
				nodeOperator: params.nodeOperator,
				durationId: params.durationId,
				capacity: params.capacity,
			},
			"Minipool created",
		);
		return ok(minipool);
	}

	get(minipool: Address): Minipool | null {
		return this.minipools.get(minipool) ?? null;
	}

	all(): readonly Minipool[] {
		return [...this.minipools.values()];
	}

	/** PreLaunch minipools for a duration that still have room, oldest first. */
	prelaunchFor(durationId: DurationId): readonly Minipool[] {
		return this.all().filter(
			(m) =>
				m.durationId === durationId && acceptsDeposits(m.status()) && m.capacityRemaining() > 0n,
		);
	}

	/** Total value held across every minipool ledger. */
	ledgerTotal(): Wei {
		return sumWei(this.all().map((m) => m.ledgerTotal()));
	}

	// ── MinipoolReader ─────────────────────────────────────────────

	status(minipool: Address): MinipoolStatus | null {
		return this.get(minipool)?.status() ?? null;
	}

	userLedgerEntry(minipool: Address, userId: Address, groupId: Address): Wei {
		return this.get(minipool)?.ledgerEntry(userId, groupId) ?? 0n;
	}

	capacityRemaining(minipool: Address): Wei {
		return this.get(minipool)?.capacityRemaining() ?? 0n;
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	/** Applies an external lifecycle transition and records it. */
	transition(
		minipool: Address,
		t: MinipoolTransition,
	): Result<MinipoolStatus, ValidationError | StateError> {
		const target = this.get(minipool);
		if (target === null) {
			return err(
				new ValidationError(FailureCode.InvalidMinipool, "Unknown minipool", { minipool }),
			);
		}
		const from = target.status();
		const result = target.transition(t);
		if (!result.ok) {
			this.logger.debug(
				{ minipool, transition: t.type, code: result.error.code },
				"Minipool transition rejected",
			);
			return result;
		}

		this.events.append({ type: "minipool_status_changed", minipool, from, to: result.value });
		this.logger.info({ minipool, from, to: result.value }, "Minipool status changed");
		return result;
	}
}
