/**
 * MatchingEngine — moves queued value into PreLaunch minipools in chunks.
 *
 * Each run assigns at most chunkAssignMax chunks. A chunk is
 * min(chunkSize, room in the minipool, queued total) and is never smaller
 * than minChunkSize. Minipools are filled oldest first; when none has room,
 * one is requested from the provisioner. When none can be had the value
 * stays queued, which is not an error.
 */

import type { EventLog } from "../events/event-log.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { Minipool } from "../minipool/minipool.js";
import type { MinipoolRegistry } from "../minipool/minipool-registry.js";
import type { MinipoolProvisioner } from "../minipool/types.js";
import type { SettingsReader } from "../settings/types.js";
import { minWei } from "../shared/amount.js";
import type { DurationId } from "../shared/identifiers.js";
import type { DepositQueue } from "./deposit-queue.js";
import type { ChunkAssignment } from "./types.js";

export interface MatchingEngineOptions {
	readonly queue: DepositQueue;
	readonly minipools: MinipoolRegistry;
	readonly settings: SettingsReader;
	readonly events: EventLog;
	/** Omit to match only against existing minipools */
	readonly provisioner?: MinipoolProvisioner;
	readonly logger?: Logger;
}

export class MatchingEngine {
	private readonly queue: DepositQueue;
	private readonly minipools: MinipoolRegistry;
	private readonly settings: SettingsReader;
	private readonly events: EventLog;
	private readonly provisioner: MinipoolProvisioner | null;
	private readonly logger: Logger;

	constructor(options: MatchingEngineOptions) {
		this.queue = options.queue;
		this.minipools = options.minipools;
		this.settings = options.settings;
		this.events = options.events;
		this.provisioner = options.provisioner ?? null;
		this.logger = options.logger ?? silentLogger();
	}

	/** Runs one matching pass for a duration and returns the chunks moved. */
	assignChunks(durationId: DurationId): readonly ChunkAssignment[] {
		const assignments: ChunkAssignment[] = [];
		const chunkSize = this.settings.chunkSize();
		const minChunk = this.settings.minChunkSize();
		const maxChunks = this.settings.chunkAssignMax();

		while (assignments.length < maxChunks) {
			const queued = this.queue.queuedTotal(durationId);
			if (queued < minChunk || queued === 0n) break;

			const minipool = this.nextMinipool(durationId, minChunk);
			if (minipool === null) {
				this.logger.debug({ durationId, queued }, "No minipool capacity; deposits stay queued");
				break;
			}

			const amount = minWei(chunkSize, minipool.capacityRemaining(), queued);
			const portions = this.queue.peek(durationId, amount);
			const accepted = minipool.acceptPortions(portions);
			if (!accepted.ok) {
				this.logger.warn(
					{ durationId, minipool: minipool.address, code: accepted.error.code },
					"Minipool refused chunk",
				);
				break;
			}
			this.queue.assignToMinipool(minipool.address, portions);

			for (const p of portions) {
				this.events.append({
					type: "deposit_assign",
					userId: p.userId,
					groupId: p.groupId,
					depositId: p.depositId,
					minipool: minipool.address,
					value: p.amount,
				});
			}
			assignments.push({ minipool: minipool.address, durationId, amount, portions });
			this.logger.info(
				{ durationId, minipool: minipool.address, amount, portions: portions.length },
				"Chunk assigned",
			);
		}

		return assignments;
	}

	/** Oldest PreLaunch minipool with room for a minimum chunk, provisioning one if needed. */
	private nextMinipool(durationId: DurationId, minChunk: bigint): Minipool | null {
		const open = this.minipools
			.prelaunchFor(durationId)
			.find((m) => m.capacityRemaining() >= minChunk);
		if (open) return open;

		const handle = this.provisioner?.provision(durationId) ?? null;
		if (handle === null) return null;
		const created = this.minipools.get(handle.address);
		if (created === null || created.capacityRemaining() < minChunk) return null;
		return created;
	}
}
