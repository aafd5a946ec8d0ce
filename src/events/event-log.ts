/**
 * EventLog — append-only record channel.
 *
 * Records are stored before subscribers run, and subscriber failures are
 * logged, never propagated: an operation that appended a record has
 * already committed.
 */

import { TypedEmitter } from "../lib/events/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { type Clock, SystemClock, unixSeconds } from "../shared/time.js";
import type { PoolRecord, PoolRecordType, RecordDraft, RecordOf } from "./pool-records.js";

export type RecordHandler = (record: PoolRecord) => void;

type RecordChannels = { [K in PoolRecordType | "*"]: RecordHandler };

export interface EventLogOptions {
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export class EventLog {
	private readonly entries: PoolRecord[];
	private readonly emitter: TypedEmitter<RecordChannels>;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private nextSequence: number;

	private constructor(clock: Clock, logger: Logger) {
		this.entries = [];
		this.emitter = new TypedEmitter<RecordChannels>();
		this.clock = clock;
		this.logger = logger;
		this.nextSequence = 1;
	}

	static create(options: EventLogOptions = {}): EventLog {
		return new EventLog(options.clock ?? SystemClock, options.logger ?? silentLogger());
	}

	/** Stamps, stores and publishes a record. */
	append(draft: RecordDraft): PoolRecord {
		const record: PoolRecord = {
			...draft,
			sequence: this.nextSequence,
			timestamp: unixSeconds(this.clock),
		};
		this.nextSequence += 1;
		this.entries.push(record);
		this.logger.debug({ type: record.type, sequence: record.sequence }, "Record appended");

		this.emitter.emit(record.type, record);
		this.emitter.emit("*", record);
		return record;
	}

	/** Subscribe to one record type, or "*" for all. Returns an unsubscribe function. */
	subscribe(type: PoolRecordType | "*", handler: RecordHandler): () => void {
		const guarded: RecordHandler = (record) => {
			try {
				handler(record);
			} catch (error: unknown) {
				this.logger.error(
					{ err: error, type: record.type, sequence: record.sequence },
					"Record subscriber threw",
				);
			}
		};
		return this.emitter.on(type, guarded);
	}

	// ── Queries ────────────────────────────────────────────────────

	all(): readonly PoolRecord[] {
		return this.entries;
	}

	ofType<T extends PoolRecordType>(type: T): RecordOf<T>[] {
		return this.entries.filter((r): r is RecordOf<T> => r.type === type);
	}

	size(): number {
		return this.entries.length;
	}
}
