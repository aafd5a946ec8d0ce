export type {
	PoolRecord,
	PoolRecordType,
	RecordDraft,
	RecordOf,
	DepositRecorded,
	DepositRefunded,
	DepositWithdrawn,
	DepositAssigned,
	MinipoolStatusChanged,
} from "./pool-records.js";

export { EventLog } from "./event-log.js";
export type { EventLogOptions, RecordHandler } from "./event-log.js";
