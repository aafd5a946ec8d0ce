import { describe, expect, it, vi } from "vitest";
import { createLogger } from "../lib/logger/index.js";
import { address, depositId, durationId } from "../shared/identifiers.js";
import { FakeClock } from "../shared/time.js";
import { EventLog } from "./event-log.js";
import type { RecordDraft } from "./pool-records.js";

const USER = address("0x0000000000000000000000000000000000000a01");
const GROUP = address("0x0000000000000000000000000000000000000b01");
const MINIPOOL = address("0x0000000000000000000000000000000000000c01");
const DEPOSIT = depositId(`0x${"1".repeat(64)}`);

const depositDraft: RecordDraft = {
	type: "deposit",
	from: USER,
	userId: USER,
	groupId: GROUP,
	durationId: durationId("3m"),
	depositId: DEPOSIT,
	value: 4n,
};

const assignDraft: RecordDraft = {
	type: "deposit_assign",
	userId: USER,
	groupId: GROUP,
	depositId: DEPOSIT,
	minipool: MINIPOOL,
	value: 4n,
};

function createLog() {
	const clock = new FakeClock(1_700_000_000_500);
	return { log: EventLog.create({ clock }), clock };
}

describe("EventLog", () => {
	describe("append", () => {
		it("stamps a gap-free sequence and a timestamp in seconds", () => {
			const { log, clock } = createLog();
			const first = log.append(depositDraft);
			clock.advance(2_000);
			const second = log.append(assignDraft);

			expect(first.sequence).toBe(1);
			expect(first.timestamp).toBe(1_700_000_000);
			expect(second.sequence).toBe(2);
			expect(second.timestamp).toBe(1_700_000_002);
		});

		it("keeps the draft fields", () => {
			const { log } = createLog();
			const record = log.append(depositDraft);
			expect(record).toEqual({ ...depositDraft, sequence: 1, timestamp: 1_700_000_000 });
		});
	});

	describe("queries", () => {
		it("filters by type", () => {
			const { log } = createLog();
			log.append(depositDraft);
			log.append(assignDraft);
			log.append(assignDraft);

			const assigns = log.ofType("deposit_assign");
			expect(assigns).toHaveLength(2);
			expect(assigns[0]?.minipool).toBe(MINIPOOL);
		});

		it("keeps every record in append order", () => {
			const { log } = createLog();
			log.append(depositDraft);
			log.append(assignDraft);
			expect(log.all().map((r) => [r.sequence, r.type])).toEqual([
				[1, "deposit"],
				[2, "deposit_assign"],
			]);
			expect(log.size()).toBe(2);
		});

		it("is empty before the first append", () => {
			expect(EventLog.create().size()).toBe(0);
		});
	});

	describe("subscribe", () => {
		it("delivers records by type and to wildcard subscribers", () => {
			const { log } = createLog();
			const onDeposit = vi.fn();
			const onAny = vi.fn();
			log.subscribe("deposit", onDeposit);
			log.subscribe("*", onAny);

			log.append(depositDraft);
			log.append(assignDraft);

			expect(onDeposit).toHaveBeenCalledTimes(1);
			expect(onAny).toHaveBeenCalledTimes(2);
		});

		it("stops delivering after unsubscribe", () => {
			const { log } = createLog();
			const handler = vi.fn();
			const off = log.subscribe("*", handler);
			off();
			log.append(depositDraft);
			expect(handler).not.toHaveBeenCalled();
		});

		it("logs subscriber failures and keeps the record", () => {
			const lines: string[] = [];
			const logger = createLogger({ level: "error", destination: { write: (l) => lines.push(l) } });
			const log = EventLog.create({ logger });
			const after = vi.fn();
			log.subscribe("*", () => {
				throw new Error("subscriber failed");
			});
			log.subscribe("*", after);

			const record = log.append(depositDraft);

			expect(log.all()).toEqual([record]);
			expect(after).toHaveBeenCalledWith(record);
			expect(lines).toHaveLength(1);
			expect(JSON.parse(lines[0] ?? "{}").msg).toBe("Record subscriber threw");
		});
	});
});
