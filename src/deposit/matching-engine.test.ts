import { describe, expect, it } from "vitest";
import { EventLog } from "../events/event-log.js";
import { MinipoolRegistry } from "../minipool/minipool-registry.js";
import { NodeCapacityPool } from "../minipool/node-capacity-pool.js";
import { DepositSettings } from "../settings/deposit-settings.js";
import { CALC_BASE } from "../shared/amount.js";
import { type PoolConfig, withDefaults } from "../shared/config.js";
import { address, durationId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { DepositQueue } from "./deposit-queue.js";
import { MatchingEngine } from "./matching-engine.js";

const ETHER = CALC_BASE;
const NODE = address("0x0000000000000000000000000000000000000d01");
const USER_A = address("0x0000000000000000000000000000000000000a01");
const USER_B = address("0x0000000000000000000000000000000000000a02");
const GROUP = address("0x0000000000000000000000000000000000000b01");
const THREE_MONTHS = durationId("3m");

function setup(overrides: Partial<PoolConfig> = {}, withProvisioner = true) {
	const settings = new DepositSettings(withDefaults(overrides));
	const events = EventLog.create();
	const minipools = MinipoolRegistry.create({ events });
	const nodes = new NodeCapacityPool({ registry: minipools, settings });
	const queue = new DepositQueue({ settings });
	const engine = new MatchingEngine({
		queue,
		minipools,
		settings,
		events,
		...(withProvisioner ? { provisioner: nodes } : {}),
	});
	return { settings, events, minipools, nodes, queue, engine };
}

describe("MatchingEngine", () => {
	it("leaves value queued when no minipool exists", () => {
		const { queue, engine } = setup();
		unwrap(queue.enqueue(USER_A, GROUP, "3m", 8n * ETHER));

		expect(engine.assignChunks(THREE_MONTHS)).toEqual([]);
		expect(queue.queuedTotal(THREE_MONTHS)).toBe(8n * ETHER);
	});

	it("moves a chunk into the minipool ledger", () => {
		const { queue, engine, nodes, events } = setup();
		const [minipool] = unwrap(nodes.createMinipools(NODE, "3m", 1));
		const deposit = unwrap(queue.enqueue(USER_A, GROUP, "3m", 4n * ETHER));

		const assignments = engine.assignChunks(THREE_MONTHS);

		expect(assignments).toHaveLength(1);
		expect(assignments[0]?.amount).toBe(4n * ETHER);
		expect(minipool?.ledgerEntry(USER_A, GROUP)).toBe(4n * ETHER);
		expect(queue.get(deposit.id)?.stakingAmount).toBe(4n * ETHER);
		expect(events.ofType("deposit_assign").map((r) => r.value)).toEqual([4n * ETHER]);
	});

	it("never assigns less than the minimum chunk", () => {
		const { queue, engine, nodes } = setup();
		unwrap(nodes.createMinipools(NODE, "3m", 1));
		unwrap(queue.enqueue(USER_A, GROUP, "3m", 3n * ETHER));

		expect(engine.assignChunks(THREE_MONTHS)).toEqual([]);
		expect(queue.queuedTotal(THREE_MONTHS)).toBe(3n * ETHER);
	});

	it("combines small deposits into one chunk, oldest first", () => {
		const { queue, engine, nodes } = setup();
		const [minipool] = unwrap(nodes.createMinipools(NODE, "3m", 1));
		unwrap(queue.enqueue(USER_A, GROUP, "3m", 3n * ETHER));
		const later = unwrap(queue.enqueue(USER_B, GROUP, "3m", 2n * ETHER));

		const [chunk] = engine.assignChunks(THREE_MONTHS);

		expect(chunk?.portions.map((p) => p.amount)).toEqual([3n * ETHER, ETHER]);
		expect(minipool?.ledgerEntry(USER_B, GROUP)).toBe(ETHER);
		expect(queue.get(later.id)?.queuedAmount).toBe(ETHER);
	});

	it("honours the per-run chunk limit", () => {
		const { queue, engine, nodes } = setup();
		unwrap(nodes.createMinipools(NODE, "3m", 1));
		unwrap(queue.enqueue(USER_A, GROUP, "3m", 16n * ETHER));

		expect(engine.assignChunks(THREE_MONTHS)).toHaveLength(2);
		expect(queue.queuedTotal(THREE_MONTHS)).toBe(8n * ETHER);
		expect(engine.assignChunks(THREE_MONTHS)).toHaveLength(2);
		expect(queue.queuedTotal(THREE_MONTHS)).toBe(0n);
	});

	it("fills the earliest-created minipool first", () => {
		const { queue, engine, nodes } = setup();
		const [first, second] = unwrap(nodes.createMinipools(NODE, "3m", 2));
		unwrap(queue.enqueue(USER_A, GROUP, "3m", 8n * ETHER));

		engine.assignChunks(THREE_MONTHS);

		expect(first?.ledgerTotal()).toBe(8n * ETHER);
		expect(second?.ledgerTotal()).toBe(0n);
	});

	it("moves on to the next minipool when one is full", () => {
		const { queue, engine, nodes } = setup({ chunkAssignMax: 8 });
		const [first, second] = unwrap(nodes.createMinipools(NODE, "3m", 2));
		unwrap(queue.enqueue(USER_A, GROUP, "3m", 20n * ETHER));

		expect(engine.assignChunks(THREE_MONTHS)).toHaveLength(5);
		expect(first?.ledgerTotal()).toBe(16n * ETHER);
		expect(second?.ledgerTotal()).toBe(4n * ETHER);
	});

	it("bounds a chunk by the room left in the minipool", () => {
		const { queue, engine, nodes } = setup({ minChunkSize: ETHER, chunkAssignMax: 8 });
		const [first, second] = unwrap(nodes.createMinipools(NODE, "3m", 2));
		unwrap(queue.enqueue(USER_A, GROUP, "3m", 14n * ETHER));
		engine.assignChunks(THREE_MONTHS);
		unwrap(queue.enqueue(USER_B, GROUP, "3m", 4n * ETHER));

		const assignments = engine.assignChunks(THREE_MONTHS);

		expect(assignments.map((a) => a.amount)).toEqual([2n * ETHER, 2n * ETHER]);
		expect(first?.capacityRemaining()).toBe(0n);
		expect(second?.ledgerTotal()).toBe(2n * ETHER);
	});

	it("provisions a minipool from node capacity when none has room", () => {
		const { queue, engine, nodes, minipools } = setup();
		nodes.register(NODE, "3m", 1);
		unwrap(queue.enqueue(USER_A, GROUP, "3m", 4n * ETHER));

		const [chunk] = engine.assignChunks(THREE_MONTHS);

		expect(minipools.all()).toHaveLength(1);
		expect(chunk?.minipool).toBe(minipools.all()[0]?.address);
		expect(nodes.available(THREE_MONTHS)).toBe(0);
	});

	it("does not provision without a provisioner", () => {
		const { queue, engine, nodes, minipools } = setup({}, false);
		nodes.register(NODE, "3m", 1);
		unwrap(queue.enqueue(USER_A, GROUP, "3m", 4n * ETHER));

		expect(engine.assignChunks(THREE_MONTHS)).toEqual([]);
		expect(minipools.all()).toHaveLength(0);
	});

	it("ignores minipools of other durations", () => {
		const { queue, engine, nodes } = setup();
		unwrap(nodes.createMinipools(NODE, "6m", 1));
		unwrap(queue.enqueue(USER_A, GROUP, "3m", 4n * ETHER));

		expect(engine.assignChunks(THREE_MONTHS)).toEqual([]);
	});
});
