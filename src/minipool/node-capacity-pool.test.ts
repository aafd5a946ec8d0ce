import { describe, expect, it } from "vitest";
import { EventLog } from "../events/event-log.js";
import { DepositSettings } from "../settings/deposit-settings.js";
import { CALC_BASE } from "../shared/amount.js";
import { withDefaults } from "../shared/config.js";
import { FailureCode } from "../shared/errors.js";
import { address, durationId } from "../shared/identifiers.js";
import { MinipoolRegistry } from "./minipool-registry.js";
import { NodeCapacityPool } from "./node-capacity-pool.js";

const NODE_A = address("0x0000000000000000000000000000000000000d01");
const NODE_B = address("0x0000000000000000000000000000000000000d02");
const THREE_MONTHS = durationId("3m");

function createPool() {
	const registry = MinipoolRegistry.create({ events: EventLog.create() });
	const settings = new DepositSettings(withDefaults());
	const nodes = new NodeCapacityPool({ registry, settings });
	return { registry, nodes };
}

describe("NodeCapacityPool", () => {
	describe("register", () => {
		it("accumulates slots per operator", () => {
			const { nodes } = createPool();
			nodes.register(NODE_A, "3m", 1);
			nodes.register(NODE_B, "3m", 2);
			nodes.register(NODE_A, "3m", 1);
			expect(nodes.available(THREE_MONTHS)).toBe(4);
			expect(nodes.available(durationId("6m"))).toBe(0);
		});

		it("rejects unknown durations and bad slot counts", () => {
			const { nodes } = createPool();
			const unknown = nodes.register(NODE_A, "1y", 1);
			expect(unknown.ok).toBe(false);
			if (!unknown.ok) expect(unknown.error.code).toBe(FailureCode.InvalidDuration);
			expect(nodes.register(NODE_A, "3m", 0).ok).toBe(false);
			expect(nodes.register(NODE_A, "3m", 1.5).ok).toBe(false);
		});
	});

	describe("provision", () => {
		it("returns null without capacity", () => {
			const { nodes } = createPool();
			expect(nodes.provision(THREE_MONTHS)).toBeNull();
		});

		it("uses operators in registration order", () => {
			const { nodes, registry } = createPool();
			nodes.register(NODE_A, "3m", 1);
			nodes.register(NODE_B, "3m", 1);

			const first = nodes.provision(THREE_MONTHS);
			const second = nodes.provision(THREE_MONTHS);

			expect(first?.nodeOperator).toBe(NODE_A);
			expect(second?.nodeOperator).toBe(NODE_B);
			expect(nodes.provision(THREE_MONTHS)).toBeNull();
			expect(registry.all()).toHaveLength(2);
		});

		it("sizes minipools at the configured user capacity", () => {
			const { nodes } = createPool();
			nodes.register(NODE_A, "3m", 1);
			expect(nodes.provision(THREE_MONTHS)?.capacity).toBe(16n * CALC_BASE);
		});
	});

	describe("createMinipools", () => {
		it("creates PreLaunch minipools immediately", () => {
			const { nodes, registry } = createPool();
			const result = nodes.createMinipools(NODE_A, "3m", 2);

			expect(result.ok).toBe(true);
			expect(registry.prelaunchFor(THREE_MONTHS)).toHaveLength(2);
			expect(nodes.available(THREE_MONTHS)).toBe(0);
		});

		it("rejects unknown durations", () => {
			const { nodes } = createPool();
			expect(nodes.createMinipools(NODE_A, "1y", 1).ok).toBe(false);
		});
	});
});
