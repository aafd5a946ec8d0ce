import { bench, describe } from "vitest";
import { ether } from "../src/lib/ethereum/index.js";
import { silentLogger } from "../src/lib/logger/index.js";
import { createDepositPool } from "../src/pool.js";
import { address } from "../src/shared/identifiers.js";
import { unwrap } from "../src/shared/result.js";

const OWNER = address("0x0000000000000000000000000000000000000e01");
const NODE = address("0x0000000000000000000000000000000000000d01");
const USERS = Array.from({ length: 50 }, (_, i) =>
	address(`0x${(0xa00 + i).toString(16).padStart(40, "0")}`),
);

function freshPool() {
	const pool = createDepositPool({ logger: silentLogger() });
	const group = unwrap(pool.groups.create({ owner: OWNER, name: "Bench", feePerc: ether("0.05") }));
	const accessor = unwrap(pool.deployAccessor(OWNER, group.id));
	unwrap(pool.nodes.register(NODE, "3m", 1_000));
	return { pool, accessor };
}

describe("deposit matching", () => {
	bench("500 deposits of 1.5 ether", () => {
		const { accessor } = freshPool();
		for (let i = 0; i < 500; i++) {
			const user = USERS[i % USERS.length];
			if (user) accessor.deposit(user, "3m", ether("1.5"));
		}
	});

	bench("500 deposits then full staking withdrawals", () => {
		const { pool, accessor } = freshPool();
		for (let i = 0; i < 500; i++) {
			const user = USERS[i % USERS.length];
			if (user) accessor.deposit(user, "3m", ether("4"));
		}
		for (const m of pool.minipools.all()) {
			pool.minipools.transition(m.address, { type: "launch" });
		}
		for (const record of pool.queue.records()) {
			for (const [minipool, amount] of record.stakingPools) {
				accessor.withdrawStaking(record.userId, record.id, minipool, amount);
			}
		}
	});
});
