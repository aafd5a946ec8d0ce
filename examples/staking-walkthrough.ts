/**
 * Staking Walkthrough
 *
 * One group, one accessor, two users:
 * - Both deposit 4 ether into the 3m queue and are matched into a minipool
 * - The minipool launches; user 1 withdraws half, then the rest
 * - A third deposit sits below the minimum chunk and is refunded
 * - Prints balances and the conservation totals
 */

import {
	address,
	createDepositPool,
	createLogger,
	ether,
	formatWei,
	loadPoolConfig,
	unwrap,
} from "../src/index.js";

const GROUP_OWNER = address("0x0000000000000000000000000000000000000e01");
const NODE_OPERATOR = address("0x0000000000000000000000000000000000000d01");
const USER_1 = address("0x0000000000000000000000000000000000000a01");
const USER_2 = address("0x0000000000000000000000000000000000000a02");

// ── Setup ────────────────────────────────────────────────────────────

const config = loadPoolConfig();
const pool = createDepositPool({ config, logger: createLogger({ level: config.logLevel }) });

const group = unwrap(
	pool.groups.create({ owner: GROUP_OWNER, name: "Group 1", feePerc: ether("0.05") }),
);
const accessor = unwrap(pool.deployAccessor(GROUP_OWNER, group.id));
unwrap(pool.nodes.register(NODE_OPERATOR, "3m", 2));

// ── Deposit and match ────────────────────────────────────────────────

const first = unwrap(accessor.deposit(USER_1, "3m", ether("4")));
unwrap(accessor.deposit(USER_2, "3m", ether("4")));

const minipool = first.assignments[0]?.minipool;
if (minipool === undefined) {
	throw new Error("Deposit was not matched; check the chunk size settings");
}
console.log(`Matched into minipool ${minipool}`);

// ── Stake and withdraw ───────────────────────────────────────────────

unwrap(pool.minipools.transition(minipool, { type: "launch" }));

const half = unwrap(accessor.withdrawStaking(USER_1, first.deposit.id, minipool, ether("2")));
console.log(`Withdrew ${formatWei(half.amount)} gross, ${formatWei(half.net)} net`);
const rest = unwrap(accessor.withdrawStaking(USER_1, first.deposit.id, minipool, half.remaining));
console.log(`Withdrew remaining ${formatWei(rest.amount)}; ${formatWei(rest.remaining)} left`);

// ── Refund a queued deposit ──────────────────────────────────────────

const small = unwrap(accessor.deposit(USER_2, "3m", ether("1")));
const refund = unwrap(accessor.refundQueued(USER_2, "3m", small.deposit.id));
console.log(`Refunded ${formatWei(refund.amount)} to user 2`);

// ── Totals ───────────────────────────────────────────────────────────

const snapshot = pool.accountingSnapshot();
console.log("\n═══ Accounting ═══");
console.log(`Deposited:  ${formatWei(snapshot.deposited)}`);
console.log(`Queued:     ${formatWei(snapshot.queued)}`);
console.log(`Staked:     ${formatWei(snapshot.staked)}`);
console.log(`Withdrawn:  ${formatWei(snapshot.withdrawn)}`);
console.log(`Refunded:   ${formatWei(snapshot.refunded)}`);
console.log(`User 1 RPD: ${formatWei(pool.derivative.balanceOf(USER_1))}`);
console.log(`Conserved:  ${snapshot.conserved}`);
