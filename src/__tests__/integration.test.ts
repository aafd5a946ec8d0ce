import { beforeEach, describe, expect, it } from "vitest";
import type { GroupAccessor } from "../group/group-accessor.js";
import { ether } from "../lib/ethereum/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { Minipool } from "../minipool/minipool.js";
import { MinipoolStatus } from "../minipool/types.js";
import { type DepositPool, createDepositPool } from "../pool.js";
import { DEFAULT_POOL_CONFIG } from "../shared/config.js";
import { ErrorKind, FailureCode, type PoolError } from "../shared/errors.js";
import {
	type Address,
	type DepositId,
	ZERO_ADDRESS,
	ZERO_DEPOSIT_ID,
	address,
	depositId,
} from "../shared/identifiers.js";
import { type Result, unwrap } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";

const GROUP_OWNER = address("0x0000000000000000000000000000000000000e01");
const NODE_OPERATOR = address("0x0000000000000000000000000000000000000d01");
const USER_1 = address("0x0000000000000000000000000000000000000a01");
const USER_2 = address("0x0000000000000000000000000000000000000a02");
const USER_3 = address("0x0000000000000000000000000000000000000a03");
const STRANGER = address("0x0000000000000000000000000000000000000a09");
const PROTOCOL = DEFAULT_POOL_CONFIG.protocolFeeAddress;

function failureOf<T>(result: Result<T, PoolError>): [string, string] | null {
	return result.ok ? null : [result.error.kind, result.error.code];
}

function createScenario() {
	const clock = new FakeClock(1_700_000_000_000);
	const pool = createDepositPool({ clock, logger: silentLogger() });
	const group = unwrap(
		pool.groups.create({ owner: GROUP_OWNER, name: "Group 1", feePerc: ether("0.05") }),
	);
	const accessor = unwrap(pool.deployAccessor(GROUP_OWNER, group.id));
	const [first, second] = unwrap(pool.nodes.createMinipools(NODE_OPERATOR, "3m", 2));
	if (first === undefined || second === undefined) throw new Error("expected two minipools");
	return { clock, pool, group, accessor, first, second };
}

describe("Deposit pool", () => {
	describe("staking withdrawals", () => {
		let pool: DepositPool;
		let groupId: Address;
		let accessor: GroupAccessor;
		let minipool: Minipool;
		let other: Minipool;
		let deposit1: DepositId;
		let deposit2: DepositId;

		beforeEach(() => {
			const s = createScenario();
			pool = s.pool;
			groupId = s.group.id;
			accessor = s.accessor;
			minipool = s.first;
			other = s.second;
			unwrap(accessor.deposit(USER_1, "3m", ether("4")));
			unwrap(accessor.deposit(USER_2, "3m", ether("4")));
			const d1 = pool.api.getUserQueuedDepositAt(groupId, USER_1, "3m", 0);
			const d2 = pool.api.getUserQueuedDepositAt(groupId, USER_2, "3m", 0);
			if (d1 === null || d2 === null) throw new Error("deposits not tracked");
			deposit1 = d1.id;
			deposit2 = d2.id;
		});

		const launch = () => unwrap(pool.minipools.transition(minipool.address, { type: "launch" }));

		it("matches both deposits into the first minipool", () => {
			expect(minipool.ledgerEntry(USER_1, groupId)).toBe(ether("4"));
			expect(minipool.ledgerEntry(USER_2, groupId)).toBe(ether("4"));
			expect(other.ledgerTotal()).toBe(0n);
			expect(pool.queue.queuedTotalAll()).toBe(0n);
		});

		it("cannot withdraw from a minipool that is not staking", () => {
			expect(minipool.status()).toBe(MinipoolStatus.PreLaunch);
			const result = accessor.withdrawStaking(USER_1, deposit1, minipool.address, ether("4"));
			expect(failureOf(result)).toEqual([ErrorKind.State, FailureCode.InvalidMinipoolStatus]);
		});

		it("withdraws half and then the remainder, net of fees", () => {
			launch();

			const half = unwrap(accessor.withdrawStaking(USER_1, deposit1, minipool.address, ether("2")));
			expect(half.net).toBe(ether("1.8"));
			expect(half.remaining).toBe(ether("2"));
			expect(minipool.ledgerEntry(USER_1, groupId)).toBe(ether("2"));

			const rest = unwrap(accessor.withdrawStaking(USER_1, deposit1, minipool.address, ether("2")));
			expect(rest.remaining).toBe(0n);
			expect(minipool.ledgerEntry(USER_1, groupId)).toBe(0n);

			expect(pool.derivative.balanceOf(USER_1)).toBe(ether("3.6"));
			expect(pool.derivative.balanceOf(accessor.address)).toBe(0n);
			expect(pool.derivative.balanceOf(GROUP_OWNER)).toBe(ether("0.2"));
			expect(pool.derivative.balanceOf(PROTOCOL)).toBe(ether("0.2"));
			expect(pool.events.ofType("deposit_withdraw")).toHaveLength(2);
			expect(pool.api.getDeposit(deposit1)).toBeNull();
			expect(pool.api.getUserQueuedDepositCount(groupId, USER_1, "3m")).toBe(0);
			expect(pool.accountingSnapshot().conserved).toBe(true);
		});

		it("refuses a protocol fee that would leave no room for the group fee", () => {
			launch();

			const raised = pool.settings.setProtocolFeePerc(ether("1"));
			expect(failureOf(raised)).toEqual([ErrorKind.Validation, FailureCode.InvalidFee]);

			const result = unwrap(accessor.withdrawStaking(USER_1, deposit1, minipool.address, ether("2")));
			expect(result.net).toBe(ether("1.8"));
			expect(minipool.ledgerEntry(USER_1, groupId)).toBe(ether("2"));
			expect(pool.derivative.totalSupply()).toBe(ether("2"));
			expect(pool.accountingSnapshot().conserved).toBe(true);
		});

		it("cannot withdraw a zero amount", () => {
			launch();
			const result = accessor.withdrawStaking(USER_2, deposit2, minipool.address, 0n);
			expect(failureOf(result)).toEqual([ErrorKind.Validation, FailureCode.InvalidAmount]);
		});

		it("cannot withdraw more than remains", () => {
			launch();
			const result = accessor.withdrawStaking(USER_2, deposit2, minipool.address, ether("5"));
			expect(failureOf(result)).toEqual([
				ErrorKind.InsufficientFunds,
				FailureCode.InsufficientFunds,
			]);
		});

		it.each([
			["the null deposit ID", ZERO_DEPOSIT_ID],
			["an unknown deposit ID", depositId(`0x${"0".repeat(63)}1`)],
		])("cannot withdraw with %s", (_label, id) => {
			launch();
			const result = accessor.withdrawStaking(USER_2, id, minipool.address, ether("4"));
			expect(failureOf(result)).toEqual([ErrorKind.Validation, FailureCode.InvalidDepositId]);
		});

		it("cannot withdraw from the wrong minipool or as the wrong user", () => {
			launch();
			const wrongPool = accessor.withdrawStaking(USER_2, deposit2, other.address, ether("4"));
			const wrongUser = accessor.withdrawStaking(USER_3, deposit2, minipool.address, ether("4"));

			expect(failureOf(wrongPool)).toEqual([ErrorKind.Validation, FailureCode.InvalidDepositId]);
			expect(failureOf(wrongUser)).toEqual([ErrorKind.Validation, FailureCode.InvalidDepositId]);
		});

		it("rejects withdrawals while disabled and recovers once re-enabled", () => {
			launch();
			pool.settings.setWithdrawalAllowed(false);
			const off = accessor.withdrawStaking(USER_2, deposit2, minipool.address, ether("4"));
			expect(failureOf(off)).toEqual([
				ErrorKind.DisabledFeature,
				FailureCode.WithdrawalsDisabled,
			]);

			pool.settings.setWithdrawalAllowed(true);
			const on = accessor.withdrawStaking(USER_2, deposit2, minipool.address, ether("4"));
			expect(on.ok).toBe(true);
			expect(pool.accountingSnapshot().conserved).toBe(true);
		});

		it("rejects invalid parameters sent straight to the API", () => {
			launch();
			const params = { groupId, userId: USER_2, depositId: deposit2, minipool: minipool.address };
			const amount = ether("4");

			expect(
				failureOf(pool.api.withdrawStaking(USER_2, { ...params, userId: ZERO_ADDRESS, amount })),
			).toEqual([ErrorKind.Validation, FailureCode.InvalidUser]);
			expect(
				failureOf(pool.api.withdrawStaking(USER_2, { ...params, groupId: STRANGER, amount })),
			).toEqual([ErrorKind.Validation, FailureCode.InvalidGroup]);
			expect(failureOf(pool.api.withdrawStaking(USER_2, { ...params, amount }))).toEqual([
				ErrorKind.Validation,
				FailureCode.UnauthorizedWithdrawer,
			]);
		});

		it("rejects calls that bypass the API", () => {
			launch();
			const result = pool.withdrawals.withdraw(accessor.address, {
				withdrawer: accessor.address,
				userId: USER_2,
				groupId,
				depositId: deposit2,
				minipool: minipool.address,
				amount: ether("4"),
				kind: "staking",
			});
			expect(failureOf(result)).toEqual([ErrorKind.Validation, FailureCode.UnauthorizedCaller]);
		});
	});

	describe("exited withdrawals", () => {
		it("withdraws the full entry once after exit", () => {
			const { pool, group, accessor, first } = createScenario();
			const { deposit } = unwrap(accessor.deposit(USER_1, "3m", ether("4")));
			unwrap(pool.minipools.transition(first.address, { type: "launch" }));
			unwrap(pool.minipools.transition(first.address, { type: "exit" }));

			const receipt = unwrap(accessor.withdrawExited(USER_1, deposit.id, first.address));
			const again = accessor.withdrawExited(USER_1, deposit.id, first.address);

			expect(receipt.amount).toBe(ether("4"));
			expect(receipt.net).toBe(ether("3.6"));
			expect(first.ledgerEntry(USER_1, group.id)).toBe(0n);
			expect(failureOf(again)).toEqual([ErrorKind.Validation, FailureCode.InvalidDepositId]);
		});

		it("cannot take the exited path while the minipool is staking", () => {
			const { pool, accessor, first } = createScenario();
			const { deposit } = unwrap(accessor.deposit(USER_1, "3m", ether("4")));
			unwrap(pool.minipools.transition(first.address, { type: "launch" }));

			const result = accessor.withdrawExited(USER_1, deposit.id, first.address);
			expect(failureOf(result)).toEqual([ErrorKind.State, FailureCode.InvalidMinipoolStatus]);
		});
	});

	describe("deposits", () => {
		it("records the deposit before its assignments", () => {
			const { pool, accessor } = createScenario();
			unwrap(accessor.deposit(USER_1, "3m", ether("4")));

			expect(pool.events.all().map((r) => r.type)).toEqual(["deposit", "deposit_assign"]);
		});

		it("stamps records with the pool clock in seconds", () => {
			const { pool, accessor } = createScenario();
			unwrap(accessor.deposit(USER_1, "3m", ether("1")));

			expect(pool.events.ofType("deposit")[0]?.timestamp).toBe(1_700_000_000);
		});

		it("keeps a deposit below the minimum chunk queued", () => {
			const { pool, group, accessor } = createScenario();
			const outcome = unwrap(accessor.deposit(USER_1, "3m", ether("1")));

			expect(outcome.assignments).toEqual([]);
			expect(pool.api.getUserQueuedDepositCount(group.id, USER_1, "3m")).toBe(1);
			expect(pool.queue.queuedTotalAll()).toBe(ether("1"));
		});

		it.each([
			["an unknown duration", "1y", ether("4"), FailureCode.InvalidDuration],
			["a value below the minimum", "3m", ether("0.1"), FailureCode.InvalidDeposit],
			["a value above the maximum", "3m", ether("1001"), FailureCode.InvalidDeposit],
		])("rejects %s", (_label, duration, value, code) => {
			const { pool, accessor } = createScenario();
			const result = accessor.deposit(USER_1, duration, value);

			expect(result.ok || result.error.code).toBe(code);
			expect(pool.events.size()).toBe(0);
		});

		it("rejects deposits while disabled", () => {
			const { pool, accessor } = createScenario();
			pool.settings.setDepositAllowed(false);

			expect(failureOf(accessor.deposit(USER_1, "3m", ether("4")))).toEqual([
				ErrorKind.DisabledFeature,
				FailureCode.DepositsDisabled,
			]);
		});

		it("rejects depositors the group has not authorized", () => {
			const { pool, group } = createScenario();
			const result = pool.api.deposit(
				STRANGER,
				{ groupId: group.id, userId: USER_1, durationId: "3m" },
				ether("4"),
			);

			expect(failureOf(result)).toEqual([ErrorKind.Validation, FailureCode.UnauthorizedDepositor]);
			expect(pool.queue.records()).toEqual([]);
		});

		it("provisions minipools from registered node capacity", () => {
			const pool = createDepositPool({ logger: silentLogger() });
			const group = unwrap(pool.groups.create({ owner: GROUP_OWNER, name: "G", feePerc: 0n }));
			const accessor = unwrap(pool.deployAccessor(GROUP_OWNER, group.id));
			unwrap(pool.nodes.register(NODE_OPERATOR, "6m", 1));

			const outcome = unwrap(accessor.deposit(USER_1, "6m", ether("8")));

			expect(outcome.assignments).toHaveLength(2);
			expect(pool.minipools.all()).toHaveLength(1);
			expect(pool.nodes.available(outcome.deposit.durationId)).toBe(0);
		});
	});

	describe("refunds", () => {
		it("refunds a queued deposit to the user", () => {
			const { pool, accessor } = createScenario();
			const { deposit } = unwrap(accessor.deposit(USER_1, "3m", ether("1")));

			const receipt = unwrap(accessor.refundQueued(USER_1, "3m", deposit.id));

			expect(receipt.amount).toBe(ether("1"));
			expect(pool.payouts.balanceOf(USER_1)).toBe(ether("1"));
			expect(pool.payouts.balanceOf(accessor.address)).toBe(0n);
			expect(pool.accountingSnapshot()).toMatchObject({ refunded: ether("1"), conserved: true });
		});

		it("refunds a deposit stuck in a timed-out minipool", () => {
			const { pool, accessor, first } = createScenario();
			const { deposit } = unwrap(accessor.deposit(USER_1, "3m", ether("4")));
			unwrap(pool.minipools.transition(first.address, { type: "time_out" }));

			unwrap(accessor.refundStalled(USER_1, "3m", deposit.id, first.address));

			expect(pool.payouts.balanceOf(USER_1)).toBe(ether("4"));
			expect(first.ledgerTotal()).toBe(0n);
			expect(pool.accountingSnapshot().conserved).toBe(true);
		});

		it("rejects refunds for a null user", () => {
			const { pool, group } = createScenario();
			const result = pool.api.refundQueued(STRANGER, {
				groupId: group.id,
				userId: ZERO_ADDRESS,
				durationId: "3m",
				depositId: ZERO_DEPOSIT_ID,
			});

			expect(failureOf(result)).toEqual([ErrorKind.Validation, FailureCode.InvalidUser]);
		});
	});

	describe("groups", () => {
		it("keeps at least one withdrawer", () => {
			const { pool, group, accessor } = createScenario();
			const result = pool.groups.removeWithdrawer(GROUP_OWNER, group.id, accessor.address);

			expect(failureOf(result)).toEqual([ErrorKind.State, FailureCode.LastWithdrawer]);
			expect(pool.groups.isAuthorizedWithdrawer(group.id, accessor.address)).toBe(true);
		});

		it("only lets the owner deploy accessors", () => {
			const { pool, group } = createScenario();
			const result = pool.deployAccessor(STRANGER, group.id);

			expect(result.ok || result.error.code).toBe(FailureCode.UnauthorizedGroupOwner);
		});
	});
});
