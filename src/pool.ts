/**
 * createDepositPool — composition root. Builds every component with
 * explicit dependencies and one shared clock, event log and logger.
 *
 * @example
 * ```ts
 * const pool = createDepositPool({ config: loadPoolConfig() });
 * const group = unwrap(pool.groups.create({ owner, name: "Group 1", feePerc: ether("0.05") }));
 * const accessor = unwrap(pool.deployAccessor(owner, group.id));
 * accessor.deposit(user, "3m", ether("4"));
 * ```
 */

import { DepositApi } from "./api/deposit-api.js";
import { DepositQueue } from "./deposit/deposit-queue.js";
import { MatchingEngine } from "./deposit/matching-engine.js";
import { EventLog } from "./events/event-log.js";
import { GroupAccessor } from "./group/group-accessor.js";
import { GroupRegistry } from "./group/group-registry.js";
import { BalanceLedger } from "./ledger/balance-ledger.js";
import { deriveAddress } from "./lib/ethereum/index.js";
import { type Logger, createLogger } from "./lib/logger/index.js";
import { MinipoolRegistry } from "./minipool/minipool-registry.js";
import { NodeCapacityPool } from "./minipool/node-capacity-pool.js";
import { DepositSettings } from "./settings/deposit-settings.js";
import { type Wei, sumWei } from "./shared/amount.js";
import { DEFAULT_POOL_CONFIG, type PoolConfig } from "./shared/config.js";
import type { ValidationError } from "./shared/errors.js";
import { type Address, ZERO_ADDRESS } from "./shared/identifiers.js";
import { type Result, ok } from "./shared/result.js";
import { type Clock, SystemClock } from "./shared/time.js";
import { RefundAccounting } from "./withdrawal/refund-accounting.js";
import { WithdrawalAccounting } from "./withdrawal/withdrawal-accounting.js";

export interface DepositPoolOptions {
	readonly config?: PoolConfig;
	readonly clock?: Clock;
	/** Defaults to a pino logger at the configured level */
	readonly logger?: Logger;
	/** Identity of the deposit API; derived when omitted */
	readonly apiAddress?: Address;
}

/** Value totals across the pool at one moment. */
export interface AccountingSnapshot {
	/** Every value ever deposited */
	readonly deposited: Wei;
	readonly queued: Wei;
	/** Held in minipool ledgers */
	readonly staked: Wei;
	/** Gross amount withdrawn, fees included */
	readonly withdrawn: Wei;
	readonly refunded: Wei;
	readonly derivativeSupply: Wei;
	readonly payoutSupply: Wei;
	/** deposited = queued + staked + withdrawn + refunded, and both supplies match their outflows */
	readonly conserved: boolean;
}

export interface DepositPool {
	readonly config: PoolConfig;
	readonly settings: DepositSettings;
	readonly events: EventLog;
	readonly groups: GroupRegistry;
	readonly minipools: MinipoolRegistry;
	readonly nodes: NodeCapacityPool;
	readonly queue: DepositQueue;
	readonly matching: MatchingEngine;
	/** Derivative token credited on withdrawal */
	readonly derivative: BalanceLedger;
	/** Ether returned on refund */
	readonly payouts: BalanceLedger;
	readonly withdrawals: WithdrawalAccounting;
	readonly refunds: RefundAccounting;
	readonly api: DepositApi;
	/** Creates an accessor and registers it as the group's depositor and withdrawer. */
	deployAccessor(owner: Address, groupId: Address): Result<GroupAccessor, ValidationError>;
	accountingSnapshot(): AccountingSnapshot;
}

export function createDepositPool(options: DepositPoolOptions = {}): DepositPool {
	const config = options.config ?? DEFAULT_POOL_CONFIG;
	const clock = options.clock ?? SystemClock;
	const logger = options.logger ?? createLogger({ level: config.logLevel });
	const component = (name: string): Logger => logger.child({ component: name });

	const settings = new DepositSettings(config);
	const events = EventLog.create({ clock, logger: component("event-log") });
	const groups = new GroupRegistry({ settings, logger: component("groups") });
	const minipools = MinipoolRegistry.create({ events, clock, logger: component("minipools") });
	const nodes = new NodeCapacityPool({
		registry: minipools,
		settings,
		logger: component("node-capacity"),
	});
	const queue = new DepositQueue({ settings, clock, logger: component("deposit-queue") });
	const matching = new MatchingEngine({
		queue,
		minipools,
		settings,
		events,
		provisioner: nodes,
		logger: component("matching"),
	});

	const derivative = BalanceLedger.create("RPD");
	const payouts = BalanceLedger.create("ETH");
	const apiAddress = options.apiAddress ?? deriveAddress(ZERO_ADDRESS, "deposit-api", 0n);

	const withdrawals = new WithdrawalAccounting({
		facade: apiAddress,
		settings,
		groups,
		minipools,
		queue,
		derivative,
		events,
		logger: component("withdrawals"),
	});
	const refunds = new RefundAccounting({
		facade: apiAddress,
		settings,
		groups,
		minipools,
		queue,
		payouts,
		events,
		logger: component("refunds"),
	});
	const api = new DepositApi({
		address: apiAddress,
		settings,
		groups,
		queue,
		matching,
		withdrawals,
		refunds,
		events,
		logger: component("deposit-api"),
	});

	let accessorNonce = 0n;

	function deployAccessor(
		owner: Address,
		groupId: Address,
	): Result<GroupAccessor, ValidationError> {
		const address = deriveAddress(owner, "group-accessor", accessorNonce);
		const added = groups.addAccessor(owner, groupId, address);
		if (!added.ok) return added;
		accessorNonce += 1n;
		return ok(
			new GroupAccessor({
				address,
				groupId,
				api,
				derivative,
				payouts,
				logger: component("group-accessor"),
			}),
		);
	}

	function accountingSnapshot(): AccountingSnapshot {
		const deposited = sumWei(events.ofType("deposit").map((r) => r.value));
		const withdrawn = sumWei(events.ofType("deposit_withdraw").map((r) => r.value));
		const refunded = sumWei(events.ofType("deposit_refund").map((r) => r.value));
		const queued = queue.queuedTotalAll();
		const staked = minipools.ledgerTotal();
		const derivativeSupply = derivative.totalSupply();
		const payoutSupply = payouts.totalSupply();
		return {
			deposited,
			queued,
			staked,
			withdrawn,
			refunded,
			derivativeSupply,
			payoutSupply,
			conserved:
				deposited === queued + staked + withdrawn + refunded &&
				derivativeSupply === withdrawn &&
				payoutSupply === refunded,
		};
	}

	return {
		config,
		settings,
		events,
		groups,
		minipools,
		nodes,
		queue,
		matching,
		derivative,
		payouts,
		withdrawals,
		refunds,
		api,
		deployAccessor,
		accountingSnapshot,
	};
}
