// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Address,
	type DepositId,
	type DurationId,
	ZERO_ADDRESS,
	address,
	depositId,
	durationId,
	isAddress,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	unwrap,
	unwrapOr,
	type Wei,
	type Percentage,
	CALC_BASE,
	type Clock,
	SystemClock,
	FakeClock,
	type PoolConfig,
	type DepositLimits,
	DEFAULT_POOL_CONFIG,
	withDefaults,
	ErrorKind,
	FailureCode,
	PoolError,
	ValidationError,
	DisabledFeatureError,
	StateError,
	InsufficientFundsError,
	ConfigError,
	isPoolError,
	isValidationError,
	isDisabledFeatureError,
	isStateError,
	isInsufficientFunds,
} from "./shared/index.js";

// ── Settings ─────────────────────────────────────────────────────────
export {
	type SettingsReader,
	DepositSettings,
	configFromEnv,
	parsePoolConfig,
	loadPoolConfig,
} from "./settings/index.js";

// ── Groups ───────────────────────────────────────────────────────────
export {
	GroupRegistry,
	GroupAccessor,
	type Group,
	type GroupReader,
	type CreateGroupParams,
} from "./group/index.js";

// ── Minipools ────────────────────────────────────────────────────────
export {
	MinipoolStatus,
	type MinipoolTransition,
	type WithdrawalKind,
	type MinipoolReader,
	type MinipoolSnapshot,
	Minipool,
	MinipoolRegistry,
	NodeCapacityPool,
	permitsWithdrawal,
} from "./minipool/index.js";

// ── Deposits ─────────────────────────────────────────────────────────
export {
	DepositQueue,
	MatchingEngine,
	type DepositRecord,
	type ChunkAssignment,
} from "./deposit/index.js";

// ── Accounting ───────────────────────────────────────────────────────
export { type FeeSplit, splitFees } from "./accounting/index.js";
export { BalanceLedger } from "./ledger/index.js";
export {
	WithdrawalAccounting,
	RefundAccounting,
	type WithdrawalRequest,
	type WithdrawalReceipt,
	type RefundReceipt,
} from "./withdrawal/index.js";

// ── Guards ───────────────────────────────────────────────────────────
export {
	type Guard,
	type GuardVerdict,
	GuardChain,
	allow,
	block,
	depositGuards,
	withdrawalGuards,
	queuedRefundGuards,
	stalledRefundGuards,
} from "./guards/index.js";

// ── Events ───────────────────────────────────────────────────────────
export {
	type PoolRecord,
	type PoolRecordType,
	type RecordOf,
	EventLog,
} from "./events/index.js";

// ── API ──────────────────────────────────────────────────────────────
export {
	DepositApi,
	type DepositParams,
	type DepositOutcome,
	type StakingWithdrawalParams,
	type ExitedWithdrawalParams,
} from "./api/index.js";

// ── Composition ──────────────────────────────────────────────────────
export {
	createDepositPool,
	type DepositPool,
	type DepositPoolOptions,
	type AccountingSnapshot,
} from "./pool.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { createLogger, silentLogger, type Logger, type LogLevel } from "./lib/logger/index.js";
export { ether, formatWei, deriveDepositId, deriveAddress } from "./lib/ethereum/index.js";
