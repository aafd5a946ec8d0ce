export {
	type Address,
	type DepositId,
	type DurationId,
	ZERO_ADDRESS,
	ZERO_DEPOSIT_ID,
	address,
	depositId,
	durationId,
	isAddress,
	isZeroAddress,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	flatMap,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	all,
} from "./result.js";

export {
	ErrorKind,
	FailureCode,
	PoolError,
	ValidationError,
	DisabledFeatureError,
	StateError,
	InsufficientFundsError,
	ConfigError,
	type ValidationIssue,
	isPoolError,
	isValidationError,
	isDisabledFeatureError,
	isStateError,
	isInsufficientFunds,
} from "./errors.js";

export {
	type Wei,
	type Percentage,
	CALC_BASE,
	mulDiv,
	percentOf,
	isPercentage,
	minWei,
	sumWei,
} from "./amount.js";
export { type Clock, SystemClock, FakeClock, Duration, unixSeconds } from "./time.js";
export {
	type PoolConfig,
	type DepositLimits,
	DEFAULT_POOL_CONFIG,
	withDefaults,
	limitsFor,
} from "./config.js";
