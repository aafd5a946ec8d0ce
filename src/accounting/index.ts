export { type FeeSplit, splitFees, checkFeeRates } from "./fee-split.js";
