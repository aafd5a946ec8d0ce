export { BalanceLedger } from "./balance-ledger.js";
