export type { SettingsReader } from "./types.js";
export { DepositSettings } from "./deposit-settings.js";
export {
	configFromEnv,
	parsePoolConfig,
	checkConsistency,
	loadPoolConfig,
} from "./config-loader.js";
