// Single import point for CLI and config-file handling.

export { parseCLIArgs } from "./cli.js";
export {
	DEFAULT_CONFIG_FILE,
	defaultCheckerConfig,
	loadCheckerConfig,
	parseCheckerConfig,
} from "./loader.js";
