// PURITY: CORE
// INVARIANT: Configuration values are immutable after loading

import type { RuleId } from "../hcl/findings.js";

export type OutputFormat = "text" | "json";

/**
 * Settings read from hcl-style.config.json.
 *
 * @property rules Rule switches; a missing key means enabled
 * @property excludeDirs Directory names skipped while walking targets
 */
export interface CheckerConfig {
	readonly rules: Readonly<Record<RuleId, boolean>>;
	readonly excludeDirs: readonly string[];
}

/**
 * Command-line options.
 *
 * @property targets Files or directories to check
 * @property format Output format
 * @property configPath Explicit config file, or undefined for the default
 * @property onlyRules Rules named with --rule; empty means all enabled rules
 * @property listRules Print rule metadata and exit
 */
export interface CLIOptions {
	readonly targets: readonly string[];
	readonly format: OutputFormat;
	readonly configPath: string | undefined;
	readonly onlyRules: readonly RuleId[];
	readonly listRules: boolean;
}
