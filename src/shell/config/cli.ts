// PURITY: SHELL (reads process.argv when no arguments are given)
// INVARIANT: Parsing never throws; bad input becomes a UsageError value
// COMPLEXITY: O(n) where n = |args|

import { Effect } from "effect";

import { UsageError } from "../../core/errors.js";
import type { RuleId } from "../../core/hcl/findings.js";
import { isRuleId, RULE_IDS } from "../../core/rules/index.js";
import type { CLIOptions, OutputFormat } from "../../core/types/index.js";

interface ParseState {
	readonly targets: readonly string[];
	readonly format: OutputFormat;
	readonly configPath: string | undefined;
	readonly onlyRules: readonly RuleId[];
	readonly listRules: boolean;
}

interface ArgProcessResult {
	readonly state: ParseState;
	readonly skipNext: boolean;
}

type FlagHandler = (
	value: string | undefined,
	current: ParseState,
) => ArgProcessResult | UsageError;

const isFormat = (value: string): value is OutputFormat =>
	value === "text" || value === "json";

const missingValue = (flag: string): UsageError =>
	new UsageError({ detail: `${flag} requires a value` });

const formatFlag: FlagHandler = (value, current) => {
	if (value === undefined) return missingValue("--format");
	if (!isFormat(value)) {
		return new UsageError({
			detail: `Unknown format "${value}" (expected text or json)`,
		});
	}
	return { state: { ...current, format: value }, skipNext: true };
};

const configFlag: FlagHandler = (value, current) =>
	value === undefined
		? missingValue("--config")
		: { state: { ...current, configPath: value }, skipNext: true };

const ruleFlag: FlagHandler = (value, current) => {
	if (value === undefined) return missingValue("--rule");
	if (!isRuleId(value)) {
		return new UsageError({
			detail: `Unknown rule "${value}" (known rules: ${RULE_IDS.join(", ")})`,
		});
	}
	return {
		state: { ...current, onlyRules: [...current.onlyRules, value] },
		skipNext: true,
	};
};

const listRulesFlag: FlagHandler = (_value, current) => ({
	state: { ...current, listRules: true },
	skipNext: false,
});

const flagHandlers: ReadonlyMap<string, FlagHandler> = new Map([
	["--format", formatFlag],
	["--config", configFlag],
	["--rule", ruleFlag],
	["--list-rules", listRulesFlag],
]);

function processArgument(
	arg: string,
	next: string | undefined,
	current: ParseState,
): ArgProcessResult | UsageError {
	const handler = flagHandlers.get(arg);
	if (handler !== undefined) return handler(next, current);
	if (arg.startsWith("--")) {
		return new UsageError({ detail: `Unknown option ${arg}` });
	}
	return {
		state: { ...current, targets: [...current.targets, arg] },
		skipNext: false,
	};
}

/**
 * Parses command-line arguments.
 *
 * @param args - Arguments without the node binary and script path
 * @returns Options, or a UsageError for unknown flags and bad values
 *
 * @example
 * ```ts
 * // Command: hcl-style-lint infra/ --format json --rule ST.003
 * Effect.runSync(parseCLIArgs(["infra/", "--format", "json", "--rule", "ST.003"]));
 * // { targets: ["infra/"], format: "json", configPath: undefined, onlyRules: ["ST.003"], listRules: false }
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): Effect.Effect<CLIOptions, UsageError> {
	let state: ParseState = {
		targets: [],
		format: "text",
		configPath: undefined,
		onlyRules: [],
		listRules: false,
	};

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";
		if (arg.length === 0) continue;

		const result = processArgument(arg, args.at(i + 1), state);
		if (result instanceof UsageError) return Effect.fail(result);
		state = result.state;
		if (result.skipNext) i++;
	}

	return Effect.succeed({
		...state,
		targets: state.targets.length > 0 ? state.targets : ["."],
	});
}
