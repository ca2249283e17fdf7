// PURITY: CORE
// INVARIANT: lintSource is deterministic: same input → same diagnostics
// COMPLEXITY: O(r · n log n) where r = |enabled rules|, n = |lines|

import {
	ALIGNMENT_RULE_ID,
	INDENTATION_RULE_ID,
	type RuleId,
} from "../hcl/findings.js";
import type { FileDiagnostic, ReportFn } from "../types/index.js";
import { checkAlignment } from "./alignment.js";
import { checkIndentation } from "./indentation.js";

export type RuleCheck = (
	filePath: string,
	content: string,
	report: ReportFn,
) => void;

/**
 * Descriptive metadata for a rule, plus its entry point.
 */
export interface RuleDefinition {
	readonly id: RuleId;
	readonly name: string;
	readonly description: string;
	readonly check: RuleCheck;
}

export const RULES: readonly RuleDefinition[] = [
	{
		id: ALIGNMENT_RULE_ID,
		name: "parameter-alignment",
		description:
			"Align the '=' of sibling parameters to one column (longest name + 1) with exactly one space after '='.",
		check: checkAlignment,
	},
	{
		id: INDENTATION_RULE_ID,
		name: "indentation",
		description:
			"Indent each line by two spaces per level of brace/bracket nesting.",
		check: checkIndentation,
	},
];

export const RULE_IDS: readonly RuleId[] = RULES.map((rule) => rule.id);

export const isRuleId = (value: string): value is RuleId =>
	RULE_IDS.some((id) => id === value);

/**
 * Runs the enabled rules over one file and collects their diagnostics.
 *
 * Diagnostics of each rule arrive sorted by line; the combined list is sorted
 * by line, keeping rule order for diagnostics on the same line.
 *
 * @pure true
 * @example
 * ```ts
 * lintSource("main.tf", "locals {\n   a = 1\n}", new Set(["ST.005"]));
 * // [{ filePath: "main.tf", ruleId: "ST.005", lineNumber: 2, message: "Indentation level incorrect. ..." }]
 * ```
 */
export function lintSource(
	filePath: string,
	content: string,
	enabled: ReadonlySet<RuleId>,
): readonly FileDiagnostic[] {
	const collected: FileDiagnostic[] = [];
	const collect: ReportFn = (file, ruleId, message, lineNumber) => {
		collected.push({ filePath: file, ruleId, message, lineNumber });
	};
	for (const rule of RULES) {
		if (enabled.has(rule.id)) rule.check(filePath, content, collect);
	}
	return collected.sort((a, b) => a.lineNumber - b.lineNumber);
}

/**
 * Rules to run: enabled in the config and, when --rule was given, named there.
 *
 * @pure true
 * @example
 * ```ts
 * selectRules({ "ST.003": true, "ST.005": false }, []); // Set { "ST.003" }
 * ```
 */
export function selectRules(
	configured: Readonly<Record<RuleId, boolean>>,
	only: readonly RuleId[],
): ReadonlySet<RuleId> {
	return new Set(
		RULE_IDS.filter(
			(id) => configured[id] && (only.length === 0 || only.includes(id)),
		),
	);
}
