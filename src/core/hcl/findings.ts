// PURITY: CORE
// INVARIANT: Findings are advisory values; formatting them is total and pure
// COMPLEXITY: O(1) per finding

import { Data } from "effect";
import { match } from "ts-pattern";

export const ALIGNMENT_RULE_ID = "ST.003";
export const INDENTATION_RULE_ID = "ST.005";

export type RuleId = typeof ALIGNMENT_RULE_ID | typeof INDENTATION_RULE_ID;

/**
 * Style findings produced by the rule engines.
 *
 * - `AlignmentNotAligned`: `=` is not at the group column.
 *   `expectedColumn` is 1-based; `direction` says which side the `=` sits on.
 * - `AlignmentSpacingAfterEquals`: zero or several spaces follow `=`.
 * - `AlignmentSingleSpaceBeforeEquals`: a lone parameter without exactly one
 *   space before `=`.
 * - `IndentationIncorrect`: leading spaces differ from the nesting depth.
 */
export type Finding = Data.TaggedEnum<{
	AlignmentNotAligned: {
		readonly lineNumber: number;
		readonly label: string;
		readonly requiredSpaces: number;
		readonly expectedColumn: number;
		readonly direction: "under" | "over";
	};
	AlignmentSpacingAfterEquals: {
		readonly lineNumber: number;
		readonly label: string;
		readonly found: "none" | "multiple";
	};
	AlignmentSingleSpaceBeforeEquals: {
		readonly lineNumber: number;
		readonly label: string;
	};
	IndentationIncorrect: {
		readonly lineNumber: number;
		readonly actual: number;
		readonly expected: number;
	};
}>;

export const Finding = Data.taggedEnum<Finding>();

/**
 * Rule a finding belongs to.
 *
 * @pure true
 */
export const ruleOf = (finding: Finding): RuleId =>
	finding._tag === "IndentationIncorrect"
		? INDENTATION_RULE_ID
		: ALIGNMENT_RULE_ID;

/**
 * Renders the user-facing message for a finding.
 *
 * @pure true
 * @example
 * ```ts
 * formatFinding(Finding.IndentationIncorrect({ lineNumber: 3, actual: 4, expected: 2 }));
 * // "Indentation level incorrect. Current indentation: 4 spaces, Expected: 2 spaces"
 * ```
 */
export function formatFinding(finding: Finding): string {
	return match(finding)
		.with(
			{ _tag: "AlignmentNotAligned", direction: "under" },
			(f) =>
				`Parameter assignment equals sign not aligned in ${f.label}. Expected ${f.requiredSpaces} spaces between parameter name and '=', equals sign should be at column ${f.expectedColumn}`,
		)
		.with(
			{ _tag: "AlignmentNotAligned", direction: "over" },
			(f) =>
				`Parameter assignment equals sign not aligned in ${f.label}. Too many spaces before '=', expected ${f.requiredSpaces} spaces, equals sign should be at column ${f.expectedColumn}`,
		)
		.with(
			{ _tag: "AlignmentSpacingAfterEquals", found: "none" },
			(f) =>
				`Parameter assignment should have exactly one space after '=' in ${f.label}`,
		)
		.with(
			{ _tag: "AlignmentSpacingAfterEquals", found: "multiple" },
			(f) =>
				`Parameter assignment should have exactly one space after '=' in ${f.label}, found multiple spaces`,
		)
		.with(
			{ _tag: "AlignmentSingleSpaceBeforeEquals" },
			(f) =>
				`Parameter assignment equals sign spacing incorrect in ${f.label}. Expected exactly 1 space between parameter name and '='`,
		)
		.with(
			{ _tag: "IndentationIncorrect" },
			(f) =>
				`Indentation level incorrect. Current indentation: ${f.actual} spaces, Expected: ${f.expected} spaces`,
		)
		.exhaustive();
}
