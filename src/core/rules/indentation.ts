// PURITY: CORE
// INVARIANT: At most one finding per line; expected indentation is always even
// COMPLEXITY: O(n) where n = |content|

import { reportFindings } from "../hcl/diagnostics.js";
import { Finding } from "../hcl/findings.js";
import { hasTabIndent } from "../hcl/lines.js";
import { leadingClosers, nestingLevel } from "../hcl/nesting.js";
import { isAssignment } from "../hcl/parameters.js";
import { type ScannedLine, scanSource } from "../hcl/scan.js";
import type { ReportFn } from "../types/index.js";
import { isTfvarsPath } from "./alignment.js";

const TOP_LEVEL_HEADER =
	/^\s*(resource|data|provider|variable|output|locals|terraform)[\s{]/u;

/**
 * True for a block header line (no `=`), which always belongs at column 0.
 *
 * @pure true
 */
export const isTopLevelHeader = (text: string): boolean =>
	TOP_LEVEL_HEADER.test(text) && !isAssignment(text);

/**
 * Lines the indentation rule ignores: blank and comment lines, heredoc
 * bodies and tab-indented lines.
 *
 * @pure true
 */
export const isIndentationExempt = (line: ScannedLine): boolean =>
	line.isBlank ||
	line.isComment ||
	line.suppressed ||
	hasTabIndent(line.rawText);

/**
 * Expected leading spaces for a structural line.
 *
 * Closers at the start of the line (`}`, `})`, `}]`, `}, {`, `] : {`) sit at
 * the depth of the construct they close.
 *
 * @param tfvars - Flat `.tfvars` input, where top-level assignments sit at 0
 *
 * @pure true
 * @postcondition result % 2 = 0
 * @example
 * ```ts
 * // depth before = 2 (resource + tags), line "  }"
 * expectedIndent(line, false); // 2
 * ```
 */
export function expectedIndent(line: ScannedLine, tfvars: boolean): number {
	if (isTopLevelHeader(line.text)) return 0;
	const level = nestingLevel(line.nesting.before);
	const bareTopLevel =
		!tfvars && line.indent === 0 && level === 0 && isAssignment(line.text);
	if (bareTopLevel) return 2;
	return Math.max(0, level - leadingClosers(line.text)) * 2;
}

/**
 * Brings an even expectation next to an odd actual indent, so an odd
 * indent is reported once against its nearest even neighbour.
 *
 * @pure true
 * @example
 * ```ts
 * reconcileOdd(3, 2); // 2
 * reconcileOdd(3, 8); // 4
 * reconcileOdd(4, 2); // 2
 * ```
 */
export function reconcileOdd(actual: number, expected: number): number {
	if (actual % 2 === 0) return expected;
	return actual < expected ? actual + 1 : actual - 1;
}

/**
 * Runs the indentation rule over a whole file.
 *
 * @pure true
 */
export function collectIndentationFindings(
	filePath: string,
	content: string,
): readonly Finding[] {
	const tfvars = isTfvarsPath(filePath);
	return scanSource(content)
		.lines.filter((line) => !isIndentationExempt(line))
		.flatMap((line) => {
			const expected = reconcileOdd(line.indent, expectedIndent(line, tfvars));
			return line.indent === expected
				? []
				: [
						Finding.IndentationIncorrect({
							lineNumber: line.lineNumber,
							actual: line.indent,
							expected,
						}),
					];
		});
}

/**
 * Entry point of the indentation rule.
 *
 * @param filePath - Path used for reporting; `.tfvars` allows assignments at column 0
 * @param content - Raw file text
 * @param report - Receives each diagnostic in line order
 */
export function checkIndentation(
	filePath: string,
	content: string,
	report: ReportFn,
): void {
	reportFindings(filePath, collectIndentationFindings(filePath, content), report);
}
