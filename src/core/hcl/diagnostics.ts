// PURITY: CORE
// INVARIANT: Output is sorted by line ascending and unique by (line, message)
// COMPLEXITY: O(n log n)

import type { Diagnostic, ReportFn } from "../types/index.js";
import { type Finding, formatFinding, ruleOf } from "./findings.js";

export const toDiagnostic = (finding: Finding): Diagnostic => ({
	ruleId: ruleOf(finding),
	message: formatFinding(finding),
	lineNumber: finding.lineNumber,
});

/**
 * Deduplicates by (line, message) and sorts by line. The sort is stable, so
 * messages on one line keep the order the engine produced them in.
 *
 * @pure true
 * @example
 * ```ts
 * finalizeDiagnostics([d3, d1, d3]); // [d1, d3]
 * ```
 */
export function finalizeDiagnostics(
	diagnostics: readonly Diagnostic[],
): readonly Diagnostic[] {
	const seen = new Set<string>();
	const unique = diagnostics.filter((d) => {
		const key = `${d.lineNumber}\u0000${d.message}`;
		if (seen.has(key)) return false;
		seen.add(key);
		return true;
	});
	return [...unique].sort((a, b) => a.lineNumber - b.lineNumber);
}

/**
 * Hands the findings of one file to a reporter, finalized.
 *
 * @pure false - invokes the caller's callback
 */
export function reportFindings(
	filePath: string,
	findings: readonly Finding[],
	report: ReportFn,
): void {
	for (const d of finalizeDiagnostics(findings.map(toDiagnostic))) {
		report(filePath, d.ruleId, d.message, d.lineNumber);
	}
}
