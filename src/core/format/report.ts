// PURITY: CORE
// INVARIANT: No side effects; functions are total and deterministic
// COMPLEXITY: O(n log n) where n = |diagnostics|

import { pipe } from "effect";
import { match } from "ts-pattern";

import type { AppError } from "../errors.js";
import type { FileDiagnostic } from "../types/index.js";

/**
 * Orders diagnostics by file path, then line.
 *
 * @pure true
 * @postcondition stable within one (file, line)
 */
export const sortFileDiagnostics = (
	diagnostics: readonly FileDiagnostic[],
): readonly FileDiagnostic[] =>
	[...diagnostics].sort(
		(a, b) =>
			a.filePath.localeCompare(b.filePath) || a.lineNumber - b.lineNumber,
	);

/**
 * `<file>:<line>: [<ruleId>] <message>`
 *
 * @pure true
 */
export const formatDiagnosticLine = (d: FileDiagnostic): string =>
	`${d.filePath}:${d.lineNumber}: [${d.ruleId}] ${d.message}`;

/**
 * One-line run summary.
 *
 * @pure true
 * @example
 * ```ts
 * formatSummary([]); // "✅ No formatting issues found"
 * ```
 */
export const formatSummary = (diagnostics: readonly FileDiagnostic[]): string =>
	pipe(
		new Set(diagnostics.map((d) => d.filePath)).size,
		(files) =>
			diagnostics.length === 0
				? "✅ No formatting issues found"
				: `❌ Found ${diagnostics.length} issue(s) in ${files} file(s)`,
	);

/**
 * JSON document for `--format json`.
 *
 * @pure true
 */
export const formatJsonReport = (
	diagnostics: readonly FileDiagnostic[],
): string =>
	JSON.stringify(
		sortFileDiagnostics(diagnostics).map((d) => ({
			filePath: d.filePath,
			ruleId: d.ruleId,
			lineNumber: d.lineNumber,
			message: d.message,
		})),
		null,
		2,
	);

/**
 * Human-readable description of an application error.
 *
 * @pure true
 */
export const describeAppError = (error: AppError): string =>
	match(error)
		.with({ _tag: "FS" }, (e) =>
			e.path === undefined ? e.detail : `${e.path}: ${e.detail}`,
		)
		.with({ _tag: "ConfigError" }, (e) => `Config ${e.path}: ${e.detail}`)
		.with({ _tag: "UsageError" }, (e) => e.detail)
		.exhaustive();
