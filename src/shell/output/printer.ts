// PURITY: SHELL (console output)
// INVARIANT: Diagnostics go to stdout, errors to stderr
// COMPLEXITY: O(n log n) where n = |diagnostics|

import { Effect } from "effect";
import { match } from "ts-pattern";

import type { AppError } from "../../core/errors.js";
import {
	describeAppError,
	formatDiagnosticLine,
	formatJsonReport,
	formatSummary,
	sortFileDiagnostics,
} from "../../core/format/report.js";
import type { RuleDefinition } from "../../core/rules/index.js";
import type { FileDiagnostic, OutputFormat } from "../../core/types/index.js";

/**
 * Prints diagnostics in the requested format.
 *
 * @effect Effect<void>
 */
export function printDiagnostics(
	diagnostics: readonly FileDiagnostic[],
	format: OutputFormat,
): Effect.Effect<void> {
	return Effect.sync(() => {
		match(format)
			.with("json", () => {
				console.log(formatJsonReport(diagnostics));
			})
			.with("text", () => {
				for (const d of sortFileDiagnostics(diagnostics)) {
					console.log(formatDiagnosticLine(d));
				}
				console.log(`\n${formatSummary(diagnostics)}`);
			})
			.exhaustive();
	});
}

/**
 * Prints rule metadata for --list-rules.
 *
 * @effect Effect<void>
 */
export const printRules = (
	rules: readonly RuleDefinition[],
): Effect.Effect<void> =>
	Effect.sync(() => {
		for (const rule of rules) {
			console.log(`${rule.id}  ${rule.name}\n    ${rule.description}`);
		}
	});

/**
 * @effect Effect<void>
 */
export const printError = (error: AppError): Effect.Effect<void> =>
	Effect.sync(() => {
		console.error(`❌ ${describeAppError(error)}`);
	});
