// PURITY: APP (no process.exit here; console output goes through the shell printer)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Returns ExitCode as value; every AppError is printed and mapped to 1
// COMPLEXITY: O(f · n log n) where f = files, n = lines per file

import { Effect } from "effect";

import { computeExitCodeEffect } from "../core/decision.js";
import type { AppError } from "../core/errors.js";
import type { RuleId } from "../core/hcl/findings.js";
import type { ExitCode } from "../core/models.js";
import { lintSource, RULES, selectRules } from "../core/rules/index.js";
import type { CLIOptions, FileDiagnostic } from "../core/types/index.js";
import { loadCheckerConfig } from "../shell/config/index.js";
import { discoverFiles, readSource } from "../shell/fs/discover.js";
import {
	printDiagnostics,
	printError,
	printRules,
} from "../shell/output/printer.js";

const FILE_CONCURRENCY = 8;

/**
 * Reads and checks one file.
 *
 * @effect Effect<readonly FileDiagnostic[], FSError>
 */
const checkFile = (
	filePath: string,
	enabled: ReadonlySet<RuleId>,
): Effect.Effect<readonly FileDiagnostic[], AppError> =>
	Effect.map(readSource(filePath), (content) =>
		lintSource(filePath, content, enabled),
	);

/**
 * Loads config, discovers files and collects diagnostics for every file.
 * Files are independent, so they are checked concurrently.
 *
 * @effect Effect<readonly FileDiagnostic[], AppError>
 */
export function collectDiagnostics(
	cliOptions: CLIOptions,
	cwd: string,
): Effect.Effect<readonly FileDiagnostic[], AppError> {
	return Effect.gen(function* () {
		const config = yield* loadCheckerConfig(cliOptions.configPath, cwd);
		const enabled = selectRules(config.rules, cliOptions.onlyRules);
		const files = yield* discoverFiles(cliOptions.targets, config.excludeDirs);
		const perFile = yield* Effect.forEach(
			files,
			(file) => checkFile(file, enabled),
			{ concurrency: FILE_CONCURRENCY },
		);
		return perFile.flat();
	});
}

/**
 * Main orchestrator for the style check.
 *
 * @param cliOptions - Parsed command-line options
 * @param cwd - Directory searched for hcl-style.config.json
 * @returns Effect producing 0 when no diagnostics were found, otherwise 1
 *
 * @pure false - reads files and prints to the console
 * @effect Effect<ExitCode, never>
 *
 * @example
 * ```ts
 * const code = await Effect.runPromise(
 *   runChecker({ targets: ["infra"], format: "text", configPath: undefined, onlyRules: [], listRules: false }),
 * );
 * ```
 */
export function runChecker(
	cliOptions: CLIOptions,
	cwd: string = process.cwd(),
): Effect.Effect<ExitCode> {
	if (cliOptions.listRules) {
		return Effect.flatMap(printRules(RULES), () =>
			computeExitCodeEffect({ hasDiagnostics: false, hasErrors: false }),
		);
	}
	return Effect.gen(function* () {
		const diagnostics = yield* collectDiagnostics(cliOptions, cwd);
		yield* printDiagnostics(diagnostics, cliOptions.format);
		return yield* computeExitCodeEffect({
			hasDiagnostics: diagnostics.length > 0,
			hasErrors: false,
		});
	}).pipe(
		Effect.catchAll((error) =>
			Effect.flatMap(printError(error), () =>
				computeExitCodeEffect({ hasDiagnostics: false, hasErrors: true }),
			),
		),
	);
}
