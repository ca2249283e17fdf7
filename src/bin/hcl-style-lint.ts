#!/usr/bin/env node

// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect, pipe } from "effect";

import { runChecker } from "../app/runChecker.js";
import { parseCLIArgs } from "../shell/config/index.js";
import { printError } from "../shell/output/printer.js";

/**
 * CLI entry point for hcl-style-lint.
 *
 * @remarks
 * - @pure false (contains side effects: process termination and console I/O)
 * - @invariant exit code is 0 when no diagnostics, otherwise 1
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
const program = pipe(
	parseCLIArgs(),
	Effect.matchEffect({
		onFailure: (error) => Effect.as(printError(error), 1 as const),
		onSuccess: (options) => runChecker(options),
	}),
);

Effect.runPromise(program).then(
	(code) => {
		process.exit(code);
	},
	(error: Error) => {
		console.error("Fatal error:", error);
		process.exit(1);
	},
);
