// FORMAT THEOREM: ∀s ∈ State: (s.hasDiagnostics ∨ s.hasErrors) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { Effect, pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

const toExitCode = (failed: boolean): ExitCode => (failed ? 1 : 0);

/**
 * Computes process exit code from the run state (pure function).
 *
 * @param state - Immutable flags computed from the run
 * @returns 1 if any diagnostic or error was produced; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @postcondition (state.hasDiagnostics ∨ state.hasErrors) → result = 1
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ hasDiagnostics: true, hasErrors: false }); // 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(state, (s) => s.hasDiagnostics || s.hasErrors, toExitCode);

/**
 * Computes exit code as an Effect for composition with other Effects.
 *
 * @effect Effect<ExitCode, never, never>
 * @complexity O(1)
 */
export const computeExitCodeEffect = (
	state: DecisionState,
): Effect.Effect<ExitCode> => pipe(state, computeExitCode, Effect.succeed);
