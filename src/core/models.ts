// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable

/**
 * Exit code for the checker process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Minimal decision state for producing the exit code.
 *
 * @remarks
 * - @pure true
 * - @precondition flags are computed from diagnostics deterministically
 */
export interface DecisionState {
	readonly hasDiagnostics: boolean;
	readonly hasErrors: boolean;
}
