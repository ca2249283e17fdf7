// PURITY: CORE
// INVARIANT: Diagnostics are write-once values; lineNumber is 1-based

/**
 * A single style violation inside one file.
 *
 * @pure true
 */
export interface Diagnostic {
	readonly ruleId: string;
	readonly message: string;
	readonly lineNumber: number;
}

/**
 * Diagnostic tagged with the file it belongs to.
 *
 * @pure true
 */
export interface FileDiagnostic extends Diagnostic {
	readonly filePath: string;
}

/**
 * Callback through which the rule entry points hand out diagnostics.
 */
export type ReportFn = (
	filePath: string,
	ruleId: string,
	message: string,
	lineNumber: number,
) => void;
