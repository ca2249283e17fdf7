// PURITY: CORE
// INVARIANT: Heredocs never nest; a line belongs to at most one span
// COMPLEXITY: O(1) per classified line

/**
 * Scanner state: `Normal` when terminator is null, `InHeredoc` otherwise.
 */
export interface HeredocState {
	readonly terminator: string | null;
	readonly startLine: number | null;
}

/**
 * A closed (or, at end of file, unterminated) heredoc span.
 * endLine is null when the file ends before the terminator.
 */
export interface HeredocSpan {
	readonly startLine: number;
	readonly terminator: string;
	readonly endLine: number | null;
}

export interface HeredocClassification {
	readonly suppressed: boolean;
	readonly closedSpan: HeredocSpan | null;
	readonly state: HeredocState;
}

export const initialHeredocState: HeredocState = {
	terminator: null,
	startLine: null,
};

// Only uppercase terminators are recognized; `<<eot` is left alone.
const HEREDOC_START = /<<-?([A-Z]+)\s*$/u;

/**
 * Detects the terminator introduced by a heredoc start line.
 *
 * @pure true
 * @example
 * ```ts
 * heredocTerminator("policy = <<-EOT"); // "EOT"
 * heredocTerminator("x = <<eot");       // null
 * ```
 */
export function heredocTerminator(text: string): string | null {
	return HEREDOC_START.exec(text)?.[1] ?? null;
}

/**
 * Advances the heredoc state machine by one line.
 *
 * The start line and the terminator line are not suppressed; every line
 * strictly between them is.
 *
 * @param text - Comment-stripped line text (used to detect a start)
 * @param rawText - Unmodified line text (used to match the terminator)
 * @param lineNumber - 1-based line number
 * @param state - State before this line
 *
 * @pure true
 * @postcondition closedSpan ≠ null → result.state = initialHeredocState
 */
export function classifyHeredoc(
	text: string,
	rawText: string,
	lineNumber: number,
	state: HeredocState,
): HeredocClassification {
	if (state.terminator !== null) {
		if (rawText.trim() !== state.terminator) {
			return { suppressed: true, closedSpan: null, state };
		}
		return {
			suppressed: false,
			closedSpan: {
				startLine: state.startLine ?? lineNumber,
				terminator: state.terminator,
				endLine: lineNumber,
			},
			state: initialHeredocState,
		};
	}
	const terminator = heredocTerminator(text);
	return {
		suppressed: false,
		closedSpan: null,
		state:
			terminator === null ? state : { terminator, startLine: lineNumber },
	};
}
