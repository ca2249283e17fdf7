// PURITY: CORE
// INVARIANT: Depth counters and heredoc state live in the fold accumulator only;
//            every call starts from zero depth and Normal heredoc state
// COMPLEXITY: O(n) where n = |content|

import {
	classifyHeredoc,
	type HeredocSpan,
	type HeredocState,
	initialHeredocState,
} from "./heredoc.js";
import {
	indentWidth,
	type SourceLine,
	splitSourceLines,
	stripTrailingComment,
} from "./lines.js";
import {
	type NestingDepth,
	type NestingState,
	updateNesting,
	zeroDepth,
} from "./nesting.js";

/**
 * A source line tagged by the shared scanner stages.
 *
 * @invariant suppressed → nesting.before = nesting.after
 */
export interface ScannedLine extends SourceLine {
	/** Line text with any trailing comment removed. */
	readonly text: string;
	readonly indent: number;
	/** Strictly inside a heredoc body. */
	readonly suppressed: boolean;
	/** Terminator line of a heredoc. */
	readonly closesHeredoc: boolean;
	readonly nesting: NestingState;
}

export interface ScanResult {
	readonly lines: readonly ScannedLine[];
	readonly heredocs: readonly HeredocSpan[];
}

interface ScanState {
	readonly heredoc: HeredocState;
	readonly depth: NestingDepth;
	readonly lines: ScannedLine[];
	readonly heredocs: HeredocSpan[];
}

const isStructural = (line: SourceLine): boolean =>
	!line.isBlank && !line.isComment;

function scanLine(state: ScanState, line: SourceLine): ScanState {
	const text = stripTrailingComment(line.rawText);
	const inHeredoc = state.heredoc.terminator !== null;
	const classification =
		inHeredoc || isStructural(line)
			? classifyHeredoc(text, line.rawText, line.lineNumber, state.heredoc)
			: { suppressed: false, closedSpan: null, state: state.heredoc };
	const counted = !classification.suppressed && isStructural(line);
	const nesting = counted
		? updateNesting(text, state.depth)
		: { before: state.depth, after: state.depth };

	state.lines.push({
		...line,
		text,
		indent: indentWidth(line.rawText),
		suppressed: classification.suppressed,
		closesHeredoc: classification.closedSpan !== null,
		nesting,
	});
	if (classification.closedSpan !== null) {
		state.heredocs.push(classification.closedSpan);
	}
	return { ...state, heredoc: classification.state, depth: nesting.after };
}

function closeDanglingHeredoc(state: ScanState): readonly HeredocSpan[] {
	const { terminator, startLine } = state.heredoc;
	if (terminator === null || startLine === null) return state.heredocs;
	return [...state.heredocs, { startLine, terminator, endLine: null }];
}

/**
 * Runs the normalizer, heredoc tracker and nesting tracker over a file.
 *
 * @param content - Raw file text
 * @returns Tagged lines plus every heredoc span found
 *
 * @pure true
 * @postcondition result.lines.length = number of physical lines
 * @complexity O(n)
 *
 * @example
 * ```ts
 * const { lines } = scanSource('locals {\n  a = 1\n}');
 * lines[1]?.nesting.before; // { brace: 1, bracket: 0 }
 * ```
 */
export function scanSource(content: string): ScanResult {
	const initial: ScanState = {
		heredoc: initialHeredocState,
		depth: zeroDepth,
		lines: [],
		heredocs: [],
	};
	const final = splitSourceLines(content).reduce(scanLine, initial);
	return { lines: final.lines, heredocs: closeDanglingHeredoc(final) };
}
