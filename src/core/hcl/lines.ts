// PURITY: CORE
// INVARIANT: Every produced SourceLine is immutable; lineNumber is 1-based
// COMPLEXITY: O(n) per line where n = |line|

/**
 * One physical line of an HCL source file.
 *
 * @pure true
 * @invariant isBlank → ¬isComment
 */
export interface SourceLine {
	readonly rawText: string;
	readonly lineNumber: number;
	readonly isComment: boolean;
	readonly isBlank: boolean;
}

const COMMENT_PREFIXES: readonly string[] = ["#", "//"];

/**
 * Splits file content into classified source lines.
 *
 * @param content - Raw file text (LF or CRLF line endings)
 * @returns One SourceLine per physical line, in file order
 *
 * @pure true
 * @postcondition result[i].lineNumber = i + 1
 * @complexity O(n) where n = |content|
 */
export function splitSourceLines(content: string): readonly SourceLine[] {
	return content.split(/\r?\n/u).map((rawText, index) => {
		const trimmed = rawText.trim();
		return {
			rawText,
			lineNumber: index + 1,
			isBlank: trimmed.length === 0,
			isComment: COMMENT_PREFIXES.some((prefix) => trimmed.startsWith(prefix)),
		};
	});
}

/**
 * Walks a line left to right, reporting for each character whether it sits
 * inside a quoted string. The opening and closing quote characters themselves
 * are reported as outside.
 *
 * @pure true
 * @complexity O(n)
 */
function forEachChar(
	line: string,
	visit: (char: string, index: number, quoted: boolean) => boolean,
): void {
	let quote: string | null = null;
	for (let i = 0; i < line.length; i++) {
		const char = line.charAt(i);
		const escaped = i > 0 && line.charAt(i - 1) === "\\";
		if (quote !== null) {
			if (char === quote && !escaped) quote = null;
			if (!visit(char, i, quote !== null)) return;
			continue;
		}
		if (char === '"' || char === "'") quote = char;
		if (!visit(char, i, false)) return;
	}
}

/**
 * Finds where a trailing comment starts, outside any quoted string.
 *
 * @returns Index of `#` or `//`, or null when the line carries no comment
 * @pure true
 */
export function findCommentStart(line: string): number | null {
	let found: number | null = null;
	forEachChar(line, (char, index, quoted) => {
		if (quoted) return true;
		const startsComment =
			char === "#" || (char === "/" && line.charAt(index + 1) === "/");
		if (startsComment) found = index;
		return !startsComment;
	});
	return found;
}

/**
 * Removes a trailing comment outside quotes.
 *
 * Columns of the remaining text are unchanged, so `=` positions computed on
 * the result match the raw line. A comment-only line is returned as is.
 *
 * @pure true
 * @invariant result is a prefix of line
 * @complexity O(n)
 *
 * @example
 * ```ts
 * stripTrailingComment('name = "a#b" # note'); // 'name = "a#b"'
 * ```
 */
export function stripTrailingComment(line: string): string {
	const start = findCommentStart(line);
	if (start === null) return line;
	const before = line.slice(0, start);
	return before.trim().length === 0 ? line : before.trimEnd();
}

/**
 * Replaces the contents of quoted strings with spaces, keeping the quotes and
 * the line length. Structural scans (brackets, `=`) run on the masked text.
 *
 * @pure true
 * @postcondition result.length = line.length
 */
export function maskQuoted(line: string): string {
	const chars: string[] = [];
	forEachChar(line, (char, _index, quoted) => {
		chars.push(quoted ? " " : char);
		return true;
	});
	return chars.join("");
}

/**
 * Leading whitespace width, with tabs advancing to the next multiple of 2.
 *
 * @pure true
 */
export function indentWidth(line: string): number {
	let width = 0;
	for (const char of line) {
		if (char === " ") width += 1;
		else if (char === "\t") width += 2 - (width % 2);
		else break;
	}
	return width;
}

export const leadingWhitespace = (line: string): string =>
	line.slice(0, line.length - line.trimStart().length);

export const hasTabIndent = (line: string): boolean =>
	leadingWhitespace(line).includes("\t");
