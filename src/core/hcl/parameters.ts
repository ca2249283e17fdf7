// PURITY: CORE
// INVARIANT: A ParameterLine always has a non-empty name and a real `=` assignment
// COMPLEXITY: O(n) per line

import { indentWidth, maskQuoted } from "./lines.js";

/**
 * One `name = value` line that takes part in `=` alignment.
 *
 * @invariant equalsColumn > indentSpaces
 */
export interface ParameterLine {
	readonly name: string;
	readonly isQuoted: boolean;
	readonly indentSpaces: number;
	/** 0-based column of the assignment `=`. */
	readonly equalsColumn: number;
	readonly rawLine: string;
	readonly lineNumber: number;
}

export const META_PARAMETERS: ReadonlySet<string> = new Set([
	"count",
	"for_each",
	"provider",
	"depends_on",
	"lifecycle",
]);

export const LITERAL_FUNCTIONS: readonly string[] = [
	"jsonencode",
	"merge",
	"try",
	"lookup",
	"alltrue",
	"anytrue",
	"cidrsubnet",
	"cidrhost",
	"flatten",
	"keys",
	"values",
	"zipmap",
];

const OPERATOR_BEFORE = new Set(["=", "!", "<", ">"]);
const OPERATOR_AFTER = new Set(["=", ">"]);
const PARAMETER_NAME = /^\s*(["']?)([^"'=\s]+)\1\s*$/u;
const HEADER_LINE = /^\s*(data|resource|variable|output|locals|module)\s+/u;

/**
 * Column of the assignment `=`, or null when the line assigns nothing.
 *
 * Only the first `=` outside quotes is considered; when it belongs to
 * `==`, `!=`, `<=`, `>=` or `=>` the line is not an assignment.
 *
 * @pure true
 * @example
 * ```ts
 * findAssignment('  name = "a=b"'); // 7
 * findAssignment("  k => v");       // null
 * ```
 */
export function findAssignment(text: string): number | null {
	const index = maskQuoted(text).indexOf("=");
	if (index < 0) return null;
	const operator =
		OPERATOR_BEFORE.has(text.charAt(index - 1)) ||
		OPERATOR_AFTER.has(text.charAt(index + 1));
	return operator ? null : index;
}

export const isAssignment = (text: string): boolean =>
	findAssignment(text) !== null;

/**
 * Lines that look like assignments but never align: block headers and
 * parenthesized comparison continuations.
 *
 * @pure true
 */
export function isNonParameter(text: string): boolean {
	if (HEADER_LINE.test(text)) return true;
	const trimmed = text.trimStart();
	return trimmed.startsWith("(") && (text.includes("==") || text.includes("!="));
}

/**
 * Parses a line into a ParameterLine.
 *
 * @param text - Comment-stripped line text
 * @param lineNumber - 1-based line number
 * @returns null when the text before `=` is not a single (optionally quoted) name
 *
 * @pure true
 * @example
 * ```ts
 * parseParameter('  "Name" = "web"', 4);
 * // { name: "Name", isQuoted: true, indentSpaces: 2, equalsColumn: 9, ... }
 * ```
 */
export function parseParameter(
	text: string,
	lineNumber: number,
): ParameterLine | null {
	const equalsColumn = findAssignment(text);
	if (equalsColumn === null || isNonParameter(text)) return null;
	const m = PARAMETER_NAME.exec(text.slice(0, equalsColumn));
	const name = m?.[2];
	if (m === null || name === undefined) return null;
	return {
		name,
		isQuoted: (m[1] ?? "") !== "",
		indentSpaces: indentWidth(text),
		equalsColumn,
		rawLine: text,
		lineNumber,
	};
}

/** Width the name occupies on the line, quotes included. */
export const displayWidth = (parameter: ParameterLine): number =>
	parameter.name.length + (parameter.isQuoted ? 2 : 0);

/**
 * True when the value opens a collection literal passed to one of the
 * functions whose arguments are aligned as a unit (`jsonencode({`).
 *
 * @pure true
 */
export function isLiteralFunctionCall(text: string): boolean {
	const equals = findAssignment(text);
	if (equals === null) return false;
	const value = text.slice(equals + 1).trim();
	const opensCall = LITERAL_FUNCTIONS.some((fn) => value.startsWith(`${fn}(`));
	return opensCall && (value.includes("{") || value.includes("["));
}
