// PURITY: CORE
// INVARIANT: ∀ depth d produced here: d.brace ≥ 0 ∧ d.bracket ≥ 0
// COMPLEXITY: O(n) per line where n = |line|

import { maskQuoted } from "./lines.js";

export interface NestingDepth {
	readonly brace: number;
	readonly bracket: number;
}

/**
 * Depth immediately before and after one line.
 *
 * @pure true
 */
export interface NestingState {
	readonly before: NestingDepth;
	readonly after: NestingDepth;
}

export interface BracketCounts {
	readonly openBraces: number;
	readonly closeBraces: number;
	readonly openBrackets: number;
	readonly closeBrackets: number;
}

export type Opener = "{" | "[";

/**
 * Brackets left unmatched by a single line, in source order.
 * `closes` counts closers with no opener earlier on the same line.
 */
export interface BracketShape {
	readonly closes: number;
	readonly opens: readonly Opener[];
}

export const zeroDepth: NestingDepth = { brace: 0, bracket: 0 };

const count = (text: string, char: string): number =>
	text.split(char).length - 1;

/**
 * Counts braces and brackets outside quoted strings.
 *
 * @pure true
 * @complexity O(n)
 */
export function countBrackets(text: string): BracketCounts {
	const masked = maskQuoted(text);
	return {
		openBraces: count(masked, "{"),
		closeBraces: count(masked, "}"),
		openBrackets: count(masked, "["),
		closeBrackets: count(masked, "]"),
	};
}

// opens = closes > 0 on one line is a balanced inline construct
// (`{ for … }`, `[for …]`) and leaves the depth alone.
const step = (depth: number, opens: number, closes: number): number =>
	opens === closes ? depth : Math.max(0, depth + opens - closes);

/**
 * Applies one line's bracket counts to a depth.
 *
 * @pure true
 * @invariant result.brace ≥ 0 ∧ result.bracket ≥ 0
 */
export function advanceDepth(
	depth: NestingDepth,
	counts: BracketCounts,
): NestingDepth {
	return {
		brace: step(depth.brace, counts.openBraces, counts.closeBraces),
		bracket: step(depth.bracket, counts.openBrackets, counts.closeBrackets),
	};
}

/**
 * Computes the depth before and after a line.
 *
 * @param text - Comment-stripped line text
 * @param depth - Depth carried from the previous line
 *
 * @pure true
 * @example
 * ```ts
 * updateNesting("tags = {", zeroDepth).after;            // { brace: 1, bracket: 0 }
 * updateNesting("ids = [for s in x : s.id]", zeroDepth); // unchanged
 * ```
 */
export function updateNesting(
	text: string,
	depth: NestingDepth,
): NestingState {
	return { before: depth, after: advanceDepth(depth, countBrackets(text)) };
}

export const nestingLevel = (depth: NestingDepth): number =>
	depth.brace + depth.bracket;

/**
 * Number of `}`/`]` at the very start of a line, looking through `)`, `,`
 * and whitespace. `}, {` → 1, `}]` → 2, `})` → 1, `] : {` → 1.
 *
 * @pure true
 */
export function leadingClosers(text: string): number {
	let closers = 0;
	for (const char of text) {
		if (char === "}" || char === "]") closers += 1;
		else if (char !== ")" && char !== "," && char.trim().length > 0) break;
	}
	return closers;
}

/**
 * Matches brackets within one line and returns what stays unmatched.
 *
 * @pure true
 * @example
 * ```ts
 * bracketShape("}, {");        // { closes: 1, opens: ["{"] }
 * bracketShape("rules = [{");  // { closes: 0, opens: ["[", "{"] }
 * ```
 */
export function bracketShape(text: string): BracketShape {
	const opens: Opener[] = [];
	let closes = 0;
	for (const char of maskQuoted(text)) {
		if (char === "{" || char === "[") opens.push(char);
		else if (char === "}" || char === "]") {
			if (opens.length > 0) opens.pop();
			else closes += 1;
		}
	}
	return { closes, opens };
}
