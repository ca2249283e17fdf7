// PURITY: CORE
// INVARIANT: Every structural body line lands in exactly one section
// INVARIANT: A section never spans a blank line
// COMPLEXITY: O(n) forward pass over the body, O(g log g) post-passes

import { bracketShape, type Opener } from "./nesting.js";
import { isAssignment, isLiteralFunctionCall } from "./parameters.js";
import type { ScannedLine } from "./scan.js";

/**
 * Kind of construct opened by a line.
 *
 * - `object`: `name = {` and typed forms (`object({`, `list(object({`)
 * - `array`: `name = [` or any `[` that starts a nested value
 * - `block`: nested block without `=` (`lifecycle {`, `dynamic "x" {`)
 * - `element`: `{` starting an array element
 * - `function`: collection literal passed to a literal function (`jsonencode({`)
 */
export type ContextKind = "object" | "array" | "block" | "element" | "function";

interface OpenContext {
	readonly kind: ContextKind;
	readonly opener: Opener;
	readonly anchorLine: number;
	readonly header: string;
	readonly suspended: SectionMember[] | null;
	/** A blank line was read while this construct was open. */
	blankInside: boolean;
}

/**
 * A structural line placed in a section, with the context it was read in.
 */
export interface SectionMember {
	readonly line: ScannedLine;
	/** Open constructs around the line, relative to the body. 0 = top level. */
	readonly depth: number;
	/** Trimmed header of the innermost open construct. */
	readonly enclosingHeader: string | null;
	/** `anchorLine:indent` when inside a literal function call. */
	readonly functionKey: string | null;
}

export type Section = readonly SectionMember[];

interface PartitionState {
	readonly finished: SectionMember[][];
	current: SectionMember[];
	readonly contexts: OpenContext[];
	readonly keyed: Map<string, SectionMember[]>;
}

const createState = (): PartitionState => ({
	finished: [],
	current: [],
	contexts: [],
	keyed: new Map(),
});

function flushCurrent(state: PartitionState): void {
	if (state.current.length > 0) state.finished.push(state.current);
	state.current = [];
}

function flushKeyed(state: PartitionState, anchorLine: number | null): void {
	for (const [key, members] of state.keyed) {
		if (anchorLine !== null && !key.startsWith(`${anchorLine}:`)) continue;
		state.finished.push(members);
		state.keyed.delete(key);
	}
}

const innermostFunction = (state: PartitionState): OpenContext | undefined =>
	state.contexts.findLast((context) => context.kind === "function");

const braceContexts = (state: PartitionState): number =>
	state.contexts.filter((context) => context.opener === "{").length;

function popContext(state: PartitionState): void {
	const context = state.contexts.pop();
	if (context === undefined) return;
	if (context.suspended !== null) {
		flushCurrent(state);
		if (!context.blankInside) state.current = context.suspended;
		else if (context.suspended.length > 0) state.finished.push(context.suspended);
	}
	if (context.kind === "function") flushKeyed(state, context.anchorLine);
}

function place(state: PartitionState, member: SectionMember): void {
	if (member.functionKey === null) {
		state.current.push(member);
		return;
	}
	const group = state.keyed.get(member.functionKey);
	if (group === undefined) state.keyed.set(member.functionKey, [member]);
	else group.push(member);
}

const startsElement = (line: ScannedLine): boolean =>
	/^[\s}\]),]*\{$/u.test(line.text.trimEnd()) && !isAssignment(line.text);

function classifyOpener(line: ScannedLine, opener: Opener): ContextKind {
	if (isLiteralFunctionCall(line.text)) return "function";
	if (opener === "[") return "array";
	if (startsElement(line)) return "element";
	return isAssignment(line.text) ? "object" : "block";
}

// Later openers on the same line (`rules = [{`) are elements or arrays
// nested inside the first one and never suspend.
const innerKind = (opener: Opener): ContextKind =>
	opener === "{" ? "element" : "array";

function pushContexts(
	state: PartitionState,
	line: ScannedLine,
	kinds: readonly { readonly kind: ContextKind; readonly opener: Opener }[],
	inFunction: boolean,
): void {
	kinds.forEach(({ kind, opener }, index) => {
		const suspends = index === 0 && kind !== "element" && !inFunction;
		const suspended = suspends ? state.current : null;
		if (suspends) state.current = [];
		state.contexts.push({
			kind,
			opener,
			anchorLine: line.lineNumber,
			header: line.text.trim(),
			suspended,
			blankInside: false,
		});
	});
}

function memberOf(state: PartitionState, line: ScannedLine): SectionMember {
	const fn = innermostFunction(state);
	return {
		line,
		depth: state.contexts.length,
		enclosingHeader: state.contexts.at(-1)?.header ?? null,
		functionKey: fn === undefined ? null : `${fn.anchorLine}:${line.indent}`,
	};
}

function stepStructural(state: PartitionState, line: ScannedLine): void {
	const shape = bracketShape(line.text);
	for (let i = 0; i < shape.closes; i++) popContext(state);

	const member = memberOf(state, line);
	const inFunction = member.functionKey !== null;
	const [first, ...rest] = shape.opens;
	if (first === undefined) {
		place(state, member);
		return;
	}
	const kind = classifyOpener(line, first);
	// A standalone `{` at brace depth zero starts its own section; the
	// elements of `}, {` stay together.
	const standalone = line.text.trim() === "{";
	if (
		kind === "element" &&
		standalone &&
		!inFunction &&
		braceContexts(state) === 0
	) {
		flushCurrent(state);
	}
	place(state, member);
	pushContexts(
		state,
		line,
		[
			{ kind, opener: first },
			...rest.map((opener) => ({ kind: innerKind(opener), opener })),
		],
		inFunction,
	);
}

function step(state: PartitionState, line: ScannedLine): PartitionState {
	if (line.suppressed) return state;
	if (line.isBlank) {
		flushCurrent(state);
		flushKeyed(state, null);
		for (const context of state.contexts) context.blankInside = true;
		return state;
	}
	if (!line.isComment) stepStructural(state, line);
	return state;
}

function finish(state: PartitionState): SectionMember[][] {
	while (state.contexts.length > 0) popContext(state);
	flushCurrent(state);
	flushKeyed(state, null);
	return state.finished;
}

const firstLine = (section: Section): number =>
	section[0]?.line.lineNumber ?? 0;

const lastLine = (section: Section): number =>
	section.at(-1)?.line.lineNumber ?? 0;

const byFirstLine = (a: Section, b: Section): number =>
	firstLine(a) - firstLine(b);

const byLine = (a: SectionMember, b: SectionMember): number =>
	a.line.lineNumber - b.line.lineNumber;

const blankBetween = (
	blankLines: readonly number[],
	from: number,
	to: number,
): boolean => blankLines.some((n) => n > from && n < to);

const topLevelParameters = (section: Section): readonly number[] =>
	section
		.filter((m) => m.depth === 0 && isAssignment(m.line.text))
		.map((m) => m.line.lineNumber);

/**
 * Merges sections that both hold top-level parameters when no blank line
 * lies between them, so an interposed nested value never breaks the
 * alignment of the parameters around it.
 *
 * @param sections - Sections ordered by first line
 * @param blankLines - Line numbers of blank body lines
 *
 * @pure true
 * @complexity O(g · b) where g = |sections|, b = |blankLines|
 */
export function mergeTopLevelRuns(
	sections: readonly Section[],
	blankLines: readonly number[],
): readonly Section[] {
	const result: SectionMember[][] = [];
	let run: { readonly target: SectionMember[]; readonly last: number } | null =
		null;
	for (const section of sections) {
		const tops = topLevelParameters(section);
		const first = tops[0];
		const last = tops.at(-1);
		if (first === undefined || last === undefined) {
			result.push([...section]);
			continue;
		}
		if (run !== null && !blankBetween(blankLines, run.last, first)) {
			run.target.push(...section);
			run.target.sort(byLine);
			run = { target: run.target, last: Math.max(run.last, last) };
			continue;
		}
		const target = [...section];
		result.push(target);
		run = { target, last };
	}
	return result;
}

const parameterCount = (section: Section): number =>
	section.filter((m) => isAssignment(m.line.text)).length;

function splitByFunctionKey(section: Section): Section[] {
	const outside = section.filter((m) => m.functionKey === null);
	const inside = new Map<string, SectionMember[]>();
	for (const m of section) {
		if (m.functionKey === null) continue;
		const bucket = inside.get(m.functionKey);
		if (bucket === undefined) inside.set(m.functionKey, [m]);
		else bucket.push(m);
	}
	return [...(outside.length > 0 ? [outside] : []), ...inside.values()];
}

/**
 * Splits sections that mix members inside a literal function call with
 * members outside it, then folds single-parameter sections into the earlier
 * section sharing their `(call site, indent)` key when no blank line
 * separates them.
 *
 * @pure true
 */
export function separateFunctionMembers(
	sections: readonly Section[],
	blankLines: readonly number[],
): readonly Section[] {
	const result: SectionMember[][] = [];
	const byKey = new Map<string, SectionMember[]>();
	for (const section of sections.flatMap(splitByFunctionKey)) {
		const key = section[0]?.functionKey ?? null;
		const existing = key === null ? undefined : byKey.get(key);
		const joins =
			existing !== undefined &&
			(parameterCount(section) <= 1 || parameterCount(existing) <= 1) &&
			!blankBetween(blankLines, lastLine(existing), firstLine(section));
		if (existing !== undefined && joins) {
			existing.push(...section);
			existing.sort(byLine);
			continue;
		}
		const owned = [...section];
		result.push(owned);
		if (key !== null) byKey.set(key, owned);
	}
	return result;
}

/**
 * Groups the lines of one block body (or a whole `.tfvars` file) into
 * sections whose parameters may have to share an `=` column.
 *
 * Sections may still mix indentation levels; the alignment engine buckets
 * parameters by level inside each section.
 *
 * @param lines - Scanned body lines in file order
 * @returns Sections ordered by first line
 *
 * @pure true
 * @complexity O(n · d) where d = maximum nesting depth
 *
 * @example
 * ```ts
 * const { lines } = scanSource('  a = 1\n  b = 2\n\n  c = 3');
 * partitionSections(lines).length; // 2
 * ```
 */
export function partitionSections(
	lines: readonly ScannedLine[],
): readonly Section[] {
	const state = lines.reduce(step, createState());
	const ordered = [...finish(state)].sort(byFirstLine);
	const blankLines = lines
		.filter((line) => line.isBlank && !line.suppressed)
		.map((line) => line.lineNumber);
	return separateFunctionMembers(
		mergeTopLevelRuns(ordered, blankLines),
		blankLines,
	);
}
