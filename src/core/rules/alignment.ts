// PURITY: CORE
// INVARIANT: Members exempt from reporting still widen the group column
// INVARIANT: ∀ group with |members| ≥ 2 whose `=` all sit at expectedColumn: no column finding
// COMPLEXITY: O(n log n) where n = |lines|

import { pipe } from "effect";

import { blockLabel, extractBlocks } from "../hcl/blocks.js";
import { reportFindings } from "../hcl/diagnostics.js";
import { Finding } from "../hcl/findings.js";
import {
	displayWidth,
	META_PARAMETERS,
	type ParameterLine,
	parseParameter,
} from "../hcl/parameters.js";
import { scanSource } from "../hcl/scan.js";
import { partitionSections, type Section } from "../hcl/sections.js";
import type { ReportFn } from "../types/index.js";

/**
 * Parameters that must share one `=` column.
 *
 * @invariant ∀ m ∈ members: ⌊m.indentSpaces / 2⌋ = indentLevel
 */
export interface AlignmentGroup {
	readonly indentLevel: number;
	readonly members: readonly ParameterLine[];
}

/**
 * Chooses the 0-based `=` column for a group with two or more members.
 * null accepts the group as it stands.
 */
export type ColumnPolicy = (group: AlignmentGroup) => number | null;

/**
 * How a file kind aligns its groups: the column to hold, and the members
 * that set the column but are never reported themselves.
 */
export interface GroupPolicy {
	readonly column: ColumnPolicy;
	readonly silent: (parameter: ParameterLine) => boolean;
}

const isRequiredProvidersEntry = (header: string | null): boolean =>
	header?.startsWith("required_providers") ?? false;

/**
 * Turns one section into indentation-homogeneous alignment groups.
 *
 * @pure true
 * @postcondition groups keep the order in which their first member appears
 */
export function toAlignmentGroups(section: Section): readonly AlignmentGroup[] {
	const byLevel = new Map<number, ParameterLine[]>();
	for (const member of section) {
		if (isRequiredProvidersEntry(member.enclosingHeader)) continue;
		const parameter = parseParameter(member.line.text, member.line.lineNumber);
		if (parameter === null) continue;
		const level = Math.floor(parameter.indentSpaces / 2);
		const bucket = byLevel.get(level);
		if (bucket === undefined) byLevel.set(level, [parameter]);
		else bucket.push(parameter);
	}
	return [...byLevel].map(([indentLevel, members]) => ({ indentLevel, members }));
}

/**
 * Whether a member's own alignment is checked. Tab-indented lines,
 * odd indentation and meta-parameters are skipped.
 *
 * @pure true
 */
export const isReportable = (parameter: ParameterLine): boolean =>
	!parameter.rawLine.includes("\t") &&
	parameter.indentSpaces % 2 === 0 &&
	!META_PARAMETERS.has(parameter.name);

const longestName = (members: readonly ParameterLine[]): number =>
	Math.max(0, ...members.map((m) => m.name.length));

function columnFor(group: AlignmentGroup, longest: number): number {
	const quoteChars = group.members.some((m) => m.isQuoted) ? 2 : 0;
	return group.indentLevel * 2 + longest + quoteChars + 1;
}

/**
 * `indentLevel×2 + longest name + 2 if any name is quoted + 1`.
 *
 * @pure true
 * @example
 * ```ts
 * // "  a = 1" and "  bb = 2"
 * formulaColumn(group); // 5
 * ```
 */
export function formulaColumn(group: AlignmentGroup): number {
	return columnFor(group, longestName(group.members));
}

/**
 * A nested `.tfvars` declaration: an indented member whose value opens an
 * object or a list (`  tags = {`, `  subnets = [`).
 *
 * @pure true
 */
export function isNestedDeclaration(parameter: ParameterLine): boolean {
	const value = parameter.rawLine.slice(parameter.equalsColumn + 1).trimStart();
	return parameter.indentSpaces > 0 && (value.startsWith("{") || value.startsWith("["));
}

/**
 * Formula column for `.tfvars` groups. Nested declarations only widen it
 * when their name is at least four characters longer than every other.
 *
 * @pure true
 */
export function tfvarsFormulaColumn(group: AlignmentGroup): number {
	const plain = group.members.filter((m) => !isNestedDeclaration(m));
	if (plain.length === 0) return formulaColumn(group);
	const longest = longestName(plain);
	const nested = longestName(group.members.filter(isNestedDeclaration));
	return columnFor(group, nested - longest >= 4 ? nested : longest);
}

interface ColumnTally {
	readonly column: number;
	readonly count: number;
}

function mostCommonColumn(columns: readonly number[]): ColumnTally | null {
	const tally = new Map<number, number>();
	for (const column of columns) tally.set(column, (tally.get(column) ?? 0) + 1);
	let best: ColumnTally | null = null;
	for (const [column, count] of tally) {
		if (best === null || count > best.count) best = { column, count };
	}
	return best;
}

/**
 * Column policy for `.tfvars` files.
 *
 * A group already aligned at one column at or right of the formula column
 * is accepted. Otherwise a strict majority column shared by two or more
 * members wins when it is the formula column or the one after it.
 *
 * @pure true
 */
export const tfvarsColumn: ColumnPolicy = (group) => {
	const formula = tfvarsFormulaColumn(group);
	const columns = group.members
		.filter((m) => !m.rawLine.includes("\t"))
		.map((m) => m.equalsColumn);
	const distinct = new Set(columns);
	const [only] = distinct;
	if (distinct.size === 1 && only !== undefined) {
		return only >= formula ? null : formula;
	}
	const best = mostCommonColumn(columns);
	if (best === null || best.count < 2 || best.count * 2 <= columns.length) {
		return formula;
	}
	return best.column >= formula && best.column < formula + 2
		? best.column
		: formula;
};

export const blockColumn: ColumnPolicy = formulaColumn;

const BLOCK_POLICY: GroupPolicy = { column: blockColumn, silent: () => false };

const TFVARS_POLICY: GroupPolicy = {
	column: tfvarsColumn,
	silent: isNestedDeclaration,
};

function spacingAfter(parameter: ParameterLine, label: string): Finding[] {
	const after = parameter.rawLine.slice(parameter.equalsColumn + 1);
	if (after.startsWith("  ")) {
		return [
			Finding.AlignmentSpacingAfterEquals({
				lineNumber: parameter.lineNumber,
				label,
				found: "multiple",
			}),
		];
	}
	if (after.startsWith(" ")) return [];
	return [
		Finding.AlignmentSpacingAfterEquals({
			lineNumber: parameter.lineNumber,
			label,
			found: "none",
		}),
	];
}

function singleSpaceBefore(parameter: ParameterLine, label: string): Finding[] {
	const before = parameter.rawLine.slice(0, parameter.equalsColumn);
	const spaces = before.length - before.trimEnd().length;
	if (!isReportable(parameter) || spaces === 1) return [];
	return [
		Finding.AlignmentSingleSpaceBeforeEquals({
			lineNumber: parameter.lineNumber,
			label,
		}),
	];
}

function columnFindings(
	group: AlignmentGroup,
	expected: number,
	label: string,
): Finding[] {
	return group.members
		.filter((m) => isReportable(m) && m.equalsColumn !== expected)
		.map((m) =>
			Finding.AlignmentNotAligned({
				lineNumber: m.lineNumber,
				label,
				requiredSpaces: expected - m.indentSpaces - displayWidth(m),
				expectedColumn: expected + 1,
				direction: m.equalsColumn < expected ? "under" : "over",
			}),
		);
}

/**
 * Checks one alignment group: column placement first, then the spacing
 * after every `=`.
 *
 * @pure true
 * @complexity O(|members|)
 */
export function checkGroup(
	group: AlignmentGroup,
	label: string,
	policy: GroupPolicy,
): readonly Finding[] {
	const audible = group.members.filter((m) => !policy.silent(m));
	const after = audible.flatMap((m) => spacingAfter(m, label));
	const [single] = group.members;
	if (group.members.length === 1 && single !== undefined) {
		const before = policy.silent(single) ? [] : singleSpaceBefore(single, label);
		return [...before, ...after];
	}
	const expected = policy.column(group);
	const placement =
		expected === null
			? []
			: columnFindings({ ...group, members: audible }, expected, label);
	return [...placement, ...after];
}

const checkSections = (
	sections: readonly Section[],
	label: string,
	policy: GroupPolicy,
): readonly Finding[] =>
	sections
		.flatMap(toAlignmentGroups)
		.flatMap((group) => checkGroup(group, label, policy));

export const isTfvarsPath = (filePath: string): boolean =>
	filePath.endsWith(".tfvars");

/**
 * Runs the alignment rule over a whole file.
 *
 * `.tfvars` files are treated as one flat body labelled `tfvars`; other files
 * are checked block by block.
 *
 * @pure true
 * @complexity O(n log n)
 */
export function collectAlignmentFindings(
	filePath: string,
	content: string,
): readonly Finding[] {
	const { lines } = scanSource(content);
	if (isTfvarsPath(filePath)) {
		return checkSections(partitionSections(lines), "tfvars", TFVARS_POLICY);
	}
	return extractBlocks(lines).flatMap((block) =>
		pipe(block.bodyLines, partitionSections, (sections) =>
			checkSections(sections, blockLabel(block), BLOCK_POLICY),
		),
	);
}

/**
 * Entry point of the `=` alignment rule.
 *
 * @param filePath - Path used for reporting; a `.tfvars` suffix selects the flat path
 * @param content - Raw file text
 * @param report - Receives each diagnostic, sorted by line, without duplicates
 *
 * @example
 * ```ts
 * checkAlignment("main.tf", 'resource "x" "y" {\n  a = 1\n  bb = 2\n}', (file, rule, message, line) => {
 *   console.log(`${file}:${line} [${rule}] ${message}`);
 * });
 * ```
 */
export function checkAlignment(
	filePath: string,
	content: string,
	report: ReportFn,
): void {
	reportFindings(filePath, collectAlignmentFindings(filePath, content), report);
}
