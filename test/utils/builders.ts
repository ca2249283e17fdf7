// Shared fixture builders for scanner, partitioner and rule tests.

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { type ScannedLine, scanSource } from "../../src/core/hcl/scan.js";
import type { Section, SectionMember } from "../../src/core/hcl/sections.js";
import type { ReportFn } from "../../src/core/types/index.js";

/** Join source lines with LF. */
export const hcl = (...lines: readonly string[]): string => lines.join("\n");

/** `left` padded so that `=` lands on the 0-based `column`, then ` value`. */
export const assignAt = (left: string, column: number, value: string): string =>
	`${left.padEnd(column)}= ${value}`;

/** One scanned line, renumbered. */
export const scannedLine = (text: string, lineNumber: number): ScannedLine => {
	const [line] = scanSource(text).lines;
	if (line === undefined) throw new Error(`no line scanned from "${text}"`);
	return { ...line, lineNumber };
};

/** A section member at top level unless overridden. */
export const member = (
	lineNumber: number,
	text: string,
	over: Partial<Omit<SectionMember, "line">> = {},
): SectionMember => ({
	line: scannedLine(text, lineNumber),
	depth: 0,
	enclosingHeader: null,
	functionKey: null,
	...over,
});

/** Line numbers per section, for compact assertions. */
export const lineNumbers = (
	sections: readonly Section[],
): readonly (readonly number[])[] =>
	sections.map((section) => section.map((m) => m.line.lineNumber));

export interface Reported {
	readonly line: number;
	readonly ruleId: string;
	readonly message: string;
}

/** Runs a rule entry point and records what it reports. */
export const collect = (
	check: (filePath: string, content: string, report: ReportFn) => void,
	filePath: string,
	content: string,
): readonly Reported[] => {
	const reported: Reported[] = [];
	check(filePath, content, (_file, ruleId, message, line) => {
		reported.push({ line, ruleId, message });
	});
	return reported;
};

/** Creates a temporary directory populated with the given files. */
export const tempTree = (files: Readonly<Record<string, string>>): string => {
	const root = fs.mkdtempSync(path.join(os.tmpdir(), "hcl-style-"));
	for (const [relative, content] of Object.entries(files)) {
		const full = path.join(root, relative);
		fs.mkdirSync(path.dirname(full), { recursive: true });
		fs.writeFileSync(full, content);
	}
	return root;
};

export const removeTree = (root: string): void => {
	fs.rmSync(root, { recursive: true, force: true });
};
