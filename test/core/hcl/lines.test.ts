// PURITY: CORE
// INVARIANT: Quote-aware helpers never treat quoted `#`, `//` or brackets as syntax

import { describe, expect, it } from "vitest";

import {
	findCommentStart,
	hasTabIndent,
	indentWidth,
	maskQuoted,
	splitSourceLines,
	stripTrailingComment,
} from "../../../src/core/hcl/lines.js";

describe("splitSourceLines", () => {
	it("numbers lines from 1 and flags blank and comment lines", () => {
		const lines = splitSourceLines("a = 1\r\n\n  # note\n// other");
		expect(lines.map((l) => [l.lineNumber, l.isBlank, l.isComment])).toEqual([
			[1, false, false],
			[2, true, false],
			[3, false, true],
			[4, false, true],
		]);
		expect(lines[0]?.rawText).toBe("a = 1");
	});
});

describe("stripTrailingComment", () => {
	it("drops a trailing hash comment and the spaces before it", () => {
		expect(stripTrailingComment('name = "a#b" # note')).toBe('name = "a#b"');
	});

	it("drops a trailing double-slash comment outside quotes", () => {
		expect(stripTrailingComment('url = "http://x" // c')).toBe('url = "http://x"');
	});

	it("keeps comment-only lines unchanged", () => {
		expect(stripTrailingComment("  # only")).toBe("  # only");
	});

	it("ignores comment markers after escaped quotes inside a string", () => {
		const line = 'msg = "say \\"hi\\" # x"';
		expect(stripTrailingComment(line)).toBe(line);
	});

	it("returns lines without comments as they are", () => {
		expect(stripTrailingComment("x = 1  ")).toBe("x = 1  ");
	});
});

describe("findCommentStart", () => {
	it("finds a comment in single-quoted context only after the quote closes", () => {
		expect(findCommentStart("a = '#' # c")).toBe(8);
	});

	it("returns null when there is no comment", () => {
		expect(findCommentStart("a = 1")).toBeNull();
	});
});

describe("maskQuoted", () => {
	it("blanks quoted content but keeps the quotes", () => {
		expect(maskQuoted('a = "x{y}" {')).toBe('a = "    " {');
	});
});

describe("indentWidth", () => {
	it("counts spaces", () => {
		expect(indentWidth("    x")).toBe(4);
	});

	it("advances a tab to the next multiple of two", () => {
		expect(indentWidth("\tx")).toBe(2);
		expect(indentWidth(" \tx")).toBe(2);
		expect(indentWidth("  \t x")).toBe(5);
	});
});

describe("hasTabIndent", () => {
	it("looks only at leading whitespace", () => {
		expect(hasTabIndent("\tx = 1")).toBe(true);
		expect(hasTabIndent("  x\t= 1")).toBe(false);
	});
});
