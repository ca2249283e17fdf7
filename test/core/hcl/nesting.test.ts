import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	bracketShape,
	countBrackets,
	leadingClosers,
	nestingLevel,
	updateNesting,
	zeroDepth,
} from "../../../src/core/hcl/nesting.js";
import { scanSource } from "../../../src/core/hcl/scan.js";
import { hcl } from "../../utils/builders.js";

describe("countBrackets", () => {
	it("skips brackets inside quoted strings", () => {
		expect(countBrackets('tags = { "a" = "}" }')).toEqual({
			openBraces: 1,
			closeBraces: 1,
			openBrackets: 0,
			closeBrackets: 0,
		});
	});
});

describe("updateNesting", () => {
	it("opens a level for a trailing brace", () => {
		expect(updateNesting("tags = {", zeroDepth).after).toEqual({ brace: 1, bracket: 0 });
	});

	it("keeps depth for balanced inline constructs", () => {
		const depth = { brace: 1, bracket: 0 };
		expect(updateNesting("ids = [for s in x : s.id]", depth).after).toEqual(depth);
	});

	it("moves between bracket and brace on `] : {`", () => {
		expect(updateNesting("] : {", { brace: 1, bracket: 1 }).after).toEqual({
			brace: 2,
			bracket: 0,
		});
	});

	it("clamps at zero", () => {
		expect(updateNesting("}", zeroDepth).after).toEqual(zeroDepth);
	});

	it("never produces negative depth", () => {
		fc.assert(
			fc.property(fc.array(fc.constantFrom("{", "}", "[", "]", "x", " ")), (chars) => {
				const { after } = updateNesting(chars.join(""), zeroDepth);
				return after.brace >= 0 && after.bracket >= 0;
			}),
		);
	});
});

describe("nesting levels over a file", () => {
	it("tracks the depth before every line", () => {
		const { lines } = scanSource(
			hcl("locals {", "  tags = {", "    a = 1", "  }", "}"),
		);
		expect(lines.map((l) => nestingLevel(l.nesting.before))).toEqual([0, 1, 2, 2, 1]);
	});
});

describe("leadingClosers", () => {
	it.each<[string, number]>([
		["}", 1],
		["  })", 1],
		["}]", 2],
		["}, {", 1],
		["] : {", 1],
		["a = 1 }", 0],
		[")", 0],
	])("counts closers at the start of %j", (text, expected) => {
		expect(leadingClosers(text)).toBe(expected);
	});
});

describe("bracketShape", () => {
	it("reports closers left unmatched and openers left open", () => {
		expect(bracketShape("}, {")).toEqual({ closes: 1, opens: ["{"] });
		expect(bracketShape("rules = [{")).toEqual({ closes: 0, opens: ["[", "{"] });
	});

	it("cancels brackets matched on the same line", () => {
		expect(bracketShape("x = [for a in b : {k = a}]")).toEqual({ closes: 0, opens: [] });
	});
});
