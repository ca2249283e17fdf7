import { describe, expect, it } from "vitest";

import { scanSource } from "../../../src/core/hcl/scan.js";
import { hcl } from "../../utils/builders.js";

describe("scanSource", () => {
	it("keeps raw text and strips trailing comments into text", () => {
		const [line] = scanSource('  a = "x" # note').lines;
		expect(line?.rawText).toBe('  a = "x" # note');
		expect(line?.text).toBe('  a = "x"');
		expect(line?.indent).toBe(2);
	});

	it("does not count brackets on comment lines", () => {
		const { lines } = scanSource(hcl("locals {", "  # {", "  a = 1", "}"));
		expect(lines[2]?.nesting.before).toEqual({ brace: 1, bracket: 0 });
	});

	it("does not count brackets inside trailing comments", () => {
		const { lines } = scanSource(hcl("a = 1 # {", "b = 2"));
		expect(lines[1]?.nesting.before).toEqual({ brace: 0, bracket: 0 });
	});

	it("starts every call from zero depth", () => {
		scanSource("locals {");
		const [line] = scanSource("a = 1").lines;
		expect(line?.nesting.before).toEqual({ brace: 0, bracket: 0 });
	});
});
