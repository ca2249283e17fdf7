// FORMAT THEOREM: ∀ content: lintSource(content) = lintSource(content)
// FORMAT THEOREM: ∀ group aligned at the formula column: no ST.003 diagnostic
// PURITY: CORE
// INVARIANT: Heredoc bodies never produce diagnostics

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { checkAlignment } from "../../../src/core/rules/alignment.js";
import { lintSource } from "../../../src/core/rules/index.js";
import { collect, hcl } from "../../utils/builders.js";

const ALL_RULES = new Set(["ST.003", "ST.005"] as const);

const fragment = fc.constantFrom(
	"locals {",
	'resource "a" "b" {',
	"}",
	"  a = 1",
	"   bb  =  2",
	"  list = [",
	"  ]",
	"    {",
	"    },",
	"  p = jsonencode({",
	"  })",
	"  doc = <<EOT",
	"EOT",
	"",
	"# note",
	"\tx = 1",
);

const parameterName = fc.stringMatching(/^[a-z0-9_]{0,8}$/).map((s) => `p_${s}`);

describe("rule properties", () => {
	it("is deterministic", () => {
		fc.assert(
			fc.property(fc.array(fragment, { maxLength: 40 }), (lines) => {
				const content = hcl(...lines);
				expect(lintSource("main.tf", content, ALL_RULES)).toEqual(
					lintSource("main.tf", content, ALL_RULES),
				);
			}),
		);
	});

	it("accepts groups aligned at the formula column", () => {
		fc.assert(
			fc.property(
				fc.uniqueArray(parameterName, { minLength: 2, maxLength: 6 }),
				fc.boolean(),
				(names, quoted) => {
					const shown = names.map((n) => (quoted ? `"${n}"` : n));
					const width = Math.max(...shown.map((n) => n.length));
					const body = shown.map((n) => `  ${n.padEnd(width)} = 1`);
					const content = hcl("locals {", ...body, "}");
					expect(lintSource("main.tf", content, ALL_RULES)).toEqual([]);
				},
			),
		);
	});

	it("flags a lone parameter unless it has one space on each side of `=`", () => {
		fc.assert(
			fc.property(
				parameterName,
				fc.integer({ min: 0, max: 3 }),
				fc.integer({ min: 0, max: 3 }),
				(name, before, after) => {
					const line = `  ${name}${" ".repeat(before)}=${" ".repeat(after)}1`;
					const reported = collect(checkAlignment, "main.tf", hcl("locals {", line, "}"));
					expect(reported.length === 0).toBe(before === 1 && after === 1);
				},
			),
		);
	});

	it("never reports lines inside a heredoc body", () => {
		const bodyLine = fc.constantFrom(
			"{",
			"}",
			"[",
			"  x = 1",
			"   odd =  2",
			"",
			"# c",
			"\ttab",
			"<<EOF",
			'resource "r" "s" {',
		);
		fc.assert(
			fc.property(fc.array(bodyLine, { maxLength: 20 }), (body) => {
				const content = hcl(
					'resource "x" "y" {',
					"  content = <<EOT",
					...body,
					"  EOT",
					"  other   = 2",
					"}",
				);
				expect(lintSource("main.tf", content, ALL_RULES)).toEqual([]);
			}),
		);
	});
});
