// PURITY: CORE
// INVARIANT: Expected indentation is two spaces per open brace or bracket

import { describe, expect, it } from "vitest";

import {
	checkIndentation,
	isTopLevelHeader,
	reconcileOdd,
} from "../../../src/core/rules/indentation.js";
import { collect, hcl } from "../../utils/builders.js";

const indentation = (filePath: string, ...lines: readonly string[]) =>
	collect(checkIndentation, filePath, hcl(...lines));

const incorrect = (actual: number, expected: number): string =>
	`Indentation level incorrect. Current indentation: ${actual} spaces, Expected: ${expected} spaces`;

describe("checkIndentation", () => {
	it("reports odd indentation against the nearest even level", () => {
		expect(indentation("main.tf", "locals {", "   a = 1", "}")).toEqual([
			{ line: 2, ruleId: "ST.005", message: incorrect(3, 2) },
		]);
		expect(
			indentation("main.tf", "locals {", "  tags = {", "     a = 1", "  }", "}"),
		).toEqual([{ line: 3, ruleId: "ST.005", message: incorrect(5, 4) }]);
	});

	it("reports missing indentation inside a block", () => {
		expect(indentation("main.tf", "locals {", "a = 1", "}")).toEqual([
			{ line: 2, ruleId: "ST.005", message: incorrect(0, 2) },
		]);
	});

	it("expects bare top-level assignments indented outside .tfvars", () => {
		expect(indentation("main.tf", "a = 1")).toEqual([
			{ line: 1, ruleId: "ST.005", message: incorrect(0, 2) },
		]);
		expect(indentation("terraform.tfvars", "a = 1")).toEqual([]);
	});

	it("expects block headers at column 0", () => {
		expect(indentation("main.tf", '  resource "a" "b" {', "  x = 1", "}")).toEqual([
			{ line: 1, ruleId: "ST.005", message: incorrect(2, 0) },
		]);
	});

	it("places leading closers at the level they close", () => {
		expect(
			indentation(
				"main.tf",
				"locals {",
				"  x = var.a ? {",
				"    k = 1",
				"  } : {",
				"    k = 2",
				"  }",
				"}",
			),
		).toEqual([]);
		expect(
			indentation(
				"main.tf",
				"locals {",
				"  x = var.a ? [",
				"    1,",
				"  ] : {",
				"    k = 2",
				"  }",
				"}",
			),
		).toEqual([]);
	});

	it("accepts array elements opened on a closing line", () => {
		expect(
			indentation(
				"main.tf",
				"locals {",
				"  z = [",
				"    {",
				"      a = 1",
				"    }, {",
				"      a = 2",
				"    },",
				"  ]",
				"}",
			),
		).toEqual([]);
	});

	it("skips comments, tab-indented lines and heredocs", () => {
		expect(
			indentation(
				"main.tf",
				'resource "x" "y" {',
				"      # note",
				"\ta = 1",
				"  content = <<EOT",
				"   weird = 1",
				"      {",
				"  EOT",
				"  other   = 2",
				"}",
			),
		).toEqual([]);
	});

	it("checks the heredoc terminator line like any other line", () => {
		expect(
			indentation(
				"main.tf",
				'resource "x" "y" {',
				"  content = <<EOT",
				"   weird",
				"EOT",
				"  other = 2",
				"}",
			),
		).toEqual([{ line: 4, ruleId: "ST.005", message: incorrect(0, 2) }]);
	});

	it("indents module blocks by depth only", () => {
		expect(indentation("main.tf", 'module "m" {', '  source = "./x"', "}")).toEqual([]);
		expect(isTopLevelHeader('module "m" {')).toBe(false);
	});

	it("keeps counting depth across a trailing comment", () => {
		expect(indentation("main.tf", "locals { # open", "  a = 1", "}")).toEqual([]);
	});
});

describe("reconcileOdd", () => {
	it.each<[number, number, number]>([
		[3, 2, 2],
		[3, 8, 4],
		[4, 2, 2],
		[1, 0, 0],
		[1, 4, 2],
	])("reconciles actual %i against expected %i to %i", (actual, expected, result) => {
		expect(reconcileOdd(actual, expected)).toBe(result);
	});
});

describe("isTopLevelHeader", () => {
	it("separates headers from assignments named like block kinds", () => {
		expect(isTopLevelHeader('data "aws_ami" "x" {')).toBe(true);
		expect(isTopLevelHeader("locals{")).toBe(true);
		expect(isTopLevelHeader("  module = 1")).toBe(false);
	});
});
