import { describe, expect, it } from "vitest";

import { ConfigError, FSError, UsageError } from "../../../src/core/errors.js";
import {
	describeAppError,
	formatDiagnosticLine,
	formatJsonReport,
	formatSummary,
	sortFileDiagnostics,
} from "../../../src/core/format/report.js";
import type { FileDiagnostic } from "../../../src/core/types/index.js";

const diag = (filePath: string, lineNumber: number, message = "m"): FileDiagnostic => ({
	filePath,
	ruleId: "ST.005",
	message,
	lineNumber,
});

describe("sortFileDiagnostics", () => {
	it("orders by file, then line", () => {
		const sorted = sortFileDiagnostics([diag("b.tf", 1), diag("a.tf", 9), diag("a.tf", 2)]);
		expect(sorted.map((d) => `${d.filePath}:${d.lineNumber}`)).toEqual([
			"a.tf:2",
			"a.tf:9",
			"b.tf:1",
		]);
	});
});

describe("formatDiagnosticLine", () => {
	it("renders file, line, rule and message", () => {
		expect(formatDiagnosticLine(diag("infra/main.tf", 7, "Bad"))).toBe(
			"infra/main.tf:7: [ST.005] Bad",
		);
	});
});

describe("formatSummary", () => {
	it("counts issues and files", () => {
		expect(formatSummary([])).toBe("✅ No formatting issues found");
		expect(formatSummary([diag("a.tf", 1), diag("a.tf", 2), diag("b.tf", 1)])).toBe(
			"❌ Found 3 issue(s) in 2 file(s)",
		);
	});
});

describe("formatJsonReport", () => {
	it("emits sorted records with a fixed key order", () => {
		const json = formatJsonReport([diag("b.tf", 1, "x"), diag("a.tf", 3, "y")]);
		expect(JSON.parse(json)).toEqual([
			{ filePath: "a.tf", ruleId: "ST.005", lineNumber: 3, message: "y" },
			{ filePath: "b.tf", ruleId: "ST.005", lineNumber: 1, message: "x" },
		]);
		expect(json.split("\n")[2]).toBe('    "filePath": "a.tf",');
	});
});

describe("describeAppError", () => {
	it("renders each error kind", () => {
		expect(describeAppError(new FSError({ detail: "path not found", path: "x.tf" }))).toBe(
			"x.tf: path not found",
		);
		expect(describeAppError(new FSError({ detail: "boom" }))).toBe("boom");
		expect(describeAppError(new ConfigError({ path: "c.json", detail: "bad" }))).toBe(
			"Config c.json: bad",
		);
		expect(describeAppError(new UsageError({ detail: "Unknown option --x" }))).toBe(
			"Unknown option --x",
		);
	});
});
