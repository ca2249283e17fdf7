// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or the APP orchestrator

// ═══════════════════════════════════════════════════════════════════════════════
// RULE ENTRY POINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Rule entry points. Each takes raw file text and a reporter.
 *
 * @example
 * ```typescript
 * import { checkAlignment, checkIndentation } from "hcl-style-lint";
 *
 * const report = (file: string, ruleId: string, message: string, line: number) =>
 *   console.log(`${file}:${line} [${ruleId}] ${message}`);
 *
 * checkAlignment("main.tf", source, report);
 * checkIndentation("main.tf", source, report);
 * ```
 */
export { checkAlignment } from "./core/rules/alignment.js";
export { checkIndentation } from "./core/rules/indentation.js";
export {
	lintSource,
	RULES,
	type RuleDefinition,
	selectRules,
} from "./core/rules/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * @pure false - reads files and prints to the console
 * @returns Effect of ExitCode (0 = clean, 1 = diagnostics or errors)
 */
export { runChecker } from "./app/runChecker.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type { ExitCode } from "./core/models.js";
export type {
	CheckerConfig,
	CLIOptions,
	Diagnostic,
	FileDiagnostic,
	OutputFormat,
	ReportFn,
} from "./core/types/index.js";
export {
	ALIGNMENT_RULE_ID,
	Finding,
	formatFinding,
	INDENTATION_RULE_ID,
	type RuleId,
} from "./core/hcl/findings.js";
export type { AppError, ConfigError, FSError, UsageError } from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURAL SCANNER (Pure Building Blocks)
// ═══════════════════════════════════════════════════════════════════════════════

export { type Block, blockLabel, extractBlocks } from "./core/hcl/blocks.js";
export type { HeredocSpan } from "./core/hcl/heredoc.js";
export { type ScannedLine, type ScanResult, scanSource } from "./core/hcl/scan.js";
export {
	partitionSections,
	type Section,
	type SectionMember,
} from "./core/hcl/sections.js";
export {
	type AlignmentGroup,
	collectAlignmentFindings,
	toAlignmentGroups,
} from "./core/rules/alignment.js";
export { collectIndentationFindings } from "./core/rules/indentation.js";
