// Single import point for the domain types shared across layers.

export type { CheckerConfig, CLIOptions, OutputFormat } from "./config.js";
export type { Diagnostic, FileDiagnostic, ReportFn } from "./diagnostics.js";
