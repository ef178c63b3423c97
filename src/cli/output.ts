import type { EntityReport, LibraryReport, RuleResult, UnitTestResult } from "@klc/rules/engine";
import type { Violation } from "@klc/rules/types";

export interface PrintOptions {
  verbose: number;
  silent: boolean;
  noWarnings: boolean;
}

const pad = (n: number) => " ".repeat(n);

function violationLines(v: Violation, verbose: number): string[] {
  const icon = v.severity === "error" ? "❌" : "⚠️ ";
  const lines = [`${pad(4)}${icon} ${v.message}`];
  if (verbose >= 2) lines.push(...v.extras.map(e => `${pad(7)}- ${e}`));
  return lines;
}

function resultShown(result: RuleResult, noWarnings: boolean): boolean {
  if (result.violations.length === 0) return false;
  return !noWarnings || result.violations.some(v => v.severity === "error");
}

/**
 * Console lines for one checked entity: a header, then every rule with
 * output. Empty when the entity is clean and `silent` is set.
 */
export function entityLines(report: EntityReport, options: PrintOptions): string[] {
  const header = `Checking ${report.kind} '${report.library}:${report.name}':`;
  const body: string[] = [];

  for (const result of report.results) {
    if (!resultShown(result, options.noWarnings)) continue;
    if (result.exception) {
      body.push(
        `${pad(2)}Exception ${report.library}:${report.name}, Rule: ${result.rule} - ${result.url}, Note: ${result.exception.notes.join("; ")}`
      );
    } else {
      body.push(`${pad(2)}Violating ${result.rule} - ${result.url}`);
    }
    if (options.verbose >= 1) body.push(`${pad(4)}${result.description}`);
    for (const v of result.violations) {
      if (options.noWarnings && v.severity !== "error") continue;
      body.push(...violationLines(v, options.verbose));
    }
  }
  if (report.referenceErrors.length > 0) {
    body.push(`${pad(2)}Inheritance errors`);
    body.push(...report.referenceErrors.map(e => `${pad(4)}❌ ${e}`));
  }
  if (!options.noWarnings && report.issues.length > 0) {
    body.push(`${pad(2)}File format problems`);
    body.push(...report.issues.map(i => `${pad(4)}⚠️  ${i}`));
  }

  if (body.length === 0) return options.silent ? [] : [`✅ ${header}`];
  return [`🔍 ${header}`, ...body];
}

export function libraryLines(report: LibraryReport, options: PrintOptions): string[] {
  const lines: string[] = [];
  for (const err of report.loadErrors) {
    lines.push(`❌  Could not parse library: ${report.file ?? report.library}. (${err.message})`);
  }
  for (const entity of report.entities) lines.push(...entityLines(entity, options));
  return lines;
}

export function unitTestLine(result: UnitTestResult): string {
  return `${result.passed ? "✅" : "❌"} ${result.message}`;
}

export function summaryLine(reports: readonly LibraryReport[]): string {
  const entities = reports.reduce((n, r) => n + r.entities.length, 0);
  const errors = reports.reduce((n, r) => n + r.errors, 0);
  const warnings = reports.reduce((n, r) => n + r.warnings, 0);
  const icon = errors > 0 ? "❌" : warnings > 0 ? "⚠️ " : "✅";
  return `\n${icon} Checked ${entities} item${entities === 1 ? "" : "s"} in ${reports.length} librar${reports.length === 1 ? "y" : "ies"}: ${errors} error${errors === 1 ? "" : "s"}, ${warnings} warning${warnings === 1 ? "" : "s"}`;
}
