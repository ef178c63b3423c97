import * as fs from "fs";
import type { LibraryReport } from "@klc/rules/engine";

/**
 * Key/value lines for CI dashboards:
 * `<lib>.<entity>.warnings N`, `<lib>.<entity>.errors N`, then the library totals.
 */
export function metricsLines(reports: readonly LibraryReport[]): string[] {
  const lines: string[] = [];
  for (const report of reports) {
    for (const entity of report.entities) {
      lines.push(`${report.library}.${entity.name}.warnings ${entity.warnings}`);
      lines.push(`${report.library}.${entity.name}.errors ${entity.errors}`);
    }
    lines.push(`${report.library}.total_errors ${report.errors}`);
    lines.push(`${report.library}.total_warnings ${report.warnings}`);
  }
  return lines;
}

/** Append to `file`, or print when no file is given. */
export function writeMetrics(lines: readonly string[], file?: string): void {
  if (lines.length === 0) return;
  const text = lines.map(l => `${l}\n`).join("");
  if (file) fs.appendFileSync(file, text);
  else process.stdout.write(text);
}
