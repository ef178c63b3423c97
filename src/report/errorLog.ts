import * as fs from "fs";
import { z } from "zod";
import type { LibraryReport } from "@klc/rules/engine";

const LogEntrySchema = z.object({ library: z.string(), item: z.string() });
const RuleLogSchema = z.record(z.string(), z.array(LogEntrySchema));
const ErrorLogSchema = z.object({
  errors: RuleLogSchema.optional(),
  warnings: RuleLogSchema.optional(),
});

export type ErrorLog = z.infer<typeof ErrorLogSchema>;
export type ErrorLogEntry = z.infer<typeof LogEntrySchema>;

export interface LoggedViolation {
  rule: string;
  library: string;
  item: string;
  warning?: boolean;
}

export function errorLogPath(file: string): string {
  return file.endsWith(".json") ? file : `${file}.json`;
}

export function readErrorLog(file: string): ErrorLog {
  if (!fs.existsSync(file) || !fs.statSync(file).isFile()) return {};
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch {
    console.warn("⚠️  Found bad JSON data - clearing");
    return {};
  }
  const parsed = ErrorLogSchema.safeParse(data);
  if (!parsed.success) {
    console.warn("⚠️  Found bad JSON data - clearing");
    return {};
  }
  return parsed.data;
}

function sortKeys<T>(record: Record<string, T>): Record<string, T> {
  return Object.fromEntries(Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/**
 * Merge violations into the cumulative log at `file` (`.json` is appended
 * when missing): `{ errors: { <rule>: [{ item, library }] }, warnings: ... }`.
 */
export function appendErrorLog(file: string, violations: readonly LoggedViolation[]): string {
  const target = errorLogPath(file);
  const log = readErrorLog(target);

  for (const v of violations) {
    const key = v.warning ? "warnings" : "errors";
    const section = log[key] ?? {};
    const entries = section[v.rule] ?? [];
    entries.push({ library: v.library, item: v.item });
    section[v.rule] = entries;
    log[key] = section;
  }

  const ordered: Record<string, Record<string, ErrorLogEntry[]>> = {};
  for (const key of ["errors", "warnings"] as const) {
    const section = log[key];
    if (!section) continue;
    // Keys sorted at every level: item before library.
    ordered[key] = Object.fromEntries(
      Object.entries(sortKeys(section)).map(([rule, entries]) => [rule, entries.map(e => ({ item: e.item, library: e.library }))])
    );
  }
  fs.writeFileSync(target, JSON.stringify(ordered, null, 4));
  return target;
}

/** One entry per entity and rule with at least one counted error. */
export function violationsToLog(reports: readonly LibraryReport[]): LoggedViolation[] {
  const out: LoggedViolation[] = [];
  for (const report of reports) {
    for (const entity of report.entities) {
      const rules = new Set(entity.violations.filter(v => v.severity === "error").map(v => v.rule));
      for (const rule of rules) out.push({ rule, library: entity.library, item: entity.name });
    }
  }
  return out;
}
