import * as fs from "fs";
import * as path from "path";
import { ConfigError } from "@klc/kicad/errors";
import type { LibraryReport } from "@klc/rules/engine";
import type { Violation } from "@klc/rules/types";

export type JUnitSeverity = "error" | "warning" | "info";

export interface JUnitResult {
  message: string;
  extras: string[];
}

const SEVERITY_LABEL: Record<Exclude<JUnitSeverity, "info">, string> = {
  error: "Errors",
  warning: "Warnings",
};

// ─── Model ───────────────────────────────────────────────────────────

export class JUnitTestCase {
  readonly results = new Map<JUnitSeverity, JUnitResult[]>();

  constructor(readonly name: string) {}

  addResult(severity: JUnitSeverity, result: JUnitResult): this {
    const list = this.results.get(severity) ?? [];
    list.push(result);
    this.results.set(severity, list);
    return this;
  }

  /** Errors and warnings only; info notes never fail a case. */
  get failing(): [Exclude<JUnitSeverity, "info">, JUnitResult[]][] {
    const out: [Exclude<JUnitSeverity, "info">, JUnitResult[]][] = [];
    for (const severity of ["error", "warning"] as const) {
      const results = this.results.get(severity);
      if (results && results.length > 0) out.push([severity, results]);
    }
    return out;
  }
}

export class JUnitTestSuite {
  readonly cases: JUnitTestCase[] = [];

  constructor(readonly name: string, readonly id?: string) {}

  addCase(testCase: JUnitTestCase): this {
    this.cases.push(testCase);
    return this;
  }

  /** One case per checked entity, plus one per library that failed to load. */
  static fromReports(name: string, id: string | undefined, reports: readonly LibraryReport[]): JUnitTestSuite {
    const suite = new JUnitTestSuite(name, id);
    for (const report of reports) {
      for (const err of report.loadErrors) {
        suite.addCase(
          new JUnitTestCase(report.file ?? report.library).addResult("error", {
            message: `Could not parse library: ${err.message}`,
            extras: [],
          })
        );
      }
      for (const entity of report.entities) {
        const testCase = new JUnitTestCase(`${entity.library}:${entity.name}`);
        for (const result of entity.results) {
          if (result.exception && result.violations.length > 0) {
            testCase.addResult("info", {
              message: `Exception ${entity.library}:${entity.name}, Rule: ${result.rule} - ${result.url}, Note: ${result.exception.notes.join("; ")}`,
              extras: [],
            });
          }
        }
        entity.violations.forEach((v: Violation) => testCase.addResult(v.severity, { message: v.message, extras: v.extras }));
        entity.referenceErrors.forEach(message => testCase.addResult("error", { message, extras: [] }));
        entity.issues.forEach(issue => testCase.addResult("warning", { message: issue, extras: [] }));
        suite.addCase(testCase);
      }
    }
    return suite;
  }
}

// ─── XML ─────────────────────────────────────────────────────────────

function escapeText(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function escapeAttr(text: string): string {
  return escapeText(text).replace(/"/g, "&quot;").replace(/\n/g, "&#10;");
}

function attrs(values: Record<string, string | undefined>): string {
  return Object.entries(values)
    .filter((e): e is [string, string] => e[1] !== undefined)
    .map(([k, v]) => ` ${k}="${escapeAttr(v)}"`)
    .join("");
}

function uniqueResults(results: readonly JUnitResult[]): JUnitResult[] {
  const seen = new Set<string>();
  return results.filter(r => {
    const key = JSON.stringify([r.message, r.extras]);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function renderSuite(suite: JUnitTestSuite, indent = "  "): string {
  const body: string[] = [];
  let tests = 0;
  let failures = 0;

  for (const testCase of suite.cases) {
    const failing = testCase.failing;
    if (failing.length === 0) {
      tests++;
      body.push(`${indent}${indent}<testcase${attrs({ classname: suite.name, name: testCase.name })} />`);
      continue;
    }
    for (const [severity, results] of failing) {
      tests++;
      const label = SEVERITY_LABEL[severity];
      body.push(`${indent}${indent}<testcase${attrs({ classname: suite.name, name: `${testCase.name} - ${label}`, type: label })}>`);
      for (const result of uniqueResults(results)) {
        failures++;
        const text = `${result.message}\n${result.extras.join("\n    ")}`;
        body.push(`${indent}${indent}${indent}<failure${attrs({ message: result.message })}>${escapeText(text)}</failure>`);
      }
      body.push(`${indent}${indent}</testcase>`);
    }
  }

  const open = `${indent}<testsuite${attrs({ name: suite.name, id: suite.id, tests: String(tests), failures: String(failures) })}>`;
  return [open, ...body, `${indent}</testsuite>`].join("\n");
}

const ROOT_RE = /<testsuites\b[^>]*?(?:\/>|>([\s\S]*)<\/testsuites>)/;

/**
 * A JUnit XML file. Suites already in the file are kept and new ones are
 * appended, so several runs can share one report.
 */
export class JUnitReport {
  readonly suites: JUnitTestSuite[] = [];
  private readonly existing: string;

  constructor(private readonly filePath: string) {
    this.existing = fs.existsSync(filePath) ? JUnitReport.existingSuites(filePath) : "";
  }

  private static existingSuites(filePath: string): string {
    const m = ROOT_RE.exec(fs.readFileSync(filePath, "utf-8"));
    if (!m) throw new ConfigError(`Existing JUnit report is not a <testsuites> document`, { file: filePath });
    return (m[1] ?? "").replace(/^\s*\n|\s+$/g, "");
  }

  addSuite(suite: JUnitTestSuite): this {
    this.suites.push(suite);
    return this;
  }

  render(): string {
    const parts = [this.existing, ...this.suites.map(s => renderSuite(s))].filter(p => p !== "");
    const body = parts.length > 0 ? `<testsuites>\n${parts.join("\n")}\n</testsuites>` : "<testsuites />";
    return `<?xml version='1.0' encoding='utf-8'?>\n${body}\n`;
  }

  save(): void {
    fs.mkdirSync(path.dirname(path.resolve(this.filePath)), { recursive: true });
    fs.writeFileSync(this.filePath, this.render());
  }
}
