import * as fs from "fs";
import * as path from "path";
import { getConfig } from "@klc/cli/config";
import { CliOptions, die, expandPaths } from "@klc/cli/utils";
import { libraryLines, summaryLine, unitTestLine } from "@klc/cli/output";
import { ConfigError, KicadError } from "@klc/kicad/errors";
import { Footprint, libNameFromFootprintPath, loadFootprintDirectory, loadFootprintFile } from "@klc/kicad/FootprintModel";
import { libNameFromPath, loadSymbolLibraryFile } from "@klc/kicad/SymbolLibrary";
import { JUnitReport, JUnitTestSuite } from "@klc/report/junit";
import { metricsLines, writeMetrics } from "@klc/report/metrics";
import { appendErrorLog, violationsToLog } from "@klc/report/errorLog";
import {
  ExitStatus,
  LibraryCheckOptions,
  LibraryReport,
  UnitTestResult,
  checkLibrary,
  checkSymbolLibrary,
  exitStatus,
  failedLibrary,
  filterEntities,
  runUnitTest,
} from "@klc/rules/engine";
import { RuleSelection, ruleCodes, selectRules } from "@klc/rules/registry";
import type { EntityKind } from "@klc/rules/types";

const SUITES: Record<EntityKind, { name: string; id: string }> = {
  symbol: { name: "Symbol KLC Checks", id: "klc-sym" },
  footprint: { name: "Footprint KLC Checks", id: "klc-fp" },
};

/**
 * Rules picked on the command line plus the config-wide exclusions that
 * apply to this kind. A code named with --rule overrides its exclusion.
 */
export function ruleSelection(kind: EntityKind, opts: Pick<CliOptions, "rules" | "exclude">, configExclude: readonly string[]): RuleSelection {
  const known = new Set(ruleCodes(kind));
  const fromConfig = configExclude.filter(code => known.has(code) && !opts.rules.includes(code));
  return { only: opts.rules, exclude: [...new Set([...opts.exclude, ...fromConfig])] };
}

function checkOptions(opts: CliOptions): LibraryCheckOptions {
  return {
    constants: getConfig().constants,
    disableExceptions: opts.disableExceptions,
    component: opts.component,
    pattern: opts.pattern,
  };
}

// ─── Loading ─────────────────────────────────────────────────────────

function missing(kind: EntityKind, file: string, message: string): LibraryReport {
  return failedLibrary(kind, path.basename(file), new ConfigError(message, { file }), file);
}

function symbolReports(files: readonly string[], opts: CliOptions): { reports: LibraryReport[]; tests: UnitTestResult[] } {
  const rules = selectRules("symbol", ruleSelection("symbol", opts, getConfig().exclude));
  const options = checkOptions(opts);
  const reports: LibraryReport[] = [];
  const tests: UnitTestResult[] = [];

  for (const file of files) {
    if (!fs.existsSync(file)) {
      reports.push(missing("symbol", file, `File does not exist: ${file}`));
      continue;
    }
    if (!file.endsWith(".kicad_sym")) {
      reports.push(missing("symbol", file, `File is not a .kicad_sym : ${file}`));
      continue;
    }
    try {
      const lib = loadSymbolLibraryFile(file);
      if (opts.unittest) {
        for (const symbol of filterEntities(lib.symbols, options)) {
          tests.push(runUnitTest(symbol, rules, { ...options, library: lib }));
        }
      } else {
        reports.push(checkSymbolLibrary(lib, rules, options, file));
      }
    } catch (err) {
      if (!(err instanceof KicadError)) throw err;
      reports.push(failedLibrary("symbol", libNameFromPath(file), err, file));
    }
  }
  return { reports, tests };
}

interface FootprintSource {
  library: string;
  file?: string;
  footprints: Footprint[];
  errors: KicadError[];
}

/** `.pretty` directories load whole; loose `.kicad_mod` files group by their directory. */
function footprintSources(paths: readonly string[]): { sources: FootprintSource[]; failed: LibraryReport[] } {
  const sources = new Map<string, FootprintSource>();
  const failed: LibraryReport[] = [];
  const sourceFor = (library: string, file?: string): FootprintSource => {
    const key = file ?? library;
    let source = sources.get(key);
    if (!source) {
      source = { library, file, footprints: [], errors: [] };
      sources.set(key, source);
    }
    return source;
  };

  for (const p of paths) {
    if (!fs.existsSync(p)) {
      failed.push(missing("footprint", p, `File does not exist: ${p}`));
    } else if (fs.statSync(p).isDirectory()) {
      const loaded = loadFootprintDirectory(p);
      const source = sourceFor(path.basename(path.resolve(p)).replace(/\.pretty$/, ""), p);
      source.footprints.push(...loaded.footprints);
      source.errors.push(...loaded.errors);
    } else if (p.endsWith(".kicad_mod")) {
      const source = sourceFor(libNameFromFootprintPath(p), path.dirname(p));
      try {
        source.footprints.push(loadFootprintFile(p));
      } catch (err) {
        if (!(err instanceof KicadError)) throw err;
        source.errors.push(err);
      }
    } else {
      failed.push(missing("footprint", p, `File is not a .kicad_mod : ${p}`));
    }
  }
  return { sources: [...sources.values()], failed };
}

function footprintReports(paths: readonly string[], opts: CliOptions): { reports: LibraryReport[]; tests: UnitTestResult[] } {
  const rules = selectRules("footprint", ruleSelection("footprint", opts, getConfig().exclude));
  const options = checkOptions(opts);
  const { sources, failed } = footprintSources(paths);
  const reports: LibraryReport[] = [...failed];
  const tests: UnitTestResult[] = [];

  for (const source of sources) {
    if (opts.unittest) {
      for (const fp of filterEntities(source.footprints, options)) tests.push(runUnitTest(fp, rules, options));
      continue;
    }
    reports.push(
      checkLibrary(
        { kind: "footprint", library: source.library, file: source.file, entities: source.footprints, loadErrors: source.errors },
        rules,
        options
      )
    );
  }
  return { reports, tests };
}

// ─── Output ──────────────────────────────────────────────────────────

function writeOutputs(kind: EntityKind, reports: readonly LibraryReport[], opts: CliOptions): void {
  if (opts.metrics) writeMetrics(metricsLines(reports), opts.metrics);

  if (opts.log) {
    const written = appendErrorLog(opts.log, violationsToLog(reports));
    if (opts.verbose) console.log(`📝 Error log updated: ${written}`);
  }

  const junitPath = opts.junit ?? getConfig().junit;
  if (junitPath) {
    if (opts.verbose) console.log(`Creating JUnit report: ${junitPath}`);
    const suite = SUITES[kind];
    new JUnitReport(junitPath).addSuite(JUnitTestSuite.fromReports(suite.name, suite.id, reports)).save();
  }
}

/** Check libraries of one kind, print the results and return the exit status. */
export function runCheck(kind: EntityKind, opts: CliOptions): ExitStatus {
  const inputs = kind === "symbol" ? expandPaths(opts.positional, ".kicad_sym") : expandPaths(opts.positional, ".pretty");
  if (inputs.length === 0) die(`No ${kind} libraries given`);

  const { reports, tests } = kind === "symbol" ? symbolReports(inputs, opts) : footprintReports(inputs, opts);

  if (opts.unittest) {
    reports.forEach(r => libraryLines(r, { verbose: opts.verbose, silent: true, noWarnings: true }).forEach(l => console.log(l)));
    tests.forEach(t => console.log(unitTestLine(t)));
    const failures = tests.filter(t => !t.passed).length;
    console.log(`\n${failures === 0 ? "✅" : "❌"} ${tests.length - failures}/${tests.length} unit tests passed`);
    return failures > 0 || reports.some(r => r.verdict === "fail") ? 3 : 0;
  }

  const print = { verbose: opts.verbose, silent: opts.silent, noWarnings: opts.noWarnings };
  for (const report of reports) {
    libraryLines(report, print).forEach(l => console.log(l));
  }
  if (!opts.silent) console.log(summaryLine(reports));

  writeOutputs(kind, reports, opts);
  return exitStatus(reports);
}

export async function cmdSym(opts: CliOptions): Promise<void> {
  process.exit(runCheck("symbol", opts));
}

export async function cmdFp(opts: CliOptions): Promise<void> {
  process.exit(runCheck("footprint", opts));
}
