import { getConfig } from "@klc/cli/config";
import { CliOptions, die } from "@klc/cli/utils";
import { entityLines } from "@klc/cli/output";
import { ruleSelection } from "@klc/cli/commands/check";
import {
  ComparisonReport,
  DirectoryFootprintResolver,
  EntityChange,
  LibraryComparison,
  compareLibraryPaths,
} from "@klc/compare/LibraryComparator";
import { selectRules } from "@klc/rules/registry";

function aliasInfo(change: EntityChange): string {
  if (!change.extends) return "";
  return change.status === "removed" ? ` was an alias of ${change.extends}` : ` alias of ${change.extends}`;
}

/** Human-readable lines for one library, as printed with --verbose. */
export function comparisonLines(lib: LibraryComparison, verbose: boolean): string[] {
  const lines: string[] = [];
  if (lib.loadError) {
    lines.push(`❌  Could not load library '${lib.library}': ${lib.loadError.message}`);
    return lines;
  }
  for (const err of lib.fileErrors) lines.push(`❌  Could not load '${err.context.file ?? lib.library}': ${err.message}`);
  if (verbose) {
    if (lib.status === "added") lines.push(`📚 Created library '${lib.library}'`);
    if (lib.status === "removed") lines.push(`🗑️  Removed library '${lib.library}'`);

    for (const change of lib.changes) {
      const ref = `'${lib.library}:${change.name}'${aliasInfo(change)}`;
      if (change.extendsChanged) lines.push(`   Changed alias state of '${lib.library}:${change.name}'`);
      switch (change.status) {
        case "added":
          lines.push(`  + New ${ref}`);
          break;
        case "removed":
          lines.push(`  - Removed ${ref}`);
          break;
        case "changed":
          lines.push(`  ~ Changed ${ref}${change.reason === "derived" && change.via ? ` (via ${change.via})` : ""}`);
          break;
        case "unchanged":
          break;
      }
    }
  }

  for (const b of lib.breaking) {
    const ref = `'${b.library}:${b.name}'`;
    if (b.kind === "pins") lines.push(`💥 Pins have been moved, renumbered or removed in symbol ${ref}`);
    else if (b.kind === "nc-pins") lines.push(`💥 Normal pins ok but NC pins have been moved, renumbered or removed in symbol ${ref}`);
    else if (b.kind === "removed") lines.push(`💥 Removed ${ref}`);
    else lines.push(`💥 Removed library '${b.library}'`);
    if (verbose) lines.push(...b.details.map(d => `     ${d}`));
  }

  for (const f of lib.findings) lines.push(`⚠️  ${f.library}:${f.name}: ${f.message}`);

  if (lib.check) {
    for (const entity of lib.check.entities) {
      lines.push(...entityLines(entity, { verbose: 2, silent: true, noWarnings: false }));
    }
  }
  return lines;
}

export function runCompare(opts: CliOptions): ComparisonReport {
  if (opts.old.length === 0 || opts.new.length === 0) die("compare needs --old <paths…> and --new <paths…>");
  const config = getConfig();
  const footprintsDir = opts.footprints ?? config.footprintsDir;

  return compareLibraryPaths(opts.old, opts.new, {
    checkDerived: opts.checkDerived,
    skipDerived: opts.skipDerived,
    designBreakingChanges: opts.designBreakingChanges,
    footprints: footprintsDir ? new DirectoryFootprintResolver(footprintsDir) : undefined,
    rules: opts.check ? selectRules("symbol", ruleSelection("symbol", opts, config.exclude)) : undefined,
    footprintRules: opts.check ? selectRules("footprint", ruleSelection("footprint", opts, config.exclude)) : undefined,
    checkOptions: { constants: config.constants, disableExceptions: opts.disableExceptions },
  });
}

export async function cmdCompare(opts: CliOptions): Promise<void> {
  const report = runCompare(opts);
  const verbose = opts.verbose > 0;

  for (const lib of report.libraries) {
    comparisonLines(lib, verbose).forEach(l => console.log(l));
  }

  const changed = report.libraries.filter(l => l.status !== "unchanged").length;
  console.log(
    `\n${report.exitStatus === 0 ? "✅" : "❌"} ${changed} changed librar${changed === 1 ? "y" : "ies"}, ` +
      `${report.designBreakingChanges.length} design-breaking change(s), ${report.failedChecks} failed check(s)`
  );
  process.exit(report.exitStatus);
}
