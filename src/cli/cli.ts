#!/usr/bin/env node

/**
 * KiCad library check CLI
 */

import { cmdFp, cmdSym } from "@klc/cli/commands/check";
import { cmdCompare } from "@klc/cli/commands/compare";
import { cmdFormat } from "@klc/cli/commands/format";
import { cmdRules } from "@klc/cli/commands/rules";
import { parseArgs, die } from "@klc/cli/utils";
import { isKicadError } from "@klc/kicad/errors";

function printHelp(): void {
  console.log(`
KiCad library check

Usage:
  klc <command> [options]

Commands:
  sym <files…>                   Check .kicad_sym libraries against the KLC
  fp <files|dirs…>               Check .kicad_mod files or .pretty directories
  compare --old <paths…> --new <paths…>
                                 Compare two revisions of a set of libraries
  format <files…> [--write] [--check]
                                 Rewrite files in canonical S-expression form
  rules                          List the known rules

Check options:
  -r, --rule <codes>             Only run these rules (comma separated)
  -e, --exclude <codes>          Skip these rules (comma separated)
  -c, --component <name>         Only check this symbol or footprint
  -p, --pattern <regex>          Only check names matching the pattern
  -x, --disable-exceptions       Ignore KLC_* exception properties
  -s, --silent                   Skip output for items passing all checks
  -w, --nowarnings               Only show errors
  -v, --verbose                  -v adds rule descriptions, -vv detail lines
  -l, --log <file.json>          Merge errors into a cumulative JSON log
  --junit <file.xml>             Write a JUnit XML report
  --metrics <file>               Append metrics lines to a file
  -u, --unittest                 Treat items as Pass__/Warn__/Fail__ unit tests

Compare options:
  --check                        Run rule checks on added and changed items
  --check-derived                Mark derived symbols changed when a parent changed
  --skip-derived                 Leave derived symbols out of the comparison
  --design-breaking-changes      Report moved, renumbered or removed pins
  --footprints <dir>             Check symbol footprint links against <dir>

Exit status:
  0  clean
  2  warnings only
  3  errors, unreadable files, failed unit tests, design-breaking changes
     or files that need formatting
  1  usage error or crash

Examples:
  klc sym Device.kicad_sym -r S4.1,S4.2 -vv
  klc fp Resistor_SMD.pretty --junit report.xml
  klc compare --old base/ --new head/ --check --design-breaking-changes -v
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "sym":
      return cmdSym(parseArgs(commandArgs));
    case "fp":
      return cmdFp(parseArgs(commandArgs));
    case "compare":
      return cmdCompare(parseArgs(commandArgs));
    case "format":
      return cmdFormat(parseArgs(commandArgs));
    case "rules":
      return cmdRules(parseArgs(commandArgs));
    case "--help":
    case "-h":
    case "help":
      printHelp();
      break;
    default:
      if (command) {
        console.error(`Unknown command: ${command}\n`);
      }
      printHelp();
      process.exit(command ? 1 : 0);
  }
}

main().catch((err: unknown) => {
  if (isKicadError(err)) die(err.message);
  console.error(err);
  process.exit(1);
});
