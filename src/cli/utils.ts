import * as fs from "fs";
import * as path from "path";
import { ConfigError } from "@klc/kicad/errors";

export function die(msg: string): never {
  console.error(`❌  ${msg}`);
  process.exit(1);
}

export interface CliOptions {
  positional: string[];
  rules: string[];
  exclude: string[];
  component?: string;
  pattern?: string;
  disableExceptions: boolean;
  silent: boolean;
  noWarnings: boolean;
  /** Number of -v flags: 1 adds rule descriptions, 2 adds detail lines. */
  verbose: number;
  log?: string;
  junit?: string;
  metrics?: string;
  unittest: boolean;
  footprints?: string;
  old: string[];
  new: string[];
  check: boolean;
  checkDerived: boolean;
  designBreakingChanges: boolean;
  skipDerived: boolean;
  write: boolean;
}

type ValueKey = "component" | "pattern" | "log" | "junit" | "metrics" | "footprints";
type FlagKey =
  | "disableExceptions"
  | "silent"
  | "noWarnings"
  | "unittest"
  | "check"
  | "checkDerived"
  | "designBreakingChanges"
  | "skipDerived"
  | "write";

const VALUE_FLAGS: Record<string, ValueKey> = {
  "-c": "component",
  "--component": "component",
  "-p": "pattern",
  "--pattern": "pattern",
  "-l": "log",
  "--log": "log",
  "--junit": "junit",
  "--metrics": "metrics",
  "--footprints": "footprints",
};

const BOOLEAN_FLAGS: Record<string, FlagKey> = {
  "-x": "disableExceptions",
  "--disable-exceptions": "disableExceptions",
  "-s": "silent",
  "--silent": "silent",
  "-w": "noWarnings",
  "--nowarnings": "noWarnings",
  "-u": "unittest",
  "--unittest": "unittest",
  "--check": "check",
  "--check-derived": "checkDerived",
  "--design-breaking-changes": "designBreakingChanges",
  "--skip-derived": "skipDerived",
  "--write": "write",
};

function splitList(value: string): string[] {
  return value.split(",").map(s => s.trim()).filter(s => s.length > 0);
}

/**
 * Parse command arguments. `--old` and `--new` take every following
 * argument up to the next flag.
 */
export function parseArgs(args: readonly string[]): CliOptions {
  const opts: CliOptions = {
    positional: [],
    rules: [],
    exclude: [],
    disableExceptions: false,
    silent: false,
    noWarnings: false,
    verbose: 0,
    unittest: false,
    old: [],
    new: [],
    check: false,
    checkDerived: false,
    designBreakingChanges: false,
    skipDerived: false,
    write: false,
  };

  const takeValue = (i: number, flag: string): string => {
    const value = args[i + 1];
    if (value === undefined || value.startsWith("-")) throw new ConfigError(`Option ${flag} needs a value`);
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (/^-v+$/.test(arg)) {
      opts.verbose += arg.length - 1;
    } else if (arg === "--verbose") {
      opts.verbose++;
    } else if (arg === "-r" || arg === "--rule") {
      opts.rules.push(...splitList(takeValue(i++, arg)));
    } else if (arg === "-e" || arg === "--exclude") {
      opts.exclude.push(...splitList(takeValue(i++, arg)));
    } else if (arg === "--old" || arg === "--new") {
      const target = arg === "--old" ? opts.old : opts.new;
      while (i + 1 < args.length && !args[i + 1].startsWith("-")) target.push(args[++i]);
      if (target.length === 0) throw new ConfigError(`Option ${arg} needs at least one path`);
    } else if (Object.hasOwn(VALUE_FLAGS, arg)) {
      opts[VALUE_FLAGS[arg]] = takeValue(i++, arg);
    } else if (Object.hasOwn(BOOLEAN_FLAGS, arg)) {
      opts[BOOLEAN_FLAGS[arg]] = true;
    } else if (arg.startsWith("-") && arg !== "-") {
      throw new ConfigError(`Unknown option: ${arg}`);
    } else {
      opts.positional.push(arg);
    }
  }
  return opts;
}

/** Library files found at the given paths: files as given, directories searched for `ext`. */
export function expandPaths(paths: readonly string[], ext: string): string[] {
  const out: string[] = [];
  for (const p of paths) {
    if (fs.existsSync(p) && fs.statSync(p).isDirectory() && !p.replace(/[\\/]+$/, "").endsWith(".pretty")) {
      out.push(
        ...fs
          .readdirSync(p)
          .filter(f => f.endsWith(ext))
          .sort()
          .map(f => path.join(p, f))
      );
    } else {
      out.push(p);
    }
  }
  return out;
}
