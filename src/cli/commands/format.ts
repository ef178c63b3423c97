import * as fs from "fs";
import { CliOptions, die } from "@klc/cli/utils";
import { KicadError } from "@klc/kicad/errors";
import { SExpressionParser } from "@klc/kicad/SExpressionParser";

export type FormatOutcome = "unchanged" | "reformatted" | "failed";

export interface FormatResult {
  file: string;
  outcome: FormatOutcome;
  formatted?: string;
  error?: KicadError;
}

/** Canonical text of one file, without touching it. */
export function formatFile(file: string): FormatResult {
  try {
    const content = fs.readFileSync(file, "utf-8");
    const formatted = SExpressionParser.normalize(content);
    return { file, outcome: formatted === content ? "unchanged" : "reformatted", formatted };
  } catch (err) {
    if (!(err instanceof KicadError)) throw err;
    return { file, outcome: "failed", error: err.withContext({ file }) };
  }
}

/**
 * format: rewrite library files in canonical form.
 * --check only reports files that would change; --write rewrites them;
 * otherwise the canonical text goes to stdout.
 */
export async function cmdFormat(opts: CliOptions): Promise<void> {
  if (opts.positional.length === 0) die("format needs at least one file");

  let dirty = 0;
  let failed = 0;
  for (const file of opts.positional) {
    if (!fs.existsSync(file)) {
      console.error(`❌  File does not exist: ${file}`);
      failed++;
      continue;
    }
    const result = formatFile(file);
    if (result.outcome === "failed") {
      console.error(`❌  ${file}: ${result.error?.message ?? "could not be parsed"}`);
      failed++;
      continue;
    }
    if (opts.check) {
      if (result.outcome === "reformatted") {
        console.log(`⚠️  ${file} is not canonically formatted`);
        dirty++;
      }
    } else if (opts.write) {
      if (result.outcome === "reformatted" && result.formatted !== undefined) {
        fs.writeFileSync(file, result.formatted);
        console.log(`✅ Formatted ${file}`);
      }
    } else {
      process.stdout.write(result.formatted ?? "");
    }
  }

  process.exit(failed > 0 || dirty > 0 ? 3 : 0);
}
