import { CliOptions } from "@klc/cli/utils";
import { allRules } from "@klc/rules/registry";

/** rules: list every known rule with its documentation link. */
export async function cmdRules(opts: CliOptions): Promise<void> {
  let kind: string | undefined;
  for (const rule of allRules()) {
    if (rule.kind !== kind) {
      kind = rule.kind;
      console.log(`\n📚 ${kind === "symbol" ? "Symbol" : "Footprint"} rules`);
    }
    console.log(`  ${rule.code.padEnd(6)} ${rule.description}`);
    if (opts.verbose) console.log(`         ${rule.url}`);
  }
}
