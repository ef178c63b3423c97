import type { LibSymbol } from "@klc/kicad/SymbolModel";
import { defineRule } from "../helpers";

export const S6_1 = defineRule<LibSymbol>(
  "symbol",
  "S6.1",
  "Reference designator prefix matches the library",
  (symbol, out, ctx) => {
    const ref = symbol.getProperty("Reference");
    if (!ref) {
      out.error("Component is missing Reference field");
      return;
    }
    for (const [prefix, libraries] of Object.entries(ctx.constants.referencePrefixes)) {
      if (libraries.includes(symbol.libName) && !ref.value.startsWith(prefix)) {
        out.error(`Library ${symbol.libName} should have ${prefix} as RD prefix`);
      }
    }
  }
);
