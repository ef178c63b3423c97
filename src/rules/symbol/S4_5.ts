import type { LibSymbol } from "@klc/kicad/SymbolModel";
import { defineRule } from "../helpers";

export const S4_5 = defineRule<LibSymbol>(
  "symbol",
  "S4.5",
  "Pins not connected on the footprint may be omitted from the symbol",
  (symbol, out) => {
    if (symbol.isDerived) return;

    const numbers = new Set(symbol.pins.filter(p => /^\d+$/.test(p.number)).map(p => Number(p.number)));
    if (numbers.size === 0) return;

    const missing: number[] = [];
    const max = Math.max(...numbers);
    for (let i = 1; i <= max; i++) {
      if (!numbers.has(i)) missing.push(i);
    }
    if (missing.length === 0) return;

    const plural = missing.length > 1;
    out.warning(`Pin${plural ? "s" : ""} ${missing.join(", ")} ${plural ? "are" : "is"} missing.`);
  }
);
