import type { LibSymbol } from "@klc/kicad/SymbolModel";
import { defineRule } from "../helpers";

export const G1_10 = defineRule<LibSymbol>("symbol", "G1.10", "Symbols don't contain embedded files", (symbol, out) => {
  if (symbol.embeddedFonts) {
    out.error("The checkbox 'embed fonts' must be unchecked.");
    return;
  }
  const files = symbol.embeddedFiles;
  if (files.length > 0) {
    out.error("No files should be embedded in symbols").extra(...files.map(f => `Found file "${f.name}" of type "${f.type}"`));
  }
});
