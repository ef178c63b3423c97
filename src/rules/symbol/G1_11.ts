import type { LibSymbol } from "@klc/kicad/SymbolModel";
import { defineRule } from "../helpers";

// Pin name and number effects carry no font face in KiCad 9, so only
// properties and free text are checked.
export const G1_11 = defineRule<LibSymbol>(
  "symbol",
  "G1.11",
  "All text should use the default KiCad stroke font",
  (symbol, out) => {
    for (const prop of symbol.properties) {
      const face = prop.effects?.font.face;
      if (face === undefined) continue;
      const x = prop.at?.x ?? 0;
      const y = prop.at?.y ?? 0;
      out.error(`Property uses font ${face}`, { x, y })
        .extra(`Text item "${prop.name}" with value "${prop.value}" at (${x}, ${y})`);
    }

    for (const g of symbol.graphics) {
      if (g.kind !== "text") continue;
      const face = g.effects?.font.face;
      if (face === undefined) continue;
      out.error(`Text uses font ${face}`, { x: g.at.x, y: g.at.y, unit: g.unit })
        .extra(`Text item "${g.text}" at (${g.at.x}, ${g.at.y})`);
    }
  }
);
