import type { Footprint } from "@klc/kicad/FootprintModel";
import { defineRule } from "../helpers";

export const G1_10 = defineRule<Footprint>("footprint", "G1.10", "There are no embedded files", (fp, out) => {
  if (fp.embeddedFonts === true) {
    out.error("The checkbox 'embedded fonts' must be unchecked.");
    return;
  }
  const files = fp.embeddedFiles;
  if (files.length > 0) {
    out.error("No files should be embedded in footprints").extra(...files.map(f => `Found file "${f.name}" of type "${f.type}"`));
  }
});
