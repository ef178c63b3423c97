import type { Footprint } from "@klc/kicad/FootprintModel";
import { defineRule } from "../helpers";

export const G1_11 = defineRule<Footprint>(
  "footprint",
  "G1.11",
  "All text should use the default KiCad stroke font",
  (fp, out) => {
    for (const text of fp.userTexts) {
      const face = text.effects?.font.face;
      if (face === undefined) continue;
      out.error(`Text uses non kicad font ${face}`, { x: text.at.x, y: text.at.y, layer: text.layer })
        .extra(`Text item "${text.text}" on layer ${text.layer ?? ""} at (${text.at.x}, ${text.at.y})`);
    }

    const refFace = fp.reference?.effects?.font.face;
    if (refFace !== undefined) out.error(`Reference field uses non kicad font ${refFace}`);
    const valueFace = fp.value?.effects?.font.face;
    if (valueFace !== undefined) out.error(`Value field uses non kicad font ${valueFace}`);
  }
);
