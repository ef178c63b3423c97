import type { Footprint } from "@klc/kicad/FootprintModel";
import { defineRule } from "../helpers";

const NOT_FITTED_HINT = "If this part isn't physically fitted, perhaps this footprint should be of \"unspecified\" type.";

export const F7_1 = defineRule<Footprint>(
  "footprint",
  "F7.1",
  "For through-hole devices, placement type must be set to \"Through Hole\"",
  (fp, out) => {
    const pth = fp.padsOfType("thru_hole").length;
    const smd = fp.padsOfType("smd").length;
    const excludeFromBom = fp.attr?.excludeFromBom ?? false;
    const excludeFromPos = fp.attr?.excludeFromPosFiles ?? false;

    if (fp.attr?.type === "through_hole") {
      if (pth === 0) out.error("Through hole footprint type is set, but no THT pads found");
      if (excludeFromBom) out.error("Through hole footprints should not be excluded from BOM").extra(NOT_FITTED_HINT);
      if (excludeFromPos) {
        out.error("Through hole footprints should not be excluded from position files").extra(NOT_FITTED_HINT);
      }
      return;
    }

    if (pth === 0) return;
    if (excludeFromBom || excludeFromPos) {
      // no paste layer to go by, so only a warning
      out.warning("Footprint is excluded from BOM or position files, but has plated THT pads").extra("Ensure this is correct.");
    } else if (smd === 0) {
      out.error("Through Hole attribute not set").extra("For THT footprints, 'Placement type' must be set to 'Through hole'");
    }
  }
);
