import type { Footprint } from "@klc/kicad/FootprintModel";
import { defineRule } from "../helpers";

export const F6_1 = defineRule<Footprint>(
  "footprint",
  "F6.1",
  "For surface-mount devices, placement type must be set to \"Surface Mount\"",
  (fp, out) => {
    const smd = fp.padsOfType("smd").length;
    const pth = fp.padsOfType("thru_hole").length;
    const type = fp.attr?.type;
    if (smd === 0 || type === "smd") return;

    if (type === "virtual") {
      out.warning("Footprint placement type set to 'virtual' - ensure this is correct!");
    } else if (pth === 0) {
      out.error("Surface Mount attribute not set").extra("For SMD footprints, 'Placement type' must be set to 'Surface mount'");
    } else {
      out.warning("Surface Mount attribute not set")
        .extra("Both THT and SMD pads were found", "Suggest setting 'Placement Type' to 'Surface Mount'");
    }
  }
);
