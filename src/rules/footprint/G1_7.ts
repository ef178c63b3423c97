import type { Footprint } from "@klc/kicad/FootprintModel";
import { defineRule } from "../helpers";

export const G1_7 = defineRule<Footprint>(
  "footprint",
  "G1.7",
  "Library files must use Unix-style line endings (LF)",
  (fp, out) => {
    if (fp.lineEnding !== "lf") {
      out.error("Incorrect line endings").extra("Library files must use Unix-style line endings (LF)");
    }
  }
);
