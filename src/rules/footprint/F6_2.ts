import type { Footprint } from "@klc/kicad/FootprintModel";
import { defineRule, round } from "../helpers";

const THRESHOLD = 0.001;

/**
 * SMD anchors sit at the centre of the pads or of the F.Fab outline,
 * whichever is closer to the origin. Odd outlines give false positives.
 */
export const F6_2 = defineRule<Footprint>(
  "footprint",
  "F6.2",
  "For surface-mount devices, footprint anchor is placed in the middle of the footprint (IPC-7351)",
  (fp, out) => {
    if (fp.attr?.type !== "smd") return;

    const padBox = fp.padsBoundingBox();
    const fabBox = fp.layerBoundingBox("F.Fab");
    if (!padBox.valid && !fabBox.valid) return;

    const pads = padBox.valid ? padBox.center : { x: 0, y: 0 };
    const fab = fabBox.valid ? fabBox.center : pads;
    const closest = Math.hypot(pads.x, pads.y) > Math.hypot(fab.x, fab.y) ? fab : pads;

    if (Math.abs(closest.x) > THRESHOLD || Math.abs(closest.y) > THRESHOLD) {
      out.error("Footprint anchor does not match calculated center of Pads or F.Fab", { x: closest.x, y: closest.y })
        .extra(
          `calculated center for Pads [${round(pads.x)},${round(pads.y)}mm]`,
          `calculated center for F.Fab [${round(fab.x)},${round(fab.y)}mm]`
        );
    }
  }
);
