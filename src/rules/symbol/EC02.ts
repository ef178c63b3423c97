import type { Property } from "@klc/kicad/common";
import { milToMm } from "@klc/kicad/geometry";
import { LibSymbol, pinDirection } from "@klc/kicad/SymbolModel";
import { Findings, defineRule, round } from "../helpers";

type Justify = "left" | "right" | "center";

interface Placement {
  x: number;
  y: number;
  justify: Justify;
}

function horizontalJustify(prop: Property): Justify {
  const justify = prop.effects?.justify ?? [];
  if (justify.includes("left")) return "left";
  if (justify.includes("right")) return "right";
  return "center";
}

function comparePlacement(field: string, prop: Property | undefined, want: Placement, out: Findings): void {
  if (!prop) return;
  const x = prop.at?.x ?? 0;
  const y = prop.at?.y ?? 0;
  if (round(x, 6) !== round(want.x, 6) || round(y, 6) !== round(want.y, 6)) {
    out.warning(`field: ${field}, @ (${x}, ${y}), recommended @ (${round(want.x, 6)}, ${round(want.y, 6)})`, { x, y });
  }
  const justify = horizontalJustify(prop);
  if (justify !== want.justify) {
    out.warning(`field: ${field}, justification ${justify}, recommended ${want.justify}`);
  }
}

/**
 * Recommended field placement around the body rectangle of unit 1:
 * reference and value above it, footprint below. Top pins push the
 * labels left, bottom pins push the footprint right.
 */
export const EC02 = defineRule<LibSymbol>(
  "symbol",
  "EC02",
  "Check part reference, name and footprint position and alignment",
  (symbol, out) => {
    const rect = symbol.getCenterRectangle([0, 1]);
    if (!rect) return;

    const top = Math.max(rect.start.y, rect.end.y);
    const bottom = Math.min(rect.start.y, rect.end.y);
    const topPins = symbol.pins.filter(p => pinDirection(p) === "D");
    const bottomPins = symbol.pins.filter(p => pinDirection(p) === "U");

    const labelX = topPins.length === 0 ? 0 : Math.min(...topPins.map(p => p.at.x)) - milToMm(100);
    const labelJustify: Justify = topPins.length === 0 ? "center" : "right";
    comparePlacement("reference", symbol.getProperty("Reference"), { x: labelX, y: top + milToMm(125), justify: labelJustify }, out);
    comparePlacement("name", symbol.getProperty("Value"), { x: labelX, y: top + milToMm(50), justify: labelJustify }, out);

    const footprint: Placement =
      bottomPins.length === 0
        ? { x: 0, y: bottom - milToMm(50), justify: "center" }
        : { x: Math.max(...bottomPins.map(p => p.at.x)) + milToMm(50), y: bottom - milToMm(50), justify: "left" };
    comparePlacement("footprint", symbol.getProperty("Footprint"), footprint, out);
  }
);
