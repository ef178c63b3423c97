import type { LibSymbol } from "@klc/kicad/SymbolModel";
import { mmToMil } from "@klc/kicad/geometry";
import { defineRule } from "../helpers";

// symbols narrower than this may sit 50 mil off-centre
const SMALL_SYMBOL_SIZE = 800;

function isBadOffset(offset: number, size: number): boolean {
  if (size > SMALL_SYMBOL_SIZE) return offset !== 0;
  return Math.abs(offset) !== 0 && Math.abs(offset) !== 50;
}

export const S3_1 = defineRule<LibSymbol>(
  "symbol",
  "S3.1",
  "Origin is centered on the middle of the symbol",
  (symbol, out) => {
    if (symbol.isDerived) return;

    for (let unit = 1; unit <= symbol.unitCount; unit++) {
      let center: { x: number; y: number };
      let size: { w: number; h: number };

      const rect = symbol.getCenterRectangle([0, unit]);
      if (rect) {
        center = rect.center;
        size = { w: Math.abs(rect.end.x - rect.start.x), h: Math.abs(rect.end.y - rect.start.y) };
      } else {
        const pins = symbol.pins.filter(p => p.unit === unit || p.unit === 0);
        if (pins.length === 0) continue;
        const xs = pins.map(p => p.at.x);
        const ys = pins.map(p => p.at.y);
        const [xmin, xmax, ymin, ymax] = [Math.min(...xs), Math.max(...xs), Math.min(...ys), Math.max(...ys)];
        center = { x: (xmin + xmax) / 2, y: (ymin + ymax) / 2 };
        size = { w: xmax - xmin, h: ymax - ymin };
      }

      const x = mmToMil(center.x);
      const y = mmToMil(center.y);
      if (x === 0 && y === 0) continue;

      if (Math.abs(x) === 50 || Math.abs(y) === 50) {
        if (isBadOffset(x, mmToMil(size.w)) || isBadOffset(y, mmToMil(size.h))) {
          out.warning(`Symbol unit ${unit} slightly off-center`, { x: center.x, y: center.y, unit })
            .extra(`  Center calculated @ (${x}, ${y})`);
        }
      } else {
        out.error(`Symbol unit ${unit} not centered on origin`, { x: center.x, y: center.y, unit })
          .extra(`Center calculated @ (${x}, ${y})`);
      }
    }
  }
);
