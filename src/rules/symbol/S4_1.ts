import type { LibSymbol, Pin } from "@klc/kicad/SymbolModel";
import { mmToMil } from "@klc/kicad/geometry";
import { Findings, defineRule, pinLocation, pinString } from "../helpers";

const MAX_PIN_LENGTH = 300;

function checkPinGrid(pins: readonly Pin[], grid: number, out: Findings): void {
  const offGrid = new Map<number, Pin[]>();
  for (const pin of pins) {
    const pinGrid = pin.etype === "no_connect" ? 50 : grid;
    if (mmToMil(pin.at.x) % pinGrid !== 0 || mmToMil(pin.at.y) % pinGrid !== 0) {
      const list = offGrid.get(pinGrid) ?? [];
      list.push(pin);
      offGrid.set(pinGrid, list);
    }
  }
  for (const [pinGrid, list] of offGrid) {
    const mm = Number((pinGrid * 0.0254).toPrecision(3));
    out.error(`Pins not located on ${pinGrid}mil (=${mm}mm) grid:`).extra(...list.map(p => ` - ${pinString(p)}`));
  }
}

function checkPinLength(pins: readonly Pin[], errorLength: number, warningLength: number, out: Findings): void {
  for (const pin of pins) {
    const length = mmToMil(pin.length);
    if (length === 0) continue;
    const where = pinLocation(pin);

    if (length <= errorLength) {
      out.error(`${pinString(pin)} length (${length}mils) is below ${errorLength + 1}mils`, where);
    } else if (length <= warningLength) {
      out.warning(`${pinString(pin)} length (${length}mils) is below ${warningLength + 1}mils`, where);
    }
    if (length % 50 !== 0) {
      out.warning(`${pinString(pin)} length (${length}mils) is not a multiple of 50mils`, where);
    }
    if (length > MAX_PIN_LENGTH) {
      out.error(`${pinString(pin)} length (${length}mils) is longer than maximum (${MAX_PIN_LENGTH}mils)`, where);
    }
  }
}

function checkDuplicatePins(pins: readonly Pin[], out: Findings): void {
  const seen = new Set<string>();
  for (const pin of pins) {
    const identity = `${pin.number}\u0000${pin.style}\u0000${pin.unit}`;
    if (seen.has(identity)) {
      out.error(`Pin ${pin.number} is duplicated:`).extra(pinString(pin));
    }
    seen.add(identity);
  }
}

export const S4_1 = defineRule<LibSymbol>("symbol", "S4.1", "General pin requirements", (symbol, out) => {
  if (symbol.isDerived) return;

  const small = symbol.isSmallComponent();
  const pins = symbol.pins;
  checkPinGrid(pins, small ? 50 : 100, out);
  checkPinLength(pins, small ? 24 : 49, small ? 49 : 99, out);
  checkDuplicatePins(pins, out);
});
