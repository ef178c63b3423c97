import { LibSymbol, pinDirection } from "@klc/kicad/SymbolModel";
import { defineRule, pinLocation, pinString } from "../helpers";

const GROUND_PATTERNS = [/^[ad]*g(rou)*nd(a)*$/i, /^[ad]*v(ss)$/i];
const POSITIVE_POWER_PATTERNS = [/^[ad]*v(aa|cc|dd|bat|in)$/i, /^in\+?$/i];

const matchesAny = (name: string, patterns: readonly RegExp[]) => patterns.some(p => p.test(name));

export const S4_2 = defineRule<LibSymbol>("symbol", "S4.2", "Pins should be grouped by function", (symbol, out) => {
  if (symbol.isDerived || symbol.isPowerSymbol) return;

  const pins = symbol.pins;
  const powerIn = pins.filter(p => p.etype === "power_in");
  const powerOut = pins.filter(p => p.etype === "power_out");

  const misplacedGround = pins.filter(p => matchesAny(p.name, GROUND_PATTERNS) && pinDirection(p) !== "U");
  if (misplacedGround.length > 0) {
    out.warning("Ground and negative power pins should be placed at bottom of symbol").extra(...misplacedGround.map(pinString));
  }

  const reported = new Set<string>();
  for (const pin of powerIn.filter(p => matchesAny(p.name, POSITIVE_POWER_PATTERNS))) {
    if (reported.has(pin.name)) continue;
    if (powerOut.length === 0) {
      if (pinDirection(pin) === "D") continue;
      out.error("Positive power pins should be placed at top of symbol", pinLocation(pin)).extra(
        "Power conversion devices (e.g. regulators) with both power inputs and outputs " +
          "are an exception (for these, inputs on left, outputs on right)"
      );
    } else {
      if (pinDirection(pin) === "R") continue;
      out.error("For a power converter symbol, positive power pins should be placed at left of symbol", pinLocation(pin)).extra(
        "This symbol has power input and output pins, so it is assumed to be a power converter. " +
          "If this symbol not a power converter, you can ignore this error."
      );
    }
    out.extra(pinString(pin));
    reported.add(pin.name);
  }

  reported.clear();
  for (const pin of powerOut) {
    if (reported.has(pin.name) || pinDirection(pin) === "L") continue;
    out.error("Power output pins should be placed at right of symbol", pinLocation(pin)).extra(pinString(pin));
    reported.add(pin.name);
  }
});
