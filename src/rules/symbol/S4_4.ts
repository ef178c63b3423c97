import type { LibSymbol, Pin } from "@klc/kicad/SymbolModel";
import { Findings, defineRule, pinString } from "../helpers";

const POWER_INPUTS = [/^[ad]*g(rou)*nd(a)*$/i, /^[ad]*v(aa|cc|dd|ss|bat|in)$/i];

/** Suggested electrical type by pin name, first match wins. */
const SUGGESTIONS: [type: string, patterns: RegExp[]][] = [
  ["power_out", [/^vout$/i]],
  ["input", [/^sdi$/i, /^cl(oc)*k(in)*$/i, /^~*cs~*$/i, /^[av]ref$/i]],
  ["output", [/^sdo$/i, /^cl(oc)*kout$/i]],
  ["bidirectional", [/^sda$/i, /^s*dio$/i]],
];

const OVERLINE = /~\{.+\}/;

function checkPowerPins(symbol: Readonly<LibSymbol>, out: Findings): void {
  const wrongType = new Set<Pin>();
  const notPassive = new Set<Pin>();

  for (const stack of symbol.getPinStacks().values()) {
    const visible = stack.filter(p => !p.hide);
    const invisible = stack.filter(p => p.hide);
    const checked = visible.length > 0 ? [visible[0]] : invisible;
    for (const pin of checked) {
      if (POWER_INPUTS.some(re => re.test(pin.name)) && pin.etype !== "power_in") wrongType.add(pin);
    }
    if (stack.length > 1 && visible.length > 0 && visible[0].etype === "power_in") {
      invisible.filter(p => p.etype !== "passive").forEach(p => notPassive.add(p));
    }
  }

  if (wrongType.size > 0) {
    out.error("Power pins should be of type POWER INPUT or POWER OUTPUT")
      .extra(...[...wrongType].map(p => `${pinString(p)} is of type ${p.etype}`));
  }
  if (notPassive.size > 0) {
    out.error("Invisible powerpins in stacks should be of type PASSIVE")
      .extra(...[...notPassive].map(p => `${pinString(p)} is of type ${p.etype}`));
  }
}

function checkDoubleInversions(pins: readonly Pin[], out: Findings): void {
  const inverted = pins.filter(p => p.shape === "inverted" && OVERLINE.test(p.name));
  if (inverted.length === 0) return;
  out.error("Pins should not be inverted twice (with inversion-symbol on pin and overline on label)")
    .extra(...inverted.map(p => `${pinString(p)} : double inversion (overline + pin type:Inverting)`));
}

function checkSuggestions(pins: readonly Pin[], out: Findings): void {
  const lines: string[] = [];
  for (const pin of pins) {
    const match = SUGGESTIONS.find(([, patterns]) => patterns.some(re => re.test(pin.name)));
    if (match && match[0] !== pin.etype) {
      lines.push(`${pinString(pin)} is type ${pin.etype} : suggested ${match[0]}`);
    }
  }
  if (lines.length > 0) out.warning("Pin types should match pin function").extra(...lines);
}

export const S4_4 = defineRule<LibSymbol>(
  "symbol",
  "S4.4",
  "Pin electrical type should match pin function",
  (symbol, out) => {
    if (symbol.isDerived) return;
    const pins = symbol.pins;
    checkPowerPins(symbol, out);
    checkDoubleInversions(pins, out);
    checkSuggestions(pins, out);
  }
);
