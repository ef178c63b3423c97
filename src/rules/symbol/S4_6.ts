import type { LibSymbol } from "@klc/kicad/SymbolModel";
import { defineRule, pinString } from "../helpers";

const NC_NAMES = [/^nc$/i, /^dnc$/i, /^n\.c\.$/i];

export const S4_6 = defineRule<LibSymbol>("symbol", "S4.6", "Hidden pins", (symbol, out) => {
  if (symbol.isDerived) return;

  const ncPins = symbol.pins.filter(p => p.etype === "no_connect" || NC_NAMES.some(re => re.test(p.name)));
  const wrongType = ncPins.filter(p => p.etype !== "no_connect");
  const visible = ncPins.filter(p => !p.hide);

  if (wrongType.length > 0) {
    out.error("NC pins are not correct pin-type:")
      .extra(...wrongType.map(p => `${pinString(p)} should be of type NOT CONNECTED, but is of type ${p.etype}`));
  }
  if (visible.length > 0) {
    out.warning("NC pins are VISIBLE (should be INVISIBLE):")
      .extra(...visible.map(p => `${pinString(p)} should be INVISIBLE`));
  }
});
