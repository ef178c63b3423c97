import type { LibSymbol } from "@klc/kicad/SymbolModel";
import { defineRule } from "../helpers";

const PIN_COUNT_IN_FILTER =
  /(SOIC|SOIJ|SIP|DIP|SO|SOT-\d+|SOT\d+|QFN|DFN|QFP|SOP|TO-\d+|VSO|PGA|BGA|LLC|LGA)-\d+[W-_*?$]+/i;

export const S5_2 = defineRule<LibSymbol>(
  "symbol",
  "S5.2",
  "Footprint filters should match all appropriate footprints",
  (symbol, out) => {
    const filters = symbol.footprintFilters;

    // derived symbols inherit their parent's filters
    if (filters.length === 0 && !symbol.isDerived && !symbol.isGraphicSymbol && !symbol.isPowerSymbol) {
      out.warning("No footprint filters defined");
    }

    for (const filter of filters) {
      const problems: string[] = [];
      if (!filter.includes("*")) problems.push("Does not contain wildcard ('*') character");
      else if (!filter.endsWith("*")) problems.push("Does not end with ('*') character");
      if (filter.split(":").length - 1 > 1) problems.push("Filter should not contain more than one (':') character");

      if (problems.length > 0) {
        out.error(`Footprint filter '${filter}' not correctly formatted`).extra(...problems);
      }
      if (PIN_COUNT_IN_FILTER.test(filter)) {
        out.warning(`Footprint filter '${filter}' seems to contain pin-number, but should not!`);
      }
      if (filter.includes("-") || filter.includes("_")) {
        out.warning(`Minuses and underscores in footprint filter '${filter}' should be escaped with '?' or '*'.`);
      }
    }
  }
);
