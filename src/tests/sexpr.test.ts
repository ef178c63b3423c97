import { describe, it, expect } from "vitest";
import {
  SExpressionParser,
  formatNumber,
  hasFlag,
  isList,
  keywordOf,
  findChild,
  list,
  num,
  str,
  sym,
  tagged,
} from "../kicad/SExpressionParser";
import { KicadSyntaxError } from "../kicad/errors";
import { structuralForm, structuralSort } from "../kicad/structuralSort";

// ─── Parsing ─────────────────────────────────────────────────────────

describe("SExpressionParser.parse", () => {
  it("reads symbols, strings and numbers with their lexical form", () => {
    const [form] = SExpressionParser.parse('(at 1.00 -0.5 90 "F.Cu" hide)');
    expect(form).toEqual(
      list(sym("at"), num(1, "1.00"), num(-0.5, "-0.5"), num(90, "90"), str("F.Cu"), sym("hide"))
    );
  });

  it("keeps uuid-like atoms that start with digits as symbols", () => {
    const [form] = SExpressionParser.parse("(uuid 123abc-4)");
    expect(form).toEqual(list(sym("uuid"), sym("123abc-4")));
  });

  it("unescapes quotes, backslashes and newlines", () => {
    const [form] = SExpressionParser.parse('(a "x\\"y\\\\z\\nw")');
    expect(form).toEqual(list(sym("a"), str('x"y\\z\nw')));
  });

  it("reads lists with very many children", () => {
    const expr = SExpressionParser.parseOne(`(pts ${"(xy 0 0) ".repeat(300000)})`);
    expect(expr.type === "list" && expr.items.length).toBe(300001);
  });

  it("returns every top-level form", () => {
    expect(SExpressionParser.parse("(a) (b)\n(c)")).toHaveLength(3);
  });

  it("parseOne rejects more than one form", () => {
    expect(() => SExpressionParser.parseOne("(a) (b)")).toThrow(
      "Expected exactly one top-level expression, found 2 (line 1, column 1)"
    );
  });
});

describe("syntax errors", () => {
  it("reports where an unclosed list was opened", () => {
    try {
      SExpressionParser.parse("(a\n  (b");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(KicadSyntaxError);
      if (!(err instanceof KicadSyntaxError)) return;
      expect(err.kind).toBe("SyntaxError");
      expect(err.line).toBe(1);
      expect(err.column).toBe(1);
      expect(err.message).toBe("Unbalanced parentheses: 2 list(s) not closed (line 1, column 1)");
    }
  });

  it("reports a stray closing parenthesis", () => {
    expect(() => SExpressionParser.parse("(a))")).toThrow("Unexpected ')' (line 1, column 4)");
  });

  it("reports an unterminated string at its opening quote", () => {
    expect(() => SExpressionParser.parse('(a\n (b "open))')).toThrow("Unterminated string (line 2, column 5)");
  });
});

// ─── Formatting ──────────────────────────────────────────────────────

describe("SExpressionParser.format", () => {
  it("keeps lists of atoms and shallow lists on one line", () => {
    const expr = tagged("pin", sym("passive"), sym("line"), tagged("at", num(0), num(3.81), num(270)));
    expect(SExpressionParser.format(expr)).toBe("(pin passive line (at 0 3.81 270))");
  });

  it("expands deeper lists with two-space indentation", () => {
    const expr = SExpressionParser.parseOne('(lib (sym "R" (pin (at 0 0))))');
    expect(SExpressionParser.format(expr)).toBe('(lib\n  (sym "R"\n    (pin (at 0 0))\n  )\n)');
  });

  it("writes each top-level form followed by a newline", () => {
    expect(SExpressionParser.formatFile([tagged("a"), tagged("b", num(1))])).toBe("(a)\n(b 1)\n");
  });

  it("escapes strings on output", () => {
    expect(SExpressionParser.format(str('say "hi"\\now\n'))).toBe('"say \\"hi\\"\\\\now\\n"');
  });

  it("reaches a fixed point after one pass", () => {
    const messy = '(kicad_symbol_lib (version 20241209)\n\t(symbol "R" (property "Reference" "R" (at 0 0 0)\n (effects (font (size 1.27 1.27))))))';
    const once = SExpressionParser.normalize(messy);
    expect(SExpressionParser.normalize(once)).toBe(once);
  });

  it("brings differently laid out input to the same text", () => {
    const compact = '(lib (sym "R" (pin (at 0 0))))';
    const sprawling = '(lib\n\t(sym   "R"\r\n(pin\n (at 0\t0)\n)))\n\n';
    const expected = '(lib\n  (sym "R"\n    (pin (at 0 0))\n  )\n)\n';
    expect(SExpressionParser.normalize(compact)).toBe(expected);
    expect(SExpressionParser.normalize(sprawling)).toBe(expected);
  });
});

describe("formatNumber", () => {
  it("drops trailing zeros and limits to six decimals", () => {
    expect(formatNumber(2)).toBe("2");
    expect(formatNumber(1.5)).toBe("1.5");
    expect(formatNumber(0.1 + 0.2)).toBe("0.3");
    expect(formatNumber(1.23456789)).toBe("1.234568");
  });

  it("never writes negative zero", () => {
    expect(formatNumber(-0.0000001)).toBe("0");
  });

  it("refuses non-finite values", () => {
    expect(() => formatNumber(Number.NaN)).toThrow(RangeError);
  });
});

// ─── Accessors ───────────────────────────────────────────────────────

describe("accessors", () => {
  const parseList = (text: string) => {
    const node = SExpressionParser.parseOne(text);
    if (!isList(node)) throw new Error("expected a list");
    return node;
  };
  const node = parseList("(pin_names (offset 0) hide (justify (hide no)))");

  it("finds keywords and children", () => {
    expect(keywordOf(node)).toBe("pin_names");
    expect(isList(node, "pin_names")).toBe(true);
    expect(findChild(node, "offset")).toEqual(tagged("offset", num(0, "0")));
    expect(findChild(node, "size")).toBeUndefined();
  });

  it("reads bare and yes/no flags", () => {
    expect(hasFlag(node, "hide")).toBe(true);
    expect(hasFlag(parseList("(justify (hide no))"), "hide")).toBe(false);
    expect(hasFlag(parseList("(x (hide))"), "hide")).toBe(true);
  });
});

// ─── Structural sort ─────────────────────────────────────────────────

describe("structuralSort", () => {
  it("orders properties by name and leaves coordinates alone", () => {
    const sorted = structuralSort(
      SExpressionParser.parseOne('(symbol "R" (property "Value" "R") (property "Reference" "R") (at 3 1 0))')
    );
    expect(SExpressionParser.format(sorted)).toBe(
      '(symbol "R" (at 3 1 0) (property "Reference" "R") (property "Value" "R"))'
    );
  });

  it("gives reordered pads the same form", () => {
    const a = '(footprint "X" (pad "2" smd rect (at 1 0)) (pad "1" smd rect (at -1 0)))';
    const b = '(footprint "X" (pad "1" smd rect (at -1 0)) (pad "2" smd rect (at 1 0)))';
    expect(structuralForm(a)).toBe(structuralForm(b));
  });

  it("keeps point order significant", () => {
    const a = "(polyline (pts (xy 0 0) (xy 1 1)))";
    const b = "(polyline (pts (xy 1 1) (xy 0 0)))";
    expect(structuralForm(a)).not.toBe(structuralForm(b));
  });
});
