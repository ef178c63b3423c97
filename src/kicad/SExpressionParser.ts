import { KicadSyntaxError } from "./errors";

// ─── Types ───────────────────────────────────────────────────────────

/** Bare token: keywords, `yes`/`no`, unquoted layer names and UUIDs. */
export interface SSymbol {
  readonly type: "symbol";
  readonly value: string;
}

/** Quoted string; `value` is unescaped. */
export interface SString {
  readonly type: "string";
  readonly value: string;
}

/** Numeric token. `raw` is the text as written, so `1`, `1.0` and `1.00` stay distinct. */
export interface SNumber {
  readonly type: "number";
  readonly value: number;
  readonly raw: string;
}

export interface SList {
  readonly type: "list";
  readonly items: readonly SExpr[];
}

export type SAtom = SSymbol | SString | SNumber;
export type SExpr = SAtom | SList;

interface Token {
  kind: "open" | "close" | "atom" | "string";
  text: string;
  line: number;
  column: number;
}

const INDENT = "  ";
const NUMBER_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

// ─── Builders ────────────────────────────────────────────────────────

export function sym(value: string): SSymbol {
  return { type: "symbol", value };
}

export function str(value: string): SString {
  return { type: "string", value };
}

export function num(value: number, raw?: string): SNumber {
  return { type: "number", value, raw: raw ?? formatNumber(value) };
}

export function list(...items: SExpr[]): SList {
  return { type: "list", items };
}

/** `(keyword item...)` */
export function tagged(keyword: string, ...items: SExpr[]): SList {
  return { type: "list", items: [sym(keyword), ...items] };
}

/** `(keyword yes|no)` */
export function yesNo(keyword: string, flag: boolean): SList {
  return tagged(keyword, sym(flag ? "yes" : "no"));
}

/**
 * KiCad writes millimetres with at most six decimals and no trailing zeros.
 */
export function formatNumber(n: number): string {
  if (!Number.isFinite(n)) {
    throw new RangeError(`Cannot format non-finite number ${n}`);
  }
  let s = n.toFixed(6).replace(/0+$/, "").replace(/\.$/, "");
  if (s === "-0") s = "0";
  return s;
}

// ─── Accessors ───────────────────────────────────────────────────────

export function isList(node: SExpr | undefined, keyword?: string): node is SList {
  if (!node || node.type !== "list") return false;
  return keyword === undefined || keywordOf(node) === keyword;
}

export function keywordOf(node: SExpr | undefined): string | undefined {
  if (!node || node.type !== "list") return undefined;
  const head = node.items[0];
  return head && head.type === "symbol" ? head.value : undefined;
}

export function findChild(node: SList, keyword: string): SList | undefined {
  for (const item of node.items) {
    if (isList(item, keyword)) return item;
  }
  return undefined;
}

export function findChildren(node: SList, keyword: string): SList[] {
  return node.items.filter((item): item is SList => isList(item, keyword));
}

/** Text of an atom: symbol and string values, or a number's lexical form. */
export function atomText(node: SExpr | undefined): string | undefined {
  if (!node) return undefined;
  switch (node.type) {
    case "symbol":
    case "string":
      return node.value;
    case "number":
      return node.raw;
    case "list":
      return undefined;
  }
}

export function numberAt(node: SList, index: number): number | undefined {
  const item = node.items[index];
  return item && item.type === "number" ? item.value : undefined;
}

/**
 * True when `name` appears as a bare atom (`hide`) or as `(name yes)` / `(name)`.
 * `(name no)` is false.
 */
export function hasFlag(node: SList, name: string): boolean {
  for (const item of node.items) {
    if (item.type === "symbol" && item.value === name) return true;
    if (isList(item, name)) {
      const arg = item.items[1];
      return arg === undefined || atomText(arg) !== "no";
    }
  }
  return false;
}

// ─── Parser / formatter ──────────────────────────────────────────────

/**
 * Lossless S-expression parser and canonical formatter for KiCad files.
 * Handles:
 * - Nested lists: (a b)
 * - Quoted strings with `\"`, `\\` and `\n` escapes
 * - Numbers, which keep their lexical form
 * - Bare atoms
 */
export class SExpressionParser {
  /**
   * Parse every top-level form in `input`.
   */
  static parse(input: string): SExpr[] {
    const tokens = this.tokenize(input);
    return this.parseTokens(tokens);
  }

  /**
   * Parse text that must contain exactly one top-level form.
   */
  static parseOne(input: string): SExpr {
    const forms = this.parse(input);
    if (forms.length !== 1) {
      throw new KicadSyntaxError(`Expected exactly one top-level expression, found ${forms.length}`, 1, 1);
    }
    return forms[0];
  }

  /**
   * Canonical serialization:
   * - A list whose children are atoms, or lists of atoms only, stays on one line.
   * - Any other list keeps its leading atoms on the opening line; each
   *   remaining child goes on its own line, two spaces deeper.
   * - The closing parenthesis of an expanded list sits on its own line.
   */
  static format(expr: SExpr, indentLevel: number = 0): string {
    if (expr.type !== "list") {
      return this.formatAtom(expr);
    }

    if (this.isFlat(expr)) {
      return "(" + expr.items.map(e => this.format(e)).join(" ") + ")";
    }

    const childIndent = INDENT.repeat(indentLevel + 1);
    const head: string[] = [];
    let i = 0;
    while (i < expr.items.length && expr.items[i].type !== "list") {
      head.push(this.formatAtom(expr.items[i]));
      i++;
    }

    let result = "(" + head.join(" ");
    for (; i < expr.items.length; i++) {
      result += "\n" + childIndent + this.format(expr.items[i], indentLevel + 1);
    }
    result += "\n" + INDENT.repeat(indentLevel) + ")";
    return result;
  }

  /** A whole file: each top-level form followed by a newline. */
  static formatFile(forms: readonly SExpr[]): string {
    return forms.map(f => this.format(f) + "\n").join("");
  }

  /** Re-emit text in canonical form. */
  static normalize(input: string): string {
    return this.formatFile(this.parse(input));
  }

  /**
   * Helper to strip quotes from a raw token if present.
   */
  static unquote(s: string): string {
    if (s.length >= 2 && s.startsWith('"') && s.endsWith('"')) {
      return this.unescape(s.slice(1, -1));
    }
    return s;
  }

  static quote(s: string): string {
    return '"' + s.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n") + '"';
  }

  private static formatAtom(atom: SAtom): string {
    switch (atom.type) {
      case "symbol":
        return atom.value;
      case "number":
        return atom.raw;
      case "string":
        return this.quote(atom.value);
    }
  }

  private static isFlat(expr: SList): boolean {
    return expr.items.every(item =>
      item.type !== "list" || item.items.every(inner => inner.type !== "list")
    );
  }

  private static unescape(body: string): string {
    let out = "";
    for (let i = 0; i < body.length; i++) {
      const char = body[i];
      if (char === "\\" && i + 1 < body.length) {
        const next = body[++i];
        out += next === "n" ? "\n" : next;
      } else {
        out += char;
      }
    }
    return out;
  }

  private static tokenize(input: string): Token[] {
    const tokens: Token[] = [];
    let line = 1;
    let column = 1;
    let i = 0;

    const advance = (char: string) => {
      i++;
      if (char === "\n") {
        line++;
        column = 1;
      } else {
        column++;
      }
    };

    while (i < input.length) {
      const char = input[i];

      if (char === "(" || char === ")") {
        tokens.push({ kind: char === "(" ? "open" : "close", text: char, line, column });
        advance(char);
      } else if (char === '"') {
        const startLine = line;
        const startColumn = column;
        advance(char);
        let body = "";
        let closed = false;
        while (i < input.length) {
          const c = input[i];
          if (c === "\\" && i + 1 < input.length) {
            body += c + input[i + 1];
            advance(c);
            advance(input[i]);
          } else if (c === '"') {
            advance(c);
            closed = true;
            break;
          } else {
            body += c;
            advance(c);
          }
        }
        if (!closed) {
          throw new KicadSyntaxError("Unterminated string", startLine, startColumn);
        }
        tokens.push({ kind: "string", text: this.unescape(body), line: startLine, column: startColumn });
      } else if (/\s/.test(char)) {
        advance(char);
      } else {
        const startColumn = column;
        let text = "";
        while (i < input.length && !/[\s()"]/.test(input[i])) {
          text += input[i];
          advance(input[i]);
        }
        tokens.push({ kind: "atom", text, line, column: startColumn });
      }
    }

    return tokens;
  }

  private static parseTokens(tokens: Token[]): SExpr[] {
    const root: SExpr[] = [];
    const stack: { items: SExpr[]; open: Token }[] = [];

    for (const token of tokens) {
      const target = stack.length > 0 ? stack[stack.length - 1].items : root;
      switch (token.kind) {
        case "open":
          stack.push({ items: [], open: token });
          break;
        case "close": {
          const frame = stack.pop();
          if (!frame) {
            throw new KicadSyntaxError("Unexpected ')'", token.line, token.column);
          }
          const parent = stack.length > 0 ? stack[stack.length - 1].items : root;
          parent.push({ type: "list", items: frame.items });
          break;
        }
        case "string":
          target.push(str(token.text));
          break;
        case "atom":
          target.push(NUMBER_RE.test(token.text) ? num(Number(token.text), token.text) : sym(token.text));
          break;
      }
    }

    if (stack.length > 0) {
      const open = stack[0].open;
      throw new KicadSyntaxError(`Unbalanced parentheses: ${stack.length} list(s) not closed`, open.line, open.column);
    }

    return root;
  }
}
