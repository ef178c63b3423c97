import { SExpr, SExpressionParser, SList, atomText, findChild, keywordOf, list } from "./SExpressionParser";

/** Lists whose children are ordered data, never reordered. */
const ORDERED = new Set(["pts", "xy", "xyz", "at", "start", "mid", "end", "center", "size"]);

/** Name-like second atom or `(name ...)` child that identifies a list among its siblings. */
function identifierOf(node: SList): string {
  const keyword = keywordOf(node);
  if (keyword === "pin") {
    const number = findChild(node, "number");
    if (number) return atomText(number.items[1]) ?? "";
  }
  if (keyword === "property" || keyword === "symbol" || keyword === "pad" || keyword === "model" || keyword === "footprint") {
    return atomText(node.items[1]) ?? "";
  }
  const name = findChild(node, "name");
  return name ? atomText(name.items[1]) ?? "" : "";
}

function sortKey(expr: SExpr): string {
  const text = SExpressionParser.format(expr);
  if (expr.type !== "list") return `\u0000${text}`;
  return `${keywordOf(expr) ?? ""}:${identifierOf(expr)}::${text}`;
}

/**
 * Order-insensitive form of a tree: the leading atoms of every list stay in
 * place and the remaining children are sorted by keyword, identifier and
 * text. Point lists and coordinates keep their order.
 */
export function structuralSort(expr: SExpr): SExpr {
  if (expr.type !== "list") return expr;
  if (ORDERED.has(keywordOf(expr) ?? "")) return expr;

  let head = 0;
  while (head < expr.items.length && expr.items[head].type !== "list") head++;
  const positional = expr.items.slice(0, head);
  const rest = expr.items
    .slice(head)
    .map(structuralSort)
    .map(e => ({ key: sortKey(e), e }))
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .map(({ e }) => e);
  return list(...positional, ...rest);
}

/** Canonical text of a file after structural sorting. */
export function structuralForm(content: string): string {
  return SExpressionParser.formatFile(SExpressionParser.parse(content).map(structuralSort));
}
