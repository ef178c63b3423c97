import type { LibSymbol } from "@klc/kicad/SymbolModel";
import fillerWords from "../../data/keyword-filler-words.json";
import { Findings, defineRule, isValidName, quoteList } from "../helpers";

const FILLER_WORDS = new Set<string>(fillerWords);

const FORBIDDEN_KEYWORD_CHARS = /\.\W|\.$|[,:;?!<>]/g;

type SymbolView = Readonly<LibSymbol>;

/** Graphic and power symbols follow relaxed field rules. */
function isSpecial(symbol: SymbolView): boolean {
  return symbol.isGraphicSymbol || symbol.isPowerSymbol;
}

function checkReference(symbol: SymbolView, out: Findings): void {
  const ref = symbol.getProperty("Reference");
  if (!ref) {
    out.error("Component is missing Reference field");
    return;
  }
  if (!isSpecial(symbol) && ref.hide) out.error("Reference field must be VISIBLE");
  if (isSpecial(symbol) && !ref.hide) {
    out.error("Reference field must be INVISIBLE in graphic symbols or power-symbols");
  }
}

function checkValue(symbol: SymbolView, out: Findings): void {
  const prop = symbol.getProperty("Value");
  if (!prop) {
    out.error("Component is missing Value field");
    return;
  }
  const value = prop.value.length > 1 && prop.value.startsWith('"') && prop.value.endsWith('"') ? prop.value.slice(1, -1) : prop.value;

  if (!isSpecial(symbol)) {
    if (value !== symbol.name) out.error(`Value ${value} does not match component name.`);
    if (prop.hide) out.error("Value field must be VISIBLE");
  } else if (value !== symbol.name && `~${value}` !== symbol.name) {
    out.error(`Value ${value} does not match component name.`);
  }

  if (!isValidName(symbol.name, isSpecial(symbol))) {
    out.error(`Symbol name '${symbol.name}' contains invalid characters as per KLC 1.7`);
  }
}

function checkFootprint(symbol: SymbolView, out: Findings): void {
  const prop = symbol.getProperty("Footprint");
  if (!prop) out.error("Component is missing Footprint field");
  else if (!prop.hide) out.error("Footprint field must be INVISIBLE");
}

function looksLikeUrl(text: string): boolean {
  return ["http", "www", "ftp"].some(p => text.startsWith(p)) || text.endsWith(".pdf") || text.includes(".htm");
}

function checkDatasheet(symbol: SymbolView, out: Findings): void {
  const ds = symbol.getProperty("Datasheet");
  if (!ds) {
    out.error("Component is missing Datasheet field");
    return;
  }
  if (!ds.hide) out.error("Datasheet field must be INVISIBLE");
  if (isSpecial(symbol)) return;

  if (ds.value === "") out.error("Datasheet field must not be EMPTY");
  else if (ds.value.length > 2 && !looksLikeUrl(ds.value)) {
    out.warning(`Datasheet entry '${ds.value}' does not look like a URL`);
  }
}

function checkDescription(symbol: SymbolView, out: Findings): void {
  const desc = symbol.getProperty("Description");
  if (!desc) {
    if (!symbol.isPowerSymbol) out.error("Missing Description field on 'Properties' tab");
    return;
  }
  if (desc.value.toLowerCase().includes(symbol.name.toLowerCase())) {
    out.warning("Symbol name should not be included in description");
  }
}

// ─── Keywords ────────────────────────────────────────────────────────

function tokenizeKeywords(keywords: string, splitDashes = true): string[] {
  return keywords.split(splitDashes ? /\s+|-/ : /\s+/).map(t => t.trim().toLowerCase());
}

function tokenizeDescription(description: string, splitDashes = true): string[] {
  const cleaned = description.replace(/[^\p{L}\p{N}_\s-]/gu, "");
  return [...new Set(tokenizeKeywords(cleaned, splitDashes))];
}

function checkKeywordAliases(keywords: string, description: string, out: Findings): void {
  const keywordTokens = tokenizeKeywords(keywords, false);
  const descriptionTokens = tokenizeDescription(description, false);
  const tokens = new Set([...keywordTokens, ...descriptionTokens]);
  const subtokens = new Set([...tokenizeKeywords(keywords), ...tokenizeDescription(description)]);

  if (subtokens.has("operational") && descriptionTokens.includes("amplifier") && !subtokens.has("opamp")) {
    out.warning("Metadata contains 'operational amplifier', please add 'opamp' to the keywords");
  }
  if (subtokens.has("opamp") && !(subtokens.has("operational") && subtokens.has("amplifier"))) {
    out.warning("Metadata contains 'opamp', please add 'operational-amplifier' to the keywords");
  }
  if (tokens.has("low-dropout") && subtokens.has("regulator") && !tokens.has("ldo")) {
    out.warning("Metadata contains 'low-dropout .. regulator', please add 'ldo' to the keywords");
  }
  if (tokens.has("ldo") && !(tokens.has("low-dropout") && subtokens.has("regulator"))) {
    out.warning("Metadata contains 'LDO', please add 'low-dropout-regulator' to the keywords");
  }
}

function checkKeywords(symbol: SymbolView, out: Findings): void {
  const prop = symbol.getProperty("ki_keywords");
  if (!prop || prop.value.trim() === "") {
    if (!symbol.isPowerSymbol) {
      out.warning(
        "Missing or empty Keywords field on 'Properties' tab. " +
          "If you have nothing to add here, add the manufacturer e.g. 'texas'"
      );
    }
    return;
  }
  const keywords = prop.value;

  const forbidden = keywords.match(FORBIDDEN_KEYWORD_CHARS);
  if (forbidden) out.error(`Symbol keywords contain forbidden characters: ${quoteList(forbidden)}`);

  const fillers = [...new Set(tokenizeKeywords(keywords).filter(t => FILLER_WORDS.has(t)))];
  if (fillers.length > 0) {
    out.error(`S6.2.7b: Symbol keywords contain forbidden filler words: ${quoteList(fillers)}`);
  }

  checkKeywordAliases(keywords, symbol.getProperty("Description")?.value ?? "", out);
}

export const S6_2 = defineRule<LibSymbol>(
  "symbol",
  "S6.2",
  "Symbol fields and metadata filled out as required",
  (symbol, out) => {
    checkReference(symbol, out);
    checkValue(symbol, out);
    checkFootprint(symbol, out);
    checkDatasheet(symbol, out);
    checkDescription(symbol, out);
    checkKeywords(symbol, out);
  }
);
