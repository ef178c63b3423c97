import type { Footprint } from "@klc/kicad/FootprintModel";
import type { LibSymbol } from "@klc/kicad/SymbolModel";
import { ConfigError } from "@klc/kicad/errors";
import { FOOTPRINT_RULES } from "./footprint";
import { SYMBOL_RULES } from "./symbol";
import type { EntityKind, Rule } from "./types";

export type SymbolRule = Rule<LibSymbol>;
export type FootprintRule = Rule<Footprint>;
export type AnyRule = SymbolRule | FootprintRule;

/**
 * Natural order of rule codes: digit runs compare by value, so
 * `G1.7 < G1.10` and `EC01 < F5.2`.
 */
export function compareRuleCodes(a: string, b: string): number {
  const ta = a.match(/\d+|\D+/g) ?? [];
  const tb = b.match(/\d+|\D+/g) ?? [];
  for (let i = 0; i < Math.min(ta.length, tb.length); i++) {
    const [x, y] = [ta[i], tb[i]];
    if (x === y) continue;
    const bothNumeric = /^\d/.test(x) && /^\d/.test(y);
    if (bothNumeric && Number(x) !== Number(y)) return Number(x) - Number(y);
    return x < y ? -1 : 1;
  }
  return ta.length - tb.length;
}

function buildRegistry<E>(kind: EntityKind, rules: readonly Rule<E>[]): readonly Rule<E>[] {
  const seen = new Set<string>();
  for (const rule of rules) {
    if (rule.kind !== kind) throw new Error(`Rule ${rule.code} is a ${rule.kind} rule, registered as ${kind}`);
    if (seen.has(rule.code)) throw new Error(`Duplicate ${kind} rule code: ${rule.code}`);
    seen.add(rule.code);
  }
  return Object.freeze([...rules].sort((a, b) => compareRuleCodes(a.code, b.code)));
}

// ─── Registry ────────────────────────────────────────────────────────

export const SYMBOL_REGISTRY: readonly SymbolRule[] = buildRegistry("symbol", SYMBOL_RULES);
export const FOOTPRINT_REGISTRY: readonly FootprintRule[] = buildRegistry("footprint", FOOTPRINT_RULES);

export interface RuleSelection {
  /** Run only these codes. */
  only?: readonly string[];
  exclude?: readonly string[];
}

function select<E>(kind: EntityKind, registry: readonly Rule<E>[], selection: RuleSelection): Rule<E>[] {
  const known = new Set(registry.map(r => r.code));
  const unknown = [...(selection.only ?? []), ...(selection.exclude ?? [])].filter(code => !known.has(code));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown ${kind} rule${unknown.length > 1 ? "s" : ""}: ${unknown.join(", ")}`, {
      known: [...known],
    });
  }

  const only = selection.only && selection.only.length > 0 ? new Set(selection.only) : undefined;
  const exclude = new Set(selection.exclude ?? []);
  return registry.filter(r => (!only || only.has(r.code)) && !exclude.has(r.code));
}

export function selectRules(kind: "symbol", selection?: RuleSelection): SymbolRule[];
export function selectRules(kind: "footprint", selection?: RuleSelection): FootprintRule[];
export function selectRules(kind: EntityKind, selection: RuleSelection = {}): AnyRule[] {
  return kind === "symbol"
    ? select(kind, SYMBOL_REGISTRY, selection)
    : select(kind, FOOTPRINT_REGISTRY, selection);
}

/** Codes known for a kind, for filtering config-wide lists. */
export function ruleCodes(kind: EntityKind): string[] {
  return (kind === "symbol" ? SYMBOL_REGISTRY : FOOTPRINT_REGISTRY).map(r => r.code);
}

export function allRules(): AnyRule[] {
  return [...SYMBOL_REGISTRY, ...FOOTPRINT_REGISTRY];
}

export function findRule(kind: EntityKind, code: string): AnyRule | undefined {
  return allRules().find(r => r.kind === kind && r.code === code);
}
