import type { GraphicItem } from "@klc/kicad/common";
import type { Pin } from "@klc/kicad/SymbolModel";
import { mmToMil, pointString } from "@klc/kicad/geometry";
import type { EntityKind, Rule, RuleContext, Severity, Violation, ViolationLocation } from "./types";

// ─── Findings ────────────────────────────────────────────────────────

/**
 * Collects the violations of one rule run. `extra` attaches detail lines to
 * the most recent error or warning.
 */
export class Findings {
  private readonly _items: Violation[] = [];

  constructor(private readonly rule: string) {}

  error(message: string, location?: ViolationLocation): this {
    return this.push("error", message, location);
  }

  warning(message: string, location?: ViolationLocation): this {
    return this.push("warning", message, location);
  }

  extra(...lines: string[]): this {
    const last = this._items[this._items.length - 1];
    if (last) last.extras.push(...lines);
    return this;
  }

  get items(): Violation[] {
    return this._items;
  }

  get errorCount(): number {
    return this._items.filter(v => v.severity === "error").length;
  }

  private push(severity: Severity, message: string, location?: ViolationLocation): this {
    const violation: Violation = { rule: this.rule, severity, message, extras: [] };
    if (location) violation.location = location;
    this._items.push(violation);
    return this;
  }
}

const CATEGORIES: Record<string, string> = {
  F: "footprint",
  G: "general",
  M: "model",
  S: "symbol",
};

/** `S4.1` → `https://klc.kicad.org/symbol/s4/s4.1/`; extended checks have no page. */
export function ruleUrl(code: string): string {
  if (code.startsWith("EC")) return "(extended check)";
  const category = CATEGORIES[code[0]] ?? "general";
  const name = code.toLowerCase();
  const group = name.split(".")[0];
  return `https://klc.kicad.org/${category}/${group}/${name}/`;
}

export function defineRule<E>(
  kind: EntityKind,
  code: string,
  description: string,
  check: (entity: Readonly<E>, out: Findings, ctx: RuleContext) => void
): Rule<E> {
  return {
    code,
    kind,
    description,
    url: ruleUrl(code),
    check(entity, ctx) {
      const out = new Findings(code);
      check(entity, out, ctx);
      return out.items;
    },
  };
}

// ─── Formatting ──────────────────────────────────────────────────────

export function round(value: number, digits = 5): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

export function pinString(pin: Pin): string {
  return `Pin ${pin.name} (${pin.number}) @ (${mmToMil(pin.at.x)}, ${mmToMil(pin.at.y)})`;
}

export function pinLocation(pin: Pin): ViolationLocation {
  return { x: pin.at.x, y: pin.at.y, unit: pin.unit };
}

export function graphicString(g: GraphicItem, options: { layer?: boolean; width?: boolean } = {}): string {
  let text = describeGraphic(g);
  if (options.layer && g.layer !== undefined) text += ` on ${g.layer}`;
  if (options.width) text += `, width ${g.stroke?.width ?? 0}mm`;
  return text;
}

function describeGraphic(g: GraphicItem): string {
  switch (g.kind) {
    case "line":
      return `Line from ${pointString(g.start)} to ${pointString(g.end)}`;
    case "rectangle":
      return `Rectangle from ${pointString(g.start)} to ${pointString(g.end)}`;
    case "circle":
      return `Circle @ ${pointString(g.center)}, radius ${round(g.radius)}`;
    case "arc":
      return `Arc from ${pointString(g.start)} via ${pointString(g.mid)} to ${pointString(g.end)}`;
    case "polyline":
    case "polygon":
    case "bezier":
      return `${g.kind[0].toUpperCase()}${g.kind.slice(1)} with ${g.points.length} points`;
    case "text":
      return `Text '${g.text}' @ (${g.at.x}, ${g.at.y})`;
  }
}

/** Quote each item and join them: `'a', 'b'`. */
export function quoteList(items: readonly string[]): string {
  return items.map(i => `'${i}'`).join(", ");
}

// ─── Names ───────────────────────────────────────────────────────────

const NAME_PUNCTUATION = "_-.+,";

/**
 * Library item names use letters, digits and `_-.+,`. Power and graphic
 * symbols may start with `~`.
 */
export function isValidName(name: string, allowLeadingTilde = false): boolean {
  const chars = [...name.toLowerCase()];
  return chars.every((c, i) => {
    if (i === 0 && allowLeadingTilde && c === "~") return true;
    return /[\p{L}\p{N}]/u.test(c) || NAME_PUNCTUATION.includes(c);
  });
}
