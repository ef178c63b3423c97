import type { Property } from "@klc/kicad/common";
import type { SchemaError } from "@klc/kicad/errors";
import type { SymbolLibrary } from "@klc/kicad/SymbolLibrary";
import type { RuleConstants } from "./constants";

export type EntityKind = "symbol" | "footprint";

export type Severity = "error" | "warning";

export type Verdict = "pass" | "warn" | "fail";

/** Where in the entity a violation sits, in millimetres. */
export interface ViolationLocation {
  x: number;
  y: number;
  layer?: string;
  unit?: number;
}

export interface Violation {
  rule: string;
  severity: Severity;
  message: string;
  /** Detail lines printed under the message. */
  extras: string[];
  location?: ViolationLocation;
}

/** What every checked entity exposes to the engine. */
export interface CheckableEntity {
  name: string;
  libName: string;
  readonly properties: Property[];
  issues: SchemaError[];
}

export interface RuleContext {
  constants: RuleConstants;
  /** Library of the symbol being checked, for derived-symbol lookups. */
  library?: SymbolLibrary;
}

/**
 * A single KLC check. `check` reads the entity and reports. The engine hands
 * it a read-only view, so a write throws and counts as a crash of the rule.
 */
export interface Rule<E> {
  readonly code: string;
  readonly kind: EntityKind;
  readonly description: string;
  readonly url: string;
  check(entity: Readonly<E>, ctx: RuleContext): Violation[];
}
