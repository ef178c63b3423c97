import { ConfigError, KicadError, errorMessage } from "@klc/kicad/errors";
import type { SymbolLibrary } from "@klc/kicad/SymbolLibrary";
import { LibSymbol } from "@klc/kicad/SymbolModel";
import { DEFAULT_RULE_CONSTANTS, type RuleConstants } from "./constants";
import type { CheckableEntity, EntityKind, Rule, RuleContext, Verdict, Violation } from "./types";

// ─── Reports ─────────────────────────────────────────────────────────

export interface RuleResult {
  rule: string;
  url: string;
  description: string;
  violations: Violation[];
  /** Set when a `KLC_<code>` property excepts this rule. */
  exception?: { notes: string[] };
}

export interface EntityReport {
  kind: EntityKind;
  library: string;
  name: string;
  /** One entry per rule that ran, in registry order. */
  results: RuleResult[];
  /** Counted violations, from rules that are not excepted. */
  violations: Violation[];
  /** Violations of excepted rules. Reported, never counted. */
  excepted: Violation[];
  /** Schema problems recovered while loading the entity. Each counts as a warning. */
  issues: string[];
  /** A derived symbol whose parent is missing or whose inheritance loops. Each counts as an error. */
  referenceErrors: string[];
  errors: number;
  warnings: number;
  verdict: Verdict;
}

export interface LibraryReport {
  kind: EntityKind;
  library: string;
  file?: string;
  /** Sorted by entity name. */
  entities: EntityReport[];
  loadErrors: KicadError[];
  errors: number;
  warnings: number;
  verdict: Verdict;
}

export interface CheckOptions {
  constants?: RuleConstants;
  library?: SymbolLibrary;
  /** Ignore `KLC_*` exception properties. */
  disableExceptions?: boolean;
}

export function verdictOf(errors: number, warnings: number): Verdict {
  if (errors > 0) return "fail";
  return warnings > 0 ? "warn" : "pass";
}

// ─── Exceptions ──────────────────────────────────────────────────────

const EXCEPTION_RE = /^KLC_([^_]+)(?:_+(.*))?$/;

/**
 * Rule exceptions declared on an entity: `KLC_S4.1` or `KLC_S4.1_pins`
 * properties, keyed by rule code. The property value is the note.
 */
export function findExceptions(entity: Readonly<CheckableEntity>): Map<string, string[]> {
  const found = new Map<string, string[]>();
  for (const prop of entity.properties) {
    const m = EXCEPTION_RE.exec(prop.name);
    if (!m) continue;
    const notes = found.get(m[1]) ?? [];
    notes.push(prop.value);
    found.set(m[1], notes);
  }
  return found;
}

// ─── Checking ────────────────────────────────────────────────────────

/** Why `entity` cannot be resolved against its library, if it is a derived symbol that cannot. */
export function referenceErrors(entity: unknown, library: SymbolLibrary | undefined): string[] {
  if (!library || !(entity instanceof LibSymbol) || entity.extends === undefined) return [];
  try {
    library.ancestry(entity.name);
    return [];
  } catch (err) {
    if (err instanceof KicadError) return [err.message];
    throw err;
  }
}

/**
 * A view of `target` that reads through to it and throws on any write, at
 * every depth. Maps and Sets are handed out as they are.
 */
export function readOnlyView<T extends object>(target: T): T {
  const views = new WeakMap<object, object>();
  const wrap = (value: unknown): unknown => {
    if (typeof value !== "object" || value === null || value instanceof Map || value instanceof Set) return value;
    let view = views.get(value);
    if (!view) {
      view = new Proxy(value, handler);
      views.set(value, view);
    }
    return view;
  };
  const refuse = (key: string | symbol): never => {
    throw new TypeError(`Cannot modify '${String(key)}' of a checked entity`);
  };
  const handler: ProxyHandler<object> = {
    get: (obj, key, receiver) => wrap(Reflect.get(obj, key, receiver)),
    set: (_obj, key) => refuse(key),
    defineProperty: (_obj, key) => refuse(key),
    deleteProperty: (_obj, key) => refuse(key),
    setPrototypeOf: () => refuse("prototype"),
  };
  const view = new Proxy<T>(target, handler);
  views.set(target, view);
  return view;
}

/** Rules see a read-only view, so no rule can change what a later one sees. */
function runRule<E extends object>(rule: Rule<E>, entity: E, ctx: RuleContext): Violation[] {
  try {
    return rule.check(readOnlyView(entity), ctx);
  } catch (err) {
    return [{ rule: rule.code, severity: "error", message: `Rule crashed: ${errorMessage(err)}`, extras: [] }];
  }
}

/**
 * Run every rule against one entity. Rules never stop each other: a rule that
 * throws reports a single error for itself and the rest still run.
 */
export function checkEntity<E extends CheckableEntity>(
  entity: E,
  rules: readonly Rule<E>[],
  options: CheckOptions = {}
): EntityReport {
  const ctx: RuleContext = { constants: options.constants ?? DEFAULT_RULE_CONSTANTS, library: options.library };
  const exceptions = options.disableExceptions ? new Map<string, string[]>() : findExceptions(entity);

  const results: RuleResult[] = [];
  const violations: Violation[] = [];
  const excepted: Violation[] = [];
  for (const rule of rules) {
    const found = runRule(rule, entity, ctx);
    const notes = exceptions.get(rule.code);
    const result: RuleResult = { rule: rule.code, url: rule.url, description: rule.description, violations: found };
    if (notes) {
      result.exception = { notes };
      excepted.push(...found);
    } else {
      violations.push(...found);
    }
    results.push(result);
  }

  const issues = entity.issues.map(i => i.message);
  const unresolved = referenceErrors(entity, options.library);
  const errors = violations.filter(v => v.severity === "error").length;
  const warnings = violations.length - errors + issues.length;
  return {
    kind: rules[0]?.kind ?? "symbol",
    library: entity.libName,
    name: entity.name,
    results,
    violations,
    excepted,
    issues,
    referenceErrors: unresolved,
    errors: errors + unresolved.length,
    warnings,
    verdict: verdictOf(errors + unresolved.length, warnings),
  };
}

// ─── Libraries ───────────────────────────────────────────────────────

/** A loaded library of one entity kind, ready to check. */
export interface EntitySource<E> {
  kind: EntityKind;
  library: string;
  file?: string;
  entities: readonly E[];
  loadErrors: readonly KicadError[];
}

export interface LibraryCheckOptions extends CheckOptions {
  /** Check only the entity with this name (case-insensitive). */
  component?: string;
  /** Check only entities whose name matches this regular expression (case-insensitive). */
  pattern?: string;
}

/** The entities of a library selected by `component` and `pattern`. */
export function filterEntities<E extends { name: string }>(entities: readonly E[], options: LibraryCheckOptions): E[] {
  let re: RegExp | undefined;
  if (options.pattern !== undefined) {
    try {
      re = new RegExp(options.pattern, "i");
    } catch (err) {
      throw new ConfigError(`Invalid pattern '${options.pattern}': ${errorMessage(err)}`);
    }
  }
  const component = options.component?.toLowerCase();
  return entities.filter(e => (component === undefined || e.name.toLowerCase() === component) && (!re || re.test(e.name)));
}

export function checkLibrary<E extends CheckableEntity>(
  source: EntitySource<E>,
  rules: readonly Rule<E>[],
  options: LibraryCheckOptions = {}
): LibraryReport {
  const entities = filterEntities(source.entities, options)
    .map(e => checkEntity(e, rules, options))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const errors = entities.reduce((n, e) => n + e.errors, 0) + source.loadErrors.length;
  const warnings = entities.reduce((n, e) => n + e.warnings, 0);
  return {
    kind: source.kind,
    library: source.library,
    file: source.file,
    entities,
    loadErrors: [...source.loadErrors],
    errors,
    warnings,
    verdict: verdictOf(errors, warnings),
  };
}

export function checkSymbolLibrary(
  lib: SymbolLibrary,
  rules: readonly Rule<LibSymbol>[],
  options: LibraryCheckOptions = {},
  file?: string
): LibraryReport {
  return checkLibrary(
    { kind: "symbol", library: lib.libName, file, entities: lib.symbols, loadErrors: lib.errors },
    rules,
    { ...options, library: lib }
  );
}

/** A library file that could not be loaded at all. */
export function failedLibrary(kind: EntityKind, library: string, error: KicadError, file?: string): LibraryReport {
  return { kind, library, file, entities: [], loadErrors: [error], errors: 1, warnings: 0, verdict: "fail" };
}

/** 1 is left to usage errors and crashes, so CI can tell a failing library from a failing tool. */
export type ExitStatus = 0 | 2 | 3;

/** 0 when clean, 2 when there are only warnings, 3 on any error or load failure. */
export function exitStatus(reports: readonly LibraryReport[]): ExitStatus {
  if (reports.some(r => r.verdict === "fail")) return 3;
  return reports.some(r => r.verdict === "warn") ? 2 : 0;
}

// ─── Unit-test mode ──────────────────────────────────────────────────

export interface UnitTestResult {
  name: string;
  passed: boolean;
  message: string;
}

const UNIT_TEST_RE = /^(Pass|Warn|Fail)__([^_]+)__(.+)$/;

/**
 * Entities named `<Pass|Warn|Fail>__<code>__<description>` assert the outcome
 * of one rule: Pass means no violations, Warn at least one warning, Fail at
 * least one error.
 */
export function runUnitTest<E extends CheckableEntity>(
  entity: E,
  rules: readonly Rule<E>[],
  options: CheckOptions = {}
): UnitTestResult {
  const name = entity.name;
  const m = UNIT_TEST_RE.exec(name);
  if (!m) return { name, passed: false, message: `Test '${name}' could not be parsed` };
  const [, expected, code] = m;
  const rule = rules.find(r => r.code === code);
  if (!rule) return { name, passed: false, message: `Test '${name}' failed` };

  const ctx: RuleContext = { constants: options.constants ?? DEFAULT_RULE_CONSTANTS, library: options.library };
  const found = runRule(rule, entity, ctx);
  const errors = found.filter(v => v.severity === "error").length;
  const warnings = found.length - errors;
  const passed = expected === "Fail" ? errors > 0 : expected === "Warn" ? warnings > 0 : found.length === 0;
  return { name, passed, message: `Test '${name}' ${passed ? "passed" : "failed"}` };
}
