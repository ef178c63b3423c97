import * as fs from "fs";
import * as path from "path";
import { SExpressionParser } from "@klc/kicad/SExpressionParser";
import { DanglingReferenceError, KicadError } from "@klc/kicad/errors";
import { Footprint, dumpFootprint, loadFootprintDirectory } from "@klc/kicad/FootprintModel";
import { SymbolLibrary, libNameFromPath, loadSymbolLibraryFile } from "@klc/kicad/SymbolLibrary";
import { LibSymbol, Pin, dumpSymbol } from "@klc/kicad/SymbolModel";
import { LibraryCheckOptions, LibraryReport, checkLibrary } from "@klc/rules/engine";
import type { FootprintRule, SymbolRule } from "@klc/rules/registry";
import type { EntityKind } from "@klc/rules/types";

// ─── Types ───────────────────────────────────────────────────────────

export type ChangeStatus = "added" | "removed" | "changed" | "unchanged";

export interface EntityChange {
  name: string;
  status: ChangeStatus;
  /** `derived` when only an ancestor changed. */
  reason?: "content" | "derived";
  /** Parent the change was inherited from. */
  via?: string;
  /** Parent name, for derived symbols. */
  extends?: string;
  /** The derivation parent differs between the two revisions. */
  extendsChanged?: boolean;
}

export type BreakageKind = "pins" | "nc-pins" | "removed" | "removed-library";

export interface DesignBreakingChange {
  library: string;
  /** Empty for a removed library. */
  name: string;
  kind: BreakageKind;
  details: string[];
}

/** A consistency problem found while comparing. Never fatal. */
export interface ComparisonFinding {
  severity: "warning";
  library: string;
  name: string;
  message: string;
  error?: KicadError;
}

export interface LibraryComparison {
  kind: EntityKind;
  library: string;
  /** Whole-library status: added or removed when only one side exists. */
  status: ChangeStatus;
  /** Sorted by name. */
  changes: EntityChange[];
  counts: Record<ChangeStatus, number>;
  findings: ComparisonFinding[];
  breaking: DesignBreakingChange[];
  /** Rule check of the added and changed entities. */
  check?: LibraryReport;
  /** The whole library could not be read. */
  loadError?: KicadError;
  /** Single files of a `.pretty` directory that could not be read; the rest are compared. */
  fileErrors: KicadError[];
}

/** Answers whether a `Lib:Name` footprint reference exists. */
export interface FootprintResolver {
  has(reference: string): boolean;
}

/** Looks footprints up as `<root>/<Lib>.pretty/<Name>.kicad_mod`. */
export class DirectoryFootprintResolver implements FootprintResolver {
  private readonly cache = new Map<string, boolean>();

  constructor(private readonly root: string) {}

  has(reference: string): boolean {
    const cached = this.cache.get(reference);
    if (cached !== undefined) return cached;
    const [lib, name] = reference.split(":");
    const found =
      lib !== undefined && name !== undefined && fs.existsSync(path.join(this.root, `${lib}.pretty`, `${name}.kicad_mod`));
    this.cache.set(reference, found);
    return found;
  }
}

interface CompareOptions<R> {
  /** Mark symbols changed when an ancestor changed. */
  checkDerived?: boolean;
  /** Leave derived symbols out entirely. */
  skipDerived?: boolean;
  footprints?: FootprintResolver;
  designBreakingChanges?: boolean;
  /** Rules to run on added and changed entities; no check without them. */
  rules?: readonly R[];
  checkOptions?: LibraryCheckOptions;
}

export type SymbolCompareOptions = CompareOptions<SymbolRule>;
export type FootprintCompareOptions = CompareOptions<FootprintRule>;

// ─── Classification ──────────────────────────────────────────────────

function emptyCounts(): Record<ChangeStatus, number> {
  return { added: 0, removed: 0, changed: 0, unchanged: 0 };
}

const byName = (a: { name: string }, b: { name: string }) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

/** Classify every name of OLD ∪ NEW by comparing canonical text. */
function classify<E extends { name: string }>(
  oldItems: ReadonlyMap<string, E>,
  newItems: ReadonlyMap<string, E>,
  canonical: (e: E) => string
): Map<string, EntityChange> {
  const changes = new Map<string, EntityChange>();
  for (const [name, item] of newItems) {
    const before = oldItems.get(name);
    if (!before) changes.set(name, { name, status: "added" });
    else if (canonical(before) === canonical(item)) changes.set(name, { name, status: "unchanged" });
    else changes.set(name, { name, status: "changed", reason: "content" });
  }
  for (const name of oldItems.keys()) {
    if (!newItems.has(name)) changes.set(name, { name, status: "removed" });
  }
  return changes;
}

function summarize(
  kind: EntityKind,
  library: string,
  status: ChangeStatus,
  changes: Map<string, EntityChange>
): LibraryComparison {
  const sorted = [...changes.values()].sort(byName);
  const counts = emptyCounts();
  sorted.forEach(c => counts[c.status]++);
  return { kind, library, status, changes: sorted, counts, findings: [], breaking: [], fileErrors: [] };
}

function libraryStatus(hasOld: boolean, hasNew: boolean, changes: Iterable<EntityChange>): ChangeStatus {
  if (!hasOld) return "added";
  if (!hasNew) return "removed";
  for (const c of changes) if (c.status !== "unchanged") return "changed";
  return "unchanged";
}

// ─── Symbols ─────────────────────────────────────────────────────────

const canonicalSymbol = (s: LibSymbol) => SExpressionParser.format(dumpSymbol(s));

function snapshot(lib: SymbolLibrary | undefined, skipDerived: boolean): Map<string, LibSymbol> {
  const map = new Map<string, LibSymbol>();
  for (const symbol of lib?.symbols ?? []) {
    if (skipDerived && symbol.isDerived) continue;
    map.set(symbol.name, symbol);
  }
  return map;
}

function errorFinding(library: string, name: string, err: KicadError): ComparisonFinding {
  return { severity: "warning", library, name, message: err.message, error: err };
}

/**
 * Re-mark unchanged derived symbols whose parent changed. Parents are
 * visited first, so changes travel down chains of any length.
 */
function propagateDerivedChanges(lib: SymbolLibrary, changes: Map<string, EntityChange>, findings: ComparisonFinding[]): void {
  const depthOf = new Map<string, number>();
  for (const symbol of lib.symbols) {
    try {
      depthOf.set(symbol.name, lib.inheritanceDepth(symbol.name));
    } catch (err) {
      // missing parents and inheritance cycles alike
      if (!(err instanceof KicadError)) throw err;
      findings.push(errorFinding(lib.libName, symbol.name, err));
    }
  }

  const ordered = [...depthOf.entries()].sort((a, b) => a[1] - b[1] || (a[0] < b[0] ? -1 : 1));
  for (const [name] of ordered) {
    const symbol = lib.get(name);
    const change = changes.get(name);
    if (!symbol?.extends || !change || change.status !== "unchanged") continue;
    if (changes.get(symbol.extends)?.status === "changed") {
      changes.set(name, { ...change, status: "changed", reason: "derived", via: symbol.extends });
    }
  }
}

function flattenedPins(lib: SymbolLibrary, symbol: LibSymbol): Pin[] {
  try {
    return lib.flatten(symbol.name).pins;
  } catch (err) {
    if (err instanceof KicadError) return symbol.pins;
    throw err;
  }
}

/** Pins removed, renumbered or moved between two revisions of a symbol. */
export function comparePins(oldPins: readonly Pin[], newPins: readonly Pin[]): { kind?: "pins" | "nc-pins"; details: string[] } {
  const details: string[] = [];
  let normal = 0;
  let nc = 0;
  for (const before of oldPins) {
    const after = newPins.find(p => p.number === before.number);
    if (!after) {
      details.push(`Pin ${before.number} (${before.name}) was removed or renumbered`);
      if (before.etype === "no_connect") nc++;
      else normal++;
      continue;
    }
    if (before.at.x !== after.at.x || before.at.y !== after.at.y) {
      details.push(`Pin ${before.number} (${before.name}) moved from (${before.at.x}, ${before.at.y}) to (${after.at.x}, ${after.at.y})`);
      if (before.etype === "no_connect" && after.etype === "no_connect") nc++;
      else normal++;
    }
  }
  if (normal > 0) return { kind: "pins", details };
  return nc > 0 ? { kind: "nc-pins", details } : { details };
}

function checkFootprintLinks(
  library: string,
  symbols: readonly LibSymbol[],
  resolver: FootprintResolver,
  findings: ComparisonFinding[]
): void {
  for (const symbol of symbols) {
    const ref = symbol.getProperty("Footprint")?.value ?? "";
    if (ref === "" || resolver.has(ref)) continue;
    const err = new DanglingReferenceError(symbol.name, ref, `Symbol "${symbol.name}" uses footprint "${ref}", which does not exist`, {
      entity: symbol.name,
      library,
    });
    findings.push(errorFinding(library, symbol.name, err));
  }
}

export function compareSymbolLibraries(
  oldLib: SymbolLibrary | undefined,
  newLib: SymbolLibrary | undefined,
  options: SymbolCompareOptions = {}
): LibraryComparison {
  const library = newLib?.libName ?? oldLib?.libName ?? "";
  const skipDerived = options.skipDerived ?? false;
  const oldSymbols = snapshot(oldLib, skipDerived);
  const newSymbols = snapshot(newLib, skipDerived);

  const changes = classify(oldSymbols, newSymbols, canonicalSymbol);
  for (const [name, change] of changes) {
    const before = oldSymbols.get(name)?.extends;
    const after = newSymbols.get(name)?.extends;
    if (after !== undefined || before !== undefined) change.extends = after ?? before;
    if (change.status !== "added" && change.status !== "removed" && before !== after) change.extendsChanged = true;
  }

  const findings: ComparisonFinding[] = [];
  if (newLib && options.checkDerived && !skipDerived) propagateDerivedChanges(newLib, changes, findings);

  const result = summarize("symbol", library, libraryStatus(oldLib !== undefined, newLib !== undefined, changes.values()), changes);
  result.findings = findings;

  const delta = result.changes
    .filter(c => c.status === "added" || c.status === "changed")
    .map(c => newSymbols.get(c.name))
    .filter((s): s is LibSymbol => s !== undefined);

  if (newLib && options.footprints) checkFootprintLinks(library, delta, options.footprints, result.findings);

  if (options.designBreakingChanges) {
    if (!newLib) {
      result.breaking.push({ library, name: "", kind: "removed-library", details: [] });
    } else {
      for (const change of result.changes) {
        if (change.status === "removed") {
          result.breaking.push({ library, name: change.name, kind: "removed", details: [] });
          continue;
        }
        const before = oldSymbols.get(change.name);
        const after = newSymbols.get(change.name);
        if (change.status !== "changed" || !oldLib || !before || !after) continue;
        const pins = comparePins(flattenedPins(oldLib, before), flattenedPins(newLib, after));
        if (pins.kind) result.breaking.push({ library, name: change.name, kind: pins.kind, details: pins.details });
      }
    }
  }

  if (newLib && options.rules) {
    result.check = checkLibrary(
      { kind: "symbol", library, entities: delta, loadErrors: [] },
      options.rules,
      { ...options.checkOptions, library: newLib }
    );
  }
  return result;
}

// ─── Footprints ──────────────────────────────────────────────────────

const canonicalFootprint = (fp: Footprint) => SExpressionParser.format(dumpFootprint(fp));

export function compareFootprintLibraries(
  library: string,
  oldFootprints: readonly Footprint[] | undefined,
  newFootprints: readonly Footprint[] | undefined,
  options: FootprintCompareOptions = {}
): LibraryComparison {
  const index = (fps: readonly Footprint[] | undefined) => new Map((fps ?? []).map(fp => [fp.name, fp]));
  const before = index(oldFootprints);
  const after = index(newFootprints);

  const changes = classify(before, after, canonicalFootprint);
  const status = libraryStatus(oldFootprints !== undefined, newFootprints !== undefined, changes.values());
  const result = summarize("footprint", library, status, changes);

  if (options.designBreakingChanges) {
    if (!newFootprints) result.breaking.push({ library, name: "", kind: "removed-library", details: [] });
    else {
      for (const c of result.changes.filter(c => c.status === "removed")) {
        result.breaking.push({ library, name: c.name, kind: "removed", details: [] });
      }
    }
  }

  if (newFootprints && options.rules) {
    const delta = result.changes
      .filter(c => c.status === "added" || c.status === "changed")
      .map(c => after.get(c.name))
      .filter((fp): fp is Footprint => fp !== undefined);
    result.check = checkLibrary({ kind: "footprint", library, entities: delta, loadErrors: [] }, options.rules, options.checkOptions);
  }
  return result;
}

// ─── Batches ─────────────────────────────────────────────────────────

export class ComparisonReport {
  constructor(public readonly libraries: LibraryComparison[]) {}

  get designBreakingChanges(): DesignBreakingChange[] {
    return this.libraries.flatMap(l => l.breaking);
  }

  /** Entities whose rule check found errors. */
  get failedChecks(): number {
    return this.libraries.reduce((n, l) => n + (l.check?.entities.filter(e => e.errors > 0).length ?? 0), 0);
  }

  get loadErrors(): KicadError[] {
    return this.libraries.flatMap(l => (l.loadError ? [l.loadError, ...l.fileErrors] : l.fileErrors));
  }

  /** 3 on any failed check, design-breaking change or unreadable file. */
  get exitStatus(): 0 | 3 {
    return this.failedChecks + this.designBreakingChanges.length + this.loadErrors.length > 0 ? 3 : 0;
  }
}

/** `.kicad_sym` files and `.pretty` directories under the given paths, by base name. */
export function collectLibraries(paths: readonly string[]): Map<string, string> {
  const libs = new Map<string, string>();
  const visit = (p: string) => {
    if (!fs.existsSync(p)) return;
    const stat = fs.statSync(p);
    if (stat.isDirectory()) {
      if (p.endsWith(".pretty")) {
        libs.set(path.basename(p), path.resolve(p));
        return;
      }
      for (const entry of fs.readdirSync(p).sort()) visit(path.join(p, entry));
    } else if (p.endsWith(".kicad_sym")) {
      libs.set(path.basename(p), path.resolve(p));
    }
  };
  paths.forEach(visit);
  return libs;
}

export interface PathCompareOptions extends SymbolCompareOptions {
  footprintRules?: readonly FootprintRule[];
}

function loadFailure(kind: EntityKind, library: string, err: KicadError): LibraryComparison {
  return { ...summarize(kind, library, "changed", new Map()), loadError: err };
}

function compareSymbolFiles(oldPath: string | undefined, newPath: string | undefined, options: PathCompareOptions): LibraryComparison {
  const name = libNameFromPath(newPath ?? oldPath ?? "");
  try {
    const before = oldPath ? loadSymbolLibraryFile(oldPath) : undefined;
    const after = newPath ? loadSymbolLibraryFile(newPath) : undefined;
    return compareSymbolLibraries(before, after, options);
  } catch (err) {
    if (err instanceof KicadError) return loadFailure("symbol", name, err);
    throw err;
  }
}

function compareFootprintDirs(oldPath: string | undefined, newPath: string | undefined, options: PathCompareOptions): LibraryComparison {
  const name = path.basename(newPath ?? oldPath ?? "").replace(/\.pretty$/, "");
  const fileErrors: KicadError[] = [];
  const unreadable = new Set<string>();
  const load = (dir: string | undefined) => {
    if (!dir) return undefined;
    const loaded = loadFootprintDirectory(dir);
    for (const err of loaded.errors) {
      fileErrors.push(err);
      if (typeof err.context.file === "string") unreadable.add(path.basename(err.context.file, ".kicad_mod"));
    }
    return loaded.footprints;
  };
  const before = load(oldPath);
  const after = load(newPath);
  // a footprint unreadable on either side is neither added nor removed
  const readable = (fps: Footprint[] | undefined) => fps?.filter(fp => !unreadable.has(fp.name));
  const result = compareFootprintLibraries(name, readable(before), readable(after), {
    designBreakingChanges: options.designBreakingChanges,
    rules: options.footprintRules,
    checkOptions: options.checkOptions,
  });
  result.fileErrors = fileErrors;
  return result;
}

/**
 * Compare two revisions given as files or directories. Libraries pair up by
 * base name; one that fails to load is recorded and the batch continues.
 */
export function compareLibraryPaths(
  oldPaths: readonly string[],
  newPaths: readonly string[],
  options: PathCompareOptions = {}
): ComparisonReport {
  const before = collectLibraries(oldPaths);
  const after = collectLibraries(newPaths);
  const names = [...new Set([...after.keys(), ...before.keys()])].sort();

  const libraries = names.map(name =>
    name.endsWith(".pretty")
      ? compareFootprintDirs(before.get(name), after.get(name), options)
      : compareSymbolFiles(before.get(name), after.get(name), options)
  );
  return new ComparisonReport(libraries);
}

