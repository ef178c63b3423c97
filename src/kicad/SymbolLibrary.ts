import * as fs from "fs";
import * as path from "path";
import { SExpressionParser, SExpr, SList, atomText, isList, keywordOf, num, str, tagged } from "./SExpressionParser";
import { HeaderLayout, Property, RawItem, raw } from "./common";
import { DanglingReferenceError, KicadError, SchemaError } from "./errors";
import { LibSymbol, SymbolUnit, dumpSymbol, loadSymbol } from "./SymbolModel";

export const SYMBOL_LIB_VERSION = 20241209;

export type SymbolLibraryItem = LibSymbol | RawItem;

/**
 * A `.kicad_sym` library: symbols in file order, plus the derived-symbol
 * resolver. Symbols refer to their parent by name only; every lookup goes
 * through this class.
 */
export class SymbolLibrary {
  libName: string;
  version?: number;
  generator?: string;
  generatorVersion?: string;
  items: SymbolLibraryItem[] = [];
  /** Fatal per-entity problems found while loading. */
  errors: KicadError[] = [];
  /** @internal */
  readonly layout = new HeaderLayout();

  private byName = new Map<string, LibSymbol>();

  constructor(libName: string) {
    this.libName = libName;
  }

  get symbols(): LibSymbol[] {
    return this.items.filter((i): i is LibSymbol => i instanceof LibSymbol);
  }

  /** Library-level items that are not symbols, including entities that failed to load. */
  rawItems(): RawItem[] {
    return this.items.filter((i): i is RawItem => !(i instanceof LibSymbol));
  }

  get names(): string[] {
    return this.symbols.map(s => s.name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): LibSymbol | undefined {
    return this.byName.get(name);
  }

  /**
   * Append a symbol. Names are unique within a library.
   */
  add(symbol: LibSymbol): this {
    if (this.byName.has(symbol.name)) {
      throw new SchemaError("symbol", `Duplicate symbol "${symbol.name}" in library "${this.libName}"`, {
        entity: symbol.name,
      });
    }
    symbol.libName = this.libName;
    this.byName.set(symbol.name, symbol);
    this.items.push(symbol);
    return this;
  }

  remove(name: string): boolean {
    const symbol = this.byName.get(name);
    if (!symbol) return false;
    this.byName.delete(name);
    this.items = this.items.filter(i => i !== symbol);
    return true;
  }

  // ─── Derived symbols ──────────────────────────────────────────────

  parentOf(symbol: LibSymbol): LibSymbol | undefined {
    if (symbol.extends === undefined) return undefined;
    const parent = this.byName.get(symbol.extends);
    if (!parent) {
      throw new DanglingReferenceError(
        symbol.name,
        symbol.extends,
        `Symbol "${symbol.name}" extends "${symbol.extends}", which is not in library "${this.libName}"`,
        { entity: symbol.name }
      );
    }
    return parent;
  }

  /**
   * The inheritance chain of `name`, root first and ending with the symbol itself.
   */
  ancestry(name: string): LibSymbol[] {
    const start = this.byName.get(name);
    if (!start) {
      throw new DanglingReferenceError(name, name, `Symbol "${name}" is not in library "${this.libName}"`);
    }
    const chain: LibSymbol[] = [start];
    const seen = new Set<string>([start.name]);
    let cursor = start;
    while (cursor.extends !== undefined) {
      if (cursor.extends === cursor.name) {
        throw new SchemaError("extends", `Symbol "${cursor.name}" extends itself`, { entity: cursor.name });
      }
      if (seen.has(cursor.extends)) {
        throw new SchemaError("extends", `Symbol "${name}" has a circular inheritance`, { entity: name });
      }
      const parent = this.parentOf(cursor);
      if (!parent) break;
      seen.add(parent.name);
      chain.unshift(parent);
      cursor = parent;
    }
    return chain;
  }

  inheritanceDepth(name: string): number {
    return this.ancestry(name).length - 1;
  }

  /** The topmost ancestor, or the symbol itself. */
  rootOf(symbol: LibSymbol): LibSymbol {
    return this.ancestry(symbol.name)[0];
  }

  /**
   * Copy of `name` with everything it inherits merged in: ancestors' units,
   * renamed to this symbol, then its own; properties with the child winning.
   */
  flatten(name: string): LibSymbol {
    const chain = this.ancestry(name);
    const self = chain[chain.length - 1];
    if (chain.length === 1) return self;

    const flat = new LibSymbol(self.name, self.libName);
    const mergedProps = new Map<string, Property>();
    const mergedUnits: SymbolUnit[] = [];

    for (const symbol of chain) {
      for (const prop of symbol.properties) mergedProps.set(prop.name, prop);
      // spread drops the origin so the unit is written under the child's name
      for (const unit of symbol.units) mergedUnits.push(symbol === self ? unit : { ...unit });

      flat.power = symbol.power ?? flat.power;
      flat.pinNumbersHidden = symbol.pinNumbersHidden ?? flat.pinNumbersHidden;
      flat.pinNames = symbol.pinNames ?? flat.pinNames;
      flat.excludeFromSim = symbol.excludeFromSim ?? flat.excludeFromSim;
      flat.inBom = symbol.inBom ?? flat.inBom;
      flat.onBoard = symbol.onBoard ?? flat.onBoard;
      flat.embeddedFonts = symbol.embeddedFonts ?? flat.embeddedFonts;
    }

    flat.items = [
      ...mergedProps.values(),
      ...mergedUnits,
      ...self.items.filter(i => i.kind !== "property" && i.kind !== "unit"),
    ];
    flat.issues = [...self.issues];
    return flat;
  }

  /** Parents before children, then by name. Dangling or circular chains sort as roots. */
  sortedForWrite(): LibSymbol[] {
    const depth = new Map<string, number>();
    for (const symbol of this.symbols) {
      let d = 0;
      const seen = new Set<string>([symbol.name]);
      let cursor = symbol;
      while (cursor.extends !== undefined && !seen.has(cursor.extends)) {
        const parent = this.byName.get(cursor.extends);
        if (!parent) break;
        seen.add(parent.name);
        cursor = parent;
        d++;
      }
      depth.set(symbol.name, d);
    }
    return [...this.symbols].sort(
      (a, b) => (depth.get(a.name) ?? 0) - (depth.get(b.name) ?? 0) || compareNames(a.name, b.name)
    );
  }
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// ─── Load / dump ─────────────────────────────────────────────────────

/**
 * Build a library from its `(kicad_symbol_lib ...)` node. Entities that fail
 * to load are recorded in `errors` and kept as raw items.
 */
export function loadSymbolLibrary(node: SExpr, libName: string): SymbolLibrary {
  if (!isList(node, "kicad_symbol_lib")) {
    throw new SchemaError(keywordOf(node) ?? "(atom)", "Expected a (kicad_symbol_lib ...) form", { library: libName });
  }
  const lib = new SymbolLibrary(libName);

  for (const child of node.items.slice(1)) {
    if (!isList(child)) continue;
    const slot = lib.items.length;
    switch (keywordOf(child)) {
      case "version":
        lib.version = Number(atomText(child.items[1]));
        lib.layout.record("version", slot, child, lib.version);
        continue;
      case "generator":
        lib.generator = atomText(child.items[1]);
        lib.layout.record("generator", slot, child, lib.generator);
        continue;
      case "generator_version":
        lib.generatorVersion = atomText(child.items[1]);
        lib.layout.record("generator_version", slot, child, lib.generatorVersion);
        continue;
      case "symbol":
        break;
      default:
        lib.items.push(raw(child));
        continue;
    }

    try {
      lib.add(loadSymbol(child, libName));
    } catch (err) {
      if (!(err instanceof SchemaError)) throw err;
      lib.errors.push(err.withContext({ library: libName }));
      lib.items.push(raw(child));
    }
  }
  return lib;
}

export function dumpSymbolLibrary(lib: SymbolLibrary, options: { sort?: boolean } = {}): SList {
  const entities = options.sort ? [...lib.sortedForWrite(), ...lib.rawItems()] : lib.items;
  const body = entities.map(item => (item instanceof LibSymbol ? dumpSymbol(item) : item.node));
  const children = lib.layout.arrange(
    [
      {
        keyword: "version",
        value: lib.version,
        build: () => tagged("version", num(lib.version ?? SYMBOL_LIB_VERSION)),
        defaultSlot: "start",
      },
      {
        keyword: "generator",
        value: lib.generator,
        build: () => tagged("generator", str(lib.generator ?? "")),
        defaultSlot: "start",
      },
      {
        keyword: "generator_version",
        value: lib.generatorVersion,
        build: () => tagged("generator_version", str(lib.generatorVersion ?? "")),
        defaultSlot: "start",
      },
    ],
    body
  );
  return tagged("kicad_symbol_lib", ...children);
}

// ─── Files ───────────────────────────────────────────────────────────

export function libNameFromPath(filePath: string): string {
  return path.basename(filePath).replace(/\.kicad_sym$/, "");
}

/**
 * Read a `.kicad_sym` file. It must hold exactly one `(kicad_symbol_lib ...)` form.
 */
export function loadSymbolLibraryFile(filePath: string): SymbolLibrary {
  const libName = libNameFromPath(filePath);
  try {
    const content = fs.readFileSync(filePath, "utf-8");
    const forms = SExpressionParser.parse(content);
    if (forms.length !== 1) {
      throw new SchemaError("kicad_symbol_lib", `Expected one top-level form, found ${forms.length}`);
    }
    const lib = loadSymbolLibrary(forms[0], libName);
    lib.errors.forEach(e => e.withContext({ file: filePath }));
    return lib;
  } catch (err) {
    if (err instanceof KicadError) throw err.withContext({ file: filePath });
    throw err;
  }
}

export function writeSymbolLibraryFile(lib: SymbolLibrary, filePath: string, options: { sort?: boolean } = {}): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, SExpressionParser.formatFile([dumpSymbolLibrary(lib, options)]));
}
