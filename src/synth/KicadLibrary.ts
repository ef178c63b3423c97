import * as fs from "fs";
import * as path from "path";
import { SExpressionParser } from "@klc/kicad/SExpressionParser";
import { SYMBOL_LIB_VERSION, SymbolLibrary, dumpSymbolLibrary } from "@klc/kicad/SymbolLibrary";
import { KicadFootprint } from "./KicadFootprint";
import { KicadSymbol } from "./KicadSymbol";

/**
 * Collects KicadSymbol and KicadFootprint builders into library files.
 *
 * - Symbols → single `.kicad_sym` file, parents before derived symbols
 * - Footprints → individual `.kicad_mod` files inside a `.pretty` directory
 *
 * @example
 * ```ts
 * const lib = new KicadLibrary("Project");
 * lib.addSymbol(mySymbol);
 * lib.addFootprint(myFootprint);
 * lib.writeAll("lib");
 * ```
 */
export class KicadLibrary {
  private _symbols: KicadSymbol[] = [];
  private _footprints: KicadFootprint[] = [];

  constructor(public readonly name: string = "Project") {}

  public addSymbol(symbol: KicadSymbol): this {
    this._symbols.push(symbol);
    return this;
  }

  public addFootprint(footprint: KicadFootprint): this {
    this._footprints.push(footprint);
    return this;
  }

  public get symbols(): ReadonlyArray<KicadSymbol> {
    return this._symbols;
  }

  public get footprints(): ReadonlyArray<KicadFootprint> {
    return this._footprints;
  }

  // ── Symbol library file ────────────────────────────────────────────

  /** The symbols as a loaded-library model, ready for checks or comparison. */
  public buildSymbolLibrary(libName = this.name): SymbolLibrary {
    const lib = new SymbolLibrary(libName);
    lib.version = SYMBOL_LIB_VERSION;
    lib.generator = "kicad_lib_check";
    lib.generatorVersion = "9.0";
    for (const sym of this._symbols) {
      lib.add(sym.build(libName));
    }
    return lib;
  }

  /** A complete `.kicad_sym` file, symbols sorted by inheritance depth then name. */
  public serializeSymbols(libName = this.name): string {
    return SExpressionParser.formatFile([dumpSymbolLibrary(this.buildSymbolLibrary(libName), { sort: true })]);
  }

  /**
   * Write all symbols into a single `.kicad_sym` file.
   * @returns The full path to the written file.
   */
  public writeSymbols(filePath: string): string {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, this.serializeSymbols(path.basename(filePath, ".kicad_sym")), "utf-8");
    return filePath;
  }

  // ── Footprint library directory ────────────────────────────────────

  /**
   * Write all footprints into a `.pretty` directory.
   * @returns Array of written file paths.
   */
  public writeFootprints(prettyDir: string): string[] {
    fs.mkdirSync(prettyDir, { recursive: true });
    return this._footprints.map(fp => fp.writeFile(prettyDir));
  }

  /**
   * Write `<name>.kicad_sym` and `<name>.pretty/` into one directory.
   */
  public writeAll(libDir: string): { symbolsPath: string; footprintPaths: string[] } {
    const symbolsPath = this.writeSymbols(path.join(libDir, `${this.name}.kicad_sym`));
    const footprintPaths = this.writeFootprints(path.join(libDir, `${this.name}.pretty`));
    return { symbolsPath, footprintPaths };
  }

  /**
   * Content of an fp-lib-table file pointing at this library's `.pretty` directory.
   * @param relativePathToLibDir - Path from the project dir to the directory containing the `.pretty`
   */
  public fpLibTable(relativePathToLibDir: string): string {
    // no path.join: it would normalize away ${KIPRJMOD}
    const uri = `\${KIPRJMOD}/${relativePathToLibDir}/${this.name}.pretty`;
    return KicadLibrary.libTable("fp_lib_table", this.name, uri, `${this.name} Footprints`);
  }

  public symLibTable(relativePathToLibDir: string): string {
    const uri = `\${KIPRJMOD}/${relativePathToLibDir}/${this.name}.kicad_sym`;
    return KicadLibrary.libTable("sym_lib_table", this.name, uri, `${this.name} Symbols`);
  }

  private static libTable(keyword: string, libName: string, uri: string, descr: string): string {
    return [
      `(${keyword}`,
      `  (version 7)`,
      `  (lib (name ${JSON.stringify(libName)})(type "KiCad")(uri ${JSON.stringify(uri)})(options "")(descr ${JSON.stringify(descr)}))`,
      `)`,
      "",
    ].join("\n");
  }
}
