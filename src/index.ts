/**
 * KiCad library check
 *
 * Parse, canonicalise, rule-check and compare KiCad symbol and footprint libraries.
 */

// S-expression engine
export { SExpressionParser, sym, str, num, list, tagged, isList, keywordOf, findChild, findChildren, atomText } from "@klc/kicad/SExpressionParser";
export type { SExpr, SList, SAtom, SSymbol, SString, SNumber } from "@klc/kicad/SExpressionParser";
export { structuralSort, structuralForm } from "@klc/kicad/structuralSort";

// Errors
export { KicadError, KicadSyntaxError, SchemaError, DanglingReferenceError, ConfigError, isKicadError } from "@klc/kicad/errors";

// Library data model
export { LibSymbol, loadSymbol, dumpSymbol, pinDirection } from "@klc/kicad/SymbolModel";
export type { Pin, SymbolUnit, SymbolItem } from "@klc/kicad/SymbolModel";
export { SymbolLibrary, loadSymbolLibrary, dumpSymbolLibrary, loadSymbolLibraryFile, writeSymbolLibraryFile } from "@klc/kicad/SymbolLibrary";
export { Footprint, loadFootprint, dumpFootprint, loadFootprintFile, loadFootprintDirectory, writeFootprintFile } from "@klc/kicad/FootprintModel";
export type { Pad, Model3D, FootprintAttributes } from "@klc/kicad/FootprintModel";
export type { Property, GraphicItem, Effects, Position } from "@klc/kicad/common";
export { BoundingBox } from "@klc/kicad/geometry";
export type { Point } from "@klc/kicad/geometry";

// Rules
export { checkEntity, checkLibrary, checkSymbolLibrary, exitStatus, runUnitTest, findExceptions } from "@klc/rules/engine";
export type { EntityReport, LibraryReport, RuleResult, ExitStatus } from "@klc/rules/engine";
export { SYMBOL_REGISTRY, FOOTPRINT_REGISTRY, selectRules, findRule, allRules } from "@klc/rules/registry";
export { DEFAULT_RULE_CONSTANTS } from "@klc/rules/constants";
export type { RuleConstants } from "@klc/rules/constants";
export type { Rule, Violation, Severity, Verdict } from "@klc/rules/types";

// Comparison
export {
  compareSymbolLibraries,
  compareFootprintLibraries,
  compareLibraryPaths,
  ComparisonReport,
  DirectoryFootprintResolver,
} from "@klc/compare/LibraryComparator";
export type { LibraryComparison, EntityChange, DesignBreakingChange } from "@klc/compare/LibraryComparator";

// Reports
export { JUnitReport, JUnitTestSuite, JUnitTestCase } from "@klc/report/junit";
export { metricsLines, writeMetrics } from "@klc/report/metrics";
export { appendErrorLog, readErrorLog } from "@klc/report/errorLog";

// Builders
export { KicadSymbol } from "@klc/synth/KicadSymbol";
export { KicadFootprint } from "@klc/synth/KicadFootprint";
export { KicadLibrary } from "@klc/synth/KicadLibrary";
