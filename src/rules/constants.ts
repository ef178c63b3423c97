/**
 * Numeric limits and lookup tables the KLC rules check against. Every value
 * can be overridden from `klc.yml`.
 */
export interface RuleConstants {
  /** Nominal fabrication-layer line width (mm). */
  fabWidth: number;
  fabWidthMin: number;
  fabWidthMax: number;
  /** Nominal text height and width (mm). */
  textSize: number;
  textSizeMin: number;
  textSizeMax: number;
  textThickness: number;
  textThicknessMin: number;
  textThicknessMax: number;
  courtyardWidth: number;
  courtyardGrid: number;
  /** Required start of every 3D model path. */
  modelPathPrefix: string;
  /** Reference prefix → libraries whose symbols must use it. */
  referencePrefixes: Record<string, string[]>;
}

export const DEFAULT_RULE_CONSTANTS: RuleConstants = {
  fabWidth: 0.1,
  fabWidthMin: 0.025,
  fabWidthMax: 0.15,
  textSize: 1.0,
  textSizeMin: 0.25,
  textSizeMax: 2.0,
  textThickness: 0.15,
  textThicknessMin: 0.05,
  textThicknessMax: 0.3,
  courtyardWidth: 0.05,
  courtyardGrid: 0.01,
  modelPathPrefix: "${KICAD9_3DMODEL_DIR}/",
  referencePrefixes: {
    Y: ["Oscillator"],
  },
};

/** Model path prefixes of earlier KiCad releases. */
export const OUTDATED_MODEL_PREFIX_RE = /^(\$\{KICAD[0-8]_3DMODEL_DIR\})\//;
