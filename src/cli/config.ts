import * as path from "path";
import * as fs from "fs";
import * as yaml from "js-yaml";
import { z } from "zod";
import { DEFAULT_RULE_CONSTANTS, RuleConstants } from "@klc/rules/constants";
import { errorMessage } from "@klc/kicad/errors";

const positive = z.number().positive();

const ConstantsSchema = z
  .object({
    fabWidth: positive,
    fabWidthMin: positive,
    fabWidthMax: positive,
    textSize: positive,
    textSizeMin: positive,
    textSizeMax: positive,
    textThickness: positive,
    textThicknessMin: positive,
    textThicknessMax: positive,
    courtyardWidth: positive,
    courtyardGrid: positive,
    modelPathPrefix: z.string(),
    referencePrefixes: z.record(z.string(), z.array(z.string())),
  })
  .partial()
  .strict();

const ConfigFileSchema = z
  .object({
    constants: ConstantsSchema.default({}),
    /** Rule codes skipped unless selected with --rule. */
    exclude: z.array(z.string()).default([]),
    footprintsDir: z.string().optional(),
    junit: z.string().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface Config {
  projectRoot: string;
  /** The config file that was read, if any. */
  configFile?: string;
  constants: RuleConstants;
  exclude: string[];
  /** Root holding `<Lib>.pretty` directories, for symbol → footprint links. */
  footprintsDir?: string;
  /** Default JUnit report path. */
  junit?: string;
}

const DEFAULT_FILE: ConfigFile = { constants: {}, exclude: [] };

/**
 * Parse a `klc.yml` document. Invalid YAML or settings fall back to the
 * defaults with a warning.
 */
export function parseConfigFile(content: string, source = "klc.yml"): ConfigFile {
  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (e) {
    console.warn(`⚠️  Failed to parse ${source}: ${errorMessage(e)}`);
    return DEFAULT_FILE;
  }
  const parsed = ConfigFileSchema.safeParse(data ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    console.warn(`⚠️  Invalid settings in ${source}, using defaults: ${issues}`);
    return DEFAULT_FILE;
  }
  return parsed.data;
}

let configCache: Config | null = null;

export function getConfig(): Config {
  if (configCache) return configCache;

  const projectRoot = process.env.INIT_CWD || process.cwd();

  // 1. Env var, 2. klc.yml in the project root
  let configFile: string | undefined;
  if (process.env.KLC_CONFIG) {
    configFile = path.resolve(projectRoot, process.env.KLC_CONFIG);
  } else if (fs.existsSync(path.join(projectRoot, "klc.yml"))) {
    configFile = path.join(projectRoot, "klc.yml");
  }

  let file = DEFAULT_FILE;
  if (configFile) {
    if (fs.existsSync(configFile)) {
      file = parseConfigFile(fs.readFileSync(configFile, "utf-8"), path.basename(configFile));
    } else {
      console.warn(`⚠️  Config file not found: ${configFile}`);
      configFile = undefined;
    }
  }

  const footprintsDir = process.env.KLC_FOOTPRINTS_DIR || file.footprintsDir;
  const junit = process.env.KLC_JUNIT || file.junit;

  configCache = {
    projectRoot,
    configFile,
    constants: { ...DEFAULT_RULE_CONSTANTS, ...file.constants },
    exclude: file.exclude,
    footprintsDir: footprintsDir ? path.resolve(projectRoot, footprintsDir) : undefined,
    junit: junit ? path.resolve(projectRoot, junit) : undefined,
  };

  return configCache;
}

export function resetConfig(): void {
  configCache = null;
}
