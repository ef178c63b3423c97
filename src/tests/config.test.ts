import { describe, it, expect, vi, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { getConfig, parseConfigFile, resetConfig } from "../cli/config";
import { DEFAULT_RULE_CONSTANTS } from "../rules/constants";

describe("parseConfigFile", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reads constants and exclusions", () => {
    const file = parseConfigFile(
      ["constants:", "  fabWidth: 0.12", "  referencePrefixes:", "    Y: [Crystal]", "exclude: [F5.4, S4.5]", "junit: out/junit.xml"].join("\n")
    );
    expect(file).toEqual({
      constants: { fabWidth: 0.12, referencePrefixes: { Y: ["Crystal"] } },
      exclude: ["F5.4", "S4.5"],
      junit: "out/junit.xml",
    });
  });

  it("treats an empty file as defaults", () => {
    expect(parseConfigFile("")).toEqual({ constants: {}, exclude: [] });
  });

  it("falls back to defaults on broken YAML", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    expect(parseConfigFile("exclude: [F5.4")).toEqual({ constants: {}, exclude: [] });
    expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^⚠️ {2}Failed to parse klc\.yml: /));
  });

  it("falls back to defaults on unknown settings", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    expect(parseConfigFile("bogus: 1", "team.yml")).toEqual({ constants: {}, exclude: [] });
    expect(warn).toHaveBeenCalledWith(
      "⚠️  Invalid settings in team.yml, using defaults: (root): Unrecognized key(s) in object: 'bogus'"
    );
  });

  it("rejects non-positive limits", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    expect(parseConfigFile("constants:\n  courtyardGrid: 0")).toEqual({ constants: {}, exclude: [] });
    expect(warn).toHaveBeenCalledWith(expect.stringContaining("constants.courtyardGrid: "));
  });
});

describe("getConfig", () => {
  let dir = "";

  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  });

  it("merges klc.yml from the project root over the defaults", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "klc-config-"));
    fs.writeFileSync(path.join(dir, "klc.yml"), "constants:\n  fabWidth: 0.12\nfootprintsDir: fp\n");
    vi.stubEnv("INIT_CWD", dir);
    vi.stubEnv("KLC_CONFIG", "");
    vi.stubEnv("KLC_FOOTPRINTS_DIR", "");
    vi.stubEnv("KLC_JUNIT", "reports/junit.xml");
    resetConfig();

    const config = getConfig();
    expect(config.projectRoot).toBe(dir);
    expect(config.configFile).toBe(path.join(dir, "klc.yml"));
    expect(config.constants).toEqual({ ...DEFAULT_RULE_CONSTANTS, fabWidth: 0.12 });
    expect(config.footprintsDir).toBe(path.join(dir, "fp"));
    expect(config.junit).toBe(path.join(dir, "reports", "junit.xml"));
    expect(getConfig()).toBe(config);
  });

  it("warns when the named config file is missing", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "klc-config-"));
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.stubEnv("INIT_CWD", dir);
    vi.stubEnv("KLC_CONFIG", "missing.yml");
    vi.stubEnv("KLC_FOOTPRINTS_DIR", "");
    vi.stubEnv("KLC_JUNIT", "");
    resetConfig();

    const config = getConfig();
    expect(warn).toHaveBeenCalledWith(`⚠️  Config file not found: ${path.join(dir, "missing.yml")}`);
    expect(config.configFile).toBeUndefined();
    expect(config.exclude).toEqual([]);
    expect(config.footprintsDir).toBeUndefined();
  });
});
