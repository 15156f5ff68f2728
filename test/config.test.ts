import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  describeFailure,
  normalizeLanguage,
  normalizeMaxRetries,
  normalizeOracleTimeoutMs,
  normalizeProvider,
  normalizeQualityIterations
} from "../src/commands/shared.js";
import { CONFIG_FILE_NAME, DEFAULT_CONFIG, loadConfig } from "../src/core/config.js";
import { ConfigError, UserInputError } from "../src/core/errors.js";

describe("loadConfig", () => {
  let projectRoot: string;

  beforeEach(async () => {
    projectRoot = await mkdtemp(join(tmpdir(), "blueprints-config-"));
  });

  afterEach(async () => {
    await rm(projectRoot, { recursive: true, force: true });
  });

  it("returns the defaults without a config file or variables", () => {
    expect(loadConfig(projectRoot, {})).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.maxRetries).toBe(2);
    expect(DEFAULT_CONFIG.runtimeCheck).toBe(true);
    expect(DEFAULT_CONFIG.typeCheck).toBe(false);
    expect(DEFAULT_CONFIG.requirementsCheck).toBe(true);
    expect(DEFAULT_CONFIG.qualityImprovement).toBe(true);
    expect(DEFAULT_CONFIG.qualityIterations).toBe(2);
  });

  it("reads the oracle-backed passes from the file and the environment", async () => {
    await writeFile(join(projectRoot, CONFIG_FILE_NAME), JSON.stringify({ qualityIterations: 4 }), "utf8");

    const config = loadConfig(projectRoot, {
      BLUEPRINTS_QUALITY_IMPROVEMENT: "off",
      BLUEPRINTS_REQUIREMENTS_CHECK: "0"
    });

    expect(config).toEqual({
      ...DEFAULT_CONFIG,
      qualityIterations: 4,
      qualityImprovement: false,
      requirementsCheck: false
    });
  });

  it("layers the config file under environment variables", async () => {
    await writeFile(
      join(projectRoot, CONFIG_FILE_NAME),
      JSON.stringify({ provider: "claude", language: "javascript", maxRetries: 4, inferDependencies: true }),
      "utf8"
    );

    const config = loadConfig(projectRoot, { BLUEPRINTS_MAX_RETRIES: "1", BLUEPRINTS_TYPE_CHECK: "yes" });

    expect(config).toEqual({
      ...DEFAULT_CONFIG,
      provider: "claude",
      language: "javascript",
      maxRetries: 1,
      typeCheck: true,
      inferDependencies: true
    });
  });

  it("rejects unknown keys and out-of-range values", async () => {
    await writeFile(join(projectRoot, CONFIG_FILE_NAME), JSON.stringify({ maxRetries: 50, colour: "blue" }), "utf8");

    expect(() => loadConfig(projectRoot, {})).toThrow(ConfigError);
  });

  it("rejects malformed JSON", async () => {
    await writeFile(join(projectRoot, CONFIG_FILE_NAME), "{ nope", "utf8");

    expect(() => loadConfig(projectRoot, {})).toThrow(`${CONFIG_FILE_NAME} is not valid JSON.`);
  });

  it("rejects malformed environment values", () => {
    expect(() => loadConfig(projectRoot, { BLUEPRINTS_MAX_RETRIES: "two" })).toThrow(
      'BLUEPRINTS_MAX_RETRIES must be an integer, got "two".'
    );
    expect(() => loadConfig(projectRoot, { BLUEPRINTS_PROVIDER: "gemini" })).toThrow(
      'BLUEPRINTS_PROVIDER has unsupported value "gemini".'
    );
  });
});

describe("command option normalization", () => {
  it("clamps the retry budget", () => {
    expect(normalizeMaxRetries(undefined, 2)).toBe(2);
    expect(normalizeMaxRetries("0", 2)).toBe(0);
    expect(normalizeMaxRetries("99", 2)).toBe(10);
    expect(normalizeMaxRetries("-3", 2)).toBe(0);
    expect(() => normalizeMaxRetries("many", 2)).toThrow(UserInputError);
  });

  it("clamps the quality pass count", () => {
    expect(normalizeQualityIterations(undefined, 2)).toBe(2);
    expect(normalizeQualityIterations("9", 2)).toBe(5);
    expect(normalizeQualityIterations(0, 2)).toBe(0);
    expect(() => normalizeQualityIterations("twice", 2)).toThrow(UserInputError);
  });

  it("converts the oracle timeout to milliseconds within bounds", () => {
    expect(normalizeOracleTimeoutMs(undefined, 600)).toBe(600_000);
    expect(normalizeOracleTimeoutMs("1", 600)).toBe(10_000);
    expect(normalizeOracleTimeoutMs("90000", 600)).toBe(3_600_000);
    expect(() => normalizeOracleTimeoutMs("soon", 600)).toThrow(UserInputError);
  });

  it("accepts provider and language aliases", () => {
    expect(normalizeProvider(" Claude ", "auto")).toBe("claude");
    expect(normalizeProvider(undefined, "codex")).toBe("codex");
    expect(() => normalizeProvider("gemini", "auto")).toThrow(UserInputError);
    expect(normalizeLanguage("ts", "javascript")).toBe("typescript");
    expect(normalizeLanguage("JS", "typescript")).toBe("javascript");
    expect(() => normalizeLanguage("ruby", "typescript")).toThrow(UserInputError);
  });

  it("describes the first failing stage", () => {
    expect(describeFailure([{ stage: "syntax", success: true, message: "ok", warnings: [] }])).toBe("passed");
    expect(
      describeFailure([
        { stage: "syntax", success: true, message: "ok", warnings: [] },
        { stage: "imports", success: false, errorKind: "import-unresolved", message: "Unresolved imports:\n- x", line: 3, warnings: [] }
      ])
    ).toBe("imports check failed (line 3): Unresolved imports:");
  });
});
