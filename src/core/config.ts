import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { z } from "zod";

import { ConfigError } from "./errors.js";
import type { AiProvider, TargetLanguage } from "./types.js";

export const CONFIG_FILE_NAME = "blueprints.config.json";

export const DEFAULT_MAX_RETRIES = 2;
export const MAX_MAX_RETRIES = 10;
export const DEFAULT_ORACLE_TIMEOUT_SEC = 600;
export const MIN_ORACLE_TIMEOUT_SEC = 10;
export const MAX_ORACLE_TIMEOUT_SEC = 60 * 60;
export const DEFAULT_QUALITY_ITERATIONS = 2;
export const MAX_QUALITY_ITERATIONS = 5;

export interface BlueprintsConfig {
  provider: AiProvider;
  model?: string;
  language: TargetLanguage;
  maxRetries: number;
  oracleTimeoutSec: number;
  typeCheck: boolean;
  runtimeCheck: boolean;
  requirementsCheck: boolean;
  qualityImprovement: boolean;
  qualityIterations: number;
  inferDependencies: boolean;
  insightCachePath?: string;
}

const providerSchema = z.enum(["auto", "codex", "claude"]);
const languageSchema = z.enum(["typescript", "javascript"]);

const configFileSchema = z
  .object({
    provider: providerSchema.optional(),
    model: z.string().min(1).optional(),
    language: languageSchema.optional(),
    maxRetries: z.number().int().min(0).max(MAX_MAX_RETRIES).optional(),
    oracleTimeoutSec: z.number().int().min(MIN_ORACLE_TIMEOUT_SEC).max(MAX_ORACLE_TIMEOUT_SEC).optional(),
    typeCheck: z.boolean().optional(),
    runtimeCheck: z.boolean().optional(),
    requirementsCheck: z.boolean().optional(),
    qualityImprovement: z.boolean().optional(),
    qualityIterations: z.number().int().min(0).max(MAX_QUALITY_ITERATIONS).optional(),
    inferDependencies: z.boolean().optional(),
    insightCachePath: z.string().min(1).optional()
  })
  .strict();

type ConfigLayer = z.infer<typeof configFileSchema>;

export const DEFAULT_CONFIG: BlueprintsConfig = {
  provider: "auto",
  language: "typescript",
  maxRetries: DEFAULT_MAX_RETRIES,
  oracleTimeoutSec: DEFAULT_ORACLE_TIMEOUT_SEC,
  typeCheck: false,
  runtimeCheck: true,
  requirementsCheck: true,
  qualityImprovement: true,
  qualityIterations: DEFAULT_QUALITY_ITERATIONS,
  inferDependencies: false
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function readConfigFile(projectRoot: string): ConfigLayer {
  const path = join(projectRoot, CONFIG_FILE_NAME);
  if (!existsSync(path)) return {};

  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigError(`${CONFIG_FILE_NAME} is not valid JSON.`, { cause: error, details: { path } });
  }
  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${CONFIG_FILE_NAME}: ${formatIssues(parsed.error)}`, { details: { path } });
  }
  return parsed.data;
}

function parseEnvInteger(name: string, value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || String(parsed) !== value.trim()) {
    throw new ConfigError(`${name} must be an integer, got "${value}".`);
  }
  return parsed;
}

function parseEnvBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${value}".`);
}

function parseEnvEnum<T extends string>(name: string, value: string, schema: z.ZodType<T>): T {
  const parsed = schema.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    throw new ConfigError(`${name} has unsupported value "${value}".`);
  }
  return parsed.data;
}

export function readEnvironment(env: NodeJS.ProcessEnv): ConfigLayer {
  const layer: ConfigLayer = {};
  const read = (name: string): string | undefined => {
    const value = env[name];
    return value !== undefined && value.trim() !== "" ? value : undefined;
  };

  const provider = read("BLUEPRINTS_PROVIDER");
  if (provider) layer.provider = parseEnvEnum("BLUEPRINTS_PROVIDER", provider, providerSchema);
  const model = read("BLUEPRINTS_MODEL");
  if (model) layer.model = model.trim();
  const language = read("BLUEPRINTS_LANGUAGE");
  if (language) layer.language = parseEnvEnum("BLUEPRINTS_LANGUAGE", language, languageSchema);
  const maxRetries = read("BLUEPRINTS_MAX_RETRIES");
  if (maxRetries) layer.maxRetries = parseEnvInteger("BLUEPRINTS_MAX_RETRIES", maxRetries);
  const timeout = read("BLUEPRINTS_ORACLE_TIMEOUT_SEC");
  if (timeout) layer.oracleTimeoutSec = parseEnvInteger("BLUEPRINTS_ORACLE_TIMEOUT_SEC", timeout);
  const typeCheck = read("BLUEPRINTS_TYPE_CHECK");
  if (typeCheck) layer.typeCheck = parseEnvBoolean("BLUEPRINTS_TYPE_CHECK", typeCheck);
  const runtimeCheck = read("BLUEPRINTS_RUNTIME_CHECK");
  if (runtimeCheck) layer.runtimeCheck = parseEnvBoolean("BLUEPRINTS_RUNTIME_CHECK", runtimeCheck);
  const requirementsCheck = read("BLUEPRINTS_REQUIREMENTS_CHECK");
  if (requirementsCheck) {
    layer.requirementsCheck = parseEnvBoolean("BLUEPRINTS_REQUIREMENTS_CHECK", requirementsCheck);
  }
  const qualityImprovement = read("BLUEPRINTS_QUALITY_IMPROVEMENT");
  if (qualityImprovement) {
    layer.qualityImprovement = parseEnvBoolean("BLUEPRINTS_QUALITY_IMPROVEMENT", qualityImprovement);
  }
  const qualityIterations = read("BLUEPRINTS_QUALITY_ITERATIONS");
  if (qualityIterations) {
    layer.qualityIterations = parseEnvInteger("BLUEPRINTS_QUALITY_ITERATIONS", qualityIterations);
  }
  return layer;
}

function applyLayer(base: BlueprintsConfig, layer: ConfigLayer): BlueprintsConfig {
  const merged: BlueprintsConfig = { ...base };
  if (layer.provider !== undefined) merged.provider = layer.provider;
  if (layer.model !== undefined) merged.model = layer.model;
  if (layer.language !== undefined) merged.language = layer.language;
  if (layer.maxRetries !== undefined) merged.maxRetries = layer.maxRetries;
  if (layer.oracleTimeoutSec !== undefined) merged.oracleTimeoutSec = layer.oracleTimeoutSec;
  if (layer.typeCheck !== undefined) merged.typeCheck = layer.typeCheck;
  if (layer.runtimeCheck !== undefined) merged.runtimeCheck = layer.runtimeCheck;
  if (layer.requirementsCheck !== undefined) merged.requirementsCheck = layer.requirementsCheck;
  if (layer.qualityImprovement !== undefined) merged.qualityImprovement = layer.qualityImprovement;
  if (layer.qualityIterations !== undefined) merged.qualityIterations = layer.qualityIterations;
  if (layer.inferDependencies !== undefined) merged.inferDependencies = layer.inferDependencies;
  if (layer.insightCachePath !== undefined) merged.insightCachePath = layer.insightCachePath;
  return merged;
}

/** Defaults, then `blueprints.config.json` in `projectRoot`, then `BLUEPRINTS_*` variables. */
export function loadConfig(projectRoot: string, env: NodeJS.ProcessEnv = process.env): BlueprintsConfig {
  return applyLayer(applyLayer(DEFAULT_CONFIG, readConfigFile(projectRoot)), readEnvironment(env));
}
