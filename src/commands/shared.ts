import { existsSync, statSync } from "node:fs";
import { dirname, resolve } from "node:path";

import { log } from "@clack/prompts";

import { createOracle } from "../core/ai/oracle.js";
import {
  type BlueprintsConfig,
  loadConfig,
  MAX_MAX_RETRIES,
  MAX_ORACLE_TIMEOUT_SEC,
  MAX_QUALITY_ITERATIONS,
  MIN_ORACLE_TIMEOUT_SEC
} from "../core/config.js";
import { UserInputError } from "../core/errors.js";
import type { ProjectPipelineOptions } from "../core/generation/pipeline.js";
import { OracleQualityImprover } from "../core/generation/quality.js";
import {
  DEFAULT_INSIGHT_CACHE_PATH,
  FileInsightCache,
  OracleDependencyAnalyzer
} from "../core/graph/analyzer.js";
import { findProjectRoot } from "../core/graph/paths.js";
import { OracleRequirementsChecker } from "../core/verify/requirements.js";
import type { AiProvider, GenerateCommandOptions, TargetLanguage, VerificationResult } from "../core/types.js";

export type OracleCommandOptions = Omit<GenerateCommandOptions, "output">;

function parseInteger(value: number | string): number {
  if (typeof value === "number") return Number.isFinite(value) ? Math.floor(value) : Number.NaN;
  return /^\s*-?\d+\s*$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
}

export function normalizeMaxRetries(value: number | string | undefined, fallback: number): number {
  if (value === undefined) return Math.min(MAX_MAX_RETRIES, Math.max(0, fallback));
  const parsed = parseInteger(value);
  if (!Number.isFinite(parsed)) {
    throw new UserInputError(
      `Invalid --max-retries value "${String(value)}". Expected an integer between 0 and ${MAX_MAX_RETRIES}.`
    );
  }
  return Math.min(MAX_MAX_RETRIES, Math.max(0, parsed));
}

export function normalizeQualityIterations(value: number | string | undefined, fallback: number): number {
  if (value === undefined) return Math.min(MAX_QUALITY_ITERATIONS, Math.max(0, fallback));
  const parsed = parseInteger(value);
  if (!Number.isFinite(parsed)) {
    throw new UserInputError(
      `Invalid --quality-iterations value "${String(value)}". Expected an integer between 0 and ${MAX_QUALITY_ITERATIONS}.`
    );
  }
  return Math.min(MAX_QUALITY_ITERATIONS, Math.max(0, parsed));
}

export function normalizeOracleTimeoutMs(value: number | string | undefined, fallbackSec: number): number {
  const clamp = (seconds: number): number =>
    Math.min(MAX_ORACLE_TIMEOUT_SEC, Math.max(MIN_ORACLE_TIMEOUT_SEC, seconds)) * 1000;
  if (value === undefined) return clamp(fallbackSec);
  const parsed = parseInteger(value);
  if (!Number.isFinite(parsed)) {
    throw new UserInputError(
      `Invalid --oracle-timeout-sec value "${String(value)}". Expected an integer between ${MIN_ORACLE_TIMEOUT_SEC} and ${MAX_ORACLE_TIMEOUT_SEC}.`
    );
  }
  return clamp(parsed);
}

export function normalizeProvider(value: string | undefined, fallback: AiProvider): AiProvider {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === "auto" || normalized === "codex" || normalized === "claude") return normalized;
  throw new UserInputError(`Invalid --provider value "${value}". Expected "auto", "codex" or "claude".`);
}

export function normalizeLanguage(value: string | undefined, fallback: TargetLanguage): TargetLanguage {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === "typescript" || normalized === "ts") return "typescript";
  if (normalized === "javascript" || normalized === "js") return "javascript";
  throw new UserInputError(`Invalid --language value "${value}". Expected "typescript" or "javascript".`);
}

/** The blueprint file must exist; returns its absolute path. */
export function requireBlueprintFile(pathArg: string): string {
  const path = resolve(process.cwd(), pathArg);
  if (!existsSync(path) || !statSync(path).isFile()) {
    throw new UserInputError(`Blueprint file not found: ${path}`);
  }
  return path;
}

/** `--base-dir` when given, otherwise the nearest marked project directory above the blueprint. */
export function projectRootFor(blueprintPath: string, baseDir: string | undefined): string {
  if (baseDir === undefined) return findProjectRoot(dirname(blueprintPath));
  const root = resolve(process.cwd(), baseDir);
  if (!existsSync(root) || !statSync(root).isDirectory()) {
    throw new UserInputError(`Base directory is not a directory: ${root}`);
  }
  return root;
}

export interface PreparedGeneration {
  config: BlueprintsConfig;
  settings: Omit<ProjectPipelineOptions, "strictCycles" | "makefile">;
}

/**
 * Layers CLI flags over the project config and builds the oracle with the
 * passes that share it: dependency analysis, the requirements check and
 * quality improvement.
 */
export function prepareGeneration(projectRoot: string, options: OracleCommandOptions): PreparedGeneration {
  const config = loadConfig(projectRoot);
  const provider = normalizeProvider(options.provider, config.provider);
  const language = normalizeLanguage(options.language, config.language);
  const maxRetries = normalizeMaxRetries(options.maxRetries, config.maxRetries);
  const oracleTimeoutMs = normalizeOracleTimeoutMs(options.oracleTimeoutSec, config.oracleTimeoutSec);
  const model = options.model?.trim() || config.model;
  const verbose = options.verbose ?? false;

  const oracle = createOracle({
    provider,
    model,
    cwd: projectRoot,
    timeoutMs: oracleTimeoutMs,
    onStatus: verbose ? (message) => log.info(message) : undefined
  });

  const inferDependencies = options.inferDeps ?? config.inferDependencies;
  const analyzer = inferDependencies
    ? new OracleDependencyAnalyzer(
        oracle,
        new FileInsightCache(resolve(projectRoot, config.insightCachePath ?? DEFAULT_INSIGHT_CACHE_PATH)),
        { timeoutMs: oracleTimeoutMs }
      )
    : undefined;

  const requirementsCheck = options.requirementsCheck ?? config.requirementsCheck;
  const qualityImprovement = options.qualityImprovement ?? config.qualityImprovement;
  const qualityIterations = normalizeQualityIterations(options.qualityIterations, config.qualityIterations);

  return {
    config: {
      ...config,
      provider,
      language,
      maxRetries,
      oracleTimeoutSec: oracleTimeoutMs / 1000,
      requirementsCheck,
      qualityImprovement,
      qualityIterations
    },
    settings: {
      oracle,
      language,
      maxRetries,
      oracleTimeoutMs,
      typeCheck: options.typeCheck ?? config.typeCheck,
      runtimeCheck: options.runtimeCheck ?? config.runtimeCheck,
      force: options.force ?? false,
      baseDir: projectRoot,
      analyzer,
      requirementsChecker: requirementsCheck
        ? new OracleRequirementsChecker(oracle, { timeoutMs: oracleTimeoutMs })
        : undefined,
      qualityImprover:
        qualityImprovement && qualityIterations > 0
          ? new OracleQualityImprover(oracle, { maxIterations: qualityIterations, timeoutMs: oracleTimeoutMs })
          : undefined,
      onWarning: (message) => log.warn(message)
    }
  };
}

/** Runs `task` with a signal that aborts on Ctrl+C. */
export async function withInterrupt<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once("SIGINT", onInterrupt);
  try {
    return await task(controller.signal);
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

export function describeFailure(results: readonly VerificationResult[]): string {
  const failure = results.find((result) => !result.success);
  if (!failure) return "passed";
  const location = failure.line !== undefined ? ` (line ${failure.line})` : "";
  return `${failure.stage} check failed${location}: ${failure.message.split("\n")[0] ?? ""}`;
}
