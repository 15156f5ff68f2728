import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import type { GenerationOracle, StatusCallback } from "../ai/contracts.js";
import { UserInputError } from "../errors.js";
import type { DependencyAnalyzer } from "../graph/analyzer.js";
import { findProjectRoot } from "../graph/paths.js";
import { resolveProject } from "../graph/resolver.js";
import { type DependencyManifest, loadDependencyManifest } from "../manifest.js";
import type {
  Blueprint,
  ResolvedProject,
  TargetLanguage,
  VerificationContext,
  VerificationResult
} from "../types.js";
import type { RequirementsChecker } from "../verify/requirements.js";
import { createVerifier, type Verifier } from "../verify/verifier.js";

import { ArtifactStore, artifactPathFor } from "./artifacts.js";
import { assembleContext, contextModules } from "./context.js";
import { expectedImportStatements } from "./imports.js";
import { type WriteMakefileResult, writeMakefile } from "./makefile.js";
import type { QualityImprover } from "./quality.js";
import { generateWithRetry } from "./retry.js";

export type ModuleStatus = "generated" | "reused" | "failed-verification";

export interface ModuleReport {
  moduleName: string;
  status: ModuleStatus;
  path?: string;
  attempts: number;
  results: VerificationResult[];
  /** Set when quality passes ran; true when one of them was kept. */
  improved?: boolean;
}

export interface GenerationSettings {
  oracle: GenerationOracle;
  language: TargetLanguage;
  maxRetries?: number | undefined;
  oracleTimeoutMs?: number | undefined;
  typeCheck?: boolean | undefined;
  runtimeCheck?: boolean | undefined;
  force?: boolean | undefined;
  baseDir?: string | undefined;
  analyzer?: DependencyAnalyzer | undefined;
  requirementsChecker?: RequirementsChecker | undefined;
  /** Runs over modules that verified; skipped for failing ones. */
  qualityImprover?: QualityImprover | undefined;
  signal?: AbortSignal | undefined;
  onStatus?: StatusCallback | undefined;
  onWarning?: ((message: string) => void) | undefined;
  /** Swaps the stage pipeline, mostly for tests. */
  createVerifier?: ((context: VerificationContext) => Verifier) | undefined;
}

export interface ProjectPipelineOptions extends GenerationSettings {
  strictCycles?: boolean | undefined;
  makefile?: boolean | undefined;
}

export interface ProjectReport {
  project: ResolvedProject;
  modules: ModuleReport[];
  makefile?: WriteMakefileResult;
  success: boolean;
}

export interface SingleModuleOptions extends GenerationSettings {
  output?: string | undefined;
}

export function formatCycle(cycle: readonly string[]): string {
  return cycle.join(" -> ");
}

function projectRootOf(project: ResolvedProject, baseDir: string | undefined): string {
  if (baseDir) return resolve(baseDir);
  return project.root.sourceLocation ? findProjectRoot(dirname(project.root.sourceLocation)) : process.cwd();
}

function knownModulesOf(project: ResolvedProject): Set<string> {
  return new Set([project.root.moduleName, ...project.dependencySet.keys()]);
}

export function buildVerificationContext(
  blueprint: Blueprint,
  project: ResolvedProject,
  manifest: DependencyManifest,
  settings: GenerationSettings & { projectRoot: string; outputPath?: string | null }
): VerificationContext {
  const dependencyBlueprints = new Map<string, Blueprint>();
  for (const moduleName of contextModules(blueprint, project)) {
    const dependency = project.dependencySet.get(moduleName);
    if (dependency) dependencyBlueprints.set(moduleName, dependency);
  }
  return {
    projectRoot: settings.projectRoot,
    language: settings.language,
    sourceDir: settings.outputPath ? dirname(settings.outputPath) : undefined,
    knownModules: knownModulesOf(project),
    declaredPackages: manifest.packages,
    references: project.edges.get(blueprint.moduleName) ?? [],
    dependencyBlueprints,
    typeCheck: settings.typeCheck ?? false,
    runtimeCheck: settings.runtimeCheck ?? true,
    requirementsChecker: settings.requirementsChecker,
    signal: settings.signal
  };
}

async function generateModule(
  blueprint: Blueprint,
  project: ResolvedProject,
  manifest: DependencyManifest,
  artifacts: ArtifactStore,
  outputPath: string | null,
  settings: GenerationSettings & { projectRoot: string }
): Promise<ModuleReport> {
  const context = buildVerificationContext(blueprint, project, manifest, { ...settings, outputPath });
  const verifier = (settings.createVerifier ?? createVerifier)(context);
  let outcome = await generateWithRetry({
    blueprint,
    fragments: assembleContext(blueprint, project, artifacts),
    language: settings.language,
    oracle: settings.oracle,
    verifier,
    expectedImports: expectedImportStatements(context.references),
    declaredPackages: manifest.packages,
    maxRetries: settings.maxRetries,
    oracleTimeoutMs: settings.oracleTimeoutMs,
    signal: settings.signal,
    onStatus: settings.onStatus
  });

  let improved: boolean | undefined;
  if (outcome.success && settings.qualityImprover) {
    const quality = await settings.qualityImprover.improve(outcome.source, {
      blueprint,
      language: settings.language,
      verifier,
      results: outcome.results,
      signal: settings.signal,
      onStatus: settings.onStatus,
      onWarning: settings.onWarning
    });
    outcome = { ...outcome, source: quality.source, results: quality.results };
    improved = quality.improved;
  }

  if (outputPath) {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, outcome.source, "utf8");
  }
  artifacts.set({
    moduleName: blueprint.moduleName,
    sourceText: outcome.source,
    ...(outputPath ? { path: outputPath } : {})
  });

  for (const result of outcome.results) {
    for (const warning of result.warnings) settings.onWarning?.(`${blueprint.moduleName}: ${warning}`);
  }

  return {
    moduleName: blueprint.moduleName,
    status: outcome.success ? "generated" : "failed-verification",
    ...(outputPath ? { path: outputPath } : {}),
    attempts: outcome.attempts,
    results: outcome.results,
    ...(improved !== undefined ? { improved } : {})
  };
}

async function reuseArtifact(
  blueprint: Blueprint,
  path: string,
  artifacts: ArtifactStore
): Promise<ModuleReport> {
  const sourceText = await readFile(path, "utf8");
  artifacts.set({ moduleName: blueprint.moduleName, sourceText, path });
  return { moduleName: blueprint.moduleName, status: "reused", path, attempts: 0, results: [] };
}

function rejectCycles(project: ResolvedProject): void {
  if (project.cycles.length === 0) return;
  throw new UserInputError(
    `Dependency cycles found: ${project.cycles.map(formatCycle).join("; ")}. Remove them or drop --strict-cycles.`,
    { details: { cycles: project.cycles } }
  );
}

/**
 * Generates every module of the project rooted at `rootPath` in generation
 * order. Existing artifacts are reused as context unless `force`. A module
 * that still fails verification after its retries is written anyway and
 * reported; the run stops only when a module produces no source at all.
 */
export async function runProjectPipeline(rootPath: string, options: ProjectPipelineOptions): Promise<ProjectReport> {
  const project = await resolveProject(rootPath, {
    baseDir: options.baseDir,
    analyzer: options.analyzer,
    signal: options.signal,
    onWarning: options.onWarning
  });
  if (options.strictCycles) rejectCycles(project);

  const projectRoot = projectRootOf(project, options.baseDir);
  const manifest = loadDependencyManifest(projectRoot, project.generationOrder, project.root);
  const artifacts = new ArtifactStore();
  const modules: ModuleReport[] = [];
  const total = project.generationOrder.length;

  for (const [index, blueprint] of project.generationOrder.entries()) {
    const outputPath = artifactPathFor(blueprint, options.language);
    options.onStatus?.(`[${index + 1}/${total}] ${blueprint.moduleName}`);

    if (outputPath && existsSync(outputPath) && !options.force) {
      modules.push(await reuseArtifact(blueprint, outputPath, artifacts));
      continue;
    }
    modules.push(
      await generateModule(blueprint, project, manifest, artifacts, outputPath, { ...options, projectRoot })
    );
  }

  const report: ProjectReport = {
    project,
    modules,
    success: modules.every((module) => module.status !== "failed-verification")
  };
  if (options.makefile ?? true) {
    const descriptor = manifest.descriptor;
    if (descriptor) {
      report.makefile = await writeMakefile(project, descriptor, { force: options.force });
    }
  }
  return report;
}

/**
 * Generates only the root module of `blueprintPath`. Dependencies are not
 * generated; artifacts already on disk for them are used as context.
 */
export async function generateSingleModule(
  blueprintPath: string,
  options: SingleModuleOptions
): Promise<{ project: ResolvedProject; report: ModuleReport }> {
  const project = await resolveProject(blueprintPath, {
    baseDir: options.baseDir,
    analyzer: options.analyzer,
    signal: options.signal,
    onWarning: options.onWarning
  });
  const outputPath = options.output ? resolve(options.output) : artifactPathFor(project.root, options.language);
  if (outputPath && existsSync(outputPath) && !options.force) {
    throw new UserInputError(`${outputPath} already exists. Use --force to overwrite it.`);
  }

  const artifacts = new ArtifactStore();
  for (const dependency of project.dependencySet.values()) {
    const path = artifactPathFor(dependency, options.language);
    if (path && existsSync(path)) {
      artifacts.set({ moduleName: dependency.moduleName, sourceText: await readFile(path, "utf8"), path });
    }
  }

  const projectRoot = projectRootOf(project, options.baseDir);
  const manifest = loadDependencyManifest(projectRoot, project.generationOrder, project.root);
  const report = await generateModule(project.root, project, manifest, artifacts, outputPath, {
    ...options,
    projectRoot
  });
  return { project, report };
}
