import { existsSync, statSync } from "node:fs";
import { dirname, resolve } from "node:path";

import { discoverBlueprints, loadBlueprintFile } from "../blueprint/loader.js";
import { BlueprintError, GenerationCancelledError } from "../errors.js";
import type {
  Blueprint,
  InferredEdge,
  ParsedBlueprint,
  Reference,
  ResolvedProject,
  ResolvedReference,
  UnresolvedReference
} from "../types.js";

import type { DependencyAnalyzer } from "./analyzer.js";
import { candidateFiles, findProjectRoot, moduleNameHint } from "./paths.js";
import { toposort, wouldCreateCycle } from "./toposort.js";

export interface ResolveProjectOptions {
  /** Directory plain references resolve against; defaults to the project root above the root blueprint. */
  baseDir?: string | undefined;
  analyzer?: DependencyAnalyzer | undefined;
  signal?: AbortSignal | undefined;
  onWarning?: ((message: string) => void) | undefined;
}

interface ModuleNode {
  blueprint: Blueprint;
  path: string;
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

function describeReference(reference: Reference): string {
  return reference.targetPath;
}

/**
 * Loads the root blueprint and everything it transitively references, then
 * orders the modules dependencies-first with the root last. Missing or
 * malformed dependency documents are dropped and reported, never thrown.
 */
export async function resolveProject(rootPath: string, options: ResolveProjectOptions = {}): Promise<ResolvedProject> {
  const absoluteRoot = resolve(rootPath);
  const rootParsed = await loadBlueprintFile(absoluteRoot);
  const root = rootParsed.blueprint;
  const baseDir = resolve(options.baseDir ?? findProjectRoot(dirname(absoluteRoot)));
  const warn = (message: string): void => options.onWarning?.(message);

  for (const warning of rootParsed.warnings) warn(`${root.moduleName}: ${warning}`);

  const parsedByPath = new Map<string, ParsedBlueprint | BlueprintError>([[absoluteRoot, rootParsed]]);
  const nodes = new Map<string, ModuleNode>([[root.moduleName, { blueprint: root, path: absoluteRoot }]]);
  const discoveryOrder: string[] = [];
  const edges = new Map<string, ResolvedReference[]>();
  const adjacency = new Map<string, string[]>();
  const unresolved: UnresolvedReference[] = [];
  const rootBackEdges: string[] = [];
  const selfCycles: string[][] = [];
  let moduleIndex: Map<string, string> | null = null;

  const lookupIndex = async (reference: Reference): Promise<string | undefined> => {
    if (!moduleIndex) {
      const discovery = await discoverBlueprints(baseDir);
      moduleIndex = new Map(discovery.blueprints.map((entry) => [entry.moduleName, entry.path]));
    }
    return moduleIndex.get(moduleNameHint(reference.targetPath));
  };

  const parseOnce = async (path: string): Promise<ParsedBlueprint | BlueprintError> => {
    const cached = parsedByPath.get(path);
    if (cached) return cached;
    let outcome: ParsedBlueprint | BlueprintError;
    try {
      outcome = await loadBlueprintFile(path);
    } catch (error) {
      if (!(error instanceof BlueprintError)) throw error;
      outcome = error;
    }
    parsedByPath.set(path, outcome);
    return outcome;
  };

  const drop = (fromModule: string, reference: Reference, reason: string): void => {
    unresolved.push({ fromModule, reference, reason });
    warn(`${fromModule}: dropped reference ${describeReference(reference)} (${reason})`);
  };

  const queue: ModuleNode[] = [{ blueprint: root, path: absoluteRoot }];
  for (let head = 0; head < queue.length; head += 1) {
    if (options.signal?.aborted) throw new GenerationCancelledError("Dependency resolution cancelled.");
    const current = queue[head];
    if (!current) break;
    const fromModule = current.blueprint.moduleName;
    const resolvedReferences: ResolvedReference[] = [];
    const dependencies: string[] = [];

    for (const reference of current.blueprint.references) {
      const candidates = candidateFiles(reference.targetPath, dirname(current.path), baseDir);
      if (candidates.length === 0) {
        drop(fromModule, reference, "empty target");
        continue;
      }
      const targetFile = candidates.find(isFile) ?? (await lookupIndex(reference));
      if (!targetFile) {
        drop(fromModule, reference, `no blueprint found; tried ${candidates.join(", ")}`);
        continue;
      }

      const parsed = await parseOnce(targetFile);
      if (parsed instanceof BlueprintError) {
        drop(fromModule, reference, parsed.message);
        continue;
      }

      const target = parsed.blueprint;
      const existing = nodes.get(target.moduleName);
      if (existing && existing.path !== targetFile) {
        warn(
          `${targetFile} declares module "${target.moduleName}" already loaded from ${existing.path}; using the first.`
        );
      }
      if (!existing) {
        for (const warning of parsed.warnings) warn(`${target.moduleName}: ${warning}`);
        const node = { blueprint: target, path: targetFile };
        nodes.set(target.moduleName, node);
        discoveryOrder.push(target.moduleName);
        queue.push(node);
      }

      resolvedReferences.push({ reference, moduleName: target.moduleName });
      if (target.moduleName === root.moduleName) {
        rootBackEdges.push(fromModule);
        continue;
      }
      if (target.moduleName === fromModule) {
        selfCycles.push([fromModule, fromModule]);
        continue;
      }
      if (!dependencies.includes(target.moduleName)) dependencies.push(target.moduleName);
    }

    edges.set(fromModule, resolvedReferences);
    adjacency.set(fromModule, dependencies);
  }

  const dependencySet = new Map<string, Blueprint>();
  for (const moduleName of discoveryOrder) {
    const node = nodes.get(moduleName);
    if (node) dependencySet.set(moduleName, node.blueprint);
  }

  const inferredEdges = await inferExtraEdges([root, ...dependencySet.values()], adjacency, options);

  const { order, cycles } = toposort(
    discoveryOrder.map((moduleName) => ({ id: moduleName, dependencies: adjacency.get(moduleName) ?? [] }))
  );
  cycles.push(...selfCycles);
  for (const fromModule of rootBackEdges) {
    cycles.push(rootCyclePath(root.moduleName, fromModule, adjacency));
  }
  for (const cycle of cycles) {
    warn(`Dependency cycle ${cycle.join(" -> ")}; generating in discovery order.`);
  }

  const generationOrder: Blueprint[] = [];
  for (const moduleName of order) {
    const blueprint = dependencySet.get(moduleName);
    if (blueprint) generationOrder.push(blueprint);
  }
  generationOrder.push(root);

  return { root, dependencySet, generationOrder, edges, inferredEdges, unresolved, cycles };
}

async function inferExtraEdges(
  blueprints: Blueprint[],
  adjacency: Map<string, string[]>,
  options: ResolveProjectOptions
): Promise<InferredEdge[]> {
  if (!options.analyzer) return [];
  const known = new Set(blueprints.map((blueprint) => blueprint.moduleName));

  let proposed: InferredEdge[];
  try {
    proposed = await options.analyzer.inferEdges(blueprints, {
      signal: options.signal,
      onWarning: options.onWarning
    });
  } catch (error) {
    if (error instanceof GenerationCancelledError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    options.onWarning?.(`Dependency analysis failed; using declared references only (${message}).`);
    return [];
  }

  const accepted: InferredEdge[] = [];
  for (const edge of proposed) {
    if (!known.has(edge.fromModule) || !known.has(edge.toModule)) continue;
    const dependencies = adjacency.get(edge.fromModule) ?? [];
    if (dependencies.includes(edge.toModule)) continue;
    if (wouldCreateCycle(adjacency, edge.fromModule, edge.toModule)) {
      options.onWarning?.(`Ignored inferred dependency ${edge.fromModule} -> ${edge.toModule}: it would form a cycle.`);
      continue;
    }
    adjacency.set(edge.fromModule, [...dependencies, edge.toModule]);
    accepted.push(edge);
  }
  return accepted;
}

function rootCyclePath(rootName: string, fromModule: string, adjacency: ReadonlyMap<string, readonly string[]>): string[] {
  const previous = new Map<string, string>();
  const queue = [rootName];
  const seen = new Set(queue);
  for (let head = 0; head < queue.length; head += 1) {
    const current = queue[head];
    if (current === undefined || current === fromModule) break;
    for (const next of adjacency.get(current) ?? []) {
      if (seen.has(next)) continue;
      seen.add(next);
      previous.set(next, current);
      queue.push(next);
    }
  }

  const path = [fromModule];
  let cursor = previous.get(fromModule);
  while (cursor !== undefined) {
    path.unshift(cursor);
    cursor = previous.get(cursor);
  }
  if (path[0] !== rootName) path.unshift(rootName);
  return [...path, rootName];
}
