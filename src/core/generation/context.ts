import type { Blueprint, ResolvedProject } from "../types.js";

import type { ArtifactStore } from "./artifacts.js";

export type ContextFragment =
  | { kind: "directive"; text: string }
  | { kind: "dependency-blueprint"; moduleName: string; text: string }
  | { kind: "dependency-artifact"; moduleName: string; text: string };

export const STANDALONE_DIRECTIVE =
  "This module has no project dependencies. Generate it from its own blueprint and the packages it declares.";

/** Modules whose blueprint (and artifact, once generated) a module is generated against. */
export function contextModules(blueprint: Blueprint, project: ResolvedProject): string[] {
  const modules: string[] = [];
  const add = (moduleName: string): void => {
    if (moduleName === blueprint.moduleName || moduleName === project.root.moduleName) return;
    if (!modules.includes(moduleName)) modules.push(moduleName);
  };
  for (const { moduleName } of project.edges.get(blueprint.moduleName) ?? []) add(moduleName);
  for (const edge of project.inferredEdges) {
    if (edge.fromModule === blueprint.moduleName) add(edge.toModule);
  }
  return modules;
}

/**
 * For each direct dependency in declaration order: its full blueprint text,
 * then its generated source when one exists. Without dependencies the
 * context is a single standalone directive.
 */
export function assembleContext(
  blueprint: Blueprint,
  project: ResolvedProject,
  artifacts: ArtifactStore
): ContextFragment[] {
  const fragments: ContextFragment[] = [];
  for (const moduleName of contextModules(blueprint, project)) {
    const dependency = project.dependencySet.get(moduleName);
    if (!dependency) continue;
    fragments.push({ kind: "dependency-blueprint", moduleName, text: dependency.rawText });
    const artifact = artifacts.get(moduleName);
    if (artifact) {
      fragments.push({ kind: "dependency-artifact", moduleName, text: artifact.sourceText });
    }
  }

  if (fragments.length === 0) {
    return [{ kind: "directive", text: STANDALONE_DIRECTIVE }];
  }
  return fragments;
}
