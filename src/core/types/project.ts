import type { Blueprint, Reference } from "./blueprint.js";

export interface ResolvedReference {
  reference: Reference;
  moduleName: string;
}

export interface UnresolvedReference {
  fromModule: string;
  reference: Reference;
  reason: string;
}

export interface InferredEdge {
  fromModule: string;
  toModule: string;
  reasoning: string;
}

export interface ResolvedProject {
  root: Blueprint;
  /** Every transitive dependency of the root keyed by module name; never holds the root. */
  dependencySet: Map<string, Blueprint>;
  /** Dependencies before dependents, root last. */
  generationOrder: Blueprint[];
  /** Resolved direct references per module, in declaration order. */
  edges: Map<string, ResolvedReference[]>;
  inferredEdges: InferredEdge[];
  unresolved: UnresolvedReference[];
  cycles: string[][];
}

export interface GeneratedArtifact {
  moduleName: string;
  sourceText: string;
  path?: string;
}
