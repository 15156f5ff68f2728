import { dirname, join } from "node:path";

import type { Blueprint, GeneratedArtifact, TargetLanguage } from "../types.js";

import { blueprintBaseName } from "../blueprint/loader.js";

export function artifactExtension(language: TargetLanguage): string {
  return language === "typescript" ? ".ts" : ".js";
}

/** Artifacts live beside their blueprint: `models/user.md` -> `models/user.ts`. */
export function artifactPathFor(blueprint: Blueprint, language: TargetLanguage): string | null {
  if (!blueprint.sourceLocation) return null;
  return join(dirname(blueprint.sourceLocation), `${blueprintBaseName(blueprint.sourceLocation)}${artifactExtension(language)}`);
}

/** Artifacts produced so far in a run, keyed by module name. Only grows. */
export class ArtifactStore {
  private readonly artifacts = new Map<string, GeneratedArtifact>();

  set(artifact: GeneratedArtifact): void {
    this.artifacts.set(artifact.moduleName, artifact);
  }

  get(moduleName: string): GeneratedArtifact | undefined {
    return this.artifacts.get(moduleName);
  }

  has(moduleName: string): boolean {
    return this.artifacts.has(moduleName);
  }

  get size(): number {
    return this.artifacts.size;
  }

  values(): GeneratedArtifact[] {
    return [...this.artifacts.values()];
  }
}
