import { readFile, readdir } from "node:fs/promises";
import { basename, join, resolve } from "node:path";

import { BlueprintError, UserInputError } from "../errors.js";
import type { ParsedBlueprint } from "../types.js";

import { parseBlueprint } from "./parser.js";

export const BLUEPRINT_SKIP_DIRECTORIES = new Set([
  ".git",
  "node_modules",
  "dist",
  "build",
  "coverage",
  ".blueprints"
]);

const NON_BLUEPRINT_DOCUMENTS = new Set(["readme.md", "changelog.md", "license.md", "contributing.md"]);

export function isBlueprintFileName(name: string): boolean {
  return name.endsWith(".md") && !NON_BLUEPRINT_DOCUMENTS.has(name.toLowerCase());
}

export async function safeReadFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf8");
  } catch {
    return null;
  }
}

export async function loadBlueprintFile(path: string): Promise<ParsedBlueprint> {
  const absolutePath = resolve(path);
  const text = await safeReadFile(absolutePath);
  if (text === null) {
    throw new UserInputError(`Blueprint file not found or unreadable: ${absolutePath}`);
  }
  return parseBlueprint(text, { sourceLocation: absolutePath });
}

export async function findBlueprintFiles(root: string, maxDepth = 12): Promise<string[]> {
  const results: string[] = [];

  async function walk(currentPath: string, depth: number): Promise<void> {
    let entries;
    try {
      entries = await readdir(currentPath, { withFileTypes: true });
    } catch {
      return;
    }
    entries.sort((left, right) => left.name.localeCompare(right.name));

    for (const entry of entries) {
      const fullPath = join(currentPath, entry.name);
      if (entry.isDirectory()) {
        if (depth >= maxDepth) continue;
        if (BLUEPRINT_SKIP_DIRECTORIES.has(entry.name)) continue;
        await walk(fullPath, depth + 1);
        continue;
      }
      if (entry.isFile() && isBlueprintFileName(entry.name)) {
        results.push(fullPath);
      }
    }
  }

  await walk(resolve(root), 0);
  return results;
}

export interface DiscoveredBlueprint {
  moduleName: string;
  path: string;
  referenceCount: number;
  componentCount: number;
  warnings: string[];
}

export interface SkippedDocument {
  path: string;
  reason: string;
}

export interface BlueprintDiscovery {
  blueprints: DiscoveredBlueprint[];
  skipped: SkippedDocument[];
  duplicates: SkippedDocument[];
}

/**
 * Walks `root` for blueprint documents. Markdown files without a module
 * header are reported as skipped; the first file claiming a module name wins.
 */
export async function discoverBlueprints(root: string): Promise<BlueprintDiscovery> {
  const discovery: BlueprintDiscovery = { blueprints: [], skipped: [], duplicates: [] };
  const seen = new Map<string, string>();

  for (const path of await findBlueprintFiles(root)) {
    let parsed: ParsedBlueprint;
    try {
      parsed = await loadBlueprintFile(path);
    } catch (error) {
      if (!(error instanceof BlueprintError)) throw error;
      discovery.skipped.push({ path, reason: error.message });
      continue;
    }

    const { blueprint, warnings } = parsed;
    const previous = seen.get(blueprint.moduleName);
    if (previous) {
      discovery.duplicates.push({
        path,
        reason: `module "${blueprint.moduleName}" is already declared by ${previous}`
      });
      continue;
    }
    seen.set(blueprint.moduleName, path);
    discovery.blueprints.push({
      moduleName: blueprint.moduleName,
      path,
      referenceCount: blueprint.references.length,
      componentCount: blueprint.components.length,
      warnings
    });
  }

  return discovery;
}

export function blueprintBaseName(path: string): string {
  return basename(path, ".md");
}
