import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";

import { z } from "zod";

import { parseBlueprint } from "./blueprint/parser.js";
import type { Blueprint } from "./types.js";

export const PROJECT_DESCRIPTOR_FILE = "main.md";

const packageJsonSchema = z
  .object({
    dependencies: z.record(z.unknown()).optional(),
    devDependencies: z.record(z.unknown()).optional(),
    peerDependencies: z.record(z.unknown()).optional(),
    optionalDependencies: z.record(z.unknown()).optional()
  })
  .passthrough();

interface PackageManifestSnapshot {
  dependencies: Set<string>;
  hasPackageJson: boolean;
}

export interface ProjectDescriptor {
  moduleName: string;
  dependencies: string[];
  devDependencies: string[];
  installCommands: string[];
  runCommands: string[];
  envVars: string[];
}

export interface DependencyManifest {
  /** Every declared package name; `null` when nothing declares dependencies at all. */
  packages: Set<string> | null;
  descriptor: ProjectDescriptor | null;
  sources: string[];
}

export function readPackageManifest(targetDir: string): PackageManifestSnapshot {
  const packageJsonPath = join(targetDir, "package.json");
  if (!existsSync(packageJsonPath)) {
    return { dependencies: new Set<string>(), hasPackageJson: false };
  }

  let json: unknown;
  try {
    json = JSON.parse(readFileSync(packageJsonPath, "utf8"));
  } catch {
    return { dependencies: new Set<string>(), hasPackageJson: true };
  }
  const parsed = packageJsonSchema.safeParse(json);
  if (!parsed.success) {
    return { dependencies: new Set<string>(), hasPackageJson: true };
  }

  const dependencies = new Set<string>();
  const { dependencies: prod, devDependencies, peerDependencies, optionalDependencies } = parsed.data;
  for (const section of [prod, devDependencies, peerDependencies, optionalDependencies]) {
    for (const dependencyName of Object.keys(section ?? {})) {
      dependencies.add(dependencyName.toLowerCase());
    }
  }
  return { dependencies, hasPackageJson: true };
}

/** `express>=4.18 - web framework` -> `express`; `@nestjs/common@10` -> `@nestjs/common`. */
export function packageNameFromEntry(entry: string): string | null {
  const token = entry.split(/\s+#\s|\s+-\s/)[0]?.trim().split(/\s+/)[0] ?? "";
  const match = /^(@[\w.-]+\/[\w.-]+|[A-Za-z0-9][\w.-]*)/.exec(token);
  if (!match?.[1]) return null;
  return match[1].replace(/[.-]+$/, "").toLowerCase();
}

function sectionKind(name: string): "dependencies" | "devDependencies" | "installation" | "running" | null {
  if (name.includes("development dependencies") || name.includes("dev dependencies")) return "devDependencies";
  if (name.includes("third-party dependencies") || name.includes("dependencies to install")) return "dependencies";
  if (name.includes("installation")) return "installation";
  if (name.includes("running")) return "running";
  return null;
}

const INSTALL_COMMAND = /^(?:npm|npx|pnpm|yarn)\s/;
const RUN_COMMAND = /^(?:node|npm|npx|tsx|pnpm|yarn)\s/;

function stripCode(value: string): string {
  return value.replace(/^`+|`+$/g, "").trim();
}

export function describeProject(blueprint: Blueprint): ProjectDescriptor {
  const descriptor: ProjectDescriptor = {
    moduleName: blueprint.moduleName,
    dependencies: [],
    devDependencies: [],
    installCommands: [],
    runCommands: [],
    envVars: []
  };

  for (const [name, items] of Object.entries(blueprint.sections)) {
    const kind = sectionKind(name);
    if (!kind) continue;
    for (const raw of items) {
      const item = stripCode(raw);
      if (kind === "dependencies" || kind === "devDependencies") {
        const packageName = packageNameFromEntry(item);
        if (packageName && !descriptor[kind].includes(packageName)) descriptor[kind].push(packageName);
      } else if (item.startsWith("export ")) {
        descriptor.envVars.push(item);
      } else if (kind === "installation" && INSTALL_COMMAND.test(item)) {
        descriptor.installCommands.push(item);
      } else if (kind === "running" && RUN_COMMAND.test(item)) {
        descriptor.runCommands.push(item);
      }
    }
  }
  return descriptor;
}

/**
 * The project descriptor is `main.md` beside the root blueprint, then in the
 * project root, or else the root blueprint itself.
 */
export function loadProjectDescriptor(root: Blueprint, projectRoot?: string): ProjectDescriptor {
  const directories = [
    ...(root.sourceLocation ? [dirname(root.sourceLocation)] : []),
    ...(projectRoot ? [projectRoot] : [])
  ];
  for (const directory of new Set(directories)) {
    const descriptorPath = join(directory, PROJECT_DESCRIPTOR_FILE);
    if (descriptorPath === root.sourceLocation || !existsSync(descriptorPath)) continue;
    try {
      const { blueprint } = parseBlueprint(readFileSync(descriptorPath, "utf8"), { sourceLocation: descriptorPath });
      return describeProject(blueprint);
    } catch {
      return describeProject(root);
    }
  }
  return describeProject(root);
}

/**
 * Third-party packages the project declares: package.json in the project
 * root, the descriptor's dependency sections and every blueprint's
 * non-blueprint dependency entries.
 */
export function loadDependencyManifest(projectRoot: string, blueprints: Iterable<Blueprint>, root: Blueprint): DependencyManifest {
  const packages = new Set<string>();
  const sources: string[] = [];

  const packageJson = readPackageManifest(projectRoot);
  if (packageJson.hasPackageJson) {
    sources.push(join(projectRoot, "package.json"));
    for (const name of packageJson.dependencies) packages.add(name);
  }

  const descriptor = loadProjectDescriptor(root, projectRoot);
  if (descriptor.dependencies.length > 0 || descriptor.devDependencies.length > 0) {
    sources.push(`${descriptor.moduleName} dependency sections`);
    for (const name of [...descriptor.dependencies, ...descriptor.devDependencies]) packages.add(name);
  }

  let declaredInBlueprints = false;
  for (const blueprint of blueprints) {
    for (const entry of blueprint.externalDependencies) {
      const name = packageNameFromEntry(entry);
      if (!name) continue;
      packages.add(name);
      declaredInBlueprints = true;
    }
  }
  if (declaredInBlueprints) sources.push("blueprint dependency entries");

  return { packages: sources.length > 0 ? packages : null, descriptor, sources };
}
