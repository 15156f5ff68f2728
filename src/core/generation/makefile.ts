import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import { blueprintBaseName } from "../blueprint/loader.js";
import type { ProjectDescriptor } from "../manifest.js";
import type { ResolvedProject } from "../types.js";

export const MAKEFILE_NAME = "Makefile";
const APP_ENTRY_FILE = "app.md";

const HELP_ROWS: Array<[target: string, summary: string]> = [
  ["install", "Install production dependencies"],
  ["install-dev", "Install development dependencies"],
  ["setup", "Complete project setup"],
  ["run", "Run the application"],
  ["dev", "Run in development mode"],
  ["test", "Run tests"],
  ["clean", "Clean up generated files"]
];

/** `app.md` anywhere in the generation order, otherwise the root blueprint. */
export function findEntryModule(project: ResolvedProject): string {
  for (const blueprint of project.generationOrder) {
    if (blueprint.sourceLocation && basename(blueprint.sourceLocation) === APP_ENTRY_FILE) {
      return blueprintBaseName(blueprint.sourceLocation);
    }
  }
  if (project.root.sourceLocation) return blueprintBaseName(project.root.sourceLocation);
  return project.root.moduleName.split(".").at(-1) ?? project.root.moduleName;
}

function shellQuote(value: string): string {
  return value.replaceAll("'", "'\\''");
}

function target(name: string, recipe: string[], prerequisites: string[] = []): string[] {
  const header = prerequisites.length > 0 ? `${name}: ${prerequisites.join(" ")}` : `${name}:`;
  return [header, ...recipe.map((line) => `\t${line}`), ""];
}

export function renderMakefile(descriptor: ProjectDescriptor, entryModule: string): string {
  const padding = Math.max(...HELP_ROWS.map(([name]) => name.length)) + 1;
  const lines = [
    `# Makefile for ${descriptor.moduleName}`,
    "# Generated by blueprints",
    "",
    `.PHONY: help ${HELP_ROWS.map(([name]) => name).join(" ")}`,
    "",
    ...target("help", [
      "@echo 'Available commands:'",
      ...HELP_ROWS.map(([name, summary]) => `@echo '  ${name.padEnd(padding)}- ${summary}'`)
    ])
  ];

  const installRecipe = ["@echo 'Installing dependencies...'"];
  if (descriptor.installCommands.length > 0) {
    installRecipe.push(...descriptor.installCommands);
  } else if (descriptor.dependencies.length > 0) {
    installRecipe.push(`npm install ${descriptor.dependencies.join(" ")}`);
  } else {
    installRecipe.push("npm install");
  }
  lines.push(...target("install", installRecipe));

  const devRecipe = ["@echo 'Installing development dependencies...'"];
  devRecipe.push(
    descriptor.devDependencies.length > 0
      ? `npm install --save-dev ${descriptor.devDependencies.join(" ")}`
      : "npm install --include=dev"
  );
  lines.push(...target("install-dev", devRecipe));

  const setupRecipe = ["@echo 'Project setup complete!'"];
  if (descriptor.envVars.length > 0) {
    setupRecipe.push("@echo 'Environment variables to set:'");
    setupRecipe.push(...descriptor.envVars.map((envVar) => `@echo '  ${shellQuote(envVar)}'`));
  }
  lines.push(...target("setup", setupRecipe, ["install", "install-dev"]));

  const [runCommand, devCommand] = descriptor.runCommands;
  lines.push(...target("run", [`@echo 'Starting ${entryModule}...'`, runCommand ?? "npm start"]));
  lines.push(
    ...target("dev", [
      `@echo 'Starting ${entryModule} in development mode...'`,
      devCommand ?? runCommand ?? "npm run dev"
    ])
  );
  lines.push(...target("test", ["@echo 'Running tests...'", "npm test"]));
  lines.push(...target("clean", ["@echo 'Cleaning up...'", "rm -rf node_modules dist"]));

  return lines.join("\n");
}

export interface WriteMakefileResult {
  path: string;
  written: boolean;
}

/** Writes the Makefile beside the root blueprint; an existing one is kept unless `force`. */
export async function writeMakefile(
  project: ResolvedProject,
  descriptor: ProjectDescriptor,
  options: { outputDir?: string | undefined; force?: boolean | undefined } = {}
): Promise<WriteMakefileResult> {
  const outputDir =
    options.outputDir ?? (project.root.sourceLocation ? dirname(project.root.sourceLocation) : process.cwd());
  const path = join(outputDir, MAKEFILE_NAME);
  if (existsSync(path) && !options.force) {
    return { path, written: false };
  }
  await writeFile(path, renderMakefile(descriptor, findEntryModule(project)), "utf8");
  return { path, written: true };
}
