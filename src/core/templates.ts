import { PROJECT_DESCRIPTOR_FILE } from "./manifest.js";
import { normalizeMarkdown, toTitleCase } from "./text.js";
import type { FileArtifact } from "./write.js";

export const ENTRY_BLUEPRINT_FILE = "app.md";

export function buildProjectDescriptor(projectName: string): string {
  return normalizeMarkdown(
    [
      `# ${projectName}`,
      "",
      `${toTitleCase(projectName)} project. Describe what the whole project does here.`,
      "",
      "## Third-party dependencies to install",
      "- zod - input validation",
      "",
      "## Development dependencies",
      "- typescript",
      "- tsx",
      "- vitest",
      "",
      "## Installation",
      "npm install",
      "export LOG_LEVEL=info",
      "",
      "## Running",
      "npx tsx app.ts",
      "npx tsx watch app.ts"
    ].join("\n")
  );
}

export function buildEntryBlueprint(): string {
  return normalizeMarkdown(
    [
      "# app",
      "",
      "Entry point. Creates a few items and prints their descriptions.",
      "",
      "deps: @./models/item[Item, createItem]",
      "notes: keep side effects inside main",
      "",
      "async main() -> void"
    ].join("\n")
  );
}

export function buildModelBlueprint(): string {
  return normalizeMarkdown(
    [
      "# models.item",
      "",
      "In-memory item records with validated names.",
      "",
      "class Item:",
      "  - id: string",
      "  - name: string",
      "  - describe() -> string",
      "",
      "createItem(name: string) -> Item",
      "ITEM_LIMIT: number = 100"
    ].join("\n")
  );
}

/** Starter project: descriptor, entry blueprint and one model blueprint. */
export function createInitFiles(projectName: string): FileArtifact[] {
  return [
    { path: PROJECT_DESCRIPTOR_FILE, content: buildProjectDescriptor(projectName) },
    { path: ENTRY_BLUEPRINT_FILE, content: buildEntryBlueprint() },
    { path: "models/item.md", content: buildModelBlueprint() }
  ];
}
