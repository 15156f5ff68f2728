import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/** Writes `files` (relative path -> content) under a fresh temp directory. */
export function createBlueprintTree(files: Record<string, string>): string {
  const root = mkdtempSync(join(tmpdir(), "blueprints-test-"));
  writeTree(root, files);
  return root;
}

export function writeTree(root: string, files: Record<string, string>): void {
  for (const [path, content] of Object.entries(files)) {
    const absolutePath = join(root, path);
    mkdirSync(dirname(absolutePath), { recursive: true });
    writeFileSync(absolutePath, content, "utf8");
  }
}

export function removeTree(root: string): void {
  rmSync(root, { recursive: true, force: true });
}
