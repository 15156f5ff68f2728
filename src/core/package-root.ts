import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import { ExecutionError } from "./errors.js";

let cachedRoot: string | null = null;

/** Directory of this package's own package.json, from sources or from dist. */
export function packageRoot(): string {
  if (cachedRoot) return cachedRoot;
  let current = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (existsSync(join(current, "package.json"))) {
      cachedRoot = current;
      return current;
    }
    const parent = dirname(current);
    if (parent === current) {
      throw new ExecutionError("Could not locate the blueprint-codegen package root.");
    }
    current = parent;
  }
}

export function packageFile(...segments: string[]): string {
  return join(packageRoot(), ...segments);
}
