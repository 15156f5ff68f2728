import { existsSync } from "node:fs";
import { basename, dirname, join, resolve } from "node:path";

import { CONFIG_FILE_NAME } from "../config.js";
import { PROJECT_DESCRIPTOR_FILE } from "../manifest.js";

/** Files whose presence marks a directory as the root of a blueprint project. */
export const PROJECT_ROOT_MARKERS = [PROJECT_DESCRIPTOR_FILE, CONFIG_FILE_NAME, "package.json", ".git"] as const;

function splitSegments(value: string): string[] {
  return value.split(/[./\\]+/).filter(Boolean);
}

/**
 * Directories-plus-stem candidates for a reference target, most specific
 * first. Each candidate `p` is tried as `p.md` and then `p/<basename>.md`.
 */
export function candidateStems(targetPath: string, fromDir: string, baseDir: string): string[] {
  const target = targetPath.trim().replace(/^@/, "");
  if (!target) return [];

  if (target.startsWith("./") || target.startsWith("../")) {
    return [resolve(fromDir, target.replace(/\.md$/, ""))];
  }

  const leadingDots = /^\.+/.exec(target)?.[0].length ?? 0;
  const segments = splitSegments(target.slice(leadingDots));
  if (segments.length === 0) return [];

  if (leadingDots > 0) {
    let anchor = fromDir;
    for (let level = 1; level < leadingDots; level += 1) anchor = dirname(anchor);
    const stems = [join(anchor, ...segments), join(baseDir, ...segments)];
    return [...new Set(stems)];
  }

  return [join(baseDir, ...segments)];
}

export function candidateFiles(targetPath: string, fromDir: string, baseDir: string): string[] {
  const files: string[] = [];
  for (const stem of candidateStems(targetPath, fromDir, baseDir)) {
    files.push(`${stem}.md`, join(stem, `${basename(stem)}.md`));
  }
  return files;
}

/** Dotted module name a target most likely refers to, e.g. `@../core/db` -> `core.db`. */
export function moduleNameHint(targetPath: string): string {
  return splitSegments(targetPath.trim().replace(/^@/, "").replace(/\.md$/, "")).join(".");
}

/**
 * Nearest directory at or above `startDir` that holds a project marker.
 * Without one, `startDir` itself is the project root.
 */
export function findProjectRoot(startDir: string): string {
  const start = resolve(startDir);
  let current = start;
  for (;;) {
    if (PROJECT_ROOT_MARKERS.some((marker) => existsSync(join(current, marker)))) return current;
    const parent = dirname(current);
    if (parent === current) return start;
    current = parent;
  }
}
