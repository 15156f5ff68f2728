import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import { UserInputError } from "./errors.js";

export interface FileArtifact {
  /** Path relative to the target directory, `/`-separated. */
  path: string;
  content: string;
}

export interface WriteProgress {
  current: number;
  total: number;
  path: string;
}

export interface WriteFilesOptions {
  force?: boolean;
  onProgress?: (event: WriteProgress) => void;
}

export function findConflicts(targetDir: string, files: readonly FileArtifact[]): string[] {
  return files.filter((file) => existsSync(join(targetDir, file.path))).map((file) => file.path);
}

/** Writes every file under `targetDir`; existing files are an error unless `force`. */
export async function writeFiles(
  targetDir: string,
  files: readonly FileArtifact[],
  options: WriteFilesOptions = {}
): Promise<string[]> {
  const force = options.force ?? false;
  if (!force) {
    const conflicts = findConflicts(targetDir, files);
    if (conflicts.length > 0) {
      throw new UserInputError(`Refusing to overwrite existing files: ${conflicts.join(", ")}. Use --force to replace them.`, {
        details: { conflicts }
      });
    }
  }

  const written: string[] = [];
  for (const file of files) {
    const absolutePath = join(targetDir, file.path);
    await mkdir(dirname(absolutePath), { recursive: true });
    await writeFile(absolutePath, file.content, { encoding: "utf8", flag: force ? "w" : "wx" });
    written.push(absolutePath);
    options.onProgress?.({ current: written.length, total: files.length, path: file.path });
  }
  return written;
}
