import { spawnSync } from "node:child_process";

import type { AiProvider } from "../types.js";

export type ResolvedAiProvider = Exclude<AiProvider, "auto">;

const AUTO_PREFERENCE: ResolvedAiProvider[] = ["codex", "claude"];

export function hasBinary(command: string): boolean {
  const locator = process.platform === "win32" ? "where" : "which";
  const lookup = spawnSync(locator, [command], { encoding: "utf8" });
  return lookup.status === 0;
}

export function chooseProvider(
  requested: AiProvider,
  commandExists: (command: string) => boolean = hasBinary
): ResolvedAiProvider | null {
  if (requested === "codex") return commandExists("codex") ? "codex" : null;
  if (requested === "claude") return commandExists("claude") ? "claude" : null;

  for (const candidate of AUTO_PREFERENCE) {
    if (commandExists(candidate)) return candidate;
  }

  return null;
}
