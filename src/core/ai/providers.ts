import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { runCommand, type RunCommandOptions } from "./process-runner.js";
import type { CommandResult, StatusCallback } from "./contracts.js";
import type { ResolvedAiProvider } from "./provider-selection.js";

const DEFAULT_CODEX_REASONING_EFFORT = "high";
const DEFAULT_CODEX_SANDBOX_MODE = "read-only";
const DEFAULT_TEXT_TIMEOUT_MS = 10 * 60 * 1000;

export interface TextTaskOptions {
  cwd?: string | undefined;
  onStatus?: StatusCallback | undefined;
  model?: string | undefined;
  timeoutMs?: number | undefined;
  signal?: AbortSignal | undefined;
}

export function summarizeFailure(result: CommandResult): string {
  const reason = result.reason ?? "unknown error";
  const combined = `${result.stderr}\n${result.stdout}`.replace(/\s+/g, " ").trim();
  if (!combined) return reason;
  const snippet = combined.length > 280 ? `${combined.slice(0, 280)}...` : combined;
  return `${reason}: ${snippet}`;
}

function runnerOptions(options: TextTaskOptions): RunCommandOptions {
  return {
    cwd: options.cwd,
    timeoutMs: options.timeoutMs ?? DEFAULT_TEXT_TIMEOUT_MS,
    ...(options.signal ? { signal: options.signal } : {})
  };
}

async function runCodexText(prompt: string, options: TextTaskOptions = {}): Promise<CommandResult> {
  const tempDir = await mkdtemp(join(tmpdir(), "blueprints-codex-"));
  const lastMessagePath = join(tempDir, "last-message.txt");

  try {
    options.onStatus?.("Running codex...");
    const args = [
      "exec",
      "--sandbox",
      DEFAULT_CODEX_SANDBOX_MODE,
      "--skip-git-repo-check",
      "-c",
      `model_reasoning_effort="${DEFAULT_CODEX_REASONING_EFFORT}"`
    ];
    if (options.model) {
      args.push("--model", options.model);
    }
    args.push("--output-last-message", lastMessagePath, prompt);

    const result = await runCommand("codex", args, runnerOptions(options));
    if (!result.ok) return result;

    let lastMessage: string;
    try {
      lastMessage = await readFile(lastMessagePath, "utf8");
    } catch {
      return result;
    }
    return { ...result, stdout: lastMessage };
  } finally {
    await rm(tempDir, { recursive: true, force: true });
  }
}

async function runClaudeText(prompt: string, options: TextTaskOptions = {}): Promise<CommandResult> {
  options.onStatus?.("Running claude...");
  const primaryArgs = ["-p", prompt, "--output-format", "text", "--tools", "", "--no-session-persistence"];
  if (options.model) {
    primaryArgs.push("--model", options.model);
  }
  const primary = await runCommand("claude", primaryArgs, runnerOptions(options));
  if (primary.ok || primary.aborted || primary.timedOut) return primary;

  options.onStatus?.(
    "Warning: Claude retry will run without --no-session-persistence because your installed CLI rejected the primary invocation."
  );
  const fallbackArgs = ["-p", prompt, "--output-format", "text"];
  if (options.model) {
    fallbackArgs.push("--model", options.model);
  }
  return runCommand("claude", fallbackArgs, runnerOptions(options));
}

export async function runTextTask(
  provider: ResolvedAiProvider,
  prompt: string,
  options: TextTaskOptions = {}
): Promise<CommandResult> {
  return provider === "codex" ? runCodexText(prompt, options) : runClaudeText(prompt, options);
}
