import { spawn } from "node:child_process";

import type { CommandResult } from "./contracts.js";

export interface RunCommandOptions {
  cwd?: string | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  maxBufferBytes?: number | undefined;
  timeoutMs?: number | undefined;
  signal?: AbortSignal | undefined;
}

const DEFAULT_MAX_BUFFER_BYTES = 10 * 1024 * 1024;
const DEFAULT_TIMEOUT_MS = 8 * 60 * 1000;
const KILL_GRACE_MS = 800;

function trimToTailWithinBytes(value: string, maxBytes: number): string {
  if (Buffer.byteLength(value, "utf8") <= maxBytes) return value;
  let low = 0;
  let high = value.length;

  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    const sliced = value.slice(mid);
    if (Buffer.byteLength(sliced, "utf8") > maxBytes) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  return value.slice(low);
}

/**
 * Runs a command to completion and never rejects: spawn failures, non-zero
 * exits, timeouts and aborts all come back as `ok: false` with a reason.
 */
export function runCommand(command: string, args: string[], options: RunCommandOptions = {}): Promise<CommandResult> {
  const maxBufferBytes = options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const signal = options.signal;

  if (signal?.aborted) {
    return Promise.resolve({ ok: false, stdout: "", stderr: "", reason: "aborted", aborted: true });
  }

  return new Promise((resolveResult) => {
    let stdout = "";
    let stderr = "";
    let done = false;
    let timedOut = false;
    let aborted = false;
    let stdoutTruncated = false;
    let stderrTruncated = false;

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ["ignore", "pipe", "pipe"]
    });

    const onAbort = (): void => {
      aborted = true;
      child.kill("SIGTERM");
      setTimeout(() => {
        if (!done) child.kill("SIGKILL");
      }, KILL_GRACE_MS).unref();
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    const timeoutHandle = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, timeoutMs);

    const resolveOnce = (value: CommandResult): void => {
      if (done) return;
      done = true;
      clearTimeout(timeoutHandle);
      signal?.removeEventListener("abort", onAbort);
      resolveResult(value);
    };

    const addChunk = (
      current: string,
      chunk: string
    ): {
      next: string;
      truncated: boolean;
    } => {
      const next = trimToTailWithinBytes(current + chunk, maxBufferBytes);
      const truncated = Buffer.byteLength(current + chunk, "utf8") > maxBufferBytes;
      return { next, truncated };
    };

    const withOutputTailNotice = (reason: string): string => {
      if (!stdoutTruncated && !stderrTruncated) return reason;
      return `${reason}; output truncated to last ${maxBufferBytes} bytes per stream`;
    };

    if (child.stdout) {
      child.stdout.setEncoding("utf8");
      child.stdout.on("data", (chunk: string) => {
        const appended = addChunk(stdout, chunk);
        stdout = appended.next;
        stdoutTruncated = stdoutTruncated || appended.truncated;
      });
    }

    if (child.stderr) {
      child.stderr.setEncoding("utf8");
      child.stderr.on("data", (chunk: string) => {
        const appended = addChunk(stderr, chunk);
        stderr = appended.next;
        stderrTruncated = stderrTruncated || appended.truncated;
      });
    }

    child.on("error", (error) => {
      resolveOnce({
        ok: false,
        stdout,
        stderr,
        reason: withOutputTailNotice(error.message)
      });
    });

    child.on("close", (code) => {
      if (aborted) {
        resolveOnce({ ok: false, stdout, stderr, exitCode: code, reason: "aborted", aborted: true });
        return;
      }

      if (timedOut) {
        resolveOnce({
          ok: false,
          stdout,
          stderr,
          exitCode: code,
          timedOut: true,
          reason: withOutputTailNotice(`timeout after ${timeoutMs / 1000}s`)
        });
        return;
      }

      if (code !== 0) {
        resolveOnce({
          ok: false,
          stdout,
          stderr,
          exitCode: code,
          reason: withOutputTailNotice(`exit code ${code ?? "unknown"}`)
        });
        return;
      }

      resolveOnce({
        ok: true,
        stdout,
        stderr,
        exitCode: code
      });
    });
  });
}
