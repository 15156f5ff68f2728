import { describe, expect, it } from "vitest";

import { runCommand } from "../src/core/ai/process-runner.js";

describe("runCommand", () => {
  it("captures stdout of a successful command", async () => {
    const result = await runCommand(process.execPath, ["-e", "console.log('ready')"], { timeoutMs: 5000 });

    expect(result.ok).toBe(true);
    expect(result.stdout).toBe("ready\n");
    expect(result.exitCode).toBe(0);
  });

  it("times out long-running commands", async () => {
    const result = await runCommand(process.execPath, ["-e", "setInterval(() => {}, 1000);"], {
      timeoutMs: 250
    });

    expect(result.ok).toBe(false);
    expect(result.timedOut).toBe(true);
    expect(result.reason).toBe("timeout after 0.25s");
  });

  it("stops the child when the signal aborts", async () => {
    const controller = new AbortController();
    const pending = runCommand(process.execPath, ["-e", "setInterval(() => {}, 1000);"], {
      timeoutMs: 5000,
      signal: controller.signal
    });
    setTimeout(() => controller.abort(), 100);
    const result = await pending;

    expect(result.ok).toBe(false);
    expect(result.aborted).toBe(true);
    expect(result.reason).toBe("aborted");
  });

  it("does not spawn when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const result = await runCommand(process.execPath, ["-e", "console.log('never')"], {
      signal: controller.signal
    });

    expect(result).toEqual({ ok: false, stdout: "", stderr: "", reason: "aborted", aborted: true });
  });

  it("passes the given environment to the child", async () => {
    const result = await runCommand(process.execPath, ["-e", "console.log(process.env.BLUEPRINTS_MARKER ?? 'unset')"], {
      timeoutMs: 5000,
      env: { BLUEPRINTS_MARKER: "visible" }
    });

    expect(result.stdout.trim()).toBe("visible");
  });

  it("keeps only output tail instead of killing noisy processes", async () => {
    const result = await runCommand(
      process.execPath,
      ["-e", "const chunk='x'.repeat(2048); for (let i = 0; i < 128; i += 1) process.stdout.write(chunk);"],
      {
        timeoutMs: 5000,
        maxBufferBytes: 4096
      }
    );

    expect(result.ok).toBe(true);
    expect(Buffer.byteLength(result.stdout, "utf8")).toBeLessThanOrEqual(4096);
  });

  it("adds truncation notice for failing commands with oversized output", async () => {
    const result = await runCommand(
      process.execPath,
      [
        "-e",
        "const chunk='y'.repeat(2048); for (let i = 0; i < 128; i += 1) process.stderr.write(chunk); process.exit(7);"
      ],
      {
        timeoutMs: 5000,
        maxBufferBytes: 4096
      }
    );

    expect(result.ok).toBe(false);
    expect(result.exitCode).toBe(7);
    expect(result.reason).toBe("exit code 7; output truncated to last 4096 bytes per stream");
  });

  it("reports spawn failures without throwing", async () => {
    const result = await runCommand("blueprints-missing-binary-for-test", [], { timeoutMs: 1000 });

    expect(result.ok).toBe(false);
    expect(result.reason).toContain("ENOENT");
  });
});
