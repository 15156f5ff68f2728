import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ConfigError, GenerationCancelledError, OracleError } from "../src/core/errors.js";

const mocks = vi.hoisted(() => ({
  runCommand: vi.fn()
}));

vi.mock("../src/core/ai/process-runner.js", () => ({
  runCommand: mocks.runCommand
}));

describe("ai provider command wiring", () => {
  beforeEach(() => {
    mocks.runCommand.mockReset();
    mocks.runCommand.mockResolvedValue({
      ok: true,
      stdout: "ok",
      stderr: ""
    });
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it("runs claude in print mode without tools", async () => {
    const { runTextTask } = await import("../src/core/ai/providers.js");

    await runTextTask("claude", "write the module", { cwd: "/tmp/project", model: "sonnet" });

    expect(mocks.runCommand).toHaveBeenCalledWith(
      "claude",
      ["-p", "write the module", "--output-format", "text", "--tools", "", "--no-session-persistence", "--model", "sonnet"],
      {
        cwd: "/tmp/project",
        timeoutMs: 600_000
      }
    );
  });

  it("retries claude without session flags when the primary invocation fails", async () => {
    const { runTextTask } = await import("../src/core/ai/providers.js");
    mocks.runCommand.mockResolvedValueOnce({ ok: false, stdout: "", stderr: "unknown option", reason: "exit 1" });
    const statuses: string[] = [];

    const result = await runTextTask("claude", "write the module", { onStatus: (message) => statuses.push(message) });

    expect(result.ok).toBe(true);
    expect(mocks.runCommand).toHaveBeenCalledTimes(2);
    expect(mocks.runCommand.mock.calls[1]?.[1]).toEqual(["-p", "write the module", "--output-format", "text"]);
    expect(statuses[0]).toBe("Running claude...");
  });

  it("does not retry claude after a timeout", async () => {
    const { runTextTask } = await import("../src/core/ai/providers.js");
    mocks.runCommand.mockResolvedValueOnce({ ok: false, stdout: "", stderr: "", timedOut: true, reason: "timed out" });

    const result = await runTextTask("claude", "write the module");

    expect(result.timedOut).toBe(true);
    expect(mocks.runCommand).toHaveBeenCalledTimes(1);
  });

  it("runs codex read-only and forwards the timeout", async () => {
    const { runTextTask } = await import("../src/core/ai/providers.js");

    const result = await runTextTask("codex", "write the module", { timeoutMs: 30_000 });

    const args: unknown = mocks.runCommand.mock.calls[0]?.[1];
    expect(Array.isArray(args) ? args.slice(0, 6) : args).toEqual([
      "exec",
      "--sandbox",
      "read-only",
      "--skip-git-repo-check",
      "-c",
      'model_reasoning_effort="high"'
    ]);
    expect(Array.isArray(args) ? args.at(-1) : args).toBe("write the module");
    expect(mocks.runCommand.mock.calls[0]?.[2]).toEqual({ cwd: undefined, timeoutMs: 30_000 });
    expect(result.stdout).toBe("ok");
  });
});

describe("CliGenerationOracle", () => {
  beforeEach(() => {
    mocks.runCommand.mockReset();
  });

  it("returns the fenced source from the reply", async () => {
    const { CliGenerationOracle } = await import("../src/core/ai/oracle.js");
    mocks.runCommand.mockResolvedValue({
      ok: true,
      stdout: "Here you go:\n```ts\nexport const a = 1;\n```\nDone.",
      stderr: ""
    });

    const oracle = new CliGenerationOracle({ provider: "claude" });

    await expect(oracle.generate("prompt")).resolves.toBe("export const a = 1;\n");
  });

  it("wraps a failed command in an oracle error", async () => {
    const { CliGenerationOracle } = await import("../src/core/ai/oracle.js");
    mocks.runCommand.mockResolvedValue({ ok: false, stdout: "", stderr: "rate limit", reason: "exit 2", timedOut: true });

    const oracle = new CliGenerationOracle({ provider: "codex" });
    const pending = oracle.generate("prompt");

    await expect(pending).rejects.toBeInstanceOf(OracleError);
    await expect(pending).rejects.toThrow("codex failed: exit 2: rate limit");
  });

  it("rejects an empty reply", async () => {
    const { CliGenerationOracle } = await import("../src/core/ai/oracle.js");
    mocks.runCommand.mockResolvedValue({ ok: true, stdout: "   \n", stderr: "" });

    await expect(new CliGenerationOracle({ provider: "claude" }).generate("prompt")).rejects.toThrow(
      "claude returned an empty reply."
    );
  });

  it("does not call the provider once cancelled", async () => {
    const { CliGenerationOracle } = await import("../src/core/ai/oracle.js");
    const controller = new AbortController();
    controller.abort();

    await expect(
      new CliGenerationOracle({ provider: "claude" }).generate("prompt", { signal: controller.signal })
    ).rejects.toBeInstanceOf(GenerationCancelledError);
    expect(mocks.runCommand).not.toHaveBeenCalled();
  });

  it("reports a cancelled command as cancellation", async () => {
    const { CliGenerationOracle } = await import("../src/core/ai/oracle.js");
    mocks.runCommand.mockResolvedValue({ ok: false, stdout: "", stderr: "", aborted: true });

    await expect(new CliGenerationOracle({ provider: "claude" }).generate("prompt")).rejects.toBeInstanceOf(
      GenerationCancelledError
    );
  });
});

describe("provider selection", () => {
  it("prefers codex, then claude, in auto mode", async () => {
    const { chooseProvider } = await import("../src/core/ai/provider-selection.js");

    expect(chooseProvider("auto", () => true)).toBe("codex");
    expect(chooseProvider("auto", (command) => command === "claude")).toBe("claude");
    expect(chooseProvider("auto", () => false)).toBeNull();
    expect(chooseProvider("claude", (command) => command === "codex")).toBeNull();
  });

  it("fails oracle creation when no provider is installed", async () => {
    const { createOracle } = await import("../src/core/ai/oracle.js");

    expect(() => createOracle({ provider: "auto", commandExists: () => false })).toThrow(ConfigError);
    expect(() => createOracle({ provider: "codex", commandExists: () => false })).toThrow(
      'Requested provider "codex" is not installed or not on PATH.'
    );
    expect(createOracle({ provider: "auto", commandExists: () => true }).provider).toBe("codex");
  });
});
