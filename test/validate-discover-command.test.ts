import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { UserInputError } from "../src/core/errors.js";

import { createBlueprintTree, removeTree } from "./fixtures.js";

const mocks = vi.hoisted(() => ({
  logInfo: vi.fn(),
  logWarn: vi.fn(),
  logSuccess: vi.fn()
}));

vi.mock("@clack/prompts", () => ({
  log: {
    info: mocks.logInfo,
    warn: mocks.logWarn,
    success: mocks.logSuccess,
    error: vi.fn()
  }
}));

const roots: string[] = [];

function tree(files: Record<string, string>): string {
  const root = createBlueprintTree(files);
  roots.push(root);
  return root;
}

function jsonOutput(spy: { mock: { calls: unknown[][] } }): unknown {
  const printed = spy.mock.calls[0]?.[0];
  return typeof printed === "string" ? JSON.parse(printed) : undefined;
}

beforeEach(() => {
  mocks.logInfo.mockReset();
  mocks.logWarn.mockReset();
  mocks.logSuccess.mockReset();
});

afterEach(() => {
  vi.restoreAllMocks();
  for (const root of roots.splice(0)) removeTree(root);
});

describe("runValidate", () => {
  it("reports the generation order of a valid graph", async () => {
    const { runValidate } = await import("../src/commands/validate.js");
    const root = tree({
      "app.md": "# app\n\ndeps: @.models.user[User]\n",
      "models/user.md": "# models.user\n\nclass User:\n  - id: string\n"
    });

    const summary = await runValidate(join(root, "app.md"), {});

    expect(summary).toEqual({
      root: "app",
      generationOrder: ["models.user", "app"],
      dependencies: 1,
      unresolved: [],
      cycles: [],
      warnings: [],
      valid: true
    });
    expect(mocks.logInfo).toHaveBeenCalledWith("Generation order: models.user -> app");
    expect(mocks.logSuccess).toHaveBeenCalledWith("app is valid.");
  });

  it("resolves a nested blueprint against --base-dir", async () => {
    const { runValidate } = await import("../src/commands/validate.js");
    const root = tree({
      "api/tasks.md": "# api.tasks\n\ndeps: @.models.user[User]\n",
      "models/user.md": "# models.user\n\nclass User:\n  - id: string\n"
    });

    const summary = await runValidate(join(root, "api", "tasks.md"), { baseDir: root });

    expect(summary.generationOrder).toEqual(["models.user", "api.tasks"]);
    expect(summary.valid).toBe(true);
    await expect(runValidate(join(root, "api", "tasks.md"), { baseDir: join(root, "missing") })).rejects.toThrow(
      `Base directory is not a directory: ${join(root, "missing")}`
    );
  });

  it("fails on unresolved references after printing them", async () => {
    const { runValidate } = await import("../src/commands/validate.js");
    const root = tree({ "app.md": "# app\n\ndeps: @.ghost[Spirit]\n" });

    await expect(runValidate(join(root, "app.md"), {})).rejects.toThrow(
      "Blueprint graph of app is invalid: 1 unresolved reference(s)."
    );
    expect(mocks.logWarn.mock.calls[0]?.[0]).toMatch(/^app: unresolved @\.ghost\[Spirit\] \(no blueprint found; tried /);
  });

  it("accepts cycles unless strict", async () => {
    const { runValidate } = await import("../src/commands/validate.js");
    const root = tree({
      "app.md": "# app\n\ndeps: @.a\n",
      "a.md": "# a\n\ndeps: @.b\n",
      "b.md": "# b\n\ndeps: @.a\n"
    });

    const lenient = await runValidate(join(root, "app.md"), {});
    expect(lenient.valid).toBe(true);
    expect(mocks.logWarn).toHaveBeenCalledWith("Cycle: a -> b -> a");

    await expect(runValidate(join(root, "app.md"), { strictCycles: true })).rejects.toThrow(
      "Blueprint graph of app is invalid: 1 dependency cycle(s)."
    );
  });

  it("prints a JSON summary", async () => {
    const { runValidate } = await import("../src/commands/validate.js");
    const root = tree({ "app.md": "# app\n\nStandalone.\n" });
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await runValidate(join(root, "app.md"), { format: "json" });

    expect(jsonOutput(consoleSpy)).toMatchObject({ root: "app", generationOrder: ["app"], valid: true });
    expect(mocks.logSuccess).not.toHaveBeenCalled();
  });

  it("rejects a missing file", async () => {
    const { runValidate } = await import("../src/commands/validate.js");
    const root = tree({});

    await expect(runValidate(join(root, "missing.md"), {})).rejects.toBeInstanceOf(UserInputError);
  });
});

describe("runDiscover", () => {
  it("lists blueprints and reports skipped documents", async () => {
    const { runDiscover } = await import("../src/commands/discover.js");
    const root = tree({
      "app.md": "# app\n\ndeps: @.models.user\n",
      "models/user.md": "# models.user\n\nclass User:\n  - id: string\n",
      "models/copy.md": "# models.user\n",
      "notes.md": "just some notes\n",
      "README.md": "# readme\n",
      "node_modules/pkg/index.md": "# pkg\n"
    });

    const discovery = await runDiscover(root, {});

    expect(discovery.blueprints.map((entry) => [entry.moduleName, entry.path])).toEqual([
      ["app", join(root, "app.md")],
      ["models.user", join(root, "models", "copy.md")]
    ]);
    expect(discovery.duplicates.map((entry) => entry.path)).toEqual([join(root, "models", "user.md")]);
    expect(discovery.skipped.map((entry) => entry.path)).toEqual([join(root, "notes.md")]);
    expect(mocks.logSuccess).toHaveBeenCalledWith("Found 2 blueprint(s).");
  });

  it("prints JSON", async () => {
    const { runDiscover } = await import("../src/commands/discover.js");
    const root = tree({ "app.md": "# app\n" });
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await runDiscover(root, { format: "json" });

    expect(jsonOutput(consoleSpy)).toEqual({
      blueprints: [{ moduleName: "app", path: join(root, "app.md"), referenceCount: 0, componentCount: 0, warnings: [] }],
      skipped: [],
      duplicates: []
    });
  });

  it("rejects a path that is not a directory", async () => {
    const { runDiscover } = await import("../src/commands/discover.js");
    const root = tree({ "app.md": "# app\n" });

    await expect(runDiscover(join(root, "app.md"), {})).rejects.toThrow(
      `Target path is not a directory: ${join(root, "app.md")}`
    );
  });
});
