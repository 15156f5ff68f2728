import { readFileSync } from "node:fs";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { GenerationOracle } from "../src/core/ai/contracts.js";
import { UserInputError } from "../src/core/errors.js";

import { createBlueprintTree, removeTree, writeTree } from "./fixtures.js";

const mocks = vi.hoisted(() => ({
  spinnerStart: vi.fn(),
  spinnerStop: vi.fn(),
  spinnerMessage: vi.fn(),
  logInfo: vi.fn(),
  logWarn: vi.fn(),
  logSuccess: vi.fn(),
  createOracle: vi.fn()
}));

vi.mock("@clack/prompts", () => ({
  spinner: () => ({
    start: mocks.spinnerStart,
    stop: mocks.spinnerStop,
    message: mocks.spinnerMessage,
    error: vi.fn()
  }),
  log: {
    info: mocks.logInfo,
    warn: mocks.logWarn,
    success: mocks.logSuccess,
    error: vi.fn()
  }
}));

vi.mock("../src/core/ai/oracle.js", () => ({
  createOracle: mocks.createOracle
}));

const USER_SOURCE = 'export class User {\n  id = "";\n}\n';
const APP_SOURCE = 'import { User } from "@/models/user";\n\nexport const admin = new User();\n';
const RELATIVE_APP_SOURCE = 'import { User } from "./models/user";\n\nexport const admin = new User();\n';

const roots: string[] = [];

function projectTree(): string {
  const root = createBlueprintTree({
    "app.md": "# app\n\ndeps: @.models.user[User]\n",
    "models/user.md": "# models.user\n\nclass User:\n  - id: string\n"
  });
  roots.push(root);
  return root;
}

function moduleOf(prompt: string): string | undefined {
  return /module for ([\w.]+)\.$/m.exec(prompt)?.[1];
}

function useOracle(appSource: string): GenerationOracle {
  const oracle: GenerationOracle = {
    generate: vi.fn(async (prompt: string) => (moduleOf(prompt) === "models.user" ? USER_SOURCE : appSource))
  };
  mocks.createOracle.mockReturnValue(oracle);
  return oracle;
}

beforeEach(() => {
  for (const mock of Object.values(mocks)) mock.mockReset();
});

afterEach(() => {
  for (const root of roots.splice(0)) removeTree(root);
});

describe("runGenerateProject", () => {
  it("generates a verified project and writes its Makefile", async () => {
    const { runGenerateProject } = await import("../src/commands/generate-project.js");
    const root = projectTree();
    useOracle(APP_SOURCE);

    const [report] = await runGenerateProject([join(root, "app.md")], {
      provider: "claude",
      runtimeCheck: false,
      qualityImprovement: false,
      requirementsCheck: false
    });

    expect(report?.success).toBe(true);
    expect(report?.modules.map((module) => module.status)).toEqual(["generated", "generated"]);
    expect(readFileSync(join(root, "app.ts"), "utf8")).toBe(APP_SOURCE);
    expect(mocks.createOracle).toHaveBeenCalledWith(expect.objectContaining({ provider: "claude", cwd: root }));
    expect(mocks.logSuccess).toHaveBeenCalledWith("app: 2 generated, 0 reused, 0 failing verification.");
    expect(mocks.logInfo).toHaveBeenCalledWith(`Wrote ${join(root, "Makefile")}.`);
    expect(mocks.spinnerStop).toHaveBeenCalledWith("Finished app.");
  });

  it("reports modules that still fail verification after the retry budget", async () => {
    const { runGenerateProject } = await import("../src/commands/generate-project.js");
    const root = projectTree();
    const oracle = useOracle(RELATIVE_APP_SOURCE);

    const [report] = await runGenerateProject([join(root, "app.md")], {
      maxRetries: "1",
      makefile: false,
      qualityImprovement: false,
      requirementsCheck: false
    });

    expect(report?.success).toBe(false);
    expect(report?.modules[1]).toMatchObject({ moduleName: "app", status: "failed-verification", attempts: 2 });
    expect(oracle.generate).toHaveBeenCalledTimes(3);
    expect(readFileSync(join(root, "app.ts"), "utf8")).toBe(RELATIVE_APP_SOURCE);
    expect(mocks.logWarn).toHaveBeenCalledWith(
      "app: conformance check failed (line 1): Module does not import its declared dependencies correctly:"
    );
    expect(mocks.logWarn).toHaveBeenCalledWith("app: 1 generated, 0 reused, 1 failing verification.");
  });

  it("rejects a missing root blueprint before creating an oracle", async () => {
    const { runGenerateProject } = await import("../src/commands/generate-project.js");
    const root = projectTree();

    await expect(runGenerateProject([join(root, "nope.md")], {})).rejects.toBeInstanceOf(UserInputError);
    expect(mocks.createOracle).not.toHaveBeenCalled();
  });
});

describe("runGenerate", () => {
  it("generates a single module next to its blueprint", async () => {
    const { runGenerate } = await import("../src/commands/generate.js");
    const root = projectTree();
    writeTree(root, { "models/user.ts": USER_SOURCE });
    const oracle = useOracle(APP_SOURCE);

    const report = await runGenerate(join(root, "app.md"), {
      language: "ts",
      runtimeCheck: false,
      qualityImprovement: false,
      requirementsCheck: false
    });

    expect(report).toMatchObject({ moduleName: "app", status: "generated", attempts: 1 });
    expect(oracle.generate).toHaveBeenCalledTimes(1);
    expect(mocks.spinnerStop).toHaveBeenCalledWith(`Generated ${join(root, "app.ts")} (1 attempt(s)).`);
  });

  it("reviews a verified module by default and keeps it when the review is unusable", async () => {
    const { runGenerate } = await import("../src/commands/generate.js");
    const root = projectTree();
    writeTree(root, { "models/user.ts": USER_SOURCE });
    useOracle(APP_SOURCE);

    const report = await runGenerate(join(root, "app.md"), { runtimeCheck: false });

    expect(report).toMatchObject({ moduleName: "app", status: "generated", attempts: 1, improved: false });
    expect(readFileSync(join(root, "app.ts"), "utf8")).toBe(APP_SOURCE);
    expect(mocks.logWarn).toHaveBeenCalledWith("Quality review of app returned no usable JSON.");
  });

  it("stops the spinner and rethrows when the output already exists", async () => {
    const { runGenerate } = await import("../src/commands/generate.js");
    const root = projectTree();
    writeTree(root, { "app.ts": "export {};\n" });
    useOracle(APP_SOURCE);

    await expect(runGenerate(join(root, "app.md"), {})).rejects.toThrow("already exists. Use --force to overwrite it.");
    expect(mocks.spinnerStop).toHaveBeenCalledWith(`Generation of ${join(root, "app.md")} did not complete.`);
  });
});
