import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, expect, it } from "vitest";

import { parseBlueprint } from "../src/core/blueprint/parser.js";
import type { VerificationContext } from "../src/core/types.js";
import { checkRuntimeLoad } from "../src/core/verify/sandbox.js";
import { analyzeSource, parseSource } from "../src/core/verify/source-analysis.js";
import { verifySource } from "../src/core/verify/verifier.js";

function context(overrides: Partial<VerificationContext> = {}): VerificationContext {
  return {
    projectRoot: join(tmpdir(), "blueprints-runtime-load"),
    language: "typescript",
    knownModules: new Set(["app", "models.user"]),
    declaredPackages: new Set(["zod"]),
    references: [],
    dependencyBlueprints: new Map(),
    typeCheck: false,
    runtimeCheck: true,
    runtimeTimeoutMs: 5_000,
    ...overrides
  };
}

async function load(source: string, overrides: Partial<VerificationContext> = {}) {
  const parsed = parseSource(source, "typescript");
  if (!parsed.ok) throw new Error(parsed.message);
  return checkRuntimeLoad(source, analyzeSource(parsed.ast).imports, context(overrides));
}

describe("checkRuntimeLoad", () => {
  it("loads a module whose project and package imports are stubbed", async () => {
    const source = [
      'import { User } from "@/models/user";',
      'import { z } from "zod";',
      "",
      "export const admin = new User();",
      "export const schema = z.object({ id: z.string() });",
      "export function greet(name: string): string {",
      "  return `hi ${name}`;",
      "}"
    ].join("\n");

    expect(await load(source)).toEqual({
      stage: "runtime-load",
      success: true,
      message: "Module loads without errors.",
      warnings: []
    });
  });

  it("fails a module that throws while loading", async () => {
    const result = await load('throw new Error("boom");\nexport {};\n');

    expect(result.success).toBe(false);
    expect(result.errorKind).toBe("runtime-load");
    expect(result.message.startsWith("Module failed to load: Error: boom")).toBe(true);
  });

  it("fails a module that never finishes loading", async () => {
    const result = await load("await new Promise(() => {\n  setInterval(() => undefined, 1_000);\n});\nexport {};\n", {
      runtimeTimeoutMs: 1_000
    });

    expect(result).toEqual({
      stage: "runtime-load",
      success: false,
      errorKind: "runtime-load",
      message: "Module did not finish loading within 1s.",
      warnings: []
    });
  });
});

describe("verifySource with the runtime load", () => {
  it("runs the load as the last stage unless turned off", async () => {
    const source = 'throw new Error("boom");\nexport {};\n';
    const blueprint = parseBlueprint("# app\n").blueprint;

    const enabled = await verifySource(source, blueprint, context());
    expect(enabled.map((result) => [result.stage, result.success])).toEqual([
      ["syntax", true],
      ["imports", true],
      ["conformance", true],
      ["third-party-imports", true],
      ["async", true],
      ["runtime-load", false]
    ]);

    const disabled = await verifySource(source, blueprint, context({ runtimeCheck: false }));
    expect(disabled.map((result) => result.stage)).not.toContain("runtime-load");
    expect(disabled.every((result) => result.success)).toBe(true);
  });
});
