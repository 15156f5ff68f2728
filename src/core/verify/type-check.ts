import { existsSync } from "node:fs";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join, resolve } from "node:path";

import { runCommand } from "../ai/process-runner.js";
import type { VerificationContext, VerificationResult } from "../types.js";

/** Missing modules and missing ambient type packages say nothing about the module itself. */
const IGNORED_DIAGNOSTICS = new Set(["TS2307", "TS2792", "TS2580", "TS2591", "TS2688", "TS7016"]);
const DIAGNOSTIC = /^(.*)\((\d+),(\d+)\): error (TS\d+): (.*)$/;
const TYPE_CHECK_TIMEOUT_MS = 90_000;

export interface TypeDiagnostic {
  line: number;
  code: string;
  message: string;
}

export function findLocalTypeChecker(startDir: string): string | null {
  const binary = process.platform === "win32" ? "tsc.cmd" : "tsc";
  let current = resolve(startDir);
  for (;;) {
    const candidate = join(current, "node_modules", ".bin", binary);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export function parseTypeDiagnostics(output: string): TypeDiagnostic[] {
  const diagnostics: TypeDiagnostic[] = [];
  for (const line of output.split(/\r?\n/)) {
    const match = DIAGNOSTIC.exec(line.trim());
    if (!match?.[2] || !match[4]) continue;
    if (IGNORED_DIAGNOSTICS.has(match[4])) continue;
    diagnostics.push({ line: Number(match[2]), code: match[4], message: match[5] ?? "" });
  }
  return diagnostics;
}

/**
 * Runs the project's own `tsc` over the module in isolation. Without a local
 * compiler, or for JavaScript output, the stage passes with a warning.
 */
export async function checkTypes(source: string, context: VerificationContext): Promise<VerificationResult> {
  if (context.language !== "typescript") {
    return { stage: "type", success: true, message: "Type check skipped.", warnings: ["Type check skipped for JavaScript output."] };
  }
  const checker = findLocalTypeChecker(context.projectRoot);
  if (!checker) {
    return {
      stage: "type",
      success: true,
      message: "Type check skipped.",
      warnings: ["No local TypeScript compiler found under node_modules/.bin; type check skipped."]
    };
  }

  const workDir = await mkdtemp(join(tmpdir(), "blueprints-tsc-"));
  try {
    const file = join(workDir, "module.ts");
    await writeFile(file, source, "utf8");
    const result = await runCommand(
      checker,
      [
        "--noEmit",
        "--pretty",
        "false",
        "--skipLibCheck",
        "--target",
        "ES2022",
        "--module",
        "ESNext",
        "--moduleResolution",
        "Bundler",
        "--experimentalDecorators",
        file
      ],
      { cwd: workDir, timeoutMs: TYPE_CHECK_TIMEOUT_MS, signal: context.signal }
    );

    const diagnostics = parseTypeDiagnostics(`${result.stdout}\n${result.stderr}`);
    const first = diagnostics[0];
    if (first) {
      return {
        stage: "type",
        success: false,
        errorKind: "type",
        message: `Type errors:\n- ${diagnostics.map((entry) => `line ${entry.line}: ${entry.code} ${entry.message}`).join("\n- ")}`,
        line: first.line,
        warnings: []
      };
    }
    if (!result.ok && result.exitCode !== 1 && result.exitCode !== 2) {
      return {
        stage: "type",
        success: true,
        message: "Type check inconclusive.",
        warnings: [`Type checker did not finish: ${result.reason ?? "unknown error"}`]
      };
    }
    return { stage: "type", success: true, message: "No type errors.", warnings: [] };
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}
