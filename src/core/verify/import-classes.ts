import { existsSync } from "node:fs";
import { isBuiltin } from "node:module";
import { resolve } from "node:path";

import type { VerificationContext, VerificationResult } from "../types.js";

import type { ImportRecord, SourceAnalysis } from "./source-analysis.js";

export const PROJECT_ALIAS = "@/";

const LOCAL_EXTENSIONS = [".ts", ".tsx", ".mts", ".js", ".mjs", ".jsx", ".d.ts", ".md"];

export type ImportClass =
  | { kind: "builtin" }
  | { kind: "third-party"; packageName: string; declared: boolean }
  | { kind: "local"; resolved: boolean }
  | { kind: "relative"; resolved: boolean }
  | { kind: "unknown" };

export function packageNameOf(specifier: string): string {
  const segments = specifier.split("/");
  if (specifier.startsWith("@")) return segments.slice(0, 2).join("/");
  return segments[0] ?? specifier;
}

export function moduleNameFromAlias(specifier: string): string | null {
  if (!specifier.startsWith(PROJECT_ALIAS)) return null;
  const path = specifier
    .slice(PROJECT_ALIAS.length)
    .replace(/\.(?:[mc]?[jt]sx?)$/, "")
    .replace(/\/index$/, "");
  return path ? path.split("/").join(".") : null;
}

function existsWithExtensions(stem: string): boolean {
  const stripped = stem.replace(/\.(?:[mc]?[jt]sx?)$/, "");
  for (const extension of LOCAL_EXTENSIONS) {
    if (existsSync(`${stripped}${extension}`)) return true;
    if (existsSync(resolve(stripped, `index${extension}`))) return true;
  }
  return false;
}

/** Specifiers that address a file by path rather than through the `@/` alias or a package name. */
export function isPathSpecifier(specifier: string): boolean {
  return specifier.startsWith(".") || specifier.startsWith("/");
}

export function classifyImport(specifier: string, context: VerificationContext): ImportClass {
  if (specifier.startsWith("node:") || isBuiltin(specifier)) return { kind: "builtin" };

  if (specifier.startsWith(PROJECT_ALIAS)) {
    const moduleName = moduleNameFromAlias(specifier);
    const resolved =
      (moduleName !== null && context.knownModules.has(moduleName)) ||
      existsWithExtensions(resolve(context.projectRoot, specifier.slice(PROJECT_ALIAS.length)));
    return { kind: "local", resolved };
  }

  if (isPathSpecifier(specifier)) {
    const baseDir = context.sourceDir ?? context.projectRoot;
    return { kind: "relative", resolved: existsWithExtensions(resolve(baseDir, specifier)) };
  }

  if (/^(?:@[\w.-]+\/)?[\w.-]+(?:\/.*)?$/.test(specifier)) {
    const packageName = packageNameOf(specifier);
    const declared = context.declaredPackages?.has(packageName.toLowerCase()) ?? false;
    return { kind: "third-party", packageName, declared };
  }

  return { kind: "unknown" };
}

function describe(record: ImportRecord): string {
  return `"${record.source}" (line ${record.line})`;
}

/** Every import must be a builtin, a declared package, or a project module that exists. */
export function checkImports(analysis: SourceAnalysis, context: VerificationContext): VerificationResult {
  const problems: string[] = [];
  const warnings: string[] = [];
  let firstLine: number | undefined;

  for (const record of analysis.imports) {
    const classification = classifyImport(record.source, context);
    let problem: string | null = null;

    switch (classification.kind) {
      case "builtin":
        break;
      case "third-party":
        if (classification.declared || record.typeOnly) break;
        if (context.declaredPackages === null) {
          warnings.push(`Package "${classification.packageName}" is used but the project declares no dependencies.`);
          break;
        }
        problem = `${describe(record)} uses package "${classification.packageName}", which is not a declared dependency`;
        break;
      case "local":
        if (!classification.resolved) {
          problem = `${describe(record)} does not resolve to a project module or file`;
        }
        break;
      case "relative":
        // path imports of any form fail the conformance stage
        break;
      case "unknown":
        problem = `${describe(record)} is not a builtin, package or project import`;
        break;
    }

    if (problem) {
      problems.push(problem);
      firstLine ??= record.line;
    }
  }

  if (problems.length > 0) {
    return {
      stage: "imports",
      success: false,
      errorKind: "import-unresolved",
      message: `Unresolved imports:\n- ${problems.join("\n- ")}`,
      ...(firstLine !== undefined ? { line: firstLine } : {}),
      warnings
    };
  }
  return { stage: "imports", success: true, message: "All imports resolve.", warnings };
}
