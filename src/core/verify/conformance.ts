import { expectedImportPath, formatImportStatement } from "../generation/imports.js";
import type { Blueprint, VerificationContext, VerificationResult } from "../types.js";

import { isPathSpecifier } from "./import-classes.js";
import type { SourceAnalysis } from "./source-analysis.js";

/**
 * Declared references must be imported from their exact `@/` path with the
 * exact symbols (aliases respected); relative and absolute path imports are
 * never allowed.
 */
export function checkConformance(
  analysis: SourceAnalysis,
  blueprint: Blueprint,
  context: VerificationContext
): VerificationResult {
  const problems: string[] = [];
  let firstLine: number | undefined;

  for (const record of analysis.imports) {
    if (!isPathSpecifier(record.source)) continue;
    const form = record.source.startsWith("/") ? "absolute" : "relative";
    problems.push(
      `line ${record.line}: ${form} import "${record.source}" is not allowed; import project modules through "@/..."`
    );
    firstLine ??= record.line;
  }

  for (const { reference, moduleName } of context.references) {
    if (moduleName === blueprint.moduleName) continue;
    const path = expectedImportPath(moduleName);
    const fromPath = analysis.imports.filter((record) => record.source === path);
    const expected = formatImportStatement(moduleName, reference.importedItems);

    if (reference.importedItems.length === 0) {
      if (fromPath.length === 0) problems.push(`missing import from "${path}"; expected: ${expected}`);
      continue;
    }

    const bindings = fromPath.flatMap((record) => record.bindings);
    for (const item of reference.importedItems) {
      const local = item.alias ?? item.name;
      const found = bindings.some(
        (binding) => binding.kind === "named" && binding.imported === item.name && binding.local === local
      );
      if (found) continue;
      const label = item.alias ? `${item.name} as ${item.alias}` : item.name;
      problems.push(`missing "${label}" from "${path}"; expected: ${expected}`);
    }
  }

  if (problems.length > 0) {
    return {
      stage: "conformance",
      success: false,
      errorKind: "dependency-conformance",
      message: `Module does not import its declared dependencies correctly:\n- ${problems.join("\n- ")}`,
      ...(firstLine !== undefined ? { line: firstLine } : {}),
      warnings: []
    };
  }
  return { stage: "conformance", success: true, message: "Declared dependencies are imported.", warnings: [] };
}
