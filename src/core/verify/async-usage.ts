import { expectedImportPath } from "../generation/imports.js";
import type { Blueprint, VerificationContext, VerificationResult } from "../types.js";

import type { DeclaredCallable, SourceAnalysis } from "./source-analysis.js";

interface ExpectedCallable {
  label: string;
  name: string;
  className?: string;
  isAsync: boolean;
}

function expectedCallables(blueprint: Blueprint): ExpectedCallable[] {
  const expected: ExpectedCallable[] = [];
  for (const component of blueprint.components) {
    if (component.kind === "function") {
      expected.push({ label: component.name, name: component.name, isAsync: component.isAsync });
    } else if (component.kind === "class") {
      for (const method of component.methods) {
        expected.push({
          label: `${component.name}.${method.name}`,
          name: method.name,
          className: component.name,
          isAsync: method.isAsync
        });
      }
    }
  }
  return expected;
}

function findCallable(callables: DeclaredCallable[], expected: ExpectedCallable): DeclaredCallable | undefined {
  return callables.find((callable) => callable.name === expected.name && callable.className === expected.className);
}

/** Local names bound to synchronous top-level functions of dependency blueprints. */
function knownSyncImports(analysis: SourceAnalysis, context: VerificationContext): Map<string, string> {
  const syncNames = new Map<string, string>();
  for (const [moduleName, dependency] of context.dependencyBlueprints) {
    const path = expectedImportPath(moduleName);
    const syncFunctions = new Set(
      dependency.components
        .filter((component) => component.kind === "function" && !component.isAsync)
        .map((component) => component.name)
    );
    if (syncFunctions.size === 0) continue;
    for (const record of analysis.imports) {
      if (record.source !== path) continue;
      for (const binding of record.bindings) {
        if (binding.kind === "named" && syncFunctions.has(binding.imported)) {
          syncNames.set(binding.local, `${moduleName}.${binding.imported}`);
        }
      }
    }
  }
  return syncNames;
}

/**
 * Declared async flags must match the generated functions and methods.
 * Awaiting a dependency's synchronous function is only reported as a warning.
 */
export function checkAsyncUsage(
  analysis: SourceAnalysis,
  blueprint: Blueprint,
  context: VerificationContext
): VerificationResult {
  const problems: string[] = [];
  const warnings: string[] = [];
  let firstLine: number | undefined;

  for (const expected of expectedCallables(blueprint)) {
    const actual = findCallable(analysis.callables, expected);
    if (!actual) {
      warnings.push(`${expected.label} is declared in the blueprint but not defined in the module.`);
      continue;
    }
    if (actual.isAsync === expected.isAsync) continue;
    problems.push(
      expected.isAsync
        ? `${expected.label} (line ${actual.line}) must be async`
        : `${expected.label} (line ${actual.line}) must not be async`
    );
    firstLine ??= actual.line;
  }

  const syncImports = knownSyncImports(analysis, context);
  for (const call of analysis.awaitedCalls) {
    const qualified = syncImports.get(call.callee);
    if (qualified) {
      warnings.push(`line ${call.line}: awaiting ${call.callee}, but ${qualified} is synchronous.`);
    }
  }

  if (problems.length > 0) {
    return {
      stage: "async",
      success: false,
      errorKind: "async-misuse",
      message: `Async declarations do not match the blueprint:\n- ${problems.join("\n- ")}`,
      ...(firstLine !== undefined ? { line: firstLine } : {}),
      warnings
    };
  }
  return { stage: "async", success: true, message: "Async declarations match the blueprint.", warnings };
}
