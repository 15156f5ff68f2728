import type { Blueprint, VerificationContext, VerificationResult } from "../types.js";

import { checkAsyncUsage } from "./async-usage.js";
import { checkConformance } from "./conformance.js";
import { checkImports } from "./import-classes.js";
import { checkRuntimeLoad } from "./sandbox.js";
import { analyzeSource, parseSource } from "./source-analysis.js";
import { checkThirdPartyImports } from "./third-party.js";
import { checkTypes } from "./type-check.js";

export interface Verifier {
  verify(source: string, blueprint: Blueprint): Promise<VerificationResult[]>;
}

/**
 * Runs the stages in their fixed order and stops at the first failure:
 * syntax, imports, conformance, third-party imports, async, the optional type
 * check, the runtime load unless the context turns it off, then the oracle's
 * requirements check when the context carries a checker.
 */
export async function verifySource(
  source: string,
  blueprint: Blueprint,
  context: VerificationContext
): Promise<VerificationResult[]> {
  const results: VerificationResult[] = [];

  const parsed = parseSource(source, context.language);
  if (!parsed.ok) {
    results.push({
      stage: "syntax",
      success: false,
      errorKind: "syntax",
      message: `Syntax error: ${parsed.message}`,
      ...(parsed.line !== undefined ? { line: parsed.line } : {}),
      warnings: []
    });
    return results;
  }
  results.push({ stage: "syntax", success: true, message: "Source parses.", warnings: [] });

  const analysis = analyzeSource(parsed.ast);
  const stages: Array<() => VerificationResult | Promise<VerificationResult>> = [
    () => checkImports(analysis, context),
    () => checkConformance(analysis, blueprint, context),
    () => checkThirdPartyImports(analysis),
    () => checkAsyncUsage(analysis, blueprint, context)
  ];
  if (context.typeCheck) stages.push(() => checkTypes(source, context));
  if (context.runtimeCheck) stages.push(() => checkRuntimeLoad(source, analysis.imports, context));
  const checker = context.requirementsChecker;
  if (checker) {
    stages.push(() => checker.check(source, blueprint, { language: context.language, signal: context.signal }));
  }

  for (const stage of stages) {
    const result = await stage();
    results.push(result);
    if (!result.success) break;
  }
  return results;
}

export function createVerifier(context: VerificationContext): Verifier {
  return {
    verify: (source, blueprint) => verifySource(source, blueprint, context)
  };
}

export function firstFailure(results: readonly VerificationResult[]): VerificationResult | undefined {
  return results.find((result) => !result.success);
}
