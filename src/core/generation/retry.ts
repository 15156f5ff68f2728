import type { GenerationOracle, StatusCallback } from "../ai/contracts.js";
import { GenerationCancelledError, OracleError } from "../errors.js";
import type { Blueprint, TargetLanguage, VerificationResult } from "../types.js";
import type { Verifier } from "../verify/verifier.js";

import type { ContextFragment } from "./context.js";
import { buildFeedbackPrompt, buildGenerationPrompt } from "./prompts.js";

export const DEFAULT_MAX_RETRIES = 2;

export interface RetryControllerOptions {
  blueprint: Blueprint;
  fragments: readonly ContextFragment[];
  language: TargetLanguage;
  oracle: GenerationOracle;
  verifier: Verifier;
  expectedImports: readonly string[];
  declaredPackages?: ReadonlySet<string> | null | undefined;
  maxRetries?: number | undefined;
  oracleTimeoutMs?: number | undefined;
  signal?: AbortSignal | undefined;
  onStatus?: StatusCallback | undefined;
}

export interface GenerationOutcome {
  source: string;
  results: VerificationResult[];
  attempts: number;
  success: boolean;
}

function assertNotCancelled(signal: AbortSignal | undefined, moduleName: string): void {
  if (signal?.aborted) {
    throw new GenerationCancelledError(`Generation of ${moduleName} was cancelled.`);
  }
}

/**
 * generate -> verify -> regenerate with feedback, at most `maxRetries` extra
 * attempts. Always returns the last produced source with its results; throws
 * the oracle's error only when no attempt produced any source.
 */
export async function generateWithRetry(options: RetryControllerOptions): Promise<GenerationOutcome> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const totalAttempts = Math.max(0, maxRetries) + 1;
  const moduleName = options.blueprint.moduleName;
  const promptInput = {
    blueprint: options.blueprint,
    fragments: options.fragments,
    language: options.language,
    expectedImports: options.expectedImports,
    declaredPackages: options.declaredPackages
  };

  let lastSource: string | null = null;
  let lastResults: VerificationResult[] = [];
  let lastOracleError: OracleError | null = null;
  let attempts = 0;

  while (attempts < totalAttempts) {
    assertNotCancelled(options.signal, moduleName);
    attempts += 1;
    const prompt =
      lastSource === null
        ? buildGenerationPrompt(promptInput)
        : buildFeedbackPrompt({ ...promptInput, previousSource: lastSource, results: lastResults });
    options.onStatus?.(`${moduleName}: attempt ${attempts}/${totalAttempts}`);

    let source: string;
    try {
      source = await options.oracle.generate(prompt, {
        signal: options.signal,
        timeoutMs: options.oracleTimeoutMs
      });
    } catch (error) {
      if (!(error instanceof OracleError)) throw error;
      lastOracleError = error;
      options.onStatus?.(`${moduleName}: oracle failed on attempt ${attempts}: ${error.message}`);
      continue;
    }

    assertNotCancelled(options.signal, moduleName);
    const results = await options.verifier.verify(source, options.blueprint);
    lastSource = source;
    lastResults = results;

    const failed = results.find((result) => !result.success);
    if (!failed) {
      return { source, results, attempts, success: true };
    }
    options.onStatus?.(`${moduleName}: ${failed.stage} check failed: ${failed.message.split("\n")[0] ?? ""}`);
  }

  if (lastSource === null) {
    throw lastOracleError ?? new OracleError(`No source was generated for ${moduleName}.`);
  }
  return { source: lastSource, results: lastResults, attempts, success: false };
}
