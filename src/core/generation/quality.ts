import { parseQualityReview, type QualityReview } from "../ai-parsing.js";
import type { GenerationOracle, StatusCallback } from "../ai/contracts.js";
import { DEFAULT_QUALITY_ITERATIONS, MAX_QUALITY_ITERATIONS } from "../config.js";
import { GenerationCancelledError, OracleError } from "../errors.js";
import type { Blueprint, TargetLanguage, VerificationResult } from "../types.js";
import type { Verifier } from "../verify/verifier.js";

/** A review at or above these marks with no critical issue ends the loop. */
export const QUALITY_TARGET_SCORE = 0.8;
export const QUALITY_TARGET_ALIGNMENT = 0.85;

export interface QualityIteration {
  iteration: number;
  before: QualityReview;
  after?: QualityReview;
  accepted: boolean;
  reason: string;
}

export interface QualityOutcome {
  source: string;
  results: VerificationResult[];
  iterations: QualityIteration[];
  improved: boolean;
}

export interface ImproveOptions {
  blueprint: Blueprint;
  language: TargetLanguage;
  verifier: Verifier;
  /** Results of `source` under `verifier`; returned unchanged when nothing is accepted. */
  results: VerificationResult[];
  signal?: AbortSignal | undefined;
  onStatus?: StatusCallback | undefined;
  onWarning?: ((message: string) => void) | undefined;
}

/** Review, improve and re-review passes over a module that already verifies. */
export interface QualityImprover {
  improve(source: string, options: ImproveOptions): Promise<QualityOutcome>;
}

function fenceTag(language: TargetLanguage): string {
  return language === "typescript" ? "ts" : "js";
}

export function meetsQualityTarget(review: QualityReview): boolean {
  return (
    review.criticalIssues.length === 0 &&
    review.overallScore >= QUALITY_TARGET_SCORE &&
    review.blueprintAlignment >= QUALITY_TARGET_ALIGNMENT
  );
}

export function buildReviewPrompt(source: string, blueprint: Blueprint, language: TargetLanguage): string {
  return [
    "You review generated modules for correctness, readability, error handling and security.",
    "",
    `Specification of module ${blueprint.moduleName}:`,
    "```markdown",
    blueprint.rawText.trim(),
    "```",
    "",
    "Source:",
    `\`\`\`${fenceTag(language)}`,
    source.trimEnd(),
    "```",
    "",
    "Scores run from 0 to 1. blueprintAlignment rates how fully the source implements the specification.",
    "Reply with JSON only:",
    '{"overallScore":0.0,"blueprintAlignment":0.0,"criticalIssues":["..."],"improvements":["..."],"strengths":["..."]}'
  ].join("\n");
}

export function buildImprovePrompt(
  source: string,
  blueprint: Blueprint,
  language: TargetLanguage,
  review: QualityReview
): string {
  const bullets = (items: readonly string[]): string[] => items.slice(0, 3).map((item) => `- ${item}`);
  return [
    `Improve the ${language === "typescript" ? "TypeScript" : "JavaScript"} module ${blueprint.moduleName}.`,
    "Keep its exports, names, signatures and import statements; keep everything that already works.",
    "",
    `Review: overall ${review.overallScore.toFixed(2)}, blueprint alignment ${review.blueprintAlignment.toFixed(2)}.`,
    ...(review.criticalIssues.length > 0 ? ["Critical issues:", ...bullets(review.criticalIssues)] : []),
    ...(review.improvements.length > 0 ? ["Improvements:", ...bullets(review.improvements)] : []),
    "",
    "Source:",
    `\`\`\`${fenceTag(language)}`,
    source.trimEnd(),
    "```",
    "",
    `Blueprint of ${blueprint.moduleName}:`,
    "```markdown",
    blueprint.rawText.trim(),
    "```",
    "",
    `Reply with the improved module source only, in a single \`\`\`${fenceTag(language)} block.`
  ].join("\n");
}

export interface OracleQualityImproverOptions {
  maxIterations?: number | undefined;
  timeoutMs?: number | undefined;
}

/**
 * Each iteration reviews the current source, asks for an improved version,
 * verifies it and reviews it again. An improved version replaces the current
 * one only when it passes every stage and its review scores no lower. Oracle
 * failures and unusable reviews end the loop with a warning.
 */
export class OracleQualityImprover implements QualityImprover {
  private readonly maxIterations: number;

  constructor(
    private readonly oracle: GenerationOracle,
    private readonly options: OracleQualityImproverOptions = {}
  ) {
    this.maxIterations = Math.min(
      MAX_QUALITY_ITERATIONS,
      Math.max(0, options.maxIterations ?? DEFAULT_QUALITY_ITERATIONS)
    );
  }

  async improve(source: string, options: ImproveOptions): Promise<QualityOutcome> {
    const moduleName = options.blueprint.moduleName;
    const iterations: QualityIteration[] = [];
    let current = source;
    let currentResults = options.results;
    let review: QualityReview | null = null;

    for (let iteration = 1; iteration <= this.maxIterations; iteration += 1) {
      this.assertNotCancelled(options.signal, moduleName);
      review ??= await this.review(current, options);
      if (!review || meetsQualityTarget(review)) break;

      options.onStatus?.(`${moduleName}: quality pass ${iteration}/${this.maxIterations}`);
      const candidate = await this.ask(buildImprovePrompt(current, options.blueprint, options.language, review), options);
      if (candidate === null) break;

      this.assertNotCancelled(options.signal, moduleName);
      const results = await options.verifier.verify(candidate, options.blueprint);
      const failed = results.find((result) => !result.success);
      if (failed) {
        iterations.push({ iteration, before: review, accepted: false, reason: `${failed.stage} check failed` });
        options.onWarning?.(`Quality pass ${iteration} for ${moduleName} discarded: ${failed.stage} check failed.`);
        break;
      }

      const after = await this.review(candidate, options);
      if (!after) break;
      if (after.overallScore < review.overallScore) {
        iterations.push({ iteration, before: review, after, accepted: false, reason: "review scored lower" });
        break;
      }

      iterations.push({ iteration, before: review, after, accepted: true, reason: "accepted" });
      current = candidate;
      currentResults = results;
      review = after;
    }

    return {
      source: current,
      results: currentResults,
      iterations,
      improved: iterations.some((entry) => entry.accepted)
    };
  }

  private assertNotCancelled(signal: AbortSignal | undefined, moduleName: string): void {
    if (signal?.aborted) {
      throw new GenerationCancelledError(`Quality improvement of ${moduleName} was cancelled.`);
    }
  }

  private async review(source: string, options: ImproveOptions): Promise<QualityReview | null> {
    const reply = await this.ask(buildReviewPrompt(source, options.blueprint, options.language), options);
    if (reply === null) return null;
    const review = parseQualityReview(reply);
    if (!review) {
      options.onWarning?.(`Quality review of ${options.blueprint.moduleName} returned no usable JSON.`);
    }
    return review;
  }

  private async ask(prompt: string, options: ImproveOptions): Promise<string | null> {
    try {
      return await this.oracle.generate(prompt, { signal: options.signal, timeoutMs: this.options.timeoutMs });
    } catch (error) {
      if (!(error instanceof OracleError)) throw error;
      options.onWarning?.(`Quality improvement skipped for ${options.blueprint.moduleName}: ${error.message}`);
      return null;
    }
  }
}
