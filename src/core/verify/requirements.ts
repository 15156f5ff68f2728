import { parseRequirementsVerdict } from "../ai-parsing.js";
import type { GenerationOracle } from "../ai/contracts.js";
import { OracleError } from "../errors.js";
import type { Blueprint, TargetLanguage, VerificationResult } from "../types.js";

export interface RequirementsCheckOptions {
  language: TargetLanguage;
  signal?: AbortSignal | undefined;
}

/** Judges whether a module's source does what its blueprint asks for. */
export interface RequirementsChecker {
  check(source: string, blueprint: Blueprint, options: RequirementsCheckOptions): Promise<VerificationResult>;
}

/** Blueprints with nothing but signatures leave nothing for the oracle to judge. */
export function hasCheckableRequirements(blueprint: Blueprint): boolean {
  return blueprint.requirements.length > 0 || blueprint.description.trim().length > 0;
}

export function buildRequirementsPrompt(source: string, blueprint: Blueprint, language: TargetLanguage): string {
  return [
    "You check generated modules against their specifications.",
    "",
    `Specification of module ${blueprint.moduleName}:`,
    "```markdown",
    blueprint.rawText.trim(),
    "```",
    "",
    "Source:",
    `\`\`\`${language === "typescript" ? "ts" : "js"}`,
    source.trimEnd(),
    "```",
    "",
    "List only requirements the source clearly does not implement; style is out of scope.",
    'Reply with JSON only: {"satisfied":true|false,"missing":["<requirement not implemented>"]}'
  ].join("\n");
}

function passed(message: string, warnings: string[] = []): VerificationResult {
  return { stage: "requirements", success: true, message, warnings };
}

export interface OracleRequirementsCheckerOptions {
  timeoutMs?: number | undefined;
}

/**
 * A failing verdict feeds the retry loop like any other stage. An oracle that
 * fails or answers without usable JSON passes the module with a warning.
 */
export class OracleRequirementsChecker implements RequirementsChecker {
  constructor(
    private readonly oracle: GenerationOracle,
    private readonly options: OracleRequirementsCheckerOptions = {}
  ) {}

  async check(source: string, blueprint: Blueprint, options: RequirementsCheckOptions): Promise<VerificationResult> {
    if (!hasCheckableRequirements(blueprint)) return passed("No requirements to check.");

    let reply: string;
    try {
      reply = await this.oracle.generate(buildRequirementsPrompt(source, blueprint, options.language), {
        signal: options.signal,
        timeoutMs: this.options.timeoutMs
      });
    } catch (error) {
      if (!(error instanceof OracleError)) throw error;
      return passed("Requirements check skipped.", [`Requirements check skipped: ${error.message}`]);
    }

    const verdict = parseRequirementsVerdict(reply);
    if (!verdict) {
      return passed("Requirements check skipped.", ["Requirements check returned no usable JSON."]);
    }
    if (verdict.satisfied) {
      return passed(
        "Blueprint requirements are implemented.",
        verdict.missing.map((item) => `Requirements check noted: ${item}`)
      );
    }
    const missing = verdict.missing.length > 0 ? verdict.missing : ["(the reviewer named no specific requirement)"];
    return {
      stage: "requirements",
      success: false,
      errorKind: "requirements-unmet",
      message: ["Blueprint requirements not fully implemented:", ...missing.map((item) => `- ${item}`)].join("\n"),
      warnings: []
    };
  }
}
