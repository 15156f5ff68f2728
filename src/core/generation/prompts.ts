import type { Blueprint, TargetLanguage, VerificationErrorKind, VerificationResult } from "../types.js";

import type { ContextFragment } from "./context.js";

export interface GenerationPromptInput {
  blueprint: Blueprint;
  fragments: readonly ContextFragment[];
  language: TargetLanguage;
  expectedImports: readonly string[];
  declaredPackages?: ReadonlySet<string> | null | undefined;
}

export interface FeedbackPromptInput extends GenerationPromptInput {
  previousSource: string;
  results: readonly VerificationResult[];
}

function languageLabel(language: TargetLanguage): string {
  return language === "typescript" ? "TypeScript" : "JavaScript (ES modules)";
}

function fenceTag(language: TargetLanguage): string {
  return language === "typescript" ? "ts" : "js";
}

function renderFragments(fragments: readonly ContextFragment[], language: TargetLanguage): string[] {
  const lines: string[] = [];
  for (const fragment of fragments) {
    switch (fragment.kind) {
      case "directive":
        lines.push(fragment.text, "");
        break;
      case "dependency-blueprint":
        lines.push(`Blueprint of dependency ${fragment.moduleName}:`, "```markdown", fragment.text.trim(), "```", "");
        break;
      case "dependency-artifact":
        lines.push(
          `Generated source of dependency ${fragment.moduleName} (import from it, do not redefine it):`,
          `\`\`\`${fenceTag(language)}`,
          fragment.text.trimEnd(),
          "```",
          ""
        );
        break;
    }
  }
  return lines;
}

function renderRules(input: GenerationPromptInput): string[] {
  const rules = [
    `- Write the complete ${languageLabel(input.language)} module for ${input.blueprint.moduleName}.`,
    "- Import project modules only through absolute \"@/...\" paths; never use relative imports.",
    "- Implement every component the blueprint declares with the same names and async-ness.",
    "- Import every third-party symbol you use."
  ];
  if (input.declaredPackages && input.declaredPackages.size > 0) {
    rules.push(`- Third-party packages available: ${[...input.declaredPackages].sort().join(", ")}.`);
  }
  rules.push(`- Reply with the module source only, in a single \`\`\`${fenceTag(input.language)} block.`);
  return rules;
}

function renderExpectedImports(expectedImports: readonly string[]): string[] {
  if (expectedImports.length === 0) return [];
  return ["Required import statements (use exactly these):", ...expectedImports.map((line) => `  ${line}`), ""];
}

export function buildGenerationPrompt(input: GenerationPromptInput): string {
  const lines = [
    `You are generating the ${languageLabel(input.language)} source of one module in a larger project.`,
    "",
    ...renderFragments(input.fragments, input.language),
    `Blueprint of ${input.blueprint.moduleName} (the module to write):`,
    "```markdown",
    input.blueprint.rawText.trim(),
    "```",
    "",
    ...renderExpectedImports(input.expectedImports),
    "Rules:",
    ...renderRules(input)
  ];
  return lines.join("\n");
}

/** Failing results grouped by error kind, in first-seen order. */
export function groupFailures(results: readonly VerificationResult[]): Map<VerificationErrorKind, VerificationResult[]> {
  const groups = new Map<VerificationErrorKind, VerificationResult[]>();
  for (const result of results) {
    if (result.success || !result.errorKind) continue;
    const group = groups.get(result.errorKind) ?? [];
    group.push(result);
    groups.set(result.errorKind, group);
  }
  return groups;
}

export function buildFeedbackPrompt(input: FeedbackPromptInput): string {
  const failureLines: string[] = [];
  for (const [kind, results] of groupFailures(input.results)) {
    failureLines.push(`[${kind}]`);
    for (const result of results) {
      const location = result.line !== undefined ? ` (line ${result.line})` : "";
      failureLines.push(`${result.message}${location}`);
    }
    failureLines.push("");
  }

  const lines = [
    `Your previous ${languageLabel(input.language)} source for ${input.blueprint.moduleName} failed verification.`,
    "Regenerate the whole module from scratch, fixing every problem below.",
    "",
    "Previous source:",
    `\`\`\`${fenceTag(input.language)}`,
    input.previousSource.trimEnd(),
    "```",
    "",
    "Problems:",
    ...failureLines,
    ...renderExpectedImports(input.expectedImports),
    ...renderFragments(input.fragments, input.language),
    `Blueprint of ${input.blueprint.moduleName}:`,
    "```markdown",
    input.blueprint.rawText.trim(),
    "```",
    "",
    "Rules:",
    ...renderRules(input)
  ];
  return lines.join("\n");
}
