import { log } from "@clack/prompts";

import { formatReference } from "../core/blueprint/references.js";
import { normalizeOutputFormat, UserInputError } from "../core/errors.js";
import { formatCycle } from "../core/generation/pipeline.js";
import { resolveProject } from "../core/graph/resolver.js";
import type { ResolvedProject, ValidateCommandOptions } from "../core/types.js";

import { projectRootFor, requireBlueprintFile } from "./shared.js";

export interface ValidationSummary {
  root: string;
  generationOrder: string[];
  dependencies: number;
  unresolved: Array<{ from: string; target: string; reason: string }>;
  cycles: string[][];
  warnings: string[];
  valid: boolean;
}

export function summarizeProject(project: ResolvedProject, warnings: string[], strictCycles: boolean): ValidationSummary {
  const unresolved = project.unresolved.map((entry) => ({
    from: entry.fromModule,
    target: formatReference(entry.reference),
    reason: entry.reason
  }));
  return {
    root: project.root.moduleName,
    generationOrder: project.generationOrder.map((blueprint) => blueprint.moduleName),
    dependencies: project.dependencySet.size,
    unresolved,
    cycles: project.cycles,
    warnings,
    valid: unresolved.length === 0 && (!strictCycles || project.cycles.length === 0)
  };
}

/** Parses and resolves a blueprint graph without generating anything. */
export async function runValidate(pathArg: string, options: ValidateCommandOptions): Promise<ValidationSummary> {
  const format = normalizeOutputFormat(options.format);
  const path = requireBlueprintFile(pathArg);
  const warnings: string[] = [];
  const project = await resolveProject(path, {
    baseDir: projectRootFor(path, options.baseDir),
    onWarning: (message) => warnings.push(message)
  });
  const summary = summarizeProject(project, warnings, options.strictCycles ?? false);

  if (format === "json") {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    log.info(`Module: ${summary.root} (${summary.dependencies} dependencies)`);
    log.info(`Generation order: ${summary.generationOrder.join(" -> ")}`);
    if (options.verbose) {
      for (const warning of warnings) log.warn(warning);
    } else {
      for (const entry of summary.unresolved) {
        log.warn(`${entry.from}: unresolved ${entry.target} (${entry.reason})`);
      }
      for (const cycle of summary.cycles) {
        log.warn(`Cycle: ${formatCycle(cycle)}`);
      }
    }
  }

  if (!summary.valid) {
    const problems = [
      ...(summary.unresolved.length > 0 ? [`${summary.unresolved.length} unresolved reference(s)`] : []),
      ...(summary.cycles.length > 0 && options.strictCycles ? [`${summary.cycles.length} dependency cycle(s)`] : [])
    ];
    throw new UserInputError(`Blueprint graph of ${summary.root} is invalid: ${problems.join(", ")}.`, {
      details: { unresolved: summary.unresolved, cycles: summary.cycles }
    });
  }
  if (format === "text") log.success(`${summary.root} is valid.`);
  return summary;
}
