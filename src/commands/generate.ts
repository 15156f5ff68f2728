import { log, spinner } from "@clack/prompts";

import { generateSingleModule, type ModuleReport } from "../core/generation/pipeline.js";
import type { GenerateCommandOptions } from "../core/types.js";

import { describeFailure, prepareGeneration, projectRootFor, requireBlueprintFile, withInterrupt } from "./shared.js";

/** Generates the module of one blueprint, using existing dependency artifacts as context. */
export async function runGenerate(pathArg: string, options: GenerateCommandOptions): Promise<ModuleReport> {
  const path = requireBlueprintFile(pathArg);
  const { settings } = prepareGeneration(projectRootFor(path, options.baseDir), options);

  const generationSpinner = spinner({ indicator: "dots" });
  generationSpinner.start(`Generating ${pathArg}...`);
  let outcome: Awaited<ReturnType<typeof generateSingleModule>>;
  try {
    outcome = await withInterrupt((signal) =>
      generateSingleModule(path, {
        ...settings,
        output: options.output,
        signal,
        onStatus: (message) => generationSpinner.message(message)
      })
    );
  } catch (error) {
    generationSpinner.stop(`Generation of ${pathArg} did not complete.`);
    throw error;
  }

  const { project, report } = outcome;
  const target = report.path ?? project.root.moduleName;
  if (report.status === "generated") {
    generationSpinner.stop(`Generated ${target} (${report.attempts} attempt(s)).`);
  } else {
    generationSpinner.stop(`Wrote ${target}, but verification still fails after ${report.attempts} attempt(s).`);
    log.warn(`${project.root.moduleName}: ${describeFailure(report.results)}`);
  }
  return report;
}
