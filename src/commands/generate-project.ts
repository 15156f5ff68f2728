import { log, spinner } from "@clack/prompts";

import { UserInputError } from "../core/errors.js";
import { type ProjectReport, runProjectPipeline } from "../core/generation/pipeline.js";
import type { GenerateProjectCommandOptions } from "../core/types.js";

import { describeFailure, prepareGeneration, projectRootFor, requireBlueprintFile, withInterrupt } from "./shared.js";

function reportProject(report: ProjectReport): void {
  const counts = { generated: 0, reused: 0, "failed-verification": 0 };
  for (const module of report.modules) {
    counts[module.status] += 1;
    if (module.status === "failed-verification") {
      log.warn(`${module.moduleName}: ${describeFailure(module.results)}`);
    }
  }
  const summary = `${report.project.root.moduleName}: ${counts.generated} generated, ${counts.reused} reused, ${counts["failed-verification"]} failing verification.`;
  if (report.success) {
    log.success(summary);
  } else {
    log.warn(summary);
  }
  if (report.makefile) {
    log.info(report.makefile.written ? `Wrote ${report.makefile.path}.` : `Kept existing ${report.makefile.path}.`);
  }
}

async function generateOne(
  path: string,
  options: GenerateProjectCommandOptions,
  signal: AbortSignal,
  single: boolean
): Promise<ProjectReport> {
  const { settings } = prepareGeneration(projectRootFor(path, options.baseDir), options);
  const projectSpinner = single ? spinner({ indicator: "dots" }) : null;
  projectSpinner?.start(`Resolving ${path}...`);
  const onStatus = (message: string): void => {
    if (projectSpinner) {
      projectSpinner.message(message);
    } else if (options.verbose) {
      log.info(message);
    }
  };

  try {
    const report = await runProjectPipeline(path, {
      ...settings,
      strictCycles: options.strictCycles ?? false,
      makefile: options.makefile ?? true,
      signal,
      onStatus
    });
    projectSpinner?.stop(`Finished ${report.project.root.moduleName}.`);
    return report;
  } catch (error) {
    projectSpinner?.stop(`Generation of ${path} did not complete.`);
    throw error;
  }
}

/**
 * Generates every project whose root blueprint is listed. Projects share no
 * state and run concurrently.
 */
export async function runGenerateProject(
  pathArgs: string[],
  options: GenerateProjectCommandOptions
): Promise<ProjectReport[]> {
  if (pathArgs.length === 0) {
    throw new UserInputError("generate-project needs at least one root blueprint.");
  }
  const paths = pathArgs.map(requireBlueprintFile);
  const reports = await withInterrupt((signal) =>
    Promise.all(paths.map((path) => generateOne(path, options, signal, paths.length === 1)))
  );
  for (const report of reports) reportProject(report);
  return reports;
}
