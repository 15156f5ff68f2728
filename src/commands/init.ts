import { relative, resolve } from "node:path";

import { log } from "@clack/prompts";

import { isValidModuleName } from "../core/blueprint/parser.js";
import { UserInputError } from "../core/errors.js";
import { createInitFiles, ENTRY_BLUEPRINT_FILE } from "../core/templates.js";
import { toKebabCase } from "../core/text.js";
import type { InitCommandOptions } from "../core/types.js";
import { writeFiles } from "../core/write.js";

export interface InitResult {
  targetDir: string;
  files: string[];
}

/** Creates `<name>/` with a project descriptor and two starter blueprints. */
export async function runInit(name: string, options: InitCommandOptions): Promise<InitResult> {
  const projectName = toKebabCase(name);
  if (!projectName || !isValidModuleName(projectName)) {
    throw new UserInputError(`Invalid project name "${name}". Use letters, digits and dashes, starting with a letter.`);
  }

  const targetDir = resolve(process.cwd(), options.output ?? ".", projectName);
  const files = await writeFiles(targetDir, createInitFiles(projectName), { force: options.force ?? false });

  for (const file of files) log.info(`Created ${relative(process.cwd(), file)}`);
  log.success(
    `Project ${projectName} is ready. Next: blueprints generate-project ${relative(process.cwd(), resolve(targetDir, ENTRY_BLUEPRINT_FILE))}`
  );
  return { targetDir, files };
}
