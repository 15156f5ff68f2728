import { existsSync, statSync } from "node:fs";
import { relative, resolve } from "node:path";

import { log } from "@clack/prompts";

import { type BlueprintDiscovery, discoverBlueprints } from "../core/blueprint/loader.js";
import { normalizeOutputFormat, UserInputError } from "../core/errors.js";
import type { DiscoverCommandOptions } from "../core/types.js";

/** Lists every blueprint under a directory with its module name. */
export async function runDiscover(pathArg: string | undefined, options: DiscoverCommandOptions): Promise<BlueprintDiscovery> {
  const format = normalizeOutputFormat(options.format);
  const root = resolve(process.cwd(), pathArg ?? ".");
  if (!existsSync(root) || !statSync(root).isDirectory()) {
    throw new UserInputError(`Target path is not a directory: ${root}`);
  }

  const discovery = await discoverBlueprints(root);
  if (format === "json") {
    console.log(JSON.stringify(discovery, null, 2));
    return discovery;
  }

  if (discovery.blueprints.length === 0) {
    log.warn(`No blueprints found under ${root}.`);
  }
  for (const entry of discovery.blueprints) {
    log.info(
      `${entry.moduleName}  ${relative(root, entry.path)}  (${entry.referenceCount} references, ${entry.componentCount} components)`
    );
    for (const warning of entry.warnings) log.warn(`${entry.moduleName}: ${warning}`);
  }
  for (const entry of [...discovery.skipped, ...discovery.duplicates]) {
    log.warn(`Skipped ${relative(root, entry.path)}: ${entry.reason}`);
  }
  log.success(`Found ${discovery.blueprints.length} blueprint(s).`);
  return discovery;
}
