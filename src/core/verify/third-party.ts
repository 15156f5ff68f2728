import { readFileSync } from "node:fs";

import { z } from "zod";

import { ConfigError } from "../errors.js";
import { packageFile } from "../package-root.js";
import type { VerificationResult } from "../types.js";

import type { SourceAnalysis } from "./source-analysis.js";

const symbolTableSchema = z.record(
  z.object({
    package: z.string().min(1),
    kind: z.enum(["named", "default", "namespace"])
  })
);

export type WellKnownSymbols = z.infer<typeof symbolTableSchema>;

let cachedTable: WellKnownSymbols | null = null;

export function loadWellKnownSymbols(): WellKnownSymbols {
  if (cachedTable) return cachedTable;
  const path = packageFile("data", "well-known-symbols.json");
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigError(`Could not read the well-known symbol table at ${path}.`, { cause: error });
  }
  const parsed = symbolTableSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid well-known symbol table at ${path}: ${parsed.error.message}`);
  }
  cachedTable = parsed.data;
  return cachedTable;
}

export function importLineFor(symbol: string, entry: WellKnownSymbols[string]): string {
  switch (entry.kind) {
    case "default":
      return `import ${symbol} from "${entry.package}";`;
    case "namespace":
      return `import * as ${symbol} from "${entry.package}";`;
    case "named":
      return `import { ${symbol} } from "${entry.package}";`;
  }
}

/** Well-known library symbols used with no binding in scope mean a forgotten import. */
export function checkThirdPartyImports(
  analysis: SourceAnalysis,
  table: WellKnownSymbols = loadWellKnownSymbols()
): VerificationResult {
  const offenders: string[] = [];
  let firstLine: number | undefined;

  for (const [symbol, line] of analysis.unboundReferences) {
    const entry = table[symbol];
    if (!entry) continue;
    offenders.push(`${symbol} (line ${line}) is never imported; add: ${importLineFor(symbol, entry)}`);
    firstLine ??= line;
  }

  if (offenders.length > 0) {
    return {
      stage: "third-party-imports",
      success: false,
      errorKind: "missing-third-party-import",
      message: `Missing third-party imports:\n- ${offenders.join("\n- ")}`,
      ...(firstLine !== undefined ? { line: firstLine } : {}),
      warnings: []
    };
  }
  return { stage: "third-party-imports", success: true, message: "No missing third-party imports.", warnings: [] };
}
