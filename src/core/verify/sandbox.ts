import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { isBuiltin } from "node:module";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { build, type Plugin } from "esbuild";

import { runCommand } from "../ai/process-runner.js";
import type { VerificationContext, VerificationResult } from "../types.js";

import type { ImportRecord } from "./source-analysis.js";

const STUB_NAMESPACE = "blueprint-stub";
const DEFAULT_RUNTIME_TIMEOUT_MS = 10_000;
const HEAP_LIMIT_MB = 128;
const OUTPUT_LIMIT_BYTES = 64 * 1024;
const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

const STUB_BINDING = "__blueprintStub";
const STUB_PRELUDE = `const ${STUB_BINDING} = new Proxy(function () {}, {
  get(_target, property) {
    if (property === "then" || property === "__esModule") return undefined;
    if (property === Symbol.toPrimitive) return () => "";
    return ${STUB_BINDING};
  },
  apply() {
    return ${STUB_BINDING};
  },
  construct() {
    return ${STUB_BINDING};
  }
});
export default ${STUB_BINDING};
`;

const RUNNER = `import("./module.mjs").then(
  () => process.exit(0),
  (error) => {
    console.error(error && error.stack ? error.stack : String(error));
    process.exit(1);
  }
);
`;

/** Named exports each stubbed specifier must provide, taken from the module's own imports. */
export function stubExports(imports: readonly ImportRecord[]): Map<string, Set<string>> {
  const exportsBySource = new Map<string, Set<string>>();
  for (const record of imports) {
    const names = exportsBySource.get(record.source) ?? new Set<string>();
    for (const binding of record.bindings) {
      if (
        binding.kind === "named" &&
        binding.imported !== "default" &&
        binding.imported !== STUB_BINDING &&
        IDENTIFIER.test(binding.imported)
      ) {
        names.add(binding.imported);
      }
    }
    exportsBySource.set(record.source, names);
  }
  return exportsBySource;
}

export function renderStubModule(names: Iterable<string>): string {
  const lines = [STUB_PRELUDE];
  for (const name of names) lines.push(`export const ${name} = ${STUB_BINDING};`);
  return lines.join("\n");
}

function stubPlugin(exportsBySource: Map<string, Set<string>>): Plugin {
  return {
    name: "blueprint-stubs",
    setup(pluginBuild) {
      pluginBuild.onResolve({ filter: /.*/ }, (args) => {
        if (args.kind === "entry-point") return undefined;
        if (isBuiltin(args.path)) return { path: args.path, external: true };
        return { path: args.path, namespace: STUB_NAMESPACE };
      });
      pluginBuild.onLoad({ filter: /.*/, namespace: STUB_NAMESPACE }, (args) => ({
        contents: renderStubModule(exportsBySource.get(args.path) ?? []),
        loader: "js"
      }));
    }
  };
}

function failure(message: string): VerificationResult {
  return { stage: "runtime-load", success: false, errorKind: "runtime-load", message, warnings: [] };
}

/**
 * Bundles the module with every non-builtin import replaced by an inert stub
 * and imports it in a separate Node.js process with a capped heap, a scrubbed
 * environment, a temporary working directory and a timeout.
 */
export async function checkRuntimeLoad(
  source: string,
  imports: readonly ImportRecord[],
  context: VerificationContext
): Promise<VerificationResult> {
  let bundled: string;
  try {
    const output = await build({
      stdin: {
        contents: source,
        loader: context.language === "typescript" ? "ts" : "js",
        sourcefile: context.language === "typescript" ? "module.ts" : "module.js"
      },
      bundle: true,
      write: false,
      format: "esm",
      platform: "node",
      target: "node20",
      logLevel: "silent",
      plugins: [stubPlugin(stubExports(imports))]
    });
    bundled = output.outputFiles[0]?.text ?? "";
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return failure(`Module could not be bundled for loading: ${message}`);
  }

  const workDir = await mkdtemp(join(tmpdir(), "blueprints-load-"));
  try {
    await writeFile(join(workDir, "module.mjs"), bundled, "utf8");
    await writeFile(join(workDir, "runner.mjs"), RUNNER, "utf8");
    const timeoutMs = context.runtimeTimeoutMs ?? DEFAULT_RUNTIME_TIMEOUT_MS;
    const result = await runCommand(process.execPath, [`--max-old-space-size=${HEAP_LIMIT_MB}`, "runner.mjs"], {
      cwd: workDir,
      env: { PATH: process.env.PATH ?? "", NODE_ENV: "production" },
      timeoutMs,
      maxBufferBytes: OUTPUT_LIMIT_BYTES,
      signal: context.signal
    });

    if (result.ok) {
      return { stage: "runtime-load", success: true, message: "Module loads without errors.", warnings: [] };
    }
    if (result.timedOut) {
      return failure(`Module did not finish loading within ${timeoutMs / 1000}s.`);
    }
    const detail = result.stderr.trim() || result.reason || "unknown error";
    return failure(`Module failed to load: ${detail}`);
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}
