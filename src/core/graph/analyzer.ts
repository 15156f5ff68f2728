import { createHash } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { z } from "zod";

import { parseDependencyInsight, type DependencyInsight } from "../ai-parsing.js";
import type { GenerationOracle } from "../ai/contracts.js";
import { ConfigError, OracleError } from "../errors.js";
import type { Blueprint, InferredEdge } from "../types.js";

export interface AnalyzeOptions {
  signal?: AbortSignal | undefined;
  onWarning?: ((message: string) => void) | undefined;
}

/**
 * Infers dependencies that a blueprint's prose implies but its declared
 * references omit. Returned edges may name unknown modules; callers filter.
 */
export interface DependencyAnalyzer {
  inferEdges(blueprints: readonly Blueprint[], options?: AnalyzeOptions): Promise<InferredEdge[]>;
}

export interface InsightCache {
  load(): Promise<void>;
  get(key: string): DependencyInsight | undefined;
  set(key: string, insight: DependencyInsight): void;
  flush(): Promise<void>;
}

export const DEFAULT_INSIGHT_CACHE_PATH = ".blueprints/cache/insights.json";

const cacheFileSchema = z.object({
  version: z.literal(1),
  entries: z.record(
    z.object({
      dependencies: z.array(z.object({ module: z.string(), reasoning: z.string() }))
    })
  )
});

export function insightCacheKey(blueprint: Blueprint): string {
  return createHash("sha256").update(blueprint.rawText).digest("hex");
}

export class MemoryInsightCache implements InsightCache {
  protected entries = new Map<string, DependencyInsight>();

  async load(): Promise<void> {}

  get(key: string): DependencyInsight | undefined {
    return this.entries.get(key);
  }

  set(key: string, insight: DependencyInsight): void {
    this.entries.set(key, insight);
  }

  async flush(): Promise<void> {}
}

/** JSON file cache; an unreadable or stale file starts the cache empty. */
export class FileInsightCache extends MemoryInsightCache {
  private dirty = false;

  constructor(private readonly path: string) {
    super();
  }

  override async load(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch {
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return;
    }
    const parsed = cacheFileSchema.safeParse(json);
    if (!parsed.success) return;
    this.entries = new Map(Object.entries(parsed.data.entries));
  }

  override set(key: string, insight: DependencyInsight): void {
    super.set(key, insight);
    this.dirty = true;
  }

  override async flush(): Promise<void> {
    if (!this.dirty) return;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(
        this.path,
        `${JSON.stringify({ version: 1, entries: Object.fromEntries(this.entries) }, null, 2)}\n`,
        "utf8"
      );
    } catch (error) {
      throw new ConfigError(`Could not write insight cache ${this.path}.`, { cause: error });
    }
    this.dirty = false;
  }
}

function hasProse(blueprint: Blueprint): boolean {
  return (
    blueprint.description.length > 0 ||
    blueprint.notes.length > 0 ||
    blueprint.requirements.length > 0 ||
    Object.keys(blueprint.sections).length > 0
  );
}

export function buildInsightPrompt(blueprint: Blueprint, knownModules: readonly string[]): string {
  return [
    "You analyze module specifications for undeclared dependencies.",
    `Known modules: ${knownModules.join(", ")}`,
    "",
    `Specification of module ${blueprint.moduleName}:`,
    blueprint.rawText.trim(),
    "",
    "List only known modules this module must import but does not declare.",
    'Reply with JSON only: {"dependencies":[{"module":"<known module>","reasoning":"<one sentence>"}]}'
  ].join("\n");
}

export interface OracleDependencyAnalyzerOptions {
  timeoutMs?: number | undefined;
}

export class OracleDependencyAnalyzer implements DependencyAnalyzer {
  constructor(
    private readonly oracle: GenerationOracle,
    private readonly cache: InsightCache,
    private readonly options: OracleDependencyAnalyzerOptions = {}
  ) {}

  async inferEdges(blueprints: readonly Blueprint[], options: AnalyzeOptions = {}): Promise<InferredEdge[]> {
    await this.cache.load();
    const knownModules = blueprints.map((blueprint) => blueprint.moduleName);
    const edges: InferredEdge[] = [];

    try {
      for (const blueprint of blueprints) {
        if (!hasProse(blueprint)) continue;
        const insight = await this.insightFor(blueprint, knownModules, options);
        if (!insight) continue;
        for (const dependency of insight.dependencies) {
          edges.push({
            fromModule: blueprint.moduleName,
            toModule: dependency.module,
            reasoning: dependency.reasoning
          });
        }
      }
    } finally {
      await this.cache.flush();
    }

    return edges;
  }

  private async insightFor(
    blueprint: Blueprint,
    knownModules: readonly string[],
    options: AnalyzeOptions
  ): Promise<DependencyInsight | null> {
    const key = insightCacheKey(blueprint);
    const cached = this.cache.get(key);
    if (cached) return cached;

    let reply: string;
    try {
      reply = await this.oracle.generate(buildInsightPrompt(blueprint, knownModules), {
        signal: options.signal,
        timeoutMs: this.options.timeoutMs
      });
    } catch (error) {
      if (!(error instanceof OracleError)) throw error;
      options.onWarning?.(`Dependency analysis skipped for ${blueprint.moduleName}: ${error.message}`);
      return null;
    }

    const insight = parseDependencyInsight(reply);
    if (!insight) {
      options.onWarning?.(`Dependency analysis for ${blueprint.moduleName} returned no usable JSON.`);
      return null;
    }
    this.cache.set(key, insight);
    return insight;
  }
}
