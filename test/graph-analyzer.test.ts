import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { GenerationOracle } from "../src/core/ai/contracts.js";
import { parseBlueprint } from "../src/core/blueprint/parser.js";
import { OracleError } from "../src/core/errors.js";
import {
  FileInsightCache,
  MemoryInsightCache,
  OracleDependencyAnalyzer,
  buildInsightPrompt,
  insightCacheKey
} from "../src/core/graph/analyzer.js";

const billing = parseBlueprint("# services.billing\n\nCharges customers and emails receipts.\n").blueprint;
const mailer = parseBlueprint("# services.mail\n").blueprint;

const INSIGHT = '{"dependencies":[{"module":"services.mail","reasoning":"emails receipts"}]}';

describe("OracleDependencyAnalyzer", () => {
  it("asks about modules with prose and turns replies into edges", async () => {
    const generate = vi.fn(async () => INSIGHT);
    const analyzer = new OracleDependencyAnalyzer({ generate }, new MemoryInsightCache(), { timeoutMs: 5_000 });

    const edges = await analyzer.inferEdges([billing, mailer]);

    expect(edges).toEqual([{ fromModule: "services.billing", toModule: "services.mail", reasoning: "emails receipts" }]);
    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate).toHaveBeenCalledWith(buildInsightPrompt(billing, ["services.billing", "services.mail"]), {
      signal: undefined,
      timeoutMs: 5_000
    });
  });

  it("reuses cached insights for unchanged blueprints", async () => {
    const generate = vi.fn(async () => INSIGHT);
    const cache = new MemoryInsightCache();
    const analyzer = new OracleDependencyAnalyzer({ generate }, cache);

    await analyzer.inferEdges([billing]);
    await analyzer.inferEdges([billing]);

    expect(generate).toHaveBeenCalledTimes(1);
    expect(cache.get(insightCacheKey(billing))?.dependencies[0]?.module).toBe("services.mail");
  });

  it("warns and skips a module when the oracle fails or replies without JSON", async () => {
    const oracle: GenerationOracle = {
      generate: vi
        .fn<(prompt: string) => Promise<string>>()
        .mockRejectedValueOnce(new OracleError("timed out"))
        .mockResolvedValueOnce("I could not decide.")
    };
    const other = parseBlueprint("# services.audit\n\nRecords billing events.\n").blueprint;
    const warnings: string[] = [];

    const edges = await new OracleDependencyAnalyzer(oracle, new MemoryInsightCache()).inferEdges([billing, other], {
      onWarning: (message) => warnings.push(message)
    });

    expect(edges).toEqual([]);
    expect(warnings).toEqual([
      "Dependency analysis skipped for services.billing: timed out",
      "Dependency analysis for services.audit returned no usable JSON."
    ]);
  });
});

describe("FileInsightCache", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "blueprints-insights-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("persists entries and reloads them", async () => {
    const path = join(dir, "cache", "insights.json");
    const first = new FileInsightCache(path);
    await first.load();
    first.set("key", { dependencies: [{ module: "core.db", reasoning: "stores rows" }] });
    await first.flush();

    const second = new FileInsightCache(path);
    await second.load();

    expect(second.get("key")).toEqual({ dependencies: [{ module: "core.db", reasoning: "stores rows" }] });
    expect(JSON.parse(await readFile(path, "utf8"))).toMatchObject({ version: 1 });
  });

  it("starts empty from a stale or corrupt file", async () => {
    const path = join(dir, "insights.json");
    await writeFile(path, JSON.stringify({ version: 0, entries: {} }), "utf8");

    const cache = new FileInsightCache(path);
    await cache.load();

    expect(cache.get("key")).toBeUndefined();
  });
});
