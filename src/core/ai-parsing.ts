import { z } from "zod";

export const dependencyInsightSchema = z.object({
  dependencies: z
    .array(
      z.object({
        module: z.string().min(1).max(200),
        reasoning: z.string().max(400).default("")
      })
    )
    .max(50)
});

export type DependencyInsight = z.infer<typeof dependencyInsightSchema>;

const score = z.number().min(0).max(1);
const findings = z.array(z.string().min(1).max(400)).max(20).default([]);

export const qualityReviewSchema = z.object({
  overallScore: score,
  blueprintAlignment: score,
  criticalIssues: findings,
  improvements: findings,
  strengths: findings
});

export type QualityReview = z.infer<typeof qualityReviewSchema>;

export const requirementsVerdictSchema = z.object({
  satisfied: z.boolean(),
  missing: findings
});

export type RequirementsVerdict = z.infer<typeof requirementsVerdictSchema>;

const SOURCE_FENCE = /```([\w+-]*)[^\S\n]*\n([\s\S]*?)```/g;
const SOURCE_LANGUAGE_TAGS = new Set(["", "ts", "typescript", "tsx", "js", "javascript", "mjs", "jsx"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

const JSON_FENCE = /```(?:json)?\s*([\s\S]*?)```/gi;
const CLOSER = { "{": "}", "[": "]" } as const;

function fencedCandidates(raw: string): string[] {
  return [...raw.matchAll(JSON_FENCE)].flatMap((match) => (match[1] ? [match[1].trim()] : []));
}

/** Top-level `{...}` spans first, then `[...]` spans; string literals are skipped. */
function balancedCandidates(raw: string): string[] {
  const spans: string[] = [];
  for (const open of ["{", "["] as const) {
    const close = CLOSER[open];
    let start = -1;
    let depth = 0;
    let quoted = false;
    let escaped = false;

    for (let index = 0; index < raw.length; index += 1) {
      const char = raw.charAt(index);
      if (start === -1) {
        if (char === open) {
          start = index;
          depth = 1;
          quoted = false;
          escaped = false;
        }
      } else if (quoted) {
        if (escaped) escaped = false;
        else if (char === "\\") escaped = true;
        else if (char === '"') quoted = false;
      } else if (char === '"') {
        quoted = true;
      } else if (char === open) {
        depth += 1;
      } else if (char === close) {
        depth -= 1;
        if (depth === 0) {
          spans.push(raw.slice(start, index + 1).trim());
          start = -1;
        }
      }
    }
  }
  return spans;
}

function jsonCandidates(raw: string): string[] {
  return [raw.trim(), ...fencedCandidates(raw), ...balancedCandidates(raw)].filter((candidate) => candidate.length > 0);
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** Parses the first JSON candidate in `text`, or returns `text` unchanged. */
function parseEmbeddedJson(text: string): unknown {
  if (!text.trim()) return text;
  for (const candidate of jsonCandidates(text)) {
    const parsed = tryParseJson(candidate);
    if (parsed.ok) return parsed.value;
  }
  return text;
}

/** Unwraps provider envelopes (`structured_output`, `result`, `output`) down to the payload. */
function unwrapEnvelope(payload: unknown): unknown {
  if (typeof payload === "string") {
    const parsed = parseEmbeddedJson(payload);
    return parsed === payload ? payload : unwrapEnvelope(parsed);
  }
  if (Array.isArray(payload)) return payload.map((item) => unwrapEnvelope(item));
  if (!isRecord(payload)) return payload;

  if (payload.structured_output && typeof payload.structured_output === "object") {
    return unwrapEnvelope(payload.structured_output);
  }
  for (const key of ["result", "output"] as const) {
    const text = payload[key];
    if (typeof text !== "string" || !text) continue;
    const parsed = parseEmbeddedJson(text);
    if (parsed !== text) return unwrapEnvelope(parsed);
  }
  return payload;
}

export function parseWithSchema<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  for (const candidate of jsonCandidates(raw)) {
    const parsed = tryParseJson(candidate);
    if (!parsed.ok) continue;
    const payload = unwrapEnvelope(parsed.value);
    const options = Array.isArray(payload) ? payload : [payload];
    for (const option of options) {
      const validated = schema.safeParse(option);
      if (validated.success) return validated.data;
    }
  }
  return null;
}

export function parseDependencyInsight(raw: string): DependencyInsight | null {
  return parseWithSchema(raw, dependencyInsightSchema);
}

export function parseQualityReview(raw: string): QualityReview | null {
  return parseWithSchema(raw, qualityReviewSchema);
}

export function parseRequirementsVerdict(raw: string): RequirementsVerdict | null {
  return parseWithSchema(raw, requirementsVerdictSchema);
}

/**
 * Pulls module source out of an oracle reply. The longest fenced block with a
 * JS/TS (or no) language tag wins; a reply without fences is taken as-is.
 */
export function extractSourceText(raw: string): string {
  let best: string | null = null;
  for (const match of raw.matchAll(SOURCE_FENCE)) {
    const tag = (match[1] ?? "").toLowerCase();
    const body = match[2] ?? "";
    if (!SOURCE_LANGUAGE_TAGS.has(tag)) continue;
    if (best === null || body.length > best.length) best = body;
  }
  const source = best ?? raw;
  return source.trim().length > 0 ? `${source.replace(/\s+$/, "")}\n` : "";
}
