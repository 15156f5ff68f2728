import { extractSourceText } from "../ai-parsing.js";
import { ConfigError, GenerationCancelledError, OracleError } from "../errors.js";
import type { AiProvider } from "../types.js";

import type { GenerationOracle, OracleRequestOptions, StatusCallback } from "./contracts.js";
import { chooseProvider, type ResolvedAiProvider } from "./provider-selection.js";
import { runTextTask, summarizeFailure } from "./providers.js";

export interface CliGenerationOracleOptions {
  provider: ResolvedAiProvider;
  model?: string | undefined;
  cwd?: string | undefined;
  timeoutMs?: number | undefined;
  onStatus?: StatusCallback | undefined;
}

/** Oracle backed by a locally installed `codex` or `claude` CLI. */
export class CliGenerationOracle implements GenerationOracle {
  readonly provider: ResolvedAiProvider;
  private readonly options: CliGenerationOracleOptions;

  constructor(options: CliGenerationOracleOptions) {
    this.provider = options.provider;
    this.options = options;
  }

  async generate(prompt: string, request: OracleRequestOptions = {}): Promise<string> {
    if (request.signal?.aborted) {
      throw new GenerationCancelledError("Generation cancelled before the oracle was called.");
    }

    const result = await runTextTask(this.provider, prompt, {
      cwd: this.options.cwd,
      model: this.options.model,
      onStatus: this.options.onStatus,
      timeoutMs: request.timeoutMs ?? this.options.timeoutMs,
      signal: request.signal
    });

    if (result.aborted) {
      throw new GenerationCancelledError(`${this.provider} call was cancelled.`);
    }
    if (!result.ok) {
      throw new OracleError(`${this.provider} failed: ${summarizeFailure(result)}`, {
        details: { provider: this.provider, ...(result.timedOut ? { timedOut: true } : {}) }
      });
    }

    const source = extractSourceText(result.stdout);
    if (!source) {
      throw new OracleError(`${this.provider} returned an empty reply.`, { details: { provider: this.provider } });
    }
    return source;
  }
}

export interface CreateOracleOptions extends Omit<CliGenerationOracleOptions, "provider"> {
  provider: AiProvider;
  commandExists?: ((command: string) => boolean) | undefined;
}

export function createOracle(options: CreateOracleOptions): CliGenerationOracle {
  const { provider: requested, commandExists, ...rest } = options;
  const provider = chooseProvider(requested, commandExists);
  if (!provider) {
    throw new ConfigError(
      requested === "auto"
        ? "No supported AI CLI found. Install `codex` or `claude`, or set --provider."
        : `Requested provider "${requested}" is not installed or not on PATH.`
    );
  }
  return new CliGenerationOracle({ provider, ...rest });
}
