export interface CommandResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  reason?: string;
  exitCode?: number | null;
  timedOut?: boolean;
  aborted?: boolean;
}

export type StatusCallback = (message: string) => void;

export interface OracleRequestOptions {
  signal?: AbortSignal | undefined;
  timeoutMs?: number | undefined;
}

/**
 * Produces source text for a prompt. Implementations reject with
 * `OracleError` for quota, network, timeout or malformed replies, and with
 * `GenerationCancelledError` when the signal aborts.
 */
export interface GenerationOracle {
  generate(prompt: string, options?: OracleRequestOptions): Promise<string>;
}
