import type { OutputFormat } from "./types.js";

const EXIT_CODE_OPERATIONAL_FAILURE = 1;
const EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE = 2;

interface BlueprintErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class BlueprintError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, exitCode: number, options: BlueprintErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

export class UserInputError extends BlueprintError {
  constructor(message: string, options: BlueprintErrorOptions = {}) {
    super(message, "USER_INPUT", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class ConfigError extends BlueprintError {
  constructor(message: string, options: BlueprintErrorOptions = {}) {
    super(message, "CONFIG", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

/** The document does not start with a `# module.name` header. Fatal for that one document. */
export class ParseError extends BlueprintError {
  constructor(message: string, options: BlueprintErrorOptions = {}) {
    super(message, "PARSE", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class ExecutionError extends BlueprintError {
  constructor(message: string, options: BlueprintErrorOptions = {}) {
    super(message, "EXECUTION", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

/** The generation oracle failed (quota, network, timeout, malformed reply). */
export class OracleError extends BlueprintError {
  constructor(message: string, options: BlueprintErrorOptions = {}) {
    super(message, "ORACLE", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

export class GenerationCancelledError extends BlueprintError {
  constructor(message: string, options: BlueprintErrorOptions = {}) {
    super(message, "CANCELLED", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

function isCommanderErrorLike(error: unknown): error is { code?: unknown; message?: unknown } {
  if (!error || typeof error !== "object") return false;
  if (!("code" in error)) return false;
  return typeof error.code === "string";
}

export function normalizeError(error: unknown): BlueprintError {
  if (error instanceof BlueprintError) return error;
  if (isCommanderErrorLike(error) && String(error.code).startsWith("commander.")) {
    const message = error instanceof Error ? error.message : String(error.message ?? error.code);
    return new UserInputError(message, {
      cause: error,
      details: {
        commanderCode: String(error.code)
      }
    });
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message, { cause: error });
  }
  return new ExecutionError(String(error));
}

export function normalizeOutputFormat(value: string | undefined): OutputFormat {
  const normalized = value?.trim().toLowerCase() ?? "text";
  if (normalized === "text" || normalized === "json") {
    return normalized;
  }
  throw new UserInputError(`Invalid --format value "${String(value)}". Expected "text" or "json".`);
}

export function toJsonErrorPayload(error: BlueprintError): Record<string, unknown> {
  return {
    error: {
      code: error.code,
      type: error.name,
      message: error.message,
      exitCode: error.exitCode,
      ...(error.details ? { details: error.details } : {})
    }
  };
}
