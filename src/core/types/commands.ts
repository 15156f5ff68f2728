import type { AiProvider } from "./common.js";

interface OracleCommandOptions {
  provider?: AiProvider;
  model?: string;
  language?: string;
  maxRetries?: number | string;
  oracleTimeoutSec?: number | string;
  typeCheck?: boolean;
  runtimeCheck?: boolean;
  requirementsCheck?: boolean;
  qualityImprovement?: boolean;
  qualityIterations?: number | string;
  inferDeps?: boolean;
  baseDir?: string;
  force?: boolean;
  verbose?: boolean;
}

export interface ValidateCommandOptions {
  strictCycles?: boolean;
  baseDir?: string;
  format?: string;
  verbose?: boolean;
}

export interface GenerateCommandOptions extends OracleCommandOptions {
  output?: string;
}

export interface GenerateProjectCommandOptions extends OracleCommandOptions {
  strictCycles?: boolean;
  makefile?: boolean;
}

export interface DiscoverCommandOptions {
  format?: string;
}

export interface InitCommandOptions {
  output?: string;
  force?: boolean;
}
