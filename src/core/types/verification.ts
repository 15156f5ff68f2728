import type { Blueprint } from "./blueprint.js";
import type { TargetLanguage } from "./common.js";
import type { ResolvedReference } from "./project.js";
import type { RequirementsChecker } from "../verify/requirements.js";

export type VerificationStage =
  | "syntax"
  | "imports"
  | "conformance"
  | "third-party-imports"
  | "async"
  | "type"
  | "runtime-load"
  | "requirements";

export type VerificationErrorKind =
  | "syntax"
  | "import-unresolved"
  | "dependency-conformance"
  | "missing-third-party-import"
  | "async-misuse"
  | "type"
  | "runtime-load"
  | "requirements-unmet";

export interface VerificationResult {
  stage: VerificationStage;
  success: boolean;
  errorKind?: VerificationErrorKind;
  message: string;
  line?: number;
  warnings: string[];
}

export interface VerificationContext {
  projectRoot: string;
  language: TargetLanguage;
  /** Directory the artifact will be written to; relative imports resolve against it. */
  sourceDir?: string | undefined;
  knownModules: ReadonlySet<string>;
  /** Declared third-party packages; `null` when the project declares none at all. */
  declaredPackages: ReadonlySet<string> | null;
  /** Resolved direct references of the module being verified, in declaration order. */
  references: readonly ResolvedReference[];
  dependencyBlueprints: ReadonlyMap<string, Blueprint>;
  typeCheck: boolean;
  runtimeCheck: boolean;
  runtimeTimeoutMs?: number | undefined;
  /** Oracle-backed last stage; absent when the check is off. */
  requirementsChecker?: RequirementsChecker | undefined;
  signal?: AbortSignal | undefined;
}
