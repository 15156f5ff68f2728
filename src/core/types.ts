export type { AiProvider, OutputFormat, TargetLanguage } from "./types/common.js";
export type {
  Blueprint,
  ClassComponent,
  Component,
  ConstantComponent,
  FunctionComponent,
  ImportedItem,
  MethodSignature,
  ParsedBlueprint,
  PropertySignature,
  Reference,
  TypeAliasComponent
} from "./types/blueprint.js";
export type {
  GeneratedArtifact,
  InferredEdge,
  ResolvedProject,
  ResolvedReference,
  UnresolvedReference
} from "./types/project.js";
export type {
  VerificationContext,
  VerificationErrorKind,
  VerificationResult,
  VerificationStage
} from "./types/verification.js";
export type {
  DiscoverCommandOptions,
  GenerateCommandOptions,
  GenerateProjectCommandOptions,
  InitCommandOptions,
  ValidateCommandOptions
} from "./types/commands.js";
