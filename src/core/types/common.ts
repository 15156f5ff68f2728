export type TargetLanguage = "typescript" | "javascript";
export type AiProvider = "auto" | "codex" | "claude";
export type OutputFormat = "text" | "json";
