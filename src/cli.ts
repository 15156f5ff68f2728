#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { homedir } from "node:os";

import { log } from "@clack/prompts";
import { Command } from "commander";
import { z } from "zod";

import { runDiscover } from "./commands/discover.js";
import { runGenerateProject } from "./commands/generate-project.js";
import { runGenerate } from "./commands/generate.js";
import { runInit } from "./commands/init.js";
import { runValidate } from "./commands/validate.js";
import { normalizeError, toJsonErrorPayload } from "./core/errors.js";
import { packageFile } from "./core/package-root.js";
import type {
  DiscoverCommandOptions,
  GenerateCommandOptions,
  GenerateProjectCommandOptions,
  InitCommandOptions,
  ValidateCommandOptions
} from "./core/types.js";

const packageJsonSchema = z.object({ version: z.string() }).passthrough();

function readVersion(): string {
  try {
    const parsed = packageJsonSchema.safeParse(JSON.parse(readFileSync(packageFile("package.json"), "utf8")));
    return parsed.success ? parsed.data.version : "0.0.0";
  } catch {
    return "0.0.0";
  }
}

const CLI_VERSION = readVersion();

const ANSI = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  borderGray: "\u001B[38;5;245m",
  mutedGray: "\u001B[38;5;250m",
  white: "\u001B[97m",
  accent: "\u001B[38;5;39m"
} as const;

const COLOR_ENABLED = Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined && process.env.TERM !== "dumb";

function paint(text: string, ...codes: string[]): string {
  if (!COLOR_ENABLED || text.length === 0) return text;
  return `${codes.join("")}${text}${ANSI.reset}`;
}

function compactPath(path: string): string {
  const home = homedir();
  return path.startsWith(home) ? `~${path.slice(home.length)}` : path;
}

function ellipsize(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return "";
  if (text.length <= maxWidth) return text;
  if (maxWidth <= 1) return "…";
  const head = Math.max(1, Math.floor((maxWidth - 1) * 0.7));
  const tail = Math.max(0, maxWidth - 1 - head);
  return `${text.slice(0, head)}…${text.slice(text.length - tail)}`;
}

function renderBrandHeader(): void {
  if (!process.stdout.isTTY) return;
  const width = Math.min(72, Math.max(36, (process.stdout.columns ?? 80) - 4));
  const rows: Array<[plain: string, styled: (text: string) => string]> = [
    ["blueprints", (text) => paint(text, ANSI.bold, ANSI.accent)],
    ["Markdown blueprints in, verified modules out", (text) => paint(text, ANSI.white)],
    [`version:   v${CLI_VERSION}`, (text) => paint(text, ANSI.mutedGray)],
    [`directory: ${compactPath(process.cwd())}`, (text) => paint(text, ANSI.mutedGray)]
  ];

  const vertical = paint("│", ANSI.borderGray);
  console.log(paint(`╭${"─".repeat(width + 2)}╮`, ANSI.borderGray));
  for (const [plain, styled] of rows) {
    const fitted = ellipsize(plain, width);
    console.log(`${vertical} ${styled(fitted)}${" ".repeat(width - fitted.length)} ${vertical}`);
  }
  console.log(paint(`╰${"─".repeat(width + 2)}╯`, ANSI.borderGray));
  console.log("");
}

function addOracleOptions(command: Command): Command {
  return command
    .option("--provider <provider>", "auto | codex | claude")
    .option("--model <model>", "Model id passed to the provider CLI")
    .option("-l, --language <language>", "typescript | javascript")
    .option("--max-retries <count>", "Regeneration attempts after a failed verification (0-10, default 2)")
    .option("--oracle-timeout-sec <seconds>", "Timeout per oracle call in seconds (default 600)")
    .option("--type-check", "Run the project's local tsc on every generated module")
    .option("--runtime-check", "Load every generated module in a sandboxed Node.js process (default)")
    .option("--no-runtime-check", "Skip the sandboxed load of generated modules")
    .option("--requirements-check", "Ask the oracle whether each module meets its blueprint (default)")
    .option("--no-requirements-check", "Skip the oracle's requirements check")
    .option("--quality-improvement", "Run review and improve passes over verified modules (default)")
    .option("--no-quality-improvement", "Skip the review and improve passes")
    .option("--quality-iterations <count>", "Review and improve passes per module (0-5, default 2)")
    .option("--infer-deps", "Ask the oracle for dependencies the blueprints imply but do not declare")
    .option("--base-dir <dir>", "Project root that references resolve against (default: nearest main.md, config or package.json)")
    .option("-f, --force", "Regenerate and overwrite existing artifacts")
    .option("-v, --verbose", "Print oracle progress and every warning");
}

const program = new Command();

program
  .name("blueprints")
  .description("Generate a verified source tree from a graph of markdown blueprints.")
  .version(CLI_VERSION);

program
  .command("validate")
  .description("Parse a blueprint and its dependency graph, and report the generation order.")
  .argument("<file>", "Root blueprint file")
  .option("--strict-cycles", "Treat dependency cycles as errors")
  .option("--base-dir <dir>", "Project root that references resolve against (default: nearest main.md, config or package.json)")
  .option("--format <format>", "text | json", "text")
  .option("-v, --verbose", "Print every parse and resolution warning")
  .action(async (file: string, options: ValidateCommandOptions) => {
    await runValidate(file, options);
  });

addOracleOptions(
  program
    .command("generate")
    .description("Generate the module of one blueprint next to it.")
    .argument("<file>", "Blueprint file")
    .option("-o, --output <path>", "Write the module to this path instead")
).action(async (file: string, options: GenerateCommandOptions) => {
  renderBrandHeader();
  const report = await runGenerate(file, options);
  if (report.status === "failed-verification") process.exitCode = 1;
});

addOracleOptions(
  program
    .command("generate-project")
    .description("Generate every module of one or more projects in dependency order.")
    .argument("<files...>", "Root blueprint of each project")
    .option("--strict-cycles", "Fail instead of generating when the graph has cycles")
    .option("--no-makefile", "Do not write a Makefile next to the root blueprint")
).action(async (files: string[], options: GenerateProjectCommandOptions) => {
  renderBrandHeader();
  const reports = await runGenerateProject(files, options);
  if (reports.some((report) => !report.success)) process.exitCode = 1;
});

program
  .command("discover")
  .description("List every blueprint under a directory.")
  .argument("[dir]", "Directory to scan (defaults to current working directory)")
  .option("--format <format>", "text | json", "text")
  .action(async (dir: string | undefined, options: DiscoverCommandOptions) => {
    await runDiscover(dir, options);
  });

program
  .command("init")
  .description("Create a starter project with a descriptor and two blueprints.")
  .argument("<name>", "Project name")
  .option("-o, --output <dir>", "Parent directory of the new project")
  .option("-f, --force", "Overwrite existing files")
  .action(async (name: string, options: InitCommandOptions) => {
    await runInit(name, options);
  });

function wantsJson(argv: readonly string[]): boolean {
  const index = argv.indexOf("--format");
  return argv.includes("--format=json") || (index !== -1 && argv[index + 1] === "json");
}

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const normalized = normalizeError(error);
    if (wantsJson(process.argv)) {
      console.error(JSON.stringify(toJsonErrorPayload(normalized), null, 2));
    } else {
      log.error(normalized.message);
    }
    process.exitCode = normalized.exitCode;
  }
}

void main();
