import { parse, type ParserPlugin } from "@babel/parser";
import traverseModule from "@babel/traverse";
import type { NodePath, Scope } from "@babel/traverse";
import type {
  CallExpression,
  ClassBody,
  File,
  Identifier,
  Node,
  Statement,
  StringLiteral
} from "@babel/types";

import type { TargetLanguage } from "../types.js";

import { getTraverseFunction } from "./babel-traverse.js";

const traverse = getTraverseFunction(traverseModule);

export type ImportBindingKind = "named" | "default" | "namespace";

export interface ImportBinding {
  imported: string;
  local: string;
  kind: ImportBindingKind;
}

export interface ImportRecord {
  source: string;
  bindings: ImportBinding[];
  line: number;
  /** Static `import` declarations are "import"; re-exports, `import()` and `require()` are tracked too. */
  form: "import" | "re-export" | "dynamic" | "require";
  typeOnly: boolean;
}

export interface DeclaredCallable {
  name: string;
  isAsync: boolean;
  line: number;
  className?: string;
}

export interface AwaitedCall {
  callee: string;
  line: number;
}

export interface SourceAnalysis {
  imports: ImportRecord[];
  callables: DeclaredCallable[];
  /** First line each identifier is referenced without any binding in scope. */
  unboundReferences: Map<string, number>;
  awaitedCalls: AwaitedCall[];
}

export type ParseOutcome = { ok: true; ast: File } | { ok: false; message: string; line?: number };

function parserPlugins(language: TargetLanguage): ParserPlugin[] {
  return language === "typescript" ? ["typescript", "decorators-legacy"] : ["decorators-legacy"];
}

function errorLine(error: unknown): number | undefined {
  if (!error || typeof error !== "object" || !("loc" in error)) return undefined;
  const loc = error.loc;
  if (!loc || typeof loc !== "object" || !("line" in loc)) return undefined;
  return typeof loc.line === "number" ? loc.line : undefined;
}

export function parseSource(source: string, language: TargetLanguage): ParseOutcome {
  try {
    const ast = parse(source, {
      sourceType: "module",
      plugins: parserPlugins(language)
    });
    return { ok: true, ast };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const line = errorLine(error);
    return { ok: false, message, ...(line !== undefined ? { line } : {}) };
  }
}

function lineOf(node: Node): number {
  return node.loc?.start.line ?? 0;
}

function exportName(node: Identifier | StringLiteral): string {
  return node.type === "Identifier" ? node.name : node.value;
}

function collectClassCallables(className: string, body: ClassBody, callables: DeclaredCallable[]): void {
  for (const member of body.body) {
    if (member.type === "ClassMethod" && member.key.type === "Identifier" && member.kind !== "constructor") {
      callables.push({ name: member.key.name, isAsync: member.async, line: lineOf(member), className });
      continue;
    }
    if (
      member.type === "ClassProperty" &&
      member.key.type === "Identifier" &&
      (member.value?.type === "ArrowFunctionExpression" || member.value?.type === "FunctionExpression")
    ) {
      callables.push({ name: member.key.name, isAsync: member.value.async, line: lineOf(member), className });
    }
  }
}

function collectDeclarationCallables(statement: Statement, callables: DeclaredCallable[]): void {
  switch (statement.type) {
    case "FunctionDeclaration":
      if (statement.id) {
        callables.push({ name: statement.id.name, isAsync: statement.async, line: lineOf(statement) });
      }
      return;
    case "ClassDeclaration":
      if (statement.id) collectClassCallables(statement.id.name, statement.body, callables);
      return;
    case "VariableDeclaration":
      for (const declarator of statement.declarations) {
        if (declarator.id.type !== "Identifier") continue;
        const init = declarator.init;
        if (init?.type === "ArrowFunctionExpression" || init?.type === "FunctionExpression") {
          callables.push({ name: declarator.id.name, isAsync: init.async, line: lineOf(declarator) });
        } else if (init?.type === "ClassExpression") {
          collectClassCallables(declarator.id.name, init.body, callables);
        }
      }
      return;
    case "ExportNamedDeclaration":
      if (statement.declaration) collectDeclarationCallables(statement.declaration, callables);
      return;
    case "ExportDefaultDeclaration": {
      const declaration = statement.declaration;
      if (declaration.type === "FunctionDeclaration" || declaration.type === "ClassDeclaration") {
        collectDeclarationCallables(declaration, callables);
      }
      return;
    }
    default:
      return;
  }
}

function collectStaticImports(ast: File, imports: ImportRecord[], typeNames: Set<string>): void {
  for (const statement of ast.program.body) {
    if (statement.type === "ImportDeclaration") {
      const bindings = statement.specifiers.map((specifier): ImportBinding => {
        if (specifier.type === "ImportDefaultSpecifier") {
          return { imported: "default", local: specifier.local.name, kind: "default" };
        }
        if (specifier.type === "ImportNamespaceSpecifier") {
          return { imported: "*", local: specifier.local.name, kind: "namespace" };
        }
        return { imported: exportName(specifier.imported), local: specifier.local.name, kind: "named" };
      });
      imports.push({
        source: statement.source.value,
        bindings,
        line: lineOf(statement),
        form: "import",
        typeOnly: statement.importKind === "type"
      });
      continue;
    }

    if (statement.type === "ExportNamedDeclaration" && statement.source) {
      const bindings: ImportBinding[] = [];
      for (const specifier of statement.specifiers) {
        if (specifier.type === "ExportSpecifier") {
          bindings.push({ imported: exportName(specifier.local), local: exportName(specifier.exported), kind: "named" });
        } else if (specifier.type === "ExportNamespaceSpecifier") {
          bindings.push({ imported: "*", local: specifier.exported.name, kind: "namespace" });
        }
      }
      imports.push({
        source: statement.source.value,
        bindings,
        line: lineOf(statement),
        form: "re-export",
        typeOnly: statement.exportKind === "type"
      });
      continue;
    }

    if (statement.type === "ExportAllDeclaration") {
      imports.push({
        source: statement.source.value,
        bindings: [],
        line: lineOf(statement),
        form: "re-export",
        typeOnly: statement.exportKind === "type"
      });
      continue;
    }

    const declaration = statement.type === "ExportNamedDeclaration" ? statement.declaration : statement;
    if (
      declaration &&
      (declaration.type === "TSTypeAliasDeclaration" ||
        declaration.type === "TSInterfaceDeclaration" ||
        declaration.type === "TSEnumDeclaration")
    ) {
      typeNames.add(declaration.id.name);
    }
  }
}

function calleeName(node: Node): string | null {
  if (node.type === "Identifier") return node.name;
  if (node.type === "MemberExpression" && !node.computed && node.property.type === "Identifier") {
    const object = calleeName(node.object);
    return object ? `${object}.${node.property.name}` : node.property.name;
  }
  if (node.type === "ThisExpression") return "this";
  return null;
}

function requiredSource(node: CallExpression, scope: Scope): string | null {
  if (node.callee.type !== "Identifier" || node.callee.name !== "require") return null;
  if (scope.hasBinding("require")) return null;
  const argument = node.arguments[0];
  return argument?.type === "StringLiteral" ? argument.value : null;
}

/** Imports, declared callables and scope facts of a parsed module. */
export function analyzeSource(ast: File): SourceAnalysis {
  const imports: ImportRecord[] = [];
  const callables: DeclaredCallable[] = [];
  const unboundReferences = new Map<string, number>();
  const awaitedCalls: AwaitedCall[] = [];
  const typeNames = new Set<string>();

  collectStaticImports(ast, imports, typeNames);
  for (const statement of ast.program.body) collectDeclarationCallables(statement, callables);

  traverse(ast, {
    Identifier(path: NodePath<Identifier>) {
      if (!path.isReferencedIdentifier()) return;
      const name = path.node.name;
      if (typeNames.has(name) || path.scope.hasBinding(name, true)) return;
      if (!unboundReferences.has(name)) unboundReferences.set(name, lineOf(path.node));
    },
    CallExpression(path) {
      const required = requiredSource(path.node, path.scope);
      if (required !== null) {
        imports.push({ source: required, bindings: [], line: lineOf(path.node), form: "require", typeOnly: false });
      }
    },
    Import(path) {
      const call = path.parentPath?.node;
      if (call?.type !== "CallExpression") return;
      const argument = call.arguments[0];
      if (argument?.type !== "StringLiteral") return;
      imports.push({ source: argument.value, bindings: [], line: lineOf(call), form: "dynamic", typeOnly: false });
    },
    AwaitExpression(path) {
      const argument = path.node.argument;
      if (argument.type !== "CallExpression") return;
      const callee = calleeName(argument.callee);
      if (callee) awaitedCalls.push({ callee, line: lineOf(path.node) });
    }
  });

  return { imports, callables, unboundReferences, awaitedCalls };
}
