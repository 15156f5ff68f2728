/**
 * @babel/traverse exposes its function as `default` under ESM and as the
 * module itself under CJS; this resolves either shape.
 */

import type { Node, NodePath, Scope, TraverseOptions } from "@babel/traverse";

export type TraverseFunction = <S = undefined>(
  parent: Node,
  opts?: TraverseOptions<S>,
  scope?: Scope,
  state?: S,
  parentPath?: NodePath
) => void;

interface ModuleWithPossibleDefault {
  default?: unknown;
}

function hasDefaultExport(mod: unknown): mod is ModuleWithPossibleDefault {
  return typeof mod === "object" && mod !== null && "default" in mod;
}

function isTraverseFunction(value: unknown): value is TraverseFunction {
  return typeof value === "function";
}

export function getTraverseFunction(traverseModule: unknown): TraverseFunction {
  if (hasDefaultExport(traverseModule) && isTraverseFunction(traverseModule.default)) {
    return traverseModule.default;
  }
  if (isTraverseFunction(traverseModule)) {
    return traverseModule;
  }
  throw new Error("Unable to resolve the @babel/traverse function; check the installed version.");
}
