import { ParseError } from "../errors.js";
import type { Blueprint, ParsedBlueprint } from "../types.js";

import { parseNaturalBody } from "./natural.js";
import { isStructuredLine, parseStructuredBody, type BlueprintBody } from "./structured.js";

const HEADER = /^#\s+(?:module:\s*)?(\S+)\s*$/i;
const MODULE_NAME = /^[A-Za-z_][\w-]*(?:\.[A-Za-z_][\w-]*)*$/;

type DocumentShape = { kind: "structured"; lines: string[] } | { kind: "natural"; lines: string[] };

export interface ParseBlueprintOptions {
  sourceLocation?: string;
}

export function isValidModuleName(value: string): boolean {
  return MODULE_NAME.test(value);
}

function describeSource(options: ParseBlueprintOptions): string {
  return options.sourceLocation ? ` in ${options.sourceLocation}` : "";
}

function readHeader(lines: string[], options: ParseBlueprintOptions): { moduleName: string; bodyStart: number } {
  const headerIndex = lines.findIndex((line) => line.trim().length > 0);
  const headerLine = headerIndex === -1 ? undefined : lines[headerIndex]?.trim();
  if (headerLine === undefined) {
    throw new ParseError(`Blueprint${describeSource(options)} is empty; expected a "# module.name" header.`, {
      details: { ...(options.sourceLocation ? { sourceLocation: options.sourceLocation } : {}) }
    });
  }

  const match = HEADER.exec(headerLine);
  const moduleName = match?.[1];
  if (!moduleName || !isValidModuleName(moduleName)) {
    throw new ParseError(
      `Blueprint${describeSource(options)} must start with a "# module.name" header, found "${headerLine}".`,
      { details: { header: headerLine, ...(options.sourceLocation ? { sourceLocation: options.sourceLocation } : {}) } }
    );
  }
  return { moduleName, bodyStart: headerIndex + 1 };
}

function detectShape(lines: string[]): DocumentShape {
  const structured = lines.some((line) => {
    if (!line.trim() || /^\s/.test(line)) return false;
    const trimmed = line.trim();
    if (/^[-*+]\s/.test(trimmed)) return false;
    return isStructuredLine(trimmed);
  });
  return structured ? { kind: "structured", lines } : { kind: "natural", lines };
}

function parseBody(shape: DocumentShape, warnings: string[]): BlueprintBody {
  switch (shape.kind) {
    case "structured":
      return parseStructuredBody(shape.lines, warnings);
    case "natural":
      return parseNaturalBody(shape.lines, warnings);
  }
}

function freezeBlueprint(blueprint: Blueprint): Blueprint {
  for (const reference of blueprint.references) {
    for (const item of reference.importedItems) Object.freeze(item);
    Object.freeze(reference.importedItems);
    Object.freeze(reference);
  }
  for (const component of blueprint.components) {
    if (component.kind === "class") {
      for (const method of component.methods) Object.freeze(method);
      for (const property of component.properties) Object.freeze(property);
      Object.freeze(component.methods);
      Object.freeze(component.properties);
    }
    Object.freeze(component);
  }
  for (const items of Object.values(blueprint.sections)) Object.freeze(items);
  Object.freeze(blueprint.references);
  Object.freeze(blueprint.components);
  Object.freeze(blueprint.notes);
  Object.freeze(blueprint.requirements);
  Object.freeze(blueprint.sections);
  Object.freeze(blueprint.externalDependencies);
  return Object.freeze(blueprint);
}

/**
 * Parses one blueprint document. Only a missing or malformed header is fatal;
 * malformed references and signatures are dropped and reported as warnings.
 */
export function parseBlueprint(text: string, options: ParseBlueprintOptions = {}): ParsedBlueprint {
  const lines = text.replace(/\r\n/g, "\n").split("\n");
  const { moduleName, bodyStart } = readHeader(lines, options);
  const warnings: string[] = [];
  const body = parseBody(detectShape(lines.slice(bodyStart)), warnings);

  const blueprint: Blueprint = {
    moduleName,
    ...body,
    rawText: text,
    ...(options.sourceLocation ? { sourceLocation: options.sourceLocation } : {})
  };
  return { blueprint: freezeBlueprint(blueprint), warnings };
}
