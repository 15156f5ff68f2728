import type { ImportedItem, Reference } from "../types.js";

const BLUEPRINT_REFERENCE_PREFIXES = ["@", "./", "../"] as const;
const TARGET_PATTERN = /^@?[\w./-]*\w[\w./-]*$/;
const ITEM_PATTERN = /^([A-Za-z_$][\w$]*)(?:\s+as\s+([A-Za-z_$][\w$]*))?$/;

export interface ReferenceParseOutcome {
  reference?: Reference;
  warnings: string[];
}

export function isBlueprintReference(entry: string): boolean {
  const trimmed = entry.trim();
  return BLUEPRINT_REFERENCE_PREFIXES.some((prefix) => trimmed.startsWith(prefix));
}

/** Splits on `separator` while ignoring separators inside `[...]` item lists. */
export function splitOutsideBrackets(value: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = "";
  for (const char of value) {
    if (char === "[") depth += 1;
    if (char === "]") depth = Math.max(0, depth - 1);
    if (char === separator && depth === 0) {
      parts.push(current);
      current = "";
      continue;
    }
    current += char;
  }
  parts.push(current);
  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

function parseImportedItems(text: string, entry: string, warnings: string[]): ImportedItem[] {
  const items: ImportedItem[] = [];
  for (const rawItem of text.split(",")) {
    const item = rawItem.trim();
    if (!item) continue;
    const match = ITEM_PATTERN.exec(item);
    if (!match?.[1]) {
      warnings.push(`Dropped imported item "${item}" in "${entry}": expected "Name" or "Name as Alias".`);
      continue;
    }
    items.push(match[2] ? { name: match[1], alias: match[2] } : { name: match[1] });
  }
  return items;
}

/**
 * Parses one dependency entry such as `@.models.user[User, Role as UserRole]`.
 * Malformed entries come back without a reference and with a warning.
 */
export function parseReferenceEntry(entry: string): ReferenceParseOutcome {
  const trimmed = entry.trim();
  const warnings: string[] = [];
  if (!trimmed) return { warnings };

  const open = trimmed.indexOf("[");
  let target = trimmed;
  let itemsText = "";
  if (open === -1) {
    if (trimmed.includes("]")) {
      return { warnings: [`Dropped dependency "${trimmed}": unbalanced "]".`] };
    }
  } else {
    const inner = trimmed.slice(open + 1, -1);
    if (!trimmed.endsWith("]") || inner.includes("[") || inner.includes("]")) {
      return { warnings: [`Dropped dependency "${trimmed}": unbalanced item list.`] };
    }
    target = trimmed.slice(0, open).trim();
    itemsText = inner;
  }

  if (!TARGET_PATTERN.test(target)) {
    return { warnings: [`Dropped dependency "${trimmed}": "${target}" is not a module path.`] };
  }

  return {
    reference: {
      targetPath: target,
      importedItems: parseImportedItems(itemsText, trimmed, warnings)
    },
    warnings
  };
}

export function formatReference(reference: Reference): string {
  if (!reference.importedItems.length) return reference.targetPath;
  const items = reference.importedItems.map((item) => (item.alias ? `${item.name} as ${item.alias}` : item.name));
  return `${reference.targetPath}[${items.join(", ")}]`;
}
