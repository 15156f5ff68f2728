import type { ImportedItem, ResolvedReference } from "../types.js";

export function expectedImportPath(moduleName: string): string {
  return `@/${moduleName.split(".").join("/")}`;
}

function namespaceIdentifier(moduleName: string): string {
  const last = moduleName.split(".").at(-1) ?? moduleName;
  const camel = last.replace(/[-_]+([A-Za-z0-9])/g, (_match, next: string) => next.toUpperCase());
  const identifier = camel.replace(/[^\w$]/g, "");
  return /^[A-Za-z_$]/.test(identifier) ? identifier : `_${identifier}`;
}

function formatItem(item: ImportedItem): string {
  return item.alias && item.alias !== item.name ? `${item.name} as ${item.alias}` : item.name;
}

export function formatImportStatement(moduleName: string, items: readonly ImportedItem[]): string {
  const path = expectedImportPath(moduleName);
  if (items.length === 0) {
    return `import * as ${namespaceIdentifier(moduleName)} from "${path}";`;
  }
  return `import { ${items.map(formatItem).join(", ")} } from "${path}";`;
}

/**
 * Import statements a module must contain, one per referenced module, with
 * items merged across references in declaration order.
 */
export function expectedImportStatements(references: readonly ResolvedReference[]): string[] {
  const merged = new Map<string, ImportedItem[]>();
  for (const { reference, moduleName } of references) {
    const items = merged.get(moduleName) ?? [];
    for (const item of reference.importedItems) {
      if (!items.some((existing) => existing.name === item.name && existing.alias === item.alias)) {
        items.push(item);
      }
    }
    merged.set(moduleName, items);
  }
  return [...merged].map(([moduleName, items]) => formatImportStatement(moduleName, items));
}
