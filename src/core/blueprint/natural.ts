import { isBlueprintReference, parseReferenceEntry, splitOutsideBrackets } from "./references.js";
import type { BlueprintBody } from "./structured.js";

const SECTION_HEADER = /^([A-Z][A-Za-z -]*[A-Za-z]):\s*(.*)$/;
const MARKDOWN_SECTION = /^#{2,}\s+(.+?)\s*:?\s*$/;
const BULLET = /^[-*+]\s+/;
const PACKAGE_NAME = /^[A-Za-z0-9][\w.-]*/;

interface SectionHeader {
  name: string;
  inline: string;
}

function readSectionHeader(trimmed: string): SectionHeader | null {
  const markdown = MARKDOWN_SECTION.exec(trimmed);
  if (markdown?.[1]) return { name: markdown[1].toLowerCase(), inline: "" };
  const plain = SECTION_HEADER.exec(trimmed);
  if (plain?.[1]) return { name: plain[1].toLowerCase(), inline: plain[2]?.trim() ?? "" };
  return null;
}

function stripEntryCommentary(entry: string): string {
  return entry.split(/\s+#\s/)[0]?.split(/\s+-\s+/)[0]?.trim() ?? "";
}

function collectDependencies(items: string[], body: BlueprintBody, warnings: string[]): void {
  for (const item of items) {
    for (const rawEntry of splitOutsideBrackets(item, ",")) {
      const entry = stripEntryCommentary(rawEntry);
      if (!entry) continue;
      if (isBlueprintReference(entry)) {
        const outcome = parseReferenceEntry(entry);
        warnings.push(...outcome.warnings);
        if (outcome.reference) body.references.push(outcome.reference);
        continue;
      }
      const packageName = PACKAGE_NAME.exec(entry)?.[0];
      if (packageName && !body.externalDependencies.includes(packageName)) {
        body.externalDependencies.push(packageName);
      }
    }
  }
}

/**
 * Body of a natural document: a description paragraph followed by
 * `Title:`-style or `## Title` sections holding bullets or plain lines.
 */
export function parseNaturalBody(lines: string[], warnings: string[]): BlueprintBody {
  const body: BlueprintBody = {
    description: "",
    references: [],
    components: [],
    notes: [],
    requirements: [],
    sections: {},
    externalDependencies: []
  };

  const descriptionLines: string[] = [];
  let descriptionDone = false;
  let currentSection: string | null = null;
  const sectionItems = new Map<string, string[]>();

  const itemsFor = (name: string): string[] => {
    const existing = sectionItems.get(name);
    if (existing) return existing;
    const created: string[] = [];
    sectionItems.set(name, created);
    return created;
  };

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) {
      if (descriptionLines.length > 0) descriptionDone = true;
      continue;
    }

    const header = readSectionHeader(trimmed);
    if (header) {
      if (descriptionLines.length > 0) descriptionDone = true;
      currentSection = header.name;
      const items = itemsFor(header.name);
      if (header.inline) items.push(header.inline);
      continue;
    }

    if (trimmed.startsWith("#")) {
      if (descriptionLines.length > 0) descriptionDone = true;
      continue;
    }

    const content = trimmed.replace(BULLET, "");
    if (currentSection) {
      itemsFor(currentSection).push(content);
      continue;
    }
    if (!descriptionDone && !BULLET.test(trimmed)) {
      descriptionLines.push(trimmed);
      continue;
    }
    body.notes.push(content);
  }

  for (const [name, items] of sectionItems) {
    if (!items.length) continue;
    if (name === "dependencies") {
      collectDependencies(items, body, warnings);
    } else if (name === "requirements") {
      body.requirements.push(...items);
    } else if (name.includes("note")) {
      body.notes.push(...items);
    } else {
      body.sections[name] = items;
    }
  }

  body.description = descriptionLines.join(" ");
  return body;
}
