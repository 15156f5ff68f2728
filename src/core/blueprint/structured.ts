import type { ClassComponent, Component, Reference } from "../types.js";

import {
  looksLikeClassHeader,
  looksLikeConstant,
  looksLikeSignature,
  looksLikeTypeAlias,
  parseClassHeader,
  parseClassMember,
  parseConstant,
  parseFunctionComponent,
  parseTypeAlias,
  type SignatureOutcome
} from "./components.js";
import { parseReferenceEntry, splitOutsideBrackets } from "./references.js";

export interface BlueprintBody {
  description: string;
  references: Reference[];
  components: Component[];
  notes: string[];
  requirements: string[];
  sections: Record<string, string[]>;
  externalDependencies: string[];
}

const DEPS_LINE = /^deps:\s*(.*)$/i;
const NOTES_LINE = /^notes:\s*(.*)$/;

export function isStructuredLine(trimmed: string): boolean {
  return (
    DEPS_LINE.test(trimmed) ||
    NOTES_LINE.test(trimmed) ||
    looksLikeClassHeader(trimmed) ||
    looksLikeTypeAlias(trimmed) ||
    looksLikeSignature(trimmed)
  );
}

/**
 * Body of a structured document: `deps:` / `notes:` lines, class blocks with
 * indented members, function signatures, constants and type aliases.
 */
export function parseStructuredBody(lines: string[], warnings: string[]): BlueprintBody {
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
  let currentClass: ClassComponent | null = null;

  const closeDescription = (): void => {
    if (descriptionLines.length > 0) descriptionDone = true;
  };

  const accept = <T extends Component>(outcome: SignatureOutcome<T>): T | null => {
    if (outcome.ok) {
      body.components.push(outcome.value);
      return outcome.value;
    }
    warnings.push(outcome.warning);
    return null;
  };

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) {
      closeDescription();
      continue;
    }

    const indented = /^\s/.test(line);
    if (currentClass && indented) {
      const member = parseClassMember(trimmed);
      if (!member.ok) {
        warnings.push(member.warning);
      } else if ("method" in member.value) {
        currentClass.methods.push(member.value.method);
      } else {
        currentClass.properties.push(member.value.property);
      }
      continue;
    }
    currentClass = null;

    if (trimmed.startsWith("#")) {
      closeDescription();
      continue;
    }

    const deps = DEPS_LINE.exec(trimmed);
    if (deps) {
      closeDescription();
      for (const entry of splitOutsideBrackets(deps[1] ?? "", ";")) {
        const outcome = parseReferenceEntry(entry);
        warnings.push(...outcome.warnings);
        if (outcome.reference) body.references.push(outcome.reference);
      }
      continue;
    }

    const notes = NOTES_LINE.exec(trimmed);
    if (notes) {
      closeDescription();
      for (const note of splitOutsideBrackets(notes[1] ?? "", ",")) {
        if (note) body.notes.push(note);
      }
      continue;
    }

    if (/^[-*]\s+/.test(trimmed) && !indented) {
      closeDescription();
      body.notes.push(trimmed.replace(/^[-*]\s+/, ""));
      continue;
    }

    if (looksLikeClassHeader(trimmed)) {
      closeDescription();
      currentClass = accept(parseClassHeader(trimmed));
      continue;
    }
    if (looksLikeTypeAlias(trimmed)) {
      closeDescription();
      accept(parseTypeAlias(trimmed));
      continue;
    }
    if (looksLikeSignature(trimmed)) {
      closeDescription();
      accept(parseFunctionComponent(trimmed));
      continue;
    }
    if (looksLikeConstant(trimmed)) {
      closeDescription();
      accept(parseConstant(trimmed));
      continue;
    }

    if (!descriptionDone) {
      descriptionLines.push(trimmed);
      continue;
    }
    body.notes.push(trimmed);
  }

  body.description = descriptionLines.join(" ");
  return body;
}
