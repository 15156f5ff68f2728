import type {
  ClassComponent,
  ConstantComponent,
  FunctionComponent,
  MethodSignature,
  PropertySignature,
  TypeAliasComponent
} from "../types.js";

const IDENTIFIER = "[A-Za-z_$][\\w$]*";
const SIGNATURE_START = new RegExp(`^(async\\s+)?(?:function\\s+)?(${IDENTIFIER})\\s*\\(`);
const CLASS_HEADER = new RegExp(
  `^class\\s+(${IDENTIFIER})\\s*(?:\\(\\s*([\\w$.]+)\\s*\\)|extends\\s+([\\w$.]+))?\\s*:?$`
);
const TYPE_ALIAS = new RegExp(`^type\\s+(${IDENTIFIER}(?:<[^>]*>)?)\\s*=\\s*(.+)$`);
const CONSTANT = /^([A-Z][A-Z0-9_]*)\s*(?::\s*([^=]+?))?\s*(?:=\s*(.+))?$/;
const PROPERTY = new RegExp(`^(${IDENTIFIER})\\??\\s*:\\s*(.+)$`);
const TRAILING_COMMENT = /\s+#\s.*$/;
const SIGNATURE_TAIL = /^\s*(?:$|->|:)/;

export type SignatureOutcome<T> = { ok: true; value: T } | { ok: false; warning: string };

export function stripTrailingComment(line: string): string {
  return line.replace(TRAILING_COMMENT, "").trim();
}

/**
 * A callable name, a parameter list, then nothing, `->` or `:`. Prose such
 * as `Authentication (JWT) service` is not a signature; an unbalanced
 * parameter list still is, so it can be dropped with a warning.
 */
export function looksLikeSignature(line: string): boolean {
  const text = stripTrailingComment(line);
  const start = SIGNATURE_START.exec(text);
  if (!start) return false;
  const closeIndex = findClosingParen(text, text.indexOf("(", start[0].length - 1));
  return closeIndex === -1 || SIGNATURE_TAIL.test(text.slice(closeIndex + 1));
}

export function looksLikeClassHeader(line: string): boolean {
  return /^class\s+\S/.test(line);
}

export function looksLikeTypeAlias(line: string): boolean {
  return /^type\s+\S/.test(line);
}

export function looksLikeConstant(line: string): boolean {
  const match = CONSTANT.exec(line);
  return Boolean(match && (match[2] !== undefined || match[3] !== undefined));
}

function findClosingParen(line: string, openIndex: number): number {
  let depth = 0;
  for (let index = openIndex; index < line.length; index += 1) {
    const char = line[index];
    if (char === "(") depth += 1;
    if (char === ")") {
      depth -= 1;
      if (depth === 0) return index;
    }
  }
  return -1;
}

export function parseMethodSignature(line: string): SignatureOutcome<MethodSignature> {
  const text = stripTrailingComment(line);
  const start = SIGNATURE_START.exec(text);
  if (!start?.[2]) {
    return { ok: false, warning: `Dropped signature "${text}": no callable name found.` };
  }
  const openIndex = text.indexOf("(", start[0].length - 1);
  const closeIndex = findClosingParen(text, openIndex);
  if (closeIndex === -1) {
    return { ok: false, warning: `Dropped signature "${text}": unbalanced parentheses.` };
  }

  const params = text.slice(openIndex + 1, closeIndex).trim();
  const rest = text.slice(closeIndex + 1).trim();
  let returnType: string | undefined;
  if (rest.startsWith("->")) {
    returnType = rest.slice(2).trim();
  } else if (rest.startsWith(":")) {
    returnType = rest.slice(1).trim();
  } else if (rest.length > 0) {
    return { ok: false, warning: `Dropped signature "${text}": unexpected "${rest}" after parameters.` };
  }

  const signature: MethodSignature = { name: start[2], params, isAsync: Boolean(start[1]) };
  if (returnType) signature.returnType = returnType;
  return { ok: true, value: signature };
}

export function parseFunctionComponent(line: string): SignatureOutcome<FunctionComponent> {
  const outcome = parseMethodSignature(line);
  if (!outcome.ok) return outcome;
  return { ok: true, value: { kind: "function", ...outcome.value } };
}

export function parseClassHeader(line: string): SignatureOutcome<ClassComponent> {
  const text = stripTrailingComment(line);
  const match = CLASS_HEADER.exec(text);
  if (!match?.[1]) {
    return { ok: false, warning: `Dropped class header "${text}": expected "class Name", "class Name(Base)" or "class Name extends Base".` };
  }
  const component: ClassComponent = { kind: "class", name: match[1], methods: [], properties: [] };
  const baseClass = match[2] ?? match[3];
  if (baseClass) component.baseClass = baseClass;
  return { ok: true, value: component };
}

export function parseClassMember(
  line: string
): SignatureOutcome<{ method: MethodSignature } | { property: PropertySignature }> {
  const text = stripTrailingComment(line.trim().replace(/^[-*]\s+/, ""));
  if (looksLikeSignature(text)) {
    const outcome = parseMethodSignature(text);
    if (!outcome.ok) return outcome;
    return { ok: true, value: { method: outcome.value } };
  }
  const property = PROPERTY.exec(text);
  if (property?.[1]) {
    const value: PropertySignature = { name: property[1] };
    if (property[2]) value.type = property[2].trim();
    return { ok: true, value: { property: value } };
  }
  return { ok: false, warning: `Dropped class member "${text}": not a method or property signature.` };
}

export function parseConstant(line: string): SignatureOutcome<ConstantComponent> {
  const text = stripTrailingComment(line);
  const match = CONSTANT.exec(text);
  if (!match?.[1] || (match[2] === undefined && match[3] === undefined)) {
    return { ok: false, warning: `Dropped constant "${text}".` };
  }
  const component: ConstantComponent = { kind: "constant", name: match[1] };
  if (match[2]) component.type = match[2].trim();
  if (match[3]) component.value = match[3].trim();
  return { ok: true, value: component };
}

export function parseTypeAlias(line: string): SignatureOutcome<TypeAliasComponent> {
  const text = stripTrailingComment(line);
  const match = TYPE_ALIAS.exec(text);
  if (!match?.[1] || !match[2]) {
    return { ok: false, warning: `Dropped type alias "${text}": expected "type Name = value".` };
  }
  return { ok: true, value: { kind: "type-alias", name: match[1], value: match[2].trim() } };
}
