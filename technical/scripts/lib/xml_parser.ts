import { XMLParser, XMLValidator } from 'fast-xml-parser';
import fs from 'fs-extra';

import { XmlParseError } from './errors.js';
import { toPosixRelative } from './io.js';
import type { FieldDictionary } from './suggestions.js';
import { FORM_NAMESPACES, TAG_MAP } from './xml_tags.js';

const ATTRIBUTE_PREFIX = '@_';
const TEXT_KEY = '#text';
const NAMESPACE_URIS: ReadonlyMap<string, string> = new Map(Object.entries(FORM_NAMESPACES));

type XmlNode = Record<string, unknown>;
type NamespaceScope = ReadonlyMap<string, string>;

interface TagStep {
  namespace: string;
  localName: string;
}

export type WellFormedResult = { ok: true } | { ok: false; line: number; message: string };

function isXmlNode(value: unknown): value is XmlNode {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function splitQualifiedName(name: string): { prefix: string; localName: string } {
  const colon = name.indexOf(':');
  return colon === -1
    ? { prefix: '', localName: name }
    : { prefix: name.slice(0, colon), localName: name.slice(colon + 1) };
}

function compileTagPath(tagPath: string): TagStep[] {
  return tagPath.split('/').map((step) => {
    const { prefix, localName } = splitQualifiedName(step);
    const namespace = NAMESPACE_URIS.get(prefix);
    if (!namespace) {
      throw new Error(`Tag path '${tagPath}' uses undeclared prefix '${prefix}'`);
    }
    return { namespace, localName };
  });
}

const COMPILED_TAG_MAP = TAG_MAP.map((mapping) => ({
  field: mapping.field,
  steps: compileTagPath(mapping.path)
}));

/** Extends the in-scope prefix bindings with the node's own xmlns attributes. */
function extendScope(scope: NamespaceScope, node: unknown): NamespaceScope {
  if (!isXmlNode(node)) {
    return scope;
  }

  let next: Map<string, string> | null = null;
  for (const [key, value] of Object.entries(node)) {
    if (!key.startsWith(ATTRIBUTE_PREFIX) || typeof value !== 'string') {
      continue;
    }
    const attribute = key.slice(ATTRIBUTE_PREFIX.length);
    if (attribute === 'xmlns' || attribute.startsWith('xmlns:')) {
      next ??= new Map(scope);
      next.set(attribute === 'xmlns' ? '' : attribute.slice('xmlns:'.length), value);
    }
  }
  return next ?? scope;
}

function firstOccurrence(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : value;
}

function findChild(
  node: unknown,
  scope: NamespaceScope,
  step: TagStep
): { node: unknown; scope: NamespaceScope } | undefined {
  if (!isXmlNode(node)) {
    return undefined;
  }

  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith(ATTRIBUTE_PREFIX) || key === TEXT_KEY) {
      continue;
    }
    const child = firstOccurrence(value);
    const childScope = extendScope(scope, child);
    const { prefix, localName } = splitQualifiedName(key);
    if (localName === step.localName && childScope.get(prefix) === step.namespace) {
      return { node: child, scope: childScope };
    }
  }
  return undefined;
}

function textContent(node: unknown): string | null {
  const raw = isXmlNode(node) ? node[TEXT_KEY] : node;
  if (typeof raw === 'string') {
    return raw.length > 0 ? raw : null;
  }
  if (typeof raw === 'number' || typeof raw === 'boolean') {
    return String(raw);
  }
  return null;
}

function documentRoot(parsed: unknown): { node: unknown; scope: NamespaceScope } | undefined {
  if (!isXmlNode(parsed)) {
    return undefined;
  }
  for (const [key, value] of Object.entries(parsed)) {
    if (key.startsWith('?') || key.startsWith(ATTRIBUTE_PREFIX) || key === TEXT_KEY) {
      continue;
    }
    const node = firstOccurrence(value);
    return { node, scope: extendScope(new Map(), node) };
  }
  return undefined;
}

export function checkXmlWellFormed(xml: string): WellFormedResult {
  const result = XMLValidator.validate(xml);
  if (result === true) {
    return { ok: true };
  }
  return { ok: false, line: result.err.line, message: result.err.msg };
}

/**
 * Flat field dictionary from a Form 15CB document. Elements are matched by
 * namespace URI and local name, so documents using other prefixes for the same
 * namespaces read the same. Absent or empty elements are left out.
 */
export function parseXmlToFields(xml: string, source = 'document'): FieldDictionary {
  const wellFormed = checkXmlWellFormed(xml);
  if (!wellFormed.ok) {
    throw new XmlParseError(source, `line ${wellFormed.line}: ${wellFormed.message}`);
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    ignoreDeclaration: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    htmlEntities: true
  });
  const root = documentRoot(parser.parse(xml));
  if (!root) {
    throw new XmlParseError(source, 'document has no root element');
  }

  const fields: FieldDictionary = {};
  for (const mapping of COMPILED_TAG_MAP) {
    let cursor: { node: unknown; scope: NamespaceScope } | undefined = root;
    for (const step of mapping.steps) {
      cursor = cursor && findChild(cursor.node, cursor.scope, step);
    }
    const value = cursor ? textContent(cursor.node) : null;
    if (value !== null) {
      fields[mapping.field] = value.trim();
    }
  }
  return fields;
}

export async function parseXmlFile(filePath: string): Promise<FieldDictionary> {
  const source = toPosixRelative(filePath);
  let xml: string;
  try {
    xml = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new XmlParseError(source, `could not be read: ${message}`);
  }
  return parseXmlToFields(xml, source);
}

/** Checks a freshly written document and deletes it when it is not well-formed. */
export async function verifyGeneratedXml(outputPath: string): Promise<WellFormedResult> {
  const result = checkXmlWellFormed(await fs.readFile(outputPath, 'utf8'));
  if (!result.ok) {
    await fs.remove(outputPath);
  }
  return result;
}
