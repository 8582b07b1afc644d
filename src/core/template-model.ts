import { readFile } from 'fs/promises';
import { Document, isMap, isScalar, parseDocument, YAMLMap } from 'yaml';
import { TemplateLoadError } from './errors';

export const FUNCTION_RESOURCE_TYPE = 'AWS::Serverless::Function';

export const CODE_LOCATION_PROPERTY = 'CodeUri';

export type TemplateDocument = Document.Parsed;

// Every scalar stays a string, so untouched values (leading zeros, octal-style
// modes, integers beyond double precision) serialize exactly as written.
const PARSE_OPTIONS = { schema: 'failsafe' } as const;

export type ResourceDefinition = {
  type: string | undefined;
  properties: Record<string, unknown>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function keyName(key: unknown): string {
  return String(isScalar(key) ? key.value : key);
}

function getMapIn(doc: TemplateDocument, path: string[]): YAMLMap | undefined {
  const node = doc.getIn(path);
  return isMap(node) ? node : undefined;
}

/**
 * Parses a template. The returned document keeps comments, key order,
 * scalar source text and short-form intrinsic tags so that serializing it
 * again only differs where it was explicitly changed. Scalar values are read
 * as strings.
 */
export function loadTemplate(source: string): TemplateDocument {
  let doc: TemplateDocument;
  try {
    doc = parseDocument(source, PARSE_OPTIONS);
  } catch (err) {
    throw new TemplateLoadError('Template could not be parsed.', {
      cause: err,
    });
  }

  if (doc.errors.length > 0) {
    throw new TemplateLoadError(
      `Template could not be parsed: ${doc.errors[0].message}`,
      { cause: doc.errors[0] },
    );
  }
  if (!isMap(doc.contents)) {
    throw new TemplateLoadError('Template root must be a mapping.');
  }
  if (!getMapIn(doc, ['Resources'])) {
    throw new TemplateLoadError('Template does not declare a Resources mapping.');
  }

  return doc;
}

export async function loadTemplateFile(
  filePath: string,
): Promise<TemplateDocument> {
  let source: string;
  try {
    source = await readFile(filePath, 'utf8');
  } catch (err) {
    throw new TemplateLoadError(`Template "${filePath}" could not be read.`, {
      cause: err,
    });
  }
  return loadTemplate(source);
}

/** Resources in declaration order. */
export function listResources(
  doc: TemplateDocument,
): Array<[string, ResourceDefinition]> {
  const resources = getMapIn(doc, ['Resources']);
  if (!resources) {
    return [];
  }

  return resources.items.map((pair): [string, ResourceDefinition] => {
    const name = keyName(pair.key);
    const definition: unknown = isMap(pair.value) ? pair.value.toJSON() : {};
    if (!isRecord(definition)) {
      return [name, { type: undefined, properties: {} }];
    }

    const type = typeof definition.Type === 'string' ? definition.Type : undefined;
    const properties = isRecord(definition.Properties)
      ? definition.Properties
      : {};
    return [name, { type, properties }];
  });
}

/** Values from a `Globals` section, such as `Globals.Function`. */
export function getGlobals(
  doc: TemplateDocument,
  section: string,
): Record<string, unknown> {
  const node = getMapIn(doc, ['Globals', section]);
  const value: unknown = node ? node.toJSON() : undefined;
  return isRecord(value) ? value : {};
}

/**
 * Points a resource at its packaged code. Only the code reference of the named
 * resource changes; every other node is left as parsed.
 */
export function setCodeLocation(
  doc: TemplateDocument,
  resourceName: string,
  location: string,
): void {
  if (!getMapIn(doc, ['Resources', resourceName])) {
    throw new TemplateLoadError(
      `Template does not declare resource "${resourceName}".`,
    );
  }
  doc.setIn(
    ['Resources', resourceName, 'Properties', CODE_LOCATION_PROPERTY],
    location,
  );
}

export function serializeTemplate(doc: TemplateDocument): string {
  return doc.toString();
}
