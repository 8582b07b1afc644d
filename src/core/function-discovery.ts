import { Value } from '@sinclair/typebox/value';
import { resolve } from 'path';
import { BaseLogger } from 'pino';
import { TemplateLoadError, UnsupportedRuntimeError } from './errors';
import { getRuntimeTools } from './runtimeTools';
import { RuntimeTools } from './runtimeTools/types/runtime-tools';
import {
  FunctionProperties,
  FunctionPropertiesSchema,
} from './schemas/function-properties-schema';
import {
  FUNCTION_RESOURCE_TYPE,
  getGlobals,
  listResources,
  TemplateDocument,
} from './template-model';

export type FunctionDescriptor = Readonly<{
  name: string;
  /** Code reference as declared in the template. */
  codeUri: string;
  /** `codeUri` resolved against the template directory. */
  sourceDir: string;
  runtime: string;
  tools: RuntimeTools;
}>;

function validateProperties(
  resourceName: string,
  properties: unknown,
): FunctionProperties {
  if (!Value.Check(FunctionPropertiesSchema, properties)) {
    const [first] = [...Value.Errors(FunctionPropertiesSchema, properties)];
    throw new TemplateLoadError(
      `Function "${resourceName}" has invalid properties${
        first ? ` at "${first.path}": ${first.message}` : ''
      }.`,
    );
  }
  return properties;
}

function isLocalPath(codeUri: string): boolean {
  return !/^[a-z][a-z0-9+.-]*:\/\//i.test(codeUri);
}

/**
 * Derives one descriptor per function resource that still needs packaging, in
 * declaration order. Every function is checked before any is returned, so an
 * unsupported runtime anywhere in the template fails the whole discovery.
 */
export function discoverFunctions(
  doc: TemplateDocument,
  templateDir: string,
  logger?: BaseLogger,
): FunctionDescriptor[] {
  const defaults = validateProperties('Globals', getGlobals(doc, 'Function'));
  const descriptors: FunctionDescriptor[] = [];

  for (const [name, definition] of listResources(doc)) {
    if (definition.type !== FUNCTION_RESOURCE_TYPE) {
      continue;
    }

    const properties = validateProperties(name, definition.properties);
    const runtime = properties.Runtime ?? defaults.Runtime;
    const tools = runtime ? getRuntimeTools(runtime) : undefined;
    if (!runtime || !tools) {
      throw new UnsupportedRuntimeError(name, runtime);
    }

    const codeUri = properties.CodeUri ?? defaults.CodeUri;
    if (codeUri === undefined) {
      throw new TemplateLoadError(`Function "${name}" does not declare a CodeUri.`);
    }
    if (typeof codeUri !== 'string' || !isLocalPath(codeUri)) {
      logger?.info(
        { resource: name },
        'Function code already references a remote location. Skipping.',
      );
      continue;
    }

    descriptors.push({
      name,
      codeUri,
      sourceDir: resolve(templateDir, codeUri),
      runtime,
      tools,
    });
  }

  return descriptors;
}
