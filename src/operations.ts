import {
  HttpMethod,
  JsonSchema,
  OpenAPIDocument,
  OperationDescriptor,
  OperationParameter,
  ParameterLocation
} from './types.js';
import { isHttpMethod } from './filter-validator.js';

const PARAMETER_LOCATIONS: Record<string, ParameterLocation | undefined> = {
  path: 'path',
  query: 'query',
  header: 'header'
};

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolves local `#/...` references against the document. Recursive schemas
 * are cut at the first repeat and replaced with an empty schema.
 */
export class RefResolver {
  constructor(private document: OpenAPIDocument) {}

  resolve(value: unknown, seen: ReadonlySet<string> = new Set()): unknown {
    if (Array.isArray(value)) {
      return value.map(item => this.resolve(item, seen));
    }
    if (!isObject(value)) {
      return value;
    }

    const ref = value['$ref'];
    if (typeof ref === 'string') {
      if (seen.has(ref)) {
        return {};
      }
      const target = this.lookup(ref);
      return target === undefined ? {} : this.resolve(target, new Set([...seen, ref]));
    }

    const resolved: JsonObject = {};
    for (const [key, child] of Object.entries(value)) {
      resolved[key] = this.resolve(child, seen);
    }
    return resolved;
  }

  lookup(ref: string): unknown {
    if (!ref.startsWith('#/')) {
      return undefined;
    }
    let current: unknown = this.document;
    for (const rawSegment of ref.slice(2).split('/')) {
      const segment = decodeURIComponent(rawSegment).replace(/~1/g, '/').replace(/~0/g, '~');
      if (!isObject(current)) {
        return undefined;
      }
      current = current[segment];
    }
    return current;
  }
}

/**
 * Flattens the document into one descriptor per (method, path), in document
 * order. Path-level parameters apply to every operation under the path unless
 * the operation redefines the same name and location.
 */
export function extractOperations(document: OpenAPIDocument): OperationDescriptor[] {
  const resolver = new RefResolver(document);
  const operations: OperationDescriptor[] = [];

  for (const [path, rawPathItem] of Object.entries(document.paths)) {
    const pathItem = resolver.resolve(rawPathItem);
    if (!isObject(pathItem)) {
      continue;
    }
    const sharedParameters = readParameters(pathItem['parameters']);

    for (const [key, rawOperation] of Object.entries(pathItem)) {
      const method = key.toUpperCase();
      if (!isHttpMethod(method) || !isObject(rawOperation)) {
        continue;
      }
      operations.push(buildDescriptor(method, path, rawOperation, sharedParameters));
    }
  }

  return operations;
}

function buildDescriptor(
  method: HttpMethod,
  path: string,
  operation: JsonObject,
  sharedParameters: OperationParameter[]
): OperationDescriptor {
  const ownParameters = readParameters(operation['parameters']);
  const parameters = [
    ...sharedParameters.filter(shared =>
      !ownParameters.some(own => own.name === shared.name && own.location === shared.location)),
    ...ownParameters
  ];

  const body = readRequestBody(operation['requestBody']);
  parameters.push(...body.parameters);

  const rawTags = operation['tags'];
  const tags = Array.isArray(rawTags)
    ? rawTags.filter((tag): tag is string => typeof tag === 'string')
    : [];

  const descriptor: OperationDescriptor = {
    method,
    path,
    operationId: asString(operation['operationId']),
    parameters: parameters.map(parameter => Object.freeze(parameter)),
    tags,
    summary: asString(operation['summary']),
    description: asString(operation['description']),
    rawBody: body.raw
  };

  Object.freeze(descriptor.parameters);
  Object.freeze(descriptor.tags);
  return Object.freeze(descriptor);
}

function readParameters(value: unknown): OperationParameter[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const parameters: OperationParameter[] = [];
  for (const item of value) {
    const name = isObject(item) ? item['name'] : undefined;
    if (!isObject(item) || typeof name !== 'string') {
      continue;
    }
    // Cookie parameters are not sent
    const location = PARAMETER_LOCATIONS[String(item['in'])];
    if (!location) {
      continue;
    }
    const schema = item['schema'];
    parameters.push({
      name,
      location,
      // Path parameters are always required
      required: location === 'path' || item['required'] === true,
      schema: isObject(schema) ? schema : { type: 'string' },
      description: asString(item['description'])
    });
  }
  return parameters;
}

function readRequestBody(value: unknown): { parameters: OperationParameter[]; raw: boolean } {
  const content = isObject(value) ? value['content'] : undefined;
  if (!isObject(value) || !isObject(content)) {
    return { parameters: [], raw: false };
  }

  const media = content['application/json'] ?? Object.values(content)[0];
  const mediaSchema = isObject(media) ? media['schema'] : undefined;
  const schema: JsonSchema = isObject(mediaSchema) ? mediaSchema : {};
  const bodyRequired = value['required'] === true;
  const properties = schema['properties'];

  if (!isObject(properties)) {
    return {
      parameters: [{
        name: 'body',
        location: 'body',
        required: bodyRequired,
        schema,
        description: asString(value['description'])
      }],
      raw: true
    };
  }

  const requiredList = schema['required'];
  const requiredProperties: unknown[] = Array.isArray(requiredList) ? requiredList : [];
  return {
    parameters: Object.entries(properties).map(([name, propertySchema]) => ({
      name,
      location: 'body' as const,
      required: requiredProperties.includes(name),
      schema: isObject(propertySchema) ? propertySchema : {}
    })),
    raw: false
  };
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}
