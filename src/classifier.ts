import {
  Classification,
  JsonSchema,
  OperationDescriptor,
  ParameterBinding,
  RouteOutcome,
  RoutingRule,
  ToolBinding,
  ToolInputSchema
} from './types.js';
import { matchesPath } from './pattern-filter.js';
import { NameCollisionError } from './errors.js';

export const DEFAULT_MAX_TOOL_NAME_LENGTH = 64;

export interface ClassifierOptions {
  baseUrl: string;
  maxToolNameLength?: number;
}

/**
 * Derives the tool name from method and path: lower-cased method, then the
 * path with every run of non-alphanumeric characters collapsed to `_`.
 * Placeholder syntax does not matter, `/widget/{id}` and `/widget/:id` give
 * the same name.
 */
export function deriveToolName(method: string, path: string, maxLength = DEFAULT_MAX_TOOL_NAME_LENGTH): string {
  const slug = path
    .replace(/[^A-Za-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();

  const name = `${method.toLowerCase()}_${slug || 'root'}`;
  return name.length > maxLength ? name.substring(0, maxLength).replace(/_+$/, '') : name;
}

export function ruleMatches(rule: RoutingRule, operation: OperationDescriptor): boolean {
  if (rule.methods && !rule.methods.has(operation.method)) {
    return false;
  }
  if (rule.pattern && !matchesPath(rule.pattern, operation.path)) {
    return false;
  }
  if (rule.tags && !operation.tags.some(tag => rule.tags?.has(tag))) {
    return false;
  }
  return true;
}

/**
 * First matching rule decides. Without rules, or when nothing matches, the
 * operation becomes a tool.
 */
export function resolveOutcome(operation: OperationDescriptor, rules: readonly RoutingRule[] | null): RouteOutcome {
  const rule = rules?.find(candidate => ruleMatches(candidate, operation));
  return rule ? rule.outcome : 'tool';
}

export function classifyOperations(
  operations: readonly OperationDescriptor[],
  rules: readonly RoutingRule[] | null,
  options: ClassifierOptions
): Classification {
  const maxLength = options.maxToolNameLength ?? DEFAULT_MAX_TOOL_NAME_LENGTH;
  const tools = new Map<string, ToolBinding>();
  const excluded: OperationDescriptor[] = [];

  for (const operation of operations) {
    if (resolveOutcome(operation, rules) === 'exclude') {
      excluded.push(operation);
      continue;
    }

    const name = deriveToolName(operation.method, operation.path, maxLength);
    const existing = tools.get(name);
    if (existing) {
      throw new NameCollisionError(name, describeOperation(existing.operation), describeOperation(operation));
    }
    tools.set(name, createToolBinding(name, operation, options.baseUrl));
  }

  return { tools, excluded };
}

export function describeOperation(operation: OperationDescriptor): string {
  return `${operation.method} ${operation.path}`;
}

function createToolBinding(name: string, operation: OperationDescriptor, baseUrl: string): ToolBinding {
  const parameters = bindParameters(operation);

  return {
    name,
    description: operation.summary || operation.description || describeOperation(operation),
    inputSchema: buildInputSchema(operation, parameters),
    operation,
    call: {
      baseUrl,
      method: operation.method,
      pathTemplate: operation.path,
      parameters,
      rawBody: operation.rawBody === true
    }
  };
}

// Path parameters keep their names; a later parameter whose name is already
// taken gets a location suffix, e.g. `id__query`.
function bindParameters(operation: OperationDescriptor): ParameterBinding[] {
  const ordered = [
    ...operation.parameters.filter(p => p.location === 'path'),
    ...operation.parameters.filter(p => p.location !== 'path')
  ];
  const taken = new Set<string>();

  return ordered.map(parameter => {
    const argument = taken.has(parameter.name) ? `${parameter.name}__${parameter.location}` : parameter.name;
    taken.add(argument);
    return {
      argument,
      name: parameter.name,
      location: parameter.location,
      required: parameter.required
    };
  });
}

function buildInputSchema(operation: OperationDescriptor, bindings: ParameterBinding[]): ToolInputSchema {
  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];

  for (const binding of bindings) {
    const parameter = operation.parameters.find(p => p.name === binding.name && p.location === binding.location);
    const schema: JsonSchema = { ...(parameter?.schema ?? { type: 'string' }) };
    if (parameter?.description && schema.description === undefined) {
      schema.description = parameter.description;
    }
    properties[binding.argument] = schema;
    if (binding.required) required.push(binding.argument);
  }

  return {
    type: 'object',
    properties,
    required
  };
}
