import { FilterConfig, FilterOptions, HTTP_METHODS, HttpMethod } from './types.js';
import { isValidPattern } from './pattern-filter.js';
import { ValidationError } from './errors.js';

/**
 * Splits a comma-separated option into trimmed entries, dropping empty ones.
 * Returns undefined when nothing is left so "absent" has a single shape.
 */
export function parseCommaSeparated(value: string | undefined, transform?: (item: string) => string): string[] | undefined {
  if (!value) {
    return undefined;
  }

  const items = value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0)
    .map(item => (transform ? transform(item) : item));

  return items.length > 0 ? items : undefined;
}

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some(method => method === value);
}

export function hasAnyFilter(options: FilterOptions): boolean {
  return [options.methods, options.includePaths, options.excludePaths, options.includeTags, options.excludeTags]
    .some(value => parseCommaSeparated(value) !== undefined);
}

/**
 * Checks every filter option and reports all problems together. An empty
 * result means the options can be turned into a route map.
 */
export function validateFilterOptions(options: FilterOptions): string[] {
  const errors: string[] = [];

  const methods = parseCommaSeparated(options.methods, item => item.toUpperCase());
  if (methods) {
    const invalidMethods = methods.filter(method => !isHttpMethod(method));
    if (invalidMethods.length > 0) {
      errors.push(`Invalid HTTP methods: ${invalidMethods.join(', ')}. Valid methods: ${HTTP_METHODS.join(', ')}`);
    }
  }

  const pathLists: Array<[string | undefined, 'include' | 'exclude']> = [
    [options.includePaths, 'include'],
    [options.excludePaths, 'exclude']
  ];
  for (const [paths, label] of pathLists) {
    for (const pattern of parseCommaSeparated(paths) ?? []) {
      if (!isValidPattern(pattern)) {
        errors.push(`Invalid ${label} path pattern: ${pattern}`);
      }
    }
  }

  return errors;
}

/**
 * Validates and normalizes filter options in one step: methods are upper-cased,
 * tags are kept as written. Throws a ValidationError with every problem found.
 */
export function parseFilterConfig(options: FilterOptions): FilterConfig {
  const errors = validateFilterOptions(options);
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }

  const config: FilterConfig = {};
  const methods = parseCommaSeparated(options.methods, item => item.toUpperCase());
  if (methods) {
    config.methods = [...new Set(methods.filter(isHttpMethod))];
  }

  const includePaths = parseCommaSeparated(options.includePaths);
  if (includePaths) config.includePaths = includePaths;

  const excludePaths = parseCommaSeparated(options.excludePaths);
  if (excludePaths) config.excludePaths = excludePaths;

  const includeTags = parseCommaSeparated(options.includeTags);
  if (includeTags) config.includeTags = new Set(includeTags);

  const excludeTags = parseCommaSeparated(options.excludeTags);
  if (excludeTags) config.excludeTags = new Set(excludeTags);

  return config;
}
