import { FilterConfig, FilterPrecedence, HTTP_METHODS, HttpMethod, RoutingRule } from './types.js';
import { combinePatterns } from './pattern-filter.js';

/**
 * Turns a validated filter configuration into an ordered rule list. Rules are
 * evaluated first-match-wins, so the order of the returned array is the
 * precedence.
 *
 * Returns null when no filter was requested at all; the classifier then turns
 * every operation into a tool.
 *
 * With `declared-order` the list is: the combined include rule, one exclude
 * rule per disallowed method, one per exclude pattern, one per excluded tag.
 * With `exclusion-wins` (the default) the same exclude rules come first and
 * the include rule follows them, so an excluded tag or path always removes
 * the operation. In both orders a catch-all exclude closes the list whenever
 * an include rule was emitted, so operations outside the include criteria do
 * not fall through to the classifier's default.
 */
export function createRouteMapsFromFilters(
  config: FilterConfig,
  precedence: FilterPrecedence = 'exclusion-wins'
): RoutingRule[] | null {
  const includeRule = buildIncludeRule(config);
  const exclusionRules = [
    ...buildMethodExclusions(config.methods),
    ...(config.excludePaths ?? []).map(pattern => freezeRule({ pattern: combinePatterns([pattern]), outcome: 'exclude' })),
    ...[...(config.excludeTags ?? [])].map(tag => freezeRule({ tags: new Set([tag]), outcome: 'exclude' }))
  ];

  const rules: RoutingRule[] = [];
  if (precedence === 'declared-order') {
    if (includeRule) rules.push(includeRule);
    rules.push(...exclusionRules);
  } else {
    rules.push(...exclusionRules);
    if (includeRule) rules.push(includeRule);
  }

  if (includeRule) {
    rules.push(freezeRule({ outcome: 'exclude' }));
  }

  return rules.length > 0 ? rules : null;
}

function buildIncludeRule(config: FilterConfig): RoutingRule | undefined {
  const methods = config.methods && config.methods.length > 0 ? new Set(config.methods) : undefined;
  const pattern = config.includePaths && config.includePaths.length > 0 ? combinePatterns(config.includePaths) : undefined;
  const tags = config.includeTags && config.includeTags.size > 0 ? new Set(config.includeTags) : undefined;

  if (!methods && !pattern && !tags) {
    return undefined;
  }

  // Dimensions left undefined impose no constraint
  return freezeRule({ methods, pattern, tags, outcome: 'tool' });
}

function buildMethodExclusions(allowed: readonly HttpMethod[] | undefined): RoutingRule[] {
  if (!allowed || allowed.length === 0) {
    return [];
  }
  return HTTP_METHODS
    .filter(method => !allowed.includes(method))
    .map(method => freezeRule({ methods: new Set([method]), outcome: 'exclude' }));
}

function freezeRule(rule: RoutingRule): RoutingRule {
  return Object.freeze(rule);
}

export function describeRule(rule: RoutingRule): string {
  const parts: string[] = [];
  if (rule.methods) parts.push(`methods=${[...rule.methods].join('|')}`);
  if (rule.pattern) parts.push(`pattern=${rule.pattern.source}`);
  if (rule.tags) parts.push(`tags=${[...rule.tags].join('|')}`);
  return `${rule.outcome.toUpperCase()}(${parts.length > 0 ? parts.join(', ') : '*'})`;
}
