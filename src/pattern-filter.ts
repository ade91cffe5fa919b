import { PathPattern } from './types.js';
import { InvalidPatternError } from './errors.js';

/**
 * Compiles a user supplied path pattern. Patterns are plain regular
 * expressions matched anywhere in the path template, so `{id}` in a pattern
 * is literal text unless the pattern itself wildcards it.
 */
export function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    throw new InvalidPatternError(source, (error as Error).message);
  }
}

/**
 * Combines include patterns into one alternation. Every source is compiled
 * on its own and the alternation matches when any of them does, so anchors,
 * capture groups and backreferences keep the meaning they have alone.
 */
export function combinePatterns(sources: readonly string[]): PathPattern {
  if (sources.length === 0) {
    throw new InvalidPatternError('', 'no patterns to combine');
  }

  return Object.freeze({
    source: sources.join('|'),
    alternatives: Object.freeze(sources.map(compilePattern))
  });
}

export function matchesPath(pattern: PathPattern | RegExp, path: string): boolean {
  const alternatives = pattern instanceof RegExp ? [pattern] : pattern.alternatives;
  return alternatives.some(expression => {
    // Stateful flags would make repeated test() calls depend on lastIndex
    expression.lastIndex = 0;
    return expression.test(path);
  });
}

export function isValidPattern(source: string): boolean {
  try {
    compilePattern(source);
    return true;
  } catch {
    return false;
  }
}
