/**
 * Basename pattern matching for ignore rules and name filters.
 *
 * Patterns are matched against basenames (not full paths), case-insensitively:
 *
 *   "node_modules"  → exact match
 *   "temp*"         → starts with "temp"
 *   "*cache"        → ends with "cache"
 *   "*temp*"        → contains "temp"
 *   "draft-*.md"    → "*" may also sit in the middle; "?" is one character
 */

const cache = new Map<string, RegExp>();

/**
 * Compile a wildcard pattern to an anchored, case-insensitive RegExp.
 */
export function wildcardToRegExp(pattern: string): RegExp {
  const cached = cache.get(pattern);
  if (cached) return cached;

  let source = '';
  for (const ch of pattern) {
    if (ch === '*') source += '.*';
    else if (ch === '?') source += '.';
    else source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  }
  const regex = new RegExp(`^${source}$`, 'is');
  cache.set(pattern, regex);
  return regex;
}

/**
 * Test whether a basename matches a single pattern.
 */
export function matchesPattern(basename: string, pattern: string): boolean {
  if (!pattern.includes('*') && !pattern.includes('?')) {
    return basename.toLowerCase() === pattern.toLowerCase();
  }
  return wildcardToRegExp(pattern).test(basename);
}

/**
 * Test whether a basename matches any pattern in a list.
 */
export function matchesAnyPattern(basename: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => matchesPattern(basename, pattern));
}

/**
 * Build a name filter from a user-supplied pattern. With `useRegex` the
 * pattern is a regular expression searched anywhere in the name; otherwise
 * it is a wildcard pattern matched against the whole name.
 * Throws when the regular expression does not compile.
 */
export function createNameFilter(pattern: string, useRegex = false): (basename: string) => boolean {
  if (!useRegex) {
    return (basename) => matchesPattern(basename, pattern);
  }
  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid regular expression "${pattern}": ${message}`);
  }
  return (basename) => regex.test(basename);
}
