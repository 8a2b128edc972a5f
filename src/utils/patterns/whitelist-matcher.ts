/**
 * Glob matching of diagnostic messages against whitelist patterns.
 *
 * `*` matches any run of characters (including none), `?` exactly one
 * character. Everything else is literal. The whole message has to match
 * and case is ignored.
 */

const compiled = new Map<string, RegExp>();

/**
 * Convert a glob pattern to an anchored, case-insensitive RegExp
 */
export function globToRegExp(pattern: string): RegExp {
  const cached = compiled.get(pattern);
  if (cached) {
    return cached;
  }

  let source = '';
  for (const char of pattern) {
    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else {
      source += char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }

  // `s` so that `*` also spans multi-line stack traces
  const regex = new RegExp(`^${source}$`, 'is');
  compiled.set(pattern, regex);
  return regex;
}

/**
 * Test one message against one pattern
 */
export function matchesGlob(message: string, pattern: string): boolean {
  return globToRegExp(pattern).test(message);
}

/**
 * True if any pattern matches the message
 */
export function isWhitelisted(message: string, patterns: readonly string[]): boolean {
  if (!message || patterns.length === 0) {
    return false;
  }
  return patterns.some((pattern) => matchesGlob(message, pattern));
}
