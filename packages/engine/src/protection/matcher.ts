const WILDCARD = '*';
const NAMESPACE_SUFFIX = '/*';

/**
 * Returns why `pattern` is not a usable protected-branch pattern, or
 * `undefined`. Accepted forms: an exact branch name, `*`, or `<ns>/*`.
 */
export function protectedPatternProblem(pattern: string): string | undefined {
  if (!pattern.trim()) {
    return 'pattern must not be empty';
  }
  if (pattern === WILDCARD) {
    return undefined;
  }

  const literal = pattern.endsWith(NAMESPACE_SUFFIX) ? pattern.slice(0, -NAMESPACE_SUFFIX.length) : pattern;
  if (!literal) {
    return 'namespace wildcard needs a prefix before "/*"';
  }
  if (literal.includes(WILDCARD)) {
    return 'only "*" or a trailing "/*" may use a wildcard';
  }
  return undefined;
}

function matches(branch: string, pattern: string): boolean {
  if (pattern === WILDCARD) {
    return true;
  }

  if (pattern.endsWith(NAMESPACE_SUFFIX)) {
    const namespace = pattern.slice(0, -NAMESPACE_SUFFIX.length);
    if (!branch.startsWith(`${namespace}/`)) {
      return false;
    }
    const rest = branch.slice(namespace.length + 1);
    return rest.length > 0 && !rest.includes('/');
  }

  return branch === pattern;
}

/** First pattern, in configured order, that protects `branch`. */
export function findProtectingPattern(branch: string, patterns: readonly string[]): string | undefined {
  return patterns.find((pattern) => matches(branch, pattern));
}

export function isProtected(branch: string, patterns: readonly string[]): boolean {
  return findProtectingPattern(branch, patterns) !== undefined;
}
