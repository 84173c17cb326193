/**
 * Minimal gitignore-style globs for repository-relative paths.
 *
 * `**` crosses directories, `*` and `?` stay within one segment, a pattern
 * without a slash matches the file name at any depth.
 */

export function compileGlob(pattern: string): RegExp | null {
  let normalized = pattern.trim().replace(/\\/g, '/');
  if (!normalized || normalized.startsWith('#')) return null;
  if (normalized.startsWith('/')) {
    normalized = normalized.slice(1);
  } else if (!normalized.includes('/')) {
    normalized = `**/${normalized}`;
  }
  if (normalized.endsWith('/')) normalized = `${normalized}**`;

  const withPlaceholders = normalized
    .replace(/\*\*\//g, '__GLOBSTAR_DIR__')
    .replace(/\*\*/g, '__GLOBSTAR__')
    .replace(/\*/g, '__STAR__')
    .replace(/\?/g, '__QMARK__');
  const escaped = withPlaceholders.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  const expanded = escaped
    .replace(/__GLOBSTAR_DIR__/g, '(?:.*/)?')
    .replace(/__GLOBSTAR__/g, '.*')
    .replace(/__STAR__/g, '[^/]*')
    .replace(/__QMARK__/g, '[^/]');
  return new RegExp(`^${expanded}$`);
}

export function buildExcludeMatchers(patterns: readonly string[]): RegExp[] {
  const matchers: RegExp[] = [];
  for (const pattern of patterns) {
    const matcher = compileGlob(pattern);
    if (matcher) matchers.push(matcher);
  }
  return matchers;
}

export function isExcluded(pathname: string, matchers: readonly RegExp[]): boolean {
  return matchers.some((matcher) => matcher.test(pathname));
}
