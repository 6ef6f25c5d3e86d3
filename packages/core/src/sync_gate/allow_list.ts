import picomatch from 'picomatch';

export function normalizeSyncPath(filePath: string): string {
  return filePath.replace(/\\/g, '/').replace(/^(\.\/)+/, '');
}

export type PathMatcher = (filePath: string) => boolean;

/**
 * Builds the allow-list predicate. Excluded patterns win over the list.
 */
export function createAllowListMatcher(
  allowList: readonly string[],
  excludedPatterns: readonly string[],
): PathMatcher {
  const isExcluded: PathMatcher = excludedPatterns.length > 0
    ? picomatch([...excludedPatterns], { dot: true })
    : () => false;

  return (filePath: string) => {
    const normalized = normalizeSyncPath(filePath);
    if (normalized === '' || normalized.split('/').includes('..')) {
      return false;
    }
    if (isExcluded(normalized)) {
      return false;
    }
    return allowList.some((entry) =>
      entry.endsWith('/') ? normalized.startsWith(entry) && normalized.length > entry.length : normalized === entry,
    );
  };
}
