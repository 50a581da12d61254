/**
 * Multiset difference between declared and discovered paths
 */

export interface CancelResult {
  /** Declared paths with no discovered counterpart, in input order */
  declared: string[];
  /** Discovered paths with no declared counterpart, in input order */
  found: string[];
}

/**
 * Cancel declared paths against discovered paths one-for-one.
 *
 * A path listed twice in `declared` but discovered once leaves one declared
 * occurrence behind, and vice versa.
 */
export function cancelCommon(declared: readonly string[], found: readonly string[]): CancelResult {
  const available = new Map<string, number>();
  for (const path of found) {
    available.set(path, (available.get(path) ?? 0) + 1);
  }

  const matched = new Map<string, number>();
  const remainingDeclared: string[] = [];
  for (const path of declared) {
    const count = available.get(path) ?? 0;
    if (count > 0) {
      available.set(path, count - 1);
      matched.set(path, (matched.get(path) ?? 0) + 1);
    } else {
      remainingDeclared.push(path);
    }
  }

  const remainingFound: string[] = [];
  for (const path of found) {
    const count = matched.get(path) ?? 0;
    if (count > 0) {
      matched.set(path, count - 1);
    } else {
      remainingFound.push(path);
    }
  }

  return { declared: remainingDeclared, found: remainingFound };
}
