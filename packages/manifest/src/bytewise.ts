/**
 * Byte-wise ("C" locale) path ordering
 */

/**
 * Compare two strings by the bytes of their UTF-8 encodings.
 */
export function compareBytes(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

/**
 * Stable byte-wise sort; returns a new array.
 */
export function sortBytewise(list: readonly string[]): string[] {
  return [...list].sort(compareBytes);
}

export interface OrderingViolation {
  /** Position in the list where the sorted order first differs */
  index: number;
  /** The path that sits at `index` */
  found: string;
  /** The path that belongs at `index` */
  expected: string;
}

/**
 * Compare `list` with its sorted copy and report the first position where they
 * differ, or `undefined` when the list is already sorted.
 */
export function findFirstMisordered(list: readonly string[]): OrderingViolation | undefined {
  const sorted = sortBytewise(list);
  for (let index = 0; index < list.length; index++) {
    const found = list[index];
    const expected = sorted[index];
    if (found !== undefined && expected !== undefined && found !== expected) {
      return { index, found, expected };
    }
  }
  return undefined;
}
