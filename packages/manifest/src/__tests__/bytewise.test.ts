import { describe, it, expect } from 'vitest';
import { compareBytes, sortBytewise, findFirstMisordered } from '../bytewise.js';

describe('compareBytes', () => {
  it('orders uppercase before lowercase', () => {
    expect(compareBytes('src/Z.rs', 'src/a.rs')).toBeLessThan(0);
  });

  it('orders by byte value rather than locale', () => {
    // '-' (0x2d) sorts before '/' (0x2f) and '_' (0x5f) after 'Z'
    expect(sortBytewise(['src/a/b.rs', 'src/a-b.rs', 'src/a_b.rs', 'src/aZ.rs'])).toEqual([
      'src/a-b.rs',
      'src/a/b.rs',
      'src/aZ.rs',
      'src/a_b.rs',
    ]);
  });

  it('compares multi-byte characters by their UTF-8 encoding', () => {
    // U+00E9 encodes as 0xc3 0xa9, which is greater than any ASCII byte
    expect(compareBytes('é', 'z')).toBeGreaterThan(0);
  });

  it('returns zero for equal strings', () => {
    expect(compareBytes('src/main.rs', 'src/main.rs')).toBe(0);
  });
});

describe('sortBytewise', () => {
  it('does not modify its input', () => {
    const input = ['b', 'a'];
    expect(sortBytewise(input)).toEqual(['a', 'b']);
    expect(input).toEqual(['b', 'a']);
  });

  it('keeps duplicates', () => {
    expect(sortBytewise(['b', 'a', 'b'])).toEqual(['a', 'b', 'b']);
  });
});

describe('findFirstMisordered', () => {
  it('returns undefined for a sorted list', () => {
    expect(findFirstMisordered(['src/a.rs', 'src/b.rs', 'src/c.ui'])).toBeUndefined();
  });

  it('returns undefined for an empty list', () => {
    expect(findFirstMisordered([])).toBeUndefined();
  });

  it('names a transposed adjacent pair', () => {
    expect(findFirstMisordered(['src/b.rs', 'src/a.rs'])).toEqual({
      index: 0,
      found: 'src/b.rs',
      expected: 'src/a.rs',
    });
  });

  it('reports only the first violation', () => {
    expect(findFirstMisordered(['a', 'c', 'b', 'e', 'd'])).toEqual({
      index: 1,
      found: 'c',
      expected: 'b',
    });
  });

  it('accepts adjacent duplicates', () => {
    expect(findFirstMisordered(['a', 'a', 'b'])).toBeUndefined();
  });
});
