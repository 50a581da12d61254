/**
 * File categories and the markers that make a file translatable
 */

export type FileCategory = 'ui' | 'blueprint' | 'source';

export const FILE_CATEGORIES: readonly FileCategory[] = ['ui', 'blueprint', 'source'];

export interface CategoryRule {
  category: FileCategory;
  /** File name suffix, including the dot */
  extension: string;
  /** A file of this category is translatable when its content matches */
  marker: RegExp;
}

export interface ScanRules {
  categories: readonly CategoryRule[];
  /** Pattern that must never appear in files of the `source` category */
  disallowedMacro: RegExp;
}

export const DEFAULT_SCAN_RULES: ScanRules = {
  categories: [
    { category: 'ui', extension: '.ui', marker: /translatable="yes"/ },
    { category: 'blueprint', extension: '.blp', marker: /_\(/ },
    { category: 'source', extension: '.rs', marker: /gettext(_f)?\(/ },
  ],
  disallowedMacro: /gettext!\(/,
};

/**
 * Marker overrides as regular expression sources, keyed by category
 * (plus `macro` for the disallowed pattern).
 */
export type MarkerOverrides = Partial<Record<FileCategory | 'macro', string>>;

export function createScanRules(overrides: MarkerOverrides = {}): ScanRules {
  return {
    categories: DEFAULT_SCAN_RULES.categories.map(rule => {
      const source = overrides[rule.category];
      return source === undefined ? rule : { ...rule, marker: new RegExp(source) };
    }),
    disallowedMacro: overrides.macro === undefined
      ? DEFAULT_SCAN_RULES.disallowedMacro
      : new RegExp(overrides.macro),
  };
}

/**
 * Category of `path` by extension, or `undefined` when no rule applies.
 */
export function categorize(
  path: string,
  rules: ScanRules = DEFAULT_SCAN_RULES
): FileCategory | undefined {
  return rules.categories.find(rule => path.endsWith(rule.extension))?.category;
}

export type CategoryBuckets = Record<FileCategory, string[]>;

export function emptyBuckets(): CategoryBuckets {
  return { ui: [], blueprint: [], source: [] };
}

/**
 * Split paths into per-category buckets, keeping input order and dropping
 * paths that match no category.
 */
export function bucketByCategory(
  paths: readonly string[],
  rules: ScanRules = DEFAULT_SCAN_RULES
): CategoryBuckets {
  const buckets = emptyBuckets();
  for (const path of paths) {
    const category = categorize(path, rules);
    if (category) buckets[category].push(path);
  }
  return buckets;
}
