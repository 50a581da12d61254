/**
 * Translation Manifest Validator
 *
 * Cross-references the translation manifest (and its skip list) with the
 * files that actually contain translatable strings, checks for the
 * disallowed gettext macro, and checks that the manifest is sorted.
 */

import * as path from 'path';
import { findFirstMisordered, type OrderingViolation } from './bytewise.js';
import {
  DEFAULT_SCAN_RULES,
  FILE_CATEGORIES,
  bucketByCategory,
  categorize,
  type FileCategory,
  type ScanRules,
} from './categories.js';
import { isRegularFile, readListFile, type ListEntry } from './list-file.js';
import { silentLogger, type Logger } from './logger.js';
import { cancelCommon } from './multiset.js';
import { scanTree } from './scanner.js';

export interface ValidateManifestOptions {
  projectRoot: string;
  /** Manifest path relative to the project root */
  manifest: string;
  /** Skip list path relative to the project root; a missing file counts as empty */
  skip?: string;
  /** Directory scanned for translatable files, relative to the project root */
  scanRoot: string;
  rules?: ScanRules;
  logger?: Logger;
}

export type ListOrigin = 'manifest' | 'skip';

export interface MissingEntry extends ListEntry {
  origin: ListOrigin;
}

export interface StaleEntry {
  path: string;
  category: FileCategory;
  origin: ListOrigin;
}

export interface UndeclaredFile {
  path: string;
  category: FileCategory;
}

export interface ManifestReport {
  manifest: string;
  skip?: string;
  /** Declared paths that do not exist; when non-empty nothing else was checked */
  missing: MissingEntry[];
  /** Declared paths without translatable strings */
  stale: StaleEntry[];
  /** Files with translatable strings that are not declared */
  undeclared: UndeclaredFile[];
  /** Source files using the disallowed macro */
  macroUsage: string[];
  ordering?: OrderingViolation;
  passed: boolean;
}

export async function validateManifest(options: ValidateManifestOptions): Promise<ManifestReport> {
  const { projectRoot, manifest, skip, scanRoot } = options;
  const rules = options.rules ?? DEFAULT_SCAN_RULES;
  const logger = (options.logger ?? silentLogger).child({ manifest });

  const manifestEntries = readListFile(path.resolve(projectRoot, manifest));
  const skipEntries = skip ? readListFile(path.resolve(projectRoot, skip), true) : [];
  logger.debug(`Read ${manifestEntries.length} manifest entries and ${skipEntries.length} skip entries`);

  const missing: MissingEntry[] = [
    ...findMissing(projectRoot, manifestEntries, 'manifest'),
    ...findMissing(projectRoot, skipEntries, 'skip'),
  ];
  if (missing.length > 0) {
    return {
      manifest,
      skip,
      missing,
      stale: [],
      undeclared: [],
      macroUsage: [],
      passed: false,
    };
  }

  const declared = bucketByCategory(manifestEntries.map(entry => entry.path), rules);
  const skipped = bucketByCategory(skipEntries.map(entry => entry.path), rules);
  const scan = await scanTree(projectRoot, scanRoot, rules, logger);

  const stale: StaleEntry[] = [];
  const undeclared: UndeclaredFile[] = [];

  for (const category of FILE_CATEGORIES) {
    const afterSkip = cancelCommon(skipped[category], scan.discovered[category]);
    const afterManifest = cancelCommon(declared[category], afterSkip.found);

    for (const p of afterManifest.declared) stale.push({ path: p, category, origin: 'manifest' });
    for (const p of afterSkip.declared) stale.push({ path: p, category, origin: 'skip' });
    for (const p of afterManifest.found) undeclared.push({ path: p, category });

    logger.debug(
      `${category}: ${scan.discovered[category].length} discovered, ` +
      `${afterManifest.declared.length + afterSkip.declared.length} stale, ` +
      `${afterManifest.found.length} undeclared`
    );
  }

  const ordered = manifestEntries
    .map(entry => entry.path)
    .filter(p => categorize(p, rules) !== undefined);
  const ordering = findFirstMisordered(ordered);

  return {
    manifest,
    skip,
    missing,
    stale,
    undeclared,
    macroUsage: scan.macroUsage,
    ordering,
    passed:
      stale.length === 0 &&
      undeclared.length === 0 &&
      scan.macroUsage.length === 0 &&
      ordering === undefined,
  };
}

function findMissing(
  projectRoot: string,
  entries: readonly ListEntry[],
  origin: ListOrigin
): MissingEntry[] {
  return entries
    .filter(entry => !isRegularFile(path.resolve(projectRoot, entry.path)))
    .map(entry => ({ ...entry, origin }));
}
