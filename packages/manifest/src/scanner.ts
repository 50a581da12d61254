/**
 * Content scan for translatable-string markers
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import { sortBytewise } from './bytewise.js';
import { ManifestFileError } from './errors.js';
import {
  DEFAULT_SCAN_RULES,
  emptyBuckets,
  type CategoryBuckets,
  type ScanRules,
} from './categories.js';
import { silentLogger, type Logger } from './logger.js';

export interface ScanResult {
  /** Files whose content matches their category's marker */
  discovered: CategoryBuckets;
  /** Source files using the disallowed macro */
  macroUsage: string[];
}

/**
 * Walk `scanRoot` (relative to `projectRoot`) and collect the files of every
 * category whose content contains that category's marker.
 *
 * Returned paths are `scanRoot/relative/path` with forward slashes, sorted
 * byte-wise. Files containing a NUL byte are treated as binary and skipped.
 * A missing scan root yields empty results.
 *
 * @throws ManifestFileError when a matched file cannot be read
 */
export async function scanTree(
  projectRoot: string,
  scanRoot: string,
  rules: ScanRules = DEFAULT_SCAN_RULES,
  logger: Logger = silentLogger
): Promise<ScanResult> {
  const cwd = path.resolve(projectRoot, scanRoot);
  const prefix = scanRoot.split(path.sep).join('/').replace(/\/+$/, '');
  const discovered = emptyBuckets();
  const macroUsage: string[] = [];

  for (const rule of rules.categories) {
    const matches = await glob(`**/*${rule.extension}`, {
      cwd,
      nodir: true,
      dot: true,
      posix: true,
    });
    logger.debug(`Scanning ${matches.length} ${rule.extension} files under ${scanRoot}`);

    for (const relative of sortBytewise(matches)) {
      const content = readTextFile(path.join(cwd, relative));
      if (content === undefined) {
        logger.debug(`Skipping binary file ${relative}`);
        continue;
      }

      const projectPath = path.posix.join(prefix, relative);
      if (rule.marker.test(content)) {
        discovered[rule.category].push(projectPath);
      }
      if (rule.category === 'source' && rules.disallowedMacro.test(content)) {
        macroUsage.push(projectPath);
      }
    }
  }

  return { discovered, macroUsage: sortBytewise(macroUsage) };
}

/**
 * File content as UTF-8 text, or `undefined` for binary files.
 */
function readTextFile(filePath: string): string | undefined {
  let buffer: Buffer;
  try {
    buffer = fs.readFileSync(filePath);
  } catch (error) {
    throw new ManifestFileError(
      `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
  if (buffer.includes(0)) return undefined;
  return buffer.toString('utf8');
}
