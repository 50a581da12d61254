/**
 * Line-oriented list files (POTFILES.in, POTFILES.skip, Blueprint resource lists)
 */

import * as fs from 'fs';
import { ManifestFileError } from './errors.js';

export interface ListEntry {
  path: string;
  /** 1-based line number in the list file */
  line: number;
}

/**
 * Parse list file content. Each line is trimmed; blank lines and lines
 * starting with `#` are ignored.
 */
export function parseListFile(content: string): ListEntry[] {
  const entries: ListEntry[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((raw, index) => {
    const path = raw.trim();
    if (path === '' || path.startsWith('#')) return;
    entries.push({ path, line: index + 1 });
  });

  return entries;
}

/**
 * Read and parse a list file.
 *
 * @param optional - return an empty list instead of throwing when the file does not exist
 */
export function readListFile(filePath: string, optional: boolean = false): ListEntry[] {
  if (!fs.existsSync(filePath)) {
    if (optional) return [];
    throw new ManifestFileError(`List file not found: ${filePath}`, filePath);
  }

  try {
    return parseListFile(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ManifestFileError(
      `Failed to read list file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * True when `filePath` names an existing regular file (symlinks are followed).
 */
export function isRegularFile(filePath: string): boolean {
  const stats = fs.statSync(filePath, { throwIfNoEntry: false });
  return stats?.isFile() ?? false;
}
