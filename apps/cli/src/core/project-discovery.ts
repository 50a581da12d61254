/**
 * Project Discovery Module
 *
 * Responsible for finding the project root directory.
 * A directory counts as a project when it holds potcheck.json or a po/ directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError } from './configuration-error.js';
import { CONFIG_FILE_NAME } from './config-loader.js';

/**
 * Find project root: an explicit --root, then POTCHECK_ROOT, then the current directory
 *
 * @returns The absolute path to the project root
 * @throws ConfigurationError if the directory is missing or not a project
 */
export function findProjectRoot(explicitRoot?: string): string {
  if (explicitRoot) {
    return validateRoot(path.resolve(explicitRoot), '--root');
  }

  if (process.env.POTCHECK_ROOT) {
    return validateRoot(path.resolve(process.env.POTCHECK_ROOT), 'POTCHECK_ROOT');
  }

  const currentDir = process.cwd();
  if (!isProjectRoot(currentDir)) {
    throw new ConfigurationError(
      `Not in a project directory: ${currentDir}`,
      undefined,
      `Run from a directory containing ${CONFIG_FILE_NAME} or po/, pass --root, or set POTCHECK_ROOT`
    );
  }
  return currentDir;
}

function validateRoot(root: string, source: string): string {
  if (!fs.existsSync(root)) {
    throw new ConfigurationError(
      `${source} points to non-existent directory: ${root}`,
      undefined,
      `Check that ${source} is set correctly`
    );
  }

  if (!isProjectRoot(root)) {
    throw new ConfigurationError(
      `${source} does not point to a project: ${root}`,
      undefined,
      `Ensure ${source} points to a directory containing ${CONFIG_FILE_NAME} or po/`
    );
  }

  return root;
}

/**
 * Check if a path looks like a project root
 */
export function isProjectRoot(projectPath: string): boolean {
  return fs.existsSync(path.join(projectPath, CONFIG_FILE_NAME)) ||
         fs.existsSync(path.join(projectPath, 'po'));
}
