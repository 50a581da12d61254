/**
 * Git integration for pre-commit use
 */

import { execFileSync } from 'child_process';
import { MissingDependencyError } from './missing-dependency-error.js';

/**
 * Paths (relative to the repository root) staged for the next commit
 *
 * @throws MissingDependencyError when git cannot be run in `cwd`
 */
export function getStagedFiles(cwd: string): string[] {
  let output: string;
  try {
    output = execFileSync('git', ['diff', '--name-only', '--cached'], {
      cwd,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  } catch (error) {
    throw new MissingDependencyError(
      `Could not list staged files: ${error instanceof Error ? error.message : String(error)}`,
      'git',
      'Make sure git is installed and the project is a git repository',
      error instanceof Error ? error : undefined
    );
  }

  return output
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}
