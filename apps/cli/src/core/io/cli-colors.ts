/**
 * Shared color utilities for CLI output
 */

import chalk, { Chalk } from 'chalk';

export interface Colors {
  bright: (text: string) => string;
  dim: (text: string) => string;
  red: (text: string) => string;
  green: (text: string) => string;
  yellow: (text: string) => string;
  blue: (text: string) => string;
  cyan: (text: string) => string;
  magenta: (text: string) => string;
}

/**
 * Color helpers; with `enabled` false every helper returns its input unchanged.
 * When enabled, chalk decides from the terminal and NO_COLOR / FORCE_COLOR.
 */
export function createColors(enabled: boolean = true): Colors {
  const c = enabled ? chalk : new Chalk({ level: 0 });
  return {
    bright: text => c.bold(text),
    dim: text => c.dim(text),
    red: text => c.red(text),
    green: text => c.green(text),
    yellow: text => c.yellow(text),
    blue: text => c.blue(text),
    cyan: text => c.cyan(text),
    magenta: text => c.magenta(text),
  };
}

export const colors = createColors();

/**
 * Get the formatted preamble string with version
 */
export function getPreamble(version: string): string {
  return `${colors.bright('potcheck')} ${colors.dim(`v${version}`)} | ${colors.cyan('translation manifest checks')}`;
}

/**
 * Get the preamble separator line
 */
export function getPreambleSeparator(): string {
  return colors.dim('━'.repeat(48));
}
