/**
 * Shared logging utilities for CLI commands
 */

import type { Logger } from '@potcheck/manifest';
import { colors } from './cli-colors.js';

// Global flag to control output suppression for structured formats
let globalSuppressOutput = false;

/**
 * Set the global output suppression state
 * @returns The previous suppression state
 */
export function setSuppressOutput(suppress: boolean): boolean {
  const previous = globalSuppressOutput;
  globalSuppressOutput = suppress;
  return previous;
}

function formatMeta(meta?: Record<string, unknown>): string {
  if (!meta || Object.keys(meta).length === 0) return '';
  return ` ${JSON.stringify(meta)}`;
}

/**
 * Console logger for commands. Also satisfies the validation library's
 * `Logger` interface so checks can report progress through it.
 */
export class CliLogger implements Logger {
  private verbose: boolean;
  private suppressOutput: boolean;
  private context: Record<string, unknown>;

  constructor(verbose: boolean = false, suppressOutput: boolean = false, context: Record<string, unknown> = {}) {
    this.verbose = verbose;
    this.suppressOutput = suppressOutput;
    this.context = context;
  }

  private get silent(): boolean {
    return this.suppressOutput || globalSuppressOutput;
  }

  error(message: string, meta?: Record<string, unknown>): void {
    if (!this.silent) {
      console.error(colors.red(`❌ ${message}${formatMeta(meta)}`));
    }
  }

  warning(message: string): void {
    if (!this.silent) {
      console.log(colors.yellow(`⚠️  ${message}`));
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.warning(`${message}${formatMeta(meta)}`);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (!this.silent) {
      console.log(colors.cyan(`ℹ️  ${message}${formatMeta(meta)}`));
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (!this.silent && this.verbose) {
      console.log(colors.dim(`[DEBUG] ${message}${formatMeta({ ...this.context, ...meta })}`));
    }
  }

  child(meta: Record<string, unknown>): CliLogger {
    return new CliLogger(this.verbose, this.suppressOutput, { ...this.context, ...meta });
  }
}

// Convenience functions for quick usage that respect global suppression
export function printError(message: string): void {
  if (!globalSuppressOutput) {
    console.error(colors.red(`❌ ${message}`));
  }
}
