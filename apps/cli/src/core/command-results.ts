/**
 * Command Results Type System - Aggregated results for command execution
 *
 * Every command returns one `CommandResults` holding a result per executed
 * check, so that all output formats work from the same structure.
 */

import type { ReportSection } from '@potcheck/manifest';

// Minimal interface that all command results must satisfy for formatting
export interface BaseResult {
  entity: string;  // The file this result applies to
  success: boolean;
  error?: string;
}

export type CheckKind = 'potfiles' | 'blueprint-resources' | 'gresource' | 'compile-blueprint';

export interface CheckResult extends BaseResult {
  check: CheckKind;
  timestamp: Date;
  /** Discrepancies found, in report order */
  sections: ReportSection[];
  metadata: Record<string, string | number | boolean>;
}

// Aggregated command results structure
export interface CommandResults<TResult extends BaseResult = CheckResult> {
  command: string;
  projectRoot: string;
  timestamp: Date;
  duration: number;
  results: TResult[];
  summary: {
    total: number;
    succeeded: number;
    failed: number;
    skipped: number;
  };
  // Metadata about the command execution
  executionContext: {
    user: string;
    workingDirectory: string;
    cliVersion?: string;
    gitStaged: boolean;
  };
}

export function createCheckResult(
  fields: Pick<CheckResult, 'entity' | 'check' | 'success'> & Partial<CheckResult>
): CheckResult {
  return {
    timestamp: new Date(),
    sections: [],
    metadata: {},
    ...fields,
  };
}

/**
 * Result for a check that could not complete, e.g. because its input file
 * is missing
 */
export function createErrorResult(
  entity: string,
  check: CheckKind,
  error: Error | string
): CheckResult {
  return createCheckResult({
    entity,
    check,
    success: false,
    error: typeof error === 'string' ? error : error.message,
  });
}

export function createCommandResults(
  command: string,
  projectRoot: string,
  results: CheckResult[],
  startTime: number,
  context: { gitStaged?: boolean; skipped?: number; cliVersion?: string } = {}
): CommandResults {
  const succeeded = results.filter(r => r.success).length;
  return {
    command,
    projectRoot,
    timestamp: new Date(),
    duration: Date.now() - startTime,
    results,
    summary: {
      total: results.length,
      succeeded,
      failed: results.length - succeeded,
      skipped: context.skipped ?? 0,
    },
    executionContext: {
      user: process.env.USER || 'unknown',
      workingDirectory: process.cwd(),
      cliVersion: context.cliVersion,
      gitStaged: context.gitStaged ?? false,
    },
  };
}
