/**
 * Output Formatter - Multi-format output system for command results
 *
 * The summary format prints one block per check in the style of a
 * pre-commit hook; table, JSON and YAML render the aggregated results.
 */

import type { CheckKind, CheckResult, CommandResults } from '../command-results.js';
import { createColors, type Colors } from './cli-colors.js';
import { createStringTable } from './string-utils.js';

export type OutputFormat = 'summary' | 'table' | 'json' | 'yaml';

export interface OutputOptions {
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
  colors?: boolean; // Whether to include color codes
}

const CHECK_VERBS: Record<CheckKind, string> = {
  'potfiles': 'Checking',
  'blueprint-resources': 'Checking',
  'gresource': 'Checking',
  'compile-blueprint': 'Compiling',
};

export class OutputFormatter {
  /**
   * Main entry point for formatting command results
   */
  static format(results: CommandResults, options: OutputOptions): string {
    switch (options.format) {
      case 'json':
        return this.formatJSON(results, options);
      case 'yaml':
        return this.formatYAML(results);
      case 'table':
        return this.formatTable(results, options);
      case 'summary':
      default:
        return this.formatSummary(results, options);
    }
  }

  /**
   * JSON format output
   */
  private static formatJSON(results: CommandResults, options: OutputOptions): string {
    return JSON.stringify(this.cleanForSerialization(results), null, options.verbose ? 2 : 0);
  }

  /**
   * YAML format output
   */
  private static formatYAML(results: CommandResults): string {
    // Simple YAML formatter (could be replaced with a proper YAML library)
    return this.toYAML(this.cleanForSerialization(results), 0);
  }

  /**
   * Human-readable summary format (default CLI output)
   */
  private static formatSummary(results: CommandResults, options: OutputOptions): string {
    const c = createColors(options.colors !== false);
    const blocks: string[] = [];

    if (!options.quiet && options.verbose) {
      let header = `${c.cyan(`📊 ${results.command}`)} completed in ${c.bright(`${results.duration}ms`)}\n`;
      header += `${c.dim(`Project: ${results.projectRoot}`)}\n`;
      header += `${c.dim(`Timestamp: ${results.timestamp.toISOString()}`)}\n`;
      if (results.executionContext.gitStaged) {
        header += `${c.yellow('Staged files only')}\n`;
      }
      blocks.push(header);
    }

    for (const result of results.results) {
      if (options.quiet && result.success) continue;
      blocks.push(this.formatResultBlock(result, options, c));
    }

    if (!options.quiet && results.results.length > 1) {
      let line = `${c.cyan('Summary:')} ${c.green(`${results.summary.succeeded} succeeded`)}, `;
      if (results.summary.failed > 0) {
        line += `${c.red(`${results.summary.failed} failed`)}, `;
      }
      if (results.summary.skipped > 0) {
        line += `${c.yellow(`${results.summary.skipped} skipped`)}, `;
      }
      line += `${results.summary.total} total\n`;
      blocks.push(line);
    }

    return blocks.join('\n');
  }

  private static formatResultBlock(result: CheckResult, options: OutputOptions, c: Colors): string {
    const verb = CHECK_VERBS[result.check];
    let output = '';

    if (!options.quiet) {
      output += `${c.bright(`  ${verb}`)} ${result.entity}…\n`;
    }

    for (const section of result.sections) {
      output += `${c.red('error:')} ${section.title}\n`;
      for (const file of section.files) {
        output += `${file}\n`;
      }
    }

    if (result.error) {
      output += `${c.red('error:')} ${result.error}\n`;
    }

    if (options.verbose) {
      for (const [key, value] of Object.entries(result.metadata)) {
        output += `   ${c.dim(`${key}: ${String(value)}`)}\n`;
      }
    }

    const status = result.success ? c.green('ok') : c.red('fail');
    output += `${c.bright(`  ${verb}`)} ${result.entity} result: ${status}\n`;
    return output;
  }

  /**
   * ASCII table format
   */
  private static formatTable(results: CommandResults, options: OutputOptions): string {
    if (results.results.length === 0) {
      return 'No results to display\n';
    }

    const c = createColors(options.colors !== false);
    const columns = ['Check', 'File', 'Status', 'Discrepancies'];
    if (options.verbose) {
      columns.push('Details');
    }

    const tableData = results.results.map(result => {
      const row: Record<string, string> = {
        Check: result.check,
        File: result.entity,
        Status: result.success ? `${c.green('[OK]')} ok` : `${c.red('[FAIL]')} fail`,
        Discrepancies: String(result.sections.length + (result.error ? 1 : 0)),
      };
      if (options.verbose) {
        row.Details = Object.entries(result.metadata)
          .map(([key, value]) => `${key}=${String(value)}`)
          .join(' ');
      }
      return row;
    });

    return createStringTable(tableData, columns, {
      colors: options.colors !== false,
      borders: true,
      padding: 1,
    });
  }

  /**
   * Simple YAML formatter
   */
  private static toYAML(obj: unknown, indent: number = 0): string {
    const spaces = '  '.repeat(indent);
    let result = '';

    if (Array.isArray(obj)) {
      if (obj.length === 0) return `${spaces}[]\n`;
      for (const item of obj) {
        result += `${spaces}- ${this.toYAML(item, indent + 1).trim()}\n`;
      }
    } else if (obj && typeof obj === 'object') {
      for (const [key, value] of Object.entries(obj)) {
        if (value === null || value === undefined) {
          result += `${spaces}${key}: null\n`;
        } else if (Array.isArray(value) && value.length === 0) {
          result += `${spaces}${key}: []\n`;
        } else if (typeof value === 'object') {
          result += `${spaces}${key}:\n${this.toYAML(value, indent + 1)}`;
        } else {
          const valueStr = typeof value === 'string' ? JSON.stringify(value) : String(value);
          result += `${spaces}${key}: ${valueStr}\n`;
        }
      }
    } else {
      return typeof obj === 'string' ? JSON.stringify(obj) : String(obj);
    }

    return result;
  }

  /**
   * Clean object for serialization: dates become ISO strings
   */
  private static cleanForSerialization(obj: unknown): unknown {
    if (obj instanceof Date) {
      return obj.toISOString();
    }

    if (Array.isArray(obj)) {
      return obj.map(item => this.cleanForSerialization(item));
    }

    if (obj && typeof obj === 'object') {
      const cleaned: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(obj)) {
        cleaned[key] = this.cleanForSerialization(value);
      }
      return cleaned;
    }

    return obj;
  }
}

/**
 * Utility function for quick formatting
 */
export function formatResults(
  results: CommandResults,
  format: OutputFormat = 'summary',
  options: { verbose?: boolean; quiet?: boolean; colors?: boolean } = {}
): string {
  return OutputFormatter.format(results, {
    format,
    quiet: options.quiet ?? false,
    verbose: options.verbose ?? false,
    colors: options.colors ?? true,
  });
}
