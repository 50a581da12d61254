/**
 * String Utilities - plain-text table rendering for CLI output
 */

import { createColors } from './cli-colors.js';

const ANSI_ESCAPE = /\x1b\[[0-9;]*m/g;

// Display width of a string: color codes take no space, most emojis take two cells
export function getDisplayWidth(str: string): number {
  const plain = str.replace(ANSI_ESCAPE, '');
  const emojiRegex = /[\u{1F600}-\u{1F64F}]|[\u{1F300}-\u{1F5FF}]|[\u{1F680}-\u{1F6FF}]|[\u{2600}-\u{26FF}]|[\u{2700}-\u{27BF}]|[\u{1F900}-\u{1F9FF}]/gu;

  const emojis = plain.match(emojiRegex) ?? [];
  return plain.length + emojis.length;
}

// String-based table utility for CLI output
export function createStringTable(
  data: Record<string, string>[],
  columns: string[],
  options: {
    colors?: boolean;
    padding?: number;
    borders?: boolean;
  } = {}
): string {
  if (data.length === 0) {
    return 'No data to display\n';
  }

  const { colors = true, padding = 1, borders = true } = options;
  const c = createColors(colors);

  const columnWidths: Record<string, number> = {};
  columns.forEach(col => {
    columnWidths[col] = col.length;
    data.forEach(row => {
      columnWidths[col] = Math.max(columnWidths[col] ?? 0, getDisplayWidth(row[col] ?? ''));
    });
  });

  const widthOf = (col: string) => columnWidths[col] ?? 0;
  const pad = (str: string, width: number) =>
    str + ' '.repeat(Math.max(0, width - getDisplayWidth(str)));
  const spacer = ' '.repeat(padding);
  const rule = (left: string, join: string, right: string) =>
    left + columns.map(col => '─'.repeat(widthOf(col) + padding * 2)).join(join) + right + '\n';

  let output = '';

  if (borders) {
    output += rule('┌', '┬', '┐');

    output += '│';
    columns.forEach(col => {
      output += `${spacer}${pad(c.bright(col), widthOf(col))}${spacer}│`;
    });
    output += '\n';

    output += rule('├', '┼', '┤');

    data.forEach(row => {
      output += '│';
      columns.forEach(col => {
        output += `${spacer}${pad(row[col] ?? '', widthOf(col))}${spacer}│`;
      });
      output += '\n';
    });

    output += rule('└', '┴', '┘');
  } else {
    output += columns.map(col => pad(c.bright(col), widthOf(col))).join('  ') + '\n';
    output += columns.map(col => '─'.repeat(widthOf(col))).join('  ') + '\n';
    data.forEach(row => {
      output += columns.map(col => pad(row[col] ?? '', widthOf(col))).join('  ') + '\n';
    });
  }

  return output;
}
