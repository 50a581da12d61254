/**
 * Resource list checks: GResource XML manifests and Blueprint resource lists
 * must be sorted, and Blueprint list entries must exist.
 */

import * as fs from 'fs';
import * as path from 'path';
import { findFirstMisordered, type OrderingViolation } from './bytewise.js';
import { ManifestFileError } from './errors.js';
import { isRegularFile, readListFile, type ListEntry } from './list-file.js';
import { orderingSection, type ReportSection } from './report.js';

const FILE_ELEMENT = /<file(?:\s[^>]*)?>(.*?)<\/file>/g;

export interface ResourceListReport {
  /** List file path relative to the project root */
  label: string;
  entries: string[];
  /** Entries that do not exist (Blueprint resource lists only) */
  missing: ListEntry[];
  ordering?: OrderingViolation;
  /** Prefix removed from paths when reporting */
  stripPrefix?: string;
  passed: boolean;
}

/**
 * Text of every `<file>` element, in document order.
 */
export function parseGresourceFiles(xml: string): string[] {
  return Array.from(xml.matchAll(FILE_ELEMENT), match => match[1] ?? '');
}

export function checkResourceOrder(
  entries: readonly string[],
  label: string,
  stripPrefix?: string
): ResourceListReport {
  const ordering = findFirstMisordered(entries);
  return {
    label,
    entries: [...entries],
    missing: [],
    ordering,
    stripPrefix,
    passed: ordering === undefined,
  };
}

/**
 * Read a GResource XML manifest and check that its files are sorted.
 */
export function checkGresourceFile(
  projectRoot: string,
  gresource: string,
  stripPrefix?: string
): ResourceListReport {
  const filePath = path.resolve(projectRoot, gresource);
  if (!fs.existsSync(filePath)) {
    throw new ManifestFileError(`GResource manifest not found: ${filePath}`, filePath);
  }

  let xml: string;
  try {
    xml = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ManifestFileError(
      `Failed to read GResource manifest ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
  return checkResourceOrder(parseGresourceFiles(xml), gresource, stripPrefix);
}

/**
 * Read a Blueprint resource list, report entries that do not exist under
 * `blueprintRoot`, then check that the list is sorted.
 */
export function checkBlueprintResources(
  projectRoot: string,
  listFile: string,
  blueprintRoot: string
): ResourceListReport {
  const entries = readListFile(path.resolve(projectRoot, listFile));
  const missing = entries.filter(
    entry => !isRegularFile(path.resolve(projectRoot, blueprintRoot, entry.path))
  );
  const paths = entries.map(entry => entry.path);
  const ordering = findFirstMisordered(paths);

  return {
    label: listFile,
    entries: paths,
    missing,
    ordering,
    stripPrefix: `${blueprintRoot.replace(/\/+$/, '')}/`,
    passed: missing.length === 0 && ordering === undefined,
  };
}

export function describeResourceReport(report: ResourceListReport): ReportSection[] {
  const sections: ReportSection[] = report.missing.map(entry => ({
    kind: 'missing',
    title: `File '${entry.path}' in ${report.label} does not exist`,
    files: [],
  }));
  if (report.ordering) {
    sections.push(orderingSection(report.ordering, report.label, report.stripPrefix));
  }
  return sections;
}
