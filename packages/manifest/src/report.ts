/**
 * Human-readable discrepancy sections
 */

import * as path from 'path';
import type { OrderingViolation } from './bytewise.js';
import type { ManifestReport } from './validator.js';

export type DiscrepancyKind = 'missing' | 'stale' | 'undeclared' | 'macro' | 'ordering';

export interface ReportSection {
  kind: DiscrepancyKind;
  /** Headline, e.g. `Found 2 files with translatable strings not present in POTFILES.in:` */
  title: string;
  /** One path per line under the headline; empty for single-line discrepancies */
  files: string[];
}

/**
 * `1 file` / `3 files`
 */
export function countFiles(count: number, noun: string = 'file'): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function orderingSection(
  violation: OrderingViolation,
  label: string,
  stripPrefix?: string
): ReportSection {
  const strip = (p: string) =>
    stripPrefix && p.startsWith(stripPrefix) ? p.slice(stripPrefix.length) : p;
  return {
    kind: 'ordering',
    title: `Found file '${strip(violation.found)}' before '${strip(violation.expected)}' in ${label}`,
    files: [],
  };
}

export function describeManifestReport(report: ManifestReport): ReportSection[] {
  const manifestName = path.posix.basename(report.manifest);
  const skipName = report.skip ? path.posix.basename(report.skip) : 'skip list';
  const sections: ReportSection[] = [];

  for (const entry of report.missing) {
    sections.push({
      kind: 'missing',
      title: `File '${entry.path}' in ${entry.origin === 'manifest' ? manifestName : skipName} does not exist`,
      files: [],
    });
  }

  const staleManifest = report.stale.filter(e => e.origin === 'manifest').map(e => e.path);
  const staleSkip = report.stale.filter(e => e.origin === 'skip').map(e => e.path);
  if (staleManifest.length > 0) {
    sections.push({
      kind: 'stale',
      title: `Found ${countFiles(staleManifest.length)} in ${manifestName} without translatable strings:`,
      files: staleManifest,
    });
  }
  if (staleSkip.length > 0) {
    sections.push({
      kind: 'stale',
      title: `Found ${countFiles(staleSkip.length)} in ${skipName} without translatable strings:`,
      files: staleSkip,
    });
  }

  if (report.undeclared.length > 0) {
    const count = report.undeclared.length;
    sections.push({
      kind: 'undeclared',
      title: `Found ${countFiles(count)} with translatable strings not present in ${manifestName}:`,
      files: report.undeclared.map(f => f.path),
    });
  }

  if (report.macroUsage.length > 0) {
    const count = report.macroUsage.length;
    const verb = count === 1 ? 'uses' : 'use';
    sections.push({
      kind: 'macro',
      title: `Found ${countFiles(count, 'source file')} that ${verb} a gettext macro, use the corresponding i18n method instead:`,
      files: report.macroUsage,
    });
  }

  if (report.ordering) {
    sections.push(orderingSection(report.ordering, manifestName));
  }

  return sections;
}
