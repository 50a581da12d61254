/**
 * Resource list checks - Blueprint resource list and GResource manifest ordering
 */

import {
  checkBlueprintResources,
  checkGresourceFile,
  describeResourceReport,
  ManifestFileError,
  type Logger,
  type ResourceListReport,
} from '@potcheck/manifest';
import type { ProjectContext } from '../command-definition.js';
import {
  createCheckResult,
  createErrorResult,
  type CheckKind,
  type CheckResult,
} from '../command-results.js';

function toCheckResult(check: CheckKind, report: ResourceListReport): CheckResult {
  return createCheckResult({
    entity: report.label,
    check,
    success: report.passed,
    sections: describeResourceReport(report),
    metadata: {
      entries: report.entries.length,
      missing: report.missing.length,
      sorted: report.ordering === undefined,
    },
  });
}

function guard(entity: string, check: CheckKind, run: () => ResourceListReport): CheckResult {
  try {
    return toCheckResult(check, run());
  } catch (error) {
    if (error instanceof ManifestFileError) {
      return createErrorResult(entity, check, error);
    }
    throw error;
  }
}

export function runBlueprintResourcesCheck(project: ProjectContext, logger: Logger): CheckResult {
  const { blueprintList, blueprintRoot } = project.config.resources;
  logger.debug(`Checking ${blueprintList} against ${blueprintRoot}/`);
  return guard(blueprintList, 'blueprint-resources', () =>
    checkBlueprintResources(project.root, blueprintList, blueprintRoot)
  );
}

export function runGresourceCheck(project: ProjectContext, logger: Logger): CheckResult {
  const { gresource, blueprintRoot } = project.config.resources;
  logger.debug(`Checking ${gresource}`);
  return guard(gresource, 'gresource', () =>
    checkGresourceFile(project.root, gresource, `${blueprintRoot.replace(/\/+$/, '')}/`)
  );
}
