/**
 * POTFILES check - runs the Translation Manifest Validator for a project
 */

import {
  validateManifest,
  describeManifestReport,
  createScanRules,
  ManifestFileError,
  type Logger,
} from '@potcheck/manifest';
import type { ProjectContext } from '../command-definition.js';
import { createCheckResult, createErrorResult, type CheckResult } from '../command-results.js';
import { getMarkerOverrides } from '../config-loader.js';

export async function runPotfilesCheck(project: ProjectContext, logger: Logger): Promise<CheckResult> {
  const { manifest, skip, scanRoot } = project.config.potfiles;
  logger.debug(`Checking ${manifest} against ${scanRoot}/`);

  try {
    const report = await validateManifest({
      projectRoot: project.root,
      manifest,
      skip,
      scanRoot,
      rules: createScanRules(getMarkerOverrides(project.config)),
      logger,
    });

    return createCheckResult({
      entity: manifest,
      check: 'potfiles',
      success: report.passed,
      sections: describeManifestReport(report),
      metadata: {
        missing: report.missing.length,
        stale: report.stale.length,
        undeclared: report.undeclared.length,
        macroUsage: report.macroUsage.length,
        sorted: report.missing.length === 0 && report.ordering === undefined,
      },
    });
  } catch (error) {
    if (error instanceof ManifestFileError) {
      return createErrorResult(manifest, 'potfiles', error);
    }
    throw error;
  }
}
