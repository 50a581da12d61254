/**
 * @potcheck/manifest
 *
 * Translation manifest validation and resource list checks
 */

export {
  validateManifest,
  type ValidateManifestOptions,
  type ManifestReport,
  type MissingEntry,
  type StaleEntry,
  type UndeclaredFile,
  type ListOrigin,
} from './validator.js';
export { scanTree, type ScanResult } from './scanner.js';
export {
  categorize,
  bucketByCategory,
  createScanRules,
  DEFAULT_SCAN_RULES,
  FILE_CATEGORIES,
  type FileCategory,
  type CategoryRule,
  type CategoryBuckets,
  type ScanRules,
  type MarkerOverrides,
} from './categories.js';
export { parseListFile, readListFile, isRegularFile, type ListEntry } from './list-file.js';
export { cancelCommon, type CancelResult } from './multiset.js';
export {
  compareBytes,
  sortBytewise,
  findFirstMisordered,
  type OrderingViolation,
} from './bytewise.js';
export {
  describeManifestReport,
  countFiles,
  type ReportSection,
  type DiscrepancyKind,
} from './report.js';
export {
  parseGresourceFiles,
  checkResourceOrder,
  checkGresourceFile,
  checkBlueprintResources,
  describeResourceReport,
  type ResourceListReport,
} from './resources.js';
export { blueprintOutputPath } from './blueprint-output.js';
export { ManifestFileError } from './errors.js';
export { silentLogger, type Logger } from './logger.js';
