import * as fs from 'fs';
import { fileURLToPath } from 'url';

const PACKAGE_NAME = '@potcheck/cli';

// Relative to src/core/ when run from sources, to dist/ when bundled
const PACKAGE_JSON_CANDIDATES = ['../package.json', '../../package.json'];

interface PackageJson {
  name: string;
  version: string;
}

function isCliPackage(value: unknown): value is PackageJson {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    value.name === PACKAGE_NAME &&
    'version' in value &&
    typeof value.version === 'string'
  );
}

/**
 * Get the CLI version from package.json
 */
export function getVersion(): string {
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    const file = fileURLToPath(new URL(candidate, import.meta.url));
    if (!fs.existsSync(file)) continue;

    const pkg: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    if (isCliPackage(pkg)) return pkg.version;
  }
  return '0.0.0';
}
