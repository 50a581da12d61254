/**
 * Configuration Loader for CLI
 *
 * Reads `potcheck.json` from the project root (or from POTCHECK_CONFIG) and
 * validates it. Every field has a default, so a project without the file
 * gets the standard layout.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { MarkerOverrides } from '@potcheck/manifest';
import { ConfigurationError } from './configuration-error.js';

export const CONFIG_FILE_NAME = 'potcheck.json';

const regexSource = z.string().refine(isValidRegex, { message: 'Invalid regular expression' });

export const ProjectConfigSchema = z.object({
  potfiles: z.object({
    manifest: z.string().min(1).default('po/POTFILES.in'),
    skip: z.string().min(1).default('po/POTFILES.skip'),
    scanRoot: z.string().min(1).default('src'),
    markers: z.object({
      ui: regexSource.optional(),
      blueprint: regexSource.optional(),
      source: regexSource.optional(),
      macro: regexSource.optional(),
    }).strict().default({}),
  }).strict().default({}),
  resources: z.object({
    gresource: z.string().min(1).default('data/resources/resources.gresource.xml'),
    blueprintList: z.string().min(1).default('src/ui-blueprint-resources.in'),
    blueprintRoot: z.string().min(1).default('src'),
  }).strict().default({}),
}).strict();

export type ProjectConfig = z.output<typeof ProjectConfigSchema>;

function isValidRegex(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

/**
 * Path of the configuration file for a project
 */
export function getConfigPath(projectRoot: string): string {
  const override = process.env.POTCHECK_CONFIG;
  if (override) {
    return path.resolve(projectRoot, override);
  }
  return path.join(projectRoot, CONFIG_FILE_NAME);
}

/**
 * Parse and validate configuration file content
 */
export function parseProjectConfig(content: string, configPath: string): ProjectConfig {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid JSON in configuration file: ${error instanceof Error ? error.message : String(error)}`,
      configPath,
      'Check the file for syntax errors',
      error instanceof Error ? error : undefined
    );
  }

  const result = ProjectConfigSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  ${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('\n');
    throw new ConfigurationError(
      `Invalid configuration:\n${issues}`,
      configPath,
      `See the documented fields of ${CONFIG_FILE_NAME}`
    );
  }
  return result.data;
}

/**
 * Load project configuration from the filesystem
 */
export function loadProjectConfig(projectRoot: string): ProjectConfig {
  const configPath = getConfigPath(projectRoot);

  if (!fs.existsSync(configPath)) {
    if (process.env.POTCHECK_CONFIG) {
      throw new ConfigurationError(
        `POTCHECK_CONFIG points to a missing file: ${configPath}`,
        configPath,
        'Check that POTCHECK_CONFIG is set correctly'
      );
    }
    return ProjectConfigSchema.parse({});
  }

  return parseProjectConfig(fs.readFileSync(configPath, 'utf-8'), configPath);
}

/**
 * Marker overrides in the form the scanner takes
 */
export function getMarkerOverrides(config: ProjectConfig): MarkerOverrides {
  return { ...config.potfiles.markers };
}
