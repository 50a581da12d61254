import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import {
  loadProjectConfig,
  parseProjectConfig,
  getConfigPath,
  getMarkerOverrides,
} from '../config-loader.js';
import { ConfigurationError } from '../configuration-error.js';
import { createProject, removeProject } from './project-fixture.js';

describe('config-loader', () => {
  let root: string;
  let savedConfigEnv: string | undefined;

  beforeEach(() => {
    savedConfigEnv = process.env.POTCHECK_CONFIG;
    delete process.env.POTCHECK_CONFIG;
    root = createProject({ 'po/POTFILES.in': '' });
  });

  afterEach(() => {
    if (savedConfigEnv === undefined) {
      delete process.env.POTCHECK_CONFIG;
    } else {
      process.env.POTCHECK_CONFIG = savedConfigEnv;
    }
    removeProject(root);
  });

  it('returns the defaults when potcheck.json is absent', () => {
    expect(loadProjectConfig(root)).toEqual({
      potfiles: {
        manifest: 'po/POTFILES.in',
        skip: 'po/POTFILES.skip',
        scanRoot: 'src',
        markers: {},
      },
      resources: {
        gresource: 'data/resources/resources.gresource.xml',
        blueprintList: 'src/ui-blueprint-resources.in',
        blueprintRoot: 'src',
      },
    });
  });

  it('fills in defaults around the configured fields', () => {
    const config = parseProjectConfig(
      JSON.stringify({ potfiles: { scanRoot: 'app' }, resources: { blueprintRoot: 'app' } }),
      'potcheck.json'
    );

    expect(config.potfiles.scanRoot).toBe('app');
    expect(config.potfiles.manifest).toBe('po/POTFILES.in');
    expect(config.resources.blueprintRoot).toBe('app');
    expect(config.resources.gresource).toBe('data/resources/resources.gresource.xml');
  });

  it('rejects invalid JSON', () => {
    expect(() => parseProjectConfig('{ "potfiles": ', 'potcheck.json')).toThrow(ConfigurationError);
  });

  it('rejects unknown fields', () => {
    expect(() => parseProjectConfig(JSON.stringify({ potfile: {} }), 'potcheck.json'))
      .toThrow(/Invalid configuration/);
  });

  it('rejects markers that are not valid regular expressions', () => {
    try {
      parseProjectConfig(JSON.stringify({ potfiles: { markers: { source: 'gettext(' } } }), 'potcheck.json');
      expect.unreachable('parseProjectConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(String(error)).toContain('  potfiles.markers.source: Invalid regular expression');
    }
  });

  it('uses POTCHECK_CONFIG relative to the project root', () => {
    process.env.POTCHECK_CONFIG = 'config/checks.json';
    expect(getConfigPath(root)).toBe(path.join(root, 'config/checks.json'));
  });

  it('fails when POTCHECK_CONFIG names a missing file', () => {
    process.env.POTCHECK_CONFIG = 'missing.json';
    expect(() => loadProjectConfig(root)).toThrow(/POTCHECK_CONFIG points to a missing file/);
  });

  it('exposes configured markers as scan rule overrides', () => {
    const config = parseProjectConfig(
      JSON.stringify({ potfiles: { markers: { source: 'tr\\(' } } }),
      'potcheck.json'
    );
    expect(getMarkerOverrides(config)).toEqual({ source: 'tr\\(' });
  });
});
