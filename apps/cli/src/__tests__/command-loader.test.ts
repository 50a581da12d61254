/**
 * Command Loader Tests
 *
 * Runs commands end to end against temporary projects and checks the exit
 * codes and the printed results.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { executeCommand, generateGlobalHelp } from '../core/command-loader.js';
import {
  createProject,
  removeProject,
  writeProjectFiles,
  parseJsonOutput,
  PASSING_PROJECT,
} from '../core/__tests__/project-fixture.js';

describe('executeCommand', () => {
  let root: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;
  const savedEnv = { ...process.env };

  beforeEach(() => {
    root = createProject(PASSING_PROJECT);
    delete process.env.POTCHECK_ROOT;
    delete process.env.POTCHECK_CONFIG;
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    process.env = { ...savedEnv };
    removeProject(root);
  });

  const firstError = () => String(errorSpy.mock.calls[0]?.[0]);

  describe('command resolution', () => {
    it('prints command help and exits 0', async () => {
      const code = await executeCommand('potfiles', ['--help']);

      expect(code).toBe(0);
      expect(String(logSpy.mock.calls[0]?.[0])).toContain('potcheck potfiles [options]');
    });

    it('exits 1 for an unknown command', async () => {
      const code = await executeCommand('lint', []);

      expect(code).toBe(1);
      expect(firstError()).toContain("Command 'lint' not found");
    });

    it('exits 1 for an unknown option', async () => {
      const code = await executeCommand('potfiles', ['--root', root, '--bogus']);

      expect(code).toBe(1);
      expect(firstError()).toContain('Invalid arguments: unknown or unexpected option: --bogus');
    });

    it('exits 1 for an unsupported output format', async () => {
      const code = await executeCommand('potfiles', ['--root', root, '-o', 'xml']);

      expect(code).toBe(1);
      expect(firstError()).toContain('Invalid arguments:');
    });
  });

  describe('project resolution', () => {
    it('uses POTCHECK_ROOT when --root is not given', async () => {
      process.env.POTCHECK_ROOT = root;

      const code = await executeCommand('potfiles', ['-o', 'json']);

      expect(code).toBe(0);
      expect(parseJsonOutput(logSpy.mock.calls).projectRoot).toBe(root);
    });

    it('exits 1 when --root does not exist', async () => {
      const missing = path.join(root, 'nowhere');

      const code = await executeCommand('potfiles', ['--root', missing]);

      expect(code).toBe(1);
      expect(firstError()).toContain(`--root points to non-existent directory: ${missing}`);
    });

    it('exits 1 for a malformed configuration file', async () => {
      writeProjectFiles(root, { 'potcheck.json': '{ "potfiles": ' });

      const code = await executeCommand('potfiles', ['--root', root]);

      expect(code).toBe(1);
      expect(firstError()).toContain('Invalid JSON in configuration file');
    });

    it('follows the configured manifest location', async () => {
      writeProjectFiles(root, {
        'potcheck.json': JSON.stringify({ potfiles: { manifest: 'i18n/POTFILES.in' } }),
        'i18n/POTFILES.in': 'src/main.rs\nsrc/session/room-page.blp\nsrc/window.blp\n',
      });
      fs.rmSync(path.join(root, 'po'), { recursive: true });

      const code = await executeCommand('potfiles', ['--root', root, '-o', 'json']);

      expect(code).toBe(0);
      expect(parseJsonOutput(logSpy.mock.calls).results[0]?.entity).toBe('i18n/POTFILES.in');
    });
  });

  describe('potfiles', () => {
    it('exits 0 when the manifest matches the tree', async () => {
      const code = await executeCommand('potfiles', ['--root', root, '-o', 'json']);
      const output = parseJsonOutput(logSpy.mock.calls);

      expect(code).toBe(0);
      expect(output.command).toBe('potfiles');
      expect(output.results[0]).toMatchObject({
        entity: 'po/POTFILES.in',
        check: 'potfiles',
        success: true,
        sections: [],
      });
    });

    it('keeps JSON output free of log lines in verbose mode', async () => {
      const code = await executeCommand('potfiles', ['--root', root, '-v', '-o', 'json']);

      expect(code).toBe(0);
      expect(parseJsonOutput(logSpy.mock.calls).summary.succeeded).toBe(1);
    });

    it('reports a manifest entry that does not exist', async () => {
      writeProjectFiles(root, {
        'po/POTFILES.in': 'src/gone.rs\nsrc/main.rs\nsrc/session/room-page.blp\nsrc/window.blp\n',
      });

      const code = await executeCommand('potfiles', ['--root', root, '-o', 'json']);
      const output = parseJsonOutput(logSpy.mock.calls);

      expect(code).toBe(1);
      expect(output.results[0]?.sections).toEqual([
        { kind: 'missing', title: "File 'src/gone.rs' in POTFILES.in does not exist", files: [] },
      ]);
    });

    it('reports a declared file without translatable strings', async () => {
      writeProjectFiles(root, { 'src/window.blp': 'using Gtk 4.0;\n\nBox {}\n' });

      const code = await executeCommand('potfiles', ['--root', root, '-o', 'json']);
      const output = parseJsonOutput(logSpy.mock.calls);

      expect(code).toBe(1);
      expect(output.results[0]?.sections).toEqual([{
        kind: 'stale',
        title: 'Found 1 file in POTFILES.in without translatable strings:',
        files: ['src/window.blp'],
      }]);
    });

    it('prints the preamble and summary for summary output', async () => {
      const code = await executeCommand('potfiles', ['--root', root]);
      const printed = logSpy.mock.calls.map(args => String(args[0])).join('\n');

      expect(code).toBe(0);
      expect(printed).toContain('translation manifest checks');
      expect(printed).toContain('po/POTFILES.in result:');
    });

    it('prints nothing but failures when quiet', async () => {
      const code = await executeCommand('potfiles', ['--root', root, '-q']);
      const printed = logSpy.mock.calls.map(args => String(args[0])).join('');

      expect(code).toBe(0);
      expect(printed).toBe('');
    });
  });

  describe('resources', () => {
    it('reports a Blueprint resource list entry without a file', async () => {
      writeProjectFiles(root, { 'src/ui-blueprint-resources.in': 'session/room-page.blp\nsettings.blp\nwindow.blp\n' });

      const code = await executeCommand('resources', ['--root', root, '-o', 'json']);
      const output = parseJsonOutput(logSpy.mock.calls);

      expect(code).toBe(1);
      expect(output.results.map(r => [r.check, r.success])).toEqual([
        ['blueprint-resources', false],
        ['gresource', true],
      ]);
      expect(output.results[0]?.sections[0]?.title).toBe(
        "File 'settings.blp' in src/ui-blueprint-resources.in does not exist"
      );
    });

    it('turns a missing GResource manifest into a failed check', async () => {
      fs.rmSync(path.join(root, 'data'), { recursive: true });

      const code = await executeCommand('resources', ['--root', root, '-o', 'json']);
      const output = parseJsonOutput(logSpy.mock.calls);

      expect(code).toBe(1);
      expect(output.results[1]).toMatchObject({ check: 'gresource', success: false });
      expect(output.results[1]?.error).toContain('GResource manifest not found');
    });
  });
});

describe('generateGlobalHelp', () => {
  it('lists every command', async () => {
    const help = await generateGlobalHelp();

    expect(help).toContain('  check ');
    expect(help).toContain('  potfiles ');
    expect(help).toContain('  resources ');
    expect(help).toContain('  compile-blueprints ');
  });
});
