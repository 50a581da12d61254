import { describe, it, expect, beforeEach, vi, type MockInstance } from 'vitest';
import { spawnSync, type SpawnSyncReturns } from 'child_process';
import { executeCommand } from '../../command-loader.js';
import { parseJsonOutput } from '../../__tests__/project-fixture.js';

vi.mock('child_process', async (importOriginal) => {
  const actual = await importOriginal<typeof import('child_process')>();
  return {
    ...actual,
    spawnSync: vi.fn(),
  };
});

function compilerResult(
  status: number | null,
  stderr: string = '',
  error?: Error,
  signal: NodeJS.Signals | null = null
): SpawnSyncReturns<string> {
  return { pid: 4242, output: [null, '', stderr], stdout: '', stderr, status, signal, error };
}

describe('compile-blueprints command', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('compiles every file into the flat output directory', async () => {
    vi.mocked(spawnSync).mockReturnValue(compilerResult(0));

    const code = await executeCommand('compile-blueprints', [
      'blueprint-compiler', 'build/ui', 'src', 'src/window.blp', 'src/session/room-page.blp', '-o', 'json',
    ]);

    expect(code).toBe(0);
    expect(vi.mocked(spawnSync).mock.calls.map(call => [call[0], call[1]])).toEqual([
      ['blueprint-compiler', ['compile', '--output', 'build/ui/window.ui', 'src/window.blp']],
      ['blueprint-compiler', ['compile', '--output', 'build/ui/session-room-page.ui', 'src/session/room-page.blp']],
    ]);
    const output = parseJsonOutput(logSpy.mock.calls);
    expect(output.results.map(r => r.metadata.output)).toEqual([
      'build/ui/window.ui',
      'build/ui/session-room-page.ui',
    ]);
  });

  it('stops at the first file the compiler rejects', async () => {
    vi.mocked(spawnSync)
      .mockReturnValueOnce(compilerResult(0))
      .mockReturnValueOnce(compilerResult(1, 'error: Unexpected tokens\n'))
      .mockReturnValueOnce(compilerResult(0));

    const code = await executeCommand('compile-blueprints', [
      'blueprint-compiler', 'out', 'src', 'src/a.blp', 'src/b.blp', 'src/c.blp', '-o', 'json',
    ]);
    const output = parseJsonOutput(logSpy.mock.calls);

    expect(code).toBe(1);
    expect(spawnSync).toHaveBeenCalledTimes(2);
    expect(output.results[1]).toMatchObject({
      entity: 'src/b.blp',
      success: false,
      error: 'error: Unexpected tokens',
    });
    expect(output.summary).toEqual({ total: 2, succeeded: 1, failed: 1, skipped: 1 });
  });

  it('names the signal that killed the compiler', async () => {
    vi.mocked(spawnSync).mockReturnValue(compilerResult(null, '', undefined, 'SIGKILL'));

    const code = await executeCommand('compile-blueprints', ['blueprint-compiler', 'out', 'src', 'src/a.blp', '-o', 'json']);
    const output = parseJsonOutput(logSpy.mock.calls);

    expect(code).toBe(1);
    expect(output.results[0]?.error).toBe('killed by signal SIGKILL');
  });

  it('exits 2 when the compiler cannot be started', async () => {
    vi.mocked(spawnSync).mockReturnValue(compilerResult(null, '', new Error('spawnSync blueprint-compiler ENOENT')));

    const code = await executeCommand('compile-blueprints', ['blueprint-compiler', 'out', 'src', 'src/a.blp']);

    expect(code).toBe(2);
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain(
      "Could not run Blueprint compiler 'blueprint-compiler': spawnSync blueprint-compiler ENOENT"
    );
  });

  it('succeeds without files', async () => {
    const code = await executeCommand('compile-blueprints', ['blueprint-compiler', 'out', 'src', '-q']);

    expect(code).toBe(0);
    expect(spawnSync).not.toHaveBeenCalled();
  });
});
