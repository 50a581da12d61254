/**
 * Compile Blueprints Command
 *
 * Compiles each Blueprint file into a single flat output directory, naming
 * the output after the file's path below the base directory
 * (src/session/view.blp becomes <output-dir>/session-view.ui).
 *
 * Stops at the first file the compiler rejects.
 */

import { spawnSync } from 'child_process';
import { z } from 'zod';
import { blueprintOutputPath } from '@potcheck/manifest';
import { CommandBuilder } from '../command-definition.js';
import { BaseOptionsSchema, withBaseArgs } from '../base-options-schema.js';
import {
  createCheckResult,
  createCommandResults,
  type CheckResult,
  type CommandResults,
} from '../command-results.js';
import { MissingDependencyError } from '../missing-dependency-error.js';
import { CliLogger } from '../io/cli-logger.js';
import { getVersion } from '../version.js';

export const CompileBlueprintsOptionsSchema = BaseOptionsSchema.extend({
  compiler: z.string().min(1, 'compiler is required'),
  outputDir: z.string().min(1, 'output directory is required'),
  baseDir: z.string().min(1, 'base directory is required'),
  files: z.array(z.string()).default([]),
});

export type CompileBlueprintsOptions = z.output<typeof CompileBlueprintsOptionsSchema>;

async function compileBlueprints(options: CompileBlueprintsOptions): Promise<CommandResults> {
  const startTime = Date.now();
  const logger = new CliLogger(options.verbose, options.quiet);
  const results: CheckResult[] = [];

  for (const [index, input] of options.files.entries()) {
    const output = blueprintOutputPath(input, options.baseDir, options.outputDir);
    logger.debug(`${options.compiler} compile --output ${output} ${input}`);

    const child = spawnSync(options.compiler, ['compile', '--output', output, input], {
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    if (child.error) {
      throw new MissingDependencyError(
        `Could not run Blueprint compiler '${options.compiler}': ${child.error.message}`,
        options.compiler,
        'Install blueprint-compiler or pass the path to it',
        child.error
      );
    }

    const success = child.status === 0;
    const exitReason = child.signal ? `killed by signal ${child.signal}` : `exited with status ${child.status}`;
    results.push(createCheckResult({
      entity: input,
      check: 'compile-blueprint',
      success,
      error: success ? undefined : (child.stderr.trim() || exitReason),
      metadata: { output },
    }));

    if (!success) {
      const remaining = options.files.length - index - 1;
      if (remaining > 0) {
        logger.debug(`Stopping; ${remaining} files not compiled`);
      }
      return createCommandResults('compile-blueprints', process.cwd(), results, startTime, {
        skipped: remaining,
        cliVersion: getVersion(),
      });
    }
  }

  return createCommandResults('compile-blueprints', process.cwd(), results, startTime, {
    cliVersion: getVersion(),
  });
}

export const compileBlueprintsCommand = new CommandBuilder()
  .name('compile-blueprints')
  .description('Compile Blueprint files into one flat directory of UI definitions')
  .schema(CompileBlueprintsOptionsSchema)
  .args(withBaseArgs({}, {}, ['compiler', 'outputDir', 'baseDir'], 'files'))
  .examples(
    'potcheck compile-blueprints blueprint-compiler build/ui src src/window.blp src/session/view.blp'
  )
  .setupHandler(compileBlueprints)
  .build();
