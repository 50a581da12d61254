/**
 * POTFILES Command - runs only the translation manifest check
 */

import { z } from 'zod';
import { CommandBuilder, type ProjectContext } from '../command-definition.js';
import { BaseOptionsSchema, withBaseArgs } from '../base-options-schema.js';
import { createCommandResults, type CommandResults } from '../command-results.js';
import { CliLogger } from '../io/cli-logger.js';
import { runPotfilesCheck } from '../checks/potfiles-check.js';
import { getVersion } from '../version.js';

export const PotfilesOptionsSchema = BaseOptionsSchema;

export type PotfilesOptions = z.output<typeof PotfilesOptionsSchema>;

async function potfiles(options: PotfilesOptions, project: ProjectContext): Promise<CommandResults> {
  const startTime = Date.now();
  const logger = new CliLogger(options.verbose, options.quiet);
  const result = await runPotfilesCheck(project, logger);

  return createCommandResults('potfiles', project.root, [result], startTime, {
    cliVersion: getVersion(),
  });
}

export const potfilesCommand = new CommandBuilder()
  .name('potfiles')
  .description('Check that po/POTFILES.in lists exactly the files with translatable strings')
  .schema(PotfilesOptionsSchema)
  .args(withBaseArgs())
  .examples(
    'potcheck potfiles',
    'potcheck potfiles --verbose'
  )
  .projectHandler(potfiles)
  .build();
