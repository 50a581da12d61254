/**
 * Check Command
 *
 * Runs every conformity check against the project:
 * - the translation manifest (po/POTFILES.in) against the source tree
 * - the Blueprint resource list (entries exist and are sorted)
 * - the GResource manifest (files are sorted)
 *
 * With --git-staged the resource list checks only run when their file is
 * staged, which is how the pre-commit hook invokes it.
 */

import { z } from 'zod';
import { CommandBuilder, type ProjectContext } from '../command-definition.js';
import { BaseOptionsSchema, withBaseArgs } from '../base-options-schema.js';
import { createCommandResults, type CheckResult, type CommandResults } from '../command-results.js';
import { MissingDependencyError } from '../missing-dependency-error.js';
import { getStagedFiles } from '../git.js';
import { CliLogger } from '../io/cli-logger.js';
import { runPotfilesCheck } from '../checks/potfiles-check.js';
import { runBlueprintResourcesCheck, runGresourceCheck } from '../checks/resource-checks.js';
import { getVersion } from '../version.js';

// =====================================================================
// SCHEMA DEFINITIONS
// =====================================================================

export const CheckOptionsSchema = BaseOptionsSchema.extend({
  gitStaged: z.boolean().default(false),
});

export type CheckOptions = z.output<typeof CheckOptionsSchema>;

// =====================================================================
// COMMAND IMPLEMENTATION
// =====================================================================

async function check(options: CheckOptions, project: ProjectContext): Promise<CommandResults> {
  const startTime = Date.now();
  const logger = new CliLogger(options.verbose, options.quiet);

  let staged: string[] | undefined;
  if (options.gitStaged) {
    staged = getStagedFiles(project.root);
    if (staged.length === 0) {
      throw new MissingDependencyError('Could not check files because none were staged', 'git');
    }
    logger.debug(`${staged.length} staged files`);
  }

  const isSelected = (file: string) => staged === undefined || staged.includes(file);
  const results: CheckResult[] = [];
  let skipped = 0;

  results.push(await runPotfilesCheck(project, logger.child({ check: 'potfiles' })));

  const { blueprintList, gresource } = project.config.resources;
  if (isSelected(blueprintList)) {
    results.push(runBlueprintResourcesCheck(project, logger));
  } else {
    logger.debug(`Skipping ${blueprintList}: not staged`);
    skipped++;
  }

  if (isSelected(gresource)) {
    results.push(runGresourceCheck(project, logger));
  } else {
    logger.debug(`Skipping ${gresource}: not staged`);
    skipped++;
  }

  return createCommandResults('check', project.root, results, startTime, {
    gitStaged: options.gitStaged,
    skipped,
    cliVersion: getVersion(),
  });
}

// =====================================================================
// COMMAND DEFINITION
// =====================================================================

export const checkCommand = new CommandBuilder()
  .name('check')
  .description('Run every conformity check (POTFILES, Blueprint resource list, GResource manifest)')
  .schema(CheckOptionsSchema)
  .args(withBaseArgs({
    '--git-staged': {
      type: 'boolean',
      description: 'Only check resource lists that are staged for commit',
      default: false,
    },
  }, {
    '-s': '--git-staged',
  }))
  .examples(
    'potcheck check',
    'potcheck check --git-staged',
    'potcheck check --root ~/src/chat-app -o json'
  )
  .projectHandler(check)
  .build();
