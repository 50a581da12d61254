/**
 * Resources Command - runs only the resource list ordering checks
 */

import { z } from 'zod';
import { CommandBuilder, type ProjectContext } from '../command-definition.js';
import { BaseOptionsSchema, withBaseArgs } from '../base-options-schema.js';
import { createCommandResults, type CommandResults } from '../command-results.js';
import { CliLogger } from '../io/cli-logger.js';
import { runBlueprintResourcesCheck, runGresourceCheck } from '../checks/resource-checks.js';
import { getVersion } from '../version.js';

export const ResourcesOptionsSchema = BaseOptionsSchema;

export type ResourcesOptions = z.output<typeof ResourcesOptionsSchema>;

async function resources(options: ResourcesOptions, project: ProjectContext): Promise<CommandResults> {
  const startTime = Date.now();
  const logger = new CliLogger(options.verbose, options.quiet);

  const results = [
    runBlueprintResourcesCheck(project, logger),
    runGresourceCheck(project, logger),
  ];

  return createCommandResults('resources', project.root, results, startTime, {
    cliVersion: getVersion(),
  });
}

export const resourcesCommand = new CommandBuilder()
  .name('resources')
  .description('Check that the Blueprint resource list and the GResource manifest are sorted')
  .schema(ResourcesOptionsSchema)
  .args(withBaseArgs())
  .examples('potcheck resources')
  .projectHandler(resources)
  .build();
