/**
 * Command Discovery Module → What commands exist?
 *
 * This module is responsible for discovering and loading command definitions.
 * It is the single source of truth for what commands exist in the CLI.
 */

import type { CommandDefinition } from './command-definition.js';

/**
 * Cache of loaded command definitions
 */
const commandCache = new Map<string, CommandDefinition<unknown>>();

/**
 * Map of command names to loaders for their modules
 */
const COMMAND_MODULES: Record<string, () => Promise<CommandDefinition<unknown>>> = {
  'check': async () => (await import('./commands/check.js')).checkCommand,
  'potfiles': async () => (await import('./commands/potfiles.js')).potfilesCommand,
  'resources': async () => (await import('./commands/resources.js')).resourcesCommand,
  'compile-blueprints': async () => (await import('./commands/compile-blueprints.js')).compileBlueprintsCommand,
};

/**
 * Load a command definition by name
 *
 * @throws Error if command not found
 */
export async function loadCommand(name: string): Promise<CommandDefinition<unknown>> {
  const cached = commandCache.get(name);
  if (cached) {
    return cached;
  }

  const loader = COMMAND_MODULES[name];
  if (!loader) {
    throw new Error(`Command '${name}' not found`);
  }

  const command = await loader();
  commandCache.set(name, command);
  return command;
}

/**
 * Get all available command names
 */
export function getAvailableCommands(): string[] {
  return Object.keys(COMMAND_MODULES);
}

/**
 * Load all command definitions
 *
 * @returns Map of command name to definition
 */
export async function loadAllCommands(): Promise<Map<string, CommandDefinition<unknown>>> {
  const definitions = new Map<string, CommandDefinition<unknown>>();
  for (const name of getAvailableCommands()) {
    definitions.set(name, await loadCommand(name));
  }
  return definitions;
}
