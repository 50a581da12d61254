#!/usr/bin/env node
/**
 * potcheck CLI - entry point using the command loader
 *
 * This provides a unified entry point with:
 * - Command lookup from the command registry
 * - Type-safe argument parsing with zod
 * - Consistent error handling, help generation and exit codes
 */

import { getPreamble, getPreambleSeparator } from './core/io/cli-colors.js';
import { printError } from './core/io/cli-logger.js';
import { executeCommand, generateGlobalHelp } from './core/command-loader.js';
import { getAvailableCommands } from './core/command-discovery.js';
import { getVersion } from './core/version.js';

// =====================================================================
// HELPER FUNCTIONS
// =====================================================================

function printVersion(): void {
  console.log(`potcheck v${getVersion()}`);
}

async function printHelp(): Promise<void> {
  console.log(getPreamble(getVersion()));
  console.log(getPreambleSeparator());
  console.log();
  console.log(await generateGlobalHelp());
}

// =====================================================================
// MAIN CLI HANDLER
// =====================================================================

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (command === undefined || command === '--help' || command === '-h') {
    await printHelp();
    return 0;
  }

  if (command === '--version') {
    printVersion();
    return 0;
  }

  const availableCommands = getAvailableCommands();
  if (!availableCommands.includes(command)) {
    printError(`Unknown command: ${command}`);
    console.log(`Available commands: ${availableCommands.join(', ')}`);
    console.log(`Run 'potcheck --help' for more information.`);
    return 1;
  }

  return executeCommand(command, args.slice(1));
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    printError(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
);
