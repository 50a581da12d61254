/**
 * Command Loader - Command execution with full lifecycle management
 *
 * Loads a command definition, parses its arguments, resolves the project,
 * runs the handler, prints the formatted results and maps the outcome to
 * an exit code.
 */

import type { BaseOptions } from './base-options-schema.js';
import type { CommandDefinition, ProjectContext } from './command-definition.js';
import type { CommandResults } from './command-results.js';
import { loadAllCommands, loadCommand } from './command-discovery.js';
import { loadProjectConfig } from './config-loader.js';
import { ConfigurationError } from './configuration-error.js';
import { MissingDependencyError } from './missing-dependency-error.js';
import { findProjectRoot } from './project-discovery.js';
import { getVersion } from './version.js';
import { createArgParser, generateHelp } from './io/arg-parser.js';
import { formatResults } from './io/output-formatter.js';
import { printError, setSuppressOutput } from './io/cli-logger.js';
import { getPreamble, getPreambleSeparator } from './io/cli-colors.js';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_MISSING_DEPENDENCY = 2;

/**
 * Print the preamble for non-quiet, summary output
 */
function printPreamble(options: BaseOptions): void {
  if (options.output !== 'summary' || options.quiet) {
    return;
  }
  console.log(getPreamble(getVersion()));
  console.log(getPreambleSeparator());
}

function resolveProject(base: BaseOptions): ProjectContext {
  const root = findProjectRoot(base.root);
  return { root, config: loadProjectConfig(root) };
}

async function runHandler(
  command: CommandDefinition<unknown>,
  options: unknown,
  base: BaseOptions
): Promise<CommandResults> {
  if (command.handler.kind === 'project') {
    return command.handler.run(options, resolveProject(base));
  }
  return command.handler.run(options);
}

async function runCommand(commandName: string, argv: string[]): Promise<number> {
  const command = await loadCommand(commandName);

  if (argv.includes('--help') || argv.includes('-h')) {
    console.log(generateHelp(command));
    return EXIT_OK;
  }

  const parser = createArgParser(command);
  const { options, base } = parser(argv);

  printPreamble(base);

  // Structured output must not be interleaved with log lines
  const previousSuppression = setSuppressOutput(base.output === 'json' || base.output === 'yaml');
  try {
    const results = await runHandler(command, options, base);

    console.log(formatResults(results, base.output, {
      verbose: base.verbose,
      quiet: base.quiet,
    }));

    return results.summary.failed > 0 ? EXIT_FAILED : EXIT_OK;
  } finally {
    setSuppressOutput(previousSuppression);
  }
}

/**
 * Execute a command and return the process exit code
 *
 * 0 when every check passed, 1 when a check failed or the command could not
 * run, 2 when a supporting tool is unavailable.
 */
export async function executeCommand(
  commandName: string,
  argv: string[]
): Promise<number> {
  try {
    return await runCommand(commandName, argv);
  } catch (error) {
    if (error instanceof MissingDependencyError) {
      printError(error.toString());
      return EXIT_MISSING_DEPENDENCY;
    }
    if (error instanceof ConfigurationError) {
      printError(error.toString());
      return EXIT_FAILED;
    }
    printError(error instanceof Error ? error.message : String(error));
    return EXIT_FAILED;
  }
}

/**
 * Generate help text for all commands
 */
export async function generateGlobalHelp(): Promise<string> {
  const commands = await loadAllCommands();
  const lines: string[] = [];

  lines.push('potcheck - Conformity checks for gettext translation manifests and GTK resource lists');
  lines.push('');
  lines.push('USAGE:');
  lines.push('  potcheck <command> [options]');
  lines.push('');

  lines.push('COMMON PARAMETERS:');
  lines.push('  -v, --verbose               Enable verbose output');
  lines.push('  -q, --quiet                 Only report failing checks');
  lines.push('  -o, --output <format>       Output format: summary, table, json, yaml');
  lines.push('  --root <dir>                Project root');
  lines.push('  -h, --help                  Show help for a command');
  lines.push('');

  lines.push('ENVIRONMENT VARIABLES:');
  lines.push('  POTCHECK_ROOT               Project root when --root is not given');
  lines.push('  POTCHECK_CONFIG             Configuration file to use instead of potcheck.json');
  lines.push('  NO_COLOR                    Disable colored output');
  lines.push('');

  lines.push('EXIT STATUS:');
  lines.push('  0  every check passed');
  lines.push('  1  a check failed, or the arguments or configuration are invalid');
  lines.push('  2  git or the Blueprint compiler is unavailable, or nothing is staged');
  lines.push('');

  lines.push('COMMANDS:');
  for (const [name, command] of commands) {
    lines.push(`  ${name.padEnd(20)} ${command.description}`);
  }
  lines.push('');

  lines.push('For command-specific help:');
  lines.push('  potcheck <command> --help');

  return lines.join('\n');
}
