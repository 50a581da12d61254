/**
 * Argument Parser - Functional parser generator for CLI arguments
 *
 * Turns the declarative argument specification of a command into a parser
 * that runs `arg`, normalizes the result to camelCase keys, and validates it
 * with the command's zod schema.
 */

import arg from 'arg';
import { z } from 'zod';
import type { CommandDefinition, ArgSpec } from '../command-definition.js';
import { BaseOptionsSchema, type BaseOptions } from '../base-options-schema.js';

/**
 * Type mapping from our declarative types to arg library types
 */
const ARG_TYPE_MAP = {
  string: String,
  boolean: Boolean,
};

export interface ParsedArguments<T> {
  /** Options validated by the command's own schema */
  options: T;
  /** The options shared by every command */
  base: BaseOptions;
}

/**
 * Create a parser function for a command
 */
export function createArgParser<T>(
  command: CommandDefinition<T>
): (argv: string[]) => ParsedArguments<T> {
  const argSpec = buildArgSpec(command.argSpec);

  return (argv: string[]) => {
    try {
      const rawArgs = arg(argSpec, { argv, permissive: false });
      const normalized = normalizeArgs(rawArgs, command.argSpec);

      return {
        options: command.schema.parse(normalized),
        base: BaseOptionsSchema.parse(normalized),
      };
    } catch (error) {
      if (error instanceof arg.ArgError) {
        throw new Error(`Invalid arguments: ${error.message}`);
      }
      if (error instanceof z.ZodError) {
        const issues = error.issues.map(i => `  ${i.path.join('.')}: ${i.message}`).join('\n');
        throw new Error(`Invalid arguments:\n${issues}`);
      }
      throw error;
    }
  };
}

/**
 * Build arg library specification from our declarative format
 */
function buildArgSpec(spec: ArgSpec): arg.Spec {
  const result: arg.Spec = {};

  for (const [key, def] of Object.entries(spec.args)) {
    result[key] = ARG_TYPE_MAP[def.type];
  }

  if (spec.aliases) {
    Object.assign(result, spec.aliases);
  }

  return result;
}

/**
 * Normalize parsed arguments to match zod schema expectations
 *
 * The arg library returns arguments with '--' prefix, but our schemas
 * expect camelCase property names.
 */
function normalizeArgs(
  rawArgs: arg.Result<arg.Spec>,
  spec: ArgSpec
): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};
  const positionals = rawArgs._;
  const named = spec.positional ?? [];

  named.forEach((name, index) => {
    const value = positionals[index];
    if (value !== undefined) {
      normalized[name] = value;
    }
  });

  if (spec.rest) {
    normalized[spec.rest] = positionals.slice(named.length);
  } else if (positionals.length > named.length) {
    throw new Error(`Invalid arguments: unexpected argument '${positionals[named.length]}'`);
  }

  for (const [key, value] of Object.entries(rawArgs)) {
    if (key === '_') continue;
    if (value !== undefined) {
      normalized[kebabToCamel(key.replace(/^--/, ''))] = value;
    }
  }

  // Apply defaults from spec
  for (const [key, def] of Object.entries(spec.args)) {
    const normalizedKey = kebabToCamel(key.replace(/^--/, ''));
    if (normalized[normalizedKey] === undefined && def.default !== undefined) {
      normalized[normalizedKey] = def.default;
    }
  }

  return normalized;
}

/**
 * Convert kebab-case to camelCase
 */
export function kebabToCamel(str: string): string {
  return str.replace(/-([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

function camelToKebab(str: string): string {
  return str.replace(/[A-Z]/g, letter => `-${letter.toLowerCase()}`);
}

/**
 * Generate help text from command definition
 */
export function generateHelp<T>(command: CommandDefinition<T>): string {
  const lines: string[] = [];
  const { argSpec } = command;

  lines.push(`${command.name} - ${command.description}`);
  lines.push('');

  const usage = [`potcheck ${command.name}`, '[options]'];
  for (const name of argSpec.positional ?? []) {
    usage.push(`<${camelToKebab(name)}>`);
  }
  if (argSpec.rest) {
    usage.push(`[${camelToKebab(argSpec.rest)}...]`);
  }
  lines.push('USAGE:');
  lines.push(`  ${usage.join(' ')}`);
  lines.push('');
  lines.push('OPTIONS:');

  const keyStrings = Object.keys(argSpec.args).map(key => {
    const aliases = findAliases(key, argSpec.aliases);
    return aliases.length > 0 ? `${aliases.join(', ')}, ${key}` : key;
  });
  const width = Math.max(...keyStrings.map(k => k.length)) + 2;

  Object.values(argSpec.args).forEach((def, index) => {
    let description = def.description;
    if (def.choices) {
      description += ` (${def.choices.join(', ')})`;
    }
    if (def.default !== undefined) {
      description += ` [default: ${def.default}]`;
    }

    lines.push(`  ${(keyStrings[index] ?? '').padEnd(width)} ${description}`);
  });

  if (command.examples.length > 0) {
    lines.push('');
    lines.push('EXAMPLES:');
    for (const example of command.examples) {
      lines.push(`  ${example}`);
    }
  }

  return lines.join('\n');
}

/**
 * Find aliases for a given argument key
 */
function findAliases(
  key: string,
  aliases?: Record<string, string>
): string[] {
  if (!aliases) return [];

  return Object.entries(aliases)
    .filter(([_, target]) => target === key)
    .map(([alias]) => alias);
}
