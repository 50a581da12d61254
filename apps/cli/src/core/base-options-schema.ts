/**
 * Base Options Schema - Zod schema for common command options
 *
 * This provides the base zod schema that all commands extend,
 * ensuring type safety throughout the command pipeline.
 */

import { z } from 'zod';
import type { ArgDefinition, ArgSpec } from './command-definition.js';

export const OUTPUT_FORMATS = ['summary', 'table', 'json', 'yaml'] as const;

/**
 * Base zod schema for options common to all commands
 *
 * Fields are optional so CLI args can be omitted, but have defaults so
 * they're always defined at runtime
 */
export const BaseOptionsSchema = z.object({
  verbose: z.boolean().optional().default(false),
  quiet: z.boolean().optional().default(false),
  output: z.enum(OUTPUT_FORMATS).optional().default('summary'),
  root: z.string().optional(),
});

export type BaseOptions = z.output<typeof BaseOptionsSchema>;

/**
 * Common argument definitions that match BaseOptionsSchema
 */
export const BASE_ARGS: Record<string, ArgDefinition> = {
  '--verbose': {
    type: 'boolean',
    description: 'Verbose output',
    default: false,
  },
  '--quiet': {
    type: 'boolean',
    description: 'Only report failing checks',
    default: false,
  },
  '--output': {
    type: 'string',
    description: 'Output format',
    choices: OUTPUT_FORMATS,
    default: 'summary',
  },
  '--root': {
    type: 'string',
    description: 'Project root (defaults to POTCHECK_ROOT, then the current directory)',
  },
  '--help': {
    type: 'boolean',
    description: 'Show this help',
  },
};

/**
 * Common aliases for base arguments
 */
export const BASE_ALIASES: Record<string, string> = {
  '-v': '--verbose',
  '-q': '--quiet',
  '-o': '--output',
  '-h': '--help',
};

/**
 * Helper to merge base args with command-specific args
 */
export function withBaseArgs(
  commandArgs: Record<string, ArgDefinition> = {},
  commandAliases: Record<string, string> = {},
  positional?: string[],
  rest?: string
): ArgSpec {
  return {
    args: { ...BASE_ARGS, ...commandArgs },
    aliases: { ...BASE_ALIASES, ...commandAliases },
    ...(positional && { positional }),
    ...(rest && { rest }),
  };
}
