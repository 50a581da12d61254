/**
 * Command Definition - Unified structure for CLI command metadata
 *
 * This module defines the complete structure for command definitions,
 * combining argument specifications, validation schemas, and handlers.
 */

import { z } from 'zod';
import type { CommandResults } from './command-results.js';
import type { ProjectConfig } from './config-loader.js';
import { BASE_ARGS, BASE_ALIASES, type BaseOptions } from './base-options-schema.js';

/**
 * Declarative argument definition for CLI parsing
 */
export interface ArgDefinition {
  type: 'string' | 'boolean';
  description: string;
  default?: string | boolean;
  choices?: readonly string[];
}

/**
 * Declarative argument specification
 */
export interface ArgSpec {
  args: Record<string, ArgDefinition>;
  aliases?: Record<string, string>;
  positional?: string[]; // For commands like 'compile-blueprints <compiler> <output-dir>'
  rest?: string;         // Receives the positional arguments after `positional`
}

/**
 * The project a command runs against: its root directory and the
 * configuration loaded from it
 */
export interface ProjectContext {
  root: string;
  config: ProjectConfig;
}

/**
 * Handler for commands that check a project
 */
export interface ProjectCommandHandler<TOptions> {
  kind: 'project';
  run(options: TOptions, project: ProjectContext): Promise<CommandResults>;
}

/**
 * Handler for commands that only need their options
 */
export interface SetupCommandHandler<TOptions> {
  kind: 'setup';
  run(options: TOptions): Promise<CommandResults>;
}

export type CommandHandler<TOptions> = ProjectCommandHandler<TOptions> | SetupCommandHandler<TOptions>;

/**
 * Complete command definition with all metadata
 *
 * @template TOptions - What the handler receives after schema processing
 */
export interface CommandDefinition<TOptions> {
  name: string;
  description: string;
  schema: z.ZodType<TOptions, z.ZodTypeDef, unknown>;
  argSpec: ArgSpec;
  examples: string[];
  handler: CommandHandler<TOptions>;
}

/**
 * Type-safe command builder for creating command definitions
 */
export class CommandBuilder<TOptions = BaseOptions> {
  private definition: Partial<CommandDefinition<TOptions>>;

  constructor(definition: Partial<CommandDefinition<TOptions>> = {}) {
    this.definition = {
      examples: [],
      argSpec: {
        args: BASE_ARGS,
        aliases: BASE_ALIASES,
      },
      ...definition,
    };
  }

  name(name: string): this {
    this.definition.name = name;
    return this;
  }

  description(desc: string): this {
    this.definition.description = desc;
    return this;
  }

  /**
   * Set the options schema. Any handler set before is dropped, since it was
   * typed against the previous options.
   */
  schema<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): CommandBuilder<T> {
    const { schema: _previous, handler: _handler, ...rest } = this.definition;
    return new CommandBuilder<T>({ ...rest, schema });
  }

  args(spec: ArgSpec): this {
    // Merge with defaults rather than replace
    this.definition.argSpec = {
      args: { ...BASE_ARGS, ...spec.args },
      aliases: { ...BASE_ALIASES, ...spec.aliases },
      positional: spec.positional,
      rest: spec.rest,
    };
    return this;
  }

  examples(...examples: string[]): this {
    this.definition.examples = examples;
    return this;
  }

  /**
   * Handler for commands that run against a project root and its configuration
   */
  projectHandler(fn: (options: TOptions, project: ProjectContext) => Promise<CommandResults>): this {
    this.definition.handler = { kind: 'project', run: fn };
    return this;
  }

  /**
   * Handler for commands that need no project
   */
  setupHandler(fn: (options: TOptions) => Promise<CommandResults>): this {
    this.definition.handler = { kind: 'setup', run: fn };
    return this;
  }

  build(): CommandDefinition<TOptions> {
    const { name, description, schema, argSpec, handler } = this.definition;

    if (!name) throw new Error('Command name is required');
    if (!description) throw new Error('Command description is required');
    if (!schema) throw new Error('Command schema is required');
    if (!argSpec) throw new Error('Command argSpec is required');
    if (!handler) throw new Error('Command handler is required');

    return {
      name,
      description,
      schema,
      argSpec,
      handler,
      examples: this.definition.examples ?? [],
    };
  }
}
