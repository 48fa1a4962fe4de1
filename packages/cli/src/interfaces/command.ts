/**
 * Standard Command Interface for the atelier CLI
 *
 * All commands implement this interface so they can be registered and
 * tested the same way.
 */

import { Command } from 'commander';

/**
 * Base options that all commands support
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   */
  register(program: Command): void;
}

export interface IExecutableCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {
  execute(options: TOptions): Promise<void>;
}
