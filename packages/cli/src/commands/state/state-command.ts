import { Command } from 'commander';
import type { Framework } from '@atelier/core';
import { BaseCommand, errorMessage } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface StateCommandOptions extends BaseCommandOptions {
  /** Project root (default: nearest directory with an atelier config) */
  root?: string;
  /** Flat key, or dot-separated path into nested state when no flat key matches */
  key?: string;
}

/**
 * State Command - prints the persisted UI state of a project
 *
 * Boots the framework without discovery, loads the persistence file and
 * prints every restored key, or the single value under --key.
 */
export class StateCommand extends BaseCommand<StateCommandOptions> {
  protected commandName = 'state';
  protected description = 'Show the persisted state snapshot';

  register(program: Command): void {
    program
      .command(this.commandName)
      .description(this.description)
      .option('-r, --root <dir>', 'Project root directory')
      .option('--json', 'Output in JSON format', false)
      .option('-k, --key <key>', 'Only show this key (dot-separated for nested values)')
      .option('-v, --verbose', 'Show technical details on errors', false)
      .option('-q, --quiet', 'Suppress text output', false)
      .action(async (options: StateCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: StateCommandOptions): Promise<void> {
    let framework: Framework.Framework;
    try {
      framework = await this.container.getFramework({
        ...(options.root !== undefined && { root: options.root }),
        skipDiscovery: true,
      });
    } catch (error) {
      this.handleError(`Failed to load project: ${errorMessage(error)}`, options, error instanceof Error ? error : undefined);
      return;
    }

    try {
      const { stateManager } = framework;

      if (options.key !== undefined) {
        const value = stateManager.get(options.key) ?? stateManager.getNested(options.key.split('.'));
        if (value === undefined) {
          this.handleError(`State key not found: ${options.key}`, options);
          return;
        }
        this.handleSuccess({ key: options.key, value }, options, [`${options.key} = ${JSON.stringify(value)}`]);
        return;
      }

      const snapshot = stateManager.snapshot();
      const keys = Object.keys(snapshot).sort();
      const lines = keys.length === 0
        ? ['No persisted state.']
        : keys.map((key) => `${key} = ${JSON.stringify(snapshot[key])}`);
      this.handleSuccess(snapshot, options, lines);
    } finally {
      framework.dispose();
    }
  }
}
