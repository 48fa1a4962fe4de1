/**
 * Base Command Class for the atelier CLI
 *
 * Provides common output and error handling for all commands.
 */

import { Command } from 'commander';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { FrameworkProvider } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand, IExecutableCommand } from '../interfaces/command';

export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand, IExecutableCommand<TOptions> {

  protected readonly logger = console;

  constructor(protected readonly container: FrameworkProvider = DependencyInjectionService.getInstance()) { }

  abstract register(program: Command): void;

  abstract execute(options: TOptions): Promise<void>;

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    if (options.json) {
      console.error(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      console.error(`❌ ${message}`);
      if (options.verbose && error?.stack) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Prints `data` as a JSON envelope under --json, else the text lines
   */
  protected handleSuccess(data: unknown, options: TOptions, lines: string[]): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
      return;
    }

    if (!options.quiet) {
      for (const line of lines) {
        console.log(line);
      }
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
