import { Command } from 'commander';
import { ComponentsCommand } from './components-command';

/**
 * Register the components command
 */
export function registerComponentsCommand(program: Command): void {
  const componentsCommand = new ComponentsCommand();
  componentsCommand.register(program);
}
