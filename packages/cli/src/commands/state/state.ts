import { Command } from 'commander';
import { StateCommand } from './state-command';

/**
 * Register the state command
 */
export function registerStateCommand(program: Command): void {
  const stateCommand = new StateCommand();
  stateCommand.register(program);
}
