#!/usr/bin/env node

import { Command } from 'commander';
import { registerComponentsCommand } from './commands/components/components';
import { registerStateCommand } from './commands/state/state';

const program = new Command();

program
  .name('atelier')
  .description('Inspect the components and persisted state of an atelier project')
  .version('0.1.0');

registerComponentsCommand(program);
registerStateCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Fatal error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
