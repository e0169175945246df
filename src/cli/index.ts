#!/usr/bin/env node
import { Command } from 'commander';
import dotenv from 'dotenv';
import { registerServiceCommands } from './commands/services';
import { registerGateCommands } from './commands/gate';
import { registerTaskCommands } from './commands/tasks';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('prp-coordinator')
    .description('Work queue, task state and agent liveness coordinator for autonomous workers')
    .version('0.1.0')
    .option('--json', 'Output results as JSON');

  registerServiceCommands(program);
  registerGateCommands(program);
  registerTaskCommands(program);

  return program;
}

if (require.main === module) {
  // Load env vars from CWD .env before any command reads its config
  dotenv.config();
  createProgram().parseAsync(process.argv).catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
