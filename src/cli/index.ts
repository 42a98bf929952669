#!/usr/bin/env node
import { Command } from 'commander';
import { registerCommands } from './commands';

const program = new Command();

program.name('research-graph').description('Conversational company research with resumable threads').version('0.1.0');

registerCommands(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
