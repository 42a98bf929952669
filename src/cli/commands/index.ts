import { Command } from 'commander';
import { registerAskCommand } from './ask';
import { registerResumeCommand } from './resume';
import { registerStatusCommand } from './status';
import { registerHistoryCommand } from './history';

/**
 * Register all subcommands here
 */
export function registerCommands(program: Command): void {
  registerAskCommand(program);
  registerResumeCommand(program);
  registerStatusCommand(program);
  registerHistoryCommand(program);
}
