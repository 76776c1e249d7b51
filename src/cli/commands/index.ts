import { Command } from 'commander';
import { registerConfigCommand } from './config';
import { registerHistoryCommand } from './history';
import { registerModelsCommand } from './models';
import { registerResumeCommand } from './resume';
import { registerRunCommand } from './run';
import { registerStatusCommand } from './status';

/**
 * Register all subcommands here
 */
export function registerCommands(program: Command): void {
  registerRunCommand(program);
  registerResumeCommand(program);
  registerStatusCommand(program);
  registerHistoryCommand(program);
  registerConfigCommand(program);
  registerModelsCommand(program);
}
