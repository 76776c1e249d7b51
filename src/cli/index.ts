#!/usr/bin/env node
import { Command } from 'commander';
import { registerCommands } from './commands';

const program = new Command();

program.name('sequent').description('Sequential multi-agent orchestration: orchestrator, planner, executor, validator').version('0.1.0').option('--verbose', 'Show detailed output');

registerCommands(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
