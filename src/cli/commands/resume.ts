import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import { errorMessage } from '../../utils/errors';
import { formatError, formatStep } from '../formatters';
import { createRuntime } from '../runtime';
import { printResult } from './run';

type ResumeCommandOptions = {
  json?: boolean;
  verbose?: boolean;
};

export function registerResumeCommand(program: Command): void {
  program
    .command('resume')
    .description('Continue a run from its last checkpoint')
    .argument('<runId>', 'Run identifier')
    .option('--json', 'Output as JSON', false)
    .option('--verbose', 'Show debug logs and model routing')
    .action(async (runId: string, options: ResumeCommandOptions) => {
      try {
        const verbose = options.verbose ?? program.opts().verbose === true;
        const { workflow } = createRuntime(loadConfig(), { verbose });
        if (!options.json) console.log(formatStep(`Resuming: ${runId}`));
        printResult(await workflow.resume(runId), { json: options.json, verbose });
      } catch (err) {
        console.error(formatError(errorMessage(err)));
        process.exitCode = 1;
      }
    });
}
