import { Command } from 'commander';
import { loadConfig, type DeepPartial } from '../../config/loader';
import type { Config } from '../../config/validator';
import type { WorkflowResult } from '../../orchestrator/workflow';
import { errorMessage } from '../../utils/errors';
import { formatError, formatStageTransition, formatStep, formatWorkflowResult } from '../formatters';
import { createRuntime } from '../runtime';

export type RunCommandOptions = {
  model?: string;
  maxRetries?: string;
  runId?: string;
  stream?: boolean;
  json?: boolean;
  verbose?: boolean;
};

function overridesFrom(options: RunCommandOptions): DeepPartial<Config> {
  const overrides: DeepPartial<Config> = {};
  if (options.model) overrides.model = { name: options.model };
  if (options.maxRetries !== undefined) {
    const n = Number.parseInt(options.maxRetries, 10);
    if (!Number.isInteger(n) || n < 0) throw new Error(`--max-retries must be a non-negative integer, got "${options.maxRetries}"`);
    overrides.workflow = { max_retries: n };
  }
  return overrides;
}

export function printResult(result: WorkflowResult, options: { json?: boolean; verbose?: boolean }): void {
  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(formatWorkflowResult(result, { verbose: options.verbose }));
  }
  if (result.status !== 'completed') process.exitCode = 1;
}

/**
 * Executes the `sequent run` command.
 */
export async function executeRunCommand(request: string, options: RunCommandOptions): Promise<void> {
  const config = loadConfig(overridesFrom(options));
  const { workflow } = createRuntime(config, { verbose: options.verbose });
  const runOptions = options.runId ? { runId: options.runId } : {};

  if (!options.json) console.log(formatStep(`Running: ${request}`));

  if (!options.stream) {
    printResult(await workflow.run(request, [], [], runOptions), options);
    return;
  }

  const events = workflow.stream(request, [], [], runOptions);
  for (;;) {
    const next = await events.next();
    if (next.done) {
      printResult(next.value, options);
      return;
    }
    const event = next.value;
    console.log(options.json ? JSON.stringify({ from: event.from, to: event.to, trigger: event.trigger, at: event.at }) : formatStageTransition(event.from, event.to));
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run a request through the agent pipeline')
    .argument('<request...>', 'The request to process')
    .option('--model <name>', 'Logical model name to route through')
    .option('--max-retries <n>', 'Validator rejections tolerated before the run fails')
    .option('--run-id <id>', 'Run identifier (generated if omitted)')
    .option('--stream', 'Print each stage transition as it happens', false)
    .option('--json', 'Output as JSON', false)
    .option('--verbose', 'Show debug logs and model routing')
    .action(async (request: string[], options: RunCommandOptions) => {
      try {
        await executeRunCommand(request.join(' '), { ...options, verbose: options.verbose ?? program.opts().verbose === true });
      } catch (err) {
        console.error(formatError(errorMessage(err)));
        process.exitCode = 1;
      }
    });
}
