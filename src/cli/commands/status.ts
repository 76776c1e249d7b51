import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import type { WorkflowState } from '../../orchestrator/states';
import { errorMessage } from '../../utils/errors';
import { HistoryStore } from '../history-store';
import { formatError, formatFailure, formatInfo, formatStep } from '../formatters';

interface StatusOptions {
  runId?: string;
  json?: boolean;
}

/** The named run, or the most recently updated one */
async function currentCheckpoint(history: HistoryStore, runId?: string): Promise<WorkflowState | null> {
  const id = runId ?? (await history.latest())?.runId;
  return id ? history.load(id) : null;
}

function statusLines(state: WorkflowState): string[] {
  const { agentState } = state;
  const lines = [
    formatStep(`Run ${state.runId}`),
    formatInfo(`Request:     ${agentState.input}`),
    formatInfo(`Stage:       ${state.stage} (checkpoint ${state.checkpointId})`),
    formatInfo(`Retries:     ${agentState.retryCount}`),
    formatInfo(`Updated:     ${state.updatedAt}`),
  ];

  const { classification } = agentState;
  if (classification) {
    lines.push(formatInfo(`Routing:     ${classification.routing} (${classification.complexity})`));
  }
  if (agentState.plan.length) {
    const succeeded = agentState.results.filter((r) => r.status === 'success').length;
    lines.push(formatInfo(`Progress:    ${succeeded}/${agentState.plan.length} step(s) succeeded`));
  }
  if (state.failure) lines.push(...formatFailure(state.failure));

  return lines;
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the last checkpoint of a run (latest run by default)')
    .option('--run-id <id>', 'Run to inspect')
    .option('--json', 'Output status as JSON', false)
    .action(async (options: StatusOptions) => {
      try {
        const history = new HistoryStore({ rootDir: loadConfig().workflow.checkpoint_dir });
        const state = await currentCheckpoint(history, options.runId);

        if (!state) {
          console.log(formatInfo(options.runId ? `No checkpoints for run ${options.runId}` : 'No runs recorded yet.'));
        } else if (options.json) {
          console.log(JSON.stringify(state, null, 2));
        } else {
          console.log(statusLines(state).join('\n'));
        }
      } catch (err) {
        console.error(formatError(errorMessage(err)));
        process.exitCode = 1;
      }
    });
}
