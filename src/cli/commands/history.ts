import { Command, InvalidArgumentError } from 'commander';
import path from 'path';
import { loadConfig } from '../../config/loader';
import { StageSchema, type Stage } from '../../orchestrator/states';
import { errorMessage } from '../../utils/errors';
import { HistoryStore, type HistoryEntryDetail, type HistoryFilter } from '../history-store';
import { formatError, formatFailure, formatInfo, formatRouting, formatStep, formatTrace } from '../formatters';

interface HistoryOptions {
  runId?: string;
  stage?: Stage;
  from?: Date;
  to?: Date;
  limit?: number;
  export?: string;
  json?: boolean;
}

// ── Argument parsers (commander calls these with the raw value) ─────────

export function parseDate(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) throw new InvalidArgumentError(`Not a date: ${value}`);
  return date;
}

export function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError(`Expected a positive integer, got: ${value}`);
  return n;
}

export function parseStage(value: string): Stage {
  const parsed = StageSchema.safeParse(value.toUpperCase());
  if (!parsed.success) throw new InvalidArgumentError(`Unknown stage: ${value} (expected one of ${StageSchema.options.join(', ')})`);
  return parsed.data;
}

// ── Rendering ───────────────────────────────────────────────────────────

function renderDetail({ state, checkpoints }: HistoryEntryDetail): string {
  const lines = [formatStep(`Run ${state.runId}`), formatInfo(`Request:     ${state.agentState.input}`), formatInfo(`Final stage: ${state.stage} after ${checkpoints.length} checkpoint(s)`)];

  state.planHistory.forEach((plan, i) => {
    lines.push(formatInfo(`Plan r${i}:     ${plan.map((s) => `${s.index}. ${s.description}`).join('; ')}`));
  });
  if (state.failure) lines.push(...formatFailure(state.failure));
  lines.push(formatTrace(state.trace), formatRouting(state.routing));

  return lines.join('\n');
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('List past workflow runs')
    .option('--run-id <id>', 'Show every checkpoint of one run')
    .option('--stage <stage>', 'Only runs whose last checkpoint is at this stage', parseStage)
    .option('--from <date>', 'Only runs updated at or after this ISO date', parseDate)
    .option('--to <date>', 'Only runs updated at or before this ISO date', parseDate)
    .option('--limit <n>', 'Maximum number of runs', parseLimit)
    .option('--export <file>', 'Also write the listed runs to a JSON file')
    .option('--json', 'Output as JSON', false)
    .action(async (options: HistoryOptions) => {
      try {
        const history = new HistoryStore({ rootDir: loadConfig().workflow.checkpoint_dir });

        if (options.runId) {
          const detail = await history.detail(options.runId);
          if (!detail) console.log(formatInfo(`No checkpoints for run ${options.runId}`));
          else console.log(options.json ? JSON.stringify(detail, null, 2) : renderDetail(detail));
          return;
        }

        const filter: HistoryFilter = { stage: options.stage, from: options.from, to: options.to, limit: options.limit };
        const entries = await history.list(filter);

        if (options.export) {
          await history.exportToFile(entries, path.resolve(options.export));
        }

        if (options.json) {
          console.log(JSON.stringify(entries, null, 2));
        } else if (!entries.length) {
          console.log(formatInfo('No runs match.'));
        } else {
          console.log(formatStep(`${entries.length} run(s)`));
          for (const e of entries) {
            console.log(formatInfo(`${e.updatedAt}  ${e.runId}  ${e.stage.padEnd(13)} retries=${e.retryCount}  "${truncate(e.input, 48)}"`));
          }
        }

        if (options.export) console.log(formatInfo(`Exported to ${options.export}`));
      } catch (err) {
        console.error(formatError(errorMessage(err)));
        process.exitCode = 1;
      }
    });
}
