import chalk from 'chalk';
import type { RoutingRecord, RunFailure, Stage, StageTransition } from '../orchestrator/states';
import type { WorkflowResult } from '../orchestrator/workflow';

// ── Primitives ──────────────────────────────────────────────────────────

export function formatStep(message: string): string {
  return chalk.cyan(`> ${message}`);
}

export function formatInfo(message: string): string {
  return chalk.gray(`  ${message}`);
}

export function formatSuccess(message: string): string {
  return chalk.green(`  ${message}`);
}

export function formatError(message: string): string {
  return chalk.red(`  ${message}`);
}

export function formatWarning(message: string): string {
  return chalk.yellow(`  ${message}`);
}

// ── Stage progress ──────────────────────────────────────────────────────

const STAGE_LABELS: Record<Stage, string> = {
  START: 'Starting',
  ORCHESTRATING: 'Classifying request...',
  SKIP_PLANNING: 'Simple request, skipping planner',
  PLANNING: 'Planning...',
  EXECUTING: 'Executing plan...',
  VALIDATING: 'Validating result...',
  RETRY: 'Rejected, revising plan',
  DONE: 'Done',
  FAILED: 'Failed',
};

export function formatStageTransition(from: Stage, to: Stage): string {
  return chalk.cyan(`  [${from} -> ${to}] ${STAGE_LABELS[to]}`);
}

export function formatVerboseSection(title: string, body: string): string {
  const separator = chalk.gray('─'.repeat(60));
  return `${separator}\n${chalk.bold(title)}\n${body}\n${separator}`;
}

export function formatRouting(routing: RoutingRecord[]): string {
  if (!routing.length) return formatVerboseSection('Model Routing', '  (no model calls)');
  const lines = routing.map((r) => {
    const fallbacks = r.failures.length ? ` after ${r.failures.map((f) => `${f.entryId} (${f.code})`).join(', ')}` : '';
    return `  ${r.stage.padEnd(13)} ${r.logicalName} -> ${r.entryId} [${r.model}]${fallbacks}`;
  });
  return formatVerboseSection('Model Routing', lines.join('\n'));
}

export function formatTrace(trace: StageTransition[]): string {
  if (!trace.length) return formatVerboseSection('Transitions', '  (not started)');
  return formatVerboseSection('Transitions', trace.map((t) => `  ${t.at}  ${t.from.padEnd(13)} -> ${t.to.padEnd(13)} ${t.trigger}`).join('\n'));
}

/** Error line plus one line per diagnostic */
export function formatFailure(failure: RunFailure): string[] {
  return [
    formatError(`Error: [${failure.code}] ${failure.message} (at ${failure.stage})`),
    ...failure.diagnostics.map((d) => formatWarning(`- ${d.step !== undefined ? `step ${d.step}: ` : ''}${d.message}`)),
  ];
}

// ── Final result ────────────────────────────────────────────────────────

export function formatWorkflowResult(result: WorkflowResult, opts?: { verbose?: boolean }): string {
  const lines: string[] = [''];

  if (result.status === 'completed') {
    lines.push(chalk.green.bold('Workflow completed successfully.'));
  } else if (result.status === 'pending') {
    lines.push(chalk.yellow.bold('Workflow interrupted.'));
  } else {
    lines.push(chalk.red.bold('Workflow failed.'));
  }

  lines.push(formatInfo(`Run ID:    ${result.runId}`));
  lines.push(formatInfo(`Stage:     ${result.finalStage}`));
  lines.push(formatInfo(`Retries:   ${result.retryCount}`));
  lines.push(formatInfo(`Duration:  ${(result.durationMs / 1000).toFixed(1)}s`));

  if (result.failure) {
    lines.push(...formatFailure(result.failure));
  }

  if (opts?.verbose) {
    lines.push(formatRouting(result.routing));
  }

  if (result.output !== undefined) {
    lines.push('');
    lines.push(result.output);
  }

  return lines.join('\n');
}
