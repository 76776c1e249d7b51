import fs from 'node:fs/promises';
import path from 'node:path';
import { FileCheckpointStore } from '../orchestrator/state-store';
import type { RunFailure, Stage, WorkflowState } from '../orchestrator/states';

export type HistoryStoreOptions = {
  rootDir?: string;
};

export type HistoryFilter = {
  stage?: Stage;
  from?: Date;
  to?: Date;
  limit?: number;
};

export type HistoryEntrySummary = {
  runId: string;
  stage: Stage;
  input: string;
  createdAt: string;
  updatedAt: string;
  retryCount: number;
  checkpoints: number;
  failure?: RunFailure;
};

export type HistoryEntryDetail = {
  state: WorkflowState;
  checkpoints: WorkflowState[];
};

/** Read-side view over the checkpoint directory for the status and history commands */
export class HistoryStore {
  private store: FileCheckpointStore;

  constructor(opts?: HistoryStoreOptions) {
    this.store = new FileCheckpointStore(opts?.rootDir ?? '.sequent');
  }

  async load(runId: string): Promise<WorkflowState | null> {
    return this.store.load(runId);
  }

  private async summarize(runId: string): Promise<HistoryEntrySummary | null> {
    const checkpoints = await this.store.history(runId);
    const state = checkpoints[checkpoints.length - 1];
    if (!state) return null;

    return {
      runId: state.runId,
      stage: state.stage,
      input: state.agentState.input,
      createdAt: state.createdAt,
      updatedAt: state.updatedAt,
      retryCount: state.agentState.retryCount,
      checkpoints: checkpoints.length,
      ...(state.failure ? { failure: state.failure } : {}),
    };
  }

  private matchesFilter(summary: HistoryEntrySummary, filter: HistoryFilter): boolean {
    if (filter.stage && summary.stage !== filter.stage) return false;

    const updatedAtMs = Date.parse(summary.updatedAt);
    if (Number.isFinite(updatedAtMs)) {
      if (filter.from && updatedAtMs < filter.from.getTime()) return false;
      if (filter.to && updatedAtMs > filter.to.getTime()) return false;
    }

    return true;
  }

  /** Newest first */
  async list(filter: HistoryFilter = {}): Promise<HistoryEntrySummary[]> {
    const runIds = await this.store.listRunIds();
    const summaries = await Promise.all(runIds.map((id) => this.summarize(id)));

    const entries = summaries
      .filter((s): s is HistoryEntrySummary => s !== null)
      .filter((s) => this.matchesFilter(s, filter))
      .sort((a, b) => Date.parse(b.updatedAt) - Date.parse(a.updatedAt));

    if (filter.limit && filter.limit > 0) {
      return entries.slice(0, filter.limit);
    }

    return entries;
  }

  async latest(): Promise<HistoryEntrySummary | null> {
    const list = await this.list({ limit: 1 });
    return list[0] ?? null;
  }

  async detail(runId: string): Promise<HistoryEntryDetail | null> {
    const checkpoints = await this.store.history(runId);
    const state = checkpoints[checkpoints.length - 1];
    if (!state) return null;
    return { state, checkpoints };
  }

  async exportToFile(entries: HistoryEntrySummary[], filePath: string): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(entries, null, 2), 'utf8');
  }
}
