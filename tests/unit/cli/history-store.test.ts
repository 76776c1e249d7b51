import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { HistoryStore } from '../../../src/cli/history-store';
import { createAgentState } from '../../../src/orchestrator/data-flow';
import { FileCheckpointStore } from '../../../src/orchestrator/state-store';
import type { Stage, WorkflowState } from '../../../src/orchestrator/states';

function checkpoint(runId: string, sequence: number, stage: Stage, updatedAt: string): WorkflowState {
  return {
    runId,
    stage,
    checkpointId: `${runId}:${sequence}`,
    sequence,
    createdAt: '2026-03-01T09:00:00.000Z',
    updatedAt,
    agentState: createAgentState(`task for ${runId}`),
    trace: [],
    routing: [],
    planHistory: [],
  };
}

describe('HistoryStore', () => {
  let rootDir: string;
  let history: HistoryStore;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sequent-history-'));
    history = new HistoryStore({ rootDir });

    const store = new FileCheckpointStore(rootDir);
    await store.save('run-old', checkpoint('run-old', 1, 'ORCHESTRATING', '2026-03-01T09:00:01.000Z'));
    await store.save('run-old', checkpoint('run-old', 2, 'DONE', '2026-03-01T09:00:05.000Z'));
    await store.save('run-new', checkpoint('run-new', 1, 'ORCHESTRATING', '2026-03-02T10:00:01.000Z'));
    await store.save('run-new', {
      ...checkpoint('run-new', 2, 'FAILED', '2026-03-02T10:00:03.000Z'),
      failure: { stage: 'PLANNING', code: 'RETRIES_EXHAUSTED', message: 'planner agent failed after 3 attempt(s)', diagnostics: [] },
    });
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  it('should summarise runs newest first', async () => {
    const entries = await history.list();

    expect(entries.map((e) => e.runId)).toEqual(['run-new', 'run-old']);
    expect(entries[1]).toEqual({
      runId: 'run-old',
      stage: 'DONE',
      input: 'task for run-old',
      createdAt: '2026-03-01T09:00:00.000Z',
      updatedAt: '2026-03-01T09:00:05.000Z',
      retryCount: 0,
      checkpoints: 2,
    });
    expect(entries[0]?.failure?.code).toBe('RETRIES_EXHAUSTED');
  });

  it('should filter by stage, date range and limit', async () => {
    expect((await history.list({ stage: 'DONE' })).map((e) => e.runId)).toEqual(['run-old']);
    expect((await history.list({ from: new Date('2026-03-02T00:00:00.000Z') })).map((e) => e.runId)).toEqual(['run-new']);
    expect((await history.list({ to: new Date('2026-03-02T00:00:00.000Z') })).map((e) => e.runId)).toEqual(['run-old']);
    expect(await history.list({ limit: 1 })).toHaveLength(1);
  });

  it('should return the latest run and full detail', async () => {
    expect((await history.latest())?.runId).toBe('run-new');

    const detail = await history.detail('run-old');
    expect(detail?.state.stage).toBe('DONE');
    expect(detail?.checkpoints.map((c) => c.stage)).toEqual(['ORCHESTRATING', 'DONE']);
    expect(await history.detail('missing')).toBeNull();
  });

  it('should export summaries as JSON', async () => {
    const file = path.join(rootDir, 'exports', 'runs.json');
    const entries = await history.list();

    await history.exportToFile(entries, file);

    expect(JSON.parse(await fs.readFile(file, 'utf8'))).toEqual(entries);
  });
});
