import fs from 'fs/promises';
import path from 'path';
import { WorkflowStateSchema, type WorkflowState } from './states';

/**
 * Persistence boundary for checkpoints. Writes for one run id must be
 * serialized by the caller; different run ids are independent.
 */
export interface CheckpointStore {
  save(runId: string, state: WorkflowState): Promise<void>;
  /** Latest checkpoint for the run, or null when none exists */
  load(runId: string): Promise<WorkflowState | null>;
  listRunIds?(): Promise<string[]>;
}

/**
 * Appends one JSON line per checkpoint to `<rootDir>/<runId>/checkpoints.jsonl`.
 * The last line is the resumable state; earlier lines are the run's history.
 */
export class FileCheckpointStore implements CheckpointStore {
  constructor(private rootDir: string = '.sequent') {}

  private checkpointPath(runId: string): string {
    if (!runId || runId !== path.basename(runId) || runId.startsWith('.')) {
      throw new Error(`Invalid run id: ${runId}`);
    }
    return path.join(this.rootDir, runId, 'checkpoints.jsonl');
  }

  async save(runId: string, state: WorkflowState): Promise<void> {
    const file = this.checkpointPath(runId);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await this.repairTail(file);
    await fs.appendFile(file, `${JSON.stringify(state)}\n`, 'utf-8');
  }

  async load(runId: string): Promise<WorkflowState | null> {
    const all = await this.history(runId);
    return all[all.length - 1] ?? null;
  }

  /** Every checkpoint written for the run, oldest first */
  async history(runId: string): Promise<WorkflowState[]> {
    let data: string;
    try {
      data = await fs.readFile(this.checkpointPath(runId), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const lines = data.split('\n').filter((line) => line.trim().length > 0);
    const checkpoints: WorkflowState[] = [];
    for (const [i, line] of lines.entries()) {
      const state = parseCheckpoint(line);
      if (state) {
        checkpoints.push(state);
      } else if (i < lines.length - 1) {
        throw new Error(`Corrupt checkpoint on line ${i + 1} for run ${runId}`);
      }
      // An unreadable last line is a write torn by a crash; the line before it is the committed state
    }
    return checkpoints;
  }

  /**
   * Make the file end on a line boundary before appending: a torn last line
   * is cut off, a complete one missing its newline gets it.
   */
  private async repairTail(file: string): Promise<void> {
    let data: string;
    try {
      data = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return;
      throw error;
    }
    if (data.length === 0 || data.endsWith('\n')) return;

    const cut = data.lastIndexOf('\n') + 1;
    if (parseCheckpoint(data.slice(cut))) {
      await fs.appendFile(file, '\n', 'utf-8');
    } else {
      await fs.truncate(file, Buffer.byteLength(data.slice(0, cut), 'utf-8'));
    }
  }

  async listRunIds(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.rootDir, { withFileTypes: true });
      return entries.filter((e) => e.isDirectory()).map((e) => e.name);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
  }

  async exists(runId: string): Promise<boolean> {
    try {
      await fs.access(this.checkpointPath(runId));
      return true;
    } catch {
      return false;
    }
  }
}

/** In-process store; copies on the way in and out so callers never share objects */
export class MemoryCheckpointStore implements CheckpointStore {
  private runs = new Map<string, WorkflowState[]>();

  async save(runId: string, state: WorkflowState): Promise<void> {
    const list = this.runs.get(runId) ?? [];
    list.push(structuredClone(state));
    this.runs.set(runId, list);
  }

  async load(runId: string): Promise<WorkflowState | null> {
    const list = this.runs.get(runId);
    const last = list?.[list.length - 1];
    return last ? structuredClone(last) : null;
  }

  async history(runId: string): Promise<WorkflowState[]> {
    return structuredClone(this.runs.get(runId) ?? []);
  }

  async listRunIds(): Promise<string[]> {
    return [...this.runs.keys()];
  }
}

function parseCheckpoint(line: string): WorkflowState | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = WorkflowStateSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
