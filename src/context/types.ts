import type { AgentRole } from '../agents/roles';

export type ContextRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ContextEntry {
  role: ContextRole;
  content: string;
  /** Pinned entries survive truncation (stage instructions and the user input) */
  pinned: boolean;
}

/** Bounded, stage-specific slice of task data handed to one model call */
export interface Context {
  stage: AgentRole;
  entries: ContextEntry[];
  /** Total characters across all entry contents */
  size: number;
  budget: number;
  /** Number of history entries dropped to fit the budget */
  dropped: number;
}
