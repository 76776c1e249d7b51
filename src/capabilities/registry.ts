import type { AgentStateView, CapabilityRef } from '../orchestrator/data-flow';
import { CapabilityNotFoundError } from '../utils/errors';

export type CapabilityKind = CapabilityRef['kind'];

export interface CapabilityOutcome {
  status: 'success' | 'failed';
  payload: unknown;
}

/** A tool or skill body. Must honour `signal` so a timed-out step stops. */
export type CapabilityHandler = (args: Record<string, unknown>, view: AgentStateView, signal: AbortSignal) => Promise<CapabilityOutcome>;

/**
 * Tools and skills callers make available to the executor. Registration is a
 * setup-time concern; lookups are read-only, so one registry can back
 * concurrent runs.
 */
export class CapabilityRegistry {
  private handlers = new Map<string, CapabilityHandler>();

  register(kind: CapabilityKind, name: string, handler: CapabilityHandler): this {
    const key = CapabilityRegistry.key(kind, name);
    if (this.handlers.has(key)) {
      throw new Error(`${kind} "${name}" is already registered`);
    }
    this.handlers.set(key, handler);
    return this;
  }

  has(kind: CapabilityKind, name: string): boolean {
    return this.handlers.has(CapabilityRegistry.key(kind, name));
  }

  list(kind: CapabilityKind): string[] {
    const prefix = `${kind}:`;
    return [...this.handlers.keys()].filter((k) => k.startsWith(prefix)).map((k) => k.slice(prefix.length));
  }

  /** @throws CapabilityNotFoundError when nothing is registered under the name */
  async invoke(ref: CapabilityRef, args: Record<string, unknown>, view: AgentStateView, signal: AbortSignal): Promise<CapabilityOutcome> {
    const handler = this.handlers.get(CapabilityRegistry.key(ref.kind, ref.name));
    if (!handler) {
      throw new CapabilityNotFoundError(ref.name, ref.kind);
    }
    return handler(args, view, signal);
  }

  private static key(kind: CapabilityKind, name: string): string {
    return `${kind}:${name}`;
  }
}
