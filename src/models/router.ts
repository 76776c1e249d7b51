import { EventEmitter } from 'events';
import type { Context } from '../context/types';
import { errorMessage } from '../utils/errors';
import { ModelError, ModelUnavailableError } from './errors';
import type { CompletionOptions, FallbackEntry, FallbackEvent, RouteFailure, RoutedCompletion, RoutingDecision } from './types';

export class ModelRouterEvents extends EventEmitter {
  emitRoute(decision: RoutingDecision): void {
    this.emit('route', decision);
  }

  emitFallback(logicalName: string, failure: RouteFailure): void {
    const event: FallbackEvent = { logicalName, ...failure };
    this.emit('fallback', event);
  }
}

/** A model client bound to one logical name and its fallback list */
export class RoutedModelClient {
  constructor(
    readonly logicalName: string,
    private entries: readonly FallbackEntry[],
    private events: ModelRouterEvents,
  ) {}

  /**
   * Try each entry once, in order. Falls through to the next entry on any
   * provider failure; rethrows immediately when the caller aborted.
   * @throws ModelUnavailableError once every entry has failed
   */
  async complete(context: Context, options: CompletionOptions = {}): Promise<RoutedCompletion> {
    const failures: RouteFailure[] = [];

    for (const [index, entry] of this.entries.entries()) {
      try {
        const completion = await entry.client.complete(context, options);
        const route: RoutingDecision = {
          logicalName: this.logicalName,
          entryId: entry.id,
          provider: entry.provider,
          model: entry.model,
          index,
          failures: [...failures],
          at: new Date().toISOString(),
        };
        this.events.emitRoute(route);
        return { ...completion, route };
      } catch (error) {
        if (options.signal?.aborted) throw error;

        const failure: RouteFailure = {
          entryId: entry.id,
          code: error instanceof ModelError ? error.code : 'MODEL_ERROR',
          message: errorMessage(error),
        };
        failures.push(failure);
        this.events.emitFallback(this.logicalName, failure);
      }
    }

    throw new ModelUnavailableError(this.logicalName, failures);
  }
}

/**
 * ModelRouter resolves logical model names ("default", "fast", ...) to an
 * ordered list of concrete clients. The table is replaced wholesale on
 * registration and only read during calls, so one router can be shared by
 * concurrent runs.
 */
export class ModelRouter {
  private table = new Map<string, readonly FallbackEntry[]>();

  public events = new ModelRouterEvents();

  register(logicalName: string, entries: FallbackEntry[]): void {
    const ids = new Set<string>();
    for (const entry of entries) {
      if (ids.has(entry.id)) {
        throw new Error(`Duplicate fallback entry "${entry.id}" for model "${logicalName}"`);
      }
      ids.add(entry.id);
    }
    this.table.set(logicalName, Object.freeze([...entries]));
  }

  has(logicalName: string): boolean {
    return (this.table.get(logicalName)?.length ?? 0) > 0;
  }

  /** @throws ModelUnavailableError when nothing is registered under the name */
  resolve(logicalName: string): RoutedModelClient {
    const entries = this.table.get(logicalName);
    if (!entries || entries.length === 0) {
      throw new ModelUnavailableError(logicalName);
    }
    return new RoutedModelClient(logicalName, entries, this.events);
  }

  listRoutes(): Array<{ logicalName: string; entries: Array<Pick<FallbackEntry, 'id' | 'provider' | 'model'>> }> {
    return [...this.table.entries()].map(([logicalName, entries]) => ({
      logicalName,
      entries: entries.map(({ id, provider, model }) => ({ id, provider, model })),
    }));
  }
}
