import type { Context } from '../context/types';

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  /** Aborted when the calling agent times out */
  signal?: AbortSignal;
}

export interface Completion {
  text: string;
  raw: unknown;
}

/**
 * Uniform interface over a single LLM provider endpoint.
 * Implementations reject with ModelTimeoutError, ModelRateLimitedError or
 * ModelMalformedError when they can tell those cases apart.
 */
export interface ModelClient {
  complete(context: Context, options: CompletionOptions): Promise<Completion>;
}

/** One entry in a logical model's fallback list */
export interface FallbackEntry {
  /** Unique id within the list, e.g. "kimi" */
  id: string;
  provider: string;
  model: string;
  client: ModelClient;
}

export interface RouteFailure {
  entryId: string;
  code: string;
  message: string;
}

/** Published each time an entry fails and the router moves on */
export interface FallbackEvent extends RouteFailure {
  logicalName: string;
}

/** Which entry answered a routed call, and which ones failed before it */
export interface RoutingDecision {
  logicalName: string;
  entryId: string;
  provider: string;
  model: string;
  index: number;
  failures: RouteFailure[];
  at: string;
}

export interface RoutedCompletion extends Completion {
  route: RoutingDecision;
}
