import type { Config, ProviderConfig } from '../config/validator';
import { silentLogger, type WorkflowLogger } from '../utils/logger';
import { AnthropicClient } from './anthropic';
import { OpenAICompatibleClient } from './openai-compatible';
import { ModelRouter } from './router';
import type { FallbackEntry, FallbackEvent, ModelClient } from './types';

export function createProviderClient(id: string, provider: ProviderConfig & { api_key: string }, config: Config): ModelClient {
  switch (provider.kind) {
    case 'anthropic':
      return new AnthropicClient({
        provider: id,
        apiKey: provider.api_key,
        model: provider.model,
        temperature: config.model.temperature,
        maxTokens: config.model.max_tokens,
        timeoutMs: config.agent.timeout_ms,
      });
    case 'openai': {
      if (!provider.base_url) {
        throw new Error(`Provider "${id}" needs a base_url`);
      }
      return new OpenAICompatibleClient({
        provider: id,
        apiKey: provider.api_key,
        baseUrl: provider.base_url,
        model: provider.model,
        temperature: config.model.temperature,
        maxTokens: config.model.max_tokens,
        timeoutMs: config.agent.timeout_ms,
      });
    }
  }
}

/** Route order with the configured primary provider moved to the front */
export function orderRoute(route: readonly string[], primary?: string): string[] {
  if (!primary || !route.includes(primary)) return [...route];
  return [primary, ...route.filter((id) => id !== primary)];
}

/**
 * Build a router from configuration. Providers without an API key are left
 * out of every route; a route left empty is not registered, so resolving it
 * fails with ModelUnavailableError.
 */
export function createModelRouter(config: Config, logger: WorkflowLogger = silentLogger): ModelRouter {
  const router = new ModelRouter();
  router.events.on('fallback', (failure: FallbackEvent) => {
    logger.warn(`Model ${failure.logicalName}: ${failure.entryId} failed, falling back`, { code: failure.code, error: failure.message });
  });
  const clients = new Map<string, FallbackEntry>();

  for (const [id, provider] of Object.entries(config.providers)) {
    const apiKey = provider.api_key;
    if (!apiKey) {
      logger.debug(`Provider ${id} has no API key; skipping`);
      continue;
    }
    clients.set(id, { id, provider: provider.kind, model: provider.model, client: createProviderClient(id, { ...provider, api_key: apiKey }, config) });
  }

  for (const [logicalName, route] of Object.entries(config.model.routes)) {
    const entries: FallbackEntry[] = [];
    for (const id of orderRoute(route, config.model.primary)) {
      const entry = clients.get(id);
      if (entry) {
        entries.push(entry);
      } else if (!(id in config.providers)) {
        logger.warn(`Route "${logicalName}" references unknown provider "${id}"`);
      }
    }

    if (entries.length === 0) {
      logger.warn(`Route "${logicalName}" has no usable providers (missing API keys?)`);
      continue;
    }
    router.register(logicalName, entries);
  }

  return router;
}
