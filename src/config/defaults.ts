import type { Config } from './validator';

export const defaults: Config = {
  model: {
    name: 'default',
    temperature: 0.7,
    max_tokens: 4000,
    routes: {
      default: ['kimi', 'claude', 'groq', 'openai'],
    },
  },
  providers: {
    kimi: { kind: 'openai', base_url: 'https://api.moonshot.ai/v1', model: 'kimi-k2-turbo-preview' },
    claude: { kind: 'anthropic', model: 'claude-sonnet-4-20250514' },
    groq: { kind: 'openai', base_url: 'https://api.groq.com/openai/v1', model: 'llama-3.3-70b-versatile' },
    openai: { kind: 'openai', base_url: 'https://api.openai.com/v1', model: 'gpt-4-turbo-preview' },
  },
  agent: {
    timeout_ms: 60000,
    max_retries: 3,
    retry_delay_ms: 0,
    backoff_multiplier: 1,
  },
  workflow: {
    max_retries: 3,
    checkpoint_dir: '.sequent',
  },
  context: {
    size: 8192,
  },
  logging: {
    level: 'info',
  },
};
