import { z } from 'zod';

export const ProviderSchema = z.object({
  kind: z.enum(['openai', 'anthropic']),
  api_key: z.string().min(1).optional(),
  base_url: z.string().url().optional(),
  model: z.string().min(1),
});

export const ConfigSchema = z.object({
  model: z.object({
    /** Logical model name every agent resolves through the router */
    name: z.string().min(1),
    /** Provider id moved to the front of each route that contains it */
    primary: z.string().min(1).optional(),
    temperature: z.coerce.number().min(0).max(2),
    max_tokens: z.coerce.number().int().min(100).max(32000),
    routes: z.record(z.array(z.string().min(1)).min(1)),
  }),
  providers: z.record(ProviderSchema),
  agent: z.object({
    timeout_ms: z.coerce.number().int().positive(),
    max_retries: z.coerce.number().int().min(0).max(10),
    retry_delay_ms: z.coerce.number().int().min(0),
    backoff_multiplier: z.coerce.number().min(1),
  }),
  workflow: z.object({
    max_retries: z.coerce.number().int().min(0).max(10),
    checkpoint_dir: z.string().min(1),
  }),
  context: z.object({
    size: z.coerce.number().int().min(256).max(131072),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderSchema>;
