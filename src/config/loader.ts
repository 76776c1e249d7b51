import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { ConfigSchema, Config } from './validator';
import { defaults } from './defaults';
import { ConfigurationError } from '../utils/errors';

/**
 * PartialConfig allows for recursive partials of our Config interface
 * This is useful for CLI and YAML overrides.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[] ? DeepPartial<U>[] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export interface LoadConfigOptions {
  /** Directory holding sequent.yaml and .env (default: process.cwd()) */
  cwd?: string;
  /** Environment to read instead of process.env */
  env?: Record<string, string | undefined>;
}

export const CONFIG_FILE = 'sequent.yaml';

/**
 * Resolve configuration: defaults, then sequent.yaml, then environment
 * variables (with .env underneath the real environment), then CLI overrides.
 * @throws ConfigurationError when the merged result fails validation
 */
export function loadConfig(cliOverrides: DeepPartial<Config> = {}, options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();

  // 1. Start with Defaults
  const config: Record<string, unknown> = structuredClone(defaults);

  // 2. Override with sequent.yaml (if exists)
  const yamlPath = path.join(cwd, CONFIG_FILE);
  if (fs.existsSync(yamlPath)) {
    const parsedYaml: unknown = YAML.parse(fs.readFileSync(yamlPath, 'utf8'));
    if (isRecord(parsedYaml)) {
      deepMerge(config, parsedYaml);
    }
  }

  // 3. Override with Environment Variables
  const dotenvPath = path.join(cwd, '.env');
  const fileEnv = fs.existsSync(dotenvPath) ? dotenv.parse(fs.readFileSync(dotenvPath)) : {};
  const env: Record<string, string | undefined> = { ...fileEnv, ...(options.env ?? process.env) };
  deepMerge(config, envMapping(env));

  // 4. Override with CLI Arguments
  deepMerge(config, cliOverrides);

  // 5. Validate with Zod
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  return result.data;
}

/** Map the recognised environment variables onto the config tree */
function envMapping(env: Record<string, string | undefined>): Record<string, unknown> {
  const agentTimeoutSeconds = env.AGENT_TIMEOUT ? Number(env.AGENT_TIMEOUT) : undefined;

  return {
    model: {
      primary: env.DEFAULT_MODEL,
      temperature: env.TEMPERATURE,
      max_tokens: env.MAX_TOKENS,
    },
    providers: {
      kimi: { api_key: env.KIMI_API_KEY, base_url: env.KIMI_API_URL, model: env.KIMI_MODEL },
      claude: { api_key: env.ANTHROPIC_API_KEY },
      groq: { api_key: env.GROQ_API_KEY },
      openai: { api_key: env.OPENAI_API_KEY },
    },
    agent: {
      timeout_ms: agentTimeoutSeconds !== undefined ? agentTimeoutSeconds * 1000 : undefined,
      max_retries: env.MAX_AGENT_RETRIES,
    },
    workflow: {
      max_retries: env.WORKFLOW_MAX_RETRIES,
      checkpoint_dir: env.SEQUENT_HOME,
    },
    context: {
      size: env.MCP_CONTEXT_SIZE,
    },
    logging: {
      level: normalizeLogLevel(env.LOG_LEVEL),
    },
  };
}

function normalizeLogLevel(level: string | undefined): string | undefined {
  const lower = level?.toLowerCase();
  return lower === 'warning' ? 'warn' : lower;
}

/** Copy of the config safe to print: API keys replaced by asterisks */
export function maskConfig(config: Config): Config {
  const masked = structuredClone(config);
  for (const provider of Object.values(masked.providers)) {
    if (provider.api_key) provider.api_key = '********';
  }
  return masked;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Simple deep merge for config objects.
 * Arrays and scalars replace; undefined leaves the target untouched.
 */
function deepMerge(target: Record<string, unknown>, source: object): void {
  for (const [key, sourceValue] of Object.entries(source)) {
    if (isRecord(sourceValue)) {
      const existing = target[key];
      const next: Record<string, unknown> = isRecord(existing) ? existing : {};
      target[key] = next;
      deepMerge(next, sourceValue);
    } else if (sourceValue !== undefined) {
      target[key] = sourceValue;
    }
  }
}
