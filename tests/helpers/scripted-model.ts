import type { AgentRole } from '../../src/agents/roles';
import { ConfigSchema, type Config } from '../../src/config/validator';
import { defaults } from '../../src/config/defaults';
import type { Context } from '../../src/context/types';
import { ModelRouter } from '../../src/models/router';
import type { Completion, CompletionOptions, ModelClient } from '../../src/models/types';

export type ScriptStep = string | Error;

/** Produces the reply to one call, or an Error to reject with */
export type Script = (context: Context, call: number) => ScriptStep | Promise<ScriptStep>;

/**
 * In-process model client. Records every context it is called with and
 * answers from a script instead of a provider.
 */
export class ScriptedModelClient implements ModelClient {
  public calls: Context[] = [];
  public options: CompletionOptions[] = [];

  constructor(private script: Script) {}

  async complete(context: Context, options: CompletionOptions): Promise<Completion> {
    this.calls.push(context);
    this.options.push(options);
    const step = await this.script(context, this.calls.length);
    if (step instanceof Error) throw step;
    return { text: step, raw: { scripted: true } };
  }

  callsFor(stage: AgentRole): Context[] {
    return this.calls.filter((c) => c.stage === stage);
  }
}

/** Replies in order; the last reply repeats once the list runs out */
export function sequence(...steps: ScriptStep[]): Script {
  return (_context, call) => {
    const step = steps[Math.min(call, steps.length) - 1];
    if (step === undefined) throw new Error('sequence() needs at least one step');
    return step;
  };
}

/**
 * Replies per agent role, each role with its own queue (last reply repeats).
 * Roles without a queue reject the call.
 */
export function byStage(replies: Partial<Record<AgentRole, ScriptStep | ScriptStep[]>>): Script {
  const counters = new Map<AgentRole, number>();
  return (context) => {
    const queue = replies[context.stage];
    if (queue === undefined) return new Error(`no scripted reply for ${context.stage}`);
    const list = Array.isArray(queue) ? queue : [queue];
    const n = counters.get(context.stage) ?? 0;
    counters.set(context.stage, n + 1);
    const step = list[Math.min(n, list.length - 1)];
    if (step === undefined) return new Error(`empty script for ${context.stage}`);
    return step;
  };
}

/** Router with one logical model backed by the given clients, in order */
export function routerFor(clients: ModelClient | ModelClient[], logicalName = 'default'): ModelRouter {
  const router = new ModelRouter();
  const list = Array.isArray(clients) ? clients : [clients];
  router.register(
    logicalName,
    list.map((client, i) => ({ id: `scripted-${i + 1}`, provider: 'scripted', model: `scripted-model-${i + 1}`, client })),
  );
  return router;
}

/** Valid configuration for tests: defaults plus the given overrides, no delays */
export function testConfig(patch: (config: Config) => void = () => undefined): Config {
  const config = structuredClone(defaults);
  config.agent.timeout_ms = 1000;
  config.agent.max_retries = 2;
  patch(config);
  return ConfigSchema.parse(config);
}

export const json = (value: unknown): string => JSON.stringify(value);
