import { z } from 'zod';
import type { Context } from '../context/types';
import type { AgentStateView, Classification, StateDelta } from '../orchestrator/data-flow';
import { BaseAgent, type AttemptScope } from './base-agent';
import { RetryableAgentFailure } from './errors';
import { parseModelJson } from './json';

const RawClassificationSchema = z.object({
  complexity: z.string().optional(),
  requires_planning: z.boolean().optional(),
  routing: z.string().optional(),
  routing_decision: z.string().optional(),
  reasoning: z.string().optional(),
});

type RawClassification = z.infer<typeof RawClassificationSchema>;

const SKIP_ROUTES = new Set(['skip_planning', 'direct_execution', 'direct']);
const PLAN_ROUTES = new Set(['full_pipeline', 'planning']);

/**
 * First stage: decides whether the request is answered directly or goes
 * through the planner.
 */
export class OrchestratorAgent extends BaseAgent {
  readonly role = 'orchestrator' as const;

  protected async execute(_view: AgentStateView, context: Context, scope: AttemptScope): Promise<StateDelta> {
    const { text } = await scope.complete(context);
    const raw = parseModelJson('OrchestratorAgent', text, RawClassificationSchema);
    const classification = normalizeClassification(raw);

    this.logger.info(`Classified request as ${classification.complexity}`, { routing: classification.routing });
    return { classification };
  }
}

/**
 * Collapse the model's answer into a consistent classification.
 * The routing field wins, then complexity, then requires_planning; the other
 * two fields are derived from whichever decided.
 */
export function normalizeClassification(raw: RawClassification): Classification {
  const routing = (raw.routing ?? raw.routing_decision)?.trim().toLowerCase();
  const complexity = raw.complexity?.trim().toLowerCase();

  let skip: boolean;
  if (routing && SKIP_ROUTES.has(routing)) {
    skip = true;
  } else if (routing && PLAN_ROUTES.has(routing)) {
    skip = false;
  } else if (complexity === 'simple') {
    skip = true;
  } else if (complexity === 'complex' || complexity === 'medium') {
    skip = false;
  } else if (raw.requires_planning !== undefined) {
    skip = !raw.requires_planning;
  } else {
    throw new RetryableAgentFailure(`OrchestratorAgent: no usable routing in output (routing=${routing ?? 'none'}, complexity=${complexity ?? 'none'})`);
  }

  return {
    complexity: skip ? 'simple' : 'complex',
    requiresPlanning: !skip,
    routing: skip ? 'skip_planning' : 'full_pipeline',
    ...(raw.reasoning ? { reasoning: raw.reasoning } : {}),
  };
}
