import type { Context } from '../context/types';
import type { ModelRouter } from '../models/router';
import type { RoutedCompletion, RoutingDecision } from '../models/types';
import type { AgentStateView, StateDelta } from '../orchestrator/data-flow';
import { RecoveryManager } from '../orchestrator/recovery';
import { silentLogger, type WorkflowLogger } from '../utils/logger';
import { AgentTimeoutError } from './errors';
import type { AgentRole } from './roles';
import type { Agent, AgentResult } from './types';

export interface AgentModelSettings {
  router: ModelRouter;
  /** Logical model name resolved through the router on every call */
  modelName: string;
  temperature?: number;
  maxTokens?: number;
}

export interface AgentOptions {
  timeoutMs: number;
  /** Repeats after the first attempt */
  maxRetries: number;
  retryDelayMs?: number;
  backoffMultiplier?: number;
  logger?: WorkflowLogger;
}

/** What a single attempt gets to work with */
export interface AttemptScope {
  /** 1-based attempt number */
  attempt: number;
  /** Aborted when the attempt times out */
  signal: AbortSignal;
  /** Routed model call; the routing decision is also recorded on the result */
  complete(context: Context): Promise<RoutedCompletion>;
}

/**
 * Shared contract of the pipeline agents: per-call timeout, local retries with
 * the same context, and error classification into an AgentResult. Subclasses
 * implement `execute` and throw on failure.
 */
export abstract class BaseAgent implements Agent {
  abstract readonly role: AgentRole;

  protected readonly recovery: RecoveryManager;
  protected readonly logger: WorkflowLogger;

  constructor(
    protected readonly model: AgentModelSettings,
    protected readonly options: AgentOptions,
  ) {
    this.recovery = new RecoveryManager(options.maxRetries, options.retryDelayMs ?? 0, options.backoffMultiplier ?? 1);
    this.logger = options.logger ?? silentLogger;
  }

  protected abstract execute(view: AgentStateView, context: Context, scope: AttemptScope): Promise<StateDelta>;

  async run(view: AgentStateView, context: Context): Promise<AgentResult> {
    const routes: RoutingDecision[] = [];
    const diagnostics: string[] = [];
    let retries = 0;

    for (;;) {
      const attempt = retries + 1;
      const outcome = await this.attempt(view, context, attempt, routes);

      if (outcome.status === 'success') {
        return { ...outcome, diagnostics, routes, attempts: attempt };
      }

      diagnostics.push(`attempt ${attempt}: ${outcome.error.message}`);

      if (outcome.status === 'fatal_failure') {
        this.logger.error(`${this.role} agent failed`, { attempt, code: outcome.error.code, error: outcome.error.message });
        return { ...outcome, diagnostics, routes, attempts: attempt };
      }

      if (retries >= this.recovery.getMaxRetries()) {
        this.logger.error(`${this.role} agent exhausted its retries`, { attempts: attempt, error: outcome.error.message });
        return {
          status: 'fatal_failure',
          error: { code: 'RETRIES_EXHAUSTED', message: `${this.role} agent failed after ${attempt} attempt(s): ${outcome.error.message}` },
          diagnostics,
          routes,
          attempts: attempt,
        };
      }

      retries++;
      const delay = this.recovery.delayFor(retries);
      this.logger.warn(`${this.role} agent attempt ${attempt} failed, retrying`, { code: outcome.error.code, delayMs: delay });
      if (delay > 0) await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  /** One attempt, classified; never throws */
  private async attempt(view: AgentStateView, context: Context, attempt: number, routes: RoutingDecision[]): Promise<AgentResult> {
    const controller = new AbortController();
    const scope: AttemptScope = {
      attempt,
      signal: controller.signal,
      complete: async (ctx) => {
        const completion = await this.model.router.resolve(this.model.modelName).complete(ctx, {
          temperature: this.model.temperature,
          maxTokens: this.model.maxTokens,
          signal: controller.signal,
        });
        routes.push(completion.route);
        return completion;
      },
    };

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new AgentTimeoutError(this.role, this.options.timeoutMs));
      }, this.options.timeoutMs);
    });

    try {
      const payload = await Promise.race([this.execute(view, context, scope), timeout]);
      return { status: 'success', payload, diagnostics: [], routes: [], attempts: attempt };
    } catch (error) {
      const classification = this.recovery.classify(error);
      return {
        status: classification.severity === 'retryable' ? 'retryable_failure' : 'fatal_failure',
        error: { code: classification.code, message: classification.message },
        diagnostics: [],
        routes: [],
        attempts: attempt,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
