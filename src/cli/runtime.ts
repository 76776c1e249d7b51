import { CapabilityRegistry } from '../capabilities/registry';
import type { Config } from '../config/validator';
import { createModelRouter } from '../models/factory';
import type { ModelRouter } from '../models/router';
import { createAgentCoordinator } from '../orchestrator/agent-coordinator';
import { FileCheckpointStore } from '../orchestrator/state-store';
import { WorkflowCoordinator } from '../orchestrator/workflow';
import { ConsoleWorkflowLogger, type LogLevel } from '../utils/logger';

export interface Runtime {
  router: ModelRouter;
  store: FileCheckpointStore;
  workflow: WorkflowCoordinator;
}

/** Everything a command needs to drive runs, built from resolved configuration */
export function createRuntime(config: Config, opts: { verbose?: boolean; registry?: CapabilityRegistry } = {}): Runtime {
  const level: LogLevel = opts.verbose ? 'debug' : config.logging.level;
  const logger = new ConsoleWorkflowLogger(undefined, level);

  const router = createModelRouter(config, logger);
  const store = new FileCheckpointStore(config.workflow.checkpoint_dir);
  const coordinator = createAgentCoordinator(config, router, opts.registry ?? new CapabilityRegistry(), logger);

  const workflow = new WorkflowCoordinator({
    coordinator,
    store,
    maxRetries: config.workflow.max_retries,
    createLogger: (runId) => logger.child(runId),
  });

  return { router, store, workflow };
}
