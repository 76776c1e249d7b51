export class SequentError extends Error {
  constructor(
    message: string,
    public code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SequentError';
  }
}

export class ConfigurationError extends SequentError {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class CapabilityNotFoundError extends SequentError {
  constructor(
    public capabilityName: string,
    public kind: 'tool' | 'skill',
  ) {
    super(`${kind === 'tool' ? 'Tool' : 'Skill'} not found: ${capabilityName}`, 'CAPABILITY_NOT_FOUND');
    this.name = 'CapabilityNotFoundError';
  }
}

export class CheckpointNotFoundError extends SequentError {
  constructor(public runId: string) {
    super(`No checkpoint found for run: ${runId}`, 'CHECKPOINT_NOT_FOUND');
    this.name = 'CheckpointNotFoundError';
  }
}

export class RunExistsError extends SequentError {
  constructor(public runId: string) {
    super(`Run already exists: ${runId}`, 'RUN_EXISTS');
    this.name = 'RunExistsError';
  }
}

export class InvalidTransitionError extends SequentError {
  constructor(message: string) {
    super(message, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

/** Render any thrown value as a message string */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
