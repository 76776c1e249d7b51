import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Logger interface for workflow observability */
export interface WorkflowLogger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_ORDER: LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

/** Console logger with a run-id prefix and a level threshold */
export class ConsoleWorkflowLogger implements WorkflowLogger {
  private prefix: string;

  constructor(
    runId?: string,
    private level: LogLevel = 'info',
  ) {
    this.prefix = runId ? `[sequent:${runId.slice(0, 8)}]` : '[sequent]';
  }

  /** Same threshold, different run prefix */
  child(runId: string): ConsoleWorkflowLogger {
    return new ConsoleWorkflowLogger(runId, this.level);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('info')) console.log(this.format('info', message, data));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('warn')) console.warn(this.format('warn', message, data));
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('error')) console.error(this.format('error', message, data));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('debug')) console.debug(this.format('debug', message, data));
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level);
  }

  private format(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const tag = LEVEL_COLORS[level](level.toUpperCase().padEnd(5));
    const base = `${chalk.gray(this.prefix)} ${tag} ${message}`;
    return data ? `${base} ${JSON.stringify(data)}` : base;
  }
}

/** Logger that discards everything; the default when embedding the engine as a library */
export const silentLogger: WorkflowLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
