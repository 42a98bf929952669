export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/** Logger interface for workflow observability */
export interface WorkflowLogger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

export interface ConsoleWorkflowLoggerOptions {
  /** Thread id (or any label) shown in every line */
  threadId?: string;
  level?: LogLevel;
}

/** Default console-based logger with thread-id prefix */
export class ConsoleWorkflowLogger implements WorkflowLogger {
  private prefix: string;
  private threshold: number;

  constructor(options: ConsoleWorkflowLoggerOptions = {}) {
    this.prefix = options.threadId ? `[research-graph:${options.threadId.slice(0, 12)}]` : '[research-graph]';
    this.threshold = LEVEL_ORDER[options.level ?? 'info'];
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('info')) console.log(this.format('INFO', message, data));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('warn')) console.warn(this.format('WARN', message, data));
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('error')) console.error(this.format('ERROR', message, data));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('debug')) console.debug(this.format('DEBUG', message, data));
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }

  private format(level: string, message: string, data?: Record<string, unknown>): string {
    const base = `${this.prefix} ${level.padEnd(5)} ${message}`;
    return data ? `${base} ${JSON.stringify(data)}` : base;
  }
}
