import type { Logger, LoggerContext, LogLevel } from '../../src/core/app/ports/logger';

export type RecordedLogEntry = {
  level: LogLevel;
  message: string;
  context: LoggerContext;
};

/** In-memory logger; children created through `withContext` share the parent's entries. */
export class RecordingLogger implements Logger {
  constructor(
    readonly entries: RecordedLogEntry[] = [],
    private readonly baseContext: LoggerContext = {},
  ) {}

  debug(message: string, context?: LoggerContext): void {
    this.record('debug', message, context);
  }

  info(message: string, context?: LoggerContext): void {
    this.record('info', message, context);
  }

  warn(message: string, context?: LoggerContext): void {
    this.record('warn', message, context);
  }

  error(message: string, context?: LoggerContext): void {
    this.record('error', message, context);
  }

  withContext(context: LoggerContext): Logger {
    return new RecordingLogger(this.entries, { ...this.baseContext, ...context });
  }

  eventsAt(level: LogLevel): string[] {
    return this.entries
      .filter((entry) => entry.level === level)
      .map((entry) => String(entry.context.event));
  }

  find(event: string): RecordedLogEntry | undefined {
    return this.entries.find((entry) => entry.context.event === event);
  }

  private record(level: LogLevel, message: string, context?: LoggerContext) {
    this.entries.push({ level, message, context: { ...this.baseContext, ...context } });
  }
}
