export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LoggerContext = {
  /** Client operation the log pertains to (e.g. `listEvents`). */
  operation?: string;
  /** Upstream URL. Never carries credentials; the API key travels in a header. */
  url?: string;
  /** Machine friendly event name for querying (e.g. `eventor.request.failed`). */
  event?: string;
  /** Duration of the operation in milliseconds when applicable. */
  durationMs?: number;
  /** Outcome keyword such as `success`, `failure`, or `partial`. */
  outcome?: string;
  /** Optional error instance or metadata to serialise. */
  error?: unknown;
  /** Additional structured properties to enrich the log entry. */
  [key: string]: unknown;
};

export interface Logger {
  debug(message: string, context?: LoggerContext): void;
  info(message: string, context?: LoggerContext): void;
  warn(message: string, context?: LoggerContext): void;
  error(message: string, context?: LoggerContext): void;
  withContext(context: LoggerContext): Logger;
}
