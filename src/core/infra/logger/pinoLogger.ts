import { mkdirSync } from 'node:fs';
import { join } from 'node:path';

import pino, { type DestinationStream, type Logger as PinoInstance } from 'pino';

import type { Logger, LoggerContext, LogLevel } from '@core/app/ports/logger';

const DEFAULT_LOG_LEVEL: LogLevel = 'info';
const DEFAULT_LOG_DIRECTORY = join(process.cwd(), 'logs');
const DEFAULT_FILE_NAME_PREFIX = 'eventor';

export type CreatePinoLoggerOptions = {
  level?: LogLevel;
  disableFileLogs?: boolean;
  /** Skip the stdout stream (file logs and `stream` still apply). */
  disableConsoleLogs?: boolean;
  logDirectory?: string;
  /** Main log file is `<prefix>.log`; warnings and above also go to `error.log`. */
  fileNamePrefix?: string;
  /** Extra destination receiving every entry, e.g. a collector in tests. */
  stream?: DestinationStream;
};

// Multistream defaults every stream to `info`, so each one carries the logger level.
type StreamTarget = { stream: DestinationStream; level: LogLevel };

const serializeError = (value: unknown): Record<string, unknown> | undefined => {
  if (!value) {
    return undefined;
  }

  if (value instanceof Error) {
    const serialised: Record<string, unknown> = {
      name: value.name,
      message: value.message,
    };

    if (value.stack) {
      serialised.stack = value.stack;
    }

    if ('code' in value && typeof value.code !== 'undefined') {
      serialised.code = value.code;
    }

    if (value.cause !== undefined) {
      serialised.cause = serializeError(value.cause);
    }

    return serialised;
  }

  if (typeof value === 'object') {
    return { ...value };
  }

  return { value: String(value) };
};

const serializeContext = (context?: LoggerContext): Record<string, unknown> | undefined => {
  if (!context) {
    return undefined;
  }

  const output: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(context)) {
    if (typeof value === 'undefined') {
      continue;
    }

    if (key === 'error') {
      const serialisedError = serializeError(value);
      if (serialisedError) {
        output.error = serialisedError;
      }
      continue;
    }

    output[key] = value;
  }

  return Object.keys(output).length > 0 ? output : undefined;
};

class PinoLoggerAdapter implements Logger {
  constructor(private readonly instance: PinoInstance) {}

  debug(message: string, context?: LoggerContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LoggerContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LoggerContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LoggerContext): void {
    this.write('error', message, context);
  }

  withContext(context: LoggerContext): Logger {
    const serialised = serializeContext(context) ?? {};
    return new PinoLoggerAdapter(this.instance.child(serialised));
  }

  private write(level: LogLevel, message: string, context?: LoggerContext) {
    const serialised = serializeContext(context);

    if (serialised) {
      this.instance[level](serialised, message);
      return;
    }

    this.instance[level](message);
  }
}

const fileStream = (filePath: string, level: LogLevel): StreamTarget => ({
  stream: pino.destination({ dest: filePath, mkdir: true, append: true, sync: false }),
  level,
});

export const createPinoLogger = (options: CreatePinoLoggerOptions = {}): Logger => {
  const level = options.level ?? DEFAULT_LOG_LEVEL;
  const logDirectory = options.logDirectory ?? DEFAULT_LOG_DIRECTORY;
  const fileNamePrefix = options.fileNamePrefix ?? DEFAULT_FILE_NAME_PREFIX;

  const streams: StreamTarget[] = [];

  if (!options.disableConsoleLogs) {
    streams.push({ stream: pino.destination({ dest: 1, sync: false }), level });
  }

  if (options.stream) {
    streams.push({ stream: options.stream, level });
  }

  if (!options.disableFileLogs) {
    mkdirSync(logDirectory, { recursive: true });

    streams.push(
      fileStream(join(logDirectory, `${fileNamePrefix}.log`), level),
      fileStream(join(logDirectory, 'error.log'), level === 'error' ? 'error' : 'warn'),
    );
  }

  const instance = pino(
    {
      level,
      base: undefined,
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    },
    pino.multistream(streams),
  );

  return new PinoLoggerAdapter(instance);
};
