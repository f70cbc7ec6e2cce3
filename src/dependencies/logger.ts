import { isAbsolute, join } from 'node:path';

import { z } from 'zod';

import type { Logger } from '@core/app';
import { createPinoLogger, type CreatePinoLoggerOptions } from '@core/infra';

const blankToUndefined = (value: unknown) => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const lowerCased = (value: unknown) => {
  const normalised = blankToUndefined(value);
  return typeof normalised === 'string' ? normalised.toLowerCase() : normalised;
};

// Unrecognised values fall back to the defaults.
const loggerEnvironmentSchema = z.object({
  LOG_LEVEL: z.preprocess(lowerCased, z.enum(['debug', 'info', 'warn', 'error']).catch('info')),
  LOG_DIR: z.preprocess(blankToUndefined, z.string().optional().catch(undefined)),
  DISABLE_FILE_LOGS: z.preprocess(lowerCased, z.enum(['true', 'false']).optional().catch(undefined)),
});

export const resolveLoggerOptions = (
  env: Record<string, string | undefined>,
  cwd: string = process.cwd(),
): CreatePinoLoggerOptions => {
  const parsed = loggerEnvironmentSchema.parse(env);
  const directory = parsed.LOG_DIR;

  return {
    level: parsed.LOG_LEVEL,
    logDirectory: !directory ? join(cwd, '_logs') : isAbsolute(directory) ? directory : join(cwd, directory),
    disableFileLogs: parsed.DISABLE_FILE_LOGS === 'true',
  };
};

let applicationLogger: Logger | null = null;

export const getApplicationLogger = (): Logger => {
  if (!applicationLogger) {
    applicationLogger = createPinoLogger(resolveLoggerOptions(process.env));
  }

  return applicationLogger;
};
