/**
 * Filename: src/server/config/environment.ts
 * Purpose: Parse and validate process environment variables into strongly typed configuration objects.
 */

import { z } from 'zod';

export type EnvIssue = {
  key: string;
  message: string;
};

export type EnvironmentConfig = {
  eventor: {
    apiKey: string;
    baseUrl?: string;
    resultPageUrl?: string;
    userAgent?: string;
  };
};

export class EnvironmentValidationError extends Error {
  constructor(public readonly issues: EnvIssue[]) {
    super('Environment configuration is invalid.');
    this.name = 'EnvironmentValidationError';
  }
}

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

const absoluteHttpUrl = (key: string) =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .refine((value) => isAbsoluteHttpUrl(value), `${key} must be an absolute HTTP(S) URL.`)
      .optional(),
  );

const environmentSchema = z.object({
  EVENTOR_API_KEY: z
    .string({ required_error: 'EVENTOR_API_KEY is not configured.' })
    .trim()
    .min(1, 'EVENTOR_API_KEY is not configured.'),
  EVENTOR_BASE_URL: absoluteHttpUrl('EVENTOR_BASE_URL'),
  EVENTOR_RESULT_PAGE_URL: absoluteHttpUrl('EVENTOR_RESULT_PAGE_URL'),
  EVENTOR_USER_AGENT: z.preprocess(blankToUndefined, z.string().trim().optional()),
});

export function isAbsoluteHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

const dedupeIssues = (issues: EnvIssue[]): EnvIssue[] => {
  const seen = new Map<string, EnvIssue>();

  for (const issue of issues) {
    if (!seen.has(issue.key)) {
      seen.set(issue.key, issue);
    }
  }

  return Array.from(seen.values());
};

export const parseEnvironment = (env: Record<string, string | undefined>): EnvironmentConfig => {
  const parsed = environmentSchema.safeParse(env);

  if (!parsed.success) {
    throw new EnvironmentValidationError(
      dedupeIssues(
        parsed.error.issues.map((issue) => ({
          key: issue.path.join('.'),
          message: issue.message,
        })),
      ),
    );
  }

  return {
    eventor: {
      apiKey: parsed.data.EVENTOR_API_KEY,
      baseUrl: parsed.data.EVENTOR_BASE_URL,
      resultPageUrl: parsed.data.EVENTOR_RESULT_PAGE_URL,
      userAgent: parsed.data.EVENTOR_USER_AGENT,
    },
  };
};

let cachedEnvironment: EnvironmentConfig | null = null;

export const getEnvironment = (): EnvironmentConfig => {
  if (!cachedEnvironment) {
    cachedEnvironment = parseEnvironment(process.env);
  }

  return cachedEnvironment;
};

export const __resetEnvironmentCacheForTests = () => {
  cachedEnvironment = null;
};
