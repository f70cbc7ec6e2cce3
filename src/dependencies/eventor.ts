/**
 * Project: Eventor Client
 * File: src/dependencies/eventor.ts
 * Summary: Wiring for the Eventor client from environment configuration.
 */

import type { EventorClient } from '@core/app';
import { HttpEventorClient } from '@core/app/connectors/eventor/client';

import { getApplicationLogger } from '@/dependencies/logger';
import { getEnvironment } from '@/server/config/environment';

let eventorClient: EventorClient | null = null;

/** Shared client; built on first use so importing this module needs no API key. */
export const getEventorClient = (): EventorClient => {
  if (!eventorClient) {
    const { eventor } = getEnvironment();
    eventorClient = new HttpEventorClient({
      apiKey: eventor.apiKey,
      baseUrl: eventor.baseUrl,
      resultPageUrl: eventor.resultPageUrl,
      userAgent: eventor.userAgent,
      logger: getApplicationLogger().withContext({ component: 'eventor' }),
    });
  }

  return eventorClient;
};
