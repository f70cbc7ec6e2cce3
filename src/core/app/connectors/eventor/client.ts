/**
 * Project: Eventor Client
 * File: src/core/app/connectors/eventor/client.ts
 * Summary: HTTP client for the Eventor XML API and the public result page.
 */

import type { Event, Organisation, Person, ResultList, ResultListList } from '@core/domain';

import { ensureError } from '@/lib/errors/ensureError';

import { EventorClientError } from '../../errors/eventorClientError';
import type { Logger } from '../../ports/logger';
import type {
  CourseDistanceRace,
  EventResultsOptions,
  EventorClient,
  ListEventsParams,
  PersonResultsParams,
} from '../../ports/eventorClient';
import { decodeXml } from '../../xml/decoder';
import type { Model } from '../../xml/fields';
import { extractCourseDistancesFromHtml } from './courseDistances';
import {
  eventListModel,
  eventModel,
  organisationListModel,
  organisationModel,
  personListModel,
  resultListListModel,
  resultListModel,
} from './schemas';

const DEFAULT_BASE_URL = 'https://eventor.orientering.se/api';
const DEFAULT_RESULT_PAGE_URL = 'https://eventor.orientering.se/Events/ResultList';
const DEFAULT_USER_AGENT = 'EventorClient/0.1';

export const EventorEndpoint = {
  Event: 'event',
  Events: 'events',
  EventResults: 'results/event',
  Organisations: 'organisations',
  OrganisationPersons: 'persons/organisations',
  PersonResults: 'results/person',
  ApiKeyOrganisation: 'organisation/apiKey',
} as const;

export type EventorEndpoint = (typeof EventorEndpoint)[keyof typeof EventorEndpoint];

export type EventorClientConfig = {
  /** Sent as the `ApiKey` header on every API request. */
  apiKey: string;
  logger: Logger;
  /**
   * API root (defaults to https://eventor.orientering.se/api).
   */
  baseUrl?: string;
  /**
   * Public result list page used for course lengths.
   */
  resultPageUrl?: string;
  userAgent?: string;
  /**
   * Custom fetch implementation used for requests. Defaults to the global fetch.
   */
  fetchImpl?: typeof fetch;
};

type QueryValue = string | number | boolean | readonly number[] | undefined;

type RequestTarget = {
  operation: string;
  url: URL;
  headers: Record<string, string>;
};

const serializeCause = (value: unknown) => {
  const error = ensureError(value);
  return { name: error.name, message: error.message };
};

const joinIds = (values: readonly number[] | undefined): string | undefined =>
  values && values.length > 0 ? values.map((value) => String(value)).join(',') : undefined;

export class HttpEventorClient implements EventorClient {
  private readonly config: Required<Omit<EventorClientConfig, 'fetchImpl'>> & {
    fetchImpl: typeof fetch;
  };

  constructor(config: EventorClientConfig) {
    this.config = {
      apiKey: config.apiKey,
      logger: config.logger,
      baseUrl: config.baseUrl ?? DEFAULT_BASE_URL,
      resultPageUrl: config.resultPageUrl ?? DEFAULT_RESULT_PAGE_URL,
      userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
      fetchImpl: config.fetchImpl ?? fetch,
    };
  }

  async getEvent(eventId: number): Promise<Event> {
    return this.fetchDocument(
      'getEvent',
      eventModel,
      this.buildApiUrl(EventorEndpoint.Event, { pathSuffix: String(eventId) }),
    );
  }

  async *listOrganisations(): AsyncIterableIterator<Organisation> {
    yield* await this.fetchDocument(
      'listOrganisations',
      organisationListModel,
      this.buildApiUrl(EventorEndpoint.Organisations),
    );
  }

  async *listEvents(params: ListEventsParams): AsyncIterableIterator<Event> {
    const url = this.buildApiUrl(EventorEndpoint.Events, {
      query: {
        fromDate: params.fromDate,
        toDate: params.toDate,
        eventIds: joinIds(params.eventIds),
        organisationIds: joinIds(params.organisationIds),
        classificationIds: joinIds(params.classifications),
      },
    });

    yield* await this.fetchDocument('listEvents', eventListModel, url);
  }

  async getEventResults(eventId: number, options: EventResultsOptions = {}): Promise<ResultList> {
    const url = this.buildApiUrl(EventorEndpoint.EventResults, {
      query: {
        eventId,
        includeSplitTimes: options.includeSplitTimes ? true : undefined,
      },
    });

    return this.fetchDocument('getEventResults', resultListModel, url);
  }

  async getPersonResults(params: PersonResultsParams): Promise<ResultListList> {
    const url = this.buildApiUrl(EventorEndpoint.PersonResults, {
      query: {
        fromDate: params.fromDate,
        toDate: params.toDate,
        personId: params.personId,
        top: params.top ? params.top : undefined,
      },
    });

    return this.fetchDocument('getPersonResults', resultListListModel, url);
  }

  async getOwnOrganisation(): Promise<Organisation> {
    return this.fetchDocument(
      'getOwnOrganisation',
      organisationModel,
      this.buildApiUrl(EventorEndpoint.ApiKeyOrganisation),
    );
  }

  async *listPersonsInOwnOrganisation(): AsyncIterableIterator<Person> {
    // The persons endpoint is keyed by organisation id, which only the first call reveals.
    const organisation = await this.getOwnOrganisation();
    const persons = await this.fetchDocument(
      'listPersonsInOwnOrganisation',
      personListModel,
      this.buildApiUrl(EventorEndpoint.OrganisationPersons, {
        pathSuffix: String(organisation.id),
      }),
    );

    this.flagSparsePersons(persons, organisation.id);
    yield* persons;
  }

  async getCourseDistances(race: CourseDistanceRace): Promise<Map<string, number>> {
    const url = new URL(this.config.resultPageUrl);
    url.searchParams.set('eventID', String(race.eventId));
    url.searchParams.set('eventRaceId', String(race.id));

    const body = await this.send({
      operation: 'getCourseDistances',
      url,
      headers: {
        Accept: 'text/html,application/xhtml+xml',
        'User-Agent': this.config.userAgent,
      },
    });

    const { distances, unparsed } = extractCourseDistancesFromHtml(
      new TextDecoder('utf-8').decode(body),
    );

    if (unparsed.length > 0) {
      this.config.logger.info('Some classes on the Eventor result page had no course length.', {
        event: 'eventor.courseDistances.unparsed',
        outcome: 'partial',
        eventId: race.eventId,
        eventRaceId: race.id,
        classes: unparsed,
      });
    }

    return distances;
  }

  private buildApiUrl(
    endpoint: EventorEndpoint,
    options: { pathSuffix?: string; query?: Record<string, QueryValue> } = {},
  ): URL {
    const base = this.config.baseUrl.replace(/\/+$/, '');
    const suffix = options.pathSuffix ? `/${encodeURIComponent(options.pathSuffix)}` : '';
    const url = new URL(`${base}/${endpoint}${suffix}`);

    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value === undefined) {
        continue;
      }

      if (typeof value === 'object') {
        const joined = joinIds(value);
        if (joined !== undefined) {
          url.searchParams.set(key, joined);
        }
        continue;
      }

      url.searchParams.set(key, String(value));
    }

    return url;
  }

  private async fetchDocument<T>(operation: string, model: Model<T>, url: URL): Promise<T> {
    const body = await this.send({
      operation,
      url,
      headers: {
        Accept: 'application/xml',
        ApiKey: this.config.apiKey,
        'User-Agent': this.config.userAgent,
      },
    });

    let decoded: T;
    try {
      decoded = decodeXml(model, body);
    } catch (error) {
      this.config.logger.warn('Eventor response did not match the expected document shape.', {
        event: 'eventor.decode.failed',
        outcome: 'failure',
        operation,
        url: url.toString(),
        error: ensureError(error),
      });
      throw error;
    }

    if (Array.isArray(decoded)) {
      this.config.logger.debug('Decoded Eventor list.', {
        event: 'eventor.response.decoded',
        operation,
        count: decoded.length,
      });
    }

    return decoded;
  }

  private async send(target: RequestTarget): Promise<Uint8Array> {
    const { operation, url, headers } = target;
    const logger = this.config.logger;
    const startedAt = Date.now();

    logger.debug('Sending Eventor request.', {
      event: 'eventor.request',
      operation,
      url: url.toString(),
    });

    let response: Response;
    try {
      response = await this.config.fetchImpl(url, { method: 'GET', headers });
    } catch (error) {
      logger.warn('Eventor request failed before a response arrived.', {
        event: 'eventor.request.failed',
        outcome: 'failure',
        operation,
        url: url.toString(),
        durationMs: Date.now() - startedAt,
        error: ensureError(error),
      });
      throw new EventorClientError('Failed to reach Eventor.', {
        code: 'NETWORK_ERROR',
        url: url.toString(),
        details: { cause: serializeCause(error) },
      });
    }

    if (!response.ok) {
      logger.warn('Eventor responded with an error status.', {
        event: 'eventor.request.failed',
        outcome: 'failure',
        operation,
        url: url.toString(),
        status: response.status,
        durationMs: Date.now() - startedAt,
      });
      throw new EventorClientError('Eventor responded with an error status.', {
        code: 'HTTP_ERROR',
        status: response.status,
        url: url.toString(),
        details: { statusText: response.statusText },
      });
    }

    let body: Uint8Array;
    try {
      body = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw new EventorClientError('Failed to read the Eventor response body.', {
        code: 'NETWORK_ERROR',
        status: response.status,
        url: url.toString(),
        details: { cause: serializeCause(error) },
      });
    }

    logger.debug('Eventor request completed.', {
      event: 'eventor.request',
      outcome: 'success',
      operation,
      url: url.toString(),
      status: response.status,
      bytes: body.byteLength,
      durationMs: Date.now() - startedAt,
    });

    return body;
  }

  private flagSparsePersons(persons: readonly Person[], organisationId: number) {
    if (persons.length === 0) {
      return;
    }

    const missingId = persons.filter((person) => person.id === undefined).length;
    const missingBirthDate = persons.filter((person) => person.birthDate === undefined).length;

    // Eventor documents both as always present; losing them across the board points at an
    // API change rather than sparse data.
    if (missingId === persons.length || missingBirthDate === persons.length) {
      this.config.logger.warn('Eventor person list is missing ids or birth dates for every person.', {
        event: 'eventor.persons.missing_identity',
        outcome: 'suspicious',
        organisationId,
        persons: persons.length,
        missingId,
        missingBirthDate,
      });
    }
  }
}
