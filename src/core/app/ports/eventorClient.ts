import type {
  Classification,
  Event,
  EventRace,
  Organisation,
  Person,
  ResultList,
  ResultListList,
} from '@core/domain';

export type ListEventsParams = {
  /** Inclusive start date, `YYYY-MM-DD`. */
  fromDate: string;
  /** Inclusive end date, `YYYY-MM-DD`. */
  toDate: string;
  eventIds?: readonly number[];
  organisationIds?: readonly number[];
  classifications?: readonly Classification[];
};

export type EventResultsOptions = {
  includeSplitTimes?: boolean;
};

export type PersonResultsParams = {
  personId: number;
  fromDate: string;
  toDate: string;
  /** Also include the top `n` finishers of every class the person ran. */
  top?: number;
};

export type CourseDistanceRace = Pick<EventRace, 'id' | 'eventId'>;

/**
 * Read access to the Eventor API. List operations decode the whole response up front and
 * hand the records out one at a time; each returned iterator can be consumed once.
 */
export interface EventorClient {
  getEvent(eventId: number): Promise<Event>;
  listOrganisations(): AsyncIterableIterator<Organisation>;
  listEvents(params: ListEventsParams): AsyncIterableIterator<Event>;
  getEventResults(eventId: number, options?: EventResultsOptions): Promise<ResultList>;
  getPersonResults(params: PersonResultsParams): Promise<ResultListList>;
  /** The organisation the API key belongs to. */
  getOwnOrganisation(): Promise<Organisation>;
  listPersonsInOwnOrganisation(): AsyncIterableIterator<Person>;
  /** Course length in metres per class name, scraped from the public result page. */
  getCourseDistances(race: CourseDistanceRace): Promise<Map<string, number>>;
}
