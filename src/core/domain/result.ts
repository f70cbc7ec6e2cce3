/**
 * Project: Eventor Client
 * File: src/core/domain/result.ts
 * Summary: Result list records, from a single punch up to results across a series of events.
 */

import type { DateAndTime, Event } from './event';
import type { OrganisationRef } from './organisation';
import type { Person } from './person';

export type Split = {
  readonly sequence: number;
  readonly controlCode: number;
  /** Missing when the control was not punched. */
  readonly time?: string;
};

export type Result = {
  readonly id: number;
  readonly startTime?: DateAndTime;
  readonly finishTime?: DateAndTime;
  readonly time?: string;
  readonly timeDiff?: string;
  /** Missing for competitors without a ranking (DNF, MP, not started). */
  readonly position?: number;
  readonly status?: string;
  readonly splits: readonly Split[];
};

export type RaceResult = {
  readonly eventRaceId: number;
  readonly result: Result;
};

export type PersonResult = {
  readonly person: Person;
  readonly organisation: OrganisationRef;
  readonly result?: Result;
  readonly raceResult?: RaceResult;
};

export type ClassResult = {
  readonly numberOfEntries: number;
  readonly numberOfStarts?: number;
  readonly classId: number;
  readonly classSex?: string;
  readonly name: string;
  readonly shortName: string;
  readonly typeId: number;
  readonly personResults: readonly PersonResult[];
};

export type ResultList = {
  readonly event: Event;
  readonly classResults: readonly ClassResult[];
};

export type ResultListList = {
  readonly resultLists: readonly ResultList[];
};
