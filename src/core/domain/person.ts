import type { DateAndTime } from './event';
import type { Country } from './organisation';

export type Person = {
  readonly sex?: string;
  readonly familyName: string;
  readonly givenName: string;
  /** Given and family name joined for display. */
  readonly name: string;
  readonly id?: number;
  readonly birthDate?: DateAndTime;
  readonly nationality?: Country;
};

export const personFullName = (person: Pick<Person, 'givenName' | 'familyName'>): string =>
  `${person.givenName} ${person.familyName}`;
