/**
 * Project: Eventor Client
 * File: src/core/app/connectors/eventor/schemas.ts
 * Summary: Entity models binding Eventor XML documents to domain records.
 *
 * Tag and attribute names are Eventor's own and must match verbatim. Models marked
 * `ordered` rely on Eventor emitting children in a fixed order; keep their fields in
 * that order when editing.
 */

import {
  Classification,
  UNKNOWN_ORGANISATION_NAME,
  personFullName,
  type Country,
  type CountryName,
  type DateAndTime,
  type Event,
  type EventRace,
  type Organisation,
  type OrganisationRef,
  type Person,
  type Position,
} from '@core/domain';
import type {
  ClassResult,
  PersonResult,
  RaceResult,
  Result,
  ResultList,
  ResultListList,
  Split,
} from '@core/domain';

import { defineModel, mapModel } from '../../xml/decoder';
import {
  attribute,
  child,
  children,
  content,
  enumeration,
  float,
  integer,
  oneOf,
  optional,
  string,
  text,
  withDefault,
  wrapped,
  type Model,
} from '../../xml/fields';

export const countryNameModel: Model<CountryName> = defineModel({
  fields: (read) => ({
    languageId: read(attribute('languageId', string)),
    name: read(content(string)),
  }),
});

export const countryModel: Model<Country> = defineModel({
  tag: 'Country',
  mode: 'ordered',
  fields: (read) => ({
    id: read(wrapped('CountryId', attribute('value', integer))),
    names: read(children('Name', countryNameModel)),
  }),
});

export const dateAndTimeModel: Model<DateAndTime> = defineModel({
  fields: (read) => ({
    date: read(text('Date', string)),
    clock: read(optional(text('Clock', string))),
  }),
});

export const organisationModel: Model<Organisation> = defineModel({
  tag: 'Organisation',
  mode: 'ordered',
  fields: (read) => ({
    id: read(text('OrganisationId', integer)),
    name: read(text('Name', string)),
    shortName: read(text('ShortName', string)),
    mediaName: read(optional(text('MediaName', string))),
    typeId: read(text('OrganisationTypeId', integer)),
    country: read(optional(child('Country', countryModel))),
    parentOrganisationId: read(optional(text('ParentOrganisation/OrganisationId', integer))),
  }),
});

const unknownOrganisationModel: Model<OrganisationRef> = defineModel({
  fields: (read) => ({
    kind: 'unknown' as const,
    name: read(withDefault(text('Name', string), () => UNKNOWN_ORGANISATION_NAME)),
  }),
});

const knownOrganisationModel: Model<OrganisationRef> = mapModel(
  organisationModel,
  (organisation) => ({ kind: 'known' as const, organisation }),
);

export const UNKNOWN_ORGANISATION: OrganisationRef = {
  kind: 'unknown',
  name: UNKNOWN_ORGANISATION_NAME,
};

export const positionModel: Model<Position> = defineModel({
  fields: (read) => ({
    x: read(attribute('x', float)),
    y: read(attribute('y', float)),
    unit: read(attribute('unit', string)),
  }),
});

export const eventRaceModel: Model<EventRace> = defineModel({
  mode: 'ordered',
  fields: (read) => ({
    raceDistance: read(optional(attribute('raceDistance', string))),
    id: read(text('EventRaceId', integer)),
    eventId: read(text('EventId', integer)),
    name: read(optional(text('Name', string))),
    raceDate: read(child('RaceDate', dateAndTimeModel)),
    position: read(optional(child('EventCenterPosition', positionModel))),
  }),
});

export const eventModel: Model<Event> = defineModel({
  tag: 'Event',
  mode: 'ordered',
  fields: (read) => ({
    id: read(text('EventId', integer)),
    name: read(text('Name', string)),
    classification: read(
      text('EventClassificationId', enumeration('classification', Classification)),
    ),
    statusId: read(text('EventStatusId', integer)),
    attributeId: read(optional(text('EventAttributeId', integer))),
    disciplineId: read(optional(text('DisciplineId', integer))),
    startDate: read(text('StartDate/Date', string)),
    finishDate: read(child('FinishDate', dateAndTimeModel)),
    organiserIds: read(optional(wrapped('Organiser', children('OrganisationId', integer)))),
    races: read(children('EventRace', eventRaceModel)),
  }),
});

export const organisationListModel: Model<Organisation[]> = defineModel({
  tag: 'OrganisationList',
  fields: (read) => read(children('Organisation', organisationModel)),
});

export const eventListModel: Model<Event[]> = defineModel({
  tag: 'EventList',
  fields: (read) => read(children('Event', eventModel)),
});

export const personModel: Model<Person> = mapModel(
  defineModel({
    tag: 'Person',
    mode: 'ordered',
    fields: (read) => ({
      sex: read(optional(attribute('sex', string))),
      familyName: read(text('PersonName/Family', string)),
      givenName: read(text('PersonName/Given', string)),
      id: read(optional(text('PersonId', integer))),
      birthDate: read(optional(child('BirthDate', dateAndTimeModel))),
      nationality: read(optional(child('Nationality/Country', countryModel))),
    }),
  }),
  (fields) => ({ ...fields, name: personFullName(fields) }),
);

export const personListModel: Model<Person[]> = defineModel({
  tag: 'PersonList',
  fields: (read) => read(children('Person', personModel)),
});

export const splitModel: Model<Split> = defineModel({
  fields: (read) => ({
    sequence: read(attribute('sequence', integer)),
    controlCode: read(text('ControlCode', integer)),
    time: read(optional(text('Time', string))),
  }),
});

export const resultModel: Model<Result> = defineModel({
  mode: 'ordered',
  fields: (read) => ({
    id: read(text('ResultId', integer)),
    startTime: read(optional(child('StartTime', dateAndTimeModel))),
    finishTime: read(optional(child('FinishTime', dateAndTimeModel))),
    time: read(optional(text('Time', string))),
    timeDiff: read(optional(text('TimeDiff', string))),
    position: read(optional(text('ResultPosition', integer))),
    status: read(optional(wrapped('CompetitorStatus', attribute('value', string)))),
    splits: read(children('SplitTime', splitModel)),
  }),
});

export const raceResultModel: Model<RaceResult> = defineModel({
  mode: 'ordered',
  fields: (read) => ({
    eventRaceId: read(text('EventRaceId', integer)),
    result: read(child('Result', resultModel)),
  }),
});

export const personResultModel: Model<PersonResult> = defineModel({
  mode: 'ordered',
  fields: (read) => ({
    person: read(child('Person', personModel)),
    organisation: read(
      withDefault(
        oneOf('Organisation', [knownOrganisationModel, unknownOrganisationModel]),
        () => UNKNOWN_ORGANISATION,
      ),
    ),
    result: read(optional(child('Result', resultModel))),
    raceResult: read(optional(child('RaceResult', raceResultModel))),
  }),
});

export const classResultModel: Model<ClassResult> = defineModel({
  mode: 'ordered',
  fields: (read) => ({
    numberOfEntries: read(attribute('numberOfEntries', integer)),
    numberOfStarts: read(optional(attribute('numberOfStarts', integer))),
    classId: read(text('EventClass/EventClassId', integer)),
    classSex: read(optional(wrapped('EventClass', attribute('sex', string)))),
    name: read(text('EventClass/Name', string)),
    shortName: read(text('EventClass/ClassShortName', string)),
    typeId: read(text('EventClass/ClassTypeId', integer)),
    personResults: read(children('PersonResult', personResultModel)),
  }),
});

export const resultListModel: Model<ResultList> = defineModel({
  tag: 'ResultList',
  fields: (read) => ({
    event: read(child('Event', eventModel)),
    classResults: read(children('ClassResult', classResultModel)),
  }),
});

export const resultListListModel: Model<ResultListList> = defineModel({
  tag: 'ResultListList',
  mode: 'ordered',
  fields: (read) => ({
    resultLists: read(children('ResultList', resultListModel)),
  }),
});
