/**
 * Project: Eventor Client
 * File: tests/core/eventor/schemas.test.ts
 * Summary: Decoding Eventor documents into domain records.
 */

/* eslint-disable @typescript-eslint/no-floating-promises -- Node test registration intentionally runs without awaiting. */

import assert from 'node:assert/strict';
import test from 'node:test';

import {
  eventListModel,
  eventModel,
  organisationListModel,
  organisationModel,
  personListModel,
  personModel,
  personResultModel,
  resultListListModel,
  resultListModel,
} from '../../../src/core/app/connectors/eventor/schemas';
import { decodeXml } from '../../../src/core/app/xml/decoder';
import { Classification, organisationName } from '../../../src/core/domain';
import { readFixture } from '../../helpers/fixtures';

test('decodes a single event with races and organisers', async () => {
  const event = decodeXml(eventModel, await readFixture('xml/event.xml'));

  assert.equal(event.id, 1001);
  assert.equal(event.name, 'Vårsprinten');
  assert.equal(event.classification, Classification.Local);
  assert.equal(event.statusId, 3);
  assert.equal(event.attributeId, undefined);
  assert.equal(event.disciplineId, 1);
  assert.equal(event.startDate, '2025-05-14');
  assert.deepEqual(event.finishDate, { date: '2025-05-14', clock: '00:00:00' });
  assert.deepEqual(event.organiserIds, [321, 322]);
  assert.equal(event.races.length, 1);

  const [race] = event.races;
  assert.equal(race.raceDistance, 'sprint');
  assert.equal(race.id, 2001);
  assert.equal(race.eventId, 1001);
  assert.equal(race.name, 'Vårsprinten');
  assert.deepEqual(race.raceDate, { date: '2025-05-14', clock: '18:00:00' });
  assert.deepEqual(race.position, { x: 18.0686, y: 59.3293, unit: 'WGS-84' });
});

test('decodes an event list in document order', async () => {
  const events = decodeXml(eventListModel, await readFixture('xml/events.xml'));

  assert.deepEqual(
    events.map((event) => event.id),
    [1001, 1002],
  );

  const [first, second] = events;
  assert.equal(first.organiserIds, undefined);
  assert.equal(first.races[0].name, undefined);
  assert.equal(first.races[0].raceDate.clock, undefined);
  assert.equal(second.classification, Classification.National);
  assert.equal(second.attributeId, 5);
  assert.equal(second.disciplineId, undefined);
  assert.deepEqual(
    second.races.map((race) => [race.id, race.name]),
    [
      [2002, 'Dag 1'],
      [2003, 'Dag 2'],
    ],
  );
});

test('decodes organisations with optional country and parent', async () => {
  const organisations = decodeXml(organisationListModel, await readFixture('xml/organisations.xml'));

  assert.equal(organisations.length, 2);
  const [club, district] = organisations;

  assert.equal(club.id, 321);
  assert.equal(club.name, 'Skogsluffarnas OK');
  assert.equal(club.shortName, 'Skogsluffarna');
  assert.equal(club.mediaName, 'Skogsluffarnas OK');
  assert.equal(club.typeId, 3);
  assert.equal(club.parentOrganisationId, 16);
  assert.deepEqual(club.country, {
    id: 752,
    names: [
      { languageId: 'sv', name: 'Sverige' },
      { languageId: 'en', name: 'Sweden' },
    ],
  });

  assert.equal(district.id, 16);
  assert.equal(district.mediaName, undefined);
  assert.equal(district.country, undefined);
  assert.equal(district.parentOrganisationId, undefined);
});

test('decodes the organisation document returned for an API key', async () => {
  const organisation = decodeXml(organisationModel, await readFixture('xml/organisation.xml'));

  assert.equal(organisation.id, 321);
  assert.equal(organisation.name, 'Skogsluffarnas OK');
});

test('decodes persons and derives the display name', async () => {
  const persons = decodeXml(personListModel, await readFixture('xml/persons.xml'));

  assert.equal(persons.length, 2);
  const [anna, erik] = persons;

  assert.equal(anna.sex, 'F');
  assert.equal(anna.familyName, 'Lindqvist');
  assert.equal(anna.givenName, 'Anna');
  assert.equal(anna.name, 'Anna Lindqvist');
  assert.equal(anna.id, 5001);
  assert.deepEqual(anna.birthDate, { date: '1990-03-02', clock: undefined });
  assert.deepEqual(anna.nationality, {
    id: 752,
    names: [{ languageId: 'sv', name: 'Sverige' }],
  });

  assert.equal(erik.name, 'Erik Berg');
  assert.equal(erik.id, 5002);
  assert.equal(erik.birthDate, undefined);
  assert.equal(erik.nationality, undefined);
});

test('wrapped names decode the same when intermediate elements carry attributes', () => {
  const plain = decodeXml(
    personModel,
    '<Person><PersonName><Family>Ek</Family><Given>Sara</Given></PersonName></Person>',
  );
  const decorated = decodeXml(
    personModel,
    '<Person><PersonName lang="sv" modifyDate="2025-01-01"><Family>Ek</Family><Given sequence="1">Sara</Given></PersonName></Person>',
  );

  assert.deepEqual(decorated, plain);
  assert.equal(decorated.familyName, 'Ek');
});

test('a person result without an organisation is clubless', () => {
  const personResult = decodeXml(
    personResultModel,
    '<PersonResult><Person><PersonName><Family>Ek</Family><Given>Sara</Given></PersonName></Person></PersonResult>',
  );

  assert.deepEqual(personResult.organisation, { kind: 'unknown', name: 'Klubblös' });
  assert.equal(organisationName(personResult.organisation), 'Klubblös');
  assert.equal(personResult.result, undefined);
});

test('reports the full path of a missing person name part', () => {
  assert.throws(
    () => decodeXml(personModel, '<Person><PersonName><Given>Anna</Given></PersonName></Person>'),
    {
      name: 'EventorDecodeError',
      code: 'MISSING_FIELD',
      path: 'Person/PersonName/Family',
    },
  );
});

test('reports invalid numbers with their location', () => {
  assert.throws(() => decodeXml(organisationModel, '<Organisation><OrganisationId>abc</OrganisationId></Organisation>'), {
    code: 'INVALID_VALUE',
    path: 'Organisation/OrganisationId',
    message: 'Expected integer at Organisation/OrganisationId but found "abc".',
  });
});

test('refuses a document with a different root element', async () => {
  const xml = await readFixture('xml/events.xml');

  assert.throws(() => decodeXml(eventModel, xml), {
    code: 'UNEXPECTED_ROOT',
    message: 'Expected a <Event> document but the root element is <EventList>.',
  });
});

test('decodes an event result list', async () => {
  const resultList = decodeXml(resultListModel, await readFixture('xml/result-list.xml'));

  assert.equal(resultList.event.id, 1001);
  assert.equal(resultList.event.statusId, 9);
  assert.equal(resultList.classResults.length, 2);

  const [women, men] = resultList.classResults;
  assert.equal(women.numberOfEntries, 3);
  assert.equal(women.numberOfStarts, 3);
  assert.equal(women.classId, 7001);
  assert.equal(women.classSex, 'F');
  assert.equal(women.name, 'D21');
  assert.equal(women.shortName, 'D21');
  assert.equal(women.typeId, 16);
  assert.deepEqual(
    women.personResults.map((entry) => entry.person.name),
    ['Anna Lindqvist', 'Karin Holm', 'Sara Ek'],
  );

  assert.equal(men.numberOfStarts, undefined);
  assert.equal(men.classSex, undefined);
  assert.deepEqual(men.personResults, []);
});

test('decodes results with splits', async () => {
  const resultList = decodeXml(resultListModel, await readFixture('xml/result-list.xml'));
  const winner = resultList.classResults[0].personResults[0];

  assert.equal(winner.raceResult, undefined);
  const result = winner.result;
  assert.ok(result);
  assert.equal(result.id, 9001);
  assert.deepEqual(result.startTime, { date: '2025-05-14', clock: '18:02:00' });
  assert.deepEqual(result.finishTime, { date: '2025-05-14', clock: '18:25:30' });
  assert.equal(result.time, '23:30');
  assert.equal(result.timeDiff, '0:00');
  assert.equal(result.position, 1);
  assert.equal(result.status, 'OK');
  assert.deepEqual(result.splits, [
    { sequence: 1, controlCode: 31, time: '2:10' },
    { sequence: 2, controlCode: 45, time: undefined },
  ]);
});

test('distinguishes known, named and absent organisations on results', async () => {
  const resultList = decodeXml(resultListModel, await readFixture('xml/result-list.xml'));
  const [anna, karin, sara] = resultList.classResults[0].personResults;

  assert.equal(anna.organisation.kind, 'known');
  assert.equal(organisationName(anna.organisation), 'Skogsluffarnas OK');
  assert.deepEqual(karin.organisation, { kind: 'unknown', name: 'Gästlöpare' });
  assert.deepEqual(sara.organisation, { kind: 'unknown', name: 'Klubblös' });
  assert.equal(sara.person.id, undefined);

  assert.equal(karin.result?.status, 'DidNotFinish');
  assert.equal(karin.result?.position, undefined);
  assert.deepEqual(karin.result?.splits, []);
  assert.equal(sara.result?.position, 2);
});

test('decodes person results across events, including race results', async () => {
  const { resultLists } = decodeXml(resultListListModel, await readFixture('xml/person-results.xml'));

  assert.deepEqual(
    resultLists.map((resultList) => resultList.event.name),
    ['Vårsprinten', 'Höstkavlen'],
  );

  const [first, second] = resultLists;
  assert.equal(first.event.races.length, 0);
  assert.equal(first.classResults[0].personResults[0].result?.time, '23:30');
  assert.deepEqual(first.classResults[0].personResults[0].organisation, {
    kind: 'unknown',
    name: 'Klubblös',
  });

  const relay = second.classResults[0].personResults[0];
  assert.equal(relay.result, undefined);
  assert.equal(relay.raceResult?.eventRaceId, 2002);
  assert.equal(relay.raceResult?.result.id, 9100);
  assert.equal(relay.raceResult?.result.position, 5);
  assert.equal(relay.raceResult?.result.status, 'OK');
});
