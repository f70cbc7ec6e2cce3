/**
 * Project: Eventor Client
 * File: tests/core/eventor/courseDistances.test.ts
 * Summary: Course length extraction from the public result page.
 */

/* eslint-disable @typescript-eslint/no-floating-promises -- Node test registration intentionally runs without awaiting. */

import assert from 'node:assert/strict';
import test from 'node:test';

import { extractCourseDistancesFromHtml } from '../../../src/core/app/connectors/eventor/courseDistances';
import { readFixture } from '../../helpers/fixtures';

test('maps class names to course lengths in page order', async () => {
  const { distances, unparsed } = extractCourseDistancesFromHtml(
    await readFixture('html/result-list.html'),
  );

  assert.deepEqual(Array.from(distances.entries()), [
    ['D21', 3200],
    ['H21 Elit', 450],
  ]);
  assert.deepEqual(unparsed, ['Inskolning']);
});

test('skips headers without a heading block', () => {
  const html = `
    <div class="eventClassHeader"><span>Ingen rubrik</span></div>
    <div class="eventClassHeader"><div>1 200 m, 6 kontroller</div></div>
    <div class="eventClassHeader"><div><h3>   </h3>900 m,</div></div>
  `;

  const { distances, unparsed } = extractCourseDistancesFromHtml(html);

  assert.equal(distances.size, 0);
  assert.deepEqual(unparsed, []);
});

test('returns nothing for a page without result classes', () => {
  const { distances, unparsed } = extractCourseDistancesFromHtml('<html><body><p>Inga resultat</p></body></html>');

  assert.equal(distances.size, 0);
  assert.deepEqual(unparsed, []);
});
