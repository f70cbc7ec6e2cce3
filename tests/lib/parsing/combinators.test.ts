/* eslint-disable @typescript-eslint/no-floating-promises -- Node test registration intentionally runs without awaiting. */

import assert from 'node:assert/strict';
import test from 'node:test';

import { alt, literal, map, parsePartial, regex, seq } from '../../../src/lib/parsing/combinators';

test('regex matches only at the current position', () => {
  const digits = regex(/\d+/g, 'digits');

  assert.deepEqual(digits('ab12', 2), { ok: true, value: '12', index: 4 });
  assert.deepEqual(digits('ab12', 0), { ok: false, index: 0, expected: 'digits' });
});

test('seq collects values and stops at the first failure', () => {
  const pair = seq(regex(/\d+/), literal('-'), regex(/\d+/));

  assert.deepEqual(pair('10-20 rest', 0), { ok: true, value: ['10', '-', '20'], index: 5 });
  assert.deepEqual(pair('10+20', 0), { ok: false, index: 2, expected: '"-"' });
});

test('alt retries each alternative from the same position', () => {
  const word = alt(literal('kilometre'), literal('km'), literal('m'));

  assert.equal(parsePartial(word, 'km'), 'km');
  assert.equal(parsePartial(word, 'metre'), 'm');
  assert.deepEqual(word('x', 0), { ok: false, index: 0, expected: '"kilometre" | "km" | "m"' });
});

test('parsePartial ignores trailing input and maps values', () => {
  const number = map(regex(/\d+/), (value) => Number.parseInt(value, 10));

  assert.equal(parsePartial(number, '42 and more'), 42);
  assert.equal(parsePartial(number, 'none'), null);
});
