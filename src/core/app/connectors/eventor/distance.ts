import { alt, literal, map, parsePartial, regex, seq } from '@/lib/parsing/combinators';

const digits = regex(/\d*/, 'digits');
const someDigits = regex(/\d+/, 'digit');
const whitespace = regex(/\s+/, 'whitespace');
const metresSuffix = literal(' m,');

// "3 200 m," (space as thousands separator) or "450 m,"
const groupedDistance = map(seq(digits, whitespace, someDigits, metresSuffix), ([high, , low]) =>
  Number.parseInt(`${high}${low}`, 10),
);
const plainDistance = map(seq(someDigits, metresSuffix), ([value]) => Number.parseInt(value, 10));

const distance = alt(groupedDistance, plainDistance);

/**
 * Reads a course length in metres from the start of an Eventor result page class header,
 * e.g. `"3 200 m, 1:30"` → `3200`. Returns `null` when the text does not start with a length.
 */
export const parseDistance = (text: string): number | null => parsePartial(distance, text);
