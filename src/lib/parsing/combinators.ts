/**
 * Project: Eventor Client
 * File: src/lib/parsing/combinators.ts
 * Summary: Minimal parser combinators for pulling values out of scraped text.
 */

export type ParseResult<T> =
  | { ok: true; value: T; index: number }
  | { ok: false; index: number; expected: string };

export type Parser<T> = (input: string, index: number) => ParseResult<T>;

const failure = (index: number, expected: string): ParseResult<never> => ({
  ok: false,
  index,
  expected,
});

/** Matches `pattern` at the current position (the pattern is anchored for you). */
export const regex = (pattern: RegExp, expected = pattern.source): Parser<string> => {
  const sticky = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '') + 'y');

  return (input, index) => {
    sticky.lastIndex = index;
    const match = sticky.exec(input);
    if (!match) {
      return failure(index, expected);
    }

    return { ok: true, value: match[0], index: index + match[0].length };
  };
};

export const literal = (expected: string): Parser<string> => (input, index) =>
  input.startsWith(expected, index)
    ? { ok: true, value: expected, index: index + expected.length }
    : failure(index, JSON.stringify(expected));

export const seq =
  <T>(...parsers: Parser<T>[]): Parser<T[]> =>
  (input, index) => {
    const values: T[] = [];
    let position = index;

    for (const parser of parsers) {
      const result = parser(input, position);
      if (!result.ok) {
        return result;
      }

      values.push(result.value);
      position = result.index;
    }

    return { ok: true, value: values, index: position };
  };

/** Ordered choice; each alternative restarts from the same position. */
export const alt =
  <T>(...parsers: Parser<T>[]): Parser<T> =>
  (input, index) => {
    const expected: string[] = [];

    for (const parser of parsers) {
      const result = parser(input, index);
      if (result.ok) {
        return result;
      }

      expected.push(result.expected);
    }

    return failure(index, expected.join(' | '));
  };

export const map =
  <T, U>(parser: Parser<T>, transform: (value: T) => U): Parser<U> =>
  (input, index) => {
    const result = parser(input, index);
    return result.ok ? { ok: true, value: transform(result.value), index: result.index } : result;
  };

/** Runs `parser` from the start of `input`, ignoring whatever follows the match. */
export const parsePartial = <T>(parser: Parser<T>, input: string): T | null => {
  const result = parser(input, 0);
  return result.ok ? result.value : null;
};
