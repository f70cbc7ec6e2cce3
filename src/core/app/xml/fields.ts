/**
 * Project: Eventor Client
 * File: src/core/app/xml/fields.ts
 * Summary: Field descriptors mapping record properties onto XML locations, plus scalar converters.
 *
 * A descriptor says where a value lives (child text, own text, attribute, nested element,
 * repeated children, optionally behind a wrapper path) and what to do when it is missing.
 * The decoder engine in `./decoder` is the only code that walks the document.
 */

import { EventorDecodeError } from '../errors/eventorDecodeError';

export type SearchMode = 'ordered' | 'unordered';

export interface Model<T> {
  /** Expected root tag when the model is decoded as a whole document. */
  readonly tag?: string;
  readonly mode: SearchMode;
  decode(element: Element, path: string): T;
}

export type Scalar<T> = {
  readonly name: string;
  /** Returns `undefined` when the raw text is not a valid value. */
  parse(raw: string): T | undefined;
};

export type Absence<T> =
  | { readonly policy: 'required' }
  | { readonly policy: 'default'; readonly fallback: () => T };

type FieldBase<T> = {
  /** Wrapper elements to descend through, outermost first. */
  readonly path: readonly string[];
  readonly absent: Absence<T>;
};

export type Field<T> =
  | (FieldBase<T> & {
      readonly kind: 'text';
      readonly tag: string;
      readonly read: (raw: string, at: string) => T;
    })
  | (FieldBase<T> & {
      readonly kind: 'content';
      readonly read: (raw: string, at: string) => T;
    })
  | (FieldBase<T> & {
      readonly kind: 'attribute';
      readonly name: string;
      readonly read: (raw: string, at: string) => T;
    })
  | (FieldBase<T> & {
      readonly kind: 'element';
      readonly tag: string;
      readonly read: (element: Element, at: string) => T;
    })
  | (FieldBase<T> & {
      readonly kind: 'elements';
      readonly tag: string;
      readonly read: (elements: Element[], at: string) => T;
    });

export type FieldReader = <T>(field: Field<T>) => T;

const REQUIRED = { policy: 'required' } as const;

export const string: Scalar<string> = {
  name: 'string',
  parse: (raw) => raw,
};

export const integer: Scalar<number> = {
  name: 'integer',
  parse: (raw) => {
    const trimmed = raw.trim();
    return /^[+-]?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
  },
};

export const float: Scalar<number> = {
  name: 'float',
  parse: (raw) => {
    const trimmed = raw.trim();
    if (trimmed.length === 0) {
      return undefined;
    }

    const value = Number(trimmed);
    return Number.isFinite(value) ? value : undefined;
  },
};

/** Accepts either a declared member name or its ordinal. */
export const enumeration = <E extends Record<string, number>>(
  name: string,
  members: E,
): Scalar<E[keyof E]> => {
  const byName = new Map<string, E[keyof E]>();
  const byOrdinal = new Map<number, E[keyof E]>();

  for (const key in members) {
    const value = members[key];
    byName.set(key, value);
    byOrdinal.set(value, value);
  }

  return {
    name,
    parse: (raw) => {
      const trimmed = raw.trim();
      if (/^\d+$/.test(trimmed)) {
        return byOrdinal.get(Number.parseInt(trimmed, 10));
      }

      return byName.get(trimmed);
    },
  };
};

const readScalar =
  <T>(scalar: Scalar<T>) =>
  (raw: string, at: string): T => {
    const value = scalar.parse(raw);
    if (value === undefined) {
      throw new EventorDecodeError(`Expected ${scalar.name} at ${at} but found "${raw}".`, {
        code: 'INVALID_VALUE',
        path: at,
        details: { raw, expected: scalar.name },
      });
    }

    return value;
  };

const decodeWith =
  <T>(model: Model<T>) =>
  (element: Element, at: string): T =>
    model.decode(element, at);

const readTextWith = <T>(scalar: Scalar<T>) => {
  const read = readScalar(scalar);
  return (element: Element, at: string): T => read(element.textContent ?? '', at);
};

const splitPath = (path: string): { wrappers: string[]; leaf: string } => {
  const segments = path.split('/').filter((segment) => segment.length > 0);
  const leaf = segments.pop();
  if (!leaf) {
    throw new Error(`Empty XML path "${path}".`);
  }

  return { wrappers: segments, leaf };
};

/** Text of a child element. `tag` may be a wrapped path such as `PersonName/Family`. */
export const text = <T>(tag: string, scalar: Scalar<T>): Field<T> => {
  const { wrappers, leaf } = splitPath(tag);
  return { kind: 'text', tag: leaf, path: wrappers, absent: REQUIRED, read: readScalar(scalar) };
};

/** Text of the current element itself. */
export const content = <T>(scalar: Scalar<T>): Field<T> => ({
  kind: 'content',
  path: [],
  absent: REQUIRED,
  read: readScalar(scalar),
});

export const attribute = <T>(name: string, scalar: Scalar<T>): Field<T> => ({
  kind: 'attribute',
  name,
  path: [],
  absent: REQUIRED,
  read: readScalar(scalar),
});

export const child = <T>(tag: string, model: Model<T>): Field<T> => {
  const { wrappers, leaf } = splitPath(tag);
  return {
    kind: 'element',
    tag: leaf,
    path: wrappers,
    absent: REQUIRED,
    read: decodeWith(model),
  };
};

/** Every matching child, in document order. Decodes to an empty array when there are none. */
export const children = <T>(tag: string, item: Scalar<T> | Model<T>): Field<T[]> => {
  const { wrappers, leaf } = splitPath(tag);
  const readItem = 'decode' in item ? decodeWith(item) : readTextWith(item);

  return {
    kind: 'elements',
    tag: leaf,
    path: wrappers,
    absent: { policy: 'default', fallback: () => [] },
    read: (elements, at) => elements.map((element, index) => readItem(element, `${at}[${index}]`)),
  };
};

/**
 * Polymorphic element: the first model that decodes the element wins. Alternatives are tried
 * in order, so list the most specific shape first.
 */
export const oneOf = <T>(tag: string, alternatives: readonly Model<T>[]): Field<T> => {
  const { wrappers, leaf } = splitPath(tag);
  return {
    kind: 'element',
    tag: leaf,
    path: wrappers,
    absent: REQUIRED,
    read: (element, at) => {
      const failures: Array<{ code: string; path?: string; message: string }> = [];

      for (const alternative of alternatives) {
        try {
          return alternative.decode(element, at);
        } catch (error) {
          if (!(error instanceof EventorDecodeError)) {
            throw error;
          }

          failures.push({ code: error.code, path: error.path, message: error.message });
        }
      }

      throw new EventorDecodeError(`No alternative matched the element at ${at}.`, {
        code: 'NO_MATCHING_ALTERNATIVE',
        path: at,
        details: { failures },
      });
    },
  };
};

/** Descend through `path` (slash separated) before applying `field`. */
export const wrapped = <T>(path: string, field: Field<T>): Field<T> => ({
  ...field,
  path: [...path.split('/').filter((segment) => segment.length > 0), ...field.path],
});

export const optional = <T>(field: Field<T>): Field<T | undefined> => {
  const absent: Absence<T | undefined> = { policy: 'default', fallback: () => undefined };
  return { ...field, absent };
};

export const withDefault = <T>(field: Field<T>, fallback: () => T): Field<T> => {
  const absent: Absence<T> = { policy: 'default', fallback };
  return { ...field, absent };
};
