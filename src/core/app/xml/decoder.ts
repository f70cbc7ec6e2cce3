/**
 * Project: Eventor Client
 * File: src/core/app/xml/decoder.ts
 * Summary: Generic engine turning field descriptors plus an XML document into typed records.
 */

import { DOMParser } from '@xmldom/xmldom';

import { EventorDecodeError } from '../errors/eventorDecodeError';
import type { Field, FieldReader, Model, SearchMode } from './fields';

const ELEMENT_NODE = 1;

export type ModelDefinition<T> = {
  tag?: string;
  mode?: SearchMode;
  /**
   * Reads every property through `read`. Properties are resolved in the order they are
   * written, which is the order ordered-mode models match children in.
   */
  fields: (read: FieldReader) => T;
};

type Cursor = {
  /** Index of the first child not yet consumed. */
  next: number;
  /** Last wrapper element matched; later wrapped fields may share it. */
  wrapper?: Element;
};

const isElement = (node: Node): node is Element => node.nodeType === ELEMENT_NODE;

const elementChildren = (element: Element): Element[] => {
  const nodes = element.childNodes;
  const elements: Element[] = [];

  for (let index = 0; index < nodes.length; index += 1) {
    const node = nodes.item(index);
    if (node && isElement(node)) {
      elements.push(node);
    }
  }

  return elements;
};

const findChild = (
  elements: Element[],
  tag: string,
  mode: SearchMode,
  cursor: Cursor,
): Element | undefined => {
  if (mode === 'unordered') {
    return elements.find((element) => element.tagName === tag);
  }

  for (let index = cursor.next; index < elements.length; index += 1) {
    const element = elements[index];
    if (element.tagName === tag) {
      cursor.next = index + 1;
      return element;
    }
  }

  return undefined;
};

const findChildren = (
  elements: Element[],
  tag: string,
  mode: SearchMode,
  cursor: Cursor,
): Element[] => {
  if (mode === 'unordered') {
    return elements.filter((element) => element.tagName === tag);
  }

  const matches: Element[] = [];
  for (let index = cursor.next; index < elements.length; index += 1) {
    const element = elements[index];
    if (element.tagName === tag) {
      matches.push(element);
      cursor.next = index + 1;
    }
  }

  return matches;
};

const findWrapper = (
  elements: Element[],
  tag: string,
  mode: SearchMode,
  cursor: Cursor,
): Element | undefined => {
  if (mode === 'ordered' && cursor.wrapper?.tagName === tag) {
    return cursor.wrapper;
  }

  const wrapper = findChild(elements, tag, mode, cursor);
  if (wrapper && mode === 'ordered') {
    cursor.wrapper = wrapper;
  }

  return wrapper;
};

const whenAbsent = <T>(field: Field<T>, at: string): T => {
  if (field.absent.policy === 'default') {
    return field.absent.fallback();
  }

  throw new EventorDecodeError(`Missing required value at ${at}.`, {
    code: 'MISSING_FIELD',
    path: at,
  });
};

const locate = <T>(
  scope: Element,
  elements: Element[],
  field: Field<T>,
  mode: SearchMode,
  cursor: Cursor,
  at: string,
): T => {
  switch (field.kind) {
    case 'content':
      return field.read(scope.textContent ?? '', at);
    case 'attribute': {
      const where = `${at}@${field.name}`;
      if (!scope.hasAttribute(field.name)) {
        return whenAbsent(field, where);
      }

      return field.read(scope.getAttribute(field.name) ?? '', where);
    }
    case 'text': {
      const where = `${at}/${field.tag}`;
      const element = findChild(elements, field.tag, mode, cursor);
      return element ? field.read(element.textContent ?? '', where) : whenAbsent(field, where);
    }
    case 'element': {
      const where = `${at}/${field.tag}`;
      const element = findChild(elements, field.tag, mode, cursor);
      return element ? field.read(element, where) : whenAbsent(field, where);
    }
    case 'elements':
      return field.read(findChildren(elements, field.tag, mode, cursor), `${at}/${field.tag}`);
  }
};

const readField = <T>(
  element: Element,
  elements: Element[],
  field: Field<T>,
  mode: SearchMode,
  cursor: Cursor,
  path: string,
): T => {
  const [head, ...rest] = field.path;
  if (head === undefined) {
    return locate(element, elements, field, mode, cursor, path);
  }

  let scope = findWrapper(elements, head, mode, cursor);
  let at = `${path}/${head}`;
  if (!scope) {
    return whenAbsent(field, at);
  }

  // Below the first wrapper there is nothing to keep in step with.
  for (const segment of rest) {
    at = `${at}/${segment}`;
    scope = elementChildren(scope).find((candidate) => candidate.tagName === segment);
    if (!scope) {
      return whenAbsent(field, at);
    }
  }

  return locate(scope, elementChildren(scope), field, 'unordered', { next: 0 }, at);
};

export const defineModel = <T>(definition: ModelDefinition<T>): Model<T> => {
  const mode = definition.mode ?? 'unordered';

  return {
    tag: definition.tag,
    mode,
    decode: (element, path) => {
      const elements = elementChildren(element);
      const cursor: Cursor = { next: 0 };
      const read: FieldReader = (field) => readField(element, elements, field, mode, cursor, path);
      return definition.fields(read);
    },
  };
};

/** Derives a new record from a decoded one; tag and mode carry over. */
export const mapModel = <T, U>(model: Model<T>, transform: (value: T) => U): Model<U> => ({
  tag: model.tag,
  mode: model.mode,
  decode: (element, path) => transform(model.decode(element, path)),
});

const rejectMalformed = (message: unknown): never => {
  throw new EventorDecodeError(`Malformed XML document: ${String(message)}`, {
    code: 'MALFORMED_XML',
  });
};

const parseRoot = (input: string | Uint8Array): Element => {
  const source = typeof input === 'string' ? input : new TextDecoder('utf-8').decode(input);
  if (source.trim().length === 0) {
    throw new EventorDecodeError('Malformed XML document: the document is empty.', {
      code: 'MALFORMED_XML',
    });
  }

  const parser = new DOMParser({
    errorHandler: { error: rejectMalformed, fatalError: rejectMalformed },
  });
  const document = parser.parseFromString(source, 'text/xml');
  const root: Element | null = document.documentElement;
  if (!root) {
    throw new EventorDecodeError('Malformed XML document: no root element.', {
      code: 'MALFORMED_XML',
    });
  }

  return root;
};

/** Parses `input` once and decodes its root element with `model`. */
export const decodeXml = <T>(model: Model<T>, input: string | Uint8Array): T => {
  const root = parseRoot(input);

  if (model.tag && root.tagName !== model.tag) {
    throw new EventorDecodeError(
      `Expected a <${model.tag}> document but the root element is <${root.tagName}>.`,
      {
        code: 'UNEXPECTED_ROOT',
        path: root.tagName,
        details: { expected: model.tag, actual: root.tagName },
      },
    );
  }

  return model.decode(root, root.tagName);
};
