export type EventorDecodeErrorCode =
  | 'MALFORMED_XML'
  | 'UNEXPECTED_ROOT'
  | 'MISSING_FIELD'
  | 'INVALID_VALUE'
  | 'NO_MATCHING_ALTERNATIVE';

/**
 * Raised when an Eventor XML document does not have the shape the entity model expects.
 * `path` points at the element (or attribute) the decoder was looking at, e.g.
 * `ResultList/ClassResult[1]/PersonResult[0]/Person/PersonName/Family`.
 */
export class EventorDecodeError extends Error {
  readonly code: EventorDecodeErrorCode;

  readonly path?: string;

  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code: EventorDecodeErrorCode;
      path?: string;
      details?: Record<string, unknown>;
    },
  ) {
    super(message);
    this.name = 'EventorDecodeError';
    this.code = options.code;
    this.path = options.path;
    this.details = options.details;
  }
}
