export type EventorClientErrorCode = 'NETWORK_ERROR' | 'HTTP_ERROR';

/** Transport failure talking to Eventor: the request never completed, or came back non-2xx. */
export class EventorClientError extends Error {
  readonly code: EventorClientErrorCode;

  readonly status?: number;

  readonly url?: string;

  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code: EventorClientErrorCode;
      status?: number;
      url?: string;
      details?: Record<string, unknown>;
    },
  ) {
    super(message);
    this.name = 'EventorClientError';
    this.code = options.code;
    this.status = options.status;
    this.url = options.url;
    this.details = options.details;
  }
}
