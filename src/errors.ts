/**
 * Raised while wiring components together (missing credentials, bad settings).
 * This is the only error class allowed to escape the identification pipeline.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A media index request failed in a way that may succeed on retry:
 * timeouts, dropped connections, HTTP 5xx and 429.
 */
export class TransientIndexError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'TransientIndexError';
    this.status = status;
  }
}

/**
 * A media index request was rejected (4xx other than 429). Retrying the same
 * request will not help.
 */
export class IndexRequestError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'IndexRequestError';
    this.status = status;
  }
}

/**
 * The index call was aborted through the caller's AbortSignal.
 */
export class IndexRequestCancelledError extends Error {
  constructor() {
    super('Index request cancelled');
    this.name = 'IndexRequestCancelledError';
  }
}
