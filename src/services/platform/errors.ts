/**
 * Transport errors
 *
 * Raised by the platform client. SyncError.fromUnknown maps each class name
 * to a category, so these stay plain Error subclasses.
 *
 * @module services/platform/errors
 */

/**
 * Non-success HTTP response. Carries the status and the raw body.
 */
export class APIError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string,
    public readonly url: string
  ) {
    super(`${status}: ${body}`);
    this.name = 'APIError';
  }
}

/**
 * The platform accepted the request but reported an error for the query
 */
export class QueryError extends Error {
  constructor(
    message: string,
    public readonly query: string
  ) {
    super(message);
    this.name = 'QueryError';
  }
}

/**
 * The caller asked for something the platform cannot do
 */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

export class PollTimeoutError extends Error {
  constructor(
    message: string,
    public readonly pending: string[]
  ) {
    super(message);
    this.name = 'PollTimeoutError';
  }
}
