/**
 * RateLimitedError
 *
 * Thrown when the collection endpoint answers 429, and for every delivery
 * attempted before the advertised delay has elapsed.
 */
export class RateLimitedError extends Error {
  public constructor(public readonly retryAfterMs: number) {
    super(`IP is rate limited, retry in ${Math.ceil(retryAfterMs / 1000)}s`);
    this.name = 'RateLimitedError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RateLimitedError);
    }
  }
}
