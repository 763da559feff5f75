/**
 * PermanentDeliveryError
 *
 * Thrown when the collection endpoint refuses a notice and resending it
 * unchanged would fail again:
 * - 400 Bad Request (malformed notice)
 * - 401/403 (project id or key are wrong)
 * - 404 (unknown project)
 *
 * Unlike InfrastructureError, the transport never retries these.
 */
export class PermanentDeliveryError extends Error {
  public constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'PermanentDeliveryError';

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PermanentDeliveryError);
    }
  }
}
