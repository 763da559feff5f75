/**
 * InfrastructureError
 *
 * Thrown by the transport when a delivery fails for a transient reason:
 * - Network errors (connection refused, DNS failure)
 * - Timeouts
 * - 5xx responses from the collection endpoint
 *
 * Senders never let this escape; they turn it into a DeliveryPromise rejection.
 */
export class InfrastructureError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'InfrastructureError';

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InfrastructureError);
    }
  }
}
