/**
 * Base class for errors raised by the notifier itself (as opposed to
 * transport failures, which only ever surface through a DeliveryPromise).
 */
export class DomainError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}
