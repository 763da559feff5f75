import type { DeliveryResponse } from '../../../../shared/validation/schemas';
import { PromiseState, isValidTransition } from '../value-objects/PromiseState';

/**
 * Terminal result of a delivery attempt
 */
export type DeliveryOutcome =
  | { state: 'resolved'; value: DeliveryResponse }
  | { state: 'rejected'; reason: string };

type ResolvedCallback = (value: DeliveryResponse) => void;
type RejectedCallback = (reason: string) => void;

/**
 * Runs every callback even when one throws, then rethrows the first error
 */
function runAll<T>(callbacks: Array<(arg: T) => void>, arg: T): void {
  const errors: unknown[] = [];
  for (const callback of callbacks) {
    try {
      callback(arg);
    } catch (error) {
      errors.push(error);
    }
  }
  if (errors.length > 0) {
    throw errors[0];
  }
}

/**
 * DeliveryPromise entity
 *
 * Single-resolution handle for the outcome of one delivery. The pipeline
 * settles it exactly once: the first `resolve` or `reject` wins and later
 * calls are ignored.
 *
 * Callers either register callbacks or await `wait()`, which never rejects;
 * a failed delivery is a `rejected` outcome, not an exception. A callback
 * that throws does not stop the others; `resolve`/`reject` rethrow its error
 * once the promise is settled and every callback has run.
 *
 * @example
 * ```typescript
 * const promise = await notifier.notify(new Error('boom'));
 * const outcome = await promise.wait();
 * if (outcome.state === 'resolved') {
 *   logger.info({ msg: 'Reported', id: outcome.value.id });
 * }
 * ```
 */
export class DeliveryPromise {
  private state = PromiseState.PENDING;
  private outcome: DeliveryOutcome | null = null;
  private readonly resolvedCallbacks: ResolvedCallback[] = [];
  private readonly rejectedCallbacks: RejectedCallback[] = [];
  private readonly settled: Promise<DeliveryOutcome>;
  private settle: (outcome: DeliveryOutcome) => void = () => undefined;

  public constructor() {
    this.settled = new Promise((resolve) => {
      this.settle = resolve;
    });
  }

  public resolve(value: DeliveryResponse): this {
    if (!isValidTransition(this.state, PromiseState.RESOLVED)) {
      return this;
    }
    this.state = PromiseState.RESOLVED;
    this.complete({ state: 'resolved', value });
    this.rejectedCallbacks.length = 0;
    runAll(this.resolvedCallbacks.splice(0), value);
    return this;
  }

  public reject(reason: string): this {
    if (!isValidTransition(this.state, PromiseState.REJECTED)) {
      return this;
    }
    this.state = PromiseState.REJECTED;
    this.complete({ state: 'rejected', reason });
    this.resolvedCallbacks.length = 0;
    runAll(this.rejectedCallbacks.splice(0), reason);
    return this;
  }

  /**
   * Runs `callback` once resolved; immediately if already resolved
   */
  public onResolved(callback: ResolvedCallback): this {
    if (this.outcome?.state === 'resolved') {
      callback(this.outcome.value);
    } else if (this.state === PromiseState.PENDING) {
      this.resolvedCallbacks.push(callback);
    }
    return this;
  }

  /**
   * Runs `callback` once rejected; immediately if already rejected
   */
  public onRejected(callback: RejectedCallback): this {
    if (this.outcome?.state === 'rejected') {
      callback(this.outcome.reason);
    } else if (this.state === PromiseState.PENDING) {
      this.rejectedCallbacks.push(callback);
    }
    return this;
  }

  public wait(): Promise<DeliveryOutcome> {
    return this.settled;
  }

  public value(): Promise<DeliveryOutcome> {
    return this.wait();
  }

  public isPending(): boolean {
    return this.state === PromiseState.PENDING;
  }

  public isResolved(): boolean {
    return this.state === PromiseState.RESOLVED;
  }

  public isRejected(): boolean {
    return this.state === PromiseState.REJECTED;
  }

  private complete(outcome: DeliveryOutcome): void {
    this.outcome = outcome;
    this.settle(outcome);
  }
}
