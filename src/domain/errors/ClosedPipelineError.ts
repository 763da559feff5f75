import { DomainError } from './DomainError';

/**
 * Thrown when a notice is built after the notifier's async pipeline has been closed.
 *
 * **Usage:**
 * ```typescript
 * await notifier.close();
 * notifier.buildNotice(new Error('late')); // throws ClosedPipelineError
 * ```
 */
export class ClosedPipelineError extends DomainError {
  public constructor(subject: string) {
    super(`attempted to build ${subject} with closed notifier`);
  }
}
