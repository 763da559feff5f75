import { DomainError } from './DomainError';

/**
 * Thrown when caller-supplied input fails schema validation
 */
export class ValidationError extends DomainError {
  public readonly details?: unknown;

  public constructor(message: string, details?: unknown) {
    super(message);
    this.details = details;
  }
}
