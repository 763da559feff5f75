import { DomainError } from './DomainError';

/**
 * Thrown by the Notifier constructor when the supplied options fail validation.
 * Nothing is built when this is raised.
 */
export class ConfigurationError extends DomainError {
  public constructor(message: string) {
    super(message);
  }
}
