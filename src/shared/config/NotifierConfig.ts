import type { SafeParseReturnType } from 'zod';
import {
  NotifierOptionsSchema,
  matchesAny,
  type NotifierOptions,
  type NotifierSettings,
} from '../validation/schemas';
import { ConfigurationError } from '../../domain/errors/ConfigurationError';

const NOTICES_PATH = (projectId: number): string => `/api/v3/projects/${projectId}/notices`;
const DEPLOYS_PATH = (projectId: number): string => `/api/v4/projects/${projectId}/deploys`;

/**
 * NotifierConfig
 *
 * Validates raw NotifierOptions once and exposes the derived settings the
 * pipeline needs. Construction never throws; callers check `isValid()` and
 * report `validationErrorMessage` themselves (the Notifier raises a
 * ConfigurationError).
 *
 * @example
 * ```typescript
 * const config = new NotifierConfig({ projectId: 1, projectKey: 'key', host: 'https://errors.example.test' });
 * if (!config.isValid()) {
 *   throw new ConfigurationError(config.validationErrorMessage ?? 'invalid configuration');
 * }
 * config.noticesEndpoint.toString(); // https://errors.example.test/api/v3/projects/1/notices
 * ```
 */
export class NotifierConfig {
  private readonly result: SafeParseReturnType<NotifierOptions, NotifierSettings>;

  public constructor(options: NotifierOptions) {
    this.result = NotifierOptionsSchema.safeParse(options);
  }

  public isValid(): boolean {
    return this.result.success;
  }

  /**
   * Every validation issue, joined by "; ", or null when the options are valid
   */
  public get validationErrorMessage(): string | null {
    if (this.result.success) {
      return null;
    }
    return this.result.error.issues.map((issue) => issue.message).join('; ');
  }

  /**
   * @throws ConfigurationError if the options did not validate
   */
  public get settings(): NotifierSettings {
    if (!this.result.success) {
      throw new ConfigurationError(this.validationErrorMessage ?? 'invalid configuration');
    }
    return this.result.data;
  }

  public get noticesEndpoint(): URL {
    return new URL(NOTICES_PATH(this.settings.projectId), this.settings.host);
  }

  public get deploysEndpoint(): URL {
    return new URL(DEPLOYS_PATH(this.settings.projectId), this.settings.host);
  }

  /**
   * True when the configured environment matches `ignoreEnvironments`.
   * Without an environment name nothing is ignored.
   */
  public isIgnoredEnvironment(): boolean {
    const { environment, ignoreEnvironments } = this.settings;
    if (environment === undefined) {
      return false;
    }
    return matchesAny(environment, ignoreEnvironments);
  }
}
