import type { NotifierOptions } from '../validation/schemas';

/**
 * Environment-variable Configuration
 *
 * Maps FAULTLINE_* variables onto NotifierOptions. Values are not validated
 * here: malformed numbers come through as NaN so that NotifierConfig reports
 * them with its usual messages.
 *
 * | Variable | Option |
 * |----------|--------|
 * | FAULTLINE_PROJECT_ID | projectId |
 * | FAULTLINE_PROJECT_KEY | projectKey |
 * | FAULTLINE_HOST | host |
 * | FAULTLINE_ENVIRONMENT (falls back to NODE_ENV) | environment |
 * | FAULTLINE_IGNORE_ENVIRONMENTS (comma separated) | ignoreEnvironments |
 * | FAULTLINE_WORKERS | workers |
 * | FAULTLINE_QUEUE_SIZE | queueSize |
 * | FAULTLINE_TIMEOUT_MS | timeoutMs |
 *
 * @example
 * ```typescript
 * const notifier = new Notifier({ ...loadOptionsFromEnv(), blacklistKeys: ['password'] });
 * ```
 */
export function loadOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<NotifierOptions> {
  const options: Partial<NotifierOptions> = {};

  const projectId = parseInteger(env.FAULTLINE_PROJECT_ID);
  if (projectId !== undefined) options.projectId = projectId;

  if (env.FAULTLINE_PROJECT_KEY) options.projectKey = env.FAULTLINE_PROJECT_KEY;
  if (env.FAULTLINE_HOST) options.host = env.FAULTLINE_HOST;

  const environment = env.FAULTLINE_ENVIRONMENT || env.NODE_ENV;
  if (environment) options.environment = environment;

  const ignored = parseList(env.FAULTLINE_IGNORE_ENVIRONMENTS);
  if (ignored.length > 0) options.ignoreEnvironments = ignored;

  const workers = parseInteger(env.FAULTLINE_WORKERS);
  if (workers !== undefined) options.workers = workers;

  const queueSize = parseInteger(env.FAULTLINE_QUEUE_SIZE);
  if (queueSize !== undefined) options.queueSize = queueSize;

  const timeoutMs = parseInteger(env.FAULTLINE_TIMEOUT_MS);
  if (timeoutMs !== undefined) options.timeoutMs = timeoutMs;

  return options;
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const trimmed = value.trim();
  return /^-?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : Number.NaN;
}

function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
