import { z } from 'zod';
import { logger as defaultLogger, type NotifierLogger } from '../logger';

const LOG_METHODS = ['debug', 'info', 'warn', 'error'] as const;

function isNotifierLogger(value: unknown): value is NotifierLogger {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return LOG_METHODS.every((method) => {
    const candidate: unknown = Reflect.get(value, method);
    return typeof candidate === 'function';
  });
}

/**
 * A key (or environment) matcher: exact string match or RegExp test.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const KeyPatternSchema = z.union([
  z.string().min(1, 'patterns cannot be empty strings'),
  z.instanceof(RegExp),
]);

export type KeyPattern = z.infer<typeof KeyPatternSchema>;

/**
 * Matches a value against a list of string/RegExp patterns
 */
export function matchesAny(value: string, patterns: readonly KeyPattern[]): boolean {
  // search() ignores lastIndex; test() on a /g or /y pattern would carry it between calls
  return patterns.some((pattern) =>
    typeof pattern === 'string' ? pattern === value : value.search(pattern) !== -1
  );
}

/**
 * Zod schema for Notifier construction options
 *
 * This schema is the single source of truth for:
 * - Option validation at Notifier construction (via NotifierConfig)
 * - Defaults for every optional setting
 * - The NotifierOptions (input) and NotifierSettings (output) types
 *
 * Validation Rules:
 * - projectId: required, positive integer
 * - projectKey: required, non-empty
 * - host: required, absolute URL of the collection endpoint
 * - workers: 0-64 async workers (0 forces sync delivery)
 * - queueSize: at least 1 queued notice
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const NotifierOptionsSchema = z.object({
  projectId: z
    .number({ required_error: 'projectId is required', invalid_type_error: 'projectId must be a number' })
    .int('projectId must be an integer')
    .positive('projectId must be a positive integer'),
  projectKey: z
    .string({ required_error: 'projectKey is required', invalid_type_error: 'projectKey must be a string' })
    .min(1, 'projectKey is required'),
  host: z
    .string({ required_error: 'host is required', invalid_type_error: 'host must be a string' })
    .url('host must be a valid URL'),
  environment: z.string().min(1, 'environment cannot be empty').optional(),
  ignoreEnvironments: z.array(KeyPatternSchema).default([]),
  blacklistKeys: z.array(KeyPatternSchema).default([]),
  whitelistKeys: z.array(KeyPatternSchema).default([]),
  rootDirectory: z.string().min(1, 'rootDirectory cannot be empty').optional(),
  appVersion: z.string().optional(),
  workers: z
    .number({ invalid_type_error: 'workers must be a number' })
    .int('workers must be an integer')
    .min(0, 'workers cannot be negative')
    .max(64, 'workers cannot exceed 64')
    .default(1),
  queueSize: z
    .number({ invalid_type_error: 'queueSize must be a number' })
    .int('queueSize must be an integer')
    .min(1, 'queueSize must be at least 1')
    .default(100),
  timeoutMs: z
    .number({ invalid_type_error: 'timeoutMs must be a number' })
    .int('timeoutMs must be an integer')
    .positive('timeoutMs must be positive')
    .default(10000),
  closeTimeoutMs: z
    .number({ invalid_type_error: 'closeTimeoutMs must be a number' })
    .int('closeTimeoutMs must be an integer')
    .positive('closeTimeoutMs must be positive')
    .default(5000),
  retries: z
    .number({ invalid_type_error: 'retries must be a number' })
    .int('retries must be an integer')
    .min(0, 'retries cannot be negative')
    .max(10, 'retries cannot exceed 10')
    .default(0),
  logger: z
    .custom<NotifierLogger>(isNotifierLogger, {
      message: 'logger must provide debug, info, warn and error methods',
    })
    .default(defaultLogger),
});

/**
 * Options accepted by `new Notifier(...)` (defaults not yet applied)
 */
export type NotifierOptions = z.input<typeof NotifierOptionsSchema>;

/**
 * Fully-defaulted, validated settings
 *
 * DO NOT manually define this type - always derive it from the schema
 */
export type NotifierSettings = z.output<typeof NotifierOptionsSchema>;

/**
 * Zod schema for a successful response from the collection endpoint
 *
 * The endpoint answers with the id it assigned (numeric or string) and,
 * for notices, a URL where the grouped error can be viewed.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const DeliveryResponseSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform((id) => String(id)),
  url: z.string().optional(),
});

export type DeliveryResponse = z.output<typeof DeliveryResponseSchema>;

/**
 * Zod schema for error bodies returned with 4xx/5xx statuses
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const ErrorResponseSchema = z.object({
  message: z.string(),
});

/**
 * Zod schema for deploy notifications
 *
 * Validation Rules:
 * - environment: optional, defaults to the notifier's configured environment
 * - username / repository / revision / version: optional free-form strings
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const DeployParamsSchema = z.object({
  environment: z.string().min(1, 'environment cannot be empty').optional(),
  username: z.string().optional(),
  repository: z.string().optional(),
  revision: z.string().optional(),
  version: z.string().optional(),
});

export type DeployParams = z.infer<typeof DeployParamsSchema>;
