/**
 * faultline public API
 *
 * @example
 * ```typescript
 * import { Notifier, loadOptionsFromEnv } from 'faultline';
 *
 * const notifier = new Notifier({
 *   projectId: 1,
 *   projectKey: 'project-key',
 *   host: 'https://errors.example.test',
 *   ...loadOptionsFromEnv(),
 * });
 *
 * process.on('uncaughtException', (error) => {
 *   void notifier.notifySync(error).then(() => process.exit(1));
 * });
 * ```
 */

export { Notifier, type NotifierDependencies } from './modules/notifier/application/Notifier';

export { Notice, MAX_NOTICE_SIZE } from './modules/notice/domain/entities/Notice';
export type {
  NoticeError,
  NoticeParams,
  NoticePayload,
  NoticeProps,
} from './modules/notice/domain/entities/Notice';
export type {
  FramePredicate,
  StackCapture,
  StackFrame,
} from './modules/notice/domain/value-objects/Backtrace';

export type {
  INoticeFilter,
  NoticeFilter,
  NoticeFilterFunction,
} from './modules/notice/domain/services/filters/INoticeFilter';
export { FILTERED } from './modules/notice/domain/services/filters/keysFilter';
export { KeysBlacklistFilter } from './modules/notice/domain/services/filters/KeysBlacklistFilter';
export { KeysWhitelistFilter } from './modules/notice/domain/services/filters/KeysWhitelistFilter';
export { PROJECT_ROOT, RootDirectoryFilter } from './modules/notice/domain/services/filters/RootDirectoryFilter';

export {
  DeliveryPromise,
  type DeliveryOutcome,
} from './modules/delivery/domain/entities/DeliveryPromise';
export type { ITransportClient } from './modules/delivery/application/ports/ITransportClient';

export { NotifierConfig } from './shared/config/NotifierConfig';
export { loadOptionsFromEnv } from './shared/config/env-config';
export type {
  DeliveryResponse,
  DeployParams,
  KeyPattern,
  NotifierOptions,
  NotifierSettings,
} from './shared/validation/schemas';
export { logger, type NotifierLogger } from './shared/logger';

export { DomainError } from './domain/errors/DomainError';
export { ConfigurationError } from './domain/errors/ConfigurationError';
export { ClosedPipelineError } from './domain/errors/ClosedPipelineError';
export { InvalidStateTransitionError } from './domain/errors/InvalidStateTransitionError';
export { ValidationError } from './domain/errors/ValidationError';
export { InfrastructureError } from './domain/errors/InfrastructureError';
export { PermanentDeliveryError } from './domain/errors/PermanentDeliveryError';
export { RateLimitedError } from './domain/errors/RateLimitedError';
