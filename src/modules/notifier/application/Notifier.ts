import { NotifierConfig } from '../../../shared/config/NotifierConfig';
import {
  DeployParamsSchema,
  type DeployParams,
  type NotifierOptions,
  type NotifierSettings,
} from '../../../shared/validation/schemas';
import type { NotifierLogger } from '../../../shared/logger';
import { ConfigurationError } from '../../../domain/errors/ConfigurationError';
import { ClosedPipelineError } from '../../../domain/errors/ClosedPipelineError';
import { ValidationError } from '../../../domain/errors/ValidationError';
import type { Notice, NoticeParams } from '../../notice/domain/entities/Notice';
import type { FramePredicate, StackCapture } from '../../notice/domain/value-objects/Backtrace';
import {
  NoticeBuilder,
  buildNoticeContext,
  classifyInput,
  describeSource,
} from '../../notice/domain/services/NoticeBuilder';
import { FilterChain } from '../../notice/domain/services/filters/FilterChain';
import type { NoticeFilter } from '../../notice/domain/services/filters/INoticeFilter';
import { KeysBlacklistFilter } from '../../notice/domain/services/filters/KeysBlacklistFilter';
import { KeysWhitelistFilter } from '../../notice/domain/services/filters/KeysWhitelistFilter';
import { RootDirectoryFilter } from '../../notice/domain/services/filters/RootDirectoryFilter';
import { DeliveryPromise, type DeliveryOutcome } from '../../delivery/domain/entities/DeliveryPromise';
import type { ISender } from '../../delivery/application/ports/ISender';
import type { ITransportClient } from '../../delivery/application/ports/ITransportClient';
import { SyncSender } from '../../delivery/application/services/SyncSender';
import { AsyncSender } from '../../delivery/application/services/AsyncSender';
import { HttpTransportAdapter } from '../../../adapters/secondary/transport/HttpTransportAdapter';

/**
 * Collaborators that can be swapped out, mostly for tests
 */
export interface NotifierDependencies {
  transport?: ITransportClient;
  captureStack?: StackCapture;
  isInternalFrame?: FramePredicate;
}

/**
 * Notifier
 *
 * Public entry point. Turns errors into notices, runs them through the
 * filter chain and hands them to a sender.
 *
 * **Pipeline** (`notify` / `notifySync`):
 * 1. Ignored environment: reject, nothing is built
 * 2. Build the notice
 * 3. Refine it with every filter stage
 * 4. Ignored notice: reject
 * 5. Send: `notify` queues on the async sender (or delivers directly when no
 *    worker is running), `notifySync` always delivers directly
 *
 * Delivery failures never throw; they come back as a rejected DeliveryPromise.
 *
 * @example
 * ```typescript
 * const notifier = new Notifier({
 *   projectId: 1,
 *   projectKey: process.env.FAULTLINE_PROJECT_KEY ?? '',
 *   host: 'https://errors.example.test',
 *   environment: 'production',
 *   blacklistKeys: ['password'],
 * });
 *
 * const promise = await notifier.notify(new Error('boom'), { userId: 7 });
 * promise.onRejected((reason) => logger.warn({ msg: 'Report failed', reason }));
 *
 * await notifier.close();
 * ```
 */
export class Notifier {
  private readonly config: NotifierConfig;
  private readonly settings: NotifierSettings;
  private readonly logger: NotifierLogger;
  private readonly filterChain = new FilterChain();
  private readonly builder: NoticeBuilder;
  private readonly syncSender: SyncSender;
  private readonly asyncSender: AsyncSender;

  /**
   * @throws ConfigurationError if the options are invalid
   */
  public constructor(options: NotifierOptions, dependencies: NotifierDependencies = {}) {
    this.config = new NotifierConfig(options);
    if (!this.config.isValid()) {
      throw new ConfigurationError(this.config.validationErrorMessage ?? 'invalid configuration');
    }
    this.settings = this.config.settings;
    this.logger = this.settings.logger;

    this.addFiltersForConfig();

    this.builder = new NoticeBuilder({
      context: buildNoticeContext(this.settings),
      captureStack: dependencies.captureStack,
      isInternalFrame: dependencies.isInternalFrame,
    });

    const transport =
      dependencies.transport ??
      new HttpTransportAdapter({
        projectKey: this.settings.projectKey,
        timeoutMs: this.settings.timeoutMs,
        retries: this.settings.retries,
        logger: this.logger,
      });

    this.syncSender = new SyncSender(transport, this.config.noticesEndpoint, this.logger);
    this.asyncSender = new AsyncSender(this.settings, this.syncSender, this.logger);
    this.asyncSender.start();
  }

  /**
   * Reports an error in the background.
   *
   * Resolves once the notice is handed over: queued for a worker, or
   * delivered when falling back to sync delivery. Waits while the queue is
   * full. The returned DeliveryPromise settles with the delivery outcome.
   */
  public async notify(error: unknown, params: NoticeParams = {}): Promise<DeliveryPromise> {
    return this.sendNotice(error, params, () => this.defaultSender());
  }

  /**
   * Reports an error and waits for the delivery outcome
   */
  public async notifySync(error: unknown, params: NoticeParams = {}): Promise<DeliveryOutcome> {
    const promise = await this.sendNotice(error, params, () => this.syncSender);
    return promise.wait();
  }

  public addFilter(filter: NoticeFilter): void {
    this.filterChain.addFilter(filter);
  }

  /**
   * Builds a notice without filtering or sending it
   *
   * @throws ClosedPipelineError once the notifier is closed
   */
  public buildNotice(error: unknown, params: NoticeParams = {}): Notice {
    const source = classifyInput(error);
    if (this.asyncSender.isClosed()) {
      throw new ClosedPipelineError(describeSource(source));
    }
    return this.builder.build(source, params);
  }

  /**
   * Stops accepting notices and waits for queued ones to be delivered
   * (bounded by `closeTimeoutMs`). Safe to call more than once.
   */
  public close(): Promise<void> {
    return this.asyncSender.close();
  }

  public isClosed(): boolean {
    return this.asyncSender.isClosed();
  }

  /**
   * Records a deploy. Always delivered synchronously.
   *
   * @returns The settled DeliveryPromise
   * @throws ValidationError if the deploy params are malformed
   */
  public async createDeploy(params: DeployParams = {}): Promise<DeliveryPromise> {
    const result = DeployParamsSchema.safeParse(params);
    if (!result.success) {
      throw new ValidationError('Invalid deploy params', result.error.issues);
    }

    const deploy: DeployParams = {
      ...result.data,
      environment: result.data.environment ?? this.settings.environment,
    };

    return this.syncSender.sendDeploy(deploy, new DeliveryPromise(), this.config.deploysEndpoint);
  }

  private async sendNotice(
    error: unknown,
    params: NoticeParams,
    selectSender: () => ISender
  ): Promise<DeliveryPromise> {
    const promise = new DeliveryPromise();

    if (this.config.isIgnoredEnvironment()) {
      return promise.reject(`The '${this.settings.environment ?? ''}' environment is ignored`);
    }

    let notice: Notice;
    try {
      notice = this.buildNotice(error, params);
    } catch (buildError) {
      if (buildError instanceof ClosedPipelineError) {
        return promise.reject(buildError.message);
      }
      throw buildError;
    }

    try {
      this.filterChain.refine(notice);
    } catch (filterError) {
      const message = filterError instanceof Error ? filterError.message : String(filterError);
      this.logger.error({
        msg: 'Filter chain failed',
        notice: notice.toString(),
        error: message,
      });
      return promise.reject(`filter chain failed: ${message}`);
    }

    if (notice.ignored) {
      return promise.reject(`${notice.toString()} was marked as ignored`);
    }

    return selectSender().send(notice, promise);
  }

  private defaultSender(): ISender {
    if (this.asyncSender.hasWorkers()) {
      return this.asyncSender;
    }

    this.logger.warn({
      msg: 'Falling back to sync delivery because there are no running async workers',
    });
    return this.syncSender;
  }

  private addFiltersForConfig(): void {
    const { blacklistKeys, whitelistKeys, rootDirectory } = this.settings;

    if (blacklistKeys.length > 0) {
      this.addFilter(new KeysBlacklistFilter(blacklistKeys));
    }
    if (whitelistKeys.length > 0) {
      this.addFilter(new KeysWhitelistFilter(whitelistKeys));
    }
    if (rootDirectory !== undefined) {
      this.addFilter(new RootDirectoryFilter(rootDirectory));
    }
  }
}
