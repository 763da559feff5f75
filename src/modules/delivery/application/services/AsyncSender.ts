import type { ISender } from '../ports/ISender';
import type { DeliveryPromise } from '../../domain/entities/DeliveryPromise';
import type { Notice } from '../../../notice/domain/entities/Notice';
import { SenderState, validateTransition } from '../../domain/value-objects/SenderState';
import { BoundedQueue } from './BoundedQueue';
import type { NotifierSettings } from '../../../../shared/validation/schemas';
import type { NotifierLogger } from '../../../../shared/logger';

export const CLOSED_REASON = 'the async sender is closed';
export const NOT_STARTED_REASON = 'the async sender has not been started';
export const ABANDONED_REASON = 'the async sender was closed before the notice was delivered';

interface QueuedNotice {
  notice: Notice;
  promise: DeliveryPromise;
}

export type AsyncSenderSettings = Pick<NotifierSettings, 'workers' | 'queueSize' | 'closeTimeoutMs'>;

/**
 * AsyncSender
 *
 * Hands notices to a pool of async workers through a BoundedQueue. `send`
 * returns as soon as the notice is queued; when the queue is full it waits
 * for space instead of dropping the notice.
 *
 * **Lifecycle:** IDLE → OPEN (start) → CLOSING (close) → CLOSED
 *
 * `close()` stops accepting notices and lets the workers drain the queue.
 * If draining takes longer than `closeTimeoutMs`, whatever is still queued is
 * rejected; deliveries already in flight still settle.
 */
export class AsyncSender implements ISender {
  private state = SenderState.IDLE;
  private readonly queue: BoundedQueue<QueuedNotice>;
  private readonly workerLoops: Array<Promise<void>> = [];
  private liveWorkers = 0;
  private closing: Promise<void> | null = null;

  public constructor(
    private readonly settings: AsyncSenderSettings,
    private readonly syncSender: ISender,
    private readonly logger: NotifierLogger
  ) {
    this.queue = new BoundedQueue(settings.queueSize);
  }

  /**
   * Spawns the configured number of workers
   *
   * @throws InvalidStateTransitionError if already started or closed
   */
  public start(): void {
    validateTransition(this.state, SenderState.OPEN);
    this.state = SenderState.OPEN;

    for (let id = 0; id < this.settings.workers; id++) {
      this.workerLoops.push(this.runWorker(id));
    }

    this.logger.debug({ msg: 'Async sender started', workers: this.settings.workers });
  }

  public async send(notice: Notice, promise: DeliveryPromise): Promise<DeliveryPromise> {
    if (this.state !== SenderState.OPEN) {
      return promise.reject(this.isClosed() ? CLOSED_REASON : NOT_STARTED_REASON);
    }

    const accepted = await this.queue.put({ notice, promise });
    if (!accepted) {
      return promise.reject(CLOSED_REASON);
    }
    return promise;
  }

  public hasWorkers(): boolean {
    return this.liveWorkers > 0;
  }

  public isClosed(): boolean {
    return this.state === SenderState.CLOSING || this.state === SenderState.CLOSED;
  }

  public get pending(): number {
    return this.queue.size;
  }

  /**
   * Idempotent; every call returns the same promise
   */
  public close(): Promise<void> {
    if (this.closing) {
      return this.closing;
    }

    if (this.state === SenderState.IDLE) {
      validateTransition(this.state, SenderState.CLOSED);
      this.state = SenderState.CLOSED;
      this.queue.close();
      this.closing = Promise.resolve();
      return this.closing;
    }

    validateTransition(this.state, SenderState.CLOSING);
    this.state = SenderState.CLOSING;
    this.queue.close();
    this.closing = this.drain();
    return this.closing;
  }

  private async drain(): Promise<void> {
    this.logger.debug({ msg: 'Draining async sender', pending: this.queue.size });

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), this.settings.closeTimeoutMs);
    });
    const drained = Promise.all(this.workerLoops).then(() => true as const);

    const finished = await Promise.race([drained, timedOut]);
    clearTimeout(timer);

    if (!finished) {
      const abandoned = this.queue.drain();
      for (const { promise } of abandoned) {
        promise.reject(ABANDONED_REASON);
      }
      this.logger.warn({
        msg: 'Async sender closed before the queue was drained',
        abandoned: abandoned.length,
        closeTimeoutMs: this.settings.closeTimeoutMs,
      });
    }

    validateTransition(this.state, SenderState.CLOSED);
    this.state = SenderState.CLOSED;
    this.logger.debug({ msg: 'Async sender closed' });
  }

  private async runWorker(id: number): Promise<void> {
    this.liveWorkers++;
    try {
      for (;;) {
        const job = await this.queue.take();
        if (job === undefined) {
          return;
        }
        await this.deliver(id, job);
      }
    } finally {
      this.liveWorkers--;
    }
  }

  private async deliver(worker: number, { notice, promise }: QueuedNotice): Promise<void> {
    try {
      await this.syncSender.send(notice, promise);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      promise.reject(reason);
      this.logger.error({
        msg: 'Async worker failed to deliver notice',
        worker,
        notice: notice.toString(),
        error: reason,
      });
    }
  }
}
