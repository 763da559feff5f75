import type { ISender } from '../ports/ISender';
import type { ITransportClient } from '../ports/ITransportClient';
import type { DeliveryPromise } from '../../domain/entities/DeliveryPromise';
import { MAX_NOTICE_SIZE, type Notice } from '../../../notice/domain/entities/Notice';
import type { DeliveryResponse, DeployParams } from '../../../../shared/validation/schemas';
import type { NotifierLogger } from '../../../../shared/logger';

/**
 * SyncSender
 *
 * Delivers a notice on the caller's own async task: serialize, post, then
 * settle the promise with the endpoint's answer. There is no retry at this
 * layer; the transport owns retry policy.
 */
export class SyncSender implements ISender {
  public constructor(
    private readonly transport: ITransportClient,
    private readonly noticesEndpoint: URL,
    private readonly logger: NotifierLogger,
    private readonly maxNoticeSize: number = MAX_NOTICE_SIZE
  ) {}

  public async send(notice: Notice, promise: DeliveryPromise): Promise<DeliveryPromise> {
    const body = notice.serialize(this.maxNoticeSize);
    if (body === null) {
      this.logger.warn({
        msg: 'Notice is too large to deliver',
        notice: notice.toString(),
        maxNoticeSize: this.maxNoticeSize,
      });
      return promise.reject(`notice exceeds the maximum size of ${this.maxNoticeSize} bytes`);
    }

    return this.deliver(this.noticesEndpoint, body, promise);
  }

  public async sendDeploy(
    deploy: DeployParams,
    promise: DeliveryPromise,
    endpoint: URL
  ): Promise<DeliveryPromise> {
    return this.deliver(endpoint, JSON.stringify(deploy), promise);
  }

  private async deliver(endpoint: URL, body: string, promise: DeliveryPromise): Promise<DeliveryPromise> {
    let response: DeliveryResponse;
    try {
      response = await this.transport.deliver(endpoint, body);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.debug({
        msg: 'Delivery failed',
        endpoint: endpoint.pathname,
        error: reason,
      });
      return promise.reject(reason);
    }
    return promise.resolve(response);
  }
}
