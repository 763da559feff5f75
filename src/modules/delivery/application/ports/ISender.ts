import type { Notice } from '../../../notice/domain/entities/Notice';
import type { DeliveryPromise } from '../../domain/entities/DeliveryPromise';

/**
 * ISender Port Interface
 *
 * Anything that takes a refined notice and eventually settles its
 * DeliveryPromise. Implemented by SyncSender (delivers before returning)
 * and AsyncSender (returns once the notice is queued).
 *
 * Implementations never throw for delivery failures; they reject the
 * promise instead.
 */
export interface ISender {
  send(notice: Notice, promise: DeliveryPromise): Promise<DeliveryPromise>;
}
