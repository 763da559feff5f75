import type { DeliveryResponse } from '../../../../shared/validation/schemas';

/**
 * ITransportClient Port Interface
 *
 * Defines the contract between the senders and the infrastructure layer
 * (HttpTransportAdapter) for posting serialized documents to the
 * collection endpoint.
 *
 * **Error Handling:**
 * - Transient failures (5xx, timeout, network): throw InfrastructureError
 *   after the configured retries are exhausted
 * - Rejected credentials and other 4xx: throw PermanentDeliveryError
 * - Rate limiting (429): throw RateLimitedError, and keep throwing it
 *   without a request until the advertised delay has passed
 *
 * @see HttpTransportAdapter for the concrete implementation
 */
export interface ITransportClient {
  /**
   * Posts a JSON body to the endpoint.
   *
   * @param endpoint - Absolute URL of the notices or deploys endpoint
   * @param body - Serialized JSON document
   * @returns The id (and, for notices, the URL) the endpoint assigned
   */
  deliver(endpoint: URL, body: string): Promise<DeliveryResponse>;
}
