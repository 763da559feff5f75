import axios, { type AxiosError, type AxiosInstance, isAxiosError } from 'axios';
import axiosRetry, { exponentialDelay, isNetworkOrIdempotentRequestError } from 'axios-retry';
import type { ITransportClient } from '../../../modules/delivery/application/ports/ITransportClient';
import {
  DeliveryResponseSchema,
  ErrorResponseSchema,
  type DeliveryResponse,
  type NotifierSettings,
} from '../../../shared/validation/schemas';
import { InfrastructureError } from '../../../domain/errors/InfrastructureError';
import { PermanentDeliveryError } from '../../../domain/errors/PermanentDeliveryError';
import { RateLimitedError } from '../../../domain/errors/RateLimitedError';
import { logger as defaultLogger, type NotifierLogger } from '../../../shared/logger';

const DEFAULT_RATE_LIMIT_DELAY_SECONDS = 60;
const UNAUTHORIZED_MESSAGE = 'unauthorized: project id or key are wrong';

export type HttpTransportSettings = Pick<NotifierSettings, 'projectKey' | 'timeoutMs' | 'retries'> & {
  logger?: NotifierLogger;
  now?: () => number;
};

/**
 * HttpTransportAdapter
 *
 * Concrete implementation of ITransportClient that posts notices and deploys
 * to the collection endpoint using Axios.
 *
 * **Features:**
 * - Bearer authentication with the project key
 * - Optional retry with exponential backoff on network errors and 5xx
 * - Response validation using Zod schemas
 * - Error classification (transient, permanent, rate limited)
 * - Local back-off after a 429: requests are refused without touching the
 *   network until the `X-RateLimit-Delay` window has passed
 *
 * @see ITransportClient for interface contract
 */
export class HttpTransportAdapter implements ITransportClient {
  private readonly axiosInstance: AxiosInstance;
  private readonly logger: NotifierLogger;
  private readonly now: () => number;
  private rateLimitedUntil = 0;

  public constructor(private readonly settings: HttpTransportSettings) {
    this.logger = settings.logger ?? defaultLogger;
    this.now = settings.now ?? Date.now;

    this.axiosInstance = axios.create({
      timeout: settings.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
      },
    });

    axiosRetry(this.axiosInstance, {
      retries: settings.retries,
      retryDelay: exponentialDelay,
      retryCondition: (error: AxiosError): boolean => {
        if (isNetworkOrIdempotentRequestError(error)) {
          return true;
        }

        const status = error.response?.status;
        return status !== undefined && status >= 500 && status < 600;
      },
      onRetry: (retryCount: number, error: AxiosError, config): void => {
        this.logger.warn({
          msg: 'Delivery retry attempt',
          retryCount,
          url: config.url,
          statusCode: error.response?.status,
          error: error.message,
        });
      },
    });
  }

  /**
   * @throws RateLimitedError - 429, or still inside a rate-limit window
   * @throws PermanentDeliveryError - 4xx, including rejected credentials
   * @throws InfrastructureError - 5xx, timeouts and network failures after retries
   */
  public async deliver(endpoint: URL, body: string): Promise<DeliveryResponse> {
    const url = endpoint.toString();
    const startTime = this.now();

    if (startTime < this.rateLimitedUntil) {
      throw new RateLimitedError(this.rateLimitedUntil - startTime);
    }

    this.logger.debug({
      msg: 'Delivery started',
      url,
      payloadSize: body.length,
    });

    try {
      const response = await this.axiosInstance.post<unknown>(url, body, {
        headers: {
          Authorization: `Bearer ${this.settings.projectKey}`,
        },
      });

      const validatedResponse = DeliveryResponseSchema.parse(response.data);

      this.logger.debug({
        msg: 'Delivery succeeded',
        url,
        statusCode: response.status,
        id: validatedResponse.id,
        durationMs: this.now() - startTime,
      });

      return validatedResponse;
    } catch (error) {
      throw this.classify(error, url, startTime);
    }
  }

  private classify(error: unknown, url: string, startTime: number): Error {
    const durationMs = this.now() - startTime;

    if (!isAxiosError(error)) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({
        msg: 'Delivery failed with unexpected error',
        url,
        error: message,
        durationMs,
      });
      return new InfrastructureError(`Unexpected error during delivery: ${message}`);
    }

    const status = error.response?.status;
    this.logger.error({
      msg: 'Delivery failed',
      url,
      error: error.message,
      statusCode: status,
      durationMs,
    });

    if (status === 401 || status === 403) {
      return new PermanentDeliveryError(UNAUTHORIZED_MESSAGE, status);
    }

    if (status === 429) {
      const headers: Record<string, unknown> = { ...error.response?.headers };
      const retryAfterMs = parseRateLimitDelay(headers['x-ratelimit-delay']) * 1000;
      this.rateLimitedUntil = this.now() + retryAfterMs;
      return new RateLimitedError(retryAfterMs);
    }

    if (status !== undefined && status >= 400 && status < 500) {
      const parsed = ErrorResponseSchema.safeParse(error.response?.data);
      const reason = parsed.success ? parsed.data.message : error.message;
      return new PermanentDeliveryError(`delivery failed with HTTP ${status}: ${reason}`, status);
    }

    return new InfrastructureError(`delivery failed: ${error.message}`);
  }
}

function parseRateLimitDelay(value: unknown): number {
  const seconds = typeof value === 'number' ? value : typeof value === 'string' ? parseInt(value, 10) : NaN;
  return Number.isFinite(seconds) && seconds > 0 ? seconds : DEFAULT_RATE_LIMIT_DELAY_SECONDS;
}
