import type { ITransportClient } from '../../modules/delivery/application/ports/ITransportClient';
import type { DeliveryResponse } from '../../shared/validation/schemas';

/**
 * Shared test doubles
 *
 * **Usage:**
 * ```typescript
 * const logger = createMockLogger();
 * const transport = new FakeTransport();
 * transport.respondWith({ id: '42' });
 * ```
 */

export interface MockLogger {
  debug: jest.Mock;
  info: jest.Mock;
  warn: jest.Mock;
  error: jest.Mock;
}

export function createMockLogger(): MockLogger {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

export interface DeliveredRequest {
  endpoint: string;
  body: unknown;
}

/**
 * In-process stand-in for the HTTP transport. Records every request and
 * answers with a fixed response or error. `hold()` parks deliveries until
 * `release()` so tests can observe queued and in-flight notices.
 */
export class FakeTransport implements ITransportClient {
  public readonly requests: DeliveredRequest[] = [];
  private response: DeliveryResponse = { id: '1' };
  private failure: Error | null = null;
  private gate: Promise<void> | null = null;
  private openGate: () => void = () => undefined;

  public respondWith(response: DeliveryResponse): this {
    this.response = response;
    this.failure = null;
    return this;
  }

  public failWith(error: Error): this {
    this.failure = error;
    return this;
  }

  public hold(): this {
    this.gate = new Promise((resolve) => {
      this.openGate = resolve;
    });
    return this;
  }

  public release(): void {
    this.gate = null;
    this.openGate();
  }

  public async deliver(endpoint: URL, body: string): Promise<DeliveryResponse> {
    this.requests.push({ endpoint: endpoint.toString(), body: JSON.parse(body) });
    if (this.gate) {
      await this.gate;
    }
    if (this.failure) {
      throw this.failure;
    }
    return this.response;
  }
}

/**
 * Lets pending promise callbacks and timers queued with delay 0 run
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
