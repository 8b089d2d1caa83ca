import type { Logger } from 'pino';
import type { DeviceClient } from '../../application/index.js';
import { DeviceClientError } from '../../domain/index.js';

/**
 * HTTP client for the EdgeX system management agent.
 *
 * POST <base>operation          start, stop or restart services
 * GET  <base>config/<services>  service configuration
 * GET  <base>metric/<services>  service metrics
 * GET  <base>ping               liveness
 *
 * Responses are returned as raw body text; the agent forwards them to the
 * control plane unchanged.
 */
export class EdgexClient implements DeviceClient {
  private readonly baseUrl: string;

  constructor(baseUrl: string, private readonly log: Logger) {
    this.baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  }

  /** `args[0]` is the action, the rest are service names. */
  pushOperation(args: readonly string[]): Promise<string> {
    const [action = '', ...services] = args;
    return this.request(`${this.baseUrl}operation`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ action, services }),
    });
  }

  fetchConfig(args: readonly string[]): Promise<string> {
    return this.request(`${this.baseUrl}config/${args.join(',')}`);
  }

  fetchMetrics(args: readonly string[]): Promise<string> {
    return this.request(`${this.baseUrl}metric/${args.join(',')}`);
  }

  ping(): Promise<string> {
    return this.request(`${this.baseUrl}ping`);
  }

  private async request(url: string, init?: RequestInit): Promise<string> {
    const response = await fetch(url, init);
    const body = await response.text();

    if (!response.ok) {
      this.log.warn({ url, status: response.status }, 'EdgeX returned non-OK status');
      throw new DeviceClientError(`EdgeX request failed with status ${response.status}`, response.status);
    }

    this.log.debug({ url, status: response.status }, 'EdgeX request completed');
    return body;
  }
}
