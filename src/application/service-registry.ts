import type { Logger } from 'pino';
import type { Service } from '../domain/index.js';

/**
 * Name → Service map fed by heartbeats.
 *
 * The heartbeat subscriber is the only writer; the dispatcher reads it for
 * `view` and the HTTP API for `/services`. Both operations are synchronous
 * and contain no await, so on the single event loop a registration can
 * never interleave with a snapshot read.
 */
export class ServiceRegistry {
  private readonly services = new Map<string, Service>();

  constructor(
    private readonly log: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Records a liveness signal for `name`, creating the entry on first sight.
   */
  registerOrTouch(name: string): Readonly<Service> {
    const seenAt = this.now().toISOString();
    const existing = this.services.get(name);
    if (existing) {
      existing.status = 'online';
      existing.last_seen = seenAt;
      return existing;
    }

    const service: Service = { name, status: 'online', last_seen: seenAt };
    this.services.set(name, service);
    this.log.info({ service: name }, 'Service registered');
    return service;
  }

  /** Live view of the registry. O(1), no copy; callers must not mutate it. */
  snapshot(): ReadonlyMap<string, Readonly<Service>> {
    return this.services;
  }

  /** Plain-object form used when the registry is serialized. */
  toJSON(): Record<string, Service> {
    return Object.fromEntries(this.services);
  }
}
