import type { Logger } from 'pino';
import type { MessageBus, ServiceRegistry } from '../../application/index.js';
import { HEARTBEAT_SUBJECT, SubscriptionError } from '../../domain/index.js';

/**
 * Subscribes to `heartbeat.*` and feeds the service registry.
 *
 * A subscription that cannot be set up is fatal to startup and surfaces
 * as `SubscriptionError`. A heartbeat on a malformed subject is logged and
 * dropped.
 *
 * Returns a cleanup function that unsubscribes.
 */
export function startHeartbeatSubscriber(
  bus: MessageBus,
  registry: ServiceRegistry,
  log: Logger,
): () => void {
  let unsubscribe: () => void;
  try {
    unsubscribe = bus.subscribe(
      HEARTBEAT_SUBJECT,
      (msg) => handleHeartbeat(registry, log, msg.subject),
      (err) => log.error({ err, subject: HEARTBEAT_SUBJECT }, 'Heartbeat subscription error'),
    );
  } catch (err: unknown) {
    throw new SubscriptionError('failed to subscribe to heartbeat topic', { cause: err });
  }
  log.info({ subject: HEARTBEAT_SUBJECT }, 'Subscribed to service heartbeats');

  return () => {
    unsubscribe();
    log.info('Heartbeat subscriber stopped');
  };
}

/**
 * Extracts the service name (second subject token) and records the heartbeat.
 */
export function handleHeartbeat(registry: ServiceRegistry, log: Logger, subject: string): void {
  const name = subject.split('.')[1];
  if (!name) {
    log.error({ subject }, 'Heartbeat subject has incorrect length, dropping');
    return;
  }

  registry.registerOrTouch(name);
}
