import { connect } from 'nats';
import type { NatsConnection } from 'nats';
import type { Logger } from 'pino';
import type { MessageBus } from '../../application/index.js';

/**
 * Connects to the internal bus and logs connection status changes.
 */
export async function connectNats(url: string, log: Logger): Promise<NatsConnection> {
  const nc = await connect({ servers: url, name: 'agent' });
  log.info({ server: nc.getServer() }, 'NATS connected');

  void watchStatus(nc, log);
  nc.closed()
    .then((err) => {
      if (err) log.error({ err }, 'NATS connection closed with error');
      else log.info('NATS connection closed');
    })
    .catch((err: unknown) => log.error({ err }, 'NATS close watcher failed'));

  return nc;
}

async function watchStatus(nc: NatsConnection, log: Logger): Promise<void> {
  try {
    for await (const status of nc.status()) {
      log.debug({ type: status.type, data: status.data }, 'NATS status');
    }
  } catch (err: unknown) {
    log.warn({ err }, 'NATS status stream ended');
  }
}

/** Adapts a NATS connection to the `MessageBus` port. */
export function createNatsBus(nc: NatsConnection): MessageBus {
  return {
    publish(subject, data) {
      nc.publish(subject, data);
    },

    subscribe(subject, handler, onError) {
      const sub = nc.subscribe(subject, {
        callback: (err, msg) => {
          if (err) {
            onError?.(err);
            return;
          }
          handler({ subject: msg.subject, data: msg.data });
        },
      });
      return () => sub.unsubscribe();
    },
  };
}
