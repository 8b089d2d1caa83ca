import type { Logger } from 'pino';
import { decodeSenML } from '../../application/index.js';
import type { Agent, ControlPlane, SenMLRecord } from '../../application/index.js';
import { requestTopic } from '../../domain/index.js';

/** The dispatcher entry points a control-plane request can reach. */
export type CommandHandler = Pick<Agent, 'execute' | 'control' | 'serviceConfig'>;

/**
 * Subscribes to `channels/<control>/messages/req` and routes each SenML
 * request to the dispatcher.
 *
 * There is no caller to return errors to, so malformed requests and failed
 * dispatches are logged and dropped. The control plane sees no response.
 *
 * Returns a cleanup function for graceful shutdown.
 */
export async function startCommandSubscriber(
  controlPlane: ControlPlane,
  handler: CommandHandler,
  channel: string,
  log: Logger,
): Promise<() => Promise<void>> {
  const topic = requestTopic(channel);

  const unsubscribe = await controlPlane.subscribe(topic, (_topic, payload) => {
    void handleCommandMessage(handler, log, Buffer.from(payload).toString('utf8'));
  });
  log.info({ topic }, 'Subscribed to control-plane commands');

  return async () => {
    await unsubscribe();
    log.info({ topic }, 'Control-plane command subscriber stopped');
  };
}

/**
 * Decodes one request and dispatches it.
 *
 * Exported for unit testing; callers outside this module should use
 * `startCommandSubscriber()` instead.
 */
export async function handleCommandMessage(
  handler: CommandHandler,
  log: Logger,
  rawMessage: string,
): Promise<void> {
  let record: SenMLRecord | undefined;
  try {
    [record] = decodeSenML(rawMessage);
  } catch (err: unknown) {
    log.warn({ err }, 'Malformed control-plane request, skipping');
    return;
  }
  if (!record) return;

  const id = (record.bn ?? '').replace(/:$/, '');
  const name = record.n ?? '';
  const commandLine = record.vs;
  if (commandLine === undefined) {
    log.warn({ id, name }, 'Control-plane request has no string value, skipping');
    return;
  }

  try {
    switch (name) {
      case 'exec':
        await handler.execute(id, commandLine);
        break;
      case 'control':
        await handler.control(id, commandLine);
        break;
      case 'config':
        await handler.serviceConfig(id, commandLine);
        break;
      default:
        log.warn({ id, name }, 'Unsupported control-plane command type, skipping');
        return;
    }
    log.debug({ id, name }, 'Control-plane command handled');
  } catch (err: unknown) {
    log.error({ err, id, name }, 'Control-plane command failed');
  }
}
