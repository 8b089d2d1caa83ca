import { connectAsync } from 'mqtt';
import type { IClientOptions, MqttClient } from 'mqtt';
import { existsSync, readFileSync } from 'node:fs';
import type { Logger } from 'pino';
import type { AgentConfig } from '../../application/index.js';

/** Reads an optional TLS file, warning when a configured path is missing. */
function readTlsFile(path: string, label: string, log: Logger): Buffer | undefined {
  if (!path) return undefined;
  if (!existsSync(path)) {
    log.warn({ path }, `MQTT ${label} path set but file not found`);
    return undefined;
  }
  return readFileSync(path);
}

/**
 * Builds MQTT client options from the agent configuration.
 *
 * Credentials default to the agent thing's id/key. Client certificates are
 * only loaded when `mqtt.mtls` is on.
 */
export function buildMqttOptions(config: AgentConfig, log: Logger): IClientOptions {
  const { mqtt, thing } = config;

  const options: IClientOptions = {
    clientId: `agent-${thing.id || Math.random().toString(16).slice(2)}`,
    username: mqtt.username || thing.id,
    password: mqtt.password || thing.key,
    reconnectPeriod: 2000,
    connectTimeout: 10_000,
    rejectUnauthorized: !mqtt.skip_tls_ver,
  };

  if (mqtt.mtls) {
    options.ca = readTlsFile(mqtt.ca_path, 'CA', log);
    options.cert = readTlsFile(mqtt.cert_path, 'certificate', log);
    options.key = readTlsFile(mqtt.priv_key_path, 'private key', log);
  }

  return options;
}

/**
 * Connects to the control-plane broker.
 *
 * Resolves on the first CONNACK; afterwards the client reconnects on its
 * own and connection events are only logged.
 */
export async function connectMqtt(config: AgentConfig, log: Logger): Promise<MqttClient> {
  const options = buildMqttOptions(config, log);
  log.info(
    { url: config.mqtt.url, mtls: config.mqtt.mtls, rejectUnauthorized: options.rejectUnauthorized },
    'Connecting to MQTT broker',
  );

  const client = await connectAsync(config.mqtt.url, options);
  log.info('MQTT connected');

  client.on('error', (err) => log.error({ err }, 'MQTT error'));
  client.on('reconnect', () => log.info('MQTT reconnecting'));
  client.on('close', () => log.warn('MQTT connection closed'));
  client.on('offline', () => log.warn('MQTT client offline'));

  return client;
}
