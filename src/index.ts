import Fastify from 'fastify';
import pino from 'pino';

import { Agent, ServiceRegistry } from './application/index.js';
import {
  connectMqtt,
  connectNats,
  createMqttControlPlane,
  createNatsBus,
  downstreamConfigs,
  EdgexClient,
  loadAgentConfig,
  runProcess,
  saveAgentConfig,
  startCommandSubscriber,
  startHeartbeatSubscriber,
} from './infrastructure/index.js';
import { agentRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap the agent.
 *
 * Order:
 * 1) Configuration + logger
 * 2) Internal bus (NATS) + heartbeat subscriber
 * 3) Control plane (MQTT)
 * 4) Dispatcher + control-plane command subscriber
 * 5) HTTP API, shutdown hooks, listen()
 */
async function main(): Promise<void> {
  const config = loadAgentConfig();
  const log = pino({ level: process.env['LOG_LEVEL'] ?? config.log.level });
  log.info({ file: config.file, control: config.channels.control }, 'Agent configuration loaded');

  // --------------------------------------------------
  // Internal bus
  // --------------------------------------------------

  const nc = await connectNats(config.server.nats_url, log);
  const bus = createNatsBus(nc);
  const registry = new ServiceRegistry(log);
  const stopHeartbeats = startHeartbeatSubscriber(bus, registry, log);

  // --------------------------------------------------
  // Control plane
  // --------------------------------------------------

  const mqttClient = await connectMqtt(config, log);
  const controlPlane = createMqttControlPlane(mqttClient, {
    qos: config.mqtt.qos,
    retain: config.mqtt.retain,
  });

  const agent = new Agent({
    config,
    controlPlane,
    bus,
    edgex: new EdgexClient(config.edgex.url, log),
    registry,
    runCommand: runProcess,
    downstream: downstreamConfigs,
    writeConfig: saveAgentConfig,
    log,
  });

  const stopCommands = await startCommandSubscriber(
    controlPlane,
    agent,
    config.channels.control,
    log,
  );

  // --------------------------------------------------
  // HTTP API
  // --------------------------------------------------

  const fastify = Fastify({
    logger: { level: process.env['LOG_LEVEL'] ?? config.log.level },
  });

  await fastify.register(agentRoutes, { agent });

  /**
   * IMPORTANT:
   * onClose MUST be registered BEFORE listen()
   */
  fastify.addHook('onClose', async () => {
    await stopCommands();
    stopHeartbeats();
    await mqttClient.endAsync();
    await nc.drain();
    log.info('Agent connections closed');
  });

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down agent...');
    fastify.close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({
    host: process.env['HOST'] ?? '0.0.0.0',
    port: config.server.port,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start agent', err);
  process.exit(1);
});
