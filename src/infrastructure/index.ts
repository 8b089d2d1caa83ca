export { connectMqtt, buildMqttOptions, createMqttControlPlane } from './mqtt/index.js';
export { startCommandSubscriber, handleCommandMessage } from './mqtt/index.js';
export type { CommandHandler, PublishOptions } from './mqtt/index.js';
export { connectNats, createNatsBus, startHeartbeatSubscriber, handleHeartbeat } from './nats/index.js';
export { EdgexClient } from './edgex/index.js';
export { runProcess } from './exec/index.js';
export { loadAgentConfig, saveAgentConfig, ExportConfig, exportConfigSchema, downstreamConfigs } from './config/index.js';
export type { ExportServiceConfig } from './config/index.js';
