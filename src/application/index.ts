export { Agent } from './agent.js';
export type { AgentDeps } from './agent.js';
export { ServiceRegistry } from './service-registry.js';
export { encodeSenML, decodeSenML, senmlRecordSchema, senmlPackSchema } from './senml.js';
export type { SenMLRecord } from './senml.js';
export { agentConfigSchema } from './config-schema.js';
export type { AgentConfig } from './config-schema.js';
export type {
  ControlPlane,
  MessageBus,
  BusMessage,
  DeviceClient,
  CommandRunner,
  PersistableConfig,
  DownstreamConfigFactories,
  AgentConfigWriter,
} from './ports.js';
