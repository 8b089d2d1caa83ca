export type { Service, ServiceStatus } from './service.js';
export type {
  ParsedCommand,
  ExecCommand,
  ControlVerb,
  ControlCommand,
  ServiceConfigCommand,
} from './command.js';
export {
  CONTROL_VERBS,
  parseCommandLine,
  parseExecCommand,
  parseControlCommand,
  parseServiceConfigCommand,
  decodeBase64,
} from './command.js';
export type { DownstreamService } from './topics.js';
export {
  HEARTBEAT_SUBJECT,
  DOWNSTREAM_SERVICES,
  isDownstreamService,
  responseTopic,
  requestTopic,
  configReadySubject,
} from './topics.js';
export {
  AgentError,
  InvalidCommandError,
  UnknownCommandError,
  NoSuchServiceError,
  EncodingError,
  DecodingError,
  ExecutionError,
  DeviceClientError,
  SubscriptionError,
} from './errors.js';
