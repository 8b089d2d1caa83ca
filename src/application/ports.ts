import type { AgentConfig } from './config-schema.js';
import type { DownstreamService } from '../domain/index.js';

/**
 * Capabilities the agent consumes from its collaborators.
 *
 * Infrastructure adapters (MQTT, NATS, EdgeX, child processes, config
 * files) implement these; tests substitute in-process fakes.
 */

/** Control-plane transport (MQTT). */
export interface ControlPlane {
  /** Resolves once the broker has accepted the message. */
  publish(topic: string, payload: string): Promise<void>;

  /** Resolves once subscribed; the returned function unsubscribes. */
  subscribe(
    topic: string,
    handler: (topic: string, payload: Uint8Array) => void,
  ): Promise<() => Promise<void>>;
}

export interface BusMessage {
  readonly subject: string;
  readonly data: Uint8Array;
}

/** Internal bus (NATS). */
export interface MessageBus {
  /** Fire-and-forget publish. */
  publish(subject: string, data?: Uint8Array): void;

  /**
   * Subscribes synchronously; throws if the subscription cannot be set up.
   * `onError` receives delivery-level errors reported by the bus client.
   */
  subscribe(
    subject: string,
    handler: (message: BusMessage) => void,
    onError?: (err: Error) => void,
  ): () => void;
}

/** Device-management client (EdgeX system management agent). */
export interface DeviceClient {
  pushOperation(args: readonly string[]): Promise<string>;
  fetchConfig(args: readonly string[]): Promise<string>;
  fetchMetrics(args: readonly string[]): Promise<string>;
  ping(): Promise<string>;
}

/** Runs `program` with `args` and resolves with combined stdout/stderr. */
export type CommandRunner = (program: string, args: readonly string[]) => Promise<string>;

/**
 * A downstream service's own configuration object.
 *
 * `readBytes` parses with the service's own format and schema; errors
 * surface as whatever that parser throws.
 */
export interface PersistableConfig {
  file: string;
  readBytes(data: Uint8Array): void;
  save(): Promise<void>;
}

export type DownstreamConfigFactories = Record<DownstreamService, () => PersistableConfig>;

/** Persists the agent's own configuration verbatim. */
export type AgentConfigWriter = (config: AgentConfig) => Promise<void>;
