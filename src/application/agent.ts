import type { Logger } from 'pino';
import {
  configReadySubject,
  decodeBase64,
  isDownstreamService,
  NoSuchServiceError,
  parseControlCommand,
  parseExecCommand,
  parseServiceConfigCommand,
  responseTopic,
  UnknownCommandError,
} from '../domain/index.js';
import type { ControlCommand, Service, ServiceConfigCommand } from '../domain/index.js';
import { encodeSenML } from './senml.js';
import type { ServiceRegistry } from './service-registry.js';
import type { AgentConfig } from './config-schema.js';
import type {
  AgentConfigWriter,
  CommandRunner,
  ControlPlane,
  DeviceClient,
  DownstreamConfigFactories,
  MessageBus,
} from './ports.js';

export interface AgentDeps {
  readonly config: AgentConfig;
  readonly controlPlane: ControlPlane;
  readonly bus: MessageBus;
  readonly edgex: DeviceClient;
  readonly registry: ServiceRegistry;
  readonly runCommand: CommandRunner;
  readonly downstream: DownstreamConfigFactories;
  readonly writeConfig: AgentConfigWriter;
  readonly log: Logger;
}

/**
 * Command dispatcher.
 *
 * Three entry points (`execute`, `control`, `serviceConfig`) parse a
 * command line, perform the action and publish a SenML response on the
 * control channel. A failed dispatch throws and publishes nothing; side
 * effects that already happened (a saved config file) are not rolled back.
 */
export class Agent {
  constructor(private readonly deps: AgentDeps) {}

  /**
   * Runs a local program and publishes its combined output.
   *
   * @returns the encoded SenML payload that was published
   */
  async execute(id: string, commandLine: string): Promise<string> {
    const { program, args } = parseExecCommand(commandLine);

    this.deps.log.debug({ id, program, args }, 'Executing command');
    const output = await this.deps.runCommand(program, args);

    const payload = encodeSenML(id, program, output);
    await this.publish(this.deps.config.channels.control, payload);
    return payload;
  }

  /** Routes an EdgeX operation to the device client. */
  async control(id: string, commandLine: string): Promise<void> {
    const command = parseControlCommand(commandLine);
    if (command.kind === 'unknown') {
      throw new UnknownCommandError(command.verb);
    }

    const response = await this.callDeviceClient(command);
    await this.respond(id, command.kind, response);
  }

  /** Views the service registry or overwrites a downstream service's config. */
  async serviceConfig(id: string, commandLine: string): Promise<void> {
    const command = parseServiceConfigCommand(commandLine);

    switch (command.kind) {
      case 'view':
        await this.respond(id, command.kind, JSON.stringify(this.deps.registry.toJSON()));
        return;
      case 'save':
        await this.saveServiceConfig(command);
        this.notifyConfigReady(command.service);
        await this.respond(id, command.kind, '');
        return;
      case 'unknown':
        throw new UnknownCommandError(command.verb);
      default: {
        const unreachable: never = command;
        throw new UnknownCommandError(String(unreachable));
      }
    }
  }

  /**
   * Signals downstream consumers that a fresh configuration is on disk.
   * Published after persisting, never as part of it.
   */
  notifyConfigReady(service: string): void {
    const subject = configReadySubject(service);
    this.deps.bus.publish(subject);
    this.deps.log.info({ service, subject }, 'Config-ready notification published');
  }

  /** Persists the given agent configuration; the in-memory copy is left as is. */
  async addConfig(config: AgentConfig): Promise<void> {
    await this.deps.writeConfig(config);
    this.deps.log.info({ file: config.file }, 'Agent configuration saved');
  }

  config(): AgentConfig {
    return this.deps.config;
  }

  services(): ReadonlyMap<string, Readonly<Service>> {
    return this.deps.registry.snapshot();
  }

  /** Publishes `payload` on the response topic of `channel`. */
  async publish(channel: string, payload: string): Promise<void> {
    await this.deps.controlPlane.publish(responseTopic(channel), payload);
  }

  private callDeviceClient(command: Exclude<ControlCommand, { kind: 'unknown' }>): Promise<string> {
    const { edgex } = this.deps;
    switch (command.kind) {
      case 'edgex-operation':
        return edgex.pushOperation(command.args);
      case 'edgex-config':
        return edgex.fetchConfig(command.args);
      case 'edgex-metrics':
        return edgex.fetchMetrics(command.args);
      case 'edgex-ping':
        return edgex.ping();
      default: {
        const unreachable: never = command;
        throw new UnknownCommandError(String(unreachable));
      }
    }
  }

  private async saveServiceConfig(
    command: Extract<ServiceConfigCommand, { kind: 'save' }>,
  ): Promise<void> {
    const content = decodeBase64(command.content);
    if (!isDownstreamService(command.service)) {
      throw new NoSuchServiceError(command.service);
    }

    const target = this.deps.downstream[command.service]();
    target.readBytes(content);
    target.file = command.fileName;
    await target.save();

    this.deps.log.info(
      { service: command.service, file: command.fileName, bytes: content.byteLength },
      'Service configuration saved',
    );
  }

  /** Shared response path: encode and publish on the control channel. */
  private async respond(id: string, name: string, value: string): Promise<void> {
    const payload = encodeSenML(id, name, value);
    await this.publish(this.deps.config.channels.control, payload);
  }
}
