import { vi } from 'vitest';
import type { Logger } from 'pino';
import { agentConfigSchema } from '../src/application/index.js';
import type {
  AgentConfig,
  BusMessage,
  ControlPlane,
  DeviceClient,
  MessageBus,
  PersistableConfig,
} from '../src/application/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

/** Default configuration with a fixed control channel. */
export function makeConfig(overrides: Partial<AgentConfig> = {}): AgentConfig {
  return {
    ...agentConfigSchema.parse({ channels: { control: 'ctrl-1' } }),
    ...overrides,
  };
}

/** In-process control plane that records publishes and delivers on demand. */
export class FakeControlPlane implements ControlPlane {
  readonly published: Array<{ topic: string; payload: string }> = [];
  readonly handlers = new Map<string, (topic: string, payload: Uint8Array) => void>();
  publishError: Error | null = null;

  async publish(topic: string, payload: string): Promise<void> {
    if (this.publishError) throw this.publishError;
    this.published.push({ topic, payload });
  }

  async subscribe(
    topic: string,
    handler: (topic: string, payload: Uint8Array) => void,
  ): Promise<() => Promise<void>> {
    this.handlers.set(topic, handler);
    return async () => {
      this.handlers.delete(topic);
    };
  }

  deliver(topic: string, payload: string): void {
    this.handlers.get(topic)?.(topic, Buffer.from(payload));
  }
}

/** In-process bus with NATS-style single-token `*` wildcards. */
export class FakeBus implements MessageBus {
  readonly published: Array<{ subject: string; data: Uint8Array | undefined }> = [];
  private readonly subs = new Map<string, (message: BusMessage) => void>();
  subscribeError: Error | null = null;

  publish(subject: string, data?: Uint8Array): void {
    this.published.push({ subject, data });
  }

  subscribe(subject: string, handler: (message: BusMessage) => void): () => void {
    if (this.subscribeError) throw this.subscribeError;
    this.subs.set(subject, handler);
    return () => {
      this.subs.delete(subject);
    };
  }

  get subscriptionCount(): number {
    return this.subs.size;
  }

  deliver(subject: string): void {
    for (const [pattern, handler] of this.subs) {
      if (matches(pattern, subject)) {
        handler({ subject, data: new Uint8Array() });
      }
    }
  }
}

function matches(pattern: string, subject: string): boolean {
  const p = pattern.split('.');
  const s = subject.split('.');
  return p.length === s.length && p.every((token, i) => token === '*' || token === s[i]);
}

export function fakeDeviceClient() {
  return {
    pushOperation: vi.fn<DeviceClient['pushOperation']>().mockResolvedValue('operation-ok'),
    fetchConfig: vi.fn<DeviceClient['fetchConfig']>().mockResolvedValue('config-ok'),
    fetchMetrics: vi.fn<DeviceClient['fetchMetrics']>().mockResolvedValue('metrics-ok'),
    ping: vi.fn<DeviceClient['ping']>().mockResolvedValue('pong'),
  };
}

/** Records what the agent does with a downstream configuration object. */
export class RecordingConfig implements PersistableConfig {
  file = '';
  bytes: Uint8Array | null = null;
  saved = false;
  saveError: Error | null = null;

  readBytes(data: Uint8Array): void {
    this.bytes = data;
  }

  async save(): Promise<void> {
    if (this.saveError) throw this.saveError;
    this.saved = true;
  }
}
