import { describe, it, expect, afterEach } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { loadAgentConfig, saveAgentConfig } from '../../src/infrastructure/config/agent-config.js';

const TMP_DIR = join(process.cwd(), '.tmp-test-agent-config');

function writeTmpToml(content: string): string {
  mkdirSync(TMP_DIR, { recursive: true });
  const path = join(TMP_DIR, 'config.toml');
  writeFileSync(path, content, 'utf-8');
  return path;
}

describe('loadAgentConfig', () => {
  afterEach(() => {
    rmSync(TMP_DIR, { recursive: true, force: true });
  });

  it('returns defaults when the file does not exist', () => {
    const config = loadAgentConfig('/nonexistent/config.toml', {});

    expect(config.server).toEqual({ port: 9999, nats_url: 'nats://localhost:4222' });
    expect(config.edgex.url).toBe('http://localhost:48090/api/v1/');
    expect(config.mqtt.qos).toBe(0);
    expect(config.file).toBe('/nonexistent/config.toml');
  });

  it('reads values from TOML and fills the rest with defaults', () => {
    const path = writeTmpToml([
      '[channels]',
      'control = "ctrl-42"',
      '',
      '[mqtt]',
      'url = "mqtts://broker.local:8883"',
      'qos = 1',
      'mtls = true',
    ].join('\n'));

    const config = loadAgentConfig(path, {});

    expect(config.channels).toEqual({ control: 'ctrl-42', data: '' });
    expect(config.mqtt.url).toBe('mqtts://broker.local:8883');
    expect(config.mqtt.qos).toBe(1);
    expect(config.mqtt.mtls).toBe(true);
    expect(config.log.level).toBe('info');
    expect(config.file).toBe(path);
  });

  it('applies environment overrides over file values', () => {
    const path = writeTmpToml('[channels]\ncontrol = "from-file"\n');

    const config = loadAgentConfig(path, {
      MF_AGENT_CONTROL_CHANNEL: 'from-env',
      MF_AGENT_HTTP_PORT: '8181',
      MF_AGENT_LOG_LEVEL: 'debug',
      MF_AGENT_NATS_URL: 'nats://bus.local:4222',
    });

    expect(config.channels.control).toBe('from-env');
    expect(config.server).toEqual({ port: 8181, nats_url: 'nats://bus.local:4222' });
    expect(config.log.level).toBe('debug');
  });

  it('ignores empty environment variables', () => {
    const path = writeTmpToml('[channels]\ncontrol = "from-file"\n');

    const config = loadAgentConfig(path, { MF_AGENT_CONTROL_CHANNEL: '' });

    expect(config.channels.control).toBe('from-file');
  });

  it('uses MF_AGENT_CONFIG_FILE when no path is given', () => {
    const path = writeTmpToml('[thing]\nid = "thing-1"\n');

    const config = loadAgentConfig(undefined, { MF_AGENT_CONFIG_FILE: path });

    expect(config.thing.id).toBe('thing-1');
  });

  it('throws on invalid TOML', () => {
    const path = writeTmpToml('[server\nport = 1');
    expect(() => loadAgentConfig(path, {})).toThrow();
  });

  it('throws on values outside the schema', () => {
    const path = writeTmpToml('[server]\nport = 70000\n');
    expect(() => loadAgentConfig(path, {})).toThrow();
  });

  it('throws on a non-numeric port override', () => {
    expect(() => loadAgentConfig('/nonexistent/config.toml', { MF_AGENT_HTTP_PORT: 'abc' })).toThrow();
  });
});

describe('saveAgentConfig', () => {
  afterEach(() => {
    rmSync(TMP_DIR, { recursive: true, force: true });
  });

  it('writes a TOML document that loads back to the same config', async () => {
    const file = join(TMP_DIR, 'nested', 'agent.toml');
    const original = loadAgentConfig('/nonexistent/config.toml', { MF_AGENT_CONTROL_CHANNEL: 'ctrl-9' });

    await saveAgentConfig({ ...original, file });

    expect(readFileSync(file, 'utf-8')).not.toContain('file =');
    expect(loadAgentConfig(file, {})).toEqual({ ...original, file });
  });
});
