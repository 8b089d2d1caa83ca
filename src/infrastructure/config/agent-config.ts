import { readFileSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { parse, stringify } from 'smol-toml';
import { agentConfigSchema } from '../../application/index.js';
import type { AgentConfig } from '../../application/index.js';

type Env = Record<string, string | undefined>;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Returns the variable when it is set to a non-empty value. */
function fromEnv(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Loads the agent configuration from a TOML file.
 *
 * Path: `configPath`, else `MF_AGENT_CONFIG_FILE`, else `./config.toml`.
 * A missing file yields defaults; a present but invalid file throws.
 * `MF_AGENT_*` environment variables override file values.
 */
export function loadAgentConfig(configPath?: string, env: Env = process.env): AgentConfig {
  const filePath = configPath ?? fromEnv(env, 'MF_AGENT_CONFIG_FILE') ?? resolve(process.cwd(), 'config.toml');

  let raw: Record<string, unknown> = {};
  try {
    raw = parse(readFileSync(filePath, 'utf-8'));
  } catch (err: unknown) {
    if (!isMissingFile(err)) throw err;
  }

  const base = agentConfigSchema.parse({ ...raw, file: filePath });
  const port = fromEnv(env, 'MF_AGENT_HTTP_PORT');

  // Re-validated so overrides go through the same constraints as file values.
  return agentConfigSchema.parse({
    ...base,
    server: {
      port: port === undefined ? base.server.port : Number(port),
      nats_url: fromEnv(env, 'MF_AGENT_NATS_URL') ?? base.server.nats_url,
    },
    thing: {
      id: fromEnv(env, 'MF_AGENT_THING_ID') ?? base.thing.id,
      key: fromEnv(env, 'MF_AGENT_THING_KEY') ?? base.thing.key,
    },
    channels: {
      control: fromEnv(env, 'MF_AGENT_CONTROL_CHANNEL') ?? base.channels.control,
      data: fromEnv(env, 'MF_AGENT_DATA_CHANNEL') ?? base.channels.data,
    },
    edgex: { url: fromEnv(env, 'MF_AGENT_EDGEX_URL') ?? base.edgex.url },
    log: { level: fromEnv(env, 'MF_AGENT_LOG_LEVEL') ?? base.log.level },
    mqtt: { ...base.mqtt, url: fromEnv(env, 'MF_AGENT_MQTT_URL') ?? base.mqtt.url },
  });
}

/**
 * Writes the configuration to `config.file` as TOML.
 *
 * `file` itself is not part of the document.
 */
export async function saveAgentConfig(config: AgentConfig): Promise<void> {
  const { file, ...document } = config;
  await mkdir(dirname(file), { recursive: true });
  await writeFile(file, stringify(document), 'utf-8');
}
