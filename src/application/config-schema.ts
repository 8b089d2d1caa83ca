import { z } from 'zod';

/**
 * Zod schema for the agent's own configuration file.
 *
 * Every key has a default, so an empty document (or a missing file)
 * yields a runnable local configuration.
 */
export const agentConfigSchema = z.object({
  server: z.object({
    port: z.number().int().min(1).max(65535).default(9999),
    nats_url: z.string().min(1).default('nats://localhost:4222'),
  }).default({}),
  thing: z.object({
    id: z.string().default(''),
    key: z.string().default(''),
  }).default({}),
  channels: z.object({
    control: z.string().default(''),
    data: z.string().default(''),
  }).default({}),
  edgex: z.object({
    url: z.string().url().default('http://localhost:48090/api/v1/'),
  }).default({}),
  log: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }).default({}),
  mqtt: z.object({
    url: z.string().min(1).default('mqtt://localhost:1883'),
    username: z.string().default(''),
    password: z.string().default(''),
    mtls: z.boolean().default(false),
    skip_tls_ver: z.boolean().default(false),
    ca_path: z.string().default(''),
    cert_path: z.string().default(''),
    priv_key_path: z.string().default(''),
    qos: z.union([z.literal(0), z.literal(1), z.literal(2)]).default(0),
    retain: z.boolean().default(false),
  }).default({}),
  file: z.string().min(1).default('config.toml'),
});

export type AgentConfig = z.infer<typeof agentConfigSchema>;
