import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { parse, stringify } from 'smol-toml';
import { z } from 'zod';
import type { PersistableConfig } from '../../application/index.js';

/**
 * Configuration document of the `export` service, which forwards messages
 * from the internal bus to a remote MQTT broker.
 */
export const exportConfigSchema = z.object({
  exp: z.object({
    cache_url: z.string().default('localhost:6379'),
    cache_pass: z.string().default(''),
    cache_db: z.string().default('0'),
    log_level: z.string().default('info'),
    nats: z.string().default('nats://localhost:4222'),
    port: z.string().default('8170'),
  }).default({}),
  mqtt: z.object({
    ca_path: z.string().default('ca.crt'),
    cert_path: z.string().default('thing.crt'),
    channel: z.string().default(''),
    host: z.string().default('tcp://localhost:1883'),
    mtls: z.boolean().default(false),
    password: z.string().default(''),
    priv_key_path: z.string().default('thing.key'),
    qos: z.number().int().min(0).max(2).default(0),
    retain: z.boolean().default(false),
    skip_tls_ver: z.boolean().default(false),
    username: z.string().default(''),
  }).default({}),
  routes: z.array(z.object({
    mqtt_topic: z.string(),
    nats_topic: z.string(),
    subtopic: z.string().default(''),
    type: z.string().default(''),
    workers: z.number().int().min(1).default(10),
  })).default([]),
});

export type ExportServiceConfig = z.infer<typeof exportConfigSchema>;

/**
 * The `export` service's configuration object.
 *
 * `readBytes` parses TOML and validates it against the export schema;
 * TOML syntax errors and schema violations propagate unchanged.
 */
export class ExportConfig implements PersistableConfig {
  file = '';
  private document: ExportServiceConfig = exportConfigSchema.parse({});

  get content(): ExportServiceConfig {
    return this.document;
  }

  readBytes(data: Uint8Array): void {
    const text = new TextDecoder().decode(data);
    this.document = exportConfigSchema.parse(parse(text));
  }

  async save(): Promise<void> {
    await mkdir(dirname(this.file), { recursive: true });
    await writeFile(this.file, stringify(this.document), 'utf-8');
  }
}
