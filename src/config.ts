import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { Config } from './types.js';
import { configPath as defaultConfigPath } from './paths.js';
import { MODEL_PROVIDER_NAMES } from './host/provider-map.js';
import { LOG_LEVELS } from './logger.js';
import { ConfigError } from './errors.js';

export const DEFAULT_PORT = 8080;

const ConfigSchema = z.strictObject({
  provider: z.enum(MODEL_PROVIDER_NAMES).default('apple'),
  log_level: z.enum(LOG_LEVELS).default('info'),
  server: z.strictObject({
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(0).max(65535).default(DEFAULT_PORT),
    max_body_bytes: z.number().int().min(1024).max(16 * 1024 * 1024).default(65536),
    error_status: z.number().int().min(400).max(599).default(400),
  }).default({}),
  session: z.strictObject({
    max_queue: z.number().int().min(0).max(10_000).default(16),
  }).default({}),
  providers: z.strictObject({
    apple: z.strictObject({
      bridge_command: z.array(z.string().min(1)).min(1).default(['fm-bridge']),
    }).default({}),
    openai: z.strictObject({
      base_url: z.string().url().default('http://127.0.0.1:11434/v1'),
      model: z.string().min(1).default('default'),
    }).default({}),
    mock: z.strictObject({
      reply: z.string().optional(),
    }).default({}),
  }).default({}),
});

/** Parse an already-loaded YAML document (or nothing) into a Config. */
export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config: ${issues}`, { cause: result.error });
  }
  return applyEnvOverrides(result.data);
}

function applyEnvOverrides(config: Config): Config {
  const port = process.env.FMGW_PORT;
  const host = process.env.FMGW_HOST;
  if (port !== undefined) {
    const n = Number(port);
    if (!Number.isInteger(n) || n < 0 || n > 65535) {
      throw new ConfigError(`Invalid config: FMGW_PORT must be a port number, got "${port}"`);
    }
    config.server.port = n;
  }
  if (host) {
    config.server.host = host;
  }
  return config;
}

/**
 * Load fmgw.yaml. An explicit path must exist; the default path may be
 * missing, in which case every key takes its default.
 */
export function loadConfig(path?: string): Config {
  const configPath = resolve(path ?? defaultConfigPath());
  if (!path && !existsSync(configPath)) {
    return parseConfig({});
  }
  const raw = readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`Invalid config: ${configPath} is not valid YAML`, { cause: err });
  }
  return parseConfig(parsed);
}
