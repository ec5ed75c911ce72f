/**
 * @fileoverview Server configuration loading from YAML.
 * Validates the file against a schema in which every field has a default.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { InvalidConfigError } from '../errors.js';

const PortSchema = z.number().int().min(0).max(65535);

const ServerConfigSchema = z.object({
  tcp: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: PortSchema.default(4000),
    })
    .default({}),
  websocket: z
    .object({
      enabled: z.boolean().default(true),
      port: PortSchema.default(4001),
    })
    .default({}),
  status: z
    .object({
      enabled: z.boolean().default(true),
      port: PortSchema.default(4002),
    })
    .default({}),
  legacy: z
    .object({
      enabled: z.boolean().default(false),
      port: PortSchema.default(4003),
    })
    .default({}),
  connection: z
    .object({
      maxBufferedBytes: z.number().int().positive().default(1024 * 1024),
      maxFrameBytes: z.number().int().positive().default(64 * 1024),
      closeGraceMs: z.number().int().nonnegative().default(2_000),
    })
    .default({}),
  heartbeat: z
    .object({
      intervalMs: z.number().int().positive().default(15_000),
      timeoutMs: z.number().int().positive().default(45_000),
    })
    .default({})
    .refine((heartbeat) => heartbeat.timeoutMs >= heartbeat.intervalMs, {
      message: 'timeoutMs must not be shorter than intervalMs',
    }),
  names: z
    .object({
      maxLength: z.number().int().positive().default(32),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Validate raw configuration data, filling in defaults.
 * @throws {InvalidConfigError} if the data does not match the schema
 */
export function parseServerConfig(raw: unknown): ServerConfig {
  const result = ServerConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigError(details);
  }
  return result.data;
}

/**
 * The configuration used when no file is present.
 */
export function defaultServerConfig(): ServerConfig {
  return parseServerConfig({});
}

/**
 * Load and validate the server configuration.
 *
 * Config file is loaded from:
 * - the `configPath` argument if given
 * - CONFIG_PATH environment variable if set
 * - otherwise ./config/server.yaml relative to cwd
 *
 * A missing file yields the defaults. The PORT environment variable overrides `tcp.port`.
 */
export function loadServerConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  const path = configPath ?? env['CONFIG_PATH'] ?? join(process.cwd(), 'config/server.yaml');

  let raw: unknown = {};
  if (existsSync(path)) {
    try {
      raw = parseYaml(readFileSync(path, 'utf8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new InvalidConfigError(`cannot read ${path}: ${message}`);
    }
  }

  const config = parseServerConfig(raw);

  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  const portOverride = env['PORT'];
  if (portOverride !== undefined && portOverride !== '') {
    const port = Number(portOverride);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new InvalidConfigError(`PORT must be a port number, got "${portOverride}"`);
    }
    return { ...config, tcp: { ...config.tcp, port } };
  }

  return config;
}
