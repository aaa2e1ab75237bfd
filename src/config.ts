/**
 * Configuration module for the database gateway
 * Parses and validates environment variables
 */

import { z } from 'zod';
import { logger } from './utils/logger.js';

const targetSchema = z.object({
  name: z.string().min(1),
  host: z.string().min(1),
  port: z.number().int().positive().max(65535),
  user: z.string(),
  password: z.string(),
  database: z.string().min(1),
  charset: z.string().nullable(),
});

const configSchema = z.object({
  targets: z.array(targetSchema).min(1),
  connectTimeoutMs: z.number().int().positive().default(10_000),
  readTimeoutMs: z.number().int().positive().default(30_000),
  writeTimeoutMs: z.number().int().positive().default(30_000),
  acquireTimeoutMs: z.number().int().positive().default(30_000),
  shutdownTimeoutMs: z.number().int().nonnegative().default(10_000),
  readOnly: z.boolean().default(true),
  maxPoolSize: z.number().int().positive().default(10),
  maxResults: z.number().int().positive().default(10_000),
  transport: z.enum(['stdio', 'http']).default('stdio'),
  host: z.string().default('127.0.0.1'),
  port: z.number().int().positive().max(65535).default(9001),
  allowedOrigins: z
    .array(z.string())
    .default([
      'http://localhost',
      'http://127.0.0.1',
      'https://localhost',
      'https://127.0.0.1',
      'vscode-file://vscode-app',
    ]),
  allowedHosts: z.array(z.string()).default(['localhost', '127.0.0.1']),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Config = z.infer<typeof configSchema>;
export type TargetConfig = z.infer<typeof targetSchema>;

type Env = Record<string, string | undefined>;

function splitList(value: string): string[] {
  return value.split(',').map(s => s.trim());
}

function parseList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

function parseInteger(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

/**
 * Seconds from the environment, as whole milliseconds
 */
function parseSeconds(value: string | undefined): number | undefined {
  return value ? Math.round(parseFloat(value) * 1000) : undefined;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  return value ? value.trim().toLowerCase() === 'true' : undefined;
}

/**
 * Build raw target entries from the parallel comma lists.
 *
 * DB_PORTS and DB_CHARSETS given once apply to every target. Other lists
 * that disagree in length are cut to the shortest one.
 */
export function parseTargets(env: Env): Array<Record<keyof TargetConfig, unknown>> {
  const lists = {
    DB_HOSTS: splitList(env.DB_HOSTS || env.DB_HOST || 'localhost'),
    DB_PORTS: splitList(env.DB_PORTS || env.DB_PORT || '5432'),
    DB_USERS: splitList(env.DB_USERS || env.DB_USER || 'postgres'),
    DB_PASSWORDS: splitList(env.DB_PASSWORDS || env.DB_PASSWORD || ''),
    DB_NAMES: splitList(env.DB_NAMES || env.DB_NAME || ''),
    DB_CHARSETS: splitList(env.DB_CHARSETS || env.DB_CHARSET || ''),
  };

  const counted = Object.entries(lists).filter(
    ([key, values]) => !((key === 'DB_PORTS' || key === 'DB_CHARSETS') && values.length === 1)
  );
  const count = Math.min(...counted.map(([, values]) => values.length));

  if (counted.some(([, values]) => values.length !== count)) {
    const lengths = counted.map(([key, values]) => `${key}=${values.length}`).join(', ');
    logger.warn(`Multiple database config length mismatch: ${lengths}. Using first ${count} entries.`);
  }

  const at = (values: string[], i: number): string => (values.length === 1 ? values[0] : values[i]);

  const targets: Array<Record<keyof TargetConfig, unknown>> = [];
  for (let i = 0; i < count; i++) {
    const user = lists.DB_USERS[i];
    const database = lists.DB_NAMES[i] || user;
    const charset = at(lists.DB_CHARSETS, i);
    targets.push({
      name: database,
      host: lists.DB_HOSTS[i],
      port: parseInt(at(lists.DB_PORTS, i), 10),
      user,
      password: lists.DB_PASSWORDS[i],
      database,
      charset: charset || null,
    });
  }
  return targets;
}

export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    targets: parseTargets(env),
    connectTimeoutMs: parseSeconds(env.DB_CONNECT_TIMEOUT),
    readTimeoutMs: parseSeconds(env.DB_READ_TIMEOUT),
    writeTimeoutMs: parseSeconds(env.DB_WRITE_TIMEOUT),
    acquireTimeoutMs: parseSeconds(env.DB_ACQUIRE_TIMEOUT),
    shutdownTimeoutMs: parseSeconds(env.DB_SHUTDOWN_TIMEOUT),
    readOnly: parseBoolean(env.MCP_READ_ONLY),
    maxPoolSize: parseInteger(env.MCP_MAX_POOL_SIZE),
    maxResults: parseInteger(env.MCP_MAX_RESULTS),
    transport: env.MCP_TRANSPORT ? env.MCP_TRANSPORT.toLowerCase() : undefined,
    host: env.MCP_HOST || undefined,
    port: parseInteger(env.MCP_PORT),
    allowedOrigins: parseList(env.ALLOWED_ORIGINS),
    allowedHosts: parseList(env.ALLOWED_HOSTS),
    logLevel: env.LOG_LEVEL ? env.LOG_LEVEL.toLowerCase() : undefined,
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid configuration: ${errors}`);
  }

  const config = result.data;
  if (config.targets.some(t => !t.password)) {
    logger.warn('No password configured for one or more targets (DB_PASSWORD / DB_PASSWORDS)');
  }
  return config;
}

// Singleton config instance
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
