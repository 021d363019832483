/**
 * Configuration helper to load from environment variables
 */

import { z } from 'zod';
import { describeIssues } from './codecs';
import { InvalidArgumentError, ok, fail, type StreamResult } from './errors';
import type { LogLevel } from './logger';
import type { RedisOptions } from './redis';

export interface StreamClientConfig {
  redis: RedisOptions;
  /** How long init() waits for the connection to report ready */
  connectTimeoutMs: number;
  logLevel?: LogLevel;
}

export interface EnvConfig {
  // Redis
  REDIS_URL?: string;
  REDIS_TLS?: string;
  REDIS_USERNAME?: string;
  REDIS_PASSWORD?: string;
  REDIS_DB?: string;
  REDIS_KEY_PREFIX?: string;
  REDIS_RETRY_MS?: string;
  REDIS_CLUSTER_NODES?: string;
  REDIS_CA_CERT?: string;

  // Client
  STREAM_CONNECT_TIMEOUT_MS?: string;
  LOG_LEVEL?: string;
}

export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const nodeAddressSchema = z.string().regex(/^[^:\s]+:\d+$/, 'expected host:port');

const redisOptionsSchema = z.object({
  url: z.string().url().optional(),
  tls: z.boolean().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  db: z.number().int().nonnegative().optional(),
  keyPrefix: z.string().optional(),
  clusterNodes: z.array(nodeAddressSchema).optional(),
  caCertPath: z.string().min(1).optional(),
  retryMs: z.number().int().positive().optional(),
});

const clientConfigSchema = z.object({
  redis: redisOptionsSchema,
  connectTimeoutMs: z.number().int().positive(),
  logLevel: logLevelSchema.optional(),
});

const intString = z
  .string()
  .trim()
  .regex(/^\d+$/, 'expected a non-negative integer')
  .transform(Number);

const boolString = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((value) => value === 'true' || value === '1');

const clusterNodesString = z
  .string()
  .transform((value, ctx) => {
    try {
      const nodes: unknown = JSON.parse(value);
      return nodes;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a JSON array of "host:port"' });
      return z.NEVER;
    }
  })
  .pipe(z.array(nodeAddressSchema));

// empty strings count as unset, as they do in most .env files
const optional = <S extends z.ZodTypeAny>(schema: S) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema.optional());

const envSchema = z.object({
  REDIS_URL: optional(z.string()),
  REDIS_TLS: optional(boolString),
  REDIS_USERNAME: optional(z.string()),
  REDIS_PASSWORD: optional(z.string()),
  REDIS_DB: optional(intString),
  REDIS_KEY_PREFIX: optional(z.string()),
  REDIS_RETRY_MS: optional(intString),
  REDIS_CLUSTER_NODES: optional(clusterNodesString),
  REDIS_CA_CERT: optional(z.string()),
  STREAM_CONNECT_TIMEOUT_MS: optional(intString),
  LOG_LEVEL: optional(z.string().trim().toLowerCase().pipe(logLevelSchema)),
});

function invalid(prefix: string, error: z.ZodError): InvalidArgumentError {
  return new InvalidArgumentError(`${prefix}: ${describeIssues(error)}`);
}

/**
 * Check a client config before any connection is opened
 */
export function validateConfig(config: StreamClientConfig): StreamResult<StreamClientConfig> {
  const parsed = clientConfigSchema.safeParse(config);
  if (!parsed.success) {
    return fail(invalid('Invalid client config', parsed.error));
  }
  return ok(parsed.data);
}

/**
 * Build client config from environment variables
 */
export function configFromEnv(env: EnvConfig = process.env): StreamResult<StreamClientConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    return fail(invalid('Invalid environment', parsed.error));
  }

  const e = parsed.data;
  return validateConfig({
    redis: {
      url: e.REDIS_URL,
      tls: e.REDIS_TLS ?? false,
      username: e.REDIS_USERNAME,
      password: e.REDIS_PASSWORD,
      db: e.REDIS_DB ?? 0,
      keyPrefix: e.REDIS_KEY_PREFIX,
      retryMs: e.REDIS_RETRY_MS ?? 1000,
      clusterNodes: e.REDIS_CLUSTER_NODES,
      caCertPath: e.REDIS_CA_CERT,
    },
    connectTimeoutMs: e.STREAM_CONNECT_TIMEOUT_MS ?? DEFAULT_CONNECT_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL,
  });
}
