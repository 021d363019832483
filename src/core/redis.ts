import Redis, { Cluster } from 'ioredis';
import { readFileSync } from 'fs';
import type { EventEmitter } from 'events';
import { ConnectionError, TimeoutError, ok, fail, type StreamResult } from './errors';

export type RedisClient = Redis | Cluster;

export interface RedisOptions {
  url?: string;
  tls?: boolean;
  username?: string;
  password?: string;
  db?: number;
  keyPrefix?: string;
  clusterNodes?: string[]; // ["host:port", ...]
  caCertPath?: string;
  retryMs?: number;
}

export function createRedis(opts: RedisOptions): RedisClient {
  const tlsConfig = opts.tls
    ? {
        ca: opts.caCertPath ? [readFileSync(opts.caCertPath)] : undefined,
      }
    : undefined;

  if (opts.clusterNodes && opts.clusterNodes.length > 0) {
    // Redis Cluster mode
    const nodes = opts.clusterNodes.map((n) => {
      const [host, portStr] = n.split(':');
      return { host, port: Number(portStr) || 6379 };
    });

    return new Cluster(nodes, {
      redisOptions: {
        username: opts.username,
        password: opts.password,
        db: opts.db,
        tls: tlsConfig,
        keyPrefix: opts.keyPrefix,
      },
      clusterRetryStrategy: () => opts.retryMs ?? 1000,
    });
  }

  // Single Redis instance
  const url = opts.url || 'redis://localhost:6379';

  return new Redis(url, {
    username: opts.username,
    password: opts.password,
    db: opts.db,
    tls: tlsConfig,
    keyPrefix: opts.keyPrefix,
    retryStrategy: () => opts.retryMs ?? 1000,
  });
}

/** What readiness and error watching need from a client */
export type ConnectionEvents = EventEmitter & { readonly status: string };

/**
 * Resolve once the client reports `ready`
 */
export function waitForReady(redis: ConnectionEvents, timeoutMs: number): Promise<StreamResult<void>> {
  return new Promise((resolve) => {
    if (redis.status === 'ready') {
      resolve(ok(undefined));
      return;
    }

    const onReady = () => {
      cleanup();
      resolve(ok(undefined));
    };
    const onError = (err: Error) => {
      cleanup();
      resolve(fail(new ConnectionError(`Redis connection failed: ${err.message}`, err)));
    };
    const timeout = setTimeout(() => {
      cleanup();
      resolve(fail(new TimeoutError(`Redis connection not ready after ${timeoutMs}ms`)));
    }, timeoutMs);

    function cleanup() {
      clearTimeout(timeout);
      redis.off('ready', onReady);
      redis.off('error', onError);
    }

    redis.once('ready', onReady);
    redis.once('error', onError);
  });
}

export type RedisArg = string | number;

export type PipelineCommand = [command: string, ...args: RedisArg[]];

export type PipelineReply = Array<[Error | null, unknown]>;

/**
 * The stream command surface the producer and consumer issue.
 * Replies are raw RESP values and are decoded by the callers.
 */
export interface StreamCommands {
  xadd(key: string, ...args: RedisArg[]): Promise<unknown>;
  xreadgroup(...args: RedisArg[]): Promise<unknown>;
  xpending(key: string, group: string, ...args: RedisArg[]): Promise<unknown>;
  xclaim(key: string, group: string, consumer: string, minIdleTime: number, ...ids: string[]): Promise<unknown>;
  xack(key: string, group: string, ...ids: string[]): Promise<unknown>;
  xgroup(subcommand: string, ...args: RedisArg[]): Promise<unknown>;
  xinfo(subcommand: string, ...args: RedisArg[]): Promise<unknown>;
  ping(): Promise<unknown>;
  pipeline(commands: PipelineCommand[]): Promise<PipelineReply>;
  quit(): Promise<unknown>;
}

type CommandIssuer = Pick<Redis, 'call' | 'pipeline' | 'quit'>;

/**
 * Expose an ioredis client through the stream command surface
 */
export function streamCommands(redis: CommandIssuer): StreamCommands {
  const send = (command: string, args: RedisArg[]): Promise<unknown> => redis.call(command, args);

  return {
    xadd: (key, ...args) => send('XADD', [key, ...args]),
    xreadgroup: (...args) => send('XREADGROUP', args),
    xpending: (key, group, ...args) => send('XPENDING', [key, group, ...args]),
    xclaim: (key, group, consumer, minIdleTime, ...ids) =>
      send('XCLAIM', [key, group, consumer, minIdleTime, ...ids]),
    xack: (key, group, ...ids) => send('XACK', [key, group, ...ids]),
    xgroup: (subcommand, ...args) => send('XGROUP', [subcommand, ...args]),
    xinfo: (subcommand, ...args) => send('XINFO', [subcommand, ...args]),
    ping: () => send('PING', []),
    pipeline: async (commands) => {
      const results = await redis
        .pipeline(commands.map(([command, ...args]) => [command.toLowerCase(), ...args]))
        .exec();
      return results ?? [];
    },
    quit: () => redis.quit(),
  };
}
