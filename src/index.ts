/**
 * stream-claim
 * Consumer-group reads over Redis Streams with idle-message claiming
 */

import {
  createRedis,
  streamCommands,
  waitForReady,
  type ConnectionEvents,
  type StreamCommands,
} from './core/redis';
import { validateConfig, type StreamClientConfig } from './core/config';
import { attempt, ConnectionError, ok, fail, type StreamResult } from './core/errors';
import { decodeConsumersInfo, decodeGroupsInfo, decodeStreamInfo } from './core/codecs';
import { Logger, resolveLogLevel, type LogLevel } from './core/logger';
import { Producer } from './streams/producer';
import { Consumer } from './streams/consumer';
import { parseConsumerConfig, type ConsumerConfig, type ProducerConfig } from './streams/policies';
import type { ConsumerInfo, GroupInfo, StreamInfo } from './streams/types';

/**
 * Source of command handles. `open()` hands out a connection that nothing
 * else uses, so a blocking read cannot stall other traffic.
 */
export interface ConnectionProvider {
  primary: StreamCommands;
  open(): Promise<StreamResult<StreamCommands>>;
}

export class StreamClient {
  private consumers = new Set<Consumer>();
  private closed = false;
  private logger: Logger;

  private constructor(
    private provider: ConnectionProvider,
    private level: LogLevel
  ) {
    this.logger = new Logger('stream-client', level);
  }

  /**
   * Connect to Redis and wait until the connection is ready
   */
  static async init(config: StreamClientConfig): Promise<StreamResult<StreamClient>> {
    const validated = validateConfig(config);
    if (!validated.ok) return validated;

    const { redis: redisOptions, connectTimeoutMs, logLevel } = validated.value;
    const level = resolveLogLevel(logLevel);
    const logger = new Logger('stream-client', level);

    const redis = createRedis(redisOptions);
    const ready = await waitForReady(redis, connectTimeoutMs);
    if (!ready.ok) {
      redis.disconnect();
      logger.error(ready.error.message);
      return ready;
    }
    watchErrors(redis, logger);

    const provider: ConnectionProvider = {
      primary: streamCommands(redis),
      open: async () => {
        const dedicated = redis.duplicate();
        const dedicatedReady = await waitForReady(dedicated, connectTimeoutMs);
        if (!dedicatedReady.ok) {
          dedicated.disconnect();
          return dedicatedReady;
        }
        watchErrors(dedicated, logger);
        return ok(streamCommands(dedicated));
      },
    };

    logger.info('Connected');
    return ok(new StreamClient(provider, level));
  }

  /**
   * Wrap handles that are already connected
   */
  static attach(provider: ConnectionProvider, logLevel?: LogLevel): StreamClient {
    return new StreamClient(provider, resolveLogLevel(logLevel));
  }

  /**
   * Producer on the shared connection
   */
  producer(config: ProducerConfig): StreamResult<Producer> {
    if (this.closed) return fail(closedError());
    return Producer.create(this.provider.primary, config, new Logger('producer', this.level));
  }

  /**
   * Consumer on its own connection; the client closes it on close()
   */
  async consumer(config: ConsumerConfig): Promise<StreamResult<Consumer>> {
    if (this.closed) return fail(closedError());

    // reject bad config before opening a connection for it
    const parsed = parseConsumerConfig(config);
    if (!parsed.ok) return parsed;

    const connection = await this.provider.open();
    if (!connection.ok) {
      this.logger.error(`Could not open consumer connection: ${connection.error.message}`);
      return connection;
    }

    const consumer = await Consumer.create(connection.value, parsed.value, {
      ownsConnection: true,
      logger: new Logger('consumer', this.level),
      onClose: (closed) => this.consumers.delete(closed),
    });
    if (!consumer.ok) {
      await this.release(connection.value);
      return consumer;
    }

    this.consumers.add(consumer.value);
    return consumer;
  }

  /**
   * Consumers handed out and not yet closed
   */
  get openConsumers(): number {
    return this.consumers.size;
  }

  async streamInfo(streamName: string): Promise<StreamResult<StreamInfo>> {
    const reply = await attempt('XINFO STREAM', () => this.provider.primary.xinfo('STREAM', streamName));
    if (!reply.ok) return reply;
    return decodeStreamInfo(reply.value);
  }

  /**
   * Consumer groups of a stream with their pending counts and lag
   */
  async groupsInfo(streamName: string): Promise<StreamResult<GroupInfo[]>> {
    const reply = await attempt('XINFO GROUPS', () => this.provider.primary.xinfo('GROUPS', streamName));
    if (!reply.ok) return reply;
    return decodeGroupsInfo(reply.value);
  }

  /**
   * Consumers of one group, in name order as the server lists them
   */
  async consumersInfo(streamName: string, groupName: string): Promise<StreamResult<ConsumerInfo[]>> {
    const reply = await attempt('XINFO CONSUMERS', () =>
      this.provider.primary.xinfo('CONSUMERS', streamName, groupName)
    );
    if (!reply.ok) return reply;
    return decodeConsumersInfo(reply.value);
  }

  /**
   * Health check
   */
  async ping(): Promise<boolean> {
    const reply = await attempt('PING', () => this.provider.primary.ping());
    if (!reply.ok) {
      this.logger.warn(`Ping failed: ${reply.error.message}`);
    }
    return reply.ok;
  }

  /**
   * Close every consumer handed out, then the shared connection
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    // close() removes each consumer from the set
    for (const consumer of [...this.consumers]) {
      const closed = await attempt('QUIT', () => consumer.close());
      if (!closed.ok) {
        this.logger.warn(`Consumer ${consumer.identity.consumerName} did not close cleanly: ${closed.error.message}`);
      }
    }
    this.consumers.clear();

    await this.release(this.provider.primary);
    this.logger.info('Closed');
  }

  private async release(connection: StreamCommands): Promise<void> {
    const quit = await attempt('QUIT', () => connection.quit());
    if (!quit.ok) {
      this.logger.warn(`Connection did not close cleanly: ${quit.error.message}`);
    }
  }
}

function watchErrors(redis: ConnectionEvents, logger: Logger): void {
  redis.on('error', (err: Error) => {
    logger.warn(`Redis connection error: ${err.message}`);
  });
}

function closedError(): ConnectionError {
  return new ConnectionError('Client is closed');
}

export { Producer } from './streams/producer';
export { Consumer, type ConsumerOptions } from './streams/consumer';
export { StreamId } from './streams/identifier';
export { lookupPendingEntry, checkOwnership } from './streams/ownership';
export {
  parseConsumerConfig,
  parseProducerConfig,
  type ClaimPolicy,
  type ConsumerConfig,
  type NewMessagesPolicy,
  type PendingMessagesPolicy,
  type ProducerConfig,
  type StartPosition,
} from './streams/policies';
export type {
  AckReply,
  AppendBatchResult,
  ConsumeBatch,
  ConsumePhase,
  ConsumeResult,
  ConsumerInfo,
  GroupIdentity,
  GroupInfo,
  OwnershipOutcome,
  PendingEntry,
  StreamInfo,
  StreamMessage,
} from './streams/types';
export * from './core/errors';
export type { FieldInput } from './core/codecs';
export { createRedis, streamCommands, type RedisClient, type RedisOptions, type StreamCommands } from './core/redis';
export { Logger, type LogLevel } from './core/logger';

// Export configuration helper
export { configFromEnv, validateConfig, type EnvConfig, type StreamClientConfig } from './core/config';
