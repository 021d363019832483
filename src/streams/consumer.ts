import type { RedisArg, StreamCommands } from '../core/redis';
import { attempt, InvalidArgumentError, ok, fail, type StreamResult } from '../core/errors';
import { decodeClaimReply, decodeCount, decodePendingEntries, decodeReadReply, type RawEntry } from '../core/codecs';
import { Logger } from '../core/logger';
import { elapsedMs, nowMs } from '../core/time';
import { StreamId } from './identifier';
import { checkOwnership } from './ownership';
import { groupStartId, parseConsumerConfig, type ConsumerConfig } from './policies';
import type {
  AckReply,
  ConsumeBatch,
  ConsumePhase,
  ConsumeResult,
  GroupIdentity,
  OwnershipOutcome,
  PendingEntry,
  StreamMessage,
} from './types';

const PHASE_ORDER: readonly ConsumePhase[] = ['new', 'pending', 'claimed'];

export interface ConsumerOptions {
  /** close() quits the connection handle */
  ownsConnection?: boolean;
  logger?: Logger;
  /** called once, after close() */
  onClose?: (consumer: Consumer) => void;
}

/**
 * Reads from one consumer group under a fixed consumer name.
 *
 * Each consume() call fills a batch from three sources in priority order:
 * never-delivered entries, entries already pending for this consumer, and
 * entries idle past the claim threshold in anyone's pending list. Claimed
 * entries may still be worked on by their previous owner, so callers should
 * run isStillMine() right before side effects and ack() afterwards. Both are
 * snapshots; two consumers can still process the same message.
 *
 * An instance is not safe for concurrent calls. Run one per worker.
 */
export class Consumer {
  private cursor: StreamId | null;
  private pendingCursor: StreamId = StreamId.MIN;
  private claimCursor: StreamId = StreamId.MIN;
  private closed = false;

  private constructor(
    private redis: StreamCommands,
    readonly config: ConsumerConfig,
    private ownsConnection: boolean,
    private logger: Logger,
    private onClose?: (consumer: Consumer) => void
  ) {
    const start = config.startFrom;
    this.cursor = start === 'only-future' ? null : start === 'beginning' ? StreamId.MIN : start;
  }

  /**
   * Validate the config and make sure the group exists
   */
  static async create(
    redis: StreamCommands,
    config: ConsumerConfig,
    opts: ConsumerOptions = {}
  ): Promise<StreamResult<Consumer>> {
    const parsed = parseConsumerConfig(config);
    if (!parsed.ok) return parsed;

    const cfg = parsed.value;
    const logger = (opts.logger ?? new Logger('consumer')).child({
      stream: cfg.streamName,
      group: cfg.groupName,
      consumer: cfg.consumerName,
    });

    const created = await attempt('XGROUP CREATE', () =>
      redis.xgroup('CREATE', cfg.streamName, cfg.groupName, groupStartId(cfg.startFrom), 'MKSTREAM')
    );
    if (created.ok) {
      logger.debug('Consumer group created');
    } else if (created.error.kind === 'command' && created.error.message.includes('BUSYGROUP')) {
      logger.debug('Consumer group already exists');
    } else {
      logger.error(`Could not create consumer group: ${created.error.message}`);
      return created;
    }

    return ok(new Consumer(redis, cfg, opts.ownsConnection ?? false, logger, opts.onClose));
  }

  get identity(): GroupIdentity {
    const { streamName, groupName, consumerName } = this.config;
    return { streamName, groupName, consumerName };
  }

  /**
   * Highest id returned by a new-message read so far
   */
  get lastDeliveredId(): StreamId | null {
    return this.cursor;
  }

  /**
   * Fetch up to `batchSize` messages: new first, then own pending, then claimed.
   * Only the new-message read may block.
   */
  async consume(): Promise<ConsumeResult> {
    const messages: StreamMessage[] = [];
    const seen = new Set<string>();

    for (const phase of PHASE_ORDER) {
      const remaining = this.config.batchSize - messages.length;
      if (remaining <= 0) break;

      const limit = Math.min(this.phaseCount(phase), remaining);
      if (limit === 0) continue;

      const startedAt = nowMs();
      const result = await this.runPhase(phase, limit, seen);
      if (!result.ok) {
        this.logger.error(`Phase ${phase} failed after ${elapsedMs(startedAt)}ms: ${result.error.message}`);
        return { ok: false, error: result.error, partial: { messages } };
      }

      for (const message of result.value.slice(0, limit)) {
        seen.add(message.id.toString());
        messages.push(message);
      }
      this.logger.debug(`Phase ${phase}: ${result.value.length} messages in ${elapsedMs(startedAt)}ms`);
    }

    const batch: ConsumeBatch = { messages };
    return { ok: true, value: batch };
  }

  /**
   * Ask the server who currently holds `id`.
   * A missing pending entry means someone already acked it.
   */
  async isStillMine(id: StreamId | string): Promise<StreamResult<OwnershipOutcome>> {
    const parsed = this.toId(id);
    if (!parsed.ok) return parsed;

    const outcome = await checkOwnership(this.redis, this.identity, parsed.value);
    if (outcome.ok && !outcome.value.belongsToCaller) {
      this.logger.debug(`Message ${parsed.value} is held by ${outcome.value.currentOwner ?? 'nobody'}`);
    }
    return outcome;
  }

  /**
   * Remove `id` from the group's pending list. Acking twice is not an error.
   */
  async ack(id: StreamId | string): Promise<StreamResult<AckReply>> {
    const parsed = this.toId(id);
    if (!parsed.ok) return parsed;

    const { streamName, groupName } = this.config;
    const reply = await attempt('XACK', () => this.redis.xack(streamName, groupName, parsed.value.toString()));
    if (!reply.ok) return reply;

    const count = decodeCount(reply.value, 'XACK');
    if (!count.ok) return count;

    return ok({ id: parsed.value, acked: count.value > 0 });
  }

  /**
   * Peek at the group's pending list without claiming anything
   */
  async peekPending(limit: number = 10): Promise<StreamResult<PendingEntry[]>> {
    if (!Number.isInteger(limit) || limit <= 0) {
      return fail(new InvalidArgumentError(`limit must be a positive integer, got ${limit}`));
    }

    const { streamName, groupName } = this.config;
    const reply = await attempt('XPENDING', () => this.redis.xpending(streamName, groupName, '-', '+', limit));
    if (!reply.ok) return reply;

    return decodePendingEntries(reply.value);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      if (this.ownsConnection) {
        await this.redis.quit();
      }
    } finally {
      this.onClose?.(this);
    }
  }

  private phaseCount(phase: ConsumePhase): number {
    switch (phase) {
      case 'new':
        return this.config.newMessages.count;
      case 'pending':
        return this.config.pendingMessages.count;
      case 'claimed':
        return this.config.claimMessages.count;
    }
  }

  private runPhase(phase: ConsumePhase, limit: number, seen: ReadonlySet<string>): Promise<StreamResult<StreamMessage[]>> {
    switch (phase) {
      case 'new':
        return this.readNew(limit);
      case 'pending':
        return this.readOwnPending(limit, seen);
      case 'claimed':
        return this.claimIdle(limit, seen);
    }
  }

  private async readNew(limit: number): Promise<StreamResult<StreamMessage[]>> {
    const { streamName, groupName, consumerName, newMessages } = this.config;
    const args: RedisArg[] = ['GROUP', groupName, consumerName, 'COUNT', limit];
    if (newMessages.blockMs > 0) {
      args.push('BLOCK', newMessages.blockMs);
    }
    args.push('STREAMS', streamName, '>');

    const reply = await attempt('XREADGROUP', () => this.redis.xreadgroup(...args));
    if (!reply.ok) return reply;

    const entries = decodeReadReply(reply.value, streamName, this.logger);
    if (!entries.ok) return entries;

    const messages: StreamMessage[] = [];
    for (const entry of this.withPayload(entries.value)) {
      if (this.cursor && !entry.id.isAfter(this.cursor)) {
        this.logger.warn(`New entry ${entry.id} is not after ${this.cursor}`);
      }
      this.cursor = this.cursor ? StreamId.max(this.cursor, entry.id) : entry.id;
      messages.push({ id: entry.id, fields: entry.fields, source: 'new', deliveryCount: 1 });
    }
    return ok(messages);
  }

  /**
   * Re-read entries already delivered to this consumer name, paging through
   * its pending list across calls.
   */
  private async readOwnPending(limit: number, seen: ReadonlySet<string>): Promise<StreamResult<StreamMessage[]>> {
    // entries delivered earlier in this call are in our pending list too
    const count = limit + seen.size;

    let entries = await this.readPendingPage(this.pendingCursor, count);
    if (entries.ok && entries.value.length === 0 && !this.pendingCursor.equals(StreamId.MIN)) {
      // the last page ended at the tail; start over
      this.pendingCursor = StreamId.MIN;
      entries = await this.readPendingPage(this.pendingCursor, count);
    }
    if (!entries.ok) return entries;

    const page = entries.value;
    const messages: StreamMessage[] = [];
    let scanned = 0;
    let firstSeen = -1;
    for (const entry of page) {
      if (messages.length >= limit) break;
      scanned++;
      if (seen.has(entry.id.toString())) {
        if (firstSeen < 0) firstSeen = scanned - 1;
        continue;
      }
      if (entry.fields === null) {
        this.warnDeleted(entry.id);
        continue;
      }
      messages.push({ id: entry.id, fields: entry.fields, source: 'pending', deliveryCount: null });
    }

    // never move past an entry skipped only because this call already returned it
    const pageDone = scanned === page.length && page.length < count;
    if (pageDone) {
      this.pendingCursor = StreamId.MIN;
    } else if (firstSeen >= 0) {
      this.pendingCursor = firstSeen > 0 ? page[firstSeen - 1].id : this.pendingCursor;
    } else {
      this.pendingCursor = page[scanned - 1].id;
    }
    return ok(messages);
  }

  private async readPendingPage(after: StreamId, count: number): Promise<StreamResult<RawEntry[]>> {
    const { streamName, groupName, consumerName } = this.config;
    const reply = await attempt('XREADGROUP', () =>
      this.redis.xreadgroup('GROUP', groupName, consumerName, 'COUNT', count, 'STREAMS', streamName, after.toString())
    );
    if (!reply.ok) return reply;

    return decodeReadReply(reply.value, streamName, this.logger);
  }

  /**
   * Claim entries idle for at least `minIdleMs`, whoever holds them.
   * XCLAIM re-checks the idle time, so an entry touched after the scan stays put.
   */
  private async claimIdle(limit: number, seen: ReadonlySet<string>): Promise<StreamResult<StreamMessage[]>> {
    const { streamName, groupName, consumerName, claimMessages } = this.config;
    const count = limit + seen.size;

    const scan = await attempt('XPENDING', () =>
      this.redis.xpending(
        streamName,
        groupName,
        'IDLE',
        claimMessages.minIdleMs,
        this.claimCursor.toString(),
        '+',
        count
      )
    );
    if (!scan.ok) return scan;

    const pending = decodePendingEntries(scan.value);
    if (!pending.ok) return pending;

    const candidates: PendingEntry[] = [];
    let scanned = 0;
    for (const entry of pending.value) {
      if (candidates.length >= limit) break;
      scanned++;
      if (!seen.has(entry.id.toString())) candidates.push(entry);
    }

    // wrap to the start once a short page has been fully scanned
    const lastScanned = pending.value[scanned - 1];
    const pageDone = scanned === pending.value.length && pending.value.length < count;
    this.claimCursor = lastScanned && !pageDone ? lastScanned.id.next() : StreamId.MIN;

    if (candidates.length === 0) {
      return ok([]);
    }

    const reply = await attempt('XCLAIM', () =>
      this.redis.xclaim(
        streamName,
        groupName,
        consumerName,
        claimMessages.minIdleMs,
        ...candidates.map((entry) => entry.id.toString())
      )
    );
    if (!reply.ok) return reply;

    const claimed = decodeClaimReply(reply.value);
    if (!claimed.ok) return claimed;

    const scannedById = new Map(candidates.map((entry) => [entry.id.toString(), entry]));
    const messages: StreamMessage[] = [];
    for (const entry of this.withPayload(claimed.value)) {
      const before = scannedById.get(entry.id.toString());
      if (before && before.owner !== consumerName) {
        this.logger.debug(`Claimed ${entry.id} from ${before.owner} after ${before.idleMs}ms idle`);
      }
      messages.push({
        id: entry.id,
        fields: entry.fields,
        source: 'claimed',
        deliveryCount: before ? before.deliveryCount + 1 : null,
      });
    }
    return ok(messages);
  }

  private *withPayload(entries: RawEntry[]): Generator<{ id: StreamId; fields: Map<string, string> }> {
    for (const entry of entries) {
      if (entry.fields === null) {
        this.warnDeleted(entry.id);
        continue;
      }
      yield { id: entry.id, fields: entry.fields };
    }
  }

  private warnDeleted(id: StreamId): void {
    this.logger.warn(`Entry ${id} is pending but its payload was deleted`);
  }

  private toId(id: StreamId | string): StreamResult<StreamId> {
    if (id instanceof StreamId) {
      return ok(id);
    }
    const parsed = StreamId.tryParse(id);
    return parsed ? ok(parsed) : fail(new InvalidArgumentError(`Invalid stream id: "${id}"`));
  }
}
