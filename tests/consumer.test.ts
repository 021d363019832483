import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Consumer, type ConsumerOptions } from '../src/streams/consumer';
import { Producer } from '../src/streams/producer';
import { Logger } from '../src/core/logger';
import type { ConsumerConfig } from '../src/streams/policies';
import type { StreamMessage } from '../src/streams/types';
import { FakeStreamServer, ReplyError, type FakeConnection } from './support/fake-stream-server';

const T = 1_700_000_000_000;
const id = (seq: number, ms: number = T) => `${ms}-${seq}`;

const config = (overrides: Partial<ConsumerConfig> = {}): ConsumerConfig => ({
  streamName: 'orders',
  groupName: 'billing',
  consumerName: 'c1',
  startFrom: 'beginning',
  batchSize: 10,
  newMessages: { count: 10, blockMs: 0 },
  pendingMessages: { count: 10 },
  claimMessages: { count: 10, minIdleMs: 1000 },
  ...overrides,
});

const ids = (messages: StreamMessage[]) => messages.map((message) => message.id.toString());
const sources = (messages: StreamMessage[]) => messages.map((message) => message.source);

describe('Consumer', () => {
  let server: FakeStreamServer;

  async function consumer(
    overrides: Partial<ConsumerConfig> = {},
    options: ConsumerOptions = {},
    connection: FakeConnection = server.connect()
  ): Promise<Consumer> {
    const result = await Consumer.create(connection, config(overrides), options);
    if (!result.ok) throw result.error;
    return result.value;
  }

  async function seed(...values: string[]): Promise<void> {
    const connection = server.connect();
    for (const value of values) {
      await connection.xadd('orders', '*', 'n', value);
    }
  }

  async function consumeOk(c: Consumer): Promise<StreamMessage[]> {
    const result = await c.consume();
    if (!result.ok) throw result.error;
    return result.value.messages;
  }

  beforeEach(() => {
    server = new FakeStreamServer(T);
  });

  describe('create', () => {
    it('creates the group and tolerates an existing one', async () => {
      await consumer();
      await consumer({ consumerName: 'c2' });

      const calls = server.callsOf('XGROUP');
      expect(calls).toHaveLength(2);
      expect(calls[0].args).toEqual(['CREATE', 'orders', 'billing', '0-0', 'MKSTREAM']);
    });

    it('starts an only-future group at the current tail', async () => {
      await seed('a', 'b');
      const c = await consumer({ startFrom: 'only-future' });

      expect(server.callsOf('XGROUP')[0].args[3]).toBe('$');
      expect(c.lastDeliveredId).toBeNull();
      expect(await consumeOk(c)).toEqual([]);

      await seed('c');
      expect(ids(await consumeOk(c))).toEqual([id(2)]);
      expect(c.lastDeliveredId?.toString()).toBe(id(2));
    });

    it('rejects an invalid config before sending anything', async () => {
      const result = await Consumer.create(server.connect(), config({ groupName: '' }));
      expect(result.ok || result.error.kind).toBe('invalid-argument');
      expect(server.calls).toHaveLength(0);
    });

    it('fails when the group cannot be created', async () => {
      server.failNext('XGROUP');
      const result = await Consumer.create(server.connect(), config());
      expect(result.ok || result.error.kind).toBe('connection');
      expect(result.ok || result.error.message).toBe('XGROUP CREATE: read ECONNRESET');
    });
  });

  describe('consume', () => {
    it('returns never-delivered entries first', async () => {
      await seed('a', 'b', 'c');
      const c = await consumer();

      const messages = await consumeOk(c);
      expect(ids(messages)).toEqual([id(0), id(1), id(2)]);
      expect(sources(messages)).toEqual(['new', 'new', 'new']);
      expect(messages.map((m) => m.deliveryCount)).toEqual([1, 1, 1]);
      expect(messages[0].fields).toEqual(new Map([['n', 'a']]));
      expect(c.lastDeliveredId?.toString()).toBe(id(2));
    });

    it('over-asks later phases by what it already holds', async () => {
      await seed('a', 'b', 'c');
      const c = await consumer();
      await consumeOk(c);

      expect(server.callsOf('XREADGROUP').map((call) => call.args)).toEqual([
        ['GROUP', 'billing', 'c1', 'COUNT', '10', 'STREAMS', 'orders', '>'],
        ['GROUP', 'billing', 'c1', 'COUNT', '10', 'STREAMS', 'orders', '0-0'],
      ]);
      expect(server.callsOf('XPENDING')[0].args).toEqual(['orders', 'billing', 'IDLE', '1000', '0-0', '+', '10']);
    });

    it('stops once the batch is full', async () => {
      await seed('a', 'b', 'c', 'd', 'e');
      const c = await consumer({ batchSize: 3 });

      expect(ids(await consumeOk(c))).toEqual([id(0), id(1), id(2)]);
      expect(server.callsOf('XREADGROUP')).toHaveLength(1);
      expect(server.callsOf('XREADGROUP')[0].args[4]).toBe('3');
      expect(server.callsOf('XPENDING')).toHaveLength(0);
    });

    it('blocks only when blockMs is positive', async () => {
      const c = await consumer({ newMessages: { count: 10, blockMs: 500 } });

      expect(await consumeOk(c)).toEqual([]);
      expect(server.callsOf('XREADGROUP')[0].args).toEqual([
        'GROUP',
        'billing',
        'c1',
        'COUNT',
        '10',
        'BLOCK',
        '500',
        'STREAMS',
        'orders',
        '>',
      ]);
      expect(server.now()).toBe(T + 500);
    });

    it('skips phases with a zero count', async () => {
      await seed('a');
      const c = await consumer({ pendingMessages: { count: 0 }, claimMessages: { count: 0, minIdleMs: 1000 } });

      expect(ids(await consumeOk(c))).toEqual([id(0)]);
      expect(server.callsOf('XREADGROUP')).toHaveLength(1);
      expect(server.callsOf('XPENDING')).toHaveLength(0);
    });

    it('claims idle entries from other consumers after the new ones', async () => {
      await seed('a', 'b');
      const c1 = await consumer({ pendingMessages: { count: 0 } });
      await consumeOk(c1);

      server.advance(2000);
      await seed('c');
      const c2 = await consumer({ consumerName: 'c2' });
      const messages = await consumeOk(c2);

      expect(ids(messages)).toEqual([id(0, T + 2000), id(0), id(1)]);
      expect(sources(messages)).toEqual(['new', 'claimed', 'claimed']);
      expect(messages.map((m) => m.deliveryCount)).toEqual([1, 2, 2]);
      expect(server.callsOf('XCLAIM')[0].args).toEqual(['orders', 'billing', 'c2', '1000', id(0), id(1)]);
      expect(server.pendingOf('orders', 'billing').map((record) => record.owner)).toEqual(['c2', 'c2', 'c2']);
    });

    it('orders phases new, then own pending, then claimed', async () => {
      await seed('a');
      const c1 = await consumer({ pendingMessages: { count: 0 } });
      await consumeOk(c1);

      await seed('b');
      const earlier = await consumer({ consumerName: 'c2', pendingMessages: { count: 0 } });
      await consumeOk(earlier);

      server.advance(2000);
      await seed('c');
      const c2 = await consumer({ consumerName: 'c2', batchSize: 2 });

      const first = await consumeOk(c2);
      expect(ids(first)).toEqual([id(0, T + 2000), id(1)]);
      expect(sources(first)).toEqual(['new', 'pending']);

      const second = await consumeOk(c2);
      expect(ids(second)).toEqual([id(0, T + 2000), id(0)]);
      expect(sources(second)).toEqual(['pending', 'claimed']);
    });

    it('never claims below the idle threshold', async () => {
      await seed('a');
      const c1 = await consumer({ pendingMessages: { count: 0 } });
      await consumeOk(c1);

      server.advance(999);
      const c2 = await consumer({ consumerName: 'c2' });
      expect(await consumeOk(c2)).toEqual([]);
      expect(server.callsOf('XCLAIM')).toHaveLength(0);

      server.advance(1);
      const claimed = await consumeOk(c2);
      expect(ids(claimed)).toEqual([id(0)]);
      expect(claimed[0].source).toBe('claimed');
      expect(claimed[0].deliveryCount).toBe(2);
    });

    it('pages through its own pending entries across calls', async () => {
      await seed('a', 'b', 'c');
      const c = await consumer({
        batchSize: 2,
        newMessages: { count: 2, blockMs: 0 },
        pendingMessages: { count: 2 },
        claimMessages: { count: 0, minIdleMs: 0 },
      });

      expect(ids(await consumeOk(c))).toEqual([id(0), id(1)]);

      const second = await consumeOk(c);
      expect(ids(second)).toEqual([id(2), id(0)]);
      expect(sources(second)).toEqual(['new', 'pending']);
      expect(second[1].deliveryCount).toBeNull();

      expect(ids(await consumeOk(c))).toEqual([id(1), id(2)]);
      // the list was walked to its tail, so the next page starts over
      expect(ids(await consumeOk(c))).toEqual([id(0), id(1)]);
      expect(ids(await consumeOk(c))).toEqual([id(2)]);
    });

    it('returns its pending entries on every call after delivering them as new', async () => {
      await seed('a', 'b');
      const c = await consumer({
        batchSize: 5,
        newMessages: { count: 5, blockMs: 0 },
        pendingMessages: { count: 5 },
        claimMessages: { count: 0, minIdleMs: 0 },
      });

      const first = await consumeOk(c);
      expect(ids(first)).toEqual([id(0), id(1)]);
      expect(sources(first)).toEqual(['new', 'new']);

      for (let call = 0; call < 3; call++) {
        const again = await consumeOk(c);
        expect(ids(again)).toEqual([id(0), id(1)]);
        expect(sources(again)).toEqual(['pending', 'pending']);
      }
      expect(server.pendingOf('orders', 'billing')).toHaveLength(2);
    });

    it('recovers its pending entries after a restart and skips deleted payloads', async () => {
      await seed('a', 'b');
      const before = await consumer({ pendingMessages: { count: 0 } });
      await consumeOk(before);
      server.deleteEntry('orders', id(1));

      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const after = await consumer({}, { logger: new Logger('consumer', 'warn') });
      const messages = await consumeOk(after);

      expect(ids(messages)).toEqual([id(0)]);
      expect(messages[0]).toMatchObject({ source: 'pending', deliveryCount: null });
      expect(messages[0].fields).toEqual(new Map([['n', 'a']]));
      expect(warn).toHaveBeenCalledWith(
        `[consumer] [consumer:c1][group:billing][stream:orders] Entry ${id(1)} is pending but its payload was deleted`
      );
    });

    it('hands back earlier phases when a later one fails', async () => {
      await seed('a', 'b');
      const c = await consumer();
      server.failNext('XPENDING');

      const result = await c.consume();
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('connection');
      expect(result.error.message).toBe('XPENDING: read ECONNRESET');
      expect(ids(result.partial.messages)).toEqual([id(0), id(1)]);
    });

    it('reports a first-phase failure with nothing partial', async () => {
      const c = await consumer();
      server.failNext('XREADGROUP', new ReplyError("NOGROUP No such key 'orders'"));

      const result = await c.consume();
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('command');
      expect(result.partial.messages).toEqual([]);
    });
  });

  describe('ownership and ack', () => {
    it('sees a claim by another consumer', async () => {
      await seed('a');
      const c1 = await consumer({ pendingMessages: { count: 0 } });
      await consumeOk(c1);
      server.advance(1000);
      const c2 = await consumer({ consumerName: 'c2' });
      await consumeOk(c2);

      const mine = await c1.isStillMine(id(0));
      if (!mine.ok) throw mine.error;
      expect(mine.value).toMatchObject({
        belongsToCaller: false,
        currentOwner: 'c2',
        idleMs: 0,
        deliveryCount: 2,
      });
      expect(typeof mine.value.observedAt).toBe('number');

      const theirs = await c2.isStillMine(id(0));
      expect(theirs.ok && theirs.value.belongsToCaller).toBe(true);
    });

    it('acks once and reports the repeat as a no-op', async () => {
      await seed('a');
      const c = await consumer();
      await consumeOk(c);

      const first = await c.ack(id(0));
      const second = await c.ack(id(0));
      expect(first.ok && first.value.acked).toBe(true);
      expect(second.ok && second.value.acked).toBe(false);

      const after = await c.isStillMine(id(0));
      if (!after.ok) throw after.error;
      expect(after.value).toMatchObject({
        belongsToCaller: false,
        currentOwner: null,
        idleMs: null,
        deliveryCount: null,
      });
    });

    it('rejects malformed ids locally', async () => {
      const c = await consumer();
      const ack = await c.ack('not-an-id');
      const check = await c.isStillMine('not-an-id');

      expect(ack.ok || ack.error.message).toBe('Invalid stream id: "not-an-id"');
      expect(check.ok || check.error.kind).toBe('invalid-argument');
      expect(server.callsOf('XACK')).toHaveLength(0);
    });
  });

  describe('peekPending', () => {
    it('lists the pending entries with idle times', async () => {
      await seed('a', 'b');
      const c = await consumer({ pendingMessages: { count: 0 } });
      await consumeOk(c);
      server.advance(300);

      const result = await c.peekPending();
      if (!result.ok) throw result.error;
      expect(result.value.map((entry) => ({ ...entry, id: entry.id.toString() }))).toEqual([
        { id: id(0), owner: 'c1', idleMs: 300, deliveryCount: 1 },
        { id: id(1), owner: 'c1', idleMs: 300, deliveryCount: 1 },
      ]);
      expect(server.callsOf('XPENDING').at(-1)?.args).toEqual(['orders', 'billing', '-', '+', '10']);
    });

    it('rejects a non-positive limit', async () => {
      const c = await consumer();
      const result = await c.peekPending(0);
      expect(result.ok || result.error.message).toBe('limit must be a positive integer, got 0');
    });
  });

  describe('close', () => {
    it('quits the connection only when it owns it', async () => {
      const owned = server.connect();
      const borrowed = server.connect();
      await (await consumer({}, { ownsConnection: true }, owned)).close();
      await (await consumer({ consumerName: 'c2' }, {}, borrowed)).close();

      expect(owned.closed).toBe(true);
      expect(borrowed.closed).toBe(false);
    });
  });

  it('delivers, verifies and acks a single message', async () => {
    const producer = Producer.create(server.connect(), { streamName: 'S', maxLen: null });
    if (!producer.ok) throw producer.error;
    const appended = await producer.value.append({ k: 'v' });
    if (!appended.ok) throw appended.error;

    const a = await consumer({ streamName: 'S', groupName: 'G', consumerName: 'A' });
    const messages = await consumeOk(a);
    expect(messages).toHaveLength(1);
    expect(messages[0].id.equals(appended.value)).toBe(true);
    expect(messages[0].fields).toEqual(new Map([['k', 'v']]));

    const before = await a.isStillMine(appended.value);
    expect(before.ok && before.value.belongsToCaller).toBe(true);
    const ack = await a.ack(appended.value);
    expect(ack.ok && ack.value.acked).toBe(true);

    const b = await consumer({ streamName: 'S', groupName: 'G', consumerName: 'B' });
    for (const c of [a, b]) {
      const after = await c.isStillMine(appended.value);
      expect(after.ok && after.value.belongsToCaller).toBe(false);
    }
  });

  it('runs a produce, consume, check, ack cycle', async () => {
    const producer = Producer.create(server.connect(), { streamName: 'orders', maxLen: null });
    if (!producer.ok) throw producer.error;
    const appended = await producer.value.appendBatch([{ n: '1' }, { n: '2' }, { n: '3' }]);
    if (!appended.ok) throw appended.error;

    const c = await consumer();
    const messages = await consumeOk(c);
    expect(ids(messages)).toEqual(appended.value.map(String));

    for (const message of messages) {
      const check = await c.isStillMine(message.id);
      expect(check.ok && check.value.belongsToCaller).toBe(true);
      const ack = await c.ack(message.id);
      expect(ack.ok && ack.value.acked).toBe(true);
    }

    expect(await c.peekPending()).toEqual({ ok: true, value: [] });
    expect(await consumeOk(c)).toEqual([]);
  });
});
