/**
 * Basic usage example: produce a few orders, then work them off with a consumer
 */

import { StreamClient, type StreamMessage } from '../src/index';

async function handle(message: StreamMessage): Promise<void> {
  console.log(`Processing ${message.id} (${message.source}):`, Object.fromEntries(message.fields));
  await new Promise((resolve) => setTimeout(resolve, 100));
}

async function main() {
  const init = await StreamClient.init({
    redis: {
      url: process.env.REDIS_URL || 'redis://localhost:6379',
      keyPrefix: 'example:',
    },
    connectTimeoutMs: 5000,
  });
  if (!init.ok) throw init.error;
  const client = init.value;

  console.log('✓ Client connected');

  // Publish messages
  const producer = client.producer({ streamName: 'orders', maxLen: 10000 });
  if (!producer.ok) throw producer.error;

  const first = await producer.value.append({ orderId: 'ord-123', total: '99.99' });
  if (!first.ok) throw first.error;
  console.log('✓ Published message:', first.value.toString());

  const batch = await producer.value.appendBatch([
    { orderId: 'ord-124', total: '49.99' },
    { orderId: 'ord-125', total: '149.99' },
  ]);
  if (!batch.ok) throw batch.error;
  console.log('✓ Published batch:', batch.value.length, 'messages');

  // Consume messages
  console.log('\n--- Consuming Messages ---');
  const consumer = await client.consumer({
    streamName: 'orders',
    groupName: 'order-processor',
    consumerName: `worker-${process.pid}`,
    startFrom: 'beginning',
    batchSize: 10,
    newMessages: { count: 10, blockMs: 2000 },
    pendingMessages: { count: 10 },
    claimMessages: { count: 5, minIdleMs: 30000 },
  });
  if (!consumer.ok) throw consumer.error;

  const result = await consumer.value.consume();
  const messages = result.ok ? result.value.messages : result.partial.messages;
  if (!result.ok) {
    console.error('✗ Consume stopped early:', result.error.message);
  }

  for (const message of messages) {
    // another worker may have claimed it since it was read
    const owned = await consumer.value.isStillMine(message.id);
    if (!owned.ok || !owned.value.belongsToCaller) {
      console.log(`- Skipping ${message.id}, now held by ${owned.ok ? owned.value.currentOwner : 'unknown'}`);
      continue;
    }

    await handle(message);

    const ack = await consumer.value.ack(message.id);
    console.log(ack.ok && ack.value.acked ? '✓ Acknowledged' : '- Already acknowledged');
  }

  // Get stats
  const info = await client.streamInfo('orders');
  if (info.ok) {
    console.log('\nStream info:', {
      length: info.value.length,
      groups: info.value.groups,
      lastGeneratedId: info.value.lastGeneratedId.toString(),
    });
  }

  const consumers = await client.consumersInfo('orders', 'order-processor');
  if (consumers.ok) {
    for (const c of consumers.value) {
      console.log(`- ${c.name}: ${c.pending} pending, idle ${c.idleMs}ms`);
    }
  }

  // Cleanup
  await client.close();
  console.log('\n✓ Client closed');
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
