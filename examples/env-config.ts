/**
 * Example: a long-running worker configured from environment variables
 */

import { configFromEnv, StreamClient } from '../src/index';

async function main() {
  console.log('🚀 Starting worker with environment configuration\n');

  // REDIS_URL, REDIS_CLUSTER_NODES, STREAM_CONNECT_TIMEOUT_MS, LOG_LEVEL, ...
  const config = configFromEnv();
  if (!config.ok) throw config.error;

  console.log('Configuration loaded:');
  console.log('- Cluster mode:', Boolean(config.value.redis.clusterNodes?.length));
  console.log('- Connect timeout:', config.value.connectTimeoutMs, 'ms');
  console.log('');

  const init = await StreamClient.init(config.value);
  if (!init.ok) throw init.error;
  const client = init.value;

  const consumer = await client.consumer({
    streamName: process.env.STREAM_NAME || 'jobs',
    groupName: process.env.STREAM_GROUP || 'workers',
    consumerName: process.env.HOSTNAME || `worker-${process.pid}`,
    startFrom: 'only-future',
    batchSize: 20,
    newMessages: { count: 20, blockMs: 5000 },
    pendingMessages: { count: 10 },
    claimMessages: { count: 10, minIdleMs: 60000 },
  });
  if (!consumer.ok) throw consumer.error;

  let running = true;
  process.once('SIGINT', () => {
    running = false;
  });

  while (running) {
    const result = await consumer.value.consume();
    if (!result.ok) {
      console.error(`✗ ${result.error.kind}: ${result.error.message}`);
      await new Promise((resolve) => setTimeout(resolve, 1000));
      continue;
    }

    for (const message of result.value.messages) {
      const owned = await consumer.value.isStillMine(message.id);
      if (!owned.ok || !owned.value.belongsToCaller) continue;

      console.log(`✓ ${message.id} [${message.source}]`, Object.fromEntries(message.fields));
      await consumer.value.ack(message.id);
    }
  }

  // Health check
  const healthy = await client.ping();
  console.log('\n✓ Health check:', healthy ? 'PASS' : 'FAIL');

  await client.close();
  console.log('\n✓ Worker stopped');
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
