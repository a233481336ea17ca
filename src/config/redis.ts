import Redis, { RedisOptions } from 'ioredis';

let redisClient: Redis | null = null;

// Queued commands fail after one reconnect attempt instead of waiting for Redis forever
const EVENT_CONNECTION_OPTIONS: RedisOptions = {
  enableReadyCheck: false,
  maxRetriesPerRequest: 1,
  connectTimeout: 5000,
  lazyConnect: true
};

function attachListeners(client: Redis, role: string): Redis {
  client.on('error', (error) => {
    console.error(`Redis ${role} connection error:`, error);
  });

  client.on('connect', () => {
    console.log(`✅ Connected to Redis (${role})`);
  });

  return client;
}

/**
 * Get or create the shared Redis client used for publishing
 */
export function getRedisClient(redisUrl: string = process.env.REDIS_URL || 'redis://localhost:6379'): Redis {
  if (redisClient) {
    return redisClient;
  }

  redisClient = attachListeners(new Redis(redisUrl, EVENT_CONNECTION_OPTIONS), 'publisher');

  return redisClient;
}

/**
 * Create a dedicated connection for SUBSCRIBE; a subscribed connection
 * cannot issue other commands
 */
export function createSubscriberClient(redisUrl: string = process.env.REDIS_URL || 'redis://localhost:6379'): Redis {
  return attachListeners(new Redis(redisUrl, EVENT_CONNECTION_OPTIONS), 'subscriber');
}

/**
 * Close Redis client connection
 */
export async function closeRedisClient(): Promise<void> {
  if (redisClient) {
    const client = redisClient;
    redisClient = null;

    if (client.status === 'ready') {
      await client.quit();
    } else {
      client.disconnect();
    }
  }
}
