import { Redis } from 'ioredis';
import { createSubscriberClient } from '../../config/redis';
import { EventHandlingResult, handleClassificationEvent } from './ClassificationEventHandler';

export interface EventSubscriberOptions {
  channel: string;
  redisUrl?: string;
}

/**
 * Listens on the classification channel with a dedicated Redis connection
 * and runs the event handler for each message
 */
export class ClassificationEventSubscriber {
  private redis: Redis | null = null;

  constructor(
    private readonly options: EventSubscriberOptions,
    private readonly handler: (payload: string) => EventHandlingResult = handleClassificationEvent
  ) {}

  isRunning(): boolean {
    return this.redis !== null;
  }

  async start(): Promise<void> {
    if (this.redis) {
      return;
    }

    const redis = createSubscriberClient(this.options.redisUrl);
    redis.on('message', (channel: string, message: string) => {
      if (channel === this.options.channel) {
        this.handler(message);
      }
    });

    try {
      await redis.subscribe(this.options.channel);
    } catch (error) {
      redis.disconnect();
      throw error;
    }

    this.redis = redis;
    console.log(`✅ [EVENTS] Subscribed to ${this.options.channel}`);
  }

  async stop(): Promise<void> {
    if (!this.redis) {
      return;
    }

    const redis = this.redis;
    this.redis = null;
    await redis.unsubscribe(this.options.channel);
    await redis.quit();
    console.log(`[EVENTS] Unsubscribed from ${this.options.channel}`);
  }
}
