import { Redis } from 'ioredis';
import { getRedisClient } from '../../config/redis';
import { Classification } from '../../types/models';
import { classificationToEvent } from '../../models/transformers';

export interface EventPublisherOptions {
  enabled: boolean;
  channel: string;
  redisUrl?: string;
}

/**
 * Publishes classification events on a Redis channel. Delivery is
 * fire-and-forget: failures are logged and reported as null.
 */
export class ClassificationEventPublisher {
  private redis: Redis | null;

  constructor(private readonly options: EventPublisherOptions) {
    this.redis = options.enabled ? getRedisClient(options.redisUrl) : null;

    if (!this.redis) {
      console.log('[EVENTS] Publishing disabled');
    }
  }

  isEnabled(): boolean {
    return this.redis !== null;
  }

  getChannel(): string {
    return this.options.channel;
  }

  /**
   * Publish one event. Resolves to the number of subscribers that received
   * it, or null when publishing is disabled or failed.
   */
  async publish(classification: Classification): Promise<number | null> {
    if (!this.redis) {
      return null;
    }

    try {
      const payload = JSON.stringify(classificationToEvent(classification));
      const receivers = await this.redis.publish(this.options.channel, payload);
      console.log(`📤 [EVENTS] Published classification ${classification.clsId} to ${this.options.channel}`);
      return receivers;
    } catch (error) {
      console.error(`❌ [EVENTS] Failed to publish classification ${classification.clsId}:`, error);
      return null;
    }
  }

  /**
   * Publish a batch of events, returning how many were published
   */
  async publishBatch(classifications: Classification[]): Promise<number> {
    if (!this.redis || classifications.length === 0) {
      return 0;
    }

    const results = await Promise.all(classifications.map(classification => this.publish(classification)));
    const published = results.filter(result => result !== null).length;

    console.log(`📤 [EVENTS] Published ${published}/${classifications.length} classification events`);
    return published;
  }
}
