import { ClassificationEventPublisher } from '../../../services/events/ClassificationEventPublisher';
import { ClassificationEventSubscriber } from '../../../services/events/ClassificationEventSubscriber';
import { closeRedisClient } from '../../../config/redis';
import { buildClassification } from '../../helpers/fixtures';

// Nothing listens on port 1, so every connection attempt is refused
const UNREACHABLE_REDIS_URL = 'redis://127.0.0.1:1';

describe('Classification events with Redis unreachable', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  afterAll(async () => {
    await closeRedisClient();
  });

  it('should settle a publish with null', async () => {
    const publisher = new ClassificationEventPublisher({
      enabled: true,
      channel: 'classification-events',
      redisUrl: UNREACHABLE_REDIS_URL
    });

    await expect(publisher.publish(buildClassification())).resolves.toBeNull();
  }, 15000);

  it('should reject subscriber start and stay stopped', async () => {
    const subscriber = new ClassificationEventSubscriber({
      channel: 'classification-events',
      redisUrl: UNREACHABLE_REDIS_URL
    });

    await expect(subscriber.start()).rejects.toThrow();
    expect(subscriber.isRunning()).toBe(false);
  }, 15000);
});
