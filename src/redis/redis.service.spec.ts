import { ConfigService } from '@nestjs/config';
import { RedisService } from './redis.service';

describe('RedisService (in-memory fallback)', () => {
  let redis: RedisService;

  beforeEach(() => {
    redis = new RedisService(new ConfigService({}));
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('stores and deletes values', async () => {
    await redis.set('k', 'v', 60);
    expect(await redis.get('k')).toBe('v');

    await redis.del('k');
    expect(await redis.get('k')).toBeNull();
  });

  it('expires values after their TTL', async () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    await redis.set('k', 'v', 10);

    jest.setSystemTime(new Date('2026-01-01T00:00:11Z'));
    expect(await redis.get('k')).toBeNull();
  });

  it('hands a lock to one holder at a time', async () => {
    const token = await redis.acquireLock('lock:u1', 5000);
    expect(token).not.toBeNull();
    expect(await redis.acquireLock('lock:u1', 5000)).toBeNull();

    if (token) await redis.releaseLock('lock:u1', token);
    expect(await redis.acquireLock('lock:u1', 5000)).not.toBeNull();
  });

  it('ignores a release from a token that no longer owns the lock', async () => {
    await redis.acquireLock('lock:u1', 5000);
    await redis.releaseLock('lock:u1', 'someone-else');
    expect(await redis.acquireLock('lock:u1', 5000)).toBeNull();
  });

  it('reports the fallback as healthy', async () => {
    expect(await redis.isHealthy()).toBe(true);
    expect(redis.getStatus()).toEqual({ connected: false, mode: 'fallback' });
  });

  it('fails hard without Redis in multi-instance mode', async () => {
    const strict = new RedisService(
      new ConfigService({ MULTI_INSTANCE: 'true' }),
    );
    await expect(strict.get('k')).rejects.toThrow(
      'Redis unavailable in multi-instance mode',
    );
    expect(await strict.isHealthy()).toBe(false);
  });
});
