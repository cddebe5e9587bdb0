import Redis from 'ioredis';
import { RedisModelStateStore } from './redis-model-state.store';

/**
 * In-process stand-in for the few Redis commands the store issues
 */
class FakeRedis {
  readonly data = new Map<string, string>();
  quit = jest.fn(async () => 'OK');

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<'OK'> {
    this.data.set(key, value);
    return 'OK';
  }
}

describe('RedisModelStateStore', () => {
  let redis: FakeRedis;
  let store: RedisModelStateStore;

  beforeEach(() => {
    redis = new FakeRedis();
    store = new RedisModelStateStore(redis as unknown as Redis);
  });

  it('should write the base as JSON under base:<location>', async () => {
    await store.setBase('Riverside', 94.5);

    expect(redis.data.get('base:Riverside')).toBe('{"base":94.5}');
    expect(await store.getBase('Riverside')).toBe(94.5);
  });

  it('should write sigma with its timestamp under sigma:<location>', async () => {
    await store.setSigma('Riverside', { sigma: 1.25, lastUpdated: '2024-03-31T02:00:00.000Z' });

    expect(redis.data.get('sigma:Riverside')).toBe(
      '{"sigma":1.25,"lastUpdated":"2024-03-31T02:00:00.000Z"}',
    );
    expect(await store.getSigma('Riverside')).toEqual({
      sigma: 1.25,
      lastUpdated: '2024-03-31T02:00:00.000Z',
    });
  });

  it('should return null for missing keys', async () => {
    expect(await store.getBase('Hilltop')).toBeNull();
    expect(await store.getSigma('Hilltop')).toBeNull();
  });

  it('should treat malformed values as absent', async () => {
    redis.data.set('base:Hilltop', 'not json');
    redis.data.set('sigma:Hilltop', '{"sigma":"high"}');

    expect(await store.getBase('Hilltop')).toBeNull();
    expect(await store.getSigma('Hilltop')).toBeNull();
  });

  it('should close the connection on module destroy', async () => {
    await store.onModuleDestroy();
    expect(redis.quit).toHaveBeenCalled();
  });
});
