import { PersistenceError } from '@/services/errors';
import { RedisTurnStore, type RedisCommands } from './RedisTurnStore';

/** Lists and strings in a Map, with Redis range semantics. */
class FakeRedis implements RedisCommands {
  readonly lists = new Map<string, string[]>();
  readonly strings = new Map<string, string>();
  down = false;
  quitCalled = false;

  private guard(): void {
    if (this.down) throw new Error('connect ECONNREFUSED');
  }

  async rpush(key: string, ...values: string[]): Promise<number> {
    this.guard();
    const list = [...(this.lists.get(key) ?? []), ...values];
    this.lists.set(key, list);
    return list.length;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    this.guard();
    const list = this.lists.get(key) ?? [];
    const from = start < 0 ? Math.max(0, list.length + start) : start;
    const to = stop < 0 ? list.length + stop : stop;
    return list.slice(from, to + 1);
  }

  async get(key: string): Promise<string | null> {
    this.guard();
    return this.strings.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<string> {
    this.guard();
    this.strings.set(key, value);
    return 'OK';
  }

  async del(key: string): Promise<number> {
    this.guard();
    return this.strings.delete(key) || this.lists.delete(key) ? 1 : 0;
  }

  async quit(): Promise<string> {
    this.quitCalled = true;
    return 'OK';
  }
}

describe('RedisTurnStore', () => {
  test('keeps turns as JSON in a per-chat list and reads the tail', async () => {
    const redis = new FakeRedis();
    const store = new RedisTurnStore(redis);
    for (const n of [1, 2, 3]) {
      await store.appendTurn('42', { role: 'user', content: `m${n}`, timestamp: `2026-10-18T08:00:0${n}.000Z` });
    }
    redis.lists.get('chat:42:turns')?.push('not json');

    expect(redis.lists.get('chat:42:turns')?.[0]).toBe(
      '{"role":"user","content":"m1","timestamp":"2026-10-18T08:00:01.000Z"}',
    );
    expect((await store.recentTurns('42', 3)).map((t) => t.content)).toEqual(['m2', 'm3']);
    expect(await store.recentTurns('42', 0)).toEqual([]);
  });

  test('profiles merge, read back and clear', async () => {
    const redis = new FakeRedis();
    const store = new RedisTurnStore(redis);

    await store.mergeProfile('42', { preferred_language: 'en' });
    await store.mergeProfile('42', { prefer_links: true });

    expect(await store.getProfile('42')).toEqual({ preferred_language: 'en', prefer_links: true });
    expect(await store.clearProfile('42')).toBe(true);
    expect(await store.getProfile('42')).toEqual({});
  });

  test('connection failures surface as PersistenceError', async () => {
    const redis = new FakeRedis();
    redis.down = true;
    const store = new RedisTurnStore(redis);

    await expect(store.getProfile('42')).rejects.toMatchObject({ name: 'PersistenceError', operation: 'read_profile' });
    await expect(store.recentTurns('42', 4)).rejects.toBeInstanceOf(PersistenceError);
  });

  test('close quits the client', async () => {
    const redis = new FakeRedis();
    await new RedisTurnStore(redis).close();
    expect(redis.quitCalled).toBe(true);
  });
});
