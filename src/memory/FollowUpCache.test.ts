import type { FollowUpContext } from '@/types/core';
import { result } from '@/testing/fakes';
import { FollowUpCache } from './FollowUpCache';

const MINUTE = 60 * 1000;

function context(query: string): FollowUpContext {
  return {
    tool: 'web_search',
    is_news: true,
    query,
    search_results: [result(1)],
    fetched_pages: [],
    source_date_hints: { byIndex: {}, allowed: [] },
    cited_indices: [],
    timestamp: '2026-10-18T08:00:00.000Z',
  };
}

describe('FollowUpCache', () => {
  let clock = 0;
  let cache: FollowUpCache;

  beforeEach(() => {
    clock = 0;
    cache = new FollowUpCache(30, 1000, () => clock);
  });

  afterEach(() => {
    cache.destroy();
  });

  test('an entry lives for the TTL', () => {
    cache.set('1', context('a'));
    clock = 29 * MINUTE;
    expect(cache.get('1')?.query).toBe('a');
    clock = 31 * MINUTE;
    expect(cache.get('1')).toBeNull();
  });

  test('each chat has one slot that set overwrites', () => {
    cache.set('1', context('a'));
    cache.set('1', context('b'));
    cache.set('2', context('c'));
    expect(cache.get('1')?.query).toBe('b');
    expect(cache.get('2')?.query).toBe('c');
    cache.delete('1');
    expect(cache.get('1')).toBeNull();
  });
});
