import { lexicon } from '@/data/lexicon';
import { result } from '@/testing/fakes';
import { perSourceBulletFallback, staleLinkFallback } from './fallbacks';

test('staleLinkFallback lists titles and URLs under the header', () => {
  const results = [result(1), result(2, { url: '' }), result(3)];
  expect(staleLinkFallback(results)).toBe(
    `${lexicon.replies.staleFallbackHeader}\n\n` +
      '[1] Headline 1\nhttps://news1.example.com/story\n\n' +
      '[3] Headline 3\nhttps://news3.example.com/story',
  );
});

test('perSourceBulletFallback takes each summary lead and the source date', () => {
  const text = perSourceBulletFallback({
    summaries: [{ index: 1, title: 'Headline 1', domain: 'news1.example.com', text: '- 2026-10-01 Chip exports rise [4]\n- Second point [1]' }],
    results: [result(1), result(2)],
    dateHints: { byIndex: { 1: '2026-10-17' }, allowed: ['2026-10-17', '[none]'] },
    limit: 5,
  });
  expect(text).toBe('- 2026-10-17 Chip exports rise [1]\n- [none] Headline 2: Snippet 2 [2]');
});

test('perSourceBulletFallback puts already-cited sources last and respects the limit', () => {
  const text = perSourceBulletFallback({
    summaries: [],
    results: [result(1), result(2), result(3)],
    dateHints: { byIndex: {}, allowed: [] },
    limit: 2,
    deprioritize: [1],
  });
  expect(text).toBe('- [none] Headline 2: Snippet 2 [2]\n- [none] Headline 3: Snippet 3 [3]');
});

test('perSourceBulletFallback does not repeat a date the title already starts with', () => {
  const text = perSourceBulletFallback({
    summaries: [],
    results: [result(3, { title: '2026-10-13 H3' })],
    dateHints: { byIndex: { 1: '2026-10-13' }, allowed: ['2026-10-13'] },
    limit: 5,
  });
  expect(text).toBe('- 2026-10-13 H3: Snippet 3 [1]');
});
