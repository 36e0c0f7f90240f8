import { result } from '@/testing/fakes';
import { buildSourceDateHints, extractDates } from './date-hints';

const NOW = new Date('2026-10-18T08:00:00Z');

test('extractDates reads numeric, CJK and month-name dates in order', () => {
  expect(extractDates('Published 2026/2/18 and updated Feb 17, 2026', NOW)).toEqual(['2026-02-18', '2026-02-17']);
  expect(extractDates('2026年3月1日 報導，18 February 2026 首發', NOW)).toEqual(['2026-03-01', '2026-02-18']);
});

test('extractDates drops impossible and future dates', () => {
  expect(extractDates('on 2026-02-30', NOW)).toEqual([]);
  expect(extractDates('scheduled 2026-10-20', NOW)).toEqual([]);
  expect(extractDates('tomorrow 2026-10-19', NOW)).toEqual(['2026-10-19']);
});

test('buildSourceDateHints maps every source and allows the no-date marker when one is undated', () => {
  const results = [
    result(1, { title: '2026-02-18 Chip exports' }),
    result(2, { title: 'Rail strike', description: '2026年2月17日 報導' }),
    result(3, { title: 'Typhoon', description: 'no date here' }),
    result(4, { title: 'Markets', description: 'Feb 18, 2026 close' }),
    result(5, { title: 'Opinion', description: '' }),
  ];
  const pages = [
    { title: 'Chip exports', url: results[0].url, text: '' },
    { title: 'Rail strike', url: results[1].url, text: '' },
    { title: 'Typhoon', url: results[2].url, text: 'Updated 2026-02-16 09:00' },
  ];

  expect(buildSourceDateHints(results, pages, NOW)).toEqual({
    byIndex: { 1: '2026-02-18', 2: '2026-02-17', 3: '2026-02-16', 4: '2026-02-18', 5: '[none]' },
    allowed: ['2026-02-18', '2026-02-17', '2026-02-16', '[none]'],
  });
});

test('buildSourceDateHints leaves the marker out when every source is dated', () => {
  const hints = buildSourceDateHints([result(1, { title: '2026-10-17 A' })], [], NOW);
  expect(hints).toEqual({ byIndex: { 1: '2026-10-17' }, allowed: ['2026-10-17'] });
});
