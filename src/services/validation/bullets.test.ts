import {
  citedIndices,
  leadingDateToken,
  limitBullets,
  parseBullets,
  stripCitations,
  stripLeadingDate,
  yearsIn,
} from './bullets';

test('parseBullets reads dash, star and numbered bullets only', () => {
  const text = 'Top stories:\n- 2026-10-17 Chip exports rise [1]\n* Rail strike ends\n1. Typhoon nears\nnot a bullet';
  expect(parseBullets(text)).toEqual(['2026-10-17 Chip exports rise [1]', 'Rail strike ends', 'Typhoon nears']);
});

test('leadingDateToken accepts bold and bracketed dates and the no-date marker', () => {
  expect(leadingDateToken('**2026-10-17** Chip exports rise')).toBe('2026-10-17');
  expect(leadingDateToken('(2026-10-17) Chip exports rise')).toBe('2026-10-17');
  expect(leadingDateToken('[none] Undated item')).toBe('[none]');
  expect(leadingDateToken('[NONE] Undated item')).toBe('[none]');
  expect(leadingDateToken('Chip exports rise 2026-10-17')).toBeNull();
});

test('stripLeadingDate removes the date and its separator', () => {
  expect(stripLeadingDate('**2026-10-17**: Chip exports rise [2]')).toBe('Chip exports rise [2]');
  expect(stripLeadingDate('[none] Undated item')).toBe('Undated item');
});

test('citedIndices keeps first-appearance order and ignores out-of-range markers', () => {
  expect(citedIndices('a [2] b [1] c [2] d [9] e [0]', 3)).toEqual([2, 1]);
});

test('stripCitations collapses the gaps markers leave', () => {
  expect(stripCitations('Chip exports rise [1] sharply [2]')).toBe('Chip exports rise sharply');
});

test('yearsIn finds distinct four-digit years', () => {
  expect(yearsIn('In 2023, then 2026 and 2023 again; order 12345')).toEqual([2023, 2026]);
});

test('limitBullets drops extra bullets with their continuation lines', () => {
  const text = 'Top items:\n- a\n  more a\n- b\n  more b\n- c\n\nBye';
  expect(limitBullets(text, 1)).toBe('Top items:\n- a\n  more a\nBye');
  expect(limitBullets(text, 5)).toBe(text);
});
