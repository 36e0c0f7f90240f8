import { countScripts, matchesLanguage } from './language-variant';

test('traditional text matches zh-Hant, simplified text does not', () => {
  expect(matchesLanguage('這是今天的新聞', 'zh-Hant')).toBe(true);
  expect(matchesLanguage('这是今天的新闻', 'zh-Hant')).toBe(false);
  expect(matchesLanguage('这是今天的新闻', 'zh-Hans')).toBe(true);
  expect(matchesLanguage('這是今天的新聞', 'zh-Hans')).toBe(false);
});

test('URLs and citation markers do not count', () => {
  const counts = countScripts('這是新聞 [1] https://example.com/这个');
  expect(counts.simplified).toBe(0);
  expect(counts.traditional).toBe(2);
  expect(counts.latin).toBe(0);
});

test('English allows a small share of Han characters', () => {
  expect(matchesLanguage('Taiwan stocks rose today on chip demand.', 'en')).toBe(true);
  expect(matchesLanguage('台股今天上漲 stocks', 'en')).toBe(false);
});

test('Chinese variants need Han characters', () => {
  expect(matchesLanguage('Hello world', 'zh-Hant')).toBe(false);
});

test('text without letters matches any language', () => {
  expect(matchesLanguage('2026-10-18 [1]', 'zh-Hant')).toBe(true);
  expect(matchesLanguage('2026-10-18 [1]', 'en')).toBe(true);
});
