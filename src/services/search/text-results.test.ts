import { parseLineResults, parseToolTextResults } from './text-results';

test('Brave-shaped JSON blocks are read', () => {
  const block = JSON.stringify({ web: { results: [{ title: 'A', url: 'https://a.example', description: 'about a' }] } });
  expect(parseToolTextResults([block])).toEqual([{ title: 'A', url: 'https://a.example', description: 'about a' }]);
});

test('link/snippet aliases are accepted and URL-less entries dropped', () => {
  const block = '[{"title":"B","link":"https://b.example","snippet":"about b"},{"title":"no url"}]';
  expect(parseToolTextResults([block])).toEqual([{ title: 'B', url: 'https://b.example', description: 'about b' }]);
});

test('the line format starts a record at every title and joins wrapped descriptions', () => {
  const block = [
    'Title: One',
    'URL: https://one.example',
    'Description: first line',
    'continued here',
    '',
    'Title: Two',
    'URL: https://two.example',
    'Description: second',
  ].join('\n');
  expect(parseLineResults(block)).toEqual([
    { title: 'One', url: 'https://one.example', description: 'first line continued here' },
    { title: 'Two', url: 'https://two.example', description: 'second' },
  ]);
});

test('broken JSON falls back to the line format', () => {
  expect(parseToolTextResults(['{not json', 'Title: C\nURL: https://c.example'])).toEqual([
    { title: 'C', url: 'https://c.example', description: '' },
  ]);
});
