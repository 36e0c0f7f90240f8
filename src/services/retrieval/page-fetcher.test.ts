import type { PageFetcher } from './page-fetcher';
import { extractPageText, fetchPageText } from './page-fetcher';

const HTML =
  '<html><head><title>T</title><style>p{color:red}</style></head><body>' +
  '<script>var a = 1;</script><h1>Title</h1><p>Hello   world</p><noscript>enable js</noscript>' +
  '</body></html>';

function fetcherFor(body: string, contentType: string): PageFetcher & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async get(url: string) {
      calls.push(url);
      return { body, contentType };
    },
  };
}

test('extractPageText keeps visible block text, one line each', () => {
  expect(extractPageText(HTML, 100)).toBe('Title\nHello world');
  expect(extractPageText(HTML, 8)).toBe('Title\nHe');
});

test('fetchPageText never requests non-public URLs', async () => {
  const fetcher = fetcherFor(HTML, 'text/html');
  await expect(fetchPageText(fetcher, 'http://127.0.0.1/admin', 100)).resolves.toBe('');
  expect(fetcher.calls).toEqual([]);
});

test('fetchPageText drops non-text bodies and trims plain text', async () => {
  await expect(fetchPageText(fetcherFor('%PDF-1.7', 'application/pdf'), 'https://example.com/a.pdf', 100)).resolves.toBe('');
  await expect(
    fetchPageText(fetcherFor('  plain\t\ttext  body ', 'text/plain; charset=utf-8'), 'https://example.com/a.txt', 100),
  ).resolves.toBe('plain text body');
  await expect(fetchPageText(fetcherFor(HTML, 'text/html; charset=utf-8'), 'https://example.com/', 100)).resolves.toBe(
    'Title\nHello world',
  );
});

test('fetchPageText lets transport errors through', async () => {
  const failing: PageFetcher = {
    async get() {
      throw new Error('timeout of 12000ms exceeded');
    },
  };
  await expect(fetchPageText(failing, 'https://example.com/', 100)).rejects.toThrow('timeout');
});
