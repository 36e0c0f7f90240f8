// src/services/retrieval/page-fetcher.ts — fetch a public page and reduce it to plain text
import axios from 'axios';
import * as cheerio from 'cheerio';
import { isPublicHttpUrl } from './url-guard';

export interface PageFetcher {
  /** Raw body for an already-validated public URL. */
  get(url: string): Promise<{ body: string; contentType: string }>;
}

const BLOCK_ELEMENTS =
  'address, article, aside, blockquote, br, dd, div, dl, dt, figcaption, footer, h1, h2, h3, h4, h5, h6, header, hr, li, main, nav, ol, p, pre, section, table, td, th, tr, ul';

/** Strips script/style/noscript, collapses whitespace per line and truncates. */
export function extractPageText(html: string, maxChars: number): string {
  const $ = cheerio.load(html);
  $('script, style, noscript, template').remove();
  $(BLOCK_ELEMENTS).each((_, el) => {
    $(el).before('\n').after('\n');
  });
  const text = $('body')
    .text()
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
  return text.length > maxChars ? text.slice(0, maxChars) : text;
}

export class HttpPageFetcher implements PageFetcher {
  constructor(private readonly timeoutMs: number) {}

  async get(url: string): Promise<{ body: string; contentType: string }> {
    const res = await axios.get<string>(url, {
      timeout: this.timeoutMs,
      maxRedirects: 5,
      responseType: 'text',
      transformResponse: (data: unknown) => data,
      headers: { 'User-Agent': 'telegram-bot/1.0', Accept: 'text/html,text/plain;q=0.9,*/*;q=0.5' },
    });
    const contentType = String(res.headers['content-type'] ?? '');
    return { body: typeof res.data === 'string' ? res.data : '', contentType };
  }
}

/** '' for rejected URLs and non-text bodies; transport errors propagate. */
export async function fetchPageText(fetcher: PageFetcher, url: string, maxChars: number): Promise<string> {
  if (!isPublicHttpUrl(url)) return '';
  const { body, contentType } = await fetcher.get(url);
  if (contentType && !/text\/html|application\/xhtml|text\/plain/i.test(contentType)) return '';
  if (/text\/plain/i.test(contentType)) {
    const text = body.replace(/[ \t]+/g, ' ').trim();
    return text.length > maxChars ? text.slice(0, maxChars) : text;
  }
  return extractPageText(body, maxChars);
}
