// src/services/validation/link-appendix.ts — source URLs appended after validation
import type { SearchResult } from '@/types/core';
import { lexicon } from '@/data/lexicon';
import { citedIndices } from './bullets';

const DEFAULT_NEWS_LINKS = 10;
const RAW_LINK_LIMIT = 5;

/**
 * `[i] url` lines for the indices the body cites, in ascending order; the
 * first ten sources when the body cites none.
 */
export function newsLinkBlock(body: string, results: SearchResult[]): string | null {
  let indices = citedIndices(body, results.length).sort((a, b) => a - b);
  if (indices.length === 0) {
    indices = results.slice(0, DEFAULT_NEWS_LINKS).map((_, i) => i + 1);
  }
  const lines = indices.flatMap((i) => {
    const url = results[i - 1].url.trim();
    return url ? [`[${i}] ${url}`] : [];
  });
  if (lines.length === 0) return null;
  return `${lexicon.replies.sourceLinksHeader}\n${lines.join('\n')}`;
}

export function rawLinkBlock(results: SearchResult[]): string | null {
  const urls = results.map((r) => r.url.trim()).filter(Boolean).slice(0, RAW_LINK_LIMIT);
  return urls.length > 0 ? urls.join('\n') : null;
}

export interface LinkAppendixOptions {
  isNews: boolean;
  wantsLinks: boolean;
}

export function appendSourceLinks(body: string, results: SearchResult[], options: LinkAppendixOptions): string {
  if (results.length === 0) return body;
  const block = options.isNews
    ? newsLinkBlock(body, results)
    : options.wantsLinks
      ? rawLinkBlock(results)
      : null;
  return block ? `${body.trimEnd()}\n\n${block}` : body;
}
