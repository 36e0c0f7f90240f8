// src/services/validation/fallbacks.ts — answers composed straight from retrieval evidence, no model call
import { NO_DATE_MARKER, type SearchResult, type SourceDateHints, type SourceSummary } from '@/types/core';
import { lexicon } from '@/data/lexicon';
import { parseBullets, stripCitations, stripLeadingDate } from './bullets';

/** Listing used when the draft keeps presenting stale years as recent news. */
export function staleLinkFallback(results: SearchResult[], limit = 10): string {
  const lines: string[] = [];
  results.slice(0, limit).forEach((r, i) => {
    const url = r.url.trim();
    if (!url) return;
    lines.push(`[${i + 1}] ${r.title.trim() || url}\n${url}`);
  });
  return [lexicon.replies.staleFallbackHeader, ...lines].join('\n\n');
}

export interface PerSourceFallbackInput {
  summaries: SourceSummary[];
  results: SearchResult[];
  dateHints: SourceDateHints;
  /** Maximum bullets. */
  limit: number;
  /** Indices to put last, e.g. sources the previous answer already used. */
  deprioritize?: number[];
}

/**
 * One bullet per source: the first bullet of its summary (or its search
 * snippet when it has no summary), prefixed with its date hint and ending
 * in its own citation.
 */
export function perSourceBulletFallback(input: PerSourceFallbackInput): string {
  const { summaries, results, dateHints, limit } = input;
  const byIndex = new Map(summaries.map((s) => [s.index, s]));
  const late = new Set(input.deprioritize ?? []);

  const indices = results.map((_, i) => i + 1);
  const ordered = [...indices.filter((i) => !late.has(i)), ...indices.filter((i) => late.has(i))];

  const lines: string[] = [];
  for (const index of ordered) {
    if (lines.length >= limit) break;
    const summary = byIndex.get(index);
    const result = results[index - 1];
    let body = '';
    if (summary) {
      const [first] = parseBullets(summary.text);
      body = stripCitations(stripLeadingDate(first ?? summary.text.split('\n')[0] ?? ''));
    }
    if (!body) {
      const title = result.title.trim();
      const snippet = result.description.trim();
      body = stripLeadingDate([title, snippet].filter(Boolean).join(': '));
    }
    if (!body) continue;
    const date = dateHints.byIndex[index] ?? NO_DATE_MARKER;
    lines.push(`- ${date} ${body} [${index}]`);
  }
  return lines.join('\n');
}
