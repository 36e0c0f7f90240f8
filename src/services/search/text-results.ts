// src/services/search/text-results.ts — normalize tool text blocks into SearchResult[]
import { z } from 'zod';
import type { SearchResult } from '@/types/core';

const looseResult = z.object({
  title: z.string().nullish(),
  url: z.string().nullish(),
  link: z.string().nullish(),
  description: z.string().nullish(),
  snippet: z.string().nullish(),
});

const jsonShapes = z.union([
  z.array(looseResult),
  z.object({ results: z.array(looseResult) }),
  z.object({ web: z.object({ results: z.array(looseResult) }) }),
]);

type LooseResult = z.infer<typeof looseResult>;

function fromLoose(item: LooseResult): SearchResult {
  return {
    title: (item.title ?? '').trim(),
    url: (item.url ?? item.link ?? '').trim(),
    description: (item.description ?? item.snippet ?? '').trim(),
  };
}

function tryJson(text: string): SearchResult[] | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) return null;
  let data: unknown;
  try {
    data = JSON.parse(trimmed);
  } catch {
    return null;
  }
  const parsed = jsonShapes.safeParse(data);
  if (!parsed.success) return null;
  const items = Array.isArray(parsed.data)
    ? parsed.data
    : 'results' in parsed.data
      ? parsed.data.results
      : parsed.data.web.results;
  return items.map(fromLoose);
}

const FIELD_LINE = /^\s*(title|url|description)\s*:\s*(.*)$/i;

function fieldOf(name: string): keyof SearchResult {
  const n = name.toLowerCase();
  if (n === 'url') return 'url';
  if (n === 'description') return 'description';
  return 'title';
}

/**
 * Line-oriented form:
 *   Title: ...
 *   URL: ...
 *   Description: ... (may continue on following lines)
 * A new record starts at every `Title:` line.
 */
export function parseLineResults(text: string): SearchResult[] {
  const out: SearchResult[] = [];
  let current: SearchResult | null = null;
  let lastField: keyof SearchResult | null = null;

  for (const line of text.split(/\r?\n/)) {
    const m = FIELD_LINE.exec(line);
    if (m) {
      const field = fieldOf(m[1]);
      if (field === 'title' || current === null) {
        if (current) out.push(current);
        current = { title: '', url: '', description: '' };
      }
      current[field] = m[2].trim();
      lastField = field;
      continue;
    }
    if (current && lastField === 'description' && line.trim()) {
      current.description = `${current.description} ${line.trim()}`.trim();
    }
  }
  if (current) out.push(current);
  return out;
}

/** JSON first, then the line format. Entries without a URL are dropped. */
export function parseToolTextResults(blocks: string[]): SearchResult[] {
  const results: SearchResult[] = [];
  for (const block of blocks) {
    results.push(...(tryJson(block) ?? parseLineResults(block)));
  }
  return results.filter((r) => r.url.length > 0);
}
