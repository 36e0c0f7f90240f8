// src/services/retrieval/date-hints.ts — publication dates read straight off the sources
import { NO_DATE_MARKER, type FetchedPage, type SearchResult, type SourceDateHints } from '@/types/core';

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6, jul: 7, aug: 8, sep: 9, sept: 9, oct: 10, nov: 11, dec: 12,
};
const MONTH_NAME =
  '(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sept?(?:ember)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)';

interface DatePattern {
  re: RegExp;
  pick: (m: RegExpExecArray) => [year: number, month: number, day: number];
}

const PATTERNS: DatePattern[] = [
  {
    re: /(?<!\d)((?:19|20)\d{2})[-/.](\d{1,2})[-/.](\d{1,2})(?!\d)/g,
    pick: (m) => [Number(m[1]), Number(m[2]), Number(m[3])],
  },
  {
    re: /((?:19|20)\d{2})\s*年\s*(\d{1,2})\s*月\s*(\d{1,2})\s*[日號号]/g,
    pick: (m) => [Number(m[1]), Number(m[2]), Number(m[3])],
  },
  {
    re: new RegExp(`\\b${MONTH_NAME}\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+((?:19|20)\\d{2})\\b`, 'gi'),
    pick: (m) => [Number(m[3]), MONTHS[m[1].slice(0, 3).toLowerCase()] ?? 0, Number(m[2])],
  },
  {
    re: new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+${MONTH_NAME}\\.?,?\\s+((?:19|20)\\d{2})\\b`, 'gi'),
    pick: (m) => [Number(m[3]), MONTHS[m[2].slice(0, 3).toLowerCase()] ?? 0, Number(m[1])],
  },
];

const DAY_MS = 24 * 60 * 60 * 1000;

function toIsoDate(year: number, month: number, day: number): string | null {
  if (year < 1990 || month < 1 || month > 12 || day < 1 || day > 31) return null;
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
  return d.toISOString().slice(0, 10);
}

/**
 * Dates in numeric (2026-02-18, 2026/2/18, 2026.02.18), CJK (2026年2月18日)
 * and month-name (Feb 18, 2026 / 18 February 2026) forms, in order of
 * appearance. Dates more than a day after `now` are dropped.
 */
export function extractDates(text: string, now: Date): string[] {
  const latest = now.getTime() + DAY_MS;
  const found: Array<{ at: number; iso: string }> = [];
  for (const { re, pick } of PATTERNS) {
    re.lastIndex = 0;
    let m: RegExpExecArray | null;
    while ((m = re.exec(text)) !== null) {
      const [y, mo, d] = pick(m);
      const iso = toIsoDate(y, mo, d);
      if (iso && Date.parse(iso) <= latest) found.push({ at: m.index, iso });
    }
  }
  found.sort((a, b) => a.at - b.at);
  const out: string[] = [];
  for (const f of found) {
    if (!out.includes(f.iso)) out.push(f.iso);
  }
  return out;
}

/** Title first, then snippet, then page text. */
export function bestGuessDate(fields: string[], now: Date): string | null {
  for (const field of fields) {
    const [first] = extractDates(field, now);
    if (first) return first;
  }
  return null;
}

export function buildSourceDateHints(
  results: SearchResult[],
  pages: FetchedPage[],
  now: Date,
): SourceDateHints {
  const byIndex: Record<number, string> = {};
  const dates: string[] = [];
  let anyMissing = false;

  results.forEach((r, i) => {
    const pageText = i < pages.length ? pages[i].text : '';
    const date = bestGuessDate([r.title, r.description, pageText], now);
    byIndex[i + 1] = date ?? NO_DATE_MARKER;
    if (date) {
      if (!dates.includes(date)) dates.push(date);
    } else {
      anyMissing = true;
    }
  });

  return { byIndex, allowed: anyMissing ? [...dates, NO_DATE_MARKER] : dates };
}
