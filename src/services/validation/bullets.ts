// src/services/validation/bullets.ts — reading bullets, leading dates and [n] citations off answer text
import { NO_DATE_MARKER } from '@/types/core';

const BULLET_LINE = /^\s*(?:[-*•・]|\d{1,2}[.)、])\s+(.*\S)\s*$/;
const LEADING_DATE = /^(?:\*\*|__)?\s*[(（]?\s*(\d{4}-\d{2}-\d{2}|\[none\])/i;
const LEADING_DATE_PREFIX =
  /^(?:\*\*|__)?\s*[(（]?\s*(?:\d{4}-\d{2}-\d{2}|\[none\])\s*[)）]?\s*(?:\*\*|__)?\s*[:：\-–—|]?\s*/i;
const CITATION = /\[(\d{1,3})\]/g;
const YEAR = /(?<!\d)((?:19|20)\d{2})(?!\d)/g;

/** Bullet bodies, marker stripped, in order. */
export function parseBullets(text: string): string[] {
  const out: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const m = BULLET_LINE.exec(line);
    if (m) out.push(m[1]);
  }
  return out;
}

export function isBulletLine(line: string): boolean {
  return BULLET_LINE.test(line);
}

/** `YYYY-MM-DD` or the no-date marker at the very start of a bullet, else null. */
export function leadingDateToken(bullet: string): string | null {
  const m = LEADING_DATE.exec(bullet.trim());
  if (!m) return null;
  return m[1].startsWith('[') ? NO_DATE_MARKER : m[1];
}

export function stripLeadingDate(bullet: string): string {
  return bullet.trim().replace(LEADING_DATE_PREFIX, '').trim();
}

/** Citation indices in order of first appearance; indices outside 1..maxIndex are ignored. */
export function citedIndices(text: string, maxIndex: number): number[] {
  const out: number[] = [];
  for (const m of text.matchAll(CITATION)) {
    const n = Number(m[1]);
    if (n >= 1 && n <= maxIndex && !out.includes(n)) out.push(n);
  }
  return out;
}

export function stripCitations(text: string): string {
  return text.replace(CITATION, '').replace(/\s{2,}/g, ' ').trim();
}

export function yearsIn(text: string): number[] {
  const out: number[] = [];
  for (const m of text.matchAll(YEAR)) {
    const y = Number(m[1]);
    if (!out.includes(y)) out.push(y);
  }
  return out;
}

/**
 * Keeps the first `max` bullets. Lines before the first bullet and after the
 * last kept one stay; indented continuation lines of dropped bullets go too.
 */
export function limitBullets(text: string, max: number): string {
  const out: string[] = [];
  let seen = 0;
  let dropping = false;
  for (const line of text.split(/\r?\n/)) {
    if (isBulletLine(line)) {
      seen += 1;
      dropping = seen > max;
      if (!dropping) out.push(line);
      continue;
    }
    if (dropping && /^\s+\S/.test(line)) continue;
    if (dropping && line.trim() === '') continue;
    dropping = false;
    out.push(line);
  }
  return out.join('\n').trim();
}
