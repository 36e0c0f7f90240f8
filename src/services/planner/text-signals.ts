// src/services/planner/text-signals.ts — deterministic intent signals read off the user's text
import { lexicon, containsAnyTerm, containsTerm } from '@/data/lexicon';

export function isWeatherQuestion(text: string): boolean {
  return containsAnyTerm(text, lexicon.weatherTerms);
}

export function shouldForceWebSearch(text: string): boolean {
  return containsAnyTerm(text, lexicon.forcedSearchTerms);
}

export function isNewsQuestion(text: string): boolean {
  return containsAnyTerm(text, lexicon.newsTerms);
}

export function isMarketQuestion(text: string): boolean {
  return containsAnyTerm(text, lexicon.marketTerms);
}

const EXPLICIT_YEAR = /(?:^|\D)(?:19|20)\d{2}(?!\d)/;

/**
 * News or market questions about the present: an explicit recency word, or
 * no year pinned by the user.
 */
export function isRecentNewsQuestion(text: string): boolean {
  if (!isNewsQuestion(text) && !isMarketQuestion(text)) return false;
  return containsAnyTerm(text, lexicon.recencyTerms) || !EXPLICIT_YEAR.test(text);
}

export function isRecencySensitive(text: string): boolean {
  return isWeatherQuestion(text) || isRecentNewsQuestion(text);
}

export function wantsLinks(text: string): boolean {
  return containsAnyTerm(text, lexicon.linkTerms);
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function alternation(terms: readonly string[]): string {
  return [...terms]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
}

const FOLLOW_UP_PATTERN = new RegExp(
  `^(?:(?:${alternation(lexicon.followUpLeadIns)})\\s*)?` +
    `(?:(?:${alternation(lexicon.followUpPhrases)})[\\s,，、]*)+` +
    `(?:(\\d{1,2})\\s*(?:${alternation(lexicon.followUpItemSuffixes)})?)?` +
    `[\\s。.!！?？~～]*$`,
  'i',
);

export interface FollowUpRequest {
  count: number;
}

/**
 * Recognizes "continue / more [n]" messages. The count defaults to
 * `defaultCount` and is capped at `maxCount`.
 */
export function parseFollowUpRequest(
  text: string,
  defaultCount: number,
  maxCount: number,
): FollowUpRequest | null {
  const m = FOLLOW_UP_PATTERN.exec(text.trim());
  if (!m) return null;
  const requested = m[1] ? Number.parseInt(m[1], 10) : 0;
  const count = requested > 0 ? requested : defaultCount;
  return { count: Math.min(count, maxCount) };
}

export function normalizeLocation(loc: string): string {
  const t = loc.trim();
  for (const suffix of lexicon.locationSuffixes) {
    if (t.length > suffix.length + 1 && t.endsWith(suffix)) {
      return t.slice(0, -suffix.length);
    }
  }
  return t;
}

export function extractKnownLocation(text: string): string {
  return lexicon.knownLocations.find((loc) => text.includes(loc)) ?? '';
}

const FILLERS_LONGEST_FIRST = [...lexicon.locationFillers].sort((a, b) => b.length - a.length);

function stripFillers(s: string): string {
  let out = s;
  let changed = true;
  while (changed && out.length > 0) {
    changed = false;
    for (const f of FILLERS_LONGEST_FIRST) {
      if (out.startsWith(f)) {
        out = out.slice(f.length);
        changed = true;
      }
      if (out.endsWith(f)) {
        out = out.slice(0, out.length - f.length);
        changed = true;
      }
    }
  }
  return out;
}

const HAN_RUN_AT_END = /\p{Script=Han}+$/u;
const EN_WEATHER_IN = /\bweather\s+(?:in|for|at)\s+([a-z][a-z .'-]*)/i;
const EN_X_WEATHER = /\b([a-z][a-z'-]*(?:\s+[a-z][a-z'-]*)?)\s+weather\b/i;
const EN_STOP_WORDS = new Set([
  'the', 'what', "what's", 'whats', 'how', "how's", 'is', 'today', 'tomorrow', 'current', 'local', 'my', 'a', 'about',
]);

function extractHanLocation(text: string): string {
  for (const noun of lexicon.weatherNouns) {
    const at = text.indexOf(noun);
    if (at <= 0) continue;
    const run = HAN_RUN_AT_END.exec(text.slice(0, at));
    if (!run) continue;
    const candidate = normalizeLocation(stripFillers(run[0]));
    if (candidate.length >= 2 && candidate.length <= 8) return candidate;
  }
  return '';
}

function trimEnglishTimeWords(s: string): string {
  let out = s.trim().replace(/[?.!,]+$/, '').trim();
  for (const w of lexicon.englishWeatherTimeWords) {
    const re = new RegExp(`\\s+${escapeRegExp(w)}$`, 'i');
    out = out.replace(re, '').trim();
  }
  return out;
}

function extractEnglishLocation(text: string): string {
  const inForm = EN_WEATHER_IN.exec(text);
  if (inForm) {
    const loc = trimEnglishTimeWords(inForm[1]);
    if (loc && !EN_STOP_WORDS.has(loc.toLowerCase())) return loc;
  }
  const prefixForm = EN_X_WEATHER.exec(text);
  if (prefixForm) {
    const words = prefixForm[1].split(/\s+/).filter((w) => !EN_STOP_WORDS.has(w.toLowerCase()));
    if (words.length > 0) return words.join(' ');
  }
  return '';
}

/** Generic "<location> + weather noun" patterns, Chinese and English. */
export function extractLocationFromPattern(text: string): string {
  return extractHanLocation(text) || extractEnglishLocation(text);
}

export function containsRefusal(text: string): boolean {
  return lexicon.refusalPatterns.some((p) => containsTerm(text, p));
}
