// src/services/validation/checks.ts — the ordered grounding checklist run over each generated answer
import type { PreferredLanguage, Profile } from '@/types/core';
import type { RetrievalBundle } from '@/services/retrieval/retrieval-orchestrator';
import { LANGUAGE_NAMES } from '@/services/prompt/prompt-assembler';
import { containsRefusal } from '@/services/planner/text-signals';
import { citedIndices, leadingDateToken, parseBullets, yearsIn } from './bullets';
import { matchesLanguage } from './language-variant';
import { perSourceBulletFallback, staleLinkFallback } from './fallbacks';

export interface ValidationContext {
  profile: Profile;
  isNews: boolean;
  isWeather: boolean;
  /** News or market question about the present. */
  isRecentNews: boolean;
  bundle?: RetrievalBundle;
  /** Bullet cap for news answers (the follow-up count on reuse turns). */
  newsItemLimit: number;
  /** Indices the previous answer on the same results already cited. */
  alreadyCited: number[];
  now: Date;
}

export type Correction = 'regenerate' | 'rewrite';

export interface AnswerCheck {
  id: string;
  applies(ctx: ValidationContext): boolean;
  passes(text: string, ctx: ValidationContext): boolean;
  /** Tells the model exactly what is wrong with `text`. */
  directive(text: string, ctx: ValidationContext): string;
  correction: Correction;
  /** Deterministic answer used when the corrected text still fails. */
  fallback?(ctx: ValidationContext): string;
}

function hasResults(ctx: ValidationContext): boolean {
  return (ctx.bundle?.searchResults.length ?? 0) > 0;
}

function isNewsWithResults(ctx: ValidationContext): boolean {
  return ctx.isNews && hasResults(ctx);
}

function staleYears(text: string, now: Date): number[] {
  const oldest = now.getUTCFullYear() - 1;
  return yearsIn(text).filter((y) => y < oldest);
}

function undatedBullets(text: string): string[] {
  return parseBullets(text).filter((b) => leadingDateToken(b) === null);
}

function disallowedDates(text: string, allowed: string[]): string[] {
  const out: string[] = [];
  for (const bullet of parseBullets(text)) {
    const token = leadingDateToken(bullet);
    if (token && !allowed.includes(token) && !out.includes(token)) out.push(token);
  }
  return out;
}

function quote(bullets: string[], max = 3): string {
  return bullets
    .slice(0, max)
    .map((b) => `  - ${b.length > 80 ? `${b.slice(0, 80)}…` : b}`)
    .join('\n');
}

export function languageDirective(language: PreferredLanguage): string {
  return (
    `Rewrite the text in ${LANGUAGE_NAMES[language]}. Keep the meaning exactly, ` +
    'keep every [n] citation, date and URL unchanged, and do not add or remove content. ' +
    'Output only the rewritten text.'
  );
}

export const weatherRefusalCheck: AnswerCheck = {
  id: 'weather_refusal',
  correction: 'regenerate',
  applies: (ctx) => ctx.isWeather && hasResults(ctx),
  passes: (text) => !containsRefusal(text),
  directive: () =>
    'Your answer claimed you cannot provide real-time weather. That is wrong: web content for this question is ' +
    'provided above. You MUST answer from those sources, quote the figures they contain, and cite them with [n].',
};

export const languageCheck: AnswerCheck = {
  id: 'language_variant',
  correction: 'rewrite',
  applies: (ctx) => ctx.profile.preferred_language !== undefined,
  passes: (text, ctx) => (ctx.profile.preferred_language ? matchesLanguage(text, ctx.profile.preferred_language) : true),
  directive: (_text, ctx) => languageDirective(ctx.profile.preferred_language ?? 'zh-Hant'),
};

export const staleYearCheck: AnswerCheck = {
  id: 'stale_year',
  correction: 'regenerate',
  applies: (ctx) => ctx.isRecentNews && hasResults(ctx),
  passes: (text, ctx) => staleYears(text, ctx.now).length === 0,
  directive: (text, ctx) => {
    const oldest = ctx.now.getUTCFullYear() - 1;
    return (
      `Your answer presents items from ${staleYears(text, ctx.now).join(', ')}, which is older than ${oldest}. ` +
      `The user wants recent news. Do not mention any year before ${oldest}. ` +
      'Only report items the sources date recently; if none are recent, say the sources found are not recent.'
    );
  },
  fallback: (ctx) => staleLinkFallback(ctx.bundle?.searchResults ?? []),
};

export const dateFirstCheck: AnswerCheck = {
  id: 'date_first',
  correction: 'regenerate',
  applies: isNewsWithResults,
  passes: (text) => parseBullets(text).length > 0 && undatedBullets(text).length === 0,
  directive: (text) => {
    const undated = undatedBullets(text);
    const problem =
      parseBullets(text).length === 0
        ? 'Your answer has no bullet list.'
        : `These bullets do not start with a date:\n${quote(undated)}`;
    return (
      `${problem}\nRewrite the answer as a bullet list where every bullet starts with the item date as YYYY-MM-DD ` +
      '(or the no-date marker), then a short headline, a 1-2 sentence summary and a [n] citation.'
    );
  },
};

export const allowedDatesCheck: AnswerCheck = {
  id: 'allowed_dates',
  correction: 'regenerate',
  applies: (ctx) => isNewsWithResults(ctx) && (ctx.bundle?.dateHints.allowed.length ?? 0) > 0,
  passes: (text, ctx) => disallowedDates(text, ctx.bundle?.dateHints.allowed ?? []).length === 0,
  directive: (text, ctx) => {
    const allowed = ctx.bundle?.dateHints.allowed ?? [];
    return (
      `Your answer uses dates that do not appear in the sources: ${disallowedDates(text, allowed).join(', ')}. ` +
      `Every bullet must start with one of these dates only: ${allowed.join(', ')}. ` +
      "Use the date of the cited source; when the source has no date, use the no-date marker."
    );
  },
};

export const citationDiversityCheck: AnswerCheck = {
  id: 'citation_diversity',
  correction: 'regenerate',
  applies: (ctx) => isNewsWithResults(ctx) && (ctx.bundle?.searchResults.length ?? 0) >= 2,
  passes: (text, ctx) => {
    if (parseBullets(text).length < 3) return true;
    return citedIndices(text, ctx.bundle?.searchResults.length ?? 0).length >= 2;
  },
  directive: (text, ctx) => {
    const cited = citedIndices(text, ctx.bundle?.searchResults.length ?? 0);
    const which = cited.length === 0 ? 'cite no source' : `all cite [${cited[0]}]`;
    return (
      `Your ${parseBullets(text).length} bullets ${which}. Each bullet must report a different news item ` +
      'from a different source and cite that source index. Do not attribute several items to one source.'
    );
  },
  fallback: (ctx) =>
    perSourceBulletFallback({
      summaries: ctx.bundle?.summaries ?? [],
      results: ctx.bundle?.searchResults ?? [],
      dateHints: ctx.bundle?.dateHints ?? { byIndex: {}, allowed: [] },
      limit: ctx.newsItemLimit,
      deprioritize: ctx.alreadyCited,
    }),
};

/** Evaluated in this order, each once per answer. */
export const ANSWER_CHECKS: readonly AnswerCheck[] = [
  weatherRefusalCheck,
  languageCheck,
  staleYearCheck,
  dateFirstCheck,
  allowedDatesCheck,
  citationDiversityCheck,
];
