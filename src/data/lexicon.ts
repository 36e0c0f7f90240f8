// src/data/lexicon.ts — typed access to the heuristic phrase tables in lexicon.json
import { z } from 'zod';
import rawLexicon from './lexicon.json';

const termList = z.array(z.string().min(1));

const lexiconSchema = z.object({
  weatherTerms: termList,
  forcedSearchTerms: termList,
  newsTerms: termList,
  marketTerms: termList,
  recencyTerms: termList,
  linkTerms: termList,
  followUpPhrases: termList,
  followUpLeadIns: termList,
  followUpItemSuffixes: termList,
  knownLocations: termList,
  locationSuffixes: termList,
  weatherNouns: termList,
  locationFillers: termList,
  englishWeatherTimeWords: termList,
  refusalPatterns: termList,
  languageRequests: z.object({
    'zh-Hant': termList,
    'zh-Hans': termList,
    en: termList,
  }),
  linkPreferenceRequests: z.object({
    include: termList,
    omit: termList,
  }),
  simplifiedTraditionalPairs: z.array(z.tuple([z.string().length(1), z.string().length(1)])),
  replies: z.object({
    weatherClarification: z.string(),
    sourceLinksHeader: z.string(),
    staleFallbackHeader: z.string(),
    persistenceFailure: z.string(),
    generationFailure: z.string(),
    resetDone: z.string(),
  }),
});

export type Lexicon = z.infer<typeof lexiconSchema>;

export const lexicon: Lexicon = lexiconSchema.parse(rawLexicon);

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const ASCII_TERM = /^[\x20-\x7e]+$/;
const termMatchers = new Map<string, RegExp>();

function matcherFor(term: string): RegExp {
  let re = termMatchers.get(term);
  if (!re) {
    // ASCII terms must match on word boundaries ("now" must not hit "know").
    re = ASCII_TERM.test(term)
      ? new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(term)}(?:s|es)?(?=$|[^a-z0-9])`, 'i')
      : new RegExp(escapeRegExp(term));
    termMatchers.set(term, re);
  }
  return re;
}

export function containsTerm(text: string, term: string): boolean {
  return matcherFor(term.toLowerCase()).test(text.toLowerCase());
}

export function containsAnyTerm(text: string, terms: readonly string[]): boolean {
  return terms.some((t) => containsTerm(text, t));
}
