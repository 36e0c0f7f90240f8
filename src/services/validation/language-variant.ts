// src/services/validation/language-variant.ts — does the text use the script the profile asks for?
import type { PreferredLanguage } from '@/types/core';
import { lexicon } from '@/data/lexicon';

const SIMPLIFIED = new Set(lexicon.simplifiedTraditionalPairs.map(([s]) => s));
const TRADITIONAL = new Set(lexicon.simplifiedTraditionalPairs.map(([, t]) => t));

const HAN = /[㐀-鿿]/g;
const LATIN = /[a-z]/gi;
/** Share of Han characters (over Han + Latin letters) above which text is not English. */
const ENGLISH_MAX_HAN_SHARE = 0.2;

export interface ScriptCounts {
  han: number;
  latin: number;
  simplified: number;
  traditional: number;
}

/** URLs and citation markers are left out of the count. */
export function countScripts(text: string): ScriptCounts {
  const body = text.replace(/https?:\/\/\S+/g, '').replace(/\[\d{1,3}\]/g, '');
  let simplified = 0;
  let traditional = 0;
  for (const ch of body) {
    if (SIMPLIFIED.has(ch)) simplified += 1;
    else if (TRADITIONAL.has(ch)) traditional += 1;
  }
  return {
    han: body.match(HAN)?.length ?? 0,
    latin: body.match(LATIN)?.length ?? 0,
    simplified,
    traditional,
  };
}

export function matchesLanguage(text: string, language: PreferredLanguage): boolean {
  const c = countScripts(text);
  if (c.han === 0 && c.latin === 0) return true;
  if (language === 'en') return c.han / (c.han + c.latin) <= ENGLISH_MAX_HAN_SHARE;
  if (c.han === 0) return false;
  if (language === 'zh-Hant') return c.simplified <= c.traditional;
  return c.traditional <= c.simplified;
}
