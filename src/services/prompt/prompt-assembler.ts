// src/services/prompt/prompt-assembler.ts — ordered directive stack fed to generation
import type { ChatMessage, FetchedPage, PreferredLanguage, Profile, SearchResult, SourceSummary, Turn } from '@/types/core';
import type { RetrievalBundle } from '@/services/retrieval/retrieval-orchestrator';
import { domainOf } from '@/services/retrieval/url-guard';

export const LANGUAGE_NAMES: Record<PreferredLanguage, string> = {
  'zh-Hant': 'Traditional Chinese (繁體中文)',
  'zh-Hans': 'Simplified Chinese (简体中文)',
  en: 'English',
};

/** User turns kept for weather / recent-news questions. */
const RECENCY_USER_TURNS = 3;

export interface PromptSignals {
  isNews: boolean;
  isWeather: boolean;
  /** Weather or recent news: prior assistant turns are dropped from history. */
  recencySensitive: boolean;
  /** Minimum news items; the follow-up count on reuse turns. */
  newsItemCount: number;
  /** Follow-up turn over cached results. */
  reuse: boolean;
  /** Indices already covered by the previous answer on these results. */
  alreadyCited: number[];
}

export interface PromptInput {
  profile: Profile;
  history: Turn[];
  /** Present only when the turn ran web_search. */
  retrieval?: RetrievalBundle;
  signals: PromptSignals;
  now: Date;
}

export function formatSearchResults(results: SearchResult[]): string {
  return results
    .map((r, i) => `[${i + 1}] ${r.title.trim()}\nDomain: ${domainOf(r.url.trim())}\nSnippet: ${r.description.trim()}`)
    .join('\n\n');
}

export function formatFetchedPages(pages: FetchedPage[]): string {
  const blocks: string[] = [];
  pages.forEach((p, i) => {
    const text = p.text.trim();
    if (!text) return;
    blocks.push(`[${i + 1}] ${p.title.trim()}\nDomain: ${domainOf(p.url)}\nContent:\n${text}`);
  });
  return blocks.join('\n\n');
}

export function formatSummaries(summaries: SourceSummary[]): string {
  return summaries.map((s) => `[${s.index}] ${s.title} (${s.domain})\n${s.text.trim()}`).join('\n\n');
}

function preferenceDirectives(profile: Profile): string[] {
  const out: string[] = [];
  if (profile.preferred_language) {
    const name = LANGUAGE_NAMES[profile.preferred_language];
    out.push(`Always answer in ${name}, whatever language the sources or earlier messages use.`);
  }
  if (profile.prefer_links === true) {
    out.push('The user likes to see where information comes from: keep [n] citations on every sourced claim.');
  } else if (profile.prefer_links === false) {
    out.push('The user does not want links. Never include URLs in the answer.');
  }
  return out;
}

function newsDirective(bundle: RetrievalBundle, signals: PromptSignals): string {
  const n = signals.newsItemCount;
  const allowed = bundle.dateHints.allowed.join(', ');
  const lines = [
    'The user is asking for news.',
    signals.reuse
      ? `The user asked for more items from the same search. List exactly ${n} distinct news items.`
      : `You MUST list at least ${n} distinct news items if sources are available.`,
    'Return a bullet list. Each bullet must be: the date, a short headline, a 1-2 sentence summary, and a citation like [n].',
    'Start every bullet with the date of the item as YYYY-MM-DD.',
    `Use ONLY these dates: ${allowed}. Write the no-date marker exactly as shown when the source has no date.`,
    'Each bullet MUST cite a different source index when possible.',
    'Do NOT write generic summaries. Do NOT merge multiple news into one bullet.',
  ];
  if (signals.reuse && signals.alreadyCited.length > 0) {
    lines.push(`Prefer sources not already covered: ${signals.alreadyCited.map((i) => `[${i}]`).join(' ')} were used before.`);
  }
  return lines.join('\n');
}

const WEATHER_DIRECTIVE = [
  'This is a weather / real-time info question. You MUST use the provided web content to answer.',
  'Do NOT say you cannot provide real-time info.',
  'Do NOT invent numbers that are not present in the sources.',
  "If the sources do not include specific numbers, say the sources do not contain the detailed forecast numbers and ask for a narrower time window or district.",
  'Use a compact structure with these sections: 概況 / 溫度範圍 / 降雨機率 / 注意事項.',
  'Cite sources with [n]. Do NOT include URLs.',
].join('\n');

function evidenceDirective(bundle: RetrievalBundle): string | null {
  if (bundle.summaries.length > 0) {
    return (
      'Per-source summaries are provided. Prefer using these summaries to answer. ' +
      'Cite sources with [n]. Do NOT include URLs.\n' +
      `Source summaries:\n${formatSummaries(bundle.summaries)}`
    );
  }
  const fetched = formatFetchedPages(bundle.fetchedPages);
  if (fetched) {
    return (
      'Fetched page contents are provided. Prefer using these contents to answer. ' +
      'Cite sources with [n]. Do NOT include URLs.\n' +
      `Fetched contents:\n${fetched}`
    );
  }
  if (bundle.searchResults.length > 0) {
    return (
      'Only search snippets are available; page contents could not be read. ' +
      'Answer from the snippets above, cite them with [n], and say when they are not enough.'
    );
  }
  return null;
}

export function selectHistory(history: Turn[], recencySensitive: boolean): Turn[] {
  if (!recencySensitive) return history;
  return history.filter((t) => t.role === 'user').slice(-RECENCY_USER_TURNS);
}

export function assemblePrompt(input: PromptInput): ChatMessage[] {
  const { profile, retrieval, signals } = input;
  const today = input.now.toISOString().slice(0, 10);
  const messages: ChatMessage[] = [
    { role: 'system', content: `You are a helpful Telegram chatbot. Today is ${today}.` },
  ];

  for (const directive of preferenceDirectives(profile)) {
    messages.push({ role: 'system', content: directive });
  }

  if (retrieval) {
    if (retrieval.searchResults.length > 0) {
      messages.push({
        role: 'system',
        content:
          'Web search results are provided. Use them first.\n' +
          'Do NOT paste URLs in the final answer. Use [n] citations only.\n' +
          'Only include URLs if the user explicitly asks for links/sources.\n' +
          `Web search results:\n${formatSearchResults(retrieval.searchResults)}`,
      });
      if (signals.isNews) messages.push({ role: 'system', content: newsDirective(retrieval, signals) });
      if (signals.isWeather) messages.push({ role: 'system', content: WEATHER_DIRECTIVE });
      const evidence = evidenceDirective(retrieval);
      if (evidence) messages.push({ role: 'system', content: evidence });
    } else {
      messages.push({
        role: 'system',
        content:
          "Web search was requested, but results are empty. Say you couldn't find sources, then answer from general knowledge.",
      });
    }
  }

  if (profile.conversation_summary?.trim()) {
    messages.push({
      role: 'system',
      content: `Summary of the earlier conversation (background only):\n${profile.conversation_summary.trim()}`,
    });
  }

  for (const turn of selectHistory(input.history, signals.recencySensitive)) {
    messages.push({ role: turn.role, content: turn.content });
  }
  return messages;
}
