// src/memory/conversationState.ts — recency window, preference inference, compaction, follow-up slot

import type { ChatId, FollowUpContext, PreferredLanguage, Profile, Turn } from '@/types/core';
import type { LanguageModel } from '@/services/llm-client';
import type { RetrievalBundle } from '@/services/retrieval/retrieval-orchestrator';
import { LANGUAGE_NAMES } from '@/services/prompt/prompt-assembler';
import { logger, errorMessage } from '@/services/logger';
import { containsAnyTerm, lexicon } from '@/data/lexicon';
import type { FollowUpCache } from './FollowUpCache';
import type { ProfileStore, TurnStore } from './TurnStore';

const SUMMARY_MAX_LINES = 8;

/** Profile fields read off the user's own words. */
export function inferPreferences(text: string): Partial<Profile> {
  const updates: Partial<Profile> = {};
  const requests = lexicon.languageRequests;
  const languages: PreferredLanguage[] = ['zh-Hant', 'zh-Hans', 'en'];
  const language = languages.find((l) => containsAnyTerm(text, requests[l]));
  if (language) updates.preferred_language = language;

  // "不要連結" also contains "要連結", so omission is checked first.
  if (containsAnyTerm(text, lexicon.linkPreferenceRequests.omit)) {
    updates.prefer_links = false;
  } else if (containsAnyTerm(text, lexicon.linkPreferenceRequests.include)) {
    updates.prefer_links = true;
  }
  return updates;
}

export function cleanSummary(raw: string): string {
  return raw
    .replace(/https?:\/\/\S+/g, '')
    .split(/\r?\n/)
    .map((l) => l.trimEnd())
    .filter((l) => l.trim().length > 0)
    .slice(0, SUMMARY_MAX_LINES)
    .join('\n')
    .trim();
}

export interface ConversationStateOptions {
  /** Window capacity is recentTurns * 2. */
  recentTurns: number;
  /** Turns left in the window after compaction. */
  summaryKeepTurns: number;
  summaryModel: string;
}

export interface ConversationStateDeps {
  turns: TurnStore;
  profiles: ProfileStore;
  followUps: FollowUpCache;
  llm: LanguageModel;
  now?: () => Date;
}

export interface TurnContext {
  profile: Profile;
  /** Window after the user turn was appended; the last entry is that turn. */
  window: Turn[];
  followUp: FollowUpContext | null;
}

export interface FollowUpUpdate {
  bundle: RetrievalBundle;
  isNews: boolean;
  /** Indices the delivered answer cites. */
  cited: number[];
}

export interface TurnCompletion {
  assistantText: string;
  profileUpdates?: Partial<Profile>;
  /** Set on web_search turns. */
  followUp?: FollowUpUpdate;
}

/**
 * Stored turns not yet folded into the summary. Turns sharing the mark's
 * timestamp are told apart by storage order.
 */
export function unsummarizedTurns(stored: Turn[], profile: Profile): Turn[] {
  const through = profile.summarized_through;
  if (!through) return stored;
  let tiesToSkip = profile.summarized_ties ?? 0;
  return stored.filter((t) => {
    if (t.timestamp > through) return true;
    if (t.timestamp < through) return false;
    if (tiesToSkip > 0) {
      tiesToSkip -= 1;
      return false;
    }
    return true;
  });
}

/**
 * Owns each chat's recency window. Durable storage is the source of truth:
 * the window is rebuilt from it on every turn, skipping turns already folded
 * into the conversation summary.
 */
export class ConversationStateManager {
  private readonly windows = new Map<ChatId, Turn[]>();
  private readonly now: () => Date;

  constructor(
    private readonly deps: ConversationStateDeps,
    private readonly options: ConversationStateOptions,
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  get capacity(): number {
    return this.options.recentTurns * 2;
  }

  window(chatId: ChatId): Turn[] {
    return [...(this.windows.get(chatId) ?? [])];
  }

  async beginTurn(chatId: ChatId, text: string): Promise<TurnContext> {
    await this.deps.turns.appendTurn(chatId, { role: 'user', content: text, timestamp: this.now().toISOString() });

    let profile = await this.deps.profiles.getProfile(chatId);
    const inferred = inferPreferences(text);
    if (Object.keys(inferred).length > 0) {
      profile = await this.deps.profiles.mergeProfile(chatId, inferred);
      logger.info('memory:preferences_inferred', { chatId, ...inferred });
    }

    const window = await this.reloadWindow(chatId, profile);
    return { profile, window, followUp: this.deps.followUps.get(chatId) };
  }

  async completeTurn(chatId: ChatId, completion: TurnCompletion): Promise<Profile> {
    const turn: Turn = { role: 'assistant', content: completion.assistantText, timestamp: this.now().toISOString() };
    await this.deps.turns.appendTurn(chatId, turn);
    const window = [...(this.windows.get(chatId) ?? []), turn].slice(-this.capacity);
    this.windows.set(chatId, window);

    let profile = await this.deps.profiles.getProfile(chatId);
    if (completion.profileUpdates && Object.keys(completion.profileUpdates).length > 0) {
      profile = await this.deps.profiles.mergeProfile(chatId, completion.profileUpdates);
    }

    if (window.length >= this.capacity) {
      profile = await this.compact(chatId, profile, window);
    }

    if (completion.followUp) this.rememberFollowUp(chatId, completion.followUp);
    return profile;
  }

  /** Forgets the chat's profile, window and follow-up slot; turns stay on disk. */
  async reset(chatId: ChatId): Promise<boolean> {
    this.windows.delete(chatId);
    this.deps.followUps.delete(chatId);
    return this.deps.profiles.clearProfile(chatId);
  }

  private async reloadWindow(chatId: ChatId, profile: Profile): Promise<Turn[]> {
    // folded turns and the unsummarized tail each fit in one capacity
    const stored = await this.deps.turns.recentTurns(chatId, this.capacity * 2);
    const window = unsummarizedTurns(stored, profile).slice(-this.capacity);
    this.windows.set(chatId, window);
    return [...window];
  }

  /**
   * Folds everything but the last `summaryKeepTurns` turns into the
   * conversation summary. When the summary call fails the window is still
   * cut and compaction runs again on the next full window.
   */
  async compact(chatId: ChatId, profile: Profile, window: Turn[]): Promise<Profile> {
    const keep = Math.min(this.options.summaryKeepTurns, this.capacity - 1);
    const folded = window.slice(0, window.length - keep);
    const retained = window.slice(window.length - keep);
    this.windows.set(chatId, retained);
    if (folded.length === 0) return profile;

    let summary: string;
    try {
      summary = cleanSummary(await this.summarize(profile, folded));
    } catch (err) {
      logger.warn('memory:compaction_failed', { chatId, error: errorMessage(err) });
      return profile;
    }
    if (!summary) {
      logger.warn('memory:compaction_failed', { chatId, error: 'empty summary' });
      return profile;
    }

    const through = folded[folded.length - 1].timestamp;
    const ties = folded.filter((t) => t.timestamp === through).length;
    logger.info('memory:compacted', { chatId, folded: folded.length, retained: retained.length });
    return this.deps.profiles.mergeProfile(chatId, {
      conversation_summary: summary,
      summarized_through: through,
      summarized_ties: ties,
    });
  }

  private async summarize(profile: Profile, folded: Turn[]): Promise<string> {
    const language = profile.preferred_language
      ? LANGUAGE_NAMES[profile.preferred_language]
      : 'the language the user writes in';
    const transcript = folded.map((t) => `${t.role}: ${t.content}`).join('\n');
    const previous = profile.conversation_summary?.trim();
    return this.deps.llm.complete({
      model: this.options.summaryModel,
      temperature: 0.1,
      maxTokens: 300,
      messages: [
        {
          role: 'system',
          content: [
            'Update the running summary of a chat between a user and an assistant.',
            `Write in ${language}.`,
            `At most ${SUMMARY_MAX_LINES} short lines.`,
            'Keep the user facts, preferences, open questions and decisions.',
            'Do NOT include URLs. Do NOT copy news lists or search results verbatim.',
            'Output only the summary.',
          ].join('\n'),
        },
        {
          role: 'user',
          content: `${previous ? `Current summary:\n${previous}\n\n` : ''}New messages:\n${transcript}`,
        },
      ],
    });
  }

  private rememberFollowUp(chatId: ChatId, update: FollowUpUpdate): void {
    const { bundle } = update;
    const previous = bundle.reused ? this.deps.followUps.get(chatId) : null;
    const cited = [...(previous?.cited_indices ?? [])];
    for (const i of update.cited) if (!cited.includes(i)) cited.push(i);

    this.deps.followUps.set(chatId, {
      tool: 'web_search',
      is_news: update.isNews,
      query: bundle.query,
      search_results: bundle.searchResults,
      fetched_pages: bundle.fetchedPages,
      source_date_hints: bundle.dateHints,
      cited_indices: cited,
      timestamp: this.now().toISOString(),
    });
  }
}
