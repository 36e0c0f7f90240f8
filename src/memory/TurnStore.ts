// src/memory/TurnStore.ts — durable turn history and per-chat profile contracts
import { z } from 'zod';
import type { ChatId, Profile, Turn } from '@/types/core';

export interface TurnStore {
  appendTurn(chatId: ChatId, turn: Turn): Promise<void>;
  /** The most recent `limit` turns, oldest first. */
  recentTurns(chatId: ChatId, limit: number): Promise<Turn[]>;
}

export interface ProfileStore {
  getProfile(chatId: ChatId): Promise<Profile>;
  /** Additive merge; returns the stored result. */
  mergeProfile(chatId: ChatId, updates: Partial<Profile>): Promise<Profile>;
  /** True when a stored profile was removed. */
  clearProfile(chatId: ChatId): Promise<boolean>;
}

export interface MemoryStore extends TurnStore, ProfileStore {
  close?(): Promise<void>;
}

export const turnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  timestamp: z.string(),
});

export const profileSchema = z
  .object({
    preferred_language: z.enum(['zh-Hant', 'zh-Hans', 'en']).optional(),
    default_weather_location: z.string().optional(),
    prefer_links: z.boolean().optional(),
    conversation_summary: z.string().optional(),
    summarized_through: z.string().optional(),
    summarized_ties: z.number().int().nonnegative().optional(),
  })
  .passthrough();

/** Unreadable documents read as an empty profile. */
export function parseProfile(data: unknown): Profile {
  const parsed = profileSchema.safeParse(data);
  if (!parsed.success) return {};
  const {
    preferred_language,
    default_weather_location,
    prefer_links,
    conversation_summary,
    summarized_through,
    summarized_ties,
  } = parsed.data;
  const profile: Profile = {};
  if (preferred_language !== undefined) profile.preferred_language = preferred_language;
  if (default_weather_location !== undefined) profile.default_weather_location = default_weather_location;
  if (prefer_links !== undefined) profile.prefer_links = prefer_links;
  if (conversation_summary !== undefined) profile.conversation_summary = conversation_summary;
  if (summarized_through !== undefined) profile.summarized_through = summarized_through;
  if (summarized_ties !== undefined) profile.summarized_ties = summarized_ties;
  return profile;
}

/** A field is overwritten only by a present, non-blank value. */
export function mergeProfileFields(current: Profile, updates: Partial<Profile>): Profile {
  const next: Profile = { ...current };
  if (updates.preferred_language) next.preferred_language = updates.preferred_language;
  if (updates.default_weather_location?.trim()) next.default_weather_location = updates.default_weather_location.trim();
  if (typeof updates.prefer_links === 'boolean') next.prefer_links = updates.prefer_links;
  if (updates.conversation_summary?.trim()) next.conversation_summary = updates.conversation_summary.trim();
  if (updates.summarized_through?.trim()) next.summarized_through = updates.summarized_through;
  if (typeof updates.summarized_ties === 'number') next.summarized_ties = updates.summarized_ties;
  return next;
}
