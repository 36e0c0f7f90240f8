// src/memory/FollowUpCache.ts — one follow-up slot per chat, expiring after a TTL

import type { ChatId, FollowUpContext } from '@/types/core';
import { logger } from '@/services/logger';

interface CacheEntry {
  context: FollowUpContext;
  storedAt: number;
}

export class FollowUpCache {
  private readonly entries = new Map<ChatId, CacheEntry>();
  private readonly ttl: number;
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(
    ttlMinutes: number = 30,
    private readonly maxChats: number = 1000,
    private readonly now: () => number = Date.now,
  ) {
    this.ttl = ttlMinutes * 60 * 1000;
    this.cleanupInterval = setInterval(() => this.cleanup(), 5 * 60 * 1000);
    this.cleanupInterval.unref();
  }

  private cleanup(): void {
    const now = this.now();
    let cleaned = 0;
    for (const [chatId, entry] of this.entries) {
      if (now - entry.storedAt > this.ttl) {
        this.entries.delete(chatId);
        cleaned++;
      }
    }
    // Over capacity: drop the oldest fifth.
    if (this.entries.size >= this.maxChats) {
      const oldest = [...this.entries.entries()]
        .sort((a, b) => a[1].storedAt - b[1].storedAt)
        .slice(0, Math.ceil(this.entries.size * 0.2));
      for (const [chatId] of oldest) {
        this.entries.delete(chatId);
        cleaned++;
      }
    }
    if (cleaned > 0) logger.debug('followup:cleanup', { cleaned });
  }

  get(chatId: ChatId): FollowUpContext | null {
    const entry = this.entries.get(chatId);
    if (!entry) return null;
    if (this.now() - entry.storedAt > this.ttl) {
      this.entries.delete(chatId);
      return null;
    }
    return entry.context;
  }

  /** Overwrites the chat's slot. */
  set(chatId: ChatId, context: FollowUpContext): void {
    this.cleanup();
    this.entries.set(chatId, { context, storedAt: this.now() });
  }

  delete(chatId: ChatId): void {
    this.entries.delete(chatId);
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.entries.clear();
  }
}
