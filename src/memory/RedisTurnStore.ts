// src/memory/RedisTurnStore.ts

import Redis from 'ioredis';
import type { ChatId, Profile, Turn } from '@/types/core';
import { PersistenceError } from '@/services/errors';
import { logger, errorMessage } from '@/services/logger';
import { safeParseJson } from '@/services/safe-parse-json';
import { mergeProfileFields, parseProfile, turnSchema, type MemoryStore } from './TurnStore';

/** The commands this store issues; an ioredis client satisfies it. */
export interface RedisCommands {
  rpush(key: string, ...values: string[]): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  quit(): Promise<unknown>;
}

export function createRedisClient(url: string): RedisCommands {
  const client = new Redis(url, {
    retryStrategy: (times) => Math.min(times * 50, 30000),
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
  });
  client.on('error', (err: Error) => logger.error('redis:error', { error: err.message }));
  client.on('ready', () => logger.info('redis:ready'));
  return {
    rpush: (key, ...values) => client.rpush(key, ...values),
    lrange: (key, start, stop) => client.lrange(key, start, stop),
    get: (key) => client.get(key),
    set: (key, value) => client.set(key, value),
    del: (key) => client.del(key),
    quit: () => client.quit(),
  };
}

/**
 * Redis-backed history: list `chat:<id>:turns` of JSON turns and string
 * `chat:<id>:profile`. Turns are never trimmed.
 */
export class RedisTurnStore implements MemoryStore {
  constructor(private readonly client: RedisCommands) {}

  private turnsKey(chatId: ChatId): string {
    return `chat:${chatId}:turns`;
  }

  private profileKey(chatId: ChatId): string {
    return `chat:${chatId}:profile`;
  }

  async appendTurn(chatId: ChatId, turn: Turn): Promise<void> {
    try {
      await this.client.rpush(this.turnsKey(chatId), JSON.stringify(turn));
    } catch (err) {
      throw new PersistenceError(`Failed to append turn: ${errorMessage(err)}`, 'append_turn', chatId, { cause: err });
    }
  }

  async recentTurns(chatId: ChatId, limit: number): Promise<Turn[]> {
    if (limit <= 0) return [];
    let raw: string[];
    try {
      raw = await this.client.lrange(this.turnsKey(chatId), -limit, -1);
    } catch (err) {
      throw new PersistenceError(`Failed to read turns: ${errorMessage(err)}`, 'read_turns', chatId, { cause: err });
    }
    const turns: Turn[] = [];
    for (const item of raw) {
      const parsed = turnSchema.safeParse(safeParseJson(item, 'redis-turn'));
      if (parsed.success) turns.push(parsed.data);
    }
    return turns;
  }

  async getProfile(chatId: ChatId): Promise<Profile> {
    let raw: string | null;
    try {
      raw = await this.client.get(this.profileKey(chatId));
    } catch (err) {
      throw new PersistenceError(`Failed to read profile: ${errorMessage(err)}`, 'read_profile', chatId, { cause: err });
    }
    return raw ? parseProfile(safeParseJson(raw, 'redis-profile')) : {};
  }

  async mergeProfile(chatId: ChatId, updates: Partial<Profile>): Promise<Profile> {
    const next = mergeProfileFields(await this.getProfile(chatId), updates);
    try {
      await this.client.set(this.profileKey(chatId), JSON.stringify(next));
    } catch (err) {
      throw new PersistenceError(`Failed to write profile: ${errorMessage(err)}`, 'merge_profile', chatId, { cause: err });
    }
    return next;
  }

  async clearProfile(chatId: ChatId): Promise<boolean> {
    try {
      return (await this.client.del(this.profileKey(chatId))) > 0;
    } catch (err) {
      throw new PersistenceError(`Failed to clear profile: ${errorMessage(err)}`, 'clear_profile', chatId, { cause: err });
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
