// src/memory/MarkdownTurnStore.ts — one markdown file per chat per day, plus profile.json

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { ChatId, Profile, Turn } from '@/types/core';
import { PersistenceError } from '@/services/errors';
import { safeParseJson } from '@/services/safe-parse-json';
import { mergeProfileFields, parseProfile, type MemoryStore } from './TurnStore';

const TURN_LINE = /^- \[([^\]]+)\] \((user|assistant)\) ?(.*)$/;
const DAY_FILE = /^\d{4}-\d{2}-\d{2}\.md$/;

/** Newlines and backslashes are escaped so each turn stays on one line. */
export function escapeContent(content: string): string {
  return content.replace(/\\/g, '\\\\').replace(/\r/g, '\\r').replace(/\n/g, '\\n');
}

export function unescapeContent(escaped: string): string {
  return escaped.replace(/\\([\\nr])/g, (_m, ch: string) => (ch === 'n' ? '\n' : ch === 'r' ? '\r' : '\\'));
}

export function formatTurnLine(turn: Turn): string {
  return `- [${turn.timestamp}] (${turn.role}) ${escapeContent(turn.content)}`;
}

export function parseTurnLine(line: string): Turn | null {
  const m = TURN_LINE.exec(line);
  if (!m) return null;
  const role = m[2] === 'user' ? 'user' : 'assistant';
  return { timestamp: m[1], role, content: unescapeContent(m[3]) };
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class MarkdownTurnStore implements MemoryStore {
  constructor(
    private readonly baseDir: string,
    /** Day files read back by recentTurns. */
    private readonly days: number,
  ) {}

  private chatDir(chatId: ChatId): string {
    return path.join(this.baseDir, `chat_${chatId}`);
  }

  private profilePath(chatId: ChatId): string {
    return path.join(this.chatDir(chatId), 'profile.json');
  }

  async appendTurn(chatId: ChatId, turn: Turn): Promise<void> {
    const day = turn.timestamp.slice(0, 10);
    const file = path.join(this.chatDir(chatId), `${day}.md`);
    try {
      await fs.mkdir(this.chatDir(chatId), { recursive: true });
      await fs.appendFile(file, `${formatTurnLine(turn)}\n`, 'utf8');
    } catch (err) {
      throw new PersistenceError(`Failed to append turn to ${file}`, 'append_turn', chatId, { cause: err });
    }
  }

  async recentTurns(chatId: ChatId, limit: number): Promise<Turn[]> {
    if (limit <= 0) return [];
    try {
      let files: string[];
      try {
        files = await fs.readdir(this.chatDir(chatId));
      } catch (err) {
        if (isMissing(err)) return [];
        throw err;
      }
      const dayFiles = files.filter((f) => DAY_FILE.test(f)).sort().slice(-Math.max(1, this.days));
      const turns: Turn[] = [];
      for (const f of dayFiles) {
        const raw = await fs.readFile(path.join(this.chatDir(chatId), f), 'utf8');
        for (const line of raw.split('\n')) {
          const turn = parseTurnLine(line);
          if (turn) turns.push(turn);
        }
      }
      return turns.slice(-limit);
    } catch (err) {
      throw new PersistenceError('Failed to read turns', 'read_turns', chatId, { cause: err });
    }
  }

  async getProfile(chatId: ChatId): Promise<Profile> {
    let raw: string;
    try {
      raw = await fs.readFile(this.profilePath(chatId), 'utf8');
    } catch (err) {
      if (isMissing(err)) return {};
      throw new PersistenceError('Failed to read profile', 'read_profile', chatId, { cause: err });
    }
    return parseProfile(safeParseJson(raw, 'profile.json'));
  }

  async mergeProfile(chatId: ChatId, updates: Partial<Profile>): Promise<Profile> {
    const next = mergeProfileFields(await this.getProfile(chatId), updates);
    try {
      await fs.mkdir(this.chatDir(chatId), { recursive: true });
      await fs.writeFile(this.profilePath(chatId), `${JSON.stringify(next, null, 2)}\n`, 'utf8');
    } catch (err) {
      throw new PersistenceError('Failed to write profile', 'merge_profile', chatId, { cause: err });
    }
    return next;
  }

  async clearProfile(chatId: ChatId): Promise<boolean> {
    try {
      await fs.unlink(this.profilePath(chatId));
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw new PersistenceError('Failed to clear profile', 'clear_profile', chatId, { cause: err });
    }
  }
}
