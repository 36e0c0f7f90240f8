// src/memory/chatQueue.ts — one in-flight message per chat; different chats run concurrently

import type { ChatId } from '@/types/core';

export const MAX_PENDING_PER_CHAT = 20;

export class ChatQueueFullError extends Error {
  constructor(public readonly chatId: ChatId) {
    super(`Too many pending messages for chat ${chatId}`);
    this.name = 'ChatQueueFullError';
  }
}

export class ChatQueue {
  private readonly tails = new Map<ChatId, Promise<void>>();
  private readonly pending = new Map<ChatId, number>();

  constructor(private readonly maxPending: number = MAX_PENDING_PER_CHAT) {}

  /** Queued or running tasks for the chat. */
  size(chatId: ChatId): number {
    return this.pending.get(chatId) ?? 0;
  }

  /**
   * Runs `task` after every earlier task for the same chat has settled.
   * A failing task does not block the ones queued behind it.
   */
  run<T>(chatId: ChatId, task: () => Promise<T>): Promise<T> {
    const count = this.size(chatId);
    if (count >= this.maxPending) return Promise.reject(new ChatQueueFullError(chatId));
    this.pending.set(chatId, count + 1);

    const previous = this.tails.get(chatId) ?? Promise.resolve();
    const result = previous.then(task);
    const tail: Promise<void> = result.then(
      () => this.settle(chatId, tail),
      () => this.settle(chatId, tail),
    );
    this.tails.set(chatId, tail);
    return result;
  }

  private settle(chatId: ChatId, tail: Promise<void>): void {
    const left = this.size(chatId) - 1;
    if (left > 0) {
      this.pending.set(chatId, left);
    } else {
      this.pending.delete(chatId);
    }
    if (this.tails.get(chatId) === tail) this.tails.delete(chatId);
  }
}
