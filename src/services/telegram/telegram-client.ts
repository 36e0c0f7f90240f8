// src/services/telegram/telegram-client.ts — Bot API sendMessage over axios
import axios, { type AxiosInstance } from 'axios';
import type { ChatId } from '@/types/core';
import { logger } from '@/services/logger';

export const TELEGRAM_MESSAGE_LIMIT = 4096;

export interface ChatTransport {
  sendMessage(chatId: ChatId, text: string, replyTo?: number): Promise<void>;
}

/**
 * Splits on line boundaries so every chunk fits `limit`; a single line
 * longer than the limit is cut.
 */
export function splitMessage(text: string, limit: number = TELEGRAM_MESSAGE_LIMIT): string[] {
  if (text.length <= limit) return [text];
  const chunks: string[] = [];
  let current = '';
  const flush = () => {
    if (current.trim()) chunks.push(current.replace(/\n+$/, ''));
    current = '';
  };
  for (const line of text.split('\n')) {
    if (line.length > limit) {
      flush();
      for (let i = 0; i < line.length; i += limit) chunks.push(line.slice(i, i + limit));
      continue;
    }
    const next = current ? `${current}\n${line}` : line;
    if (next.length > limit) {
      flush();
      current = line;
    } else {
      current = next;
    }
  }
  flush();
  return chunks;
}

export class TelegramClient implements ChatTransport {
  private readonly http: AxiosInstance;

  constructor(botToken: string, options: { timeoutMs?: number; http?: AxiosInstance } = {}) {
    this.http =
      options.http ??
      axios.create({
        baseURL: `https://api.telegram.org/bot${botToken}`,
        timeout: options.timeoutMs ?? 15000,
      });
  }

  async sendMessage(chatId: ChatId, text: string, replyTo?: number): Promise<void> {
    const chunks = splitMessage(text);
    for (const [i, chunk] of chunks.entries()) {
      await this.http.post('/sendMessage', {
        chat_id: chatId,
        text: chunk,
        disable_web_page_preview: true,
        ...(i === 0 && replyTo !== undefined && { reply_to_message_id: replyTo, allow_sending_without_reply: true }),
      });
    }
    logger.debug('telegram:sent', { chatId, chunks: chunks.length });
  }
}
