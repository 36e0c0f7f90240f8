// src/services/telegram/updates.ts — inbound Bot API updates → messages the pipeline handles
import { z } from 'zod';
import type { ChatId } from '@/types/core';

export const updateSchema = z.object({
  update_id: z.number(),
  message: z
    .object({
      message_id: z.number(),
      chat: z.object({ id: z.number(), type: z.string() }),
      text: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

export type TelegramUpdate = z.infer<typeof updateSchema>;

export type Inbound =
  | { kind: 'message'; chatId: ChatId; messageId: number; text: string }
  | { kind: 'reset'; chatId: ChatId; messageId: number };

const GROUP_TYPES = new Set(['group', 'supergroup']);

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Group messages count only when they open with `@<botUsername>`; the
 * mention is stripped. Returns null when the message is not for the bot.
 */
export function stripBotMention(text: string, botUsername: string): string | null {
  if (!botUsername) return null;
  const re = new RegExp(`^\\s*@${escapeRegExp(botUsername)}(?![A-Za-z0-9_])[\\s,:，：]*`, 'i');
  const m = re.exec(text);
  if (!m) return null;
  const rest = text.slice(m[0].length).trim();
  return rest || null;
}

function commandName(text: string, botUsername: string): string | null {
  const m = /^\/([A-Za-z0-9_]+)(?:@([A-Za-z0-9_]+))?(?:\s|$)/.exec(text.trim());
  if (!m) return null;
  if (m[2] && m[2].toLowerCase() !== botUsername.toLowerCase()) return null;
  return m[1].toLowerCase();
}

/** Non-text updates and commands other than /reset yield null. */
export function toInbound(update: TelegramUpdate, botUsername: string): Inbound | null {
  const message = update.message;
  if (!message?.text) return null;
  const chatId = String(message.chat.id);
  const messageId = message.message_id;
  let text = message.text;

  if (text.trim().startsWith('/')) {
    return commandName(text, botUsername) === 'reset' ? { kind: 'reset', chatId, messageId } : null;
  }

  if (GROUP_TYPES.has(message.chat.type)) {
    const stripped = stripBotMention(text, botUsername);
    if (stripped === null) return null;
    text = stripped;
  }
  text = text.trim();
  return text ? { kind: 'message', chatId, messageId, text } : null;
}
