// src/services/turn-trace.ts
// Per-turn tracing (plan, retrieve, generate, validate), dumped as JSON when DEBUG is on.
import crypto from 'crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { ChatId } from '@/types/core';
import { logger, errorMessage } from './logger';

export interface Span {
  name: string;
  startTime: number;
  endTime: number;
  durationMs: number;
  input?: unknown;
  output?: unknown;
  metadata?: Record<string, unknown>;
  error?: string;
}

export interface TurnTrace {
  traceId: string;
  chatId: ChatId;
  startTime: number;
  endTime?: number;
  spans: Span[];
}

export function createTrace(chatId: ChatId): TurnTrace {
  return {
    traceId: `chat${chatId}_${crypto.randomBytes(6).toString('hex')}`,
    chatId,
    startTime: Date.now(),
    spans: [],
  };
}

export function addSpan(
  trace: TurnTrace,
  name: string,
  startTime: number,
  options?: { output?: unknown; input?: unknown; metadata?: Record<string, unknown>; error?: string },
): void {
  const endTime = Date.now();
  trace.spans.push({
    name,
    startTime,
    endTime,
    durationMs: endTime - startTime,
    input: options?.input,
    output: options?.output,
    metadata: options?.metadata,
    error: options?.error,
  });
}

export function finishTrace(trace: TurnTrace): void {
  trace.endTime = Date.now();
}

const REDACT_KEYS = new Set([
  'authorization',
  'x-subscription-token',
  'api_key',
  'apikey',
  'brave_api_key',
  'token',
  'bottoken',
  'telegram_bot_token',
]);

/** Deep copy with secret-looking keys replaced. */
export function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact);
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = REDACT_KEYS.has(k.toLowerCase()) ? '[REDACTED]' : redact(v);
    }
    return out;
  }
  return value;
}

export function tracePath(dir: string, trace: TurnTrace): string {
  const day = new Date(trace.startTime).toISOString().slice(0, 10);
  const safeId = trace.traceId.replace(/[^a-zA-Z0-9._-]+/g, '_');
  return path.join(dir, `chat_${trace.chatId}`, day, `${safeId}.json`);
}

export class TraceWriter {
  constructor(
    private readonly enabled: boolean,
    private readonly dir: string,
  ) {}

  /** Never fails the turn; write errors are logged. */
  async write(trace: TurnTrace): Promise<void> {
    if (!this.enabled) return;
    const file = tracePath(this.dir, trace);
    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, JSON.stringify(redact(trace), null, 2), 'utf8');
    } catch (err) {
      logger.warn('trace:write_failed', { file, error: errorMessage(err) });
    }
  }
}
