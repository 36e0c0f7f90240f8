// src/services/errors.ts — error types that cross module boundaries
import type { Degradation } from '@/types/core';
import { logger } from './logger';

/** A durable-store read or write failed; the turn is aborted. */
export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly operation: 'append_turn' | 'read_turns' | 'read_profile' | 'merge_profile' | 'clear_profile',
    public readonly chatId: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

/** Thrown by the subprocess search bridge; `retryable` mirrors the tool envelope. */
export class McpBridgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
  ) {
    super(message);
    this.name = 'McpBridgeError';
  }
}

/** Records a non-fatal degradation on the turn and logs it. */
export function recordDegradation(
  sink: Degradation[],
  kind: Degradation,
  meta: Record<string, unknown> = {},
): void {
  if (!sink.includes(kind)) sink.push(kind);
  logger.warn(`degraded:${kind}`, meta);
}
