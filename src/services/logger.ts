// src/services/logger.ts — structured logging for the assistant
import { Logger } from 'tslog';

function resolveMinLevel(): number {
  const raw = Number.parseInt(process.env.LOG_LEVEL ?? '', 10);
  if (Number.isFinite(raw) && raw >= 0 && raw <= 6) return raw;
  return process.env.NODE_ENV === 'test' ? 5 : 3; // info; errors only under jest
}

export const logger = new Logger({
  name: 'chat-assistant',
  minLevel: resolveMinLevel(),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: 'pretty',
});

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
