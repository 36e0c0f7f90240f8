/**
 * Settings
 * Environment-driven configuration, validated once at boot.
 */
import { z } from 'zod';

const TRUTHY = new Set(['1', 'true', 'True', 'yes', 'YES']);

const flag = z
  .string()
  .optional()
  .transform((v) => (v ? TRUTHY.has(v.trim()) : false));

const int = (fallback: number, min = 0) =>
  z
    .string()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v.trim() === '') return fallback;
      const n = Number.parseInt(v, 10);
      if (!Number.isFinite(n) || n < min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected an integer >= ${min}` });
        return z.NEVER;
      }
      return n;
    });

const text = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? v.trim() : fallback));

const envSchema = z
  .object({
    PORT: int(4000, 1),
    TELEGRAM_BOT_TOKEN: z.string({ required_error: 'Missing TELEGRAM_BOT_TOKEN' }).trim().min(1, 'Missing TELEGRAM_BOT_TOKEN'),
    TELEGRAM_BOT_USERNAME: text('').transform((v) => v.replace(/^@/, '')),
    TELEGRAM_WEBHOOK_SECRET: text(''),
    LMSTUDIO_BASE_URL: text('http://localhost:1234/v1'),
    LMSTUDIO_API_KEY: text('lm-studio'),
    LMSTUDIO_CHAT_MODEL: text('qwen/qwen2.5-coder-14b'),
    LMSTUDIO_PLANNER_MODEL: text(''),
    LLM_TIMEOUT_MS: int(60_000, 1),
    BRAVE_API_KEY: text(''),
    BRAVE_COUNTRY: text('TW'),
    BRAVE_LANG: text('zh-hant'),
    BRAVE_COUNT: int(10, 1),
    MCP_BRAVE_ENABLED: flag,
    MCP_BRAVE_COMMAND: text('npx'),
    MCP_BRAVE_ARGS: text('-y @modelcontextprotocol/server-brave-search'),
    FETCH_TOP_N: int(10),
    FETCH_MAX_CHARS: int(8000, 1),
    FETCH_TIMEOUT_MS: int(12_000, 1),
    MEMORY_BACKEND: z.enum(['file', 'redis']).default('file'),
    MEMORY_DIR: text('memory'),
    MEMORY_DAYS: int(1, 1),
    REDIS_URL: text(''),
    RECENT_TURNS: int(6, 1),
    SUMMARY_KEEP_TURNS: int(4, 0),
    FOLLOWUP_TTL_MINUTES: int(30, 1),
    NEWS_FOLLOWUP_DEFAULT_COUNT: int(5, 1),
    NEWS_MAX_ITEMS: int(8, 1),
    DEBUG: flag,
    DEBUG_DIR: text('debug'),
  })
  .superRefine((env, ctx) => {
    if (!env.MCP_BRAVE_ENABLED && !env.BRAVE_API_KEY) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['BRAVE_API_KEY'], message: 'Missing BRAVE_API_KEY' });
    }
    if (env.MEMORY_BACKEND === 'redis' && !env.REDIS_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['REDIS_URL'], message: 'MEMORY_BACKEND=redis needs REDIS_URL' });
    }
  });

export interface Settings {
  port: number;
  telegram: { botToken: string; botUsername: string; webhookSecret: string };
  llm: { baseUrl: string; apiKey: string; chatModel: string; plannerModel: string; timeoutMs: number };
  search: {
    braveApiKey: string;
    country: string;
    lang: string;
    count: number;
    mcp: { enabled: boolean; command: string; args: string[] };
  };
  fetch: { topN: number; maxChars: number; timeoutMs: number };
  memory: { backend: 'file' | 'redis'; dir: string; days: number; redisUrl: string };
  conversation: {
    recentTurns: number;
    summaryKeepTurns: number;
    followUpTtlMinutes: number;
    newsFollowUpDefaultCount: number;
    newsMaxItems: number;
  };
  debug: { enabled: boolean; dir: string };
}

export class SettingsError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'SettingsError';
  }
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new SettingsError(
      parsed.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)),
    );
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    telegram: {
      botToken: e.TELEGRAM_BOT_TOKEN,
      botUsername: e.TELEGRAM_BOT_USERNAME,
      webhookSecret: e.TELEGRAM_WEBHOOK_SECRET,
    },
    llm: {
      baseUrl: e.LMSTUDIO_BASE_URL,
      apiKey: e.LMSTUDIO_API_KEY,
      chatModel: e.LMSTUDIO_CHAT_MODEL,
      plannerModel: e.LMSTUDIO_PLANNER_MODEL || e.LMSTUDIO_CHAT_MODEL,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    search: {
      braveApiKey: e.BRAVE_API_KEY,
      country: e.BRAVE_COUNTRY,
      lang: e.BRAVE_LANG,
      count: e.BRAVE_COUNT,
      mcp: {
        enabled: e.MCP_BRAVE_ENABLED,
        command: e.MCP_BRAVE_COMMAND,
        args: e.MCP_BRAVE_ARGS.split(/\s+/).filter((a) => a.length > 0),
      },
    },
    fetch: { topN: e.FETCH_TOP_N, maxChars: e.FETCH_MAX_CHARS, timeoutMs: e.FETCH_TIMEOUT_MS },
    memory: { backend: e.MEMORY_BACKEND, dir: e.MEMORY_DIR, days: e.MEMORY_DAYS, redisUrl: e.REDIS_URL },
    conversation: {
      recentTurns: e.RECENT_TURNS,
      summaryKeepTurns: e.SUMMARY_KEEP_TURNS,
      followUpTtlMinutes: e.FOLLOWUP_TTL_MINUTES,
      newsFollowUpDefaultCount: e.NEWS_FOLLOWUP_DEFAULT_COUNT,
      newsMaxItems: e.NEWS_MAX_ITEMS,
    },
    debug: { enabled: e.DEBUG, dir: e.DEBUG_DIR },
  };
}
