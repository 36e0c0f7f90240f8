// src/services/planner/intent-planner.ts — tool/query decision with deterministic overrides
import { z } from 'zod';
import type { FollowUpContext, PlanDecision, Profile } from '@/types/core';
import type { LanguageModel } from '@/services/llm-client';
import { safeParseJson } from '@/services/safe-parse-json';
import { logger, errorMessage } from '@/services/logger';
import { lexicon } from '@/data/lexicon';
import {
  extractKnownLocation,
  extractLocationFromPattern,
  isWeatherQuestion,
  normalizeLocation,
  parseFollowUpRequest,
  shouldForceWebSearch,
} from './text-signals';

const planSchema = z.object({
  tool: z.enum(['web_search', 'none']),
  query: z.string().optional().default(''),
});

const PLAN_JSON_SCHEMA = {
  name: 'tool_plan',
  schema: {
    type: 'object',
    properties: {
      tool: { type: 'string', enum: ['web_search', 'none'] },
      query: { type: 'string' },
    },
    required: ['tool', 'query'],
    additionalProperties: false,
  },
};

export type LocationSource = 'explicit' | 'pattern' | 'profile';

export interface ResolvedLocation {
  name: string;
  source: LocationSource;
}

export type PlanOutcome =
  | {
      kind: 'reuse';
      decision: PlanDecision;
      /** Items requested by the follow-up, already capped. */
      count: number;
      followUp: FollowUpContext;
    }
  | { kind: 'clarify'; decision: PlanDecision; reply: string }
  | {
      kind: 'answer';
      decision: PlanDecision;
      isWeather: boolean;
      location?: ResolvedLocation;
      /** True when the model call failed or returned an unusable plan. */
      degraded: boolean;
    };

export interface IntentPlannerOptions {
  model: string;
  followUpDefaultCount: number;
  followUpMaxCount: number;
  now?: () => Date;
}

export interface PlanRequest {
  text: string;
  profile: Profile;
  followUp: FollowUpContext | null;
}

export function resolveWeatherLocation(text: string, profile: Profile): ResolvedLocation | undefined {
  const explicit = extractKnownLocation(text);
  if (explicit) return { name: normalizeLocation(explicit), source: 'explicit' };
  const pattern = extractLocationFromPattern(text);
  if (pattern) return { name: pattern, source: 'pattern' };
  const stored = profile.default_weather_location?.trim();
  if (stored) return { name: stored, source: 'profile' };
  return undefined;
}

export function buildWeatherQuery(location: string): string {
  if (/^[\x20-\x7e]+$/.test(location)) {
    return `${location} weather forecast today temperature chance of rain`;
  }
  return `${location} 今天 天氣預報 降雨機率 最高溫 最低溫 體感 風速 中央氣象署`;
}

export class IntentPlanner {
  private readonly now: () => Date;

  constructor(
    private readonly llm: LanguageModel,
    private readonly options: IntentPlannerOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async plan(request: PlanRequest): Promise<PlanOutcome> {
    const { text, profile, followUp } = request;

    // 1. follow-up continuation over a cached news search
    const more = parseFollowUpRequest(text, this.options.followUpDefaultCount, this.options.followUpMaxCount);
    if (more && followUp && followUp.tool === 'web_search' && followUp.is_news) {
      logger.info('planner:followup_reuse', { count: more.count, cachedQuery: followUp.query });
      return { kind: 'reuse', decision: { tool: 'web_search', query: '' }, count: more.count, followUp };
    }

    const { decision: modelDecision, degraded } = await this.askModel(text, profile);
    let decision: PlanDecision = { ...modelDecision };

    // 2. forced search keywords
    if (decision.tool !== 'web_search' && shouldForceWebSearch(text)) {
      logger.info('planner:forced_search', { modelTool: decision.tool });
      decision = { tool: 'web_search', query: decision.query };
    }

    // 3. weather needs a location
    const isWeather = isWeatherQuestion(text);
    if (!isWeather) {
      return { kind: 'answer', decision, isWeather, degraded };
    }

    const location = resolveWeatherLocation(text, profile);
    if (!location) {
      logger.info('planner:weather_clarify');
      return {
        kind: 'clarify',
        decision: { tool: 'none', query: '' },
        reply: lexicon.replies.weatherClarification,
      };
    }

    let query = decision.query;
    if (!query || location.source === 'profile') {
      query = buildWeatherQuery(location.name);
    } else if (!query.includes(location.name)) {
      query = `${location.name} ${query}`;
    }
    return { kind: 'answer', decision: { tool: 'web_search', query }, isWeather, location, degraded };
  }

  private async askModel(text: string, profile: Profile): Promise<{ decision: PlanDecision; degraded: boolean }> {
    const today = this.now().toISOString().slice(0, 10);
    const hints: string[] = [];
    if (profile.preferred_language) hints.push(`Preferred answer language: ${profile.preferred_language}.`);
    if (profile.default_weather_location) hints.push(`Default weather location: ${profile.default_weather_location}.`);

    try {
      const raw = await this.llm.complete({
        model: this.options.model,
        temperature: 0,
        responseSchema: PLAN_JSON_SCHEMA,
        messages: [
          {
            role: 'system',
            content: [
              'Decide if up-to-date web search is needed to answer the user. Reply with JSON only.',
              'Use {"tool":"web_search","query":"<concise search query>"} for current events, news, weather, prices or facts you may not know.',
              'Use {"tool":"none","query":""} for chit-chat, reasoning, writing or general knowledge.',
              `Today is ${today}.`,
              ...hints,
            ].join('\n'),
          },
          { role: 'user', content: text },
        ],
      });
      const parsed = planSchema.safeParse(safeParseJson(raw, 'intent-planner'));
      if (!parsed.success) {
        logger.warn('planner:degraded', { reason: 'invalid_plan', raw: raw.slice(0, 200) });
        return { decision: { tool: 'none', query: '' }, degraded: true };
      }
      return { decision: { tool: parsed.data.tool, query: parsed.data.query.trim() }, degraded: false };
    } catch (err) {
      logger.warn('planner:degraded', { reason: 'model_error', error: errorMessage(err) });
      return { decision: { tool: 'none', query: '' }, degraded: true };
    }
  }
}
