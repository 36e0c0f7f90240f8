// src/services/pipeline-deps.ts — builds the pipeline's collaborators from settings
import type { Settings } from '@/config/settings';
import type { OrchestratorDeps } from '@/services/orchestrator';
import { LmStudioClient, type LanguageModel } from './llm-client';
import { IntentPlanner } from './planner/intent-planner';
import { RetrievalOrchestrator } from './retrieval/retrieval-orchestrator';
import { HttpPageFetcher, type PageFetcher } from './retrieval/page-fetcher';
import { AnswerValidator } from './validation/answer-validator';
import type { SearchProvider } from './search/search-provider';
import { TraceWriter } from './turn-trace';
import { ConversationStateManager } from '@/memory/conversationState';
import { FollowUpCache } from '@/memory/FollowUpCache';
import { MarkdownTurnStore } from '@/memory/MarkdownTurnStore';
import { RedisTurnStore, createRedisClient } from '@/memory/RedisTurnStore';
import type { MemoryStore } from '@/memory/TurnStore';

const GENERATION_TEMPERATURE = 0.3;
const NEWS_MAX_TOKENS = 900;

export interface PipelineOverrides {
  llm?: LanguageModel;
  fetcher?: PageFetcher;
  memory?: MemoryStore;
  now?: () => Date;
}

export interface Pipeline {
  deps: OrchestratorDeps;
  search: SearchProvider;
  memory: MemoryStore;
  followUps: FollowUpCache;
}

export function createMemoryStore(settings: Settings): MemoryStore {
  const { memory } = settings;
  if (memory.backend === 'redis') return new RedisTurnStore(createRedisClient(memory.redisUrl));
  return new MarkdownTurnStore(memory.dir, memory.days);
}

/** `search` is built by the caller; see createSearchProvider. */
export function createPipeline(
  settings: Settings,
  search: SearchProvider,
  overrides: PipelineOverrides = {},
): Pipeline {
  const llm =
    overrides.llm ??
    new LmStudioClient({
      baseUrl: settings.llm.baseUrl,
      apiKey: settings.llm.apiKey,
      timeoutMs: settings.llm.timeoutMs,
    });
  const fetcher = overrides.fetcher ?? new HttpPageFetcher(settings.fetch.timeoutMs);
  const memory = overrides.memory ?? createMemoryStore(settings);
  const conv = settings.conversation;
  const followUps = new FollowUpCache(conv.followUpTtlMinutes);
  const now = overrides.now;

  const deps: OrchestratorDeps = {
    llm,
    state: new ConversationStateManager(
      { turns: memory, profiles: memory, followUps, llm, ...(now && { now }) },
      { recentTurns: conv.recentTurns, summaryKeepTurns: conv.summaryKeepTurns, summaryModel: settings.llm.chatModel },
    ),
    planner: new IntentPlanner(llm, {
      model: settings.llm.plannerModel,
      followUpDefaultCount: conv.newsFollowUpDefaultCount,
      followUpMaxCount: conv.newsMaxItems,
      ...(now && { now }),
    }),
    retrieval: new RetrievalOrchestrator(
      { search, fetcher, llm, ...(now && { now }) },
      {
        country: settings.search.country,
        lang: settings.search.lang,
        count: settings.search.count,
        fetchTopN: settings.fetch.topN,
        fetchMaxChars: settings.fetch.maxChars,
        summaryModel: settings.llm.chatModel,
      },
    ),
    validator: new AnswerValidator(llm, {
      model: settings.llm.chatModel,
      temperature: GENERATION_TEMPERATURE,
      newsMaxTokens: NEWS_MAX_TOKENS,
    }),
    traces: new TraceWriter(settings.debug.enabled, settings.debug.dir),
    options: {
      chatModel: settings.llm.chatModel,
      temperature: GENERATION_TEMPERATURE,
      newsMaxTokens: NEWS_MAX_TOKENS,
    },
    ...(now && { now }),
  };
  return { deps, search, memory, followUps };
}
