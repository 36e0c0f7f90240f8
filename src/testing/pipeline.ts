// src/testing/pipeline.ts — the real pipeline wiring over in-process fakes
import { loadSettings } from '@/config/settings';
import { createPipeline, type Pipeline } from '@/services/pipeline-deps';
import type { SearchResult } from '@/types/core';
import { FakeFetcher, FakeSearch, InMemoryStore, ScriptedModel, steppingClock, type Responder } from './fakes';

export interface TestPipeline extends Pipeline {
  llm: ScriptedModel;
  fakeSearch: FakeSearch;
  fetcher: FakeFetcher;
  store: InMemoryStore;
}

export interface TestPipelineOptions {
  responder: Responder;
  results?: SearchResult[] | Error;
  pages?: Record<string, string>;
  env?: NodeJS.ProcessEnv;
}

export function buildTestPipeline(options: TestPipelineOptions): TestPipeline {
  const settings = loadSettings({
    TELEGRAM_BOT_TOKEN: 'test-token',
    BRAVE_API_KEY: 'test-key',
    LMSTUDIO_CHAT_MODEL: 'chat-model',
    ...options.env,
  });
  const llm = new ScriptedModel(options.responder);
  const fakeSearch = new FakeSearch(options.results ?? []);
  const fetcher = new FakeFetcher(options.pages ?? {});
  const store = new InMemoryStore();
  const pipeline = createPipeline(settings, fakeSearch, {
    llm,
    fetcher,
    memory: store,
    now: steppingClock('2026-10-18T08:00:00Z'),
  });
  return { ...pipeline, llm, fakeSearch, fetcher, store };
}
