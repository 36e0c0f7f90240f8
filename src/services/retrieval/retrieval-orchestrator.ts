// src/services/retrieval/retrieval-orchestrator.ts — search → fetch → per-source summaries
import type {
  Degradation,
  FetchedPage,
  FollowUpContext,
  SearchResult,
  SourceDateHints,
  SourceSummary,
} from '@/types/core';
import type { LanguageModel } from '@/services/llm-client';
import type { SearchProvider } from '@/services/search/search-provider';
import { recordDegradation } from '@/services/errors';
import { logger, errorMessage } from '@/services/logger';
import { buildSourceDateHints } from './date-hints';
import { fetchPageText, type PageFetcher } from './page-fetcher';
import { summarizeSources, type SourceInput } from './source-summarizer';
import { domainOf } from './url-guard';

export interface RetrievalOptions {
  country: string;
  lang: string;
  count: number;
  fetchTopN: number;
  fetchMaxChars: number;
  summaryModel: string;
}

export interface RetrievalRequest {
  /** The user's message; summaries are scoped to it. */
  question: string;
  query: string;
  isNews: boolean;
  /** Cached context of the previous search turn; no search or fetch is issued when set. */
  reuse?: FollowUpContext;
}

export interface RetrievalBundle {
  query: string;
  searchResults: SearchResult[];
  fetchedPages: FetchedPage[];
  summaries: SourceSummary[];
  dateHints: SourceDateHints;
  reused: boolean;
  degradations: Degradation[];
}

export interface RetrievalDeps {
  search: SearchProvider;
  fetcher: PageFetcher;
  llm: LanguageModel;
  now?: () => Date;
}

export class RetrievalOrchestrator {
  private readonly now: () => Date;

  constructor(
    private readonly deps: RetrievalDeps,
    private readonly options: RetrievalOptions,
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async retrieve(request: RetrievalRequest): Promise<RetrievalBundle> {
    const degradations: Degradation[] = [];

    if (request.reuse) {
      const cached = request.reuse;
      const summaries = await this.summarize(cached.fetched_pages, cached.query, true, cached.source_date_hints, degradations);
      return {
        query: cached.query,
        searchResults: cached.search_results,
        fetchedPages: cached.fetched_pages,
        summaries,
        dateHints: cached.source_date_hints,
        reused: true,
        degradations,
      };
    }

    const searchResults = await this.search(request.query, degradations);
    const fetchedPages = searchResults.length > 0 ? await this.fetchPages(searchResults) : [];
    const dateHints = buildSourceDateHints(searchResults, fetchedPages, this.now());

    logger.info('retrieval:fetched', {
      results: searchResults.length,
      fetched: fetchedPages.length,
      withText: fetchedPages.filter((p) => p.text.length > 0).length,
    });

    const summaries = await this.summarize(fetchedPages, request.question, request.isNews, dateHints, degradations);
    return {
      query: request.query,
      searchResults,
      fetchedPages,
      summaries,
      dateHints,
      reused: false,
      degradations,
    };
  }

  private async search(query: string, degradations: Degradation[]): Promise<SearchResult[]> {
    try {
      const results = await this.deps.search.webSearch({
        query,
        country: this.options.country,
        lang: this.options.lang,
        count: this.options.count,
      });
      if (results.length === 0) recordDegradation(degradations, 'RetrievalEmpty', { query, reason: 'no_results' });
      return results;
    } catch (err) {
      recordDegradation(degradations, 'RetrievalEmpty', {
        query,
        provider: this.deps.search.name,
        error: errorMessage(err),
      });
      return [];
    }
  }

  /**
   * Fetches the top-N result URLs concurrently. Page i belongs to result i,
   * so page positions keep the citation index.
   */
  private async fetchPages(results: SearchResult[]): Promise<FetchedPage[]> {
    const top = results.slice(0, this.options.fetchTopN);
    return Promise.all(
      top.map(async (r): Promise<FetchedPage> => {
        const url = r.url.trim();
        if (!url) return { title: r.title, url, text: '' };
        try {
          const text = await fetchPageText(this.deps.fetcher, url, this.options.fetchMaxChars);
          return { title: r.title, url, text };
        } catch (err) {
          logger.debug('retrieval:fetch_failed', { url, error: errorMessage(err) });
          return { title: r.title, url, text: '' };
        }
      }),
    );
  }

  private async summarize(
    pages: FetchedPage[],
    question: string,
    isNews: boolean,
    dateHints: SourceDateHints,
    degradations: Degradation[],
  ): Promise<SourceSummary[]> {
    const sources: SourceInput[] = [];
    pages.forEach((p, i) => {
      const content = p.text.trim();
      if (!content) return;
      const index = i + 1;
      sources.push({ index, title: p.title.trim(), domain: domainOf(p.url), content, dateHint: dateHints.byIndex[index] });
    });
    if (sources.length === 0) return [];

    const { summaries, skipped } = await summarizeSources(this.deps.llm, sources, {
      model: this.options.summaryModel,
      question,
      isNews,
    });
    if (skipped.length > 0) recordDegradation(degradations, 'SummarizationSkipped', { skipped });
    return summaries;
  }
}
