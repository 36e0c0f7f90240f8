// src/services/search/search-provider.ts — backend-agnostic web search contract
import type { SearchResult } from '@/types/core';

export interface WebSearchRequest {
  query: string;
  country: string;
  lang: string;
  count: number;
}

export interface SearchProvider {
  readonly name: string;
  /** Ranked results; rank i (1-based) is the citation index for the turn. */
  webSearch(request: WebSearchRequest): Promise<SearchResult[]>;
  close?(): Promise<void>;
}
