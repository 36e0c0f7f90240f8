// src/services/search/brave-search.ts — Brave Web Search API over HTTP
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { SearchResult } from '@/types/core';
import type { SearchProvider, WebSearchRequest } from './search-provider';

const BRAVE_ENDPOINT = 'https://api.search.brave.com/res/v1/web/search';

const braveResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().nullish(),
            url: z.string().nullish(),
            description: z.string().nullish(),
          }),
        )
        .nullish(),
    })
    .nullish(),
});

export class BraveSearchClient implements SearchProvider {
  readonly name = 'brave-http';
  private readonly http: AxiosInstance;

  constructor(
    private readonly apiKey: string,
    options: { timeoutMs?: number; http?: AxiosInstance } = {},
  ) {
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 30_000 });
  }

  async webSearch(request: WebSearchRequest): Promise<SearchResult[]> {
    const res = await this.http.get<unknown>(BRAVE_ENDPOINT, {
      headers: {
        Accept: 'application/json',
        'X-Subscription-Token': this.apiKey,
      },
      params: {
        q: request.query,
        country: request.country,
        search_lang: request.lang,
        count: String(request.count),
        safesearch: 'moderate',
        text_decorations: 'false',
      },
    });
    const body = braveResponseSchema.parse(res.data);
    return (body.web?.results ?? []).slice(0, request.count).map((item) => ({
      title: item.title ?? '',
      url: item.url ?? '',
      description: item.description ?? '',
    }));
  }
}
