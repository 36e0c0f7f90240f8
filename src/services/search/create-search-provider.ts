// src/services/search/create-search-provider.ts — picks the search backend from settings
import type { Settings } from '@/config/settings';
import { BraveSearchClient } from './brave-search';
import { McpSearchBridge } from './mcp-search';
import type { SearchProvider } from './search-provider';

export function createSearchProvider(settings: Settings): SearchProvider {
  const { search } = settings;
  if (search.mcp.enabled) {
    return new McpSearchBridge({
      command: search.mcp.command,
      args: search.mcp.args,
      env: search.braveApiKey ? { BRAVE_API_KEY: search.braveApiKey } : {},
    });
  }
  return new BraveSearchClient(search.braveApiKey, { timeoutMs: settings.fetch.timeoutMs });
}
