/**
 * MCP stdio bridge: runs a search tool server as a subprocess and calls its
 * web search tool over newline-delimited JSON-RPC (initialize → tools/call).
 * Results are normalized to the same SearchResult shape as the HTTP client.
 */
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { z } from 'zod';
import type { SearchResult } from '@/types/core';
import { McpBridgeError } from '@/services/errors';
import { logger, errorMessage } from '@/services/logger';
import type { SearchProvider, WebSearchRequest } from './search-provider';
import { parseToolTextResults } from './text-results';

export interface McpServerConfig {
  command: string;
  args: string[];
  env?: Record<string, string>;
  toolName?: string;
}

function childEnv(extra: Record<string, string> | undefined): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [k, v] of Object.entries(process.env)) {
    if (typeof v === 'string') env[k] = v;
  }
  return { ...env, ...extra };
}

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).default([]),
  isError: z.boolean().optional(),
});

function readToolResult(result: unknown): { blocks: string[]; isError: boolean } {
  const parsed = toolResultSchema.safeParse(result);
  if (!parsed.success) {
    throw new McpBridgeError('Invalid MCP tool response', 'INVALID_ENVELOPE', false);
  }
  const blocks = parsed.data.content.flatMap((item) =>
    item.type === 'text' && typeof item.text === 'string' ? [item.text] : [],
  );
  return { blocks, isError: parsed.data.isError === true };
}

export class McpSearchBridge implements SearchProvider {
  readonly name = 'brave-mcp';
  private client: Client | null = null;
  private connecting: Promise<Client> | null = null;

  constructor(private readonly config: McpServerConfig) {}

  private async getClient(): Promise<Client> {
    if (this.client) return this.client;
    if (!this.connecting) {
      this.connecting = (async () => {
        try {
          const transport = new StdioClientTransport({
            command: this.config.command,
            args: this.config.args,
            env: childEnv(this.config.env),
            stderr: 'ignore',
          });
          const client = new Client({ name: 'chat-assistant', version: '1.0.0' });
          await client.connect(transport);
          logger.info('mcp:connected', { command: this.config.command });
          this.client = client;
          return client;
        } catch (err) {
          this.connecting = null;
          throw new McpBridgeError(`MCP server failed to start: ${errorMessage(err)}`, 'START_FAILED', true);
        }
      })();
    }
    return this.connecting;
  }

  async webSearch(request: WebSearchRequest): Promise<SearchResult[]> {
    const client = await this.getClient();
    const result = await client.callTool({
      name: this.config.toolName ?? 'brave_web_search',
      arguments: { query: request.query, count: request.count },
    });
    const { blocks, isError } = readToolResult(result);
    if (isError) {
      throw new McpBridgeError(blocks.join('\n') || 'tool call failed', 'TOOL_ERROR', false);
    }
    if (blocks.length === 0) {
      throw new McpBridgeError('MCP tool did not return text content', 'INVALID_RESPONSE', false);
    }
    return parseToolTextResults(blocks).slice(0, request.count);
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.connecting = null;
    if (!client) return;
    try {
      await client.close();
    } catch (err) {
      logger.warn('mcp:close_failed', { error: errorMessage(err) });
    }
  }
}
