// src/services/llm-client.ts — chat-completion client for the OpenAI-compatible LM Studio endpoint

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { ChatMessage } from '@/types/core';

export interface JsonSchemaContract {
  name: string;
  schema: Record<string, unknown>;
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens?: number;
  /** Structured-output contract; sent as response_format json_schema. */
  responseSchema?: JsonSchemaContract;
}

export interface LanguageModel {
  complete(request: CompletionRequest): Promise<string>;
}

export interface LmStudioClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
}

function toProviderMessage(m: ChatMessage): ChatCompletionMessageParam {
  switch (m.role) {
    case 'system':
      return { role: 'system', content: m.content };
    case 'user':
      return { role: 'user', content: m.content };
    case 'assistant':
      return { role: 'assistant', content: m.content };
  }
}

export class LmStudioClient implements LanguageModel {
  private readonly client: OpenAI;

  constructor(options: LmStudioClientOptions) {
    this.client = new OpenAI({
      baseURL: options.baseUrl.replace(/\/+$/, ''),
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const res = await this.client.chat.completions.create({
      model: request.model,
      messages: request.messages.map(toProviderMessage),
      temperature: request.temperature,
      ...(request.maxTokens !== undefined && { max_tokens: request.maxTokens }),
      ...(request.responseSchema && {
        response_format: {
          type: 'json_schema' as const,
          json_schema: { name: request.responseSchema.name, schema: request.responseSchema.schema },
        },
      }),
    });
    return res.choices[0]?.message?.content ?? '';
  }
}
