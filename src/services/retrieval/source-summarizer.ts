// src/services/retrieval/source-summarizer.ts — one scoped model call per fetched source
import type { LanguageModel } from '@/services/llm-client';
import { NO_DATE_MARKER, type SourceSummary } from '@/types/core';
import { logger, errorMessage } from '@/services/logger';

export interface SourceInput {
  index: number;
  title: string;
  domain: string;
  content: string;
  dateHint?: string;
}

export interface SummarizeOptions {
  model: string;
  question: string;
  isNews: boolean;
}

function systemPrompt(isNews: boolean): string {
  const lines = [
    'You are summarizing a single web source for a chat assistant.',
    "Return concise bullet points (\"- \") that are directly relevant to the user's question.",
    'Do NOT include URLs. Do NOT mention you cannot browse.',
    'If the source does not contain relevant information, say so briefly.',
    'End each bullet with the citation marker like [n] where n is the source index.',
  ];
  if (isNews) {
    lines.push(
      `Start each bullet with the publication date of the item as YYYY-MM-DD, or ${NO_DATE_MARKER} when the source gives no date. Never guess a date.`,
    );
  }
  return lines.join('\n');
}

export async function summarizeSource(
  llm: LanguageModel,
  source: SourceInput,
  options: SummarizeOptions,
): Promise<string> {
  const dateLine = options.isNews && source.dateHint ? `Date found in source: ${source.dateHint}\n` : '';
  const text = await llm.complete({
    model: options.model,
    temperature: 0.2,
    maxTokens: 450,
    messages: [
      { role: 'system', content: systemPrompt(options.isNews) },
      {
        role: 'user',
        content:
          `User question: ${options.question}\n\n` +
          `Source [${source.index}]\n` +
          `Title: ${source.title}\n` +
          `Domain: ${source.domain}\n` +
          dateLine +
          `Content:\n${source.content}`,
      },
    ],
  });
  return text.trim();
}

export interface SummariesOutcome {
  summaries: SourceSummary[];
  /** Indices whose call failed or came back empty. */
  skipped: number[];
}

/** Runs all calls concurrently; a failed source is omitted, never retried. */
export async function summarizeSources(
  llm: LanguageModel,
  sources: SourceInput[],
  options: SummarizeOptions,
): Promise<SummariesOutcome> {
  const settled = await Promise.allSettled(sources.map((s) => summarizeSource(llm, s, options)));
  const summaries: SourceSummary[] = [];
  const skipped: number[] = [];

  settled.forEach((outcome, i) => {
    const source = sources[i];
    if (outcome.status === 'fulfilled' && outcome.value) {
      summaries.push({ index: source.index, title: source.title, domain: source.domain, text: outcome.value });
      return;
    }
    skipped.push(source.index);
    if (outcome.status === 'rejected') {
      logger.warn('summarizer:source_failed', { index: source.index, error: errorMessage(outcome.reason) });
    }
  });

  return { summaries, skipped };
}
