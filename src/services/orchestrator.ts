// src/services/orchestrator.ts — one inbound message: state → plan → retrieve → prompt → generate → validate → persist
import type { ChatId, ChatMessage, Degradation, PlanDecision, Profile } from '@/types/core';
import type { LanguageModel } from './llm-client';
import type { IntentPlanner, PlanOutcome } from './planner/intent-planner';
import type { RetrievalBundle, RetrievalOrchestrator } from './retrieval/retrieval-orchestrator';
import type { AnswerValidator, CheckDecision } from './validation/answer-validator';
import type { ConversationStateManager } from '@/memory/conversationState';
import { isNewsQuestion, isRecentNewsQuestion, wantsLinks } from './planner/text-signals';
import { assemblePrompt } from './prompt/prompt-assembler';
import { appendSourceLinks } from './validation/link-appendix';
import { citedIndices, limitBullets } from './validation/bullets';
import { recordDegradation } from './errors';
import { logger, errorMessage } from './logger';
import { lexicon } from '@/data/lexicon';
import { addSpan, createTrace, finishTrace, type TraceWriter, type TurnTrace } from './turn-trace';

/** Default minimum number of news items, bounded by the results found. */
const NEWS_MIN_ITEMS = 10;

export interface OrchestratorOptions {
  chatModel: string;
  temperature: number;
  newsMaxTokens: number;
}

export interface OrchestratorDeps {
  state: ConversationStateManager;
  planner: IntentPlanner;
  retrieval: RetrievalOrchestrator;
  validator: AnswerValidator;
  llm: LanguageModel;
  traces: TraceWriter;
  options: OrchestratorOptions;
  now?: () => Date;
}

export interface TurnInput {
  chatId: ChatId;
  text: string;
}

export interface TurnResult {
  reply: string;
  plan: PlanDecision;
  degradations: Degradation[];
  checks: CheckDecision[];
  traceId: string;
}

interface TurnSignals {
  isNews: boolean;
  isWeather: boolean;
  isRecentNews: boolean;
  reuse: boolean;
  newsItemCount: number;
  alreadyCited: number[];
}

function signalsFor(text: string, outcome: PlanOutcome): Omit<TurnSignals, 'newsItemCount'> {
  if (outcome.kind === 'reuse') {
    return {
      isNews: true,
      isWeather: false,
      isRecentNews: isRecentNewsQuestion(outcome.followUp.query) || isRecentNewsQuestion(text),
      reuse: true,
      alreadyCited: outcome.followUp.cited_indices,
    };
  }
  return {
    isNews: isNewsQuestion(text),
    isWeather: outcome.kind === 'answer' && outcome.isWeather,
    isRecentNews: isRecentNewsQuestion(text),
    reuse: false,
    // indices of an earlier search name other sources
    alreadyCited: [],
  };
}

function profileUpdatesFor(outcome: PlanOutcome): Partial<Profile> {
  if (outcome.kind === 'answer' && outcome.location && outcome.location.source !== 'profile') {
    return { default_weather_location: outcome.location.name };
  }
  return {};
}

async function generate(deps: OrchestratorDeps, messages: ChatMessage[], isNewsSearch: boolean): Promise<string> {
  return deps.llm.complete({
    model: deps.options.chatModel,
    messages,
    temperature: deps.options.temperature,
    ...(isNewsSearch && { maxTokens: deps.options.newsMaxTokens }),
  });
}

/**
 * Runs one message through the pipeline. Degradations are recorded on the
 * result; only a PersistenceError escapes.
 */
export async function runTurn(input: TurnInput, deps: OrchestratorDeps): Promise<TurnResult> {
  const { chatId, text } = input;
  const now = deps.now ?? (() => new Date());
  const trace = createTrace(chatId);
  const degradations: Degradation[] = [];
  try {
    let t0 = Date.now();
    const ctx = await deps.state.beginTurn(chatId, text);
    addSpan(trace, 'state.load', t0, {
      input: { text },
      metadata: { window: ctx.window.length, hasFollowUp: ctx.followUp !== null },
    });

    t0 = Date.now();
    const outcome = await deps.planner.plan({ text, profile: ctx.profile, followUp: ctx.followUp });
    addSpan(trace, 'plan', t0, { output: { kind: outcome.kind, decision: outcome.decision } });
    if (outcome.kind === 'answer' && outcome.degraded) {
      recordDegradation(degradations, 'PlanningDegraded', { chatId });
    }

    if (outcome.kind === 'clarify') {
      await deps.state.completeTurn(chatId, { assistantText: outcome.reply });
      return { reply: outcome.reply, plan: outcome.decision, degradations, checks: [], traceId: trace.traceId };
    }

    const base = signalsFor(text, outcome);
    const decision = outcome.decision;

    let bundle: RetrievalBundle | undefined;
    if (decision.tool === 'web_search') {
      t0 = Date.now();
      bundle = await deps.retrieval.retrieve({
        question: text,
        query: decision.query || text,
        isNews: base.isNews,
        ...(outcome.kind === 'reuse' && { reuse: outcome.followUp }),
      });
      for (const d of bundle.degradations) if (!degradations.includes(d)) degradations.push(d);
      addSpan(trace, 'retrieve', t0, {
        input: { query: bundle.query, reused: bundle.reused },
        output: {
          results: bundle.searchResults.map((r) => r.url),
          summaries: bundle.summaries.length,
          dateHints: bundle.dateHints,
        },
      });
    }

    const resultCount = bundle?.searchResults.length ?? 0;
    const signals: TurnSignals = {
      ...base,
      newsItemCount: outcome.kind === 'reuse' ? outcome.count : Math.max(1, Math.min(NEWS_MIN_ITEMS, resultCount)),
    };

    const messages = assemblePrompt({
      profile: ctx.profile,
      history: ctx.window,
      ...(bundle && { retrieval: bundle }),
      signals: {
        isNews: signals.isNews,
        isWeather: signals.isWeather,
        recencySensitive: signals.isWeather || signals.isRecentNews,
        newsItemCount: signals.newsItemCount,
        reuse: signals.reuse,
        alreadyCited: signals.alreadyCited,
      },
      now: now(),
    });

    t0 = Date.now();
    let draft: string;
    try {
      draft = (await generate(deps, messages, signals.isNews && decision.tool === 'web_search')).trim();
    } catch (err) {
      logger.error('generation:failed', { chatId, error: errorMessage(err) });
      draft = '';
    }
    addSpan(trace, 'generate', t0, { input: { messages }, output: draft });

    t0 = Date.now();
    const validation = await deps.validator.validate(draft, messages, {
      profile: ctx.profile,
      isNews: signals.isNews,
      isWeather: signals.isWeather,
      isRecentNews: signals.isRecentNews,
      ...(bundle && { bundle }),
      newsItemLimit: signals.newsItemCount,
      alreadyCited: signals.alreadyCited,
      now: now(),
    });
    for (const d of validation.degradations) if (!degradations.includes(d)) degradations.push(d);
    addSpan(trace, 'validate', t0, { output: validation.decisions });

    let body = validation.text.trim();
    if (signals.reuse) body = limitBullets(body, signals.newsItemCount);
    if (!body) body = lexicon.replies.generationFailure;

    const results = bundle?.searchResults ?? [];
    const cited = citedIndices(body, results.length);
    const reply = appendSourceLinks(body, results, {
      isNews: signals.isNews,
      wantsLinks: wantsLinks(text) || ctx.profile.prefer_links === true,
    });

    t0 = Date.now();
    await deps.state.completeTurn(chatId, {
      assistantText: reply,
      profileUpdates: profileUpdatesFor(outcome),
      ...(bundle && { followUp: { bundle, isNews: signals.isNews, cited } }),
    });
    addSpan(trace, 'state.save', t0, { output: { reply } });

    logger.info('turn:done', { chatId, tool: decision.tool, degradations, chars: reply.length });
    return { reply, plan: decision, degradations, checks: validation.decisions, traceId: trace.traceId };
  } catch (err) {
    addSpan(trace, 'error', trace.startTime, { error: errorMessage(err) });
    throw err;
  } finally {
    await finalize(deps, trace);
  }
}

async function finalize(deps: OrchestratorDeps, trace: TurnTrace): Promise<void> {
  finishTrace(trace);
  await deps.traces.write(trace);
}
