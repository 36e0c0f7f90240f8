// src/services/validation/answer-validator.ts — checklist runner with single-shot corrections and fallbacks
import type { ChatMessage, Degradation } from '@/types/core';
import type { CompletionRequest, LanguageModel } from '@/services/llm-client';
import { recordDegradation } from '@/services/errors';
import { logger, errorMessage } from '@/services/logger';
import { ANSWER_CHECKS, languageCheck, type AnswerCheck, type ValidationContext } from './checks';

export type CheckOutcome = 'passed' | 'corrected' | 'accepted_failing' | 'fallback';

export interface CheckDecision {
  check: string;
  outcome: CheckOutcome;
}

export interface ValidationResult {
  text: string;
  decisions: CheckDecision[];
  degradations: Degradation[];
}

export interface AnswerValidatorOptions {
  model: string;
  temperature: number;
  /** Token cap for regenerations of news answers. */
  newsMaxTokens: number;
}

/**
 * Runs each applicable check once against the current text. A failing check
 * gets one correction (a regeneration with a directive naming the problem, or
 * a rewrite-only pass); if that still fails, the check's fallback replaces the
 * text, or the corrected text is kept when the check has none. A correction
 * made for a later check is not re-run through earlier ones, except for the
 * language check, which runs once more at the end. A fallback ends the
 * checklist.
 */
export class AnswerValidator {
  constructor(
    private readonly llm: LanguageModel,
    private readonly options: AnswerValidatorOptions,
    private readonly checks: readonly AnswerCheck[] = ANSWER_CHECKS,
  ) {}

  async validate(draft: string, messages: ChatMessage[], ctx: ValidationContext): Promise<ValidationResult> {
    const decisions: CheckDecision[] = [];
    const degradations: Degradation[] = [];
    let text = draft;

    for (const check of this.checks) {
      if (!check.applies(ctx)) continue;
      const step = await this.runCheck(check, text, messages, ctx, degradations);
      text = step.text;
      decisions.push({ check: check.id, outcome: step.outcome });
      // a fallback is built from evidence; later regenerations would discard it
      if (step.outcome === 'fallback') break;
    }

    if (this.checks.includes(languageCheck) && languageCheck.applies(ctx)) {
      const step = await this.runCheck(languageCheck, text, messages, ctx, degradations);
      text = step.text;
      decisions.push({ check: `${languageCheck.id}:final`, outcome: step.outcome });
    }

    return { text, decisions, degradations };
  }

  private async runCheck(
    check: AnswerCheck,
    text: string,
    messages: ChatMessage[],
    ctx: ValidationContext,
    degradations: Degradation[],
  ): Promise<{ text: string; outcome: CheckOutcome }> {
    if (check.passes(text, ctx)) return { text, outcome: 'passed' };

    const directive = check.directive(text, ctx);
    logger.info('validator:retry', { check: check.id, correction: check.correction });
    const corrected = await this.correct(check, text, directive, messages, ctx);
    if (check.passes(corrected, ctx)) return { text: corrected, outcome: 'corrected' };

    if (check.fallback) {
      recordDegradation(degradations, 'ValidationExhausted', { check: check.id });
      return { text: check.fallback(ctx), outcome: 'fallback' };
    }
    logger.warn('validator:accepted_failing', { check: check.id });
    return { text: corrected, outcome: 'accepted_failing' };
  }

  /** Falls back to the current text when the model call fails or returns nothing. */
  private async correct(
    check: AnswerCheck,
    text: string,
    directive: string,
    messages: ChatMessage[],
    ctx: ValidationContext,
  ): Promise<string> {
    const request: CompletionRequest =
      check.correction === 'rewrite'
        ? {
            model: this.options.model,
            temperature: 0,
            messages: [
              { role: 'system', content: directive },
              { role: 'user', content: text },
            ],
          }
        : {
            model: this.options.model,
            temperature: this.options.temperature,
            ...(ctx.isNews && { maxTokens: this.options.newsMaxTokens }),
            messages: [
              ...messages,
              { role: 'assistant', content: text },
              { role: 'system', content: `${directive}\nWrite the complete corrected answer now.` },
            ],
          };
    try {
      const out = (await this.llm.complete(request)).trim();
      return out || text;
    } catch (err) {
      logger.warn('validator:correction_failed', { check: check.id, error: errorMessage(err) });
      return text;
    }
  }
}
