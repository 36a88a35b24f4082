/**
 * Extraction Orchestrator
 *
 * Runs one parse call as a tagged-outcome state machine:
 *
 *   Init -> TryModel -> Success                       -> Done
 *                    -> PermanentFailure              -> FallbackRegex -> Done
 *                    -> TransientFailure -> Retry -> TryModel ...
 *                                        (schedule exhausted) -> FallbackRegex -> Done
 *
 * A missing credential skips straight to FallbackRegex and is not an attempt.
 * Every path ends with exactly one JobRecord.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { config } from '../config';
import { logger } from '../logger';
import { documentsParsedCounter, extractionDurationHistogram, fallbackCounter } from '../metrics';
import { classifyModelFailure, SafetyBlockedError } from '../errors';
import type { FallbackReason, ParseOutcome } from '../types';
import type { ExtractorResult } from './types';
import { LlmExtractor } from './llm-extraction';
import { RegexExtractor } from './regex-extraction';

/**
 * Waits `ms`, rejecting early if the signal aborts
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/** Result of a single TryModel step */
export type ModelAttemptOutcome =
  | { status: 'success'; result: ExtractorResult }
  | { status: 'unavailable'; reason: string }
  | { status: 'permanent'; reason: string }
  | { status: 'transient'; error: unknown };

type ParserState =
  | { name: 'try_model'; attempt: number }
  | { name: 'retry'; attempt: number; error: unknown }
  | { name: 'fallback_regex'; reason: FallbackReason; attempts: number }
  | { name: 'done'; outcome: Omit<ParseOutcome, 'durationMs'> };

export interface JobNoticeParserOptions {
  llm: LlmExtractor;
  regex?: RegexExtractor;
  /** Delay before each retry, in ms. Its length is the number of model attempts. */
  retryDelaysMs?: readonly number[];
  sleep?: SleepFn;
}

export interface ParseOptions {
  /** Aborting skips remaining model attempts and waits; the regex tier still runs */
  signal?: AbortSignal;
}

export class JobNoticeParser {
  private readonly llm: LlmExtractor;
  private readonly regex: RegexExtractor;
  private readonly retryDelaysMs: readonly number[];
  private readonly sleep: SleepFn;

  constructor(options: JobNoticeParserOptions) {
    this.llm = options.llm;
    this.regex = options.regex ?? new RegexExtractor();
    this.retryDelaysMs = options.retryDelaysMs ?? config.llmRetryDelaysMs;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Whether the generative tier has a credential */
  get modelConfigured(): boolean {
    return this.llm.available;
  }

  /**
   * Parse extracted document text into a JobRecord. Never rejects for model
   * failures; the worst case is a record full of NOT_SPECIFIED.
   */
  async parse(text: string, options: ParseOptions = {}): Promise<ParseOutcome> {
    const { signal } = options;
    const startTime = Date.now();

    let state = this.initialState();

    for (;;) {
      switch (state.name) {
        case 'try_model': {
          const { attempt } = state;
          if (signal?.aborted) {
            state = { name: 'fallback_regex', reason: 'cancelled', attempts: attempt - 1 };
            break;
          }
          state = this.afterAttempt(attempt, await this.tryModel(text, signal), signal);
          break;
        }

        case 'retry': {
          const { attempt, error } = state;
          const delayMs = this.retryDelaysMs[attempt - 1] ?? 0;
          logger.warn('LLM attempt failed, retrying', {
            attempt,
            max_attempts: this.retryDelaysMs.length,
            delay_ms: delayMs,
            error: error instanceof Error ? error.message : String(error),
          });

          try {
            await this.sleep(delayMs, signal);
          } catch (sleepError) {
            if (!signal?.aborted) throw sleepError;
            state = { name: 'fallback_regex', reason: 'cancelled', attempts: attempt };
            break;
          }
          state = { name: 'try_model', attempt: attempt + 1 };
          break;
        }

        case 'fallback_regex':
          state = { name: 'done', outcome: await this.fallback(text, state.reason, state.attempts) };
          break;

        case 'done':
          return this.finish(state.outcome, startTime);
      }
    }
  }

  private initialState(): ParserState {
    if (!this.llm.available) {
      logger.warn('No LLM API key configured, falling back to regex parser');
      return { name: 'fallback_regex', reason: 'model_unavailable', attempts: 0 };
    }
    if (this.retryDelaysMs.length === 0) {
      return { name: 'fallback_regex', reason: 'retries_exhausted', attempts: 0 };
    }
    return { name: 'try_model', attempt: 1 };
  }

  private finish(result: Omit<ParseOutcome, 'durationMs'>, startTime: number): ParseOutcome {
    const durationMs = Date.now() - startTime;
    const outcome: ParseOutcome = { ...result, durationMs };

    extractionDurationHistogram.observe({ method: outcome.method }, durationMs / 1000);
    documentsParsedCounter.inc({ method: outcome.method, status: 'success' });

    logger.info('Job notice parsed', {
      method: outcome.method,
      attempts: outcome.attempts,
      fallback_reason: outcome.fallbackReason,
      duration_ms: durationMs,
    });

    return outcome;
  }

  private async tryModel(text: string, signal: AbortSignal | undefined): Promise<ModelAttemptOutcome> {
    try {
      const result = await this.llm.extract(text, { signal });
      return { status: 'success', result };
    } catch (error) {
      switch (classifyModelFailure(error)) {
        case 'unavailable':
          return { status: 'unavailable', reason: error instanceof Error ? error.message : String(error) };
        case 'permanent':
          return {
            status: 'permanent',
            reason: error instanceof SafetyBlockedError ? error.reason : String(error),
          };
        case 'transient':
          return { status: 'transient', error };
      }
    }
  }

  private afterAttempt(attempt: number, outcome: ModelAttemptOutcome, signal: AbortSignal | undefined): ParserState {
    switch (outcome.status) {
      case 'success':
        return {
          name: 'done',
          outcome: {
            record: outcome.result.record,
            method: 'llm',
            attempts: attempt,
            model: outcome.result.metadata.model,
            requestId: outcome.result.metadata.requestId,
          },
        };

      case 'unavailable':
        logger.warn('LLM unavailable, falling back to regex parser', { reason: outcome.reason });
        return { name: 'fallback_regex', reason: 'model_unavailable', attempts: attempt - 1 };

      case 'permanent':
        logger.warn('LLM request blocked, permanent failure for this document', {
          attempt,
          block_reason: outcome.reason,
        });
        return { name: 'fallback_regex', reason: 'safety_blocked', attempts: attempt };

      case 'transient':
        if (signal?.aborted) {
          return { name: 'fallback_regex', reason: 'cancelled', attempts: attempt };
        }
        if (attempt >= this.retryDelaysMs.length) {
          logger.warn('All LLM attempts failed, falling back to regex parser', {
            attempts: attempt,
            error: outcome.error instanceof Error ? outcome.error.message : String(outcome.error),
          });
          return { name: 'fallback_regex', reason: 'retries_exhausted', attempts: attempt };
        }
        return { name: 'retry', attempt, error: outcome.error };
    }
  }

  private async fallback(
    text: string,
    reason: FallbackReason,
    attempts: number
  ): Promise<Omit<ParseOutcome, 'durationMs'>> {
    fallbackCounter.inc({ reason });

    const result = await this.regex.extract(text);

    return { record: result.record, method: 'regex', attempts, fallbackReason: reason };
  }
}
