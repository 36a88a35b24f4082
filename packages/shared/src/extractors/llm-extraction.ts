/**
 * Generative Extraction Strategy
 *
 * Sends one structured prompt to the model in JSON mode and sanitizes the
 * reply into a JobRecord. The model is reached through ModelTransport so the
 * strategy does not depend on a particular SDK.
 */

import OpenAI from 'openai';
import { config } from '../config';
import { logger } from '../logger';
import { llmRequestsCounter, llmRequestDurationHistogram } from '../metrics';
import {
  JOB_FIELDS,
  NOT_SPECIFIED,
  createJobRecord,
  truncateText,
  type JobFields,
  type JobRecord,
} from '../types';
import {
  ModelUnavailableError,
  ResponseInvalidError,
  SafetyBlockedError,
  TransportError,
} from '../errors';
import { JOB_NOTICE_TEMPLATE, renderUserPrompt, type ExtractionTemplate } from '../templates';
import { BaseExtractor } from './base-extractor';
import type { ExtractionContext, ExtractionStrategy, ExtractorResult } from './types';

// ============================================================================
// Model Transport
// ============================================================================

export interface ModelRequest {
  systemPrompt: string;
  userPrompt: string;
  signal?: AbortSignal;
}

/**
 * A model reply is either content to parse or a safety block.
 * Transport failures are thrown as TransportError.
 */
export type ModelReply =
  | { kind: 'content'; content: string; model: string; requestId: string }
  | { kind: 'blocked'; reason: string; model: string; requestId: string };

export interface ModelTransport {
  readonly model: string;
  complete(request: ModelRequest): Promise<ModelReply>;
}

export interface OpenAiTransportOptions {
  apiKey: string;
  model?: string;
  baseURL?: string;
  timeoutMs?: number;
}

/** API error codes that mean the prompt itself was rejected by a content filter */
const BLOCKING_ERROR_CODES = new Set(['content_filter', 'content_policy_violation']);

/**
 * ModelTransport backed by the OpenAI chat completions API in JSON mode.
 */
export class OpenAiTransport implements ModelTransport {
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAiTransportOptions) {
    this.model = options.model || config.llmModel;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs || config.llmRequestTimeoutMs,
      maxRetries: 0, // Retries belong to the orchestrator's backoff schedule
    });
  }

  async complete(request: ModelRequest): Promise<ModelReply> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.userPrompt },
          ],
          response_format: { type: 'json_object' },
          temperature: 0,
        },
        { signal: request.signal }
      );

      llmRequestDurationHistogram.observe({ model: this.model }, (Date.now() - startTime) / 1000);

      const requestId = response.id || `req_${Date.now()}`;
      const model = response.model || this.model;
      const choice = response.choices[0];

      if (choice?.message.refusal) {
        llmRequestsCounter.inc({ model: this.model, status: 'blocked' });
        return { kind: 'blocked', reason: choice.message.refusal, model, requestId };
      }

      if (choice?.finish_reason === 'content_filter') {
        llmRequestsCounter.inc({ model: this.model, status: 'blocked' });
        return { kind: 'blocked', reason: 'content_filter', model, requestId };
      }

      llmRequestsCounter.inc({ model: this.model, status: 'success' });

      logger.debug('OpenAI completion received', {
        model,
        request_id: requestId,
        finish_reason: choice?.finish_reason,
        tokens_used: response.usage?.total_tokens,
      });

      return { kind: 'content', content: choice?.message.content ?? '', model, requestId };
    } catch (error) {
      llmRequestDurationHistogram.observe({ model: this.model }, (Date.now() - startTime) / 1000);

      if (error instanceof OpenAI.APIError && error.code && BLOCKING_ERROR_CODES.has(error.code)) {
        llmRequestsCounter.inc({ model: this.model, status: 'blocked' });
        return {
          kind: 'blocked',
          reason: error.code,
          model: this.model,
          requestId: error.request_id || `req_blocked_${Date.now()}`,
        };
      }

      llmRequestsCounter.inc({ model: this.model, status: 'error' });

      if (error instanceof OpenAI.APIError) {
        throw new TransportError(`OpenAI request failed: ${error.message}`, error.status, { cause: error });
      }
      throw new TransportError(
        `OpenAI request failed: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { cause: error }
      );
    }
  }
}

/**
 * Build the transport from configuration, or null when no API key is configured.
 */
export function createModelTransportFromConfig(): ModelTransport | null {
  if (!config.openaiApiKey) return null;

  return new OpenAiTransport({
    apiKey: config.openaiApiKey,
    model: config.llmModel,
    baseURL: config.openaiBaseUrl,
    timeoutMs: config.llmRequestTimeoutMs,
  });
}

// ============================================================================
// Prompt & Response Handling
// ============================================================================

/**
 * Prefix of the document text that is sent to the model
 */
export function truncateForPrompt(text: string, maxChars: number = config.promptMaxChars): string {
  return truncateText(text, maxChars);
}

function sanitizeValue(value: unknown): string {
  if (value === null || value === undefined) return NOT_SPECIFIED;

  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? NOT_SPECIFIED : trimmed;
  }

  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }

  if (Array.isArray(value)) {
    const items = value.map(sanitizeValue).filter((item) => item !== NOT_SPECIFIED);
    return items.length > 0 ? items.join('; ') : NOT_SPECIFIED;
  }

  const json = JSON.stringify(value);
  return json === undefined || json === '{}' ? NOT_SPECIFIED : json;
}

/**
 * Coerce a parsed model payload into the uniform schema: every field a
 * non-empty string, missing or null values become NOT_SPECIFIED, unknown keys dropped.
 */
export function sanitizeModelPayload(payload: Record<string, unknown>, sourceText: string): Readonly<JobRecord> {
  const fields: Partial<JobFields> = {};
  for (const field of JOB_FIELDS) {
    fields[field] = sanitizeValue(payload[field]);
  }
  return createJobRecord(fields, sourceText);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the model's JSON reply. Throws ResponseInvalidError for anything that
 * is not a JSON object.
 */
export function parseModelContent(content: string): Record<string, unknown> {
  if (!content.trim()) {
    throw new ResponseInvalidError('Empty response from model');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ResponseInvalidError(
      `Model response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  if (!isPlainObject(parsed)) {
    throw new ResponseInvalidError(`Model response is not a JSON object (got ${Array.isArray(parsed) ? 'array' : typeof parsed})`);
  }

  return parsed;
}

// ============================================================================
// Strategy
// ============================================================================

/**
 * LLM extraction options
 */
export interface LlmExtractionOptions {
  /** Model transport; null means no credential is configured */
  transport: ModelTransport | null;
  /** Prompt template (defaults to the job notice template) */
  template?: ExtractionTemplate;
  /** Maximum characters of document text placed in the prompt */
  promptMaxChars?: number;
  signal?: AbortSignal;
}

/**
 * LLM extraction response with metadata
 */
export interface LlmExtractionResponse {
  record: Readonly<JobRecord>;
  /** LLM model used */
  model: string;
  /** Request ID from the provider */
  requestId: string;
  /** Characters of document text sent */
  promptChars: number;
}

/**
 * One model round trip: prompt, call, parse, sanitize.
 *
 * @throws ModelUnavailableError when no transport is configured
 * @throws SafetyBlockedError when the model blocked the request
 * @throws ResponseInvalidError when the reply is not a JSON object
 * @throws TransportError for network and HTTP failures
 */
export async function requestModelExtraction(
  text: string,
  options: LlmExtractionOptions
): Promise<LlmExtractionResponse> {
  const { transport } = options;
  if (!transport) {
    throw new ModelUnavailableError('No model API key configured');
  }

  const template = options.template ?? JOB_NOTICE_TEMPLATE;
  const pageText = truncateForPrompt(text, options.promptMaxChars);

  logger.info('Extracting job fields with LLM template', {
    model: transport.model,
    template: template.name,
    template_version: template.version,
    text_length: text.length,
    prompt_text_length: pageText.length,
  });

  const reply = await transport.complete({
    systemPrompt: template.systemPrompt,
    userPrompt: renderUserPrompt(template, pageText),
    signal: options.signal,
  });

  if (reply.kind === 'blocked') {
    throw new SafetyBlockedError(reply.reason);
  }

  let payload: Record<string, unknown>;
  try {
    payload = parseModelContent(reply.content);
  } catch (error) {
    llmRequestsCounter.inc({ model: reply.model, status: 'invalid' });
    throw error;
  }

  return {
    // raw_text always comes from the full text, not the prompt slice
    record: sanitizeModelPayload(payload, text),
    model: reply.model,
    requestId: reply.requestId,
    promptChars: pageText.length,
  };
}

/**
 * Extract a JobRecord through the model. Same failure modes as requestModelExtraction.
 */
export async function extractViaModel(text: string, options: LlmExtractionOptions): Promise<Readonly<JobRecord>> {
  const response = await requestModelExtraction(text, options);
  return response.record;
}

export interface LlmExtractorOptions {
  template?: ExtractionTemplate;
  promptMaxChars?: number;
}

export class LlmExtractor extends BaseExtractor {
  readonly strategy: ExtractionStrategy = 'llm';
  readonly description = 'Generative structured extraction in JSON mode';

  constructor(
    private readonly transport: ModelTransport | null,
    private readonly options: LlmExtractorOptions = {}
  ) {
    super();
  }

  /** False when no credential is configured; extract() then throws ModelUnavailableError */
  get available(): boolean {
    return this.transport !== null;
  }

  protected async extractImpl(text: string, ctx: ExtractionContext): Promise<ExtractorResult> {
    const response = await requestModelExtraction(text, {
      transport: this.transport,
      template: this.options.template,
      promptMaxChars: this.options.promptMaxChars,
      signal: ctx.signal,
    });

    return {
      record: response.record,
      extractionMethod: 'llm',
      metadata: {
        model: response.model,
        requestId: response.requestId,
        promptChars: response.promptChars,
      },
    };
  }
}
